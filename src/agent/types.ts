/**
 * Answer Pipeline Types
 *
 * Shared shapes for the intent classifier, router and response
 * orchestrator. Intents and enhanced contexts are frozen once built; the
 * presentation layer reads them from the SessionContext after each answer.
 */

import { z } from 'zod';
import type { SearchResult } from '../sources/types.js';

// ============================================================================
// INTENT
// ============================================================================

/** Routes the classifier may choose. `out_of_scope` comes only from the scope guard. */
export const ClassifiedRouteSchema = z.enum([
  'aws_docs',
  'microsoft_learn',
  'web_search',
  'general_knowledge',
]);
export type ClassifiedRoute = z.infer<typeof ClassifiedRouteSchema>;

export type Route = ClassifiedRoute | 'out_of_scope';

/**
 * How an intent was decided:
 * - 'llm_classification': model reply parsed and validated
 * - 'pattern_fallback': deterministic keyword rules
 * - 'scope_guard': refused before classification
 * - 'timeout_minimal': routing ran past its budget
 */
export type IntentMethod = 'llm_classification' | 'pattern_fallback' | 'scope_guard' | 'timeout_minimal';

export interface Intent {
  readonly route: Route;
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly method: IntentMethod;
  readonly reasoning: string;
}

// ============================================================================
// CONTEXT
// ============================================================================

export interface EnhancedContext {
  readonly intent: Intent;
  /** Results in backend order; empty for general_knowledge and out_of_scope */
  readonly results: readonly SearchResult[];
  /** Aggregated results, the general-knowledge note, or the refusal */
  readonly contextText: string;
  /** Always false: one source per question */
  readonly multiSource: false;
  readonly confidenceExplanation: string;
}

/**
 * Intent summary written to the session after each answer.
 */
export interface IntentExplanation {
  readonly method: IntentMethod;
  readonly confidence: number;
  readonly source: Route;
  readonly reasoning: string;
  readonly multiSource: boolean;
}

// ============================================================================
// ANSWERS
// ============================================================================

/** Coarse question shape; picks the role-prompt suffix */
export type QueryType = 'troubleshooting' | 'comparison' | 'step_by_step' | 'definition' | 'general';

export const ReformatStyleSchema = z.enum(['definition', 'step_by_step', 'troubleshoot', 'comparison']);
export type ReformatStyle = z.infer<typeof ReformatStyleSchema>;

export interface AnswerResult {
  text: string;
  /** Rendered sources block; '' when there were no results */
  sourcesMarkdown: string;
}

export interface StreamAnswerResult {
  fragments: AsyncGenerator<string, void, undefined>;
  /** Always ''; the rendered block is on the session once the stream ends */
  sourcesMarkdown: string;
}

export interface AnswerOptions {
  /** Cancels routing and the completion stream */
  signal?: AbortSignal;
}
