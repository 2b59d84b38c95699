/**
 * Session Context
 *
 * Per-session store the pipeline writes once per answer and the
 * presentation layer reads afterwards. Created by createAssistant, passed
 * by reference into the orchestrator.
 */

import { randomUUID } from 'node:crypto';
import type { SearchResult } from '../sources/types.js';
import type { EnhancedContext, IntentExplanation } from './types.js';

export interface SessionContext {
  /** Groups every answer of this session into one Langfuse session */
  readonly sessionId: string;
  /** Model used for answers; set from config, env or --model */
  selectedModel: string;
  lastIntent: IntentExplanation | null;
  lastSources: readonly SearchResult[];
  /** '' when the last answer had no sources */
  lastSourcesMarkdown: string;
  /** Up to three suggestions for the last answer */
  followups: readonly string[];
}

export function createSessionContext(selectedModel: string, sessionId: string = randomUUID()): SessionContext {
  return {
    sessionId,
    selectedModel,
    lastIntent: null,
    lastSources: [],
    lastSourcesMarkdown: '',
    followups: [],
  };
}

/**
 * Record the routing outcome of one answer. Follow-ups from the previous
 * answer are cleared.
 */
export function recordRouting(
  session: SessionContext,
  context: EnhancedContext,
  sourcesMarkdown: string
): void {
  const { intent } = context;
  session.lastIntent = Object.freeze({
    method: intent.method,
    confidence: intent.confidence,
    source: intent.route,
    reasoning: intent.reasoning,
    multiSource: context.multiSource,
  });
  session.lastSources = context.results;
  session.lastSourcesMarkdown = sourcesMarkdown;
  session.followups = [];
}

/**
 * Render the last answer's sources for a follow-up prompt, one
 * `Title: url` line each.
 */
export function sourcesForFollowups(session: SessionContext): string {
  return session.lastSources.map((source) => `${source.title}: ${source.url}`).join('\n');
}
