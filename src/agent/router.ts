/**
 * Source Router
 *
 * Per question: classify (scope check included) → dispatch to at most one
 * source → aggregate the results into the context text.
 *
 * Dispatch is a table keyed by route. Source clients never reject, but a
 * dispatch failure of any kind is still caught here, reported through
 * `onError`, and treated as no results.
 */

import type { SourceClient, SearchResult } from '../sources/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError } from '../errors/index.js';
import { explainIntent, type IntentClassifier } from './intent-classifier.js';
import type { EnhancedContext, Intent, Route } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export type SourceRoute = Extract<Route, 'aws_docs' | 'microsoft_learn' | 'web_search'>;

export type SourceTable = Readonly<Record<SourceRoute, SourceClient>>;

export interface SourceRouterOptions {
  classifier: IntentClassifier;
  sources: SourceTable;
  /** Context text for out_of_scope questions */
  outOfScopeMessage: string;
  /** Receives a displayable message when dispatch fails */
  onError?: (message: string) => void;
  logger?: Logger;
}

export interface RouteOptions {
  signal?: AbortSignal;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const GENERAL_KNOWLEDGE_CONTEXT = 'Using general knowledge for a conversational response.';

// ============================================================================
// HELPERS
// ============================================================================

/**
 * One block per result, in backend order:
 *
 *   **Title** (Source)
 *   excerpt
 *   URL: https://...
 */
export function formatContextText(results: readonly SearchResult[]): string {
  return results
    .map((result) => `**${result.title}** (${result.source})\n${result.excerpt}\nURL: ${result.url}\n`)
    .join('\n');
}

export function buildEnhancedContext(
  intent: Intent,
  results: readonly SearchResult[],
  contextText: string
): EnhancedContext {
  return Object.freeze({
    intent,
    results: Object.freeze([...results]),
    contextText,
    multiSource: false,
    confidenceExplanation: explainIntent(intent),
  });
}

function isSourceRoute(route: Route): route is SourceRoute {
  return route === 'aws_docs' || route === 'microsoft_learn' || route === 'web_search';
}

// ============================================================================
// SOURCE ROUTER
// ============================================================================

export class SourceRouter {
  private readonly classifier: IntentClassifier;
  private readonly sources: SourceTable;
  private readonly outOfScopeMessage: string;
  private readonly onError?: (message: string) => void;
  private readonly logger: Logger;

  constructor(options: SourceRouterOptions) {
    this.classifier = options.classifier;
    this.sources = options.sources;
    this.outOfScopeMessage = options.outOfScopeMessage;
    this.onError = options.onError;
    this.logger = options.logger ?? silentLogger;
  }

  async route(query: string, options: RouteOptions = {}): Promise<EnhancedContext> {
    const { signal } = options;
    const intent = await this.classifier.classify(query, signal);

    if (intent.route === 'out_of_scope') {
      return buildEnhancedContext(intent, [], this.outOfScopeMessage);
    }
    if (!isSourceRoute(intent.route)) {
      return buildEnhancedContext(intent, [], GENERAL_KNOWLEDGE_CONTEXT);
    }

    const results = await this.dispatch(this.sources[intent.route], query, signal);
    return buildEnhancedContext(intent, results, formatContextText(results));
  }

  private async dispatch(client: SourceClient, query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    try {
      return await client.searchContent(query, undefined, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = `⚠️ ${client.label} lookup failed: ${describeError(error)}`;
      this.logger.warn(message);
      this.onError?.(message);
      return [];
    }
  }
}

export function createSourceRouter(options: SourceRouterOptions): SourceRouter {
  return new SourceRouter(options);
}
