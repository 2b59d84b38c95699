/**
 * Source Client Types
 *
 * Three knowledge backends (AWS documentation, Microsoft Learn, Exa web
 * search) sit behind one capability: searchContent. Clients never reject;
 * an empty array is the failure signal.
 */

import type { Logger } from '../utils/logger.js';

// ============================================================================
// RESULTS
// ============================================================================

export interface SearchResult {
  readonly title: string;
  /** First 200 characters of the source text followed by "..." */
  readonly excerpt: string;
  readonly url: string;
  /** Display label of the backend, e.g. "Microsoft Learn" */
  readonly source: string;
}

export const EXCERPT_LENGTH = 200;

export function toExcerpt(text: string): string {
  return `${text.slice(0, EXCERPT_LENGTH)}...`;
}

// ============================================================================
// CLIENT CONTRACT
// ============================================================================

export interface SourceClient {
  /** Display label used on every result */
  readonly label: string;

  /**
   * Search the backend. Resolves within the client's timeout; never rejects.
   */
  searchContent(query: string, maxResults?: number, signal?: AbortSignal): Promise<SearchResult[]>;
}

/** Injected for tests; defaults to the global fetch */
export type FetchFn = typeof fetch;

export interface SourceClientOptions {
  /** Per-call network timeout */
  timeoutMs: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}
