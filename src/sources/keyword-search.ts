/**
 * Keyword-search REST fallback.
 *
 * Documentation sites expose a plain search API next to their tool
 * endpoint. When the tool path yields nothing, the client asks it instead:
 * `GET {endpoint}?{params}` answering `{ results: [...] }` with records in
 * the same shape as tool content.
 */

import { isRecord } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sourceRequest, readJsonBody } from './http.js';
import { normalizeToolContent, type ContentDefaults } from './tool-content.js';
import type { FetchFn, SearchResult } from './types.js';

export interface KeywordSearchOptions {
  endpoint: string;
  /** Query-string parameters for one search */
  params: (query: string, maxResults: number) => Record<string, string>;
  timeoutMs: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export class KeywordSearch {
  private readonly options: KeywordSearchOptions;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: KeywordSearchOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run one search. Never rejects.
   */
  async search(
    query: string,
    maxResults: number,
    defaults: ContentDefaults,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const url = new URL(this.options.endpoint);
    for (const [key, value] of Object.entries(this.options.params(query, maxResults))) {
      url.searchParams.set(key, value);
    }

    try {
      const body = await sourceRequest(
        {
          source: defaults.label,
          url: url.toString(),
          init: { method: 'GET', headers: { Accept: 'application/json' } },
          timeoutMs: this.options.timeoutMs,
          fetchFn: this.fetchFn,
          signal,
        },
        (response) => readJsonBody(defaults.label, response)
      );

      if (!isRecord(body) || !Array.isArray(body['results'])) {
        return [];
      }
      return normalizeToolContent(body['results'], defaults, maxResults);
    } catch (error) {
      this.logger.warn(
        `${defaults.label}: keyword search failed (${error instanceof Error ? error.message : String(error)})`
      );
      return [];
    }
  }
}
