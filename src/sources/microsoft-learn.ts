/**
 * Microsoft Learn source.
 *
 * The tool server answers over SSE. Its search tool is only asked once the
 * tool list is known; otherwise, and whenever the tool path comes back
 * empty, the public Learn search API is used.
 */

import { silentLogger, type Logger } from '../utils/logger.js';
import type { ToolSourceConfig } from '../config/schema.js';
import { ToolProtocolClient } from './tool-protocol.js';
import { KeywordSearch } from './keyword-search.js';
import { getToolContent, normalizeToolContent, type ContentDefaults } from './tool-content.js';
import type { SearchResult, SourceClient, SourceClientOptions } from './types.js';

export const MICROSOFT_LEARN_LABEL = 'Microsoft Learn';
const LEARN_ORIGIN = 'https://learn.microsoft.com';

export class MicrosoftLearnClient implements SourceClient {
  readonly label = MICROSOFT_LEARN_LABEL;

  private readonly tools: ToolProtocolClient;
  private readonly fallback?: KeywordSearch;
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(config: ToolSourceConfig, options: SourceClientOptions) {
    this.maxResults = config.max_results;
    this.logger = options.logger ?? silentLogger;
    this.tools = new ToolProtocolClient({
      endpoint: config.endpoint,
      transport: 'sse',
      source: MICROSOFT_LEARN_LABEL,
      timeoutMs: options.timeoutMs,
      fetchFn: options.fetchFn,
      logger: this.logger,
    });
    if (config.fallback_search_url) {
      this.fallback = new KeywordSearch({
        endpoint: config.fallback_search_url,
        params: (query, maxResults) => ({
          search: query,
          locale: 'en-us',
          facet: 'category',
          top: String(maxResults),
        }),
        timeoutMs: options.timeoutMs,
        fetchFn: options.fetchFn,
        logger: this.logger,
      });
    }
  }

  async searchContent(
    query: string,
    maxResults: number = this.maxResults,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const defaults: ContentDefaults = {
      label: MICROSOFT_LEARN_LABEL,
      defaultTitle: `${MICROSOFT_LEARN_LABEL}: ${query}`,
      searchUrl: `${LEARN_ORIGIN}/search?query=${encodeURIComponent(query)}`,
      pathBase: LEARN_ORIGIN,
    };

    await this.tools.ensureTools(signal);

    if (this.tools.hasTools()) {
      const result = await this.tools.callTool('microsoft_docs_search', { query }, signal);
      const results = normalizeToolContent(getToolContent(result), defaults, maxResults);
      if (results.length > 0) {
        return results;
      }
    }

    if (!this.fallback) {
      return [];
    }
    this.logger.debug?.(`${MICROSOFT_LEARN_LABEL}: using keyword search`);
    return this.fallback.search(query, maxResults, defaults, signal);
  }
}
