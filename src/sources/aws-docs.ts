/**
 * AWS documentation source.
 *
 * Plain JSON-RPC tool server. A question that carries a docs.aws.amazon.com
 * link is answered with the `recommend` tool for that page; everything else
 * goes through `search_documentation`.
 */

import { silentLogger, type Logger } from '../utils/logger.js';
import type { ToolSourceConfig } from '../config/schema.js';
import { ToolProtocolClient } from './tool-protocol.js';
import { KeywordSearch } from './keyword-search.js';
import { getToolContent, normalizeToolContent, type ContentDefaults } from './tool-content.js';
import type { SearchResult, SourceClient, SourceClientOptions } from './types.js';

export const AWS_DOCS_LABEL = 'AWS Documentation';

const AWS_DOC_URL_PATTERN = /https?:\/\/docs\.aws\.amazon\.com[^\s]+/;

/**
 * First AWS documentation link in the text, if any.
 */
export function extractAwsDocUrl(text: string): string | undefined {
  return text.match(AWS_DOC_URL_PATTERN)?.[0];
}

function awsSearchPage(query: string): string {
  return `https://docs.aws.amazon.com/search/doc-search.html?searchPath=documentation&searchQuery=${encodeURIComponent(query)}`;
}

export class AwsDocsClient implements SourceClient {
  readonly label = AWS_DOCS_LABEL;

  private readonly tools: ToolProtocolClient;
  private readonly fallback?: KeywordSearch;
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(config: ToolSourceConfig, options: SourceClientOptions) {
    this.maxResults = config.max_results;
    this.logger = options.logger ?? silentLogger;
    this.tools = new ToolProtocolClient({
      endpoint: config.endpoint,
      transport: 'json',
      source: AWS_DOCS_LABEL,
      timeoutMs: options.timeoutMs,
      fetchFn: options.fetchFn,
      logger: this.logger,
    });
    if (config.fallback_search_url) {
      this.fallback = new KeywordSearch({
        endpoint: config.fallback_search_url,
        params: (query, maxResults) => ({ search: query, top: String(maxResults) }),
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
    await this.tools.ensureTools(signal);

    const docUrl = extractAwsDocUrl(query);
    if (docUrl) {
      const recommended = await this.recommend(docUrl, maxResults, signal);
      if (recommended.length > 0) {
        return recommended;
      }
    }

    const defaults: ContentDefaults = {
      label: AWS_DOCS_LABEL,
      defaultTitle: `${AWS_DOCS_LABEL}: ${query}`,
      searchUrl: awsSearchPage(query),
    };

    const result = await this.tools.callTool(
      'search_documentation',
      { search_phrase: query, limit: maxResults },
      signal
    );
    const results = normalizeToolContent(getToolContent(result), defaults, maxResults);
    if (results.length > 0 || !this.fallback) {
      return results;
    }

    this.logger.debug?.(`${AWS_DOCS_LABEL}: tool search empty, trying keyword search`);
    return this.fallback.search(query, maxResults, defaults, signal);
  }

  /**
   * Pages related to one documentation page.
   */
  async recommend(url: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const result = await this.tools.callTool('recommend', { url }, signal);
    return normalizeToolContent(
      getToolContent(result),
      { label: AWS_DOCS_LABEL, defaultTitle: AWS_DOCS_LABEL, searchUrl: url },
      maxResults
    );
  }
}
