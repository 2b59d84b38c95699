/**
 * Exa web-search source.
 *
 * Each search is shaped before it is sent: the question is categorized,
 * the category's trusted domains (plus any named vendor's) are attached,
 * the query text is widened, and a recency floor is set. If the domain
 * filter leaves nothing, the search is repeated once without it.
 */

import { z } from 'zod';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { WebSearchConfig } from '../config/schema.js';
import type { CompletionProvider } from '../providers/types.js';
import { sourceRequest, readJsonBody } from './http.js';
import {
  buildEnhancementPrompt,
  categorizeQuery,
  loadSearchDomainTable,
  needsAiEnhancement,
  resolveStartDate,
  selectDomains,
  templateEnhancement,
  type SearchCategory,
  type SearchDomainTable,
} from './domain-selector.js';
import { toExcerpt, type FetchFn, type SearchResult, type SourceClient, type SourceClientOptions } from './types.js';

export const EXA_SEARCH_LABEL = 'Exa Search';

const ExaResultSchema = z
  .object({
    title: z.string().nullish(),
    text: z.string().nullish(),
    url: z.string().nullish(),
  })
  .passthrough();

const ExaResponseSchema = z
  .object({
    results: z.array(ExaResultSchema).default([]),
  })
  .passthrough();

export interface ExaSearchClientOptions extends SourceClientOptions {
  /** Exa key; without one every search is empty */
  apiKey?: string;
  /** Rewrites complex queries; the template is used without one */
  provider?: CompletionProvider;
  /** Model for the rewrite call */
  model?: string;
  table?: SearchDomainTable;
  /** Clock for the rolling recency window */
  now?: () => Date;
}

/** Request body as sent to the search endpoint */
export interface ExaSearchRequest {
  query: string;
  num_results: number;
  include_domains?: string[];
  start_crawl_date: string;
}

export class ExaSearchClient implements SourceClient {
  readonly label = EXA_SEARCH_LABEL;

  private readonly config: WebSearchConfig;
  private readonly apiKey?: string;
  private readonly provider?: CompletionProvider;
  private readonly model?: string;
  private readonly table: SearchDomainTable;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: WebSearchConfig, options: ExaSearchClientOptions) {
    this.config = config;
    this.apiKey = options.apiKey;
    this.provider = options.provider;
    this.model = options.model;
    this.table = options.table ?? loadSearchDomainTable();
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async searchContent(
    query: string,
    maxResults: number = this.config.max_results,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    if (!this.apiKey) {
      this.logger.debug?.(`${EXA_SEARCH_LABEL}: no API key, skipping`);
      return [];
    }

    const category = categorizeQuery(query, this.table);
    const request: ExaSearchRequest = {
      query: await this.enhanceQuery(query, category, signal),
      num_results: maxResults,
      include_domains: selectDomains(query, category, this.table),
      start_crawl_date: resolveStartDate(this.config, this.now()),
    };
    this.logger.debug?.(
      `${EXA_SEARCH_LABEL}: category=${category} domains=${request.include_domains?.length ?? 0}`
    );

    try {
      const results = await this.post(this.apiKey, request, signal);
      if (results.length > 0) {
        return results;
      }

      this.logger.debug?.(`${EXA_SEARCH_LABEL}: no domain-filtered hits, retrying unfiltered`);
      return await this.post(
        this.apiKey,
        { query: request.query, num_results: request.num_results, start_crawl_date: request.start_crawl_date },
        signal
      );
    } catch (error) {
      this.logger.warn(
        `${EXA_SEARCH_LABEL}: search failed (${error instanceof Error ? error.message : String(error)})`
      );
      return [];
    }
  }

  /**
   * Widen the query text: one model call for complex questions, the
   * category template otherwise or when the call fails or outlives the
   * source timeout.
   */
  async enhanceQuery(query: string, category: SearchCategory, signal?: AbortSignal): Promise<string> {
    const fallback = templateEnhancement(query, category, this.table);
    if (!this.provider || !needsAiEnhancement(query)) {
      return fallback;
    }

    const provider = this.provider;
    try {
      const enhanced = await withTimeout(
        (rewriteSignal) =>
          provider.complete([{ role: 'user', content: buildEnhancementPrompt(query, category) }], {
            model: this.model,
            maxTokens: 100,
            temperature: 0.3,
            signal: rewriteSignal,
          }),
        { timeoutMs: this.timeoutMs, label: `${EXA_SEARCH_LABEL} query rewrite`, signal }
      );
      return enhanced.trim() || fallback;
    } catch (error) {
      this.logger.debug?.(
        `${EXA_SEARCH_LABEL}: query rewrite failed (${error instanceof Error ? error.message : String(error)})`
      );
      return fallback;
    }
  }

  private async post(
    apiKey: string,
    body: ExaSearchRequest,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const payload = await sourceRequest(
      {
        source: EXA_SEARCH_LABEL,
        url: this.config.endpoint,
        init: {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'x-api-key': apiKey,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
        },
        timeoutMs: this.timeoutMs,
        fetchFn: this.fetchFn,
        signal,
      },
      (response) => readJsonBody(EXA_SEARCH_LABEL, response)
    );

    const parsed = ExaResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn(`${EXA_SEARCH_LABEL}: unexpected response shape`);
      return [];
    }

    return parsed.data.results.map((item) => ({
      title: item.title || 'No title',
      excerpt: toExcerpt(item.text || 'No excerpt available'),
      url: item.url ?? '',
      source: EXA_SEARCH_LABEL,
    }));
  }
}
