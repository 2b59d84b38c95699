/**
 * Web-search query shaping.
 *
 * Pure functions that turn a question into an Exa request: which topical
 * category it belongs to, which domains to favour, how to widen the query
 * text, and how far back to look.
 */

import { z } from 'zod';
import { loadDataFile } from '../utils/data-files.js';
import type { WebSearchConfig } from '../config/schema.js';

// ============================================================================
// TABLES
// ============================================================================

export const SEARCH_CATEGORIES = [
  'cybersecurity',
  'cloud_devops',
  'programming',
  'business_tech',
  'research_academic',
  'it_general',
] as const;

export type SearchCategory = (typeof SEARCH_CATEGORIES)[number];

const CategoryEntrySchema = z.object({
  keywords: z.array(z.string()),
  enhancement: z.string(),
  domains: z.array(z.string()),
});

export const SearchDomainTableSchema = z.object({
  categories: z.object({
    cybersecurity: CategoryEntrySchema,
    cloud_devops: CategoryEntrySchema,
    programming: CategoryEntrySchema,
    business_tech: CategoryEntrySchema,
    research_academic: CategoryEntrySchema,
    it_general: CategoryEntrySchema,
  }),
  vendors: z.record(z.array(z.string())),
});

export type SearchDomainTable = z.infer<typeof SearchDomainTableSchema>;

export function loadSearchDomainTable(): SearchDomainTable {
  return loadDataFile('search-domains.json', SearchDomainTableSchema);
}

// ============================================================================
// CATEGORY & DOMAINS
// ============================================================================

/**
 * First category (in table priority order) with a keyword contained in
 * the query; it_general when none match.
 */
export function categorizeQuery(query: string, table: SearchDomainTable): SearchCategory {
  const lower = query.toLowerCase();
  for (const category of SEARCH_CATEGORIES) {
    if (category === 'it_general') continue;
    if (table.categories[category].keywords.some((keyword) => lower.includes(keyword))) {
      return category;
    }
  }
  return 'it_general';
}

/**
 * Vendor-specific domains for every vendor named in the query.
 */
export function vendorDomains(query: string, table: SearchDomainTable): string[] {
  const lower = query.toLowerCase();
  return Object.entries(table.vendors)
    .filter(([vendor]) => lower.includes(vendor))
    .flatMap(([, domains]) => domains);
}

/**
 * it_general ∪ category ∪ vendor boosts, first-seen order, no duplicates.
 */
export function selectDomains(
  query: string,
  category: SearchCategory,
  table: SearchDomainTable
): string[] {
  const combined = [
    ...table.categories.it_general.domains,
    ...table.categories[category].domains,
    ...vendorDomains(query, table),
  ];
  return [...new Set(combined)];
}

// ============================================================================
// QUERY ENHANCEMENT
// ============================================================================

const COMPLEX_QUERY_WORDS = [
  'best',
  'compare',
  'difference',
  'how',
  'why',
  'when',
  'latest',
  'new',
  'emerging',
];

/**
 * Long, interrogative or comparative queries are rewritten by the model;
 * short keyword queries get the template.
 */
export function needsAiEnhancement(query: string): boolean {
  const lower = query.toLowerCase();
  return (
    query.trim().split(/\s+/).length > 6 ||
    query.includes('?') ||
    COMPLEX_QUERY_WORDS.some((word) => lower.includes(word))
  );
}

export function templateEnhancement(
  query: string,
  category: SearchCategory,
  table: SearchDomainTable
): string {
  return `${query} ${table.categories[category].enhancement}`;
}

export function buildEnhancementPrompt(query: string, category: SearchCategory): string {
  return `You are a search optimization expert. Given a user query and category, generate the most effective search keywords to find relevant, current information.

User Query: "${query}"
Category: ${category}

Rules:
1. Keep the original query intact
2. Add 3-5 highly relevant keywords that will improve search results
3. Focus on technical terms, industry jargon, and specific concepts
4. Consider current trends and terminology
5. Return only the enhanced query, no explanation

Enhanced Query:`;
}

// ============================================================================
// RECENCY
// ============================================================================

/**
 * Earliest crawl date as YYYY-MM-DD: a rolling window of `start_days`
 * (UTC) when positive, otherwise the fixed `start_date`.
 */
export function resolveStartDate(
  config: Pick<WebSearchConfig, 'start_date' | 'start_days'>,
  now: Date = new Date()
): string {
  if (config.start_days > 0) {
    const floor = new Date(now.getTime() - config.start_days * 24 * 60 * 60 * 1000);
    return floor.toISOString().slice(0, 10);
  }
  return config.start_date;
}
