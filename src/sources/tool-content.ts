/**
 * Normalization of documentation payloads into SearchResults.
 *
 * Tool servers answer `tools/call` with `content` as either a plain string
 * or a list of items. Items are either result records (title, excerpt /
 * description / summary, url / link) or MCP text blocks whose `text` may
 * itself hold JSON results. The keyword-search REST fallbacks return
 * the same record shape under `results`.
 */

import { z } from 'zod';
import { parseJson, isRecord } from '../utils/json.js';
import { toExcerpt, type SearchResult } from './types.js';

const ContentItemSchema = z
  .object({
    type: z.string().optional(),
    text: z.string().optional(),
    title: z.string().optional(),
    excerpt: z.string().optional(),
    description: z.string().optional(),
    summary: z.string().optional(),
    content: z.string().optional(),
    context: z.string().optional(),
    url: z.string().optional(),
    link: z.string().optional(),
    path: z.string().optional(),
  })
  .passthrough();

type ContentItem = z.infer<typeof ContentItemSchema>;

export interface ContentDefaults {
  /** Backend label put on every result */
  label: string;
  /** Title for items that carry none */
  defaultTitle: string;
  /** Link for bare text content (the vendor's search page for the query) */
  searchUrl: string;
  /** Origin prepended to site-relative `path` values */
  pathBase?: string;
}

function firstText(...values: Array<string | undefined>): string {
  return values.find((value) => value !== undefined && value.length > 0) ?? '';
}

function itemToResult(item: ContentItem, defaults: ContentDefaults): SearchResult {
  const relative = item.path ? `${defaults.pathBase ?? ''}${item.path}` : '';
  return {
    title: firstText(item.title, defaults.defaultTitle),
    excerpt: toExcerpt(firstText(item.excerpt, item.description, item.summary, item.context, item.content)),
    url: firstText(item.url, item.link, relative),
    source: defaults.label,
  };
}

function textToResult(text: string, defaults: ContentDefaults): SearchResult {
  return {
    title: defaults.defaultTitle,
    excerpt: toExcerpt(text),
    url: defaults.searchUrl,
    source: defaults.label,
  };
}

function normalizeItem(raw: unknown, defaults: ContentDefaults): SearchResult[] {
  const parsed = ContentItemSchema.safeParse(raw);
  if (!parsed.success) {
    return [];
  }
  const item = parsed.data;

  if (item.type === 'text' && item.text !== undefined) {
    const nested = parseJson(item.text);
    if (Array.isArray(nested)) {
      return nested.flatMap((entry: unknown) => normalizeItem(entry, defaults));
    }
    if (isRecord(nested) && Array.isArray(nested['results'])) {
      return nested['results'].flatMap((entry: unknown) => normalizeItem(entry, defaults));
    }
    return item.text.trim() ? [textToResult(item.text, defaults)] : [];
  }

  return [itemToResult(item, defaults)];
}

/**
 * Convert a tool result's `content` into at most `maxResults` results,
 * in server order.
 */
export function normalizeToolContent(
  content: unknown,
  defaults: ContentDefaults,
  maxResults: number
): SearchResult[] {
  if (typeof content === 'string') {
    return content.trim() ? [textToResult(content, defaults)] : [];
  }
  if (!Array.isArray(content)) {
    return [];
  }
  return content.flatMap((entry: unknown) => normalizeItem(entry, defaults)).slice(0, maxResults);
}

/**
 * Pull `content` out of a tool result object.
 */
export function getToolContent(result: unknown): unknown {
  return isRecord(result) ? result['content'] : undefined;
}
