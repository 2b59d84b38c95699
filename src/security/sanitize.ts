/**
 * Output sanitization: HTML escaping, the source-link allow-list and the
 * Markdown sources block shown under each answer.
 */

import type { SearchResult } from '../sources/types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * True when the URL is http(s) and its host is an allow-listed domain or a
 * subdomain of one.
 */
export function isUrlAllowed(url: string, allowlist: readonly string[]): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    return false;
  }
  const host = parsed.hostname.toLowerCase();
  return allowlist.some((domain) => {
    const d = domain.toLowerCase();
    return host === d || host.endsWith(`.${d}`);
  });
}

export interface SourcesMarkdownOptions {
  /** Drop links outside `allowlist` (off by default) */
  enforceAllowlist?: boolean;
  allowlist?: readonly string[];
}

/**
 * Render results as a numbered Markdown list:
 *
 *   **📚 Sources:**
 *   1. [Title](url) (Source) — url
 *
 * Returns '' when there is nothing to list.
 */
export function buildSourcesMarkdown(
  results: readonly SearchResult[],
  options: SourcesMarkdownOptions = {}
): string {
  const { enforceAllowlist = false, allowlist = [] } = options;
  const shown = enforceAllowlist
    ? results.filter((r) => isUrlAllowed(r.url, allowlist))
    : results;

  if (shown.length === 0) {
    return '';
  }

  const lines = ['\n', '**📚 Sources:**'];
  shown.forEach((result, i) => {
    const title = escapeHtml(result.title || 'Untitled');
    const source = escapeHtml(result.source);
    const suffix = source ? ` (${source})` : '';
    lines.push(`${i + 1}. [${title}](${result.url})${suffix} — ${result.url}`);
  });
  return lines.join('\n');
}
