/**
 * Bundled Data Files
 *
 * Keyword lexicons and domain tables ship as JSON under data/ at the
 * package root. They are read once, validated, and cached.
 */

import { readFileSync } from 'node:fs';
import type { z } from 'zod';

const cache = new Map<string, unknown>();

/**
 * Resolve a file under the package's data/ directory.
 * Works from both src/utils (tests) and dist/utils (built CLI).
 */
export function getDataFileUrl(fileName: string): URL {
  return new URL(`../../data/${fileName}`, import.meta.url);
}

/**
 * Read and validate a bundled JSON data file.
 *
 * @throws ZodError when the file does not match the schema
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const cached = cache.get(fileName);
  if (cached !== undefined) {
    return schema.parse(cached);
  }

  const raw: unknown = JSON.parse(readFileSync(getDataFileUrl(fileName), 'utf-8'));
  const parsed = schema.parse(raw);
  cache.set(fileName, parsed);
  return parsed;
}

/**
 * Drop cached data files (for tests).
 * @internal
 */
export function _clearDataFileCache(): void {
  cache.clear();
}
