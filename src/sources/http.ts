/**
 * Deadline-bounded HTTP for source clients.
 *
 * The deadline covers the whole exchange, body included, so a stalled
 * event stream is cut off like a stalled connect. Every failure comes out
 * as a SourceError.
 */

import { withTimeout, isTimeoutError } from '../utils/timeout.js';
import { SourceError } from './errors.js';
import type { FetchFn } from './types.js';

export interface SourceRequest {
  source: string;
  url: string;
  init: RequestInit;
  timeoutMs: number;
  fetchFn: FetchFn;
  signal?: AbortSignal;
}

/**
 * Issue a request and read the body with `read`, all under one deadline.
 *
 * @throws SourceError
 */
export async function sourceRequest<T>(
  request: SourceRequest,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const { source, url, init, timeoutMs, fetchFn, signal } = request;

  try {
    return await withTimeout(
      async (deadline) => {
        const response = await fetchFn(url, { ...init, signal: deadline });
        if (!response.ok) {
          // Release the connection before bailing out
          await response.body?.cancel().catch(() => undefined);
          throw SourceError.fromStatus(source, response.status, response.statusText);
        }
        return read(response);
      },
      { timeoutMs, label: source, signal }
    );
  } catch (error) {
    if (error instanceof SourceError) throw error;
    if (isTimeoutError(error)) throw SourceError.timeout(source, timeoutMs);
    throw SourceError.network(source, error);
  }
}

/**
 * Read a JSON body.
 *
 * @throws SourceError (MALFORMED_PAYLOAD) when the body is not JSON
 */
export async function readJsonBody(source: string, response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw SourceError.malformed(
      source,
      `invalid JSON (${text.slice(0, 60)})`,
      error instanceof Error ? error : undefined
    );
  }
}
