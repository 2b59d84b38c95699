/**
 * In-process HTTP stand-ins for source client tests.
 *
 * Clients take a `fetchFn`; tests pass a vi.fn() that answers with these
 * Response builders instead of touching the network.
 */

import { vi, type Mock } from 'vitest';
import { isRecord } from '../utils/json.js';
import type { FetchFn } from '../sources/types.js';

export type FetchMock = Mock<FetchFn>;

export function createFetchMock(): FetchMock {
  return vi.fn<FetchFn>();
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function statusResponse(status: number, statusText = ''): Response {
  return new Response(null, { status, statusText });
}

/**
 * Event-stream response delivered in the given chunks, split exactly as
 * passed so tests can cut lines at arbitrary positions.
 */
export function sseResponse(chunks: readonly string[]): Response {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
  return new Response(stream, {
    status: 200,
    headers: { 'content-type': 'text/event-stream' },
  });
}

/**
 * Parsed JSON body of the n-th recorded call.
 */
export function requestBody(mock: FetchMock, call = 0): Record<string, unknown> {
  const init = mock.mock.calls[call]?.[1];
  const parsed: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
  return isRecord(parsed) ? parsed : {};
}

/**
 * Requested URL of the n-th recorded call.
 */
export function requestUrl(mock: FetchMock, call = 0): string {
  const input = mock.mock.calls[call]?.[0];
  if (input === undefined) return '';
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.toString() : input.url;
}

/**
 * JSON-RPC method names in call order.
 */
export function rpcMethods(mock: FetchMock): string[] {
  return mock.mock.calls.map((_, index) => {
    const method = requestBody(mock, index)['method'];
    return typeof method === 'string' ? method : '';
  });
}
