/**
 * Tool-Protocol Client Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ToolProtocolClient, type ToolTransport } from '../tool-protocol.js';
import {
  createFetchMock,
  jsonResponse,
  statusResponse,
  sseResponse,
  requestBody,
  rpcMethods,
  type FetchMock,
} from '../../test-utils/index.js';

const TOOLS = { tools: [{ name: 'lookup', description: 'Find pages' }] };

function rpcResult(id: number, result: unknown): unknown {
  return { jsonrpc: '2.0', id, result };
}

describe('ToolProtocolClient', () => {
  let fetchMock: FetchMock;
  let logger: { warn: ReturnType<typeof vi.fn>; debug: ReturnType<typeof vi.fn> };

  function createClient(transport: ToolTransport = 'json', timeoutMs = 1000): ToolProtocolClient {
    return new ToolProtocolClient({
      endpoint: 'https://tools.example.test/rpc',
      transport,
      source: 'Docs',
      timeoutMs,
      fetchFn: fetchMock,
      logger,
    });
  }

  beforeEach(() => {
    fetchMock = createFetchMock();
    logger = { warn: vi.fn(), debug: vi.fn() };
  });

  describe('tool cache', () => {
    it('should list tools once and reuse the cache', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(rpcResult(1, TOOLS)));
      const client = createClient();

      expect(await client.ensureTools()).toBe(true);
      expect(await client.ensureTools()).toBe(true);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(client.hasTools()).toBe(true);
      expect(client.getCache().tools).toEqual([{ name: 'lookup', description: 'Find pages' }]);
      expect(client.getCache().lastRefresh).toBeInstanceOf(Date);
    });

    it('should send a JSON-RPC 2.0 envelope with increasing ids', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(rpcResult(1, TOOLS)))
        .mockResolvedValueOnce(jsonResponse(rpcResult(2, { content: 'x' })));
      const client = createClient();

      await client.ensureTools();
      await client.callTool('lookup', { query: 'vpn' });

      expect(requestBody(fetchMock, 0)).toEqual({ jsonrpc: '2.0', id: 1, method: 'tools/list' });
      expect(requestBody(fetchMock, 1)).toEqual({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'lookup', arguments: { query: 'vpn' } },
      });
    });

    it('should leave the cache empty when listing fails', async () => {
      fetchMock.mockResolvedValueOnce(statusResponse(503, 'Service Unavailable'));
      const client = createClient();

      expect(await client.ensureTools()).toBe(false);
      expect(client.hasTools()).toBe(false);
      expect(client.getCache()).toEqual({ tools: null, lastRefresh: null });
      expect(logger.warn).toHaveBeenCalledWith(
        'Docs: failed to list tools (Docs returned HTTP 503 Service Unavailable)'
      );
    });

    it('should reject a tool list without a tools array', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(rpcResult(1, { items: [] })));
      const client = createClient();

      expect(await client.refreshTools()).toBe(false);
      expect(client.hasTools()).toBe(false);
    });
  });

  describe('callTool', () => {
    it('should return the result of a plain JSON reply', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(rpcResult(1, { content: 'answer' })));

      expect(await createClient().callTool('lookup', {})).toEqual({ content: 'answer' });
    });

    it('should refresh the tool list exactly once on 404 and yield nothing', async () => {
      fetchMock.mockImplementation(async (_input, init) => {
        const body: unknown = JSON.parse(String(init?.body));
        const isList = typeof body === 'object' && body !== null && 'method' in body && body.method === 'tools/list';
        return isList ? jsonResponse(rpcResult(1, TOOLS)) : statusResponse(404, 'Not Found');
      });
      const client = createClient();

      const result = await client.callTool('lookup', { query: 'vpn' });

      expect(result).toBeUndefined();
      expect(rpcMethods(fetchMock)).toEqual(['tools/call', 'tools/list']);
      expect(client.hasTools()).toBe(true);
    });

    it('should refresh on 400 as well', async () => {
      fetchMock
        .mockResolvedValueOnce(statusResponse(400, 'Bad Request'))
        .mockResolvedValueOnce(jsonResponse(rpcResult(2, TOOLS)));

      expect(await createClient().callTool('lookup', {})).toBeUndefined();
      expect(rpcMethods(fetchMock)).toEqual(['tools/call', 'tools/list']);
    });

    it('should not refresh on server errors', async () => {
      fetchMock.mockResolvedValueOnce(statusResponse(500, 'Internal Server Error'));

      expect(await createClient().callTool('lookup', {})).toBeUndefined();
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'Docs: lookup failed (Docs returned HTTP 500 Internal Server Error)'
      );
    });

    it('should treat a JSON-RPC error envelope as a failed call', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ jsonrpc: '2.0', id: 1, error: { code: -32601, message: 'nope' } })
      );

      expect(await createClient().callTool('lookup', {})).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should give up when the deadline passes', async () => {
      fetchMock.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );

      expect(await createClient('json', 20).callTool('lookup', {})).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Docs: lookup failed (Docs timed out after 20ms)');
    });

    it('should stop when the caller aborts', async () => {
      const controller = new AbortController();
      controller.abort(new Error('cancelled'));
      fetchMock.mockResolvedValue(jsonResponse(rpcResult(1, { content: 'late' })));

      expect(await createClient().callTool('lookup', {}, controller.signal)).toBeUndefined();
    });
  });

  describe('SSE transport', () => {
    it('should ask for an event stream', async () => {
      fetchMock.mockResolvedValueOnce(sseResponse([`data: ${JSON.stringify(rpcResult(1, TOOLS))}\n`]));

      await createClient('sse').ensureTools();

      const headers = fetchMock.mock.calls[0]?.[1]?.headers;
      expect(headers).toEqual({
        'Content-Type': 'application/json',
        Accept: 'application/json, text/event-stream',
      });
    });

    it('should keep the latest result and skip noise', async () => {
      fetchMock.mockResolvedValueOnce(
        sseResponse([
          ': ping\n',
          `data: ${JSON.stringify(rpcResult(1, { content: 'first' }))}\n\n`,
          'data: not json\n',
          'data: {"jsonrpc":"2.0","id":1,"res',
          'ult":{"content":"second"}}\n',
          'data: [DONE]\n',
        ])
      );

      expect(await createClient('sse').callTool('lookup', {})).toEqual({ content: 'second' });
    });

    it('should take a bare payload carrying content as the result', async () => {
      fetchMock.mockResolvedValueOnce(sseResponse(['data: {"content":[{"title":"T"}]}\n']));

      expect(await createClient('sse').callTool('lookup', {})).toEqual({ content: [{ title: 'T' }] });
    });

    it('should log error payloads and yield nothing when no result arrives', async () => {
      fetchMock.mockResolvedValueOnce(sseResponse(['data: {"error":{"message":"boom"}}\n']));

      expect(await createClient('sse').callTool('lookup', {})).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('Docs: stream error {"message":"boom"}');
    });

    it('should parse a JSON reply on the SSE transport', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(rpcResult(1, { content: 'plain' })));

      expect(await createClient('sse').callTool('lookup', {})).toEqual({ content: 'plain' });
    });
  });
});
