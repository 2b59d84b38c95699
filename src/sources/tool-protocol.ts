/**
 * Tool-Protocol Client
 *
 * JSON-RPC 2.0 `tools/list` / `tools/call` over HTTP POST, shared by both
 * documentation sources. Two transports:
 *
 * - json: plain request/response, the reply body is the JSON-RPC envelope
 * - sse:  the reply is an event stream; every complete `data:` line is
 *         parsed and the latest `result` wins when the stream closes
 *
 * The tool list is cached lazily. A 400/404 from `tools/call` means the
 * server's tool schema moved: the cache is refreshed once and the call
 * yields nothing. Nothing here throws to the caller.
 */

import { z } from 'zod';
import { parseJson, isRecord } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { SourceError } from './errors.js';
import { sourceRequest, readJsonBody } from './http.js';
import { readSsePayloads } from './sse.js';
import type { FetchFn } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export type ToolTransport = 'json' | 'sse';

export const ToolDescriptorSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
  })
  .passthrough();

export type ToolDescriptor = z.infer<typeof ToolDescriptorSchema>;

const ToolListResultSchema = z.object({
  tools: z.array(ToolDescriptorSchema),
});

export interface ToolCache {
  tools: ToolDescriptor[] | null;
  lastRefresh: Date | null;
}

export interface ToolProtocolClientOptions {
  endpoint: string;
  transport: ToolTransport;
  /** Backend label for logs and errors */
  source: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

// ============================================================================
// CLIENT
// ============================================================================

export class ToolProtocolClient {
  private readonly endpoint: string;
  private readonly transport: ToolTransport;
  private readonly source: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private cache: ToolCache = { tools: null, lastRefresh: null };
  private nextId = 1;

  constructor(options: ToolProtocolClientOptions) {
    this.endpoint = options.endpoint;
    this.transport = options.transport;
    this.source = options.source;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /** Snapshot of the tool cache */
  getCache(): Readonly<ToolCache> {
    return { ...this.cache };
  }

  hasTools(): boolean {
    return this.cache.tools !== null && this.cache.tools.length > 0;
  }

  /**
   * List tools on first use. Concurrent first calls may both refresh;
   * the last write wins and both see a valid cache.
   */
  async ensureTools(signal?: AbortSignal): Promise<boolean> {
    if (this.cache.tools !== null && this.cache.lastRefresh !== null) {
      return true;
    }
    return this.refreshTools(signal);
  }

  /**
   * Fetch the tool list. On failure the cache is left empty.
   */
  async refreshTools(signal?: AbortSignal): Promise<boolean> {
    try {
      const result = await this.rpc('tools/list', undefined, signal);
      const parsed = ToolListResultSchema.safeParse(result);
      if (!parsed.success) {
        throw SourceError.malformed(this.source, 'tools/list result has no tool array');
      }
      this.cache = { tools: parsed.data.tools, lastRefresh: new Date() };
      this.logger.debug?.(`${this.source}: ${parsed.data.tools.length} tools available`);
      return true;
    } catch (error) {
      this.cache = { tools: null, lastRefresh: null };
      this.logger.warn(`${this.source}: failed to list tools (${describe(error)})`);
      return false;
    }
  }

  /**
   * Invoke a tool. Resolves to the JSON-RPC `result`, or undefined on any
   * failure.
   */
  async callTool(
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<unknown> {
    try {
      return await this.rpc('tools/call', { name, arguments: args }, signal);
    } catch (error) {
      if (error instanceof SourceError && error.isSchemaDrift) {
        this.logger.debug?.(`${this.source}: ${name} returned ${error.status}, refreshing tools`);
        await this.refreshTools(signal);
        return undefined;
      }
      this.logger.warn(`${this.source}: ${name} failed (${describe(error)})`);
      return undefined;
    }
  }

  // ==========================================================================
  // WIRE
  // ==========================================================================

  private async rpc(method: string, params: unknown, signal?: AbortSignal): Promise<unknown> {
    const body: Record<string, unknown> = { jsonrpc: '2.0', id: this.nextId++, method };
    if (params !== undefined) {
      body['params'] = params;
    }

    return sourceRequest(
      {
        source: this.source,
        url: this.endpoint,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept:
              this.transport === 'sse'
                ? 'application/json, text/event-stream'
                : 'application/json',
          },
          body: JSON.stringify(body),
        },
        timeoutMs: this.timeoutMs,
        fetchFn: this.fetchFn,
        signal,
      },
      (response) => this.readResult(response)
    );
  }

  private async readResult(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    if (this.transport === 'sse' && contentType.includes('text/event-stream')) {
      return this.readEventStream(response);
    }
    return this.unwrapEnvelope(await readJsonBody(this.source, response));
  }

  private unwrapEnvelope(envelope: unknown): unknown {
    if (!isRecord(envelope)) {
      throw SourceError.malformed(this.source, 'response is not a JSON-RPC object');
    }
    if ('error' in envelope && envelope['error'] !== undefined && envelope['error'] !== null) {
      throw SourceError.malformed(this.source, `JSON-RPC error ${JSON.stringify(envelope['error'])}`);
    }
    if (!('result' in envelope)) {
      throw SourceError.malformed(this.source, 'JSON-RPC response has no result');
    }
    return envelope['result'];
  }

  /**
   * Accumulate the latest result across the event stream. A payload with
   * `result` replaces it; a bare payload with `content` is taken as the
   * result itself. `[DONE]` and unparsable lines are skipped.
   */
  private async readEventStream(response: Response): Promise<unknown> {
    if (!response.body) {
      throw SourceError.malformed(this.source, 'event stream has no body');
    }

    let latest: unknown = undefined;
    for await (const payload of readSsePayloads(response.body)) {
      if (payload === '' || payload === '[DONE]') continue;

      const data = parseJson(payload);
      if (!isRecord(data)) continue;

      if ('result' in data) {
        latest = data['result'];
      } else if ('content' in data) {
        latest = data;
      } else if ('error' in data) {
        this.logger.warn(`${this.source}: stream error ${JSON.stringify(data['error'])}`);
      }
    }

    if (latest === undefined) {
      throw SourceError.malformed(this.source, 'event stream closed without a result');
    }
    return latest;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
