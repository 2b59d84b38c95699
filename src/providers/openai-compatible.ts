/**
 * OpenAI-Compatible Completion Provider
 *
 * Talks to any chat-completions endpoint that speaks the OpenAI wire
 * format (OpenRouter by default) through the official `openai` SDK.
 *
 * SECURITY: the API key is passed straight to the SDK client and never
 * logged or included in error messages.
 */

import OpenAI from 'openai';
import type { LLMConfig } from '../config/schema.js';
import type { ChatMessage, CompletionOptions, CompletionProvider } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface OpenAICompatibleProviderOptions {
  apiKey: string;
  /** Default model for calls that do not override it */
  model: string;
  baseURL: string;
  /** Used when a call does not set maxTokens */
  maxTokens: number;
  /** Used when a call does not set temperature */
  temperature: number;
  /** Request timeout in milliseconds */
  timeout: number;
  /** OpenRouter attribution headers */
  referer?: string;
  title?: string;
  /** Prebuilt SDK client (tests) */
  client?: OpenAI;
}

// ============================================================================
// PROVIDER
// ============================================================================

export class OpenAICompatibleProvider implements CompletionProvider {
  readonly model: string;

  private readonly client: OpenAI;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(options: OpenAICompatibleProviderOptions) {
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;

    const defaultHeaders: Record<string, string> = {};
    if (options.referer) defaultHeaders['HTTP-Referer'] = options.referer;
    if (options.title) defaultHeaders['X-Title'] = options.title;

    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeout,
        maxRetries: 1,
        defaultHeaders,
      });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: options.model ?? this.model,
        messages,
        max_tokens: options.maxTokens ?? this.maxTokens,
        temperature: options.temperature ?? this.temperature,
      },
      { signal: options.signal }
    );

    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined) {
      throw new Error('Completion returned no content');
    }
    return content;
  }

  async *stream(
    messages: ChatMessage[],
    options: CompletionOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    const stream = await this.client.chat.completions.create(
      {
        model: options.model ?? this.model,
        messages,
        max_tokens: options.maxTokens ?? this.maxTokens,
        temperature: options.temperature ?? this.temperature,
        stream: true,
      },
      { signal: options.signal }
    );

    let finished = false;
    try {
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
      finished = true;
    } finally {
      // Consumer stopped early: close the HTTP stream
      if (!finished) {
        stream.controller.abort();
      }
    }
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create the completion provider for a config, or undefined when no API
 * key is available.
 *
 * @example
 * ```typescript
 * const provider = createOpenAICompatibleProvider(config.llm, {
 *   apiKey: getApiKey('openrouter'),
 *   model: 'openai/gpt-4o-mini',
 * });
 * ```
 */
export function createOpenAICompatibleProvider(
  llm: LLMConfig,
  options: { apiKey: string | undefined; model: string; client?: OpenAI }
): OpenAICompatibleProvider | undefined {
  if (!options.apiKey) {
    return undefined;
  }

  return new OpenAICompatibleProvider({
    apiKey: options.apiKey,
    model: options.model,
    baseURL: llm.base_url,
    maxTokens: llm.max_tokens,
    temperature: llm.temperature,
    timeout: llm.timeout_ms,
    referer: llm.referer,
    title: llm.title,
    client: options.client,
  });
}
