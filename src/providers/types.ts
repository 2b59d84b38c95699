/**
 * Completion Provider Types
 *
 * The pipeline talks to one OpenAI-compatible chat-completion endpoint in
 * two modes: blocking (classification, query rewriting, follow-ups,
 * reformat, non-streamed answers) and streaming (answers).
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Per-call options. Unset values fall back to the provider's defaults.
 */
export interface CompletionOptions {
  /** Model override for this call */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Aborts the HTTP request */
  signal?: AbortSignal;
}

export interface CompletionProvider {
  /** Model used when a call does not override it */
  readonly model: string;

  /**
   * Single blocking completion.
   *
   * @returns the trimmed message content
   * @throws on transport, status or empty-response failures
   */
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;

  /**
   * Streaming completion yielding non-empty content deltas.
   * Stopping iteration early closes the underlying HTTP stream.
   */
  stream(messages: ChatMessage[], options?: CompletionOptions): AsyncGenerator<string, void, undefined>;
}
