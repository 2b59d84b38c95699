/**
 * Providers Module
 *
 * The chat-completion client used for classification, query rewriting,
 * answers, follow-ups and reformatting.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createCompletionProvider } from './providers/index.js';
 * const provider = createCompletionProvider(config);
 * ```
 */

export type { ChatMessage, ChatRole, CompletionOptions, CompletionProvider } from './types.js';

export {
  createCompletionProvider,
  resolveModel,
  type CompletionProviderOptions,
} from './llm.js';

export {
  OpenAICompatibleProvider,
  createOpenAICompatibleProvider,
  type OpenAICompatibleProviderOptions,
} from './openai-compatible.js';
