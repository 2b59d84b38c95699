/**
 * Completion Provider Factory
 *
 * Central entry point for creating the session's completion provider from
 * configuration and environment.
 *
 * USAGE:
 * ```typescript
 * import { loadConfig } from '../config/index.js';
 * import { createCompletionProvider } from '../providers/index.js';
 *
 * const provider = createCompletionProvider(loadConfig());
 * if (provider) {
 *   const reply = await provider.complete([{ role: 'user', content: 'Hello!' }]);
 * }
 * ```
 */

import type OpenAI from 'openai';
import type { Config } from '../config/schema.js';
import { getApiKey, getEnv } from '../config/env.js';
import { createOpenAICompatibleProvider } from './openai-compatible.js';
import type { CompletionProvider } from './types.js';

export interface CompletionProviderOptions {
  /** Model override (CLI --model); wins over env and config */
  model?: string;
  /** Explicit key; defaults to OPENROUTER_API_KEY */
  apiKey?: string;
  /** Prebuilt SDK client (tests) */
  client?: OpenAI;
}

/**
 * Model used for answers: explicit override, then OPENROUTER_MODEL, then
 * the configured default.
 */
export function resolveModel(config: Config, override?: string): string {
  return override || getEnv('OPENROUTER_MODEL')?.trim() || config.default_model;
}

/**
 * Create the completion provider, or undefined when no API key is set.
 * Callers treat undefined as "answers cannot be generated".
 */
export function createCompletionProvider(
  config: Config,
  options: CompletionProviderOptions = {}
): CompletionProvider | undefined {
  return createOpenAICompatibleProvider(config.llm, {
    apiKey: options.apiKey ?? getApiKey('openrouter'),
    model: resolveModel(config, options.model),
    client: options.client,
  });
}
