/**
 * Environment Variable Handler
 *
 * Loads and provides access to API keys and model overrides.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema. Nothing is required at load time; each key
 * is checked where it is used, so `route` works without a completion key.
 */
export const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().optional(),
  EXA_API_KEY: z.string().optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_BASE_URL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Services whose keys come from the environment */
export type KeyedService = 'openrouter' | 'exa';

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    OPENROUTER_API_KEY: process.env.OPENROUTER_API_KEY,
    OPENROUTER_MODEL: process.env.OPENROUTER_MODEL,
    EXA_API_KEY: process.env.EXA_API_KEY,
    LANGFUSE_PUBLIC_KEY: process.env.LANGFUSE_PUBLIC_KEY,
    LANGFUSE_SECRET_KEY: process.env.LANGFUSE_SECRET_KEY,
    LANGFUSE_BASE_URL: process.env.LANGFUSE_BASE_URL,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Check if an API key is configured (non-empty) without exposing it.
 */
export function hasApiKey(service: KeyedService): boolean {
  const env = loadEnv();
  switch (service) {
    case 'openrouter':
      return Boolean(env.OPENROUTER_API_KEY?.trim());
    case 'exa':
      return Boolean(env.EXA_API_KEY?.trim());
  }
}

/**
 * Get a trimmed API key, or undefined when unset or blank.
 */
export function getApiKey(service: KeyedService): string | undefined {
  const env = loadEnv();
  const raw = service === 'openrouter' ? env.OPENROUTER_API_KEY : env.EXA_API_KEY;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required API key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<KeyedService, string> = {
  openrouter: `
To answer questions, opsguide needs an OpenAI-compatible completion endpoint
(OpenRouter by default):

1. Get a key from https://openrouter.ai/keys
2. Set the environment variable (or add it to a .env file):

   export OPENROUTER_API_KEY="your-key"

3. Optionally pick a model:

   export OPENROUTER_MODEL="openai/gpt-4o-mini"
`.trim(),

  exa: `
Web search results come from Exa:

1. Get a key from https://dashboard.exa.ai/
2. Set the environment variable (or add it to a .env file):

   export EXA_API_KEY="your-key"

Without it, web-search questions are answered from general knowledge.
`.trim(),
};
