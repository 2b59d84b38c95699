/**
 * Configuration Schema
 *
 * Defines the shape of ~/.opsguide/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Completion endpoint settings (OpenRouter or any OpenAI-compatible API).
 * The API key itself always comes from the environment.
 */
export const LLMConfigSchema = z.object({
  base_url: z.string().url().describe('OpenAI-compatible API base URL'),
  max_tokens: z.number().int().min(1).max(32000).describe('Max tokens for answers'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature for answers'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Request timeout for completion calls'),
  referer: z.string().describe('HTTP-Referer routing header'),
  title: z.string().describe('X-Title routing header'),
});

/**
 * Topic-scope policy
 */
export const ScopeConfigSchema = z.object({
  enforce: z.boolean().describe('Refuse questions outside IT topics'),
  allow_career_topics: z.boolean().describe('Treat IT career questions as in scope'),
  llm_check: z.boolean().describe('Ask the model about ambiguous questions'),
  llm_check_model: z.string().optional().describe('Model override for the scope check'),
  out_of_scope_message: z.string().min(1).describe('Refusal shown for out-of-scope questions'),
});

/**
 * Tool-protocol documentation source
 */
export const ToolSourceConfigSchema = z.object({
  endpoint: z.string().url(),
  max_results: z.number().int().min(1).max(20),
  fallback_search_url: z.string().url().optional(),
});

/**
 * Web search source
 */
export const WebSearchConfigSchema = z.object({
  endpoint: z.string().url(),
  max_results: z.number().int().min(1).max(20),
  start_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
    .describe('Absolute recency floor'),
  start_days: z
    .number()
    .int()
    .min(0)
    .describe('Rolling recency window in days (0 = use start_date)'),
});

export const SourcesConfigSchema = z.object({
  timeout_ms: z.number().int().min(500).max(120000).describe('Per-call network timeout'),
  aws: ToolSourceConfigSchema,
  microsoft: ToolSourceConfigSchema,
  exa: WebSearchConfigSchema,
});

/**
 * Request pipeline
 */
export const PipelineConfigSchema = z.object({
  routing_timeout_ms: z
    .number()
    .int()
    .min(500)
    .max(120000)
    .describe('Budget for scope check + classification + source fetch'),
  history_messages: z.number().int().min(0).max(50),
  history_chars: z.number().int().min(20).max(4000),
});

export const SecurityConfigSchema = z.object({
  enforce_url_allowlist: z.boolean().describe('Drop source links outside the allow-list'),
  url_allowlist: z.array(z.string()),
});

export const ObservabilityConfigSchema = z.object({
  enabled: z.boolean(),
  sample_rate: z.number().min(0).max(1),
  langfuse_host: z.string().url().optional(),
  langfuse_public_key: z.string().optional(),
  langfuse_secret_key: z.string().optional(),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  default_model: z.string().min(1).describe('Default model identifier'),
  llm: LLMConfigSchema,
  scope: ScopeConfigSchema,
  sources: SourcesConfigSchema,
  pipeline: PipelineConfigSchema,
  security: SecurityConfigSchema,
  observability: ObservabilityConfigSchema,
});

/**
 * Partial schema for user config files: any subset may be present.
 */
export const PartialConfigSchema = z.object({
  default_model: z.string().min(1).optional(),
  llm: LLMConfigSchema.partial().optional(),
  scope: ScopeConfigSchema.partial().optional(),
  sources: z
    .object({
      timeout_ms: SourcesConfigSchema.shape.timeout_ms.optional(),
      aws: ToolSourceConfigSchema.partial().optional(),
      microsoft: ToolSourceConfigSchema.partial().optional(),
      exa: WebSearchConfigSchema.partial().optional(),
    })
    .optional(),
  pipeline: PipelineConfigSchema.partial().optional(),
  security: SecurityConfigSchema.partial().optional(),
  observability: ObservabilityConfigSchema.partial().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
export type ScopeConfig = z.infer<typeof ScopeConfigSchema>;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;
export type ToolSourceConfig = z.infer<typeof ToolSourceConfigSchema>;
export type WebSearchConfig = z.infer<typeof WebSearchConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
