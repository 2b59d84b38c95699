/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_OUT_OF_SCOPE_MESSAGE =
  'Sorry, I’m focused on IT infrastructure, cybersecurity, cloud, DevOps, and IT careers. ' +
  'Please rephrase your question within this scope.';

/**
 * Trusted documentation domains for source links.
 */
export const DEFAULT_URL_ALLOWLIST = [
  'learn.microsoft.com',
  'microsoft.com',
  'docs.aws.amazon.com',
  'aws.amazon.com',
  'azure.microsoft.com',
  'cloud.google.com',
  'kubernetes.io',
  'iana.org',
  'developer.mozilla.org',
];

export const DEFAULT_CONFIG: Config = {
  default_model: 'openai/gpt-4o-mini',

  llm: {
    base_url: 'https://openrouter.ai/api/v1',
    max_tokens: 4000,
    temperature: 0.7,
    timeout_ms: 60000,
    referer: 'https://github.com/opsguide/opsguide',
    title: 'opsguide',
  },

  scope: {
    enforce: true,
    allow_career_topics: true,
    llm_check: false,
    out_of_scope_message: DEFAULT_OUT_OF_SCOPE_MESSAGE,
  },

  sources: {
    timeout_ms: 6000,
    aws: {
      endpoint: 'https://knowledge-mcp.global.api.aws',
      max_results: 3,
    },
    microsoft: {
      endpoint: 'https://learn.microsoft.com/api/mcp',
      max_results: 3,
      fallback_search_url: 'https://learn.microsoft.com/api/search',
    },
    exa: {
      endpoint: 'https://api.exa.ai/search',
      max_results: 3,
      start_date: '2024-01-01',
      start_days: 0,
    },
  },

  pipeline: {
    routing_timeout_ms: 8000,
    history_messages: 6,
    history_chars: 200,
  },

  security: {
    enforce_url_allowlist: false,
    url_allowlist: DEFAULT_URL_ALLOWLIST,
  },

  observability: {
    enabled: true,
    sample_rate: 1.0,
    langfuse_host: 'https://cloud.langfuse.com',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.opsguide/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# opsguide configuration
# Location: ~/.opsguide/config.toml
# API keys live in the environment (OPENROUTER_API_KEY, EXA_API_KEY), never here.

default_model = "${DEFAULT_CONFIG.default_model}"

# Completion endpoint (any OpenAI-compatible API)
[llm]
base_url = "${DEFAULT_CONFIG.llm.base_url}"
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
temperature = ${DEFAULT_CONFIG.llm.temperature}
timeout_ms = ${DEFAULT_CONFIG.llm.timeout_ms}
referer = "${DEFAULT_CONFIG.llm.referer}"
title = "${DEFAULT_CONFIG.llm.title}"

# Topic scope
# llm_check asks the model about questions that mix IT and non-IT terms
[scope]
enforce = ${DEFAULT_CONFIG.scope.enforce}
allow_career_topics = ${DEFAULT_CONFIG.scope.allow_career_topics}
llm_check = ${DEFAULT_CONFIG.scope.llm_check}
# llm_check_model = "openai/gpt-4o-mini"
# out_of_scope_message = "..."

# Knowledge sources
[sources]
timeout_ms = ${DEFAULT_CONFIG.sources.timeout_ms}

[sources.aws]
endpoint = "${DEFAULT_CONFIG.sources.aws.endpoint}"
max_results = ${DEFAULT_CONFIG.sources.aws.max_results}
# fallback_search_url = "https://..."

[sources.microsoft]
endpoint = "${DEFAULT_CONFIG.sources.microsoft.endpoint}"
max_results = ${DEFAULT_CONFIG.sources.microsoft.max_results}
fallback_search_url = "${DEFAULT_CONFIG.sources.microsoft.fallback_search_url ?? ''}"

[sources.exa]
endpoint = "${DEFAULT_CONFIG.sources.exa.endpoint}"
max_results = ${DEFAULT_CONFIG.sources.exa.max_results}
start_date = "${DEFAULT_CONFIG.sources.exa.start_date}"
start_days = ${DEFAULT_CONFIG.sources.exa.start_days}  # > 0 overrides start_date

# Request pipeline
[pipeline]
routing_timeout_ms = ${DEFAULT_CONFIG.pipeline.routing_timeout_ms}
history_messages = ${DEFAULT_CONFIG.pipeline.history_messages}
history_chars = ${DEFAULT_CONFIG.pipeline.history_chars}

# Source links
[security]
enforce_url_allowlist = ${DEFAULT_CONFIG.security.enforce_url_allowlist}
url_allowlist = [${DEFAULT_CONFIG.security.url_allowlist.map((d) => `"${d}"`).join(', ')}]

# Langfuse tracing is opt-in (set LANGFUSE_PUBLIC_KEY / LANGFUSE_SECRET_KEY)
[observability]
enabled = ${DEFAULT_CONFIG.observability.enabled}
sample_rate = ${DEFAULT_CONFIG.observability.sample_rate}
langfuse_host = "${DEFAULT_CONFIG.observability.langfuse_host ?? ''}"
`;
