/**
 * Assistant
 *
 * Wires one session: completion provider, scope guard, intent classifier,
 * the three source clients, router and orchestrator. Everything is built
 * once and reused by every question in the session.
 *
 * @example
 * ```typescript
 * const assistant = createAssistant(loadConfig(), { logger: ctx });
 *
 * const { text, sourcesMarkdown } = await assistant.answerQuery('What is a VPN?', '');
 *
 * const { fragments } = assistant.streamAnswerQuery('What is a VPN?', '');
 * for await (const fragment of fragments) process.stdout.write(fragment);
 * console.log(assistant.session.lastSourcesMarkdown);
 * ```
 */

import type { Config } from '../config/schema.js';
import { getApiKey } from '../config/env.js';
import type { CompletionProvider } from '../providers/types.js';
import { createCompletionProvider, resolveModel } from '../providers/llm.js';
import { ScopeGuard, createLlmScopeChecker, type ScopeLexicons } from '../security/scope-guard.js';
import { AwsDocsClient } from '../sources/aws-docs.js';
import { MicrosoftLearnClient } from '../sources/microsoft-learn.js';
import { ExaSearchClient } from '../sources/web-search.js';
import type { SearchDomainTable } from '../sources/domain-selector.js';
import type { FetchFn } from '../sources/types.js';
import type { Tracer } from '../observability/types.js';
import { createNoopTracer } from '../observability/noop-tracer.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { IntentClassifier } from './intent-classifier.js';
import { SourceRouter, type SourceTable } from './router.js';
import { ResponseOrchestrator } from './orchestrator.js';
import { createSessionContext, type SessionContext } from './session.js';
import type { AnswerOptions, AnswerResult, EnhancedContext, StreamAnswerResult } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AssistantDependencies {
  /** Answer model override (CLI --model) */
  model?: string;
  /** Explicit provider; null disables answers. Built from config and env when omitted */
  provider?: CompletionProvider | null;
  /** Exa key; defaults to EXA_API_KEY */
  exaApiKey?: string;
  fetchFn?: FetchFn;
  tracer?: Tracer;
  logger?: Logger;
  /** Displayable source failures */
  onError?: (message: string) => void;
  lexicons?: ScopeLexicons;
  domainTable?: SearchDomainTable;
  /** Clock for the web-search recency window */
  now?: () => Date;
  /** Sampling source */
  random?: () => number;
}

export interface Assistant {
  readonly session: SessionContext;
  readonly router: SourceRouter;
  readonly orchestrator: ResponseOrchestrator;
  /** Whether answers can be generated */
  readonly hasProvider: boolean;
  answerQuery(query: string, history: string, options?: AnswerOptions): Promise<AnswerResult>;
  streamAnswerQuery(query: string, history: string, options?: AnswerOptions): StreamAnswerResult;
  /** Scope check, classification and source fetch only */
  routeQuery(query: string, options?: AnswerOptions): Promise<EnhancedContext>;
}

// ============================================================================
// FACTORY
// ============================================================================

function buildSources(
  config: Config,
  provider: CompletionProvider | undefined,
  deps: AssistantDependencies,
  logger: Logger
): SourceTable {
  const common = { timeoutMs: config.sources.timeout_ms, fetchFn: deps.fetchFn, logger };
  return {
    aws_docs: new AwsDocsClient(config.sources.aws, common),
    microsoft_learn: new MicrosoftLearnClient(config.sources.microsoft, common),
    web_search: new ExaSearchClient(config.sources.exa, {
      ...common,
      apiKey: deps.exaApiKey ?? getApiKey('exa'),
      provider,
      model: provider?.model,
      table: deps.domainTable,
      now: deps.now,
    }),
  };
}

export function createAssistant(config: Config, deps: AssistantDependencies = {}): Assistant {
  const logger = deps.logger ?? silentLogger;
  const provider =
    deps.provider === null
      ? undefined
      : (deps.provider ?? createCompletionProvider(config, { model: deps.model }));
  const session = createSessionContext(provider?.model ?? resolveModel(config, deps.model));

  const scopeGuard = new ScopeGuard({
    policy: config.scope,
    lexicons: deps.lexicons,
    llmCheck:
      config.scope.llm_check && provider
        ? createLlmScopeChecker(provider, config.scope.llm_check_model)
        : undefined,
    logger,
  });

  const router = new SourceRouter({
    classifier: new IntentClassifier({ scopeGuard, provider, logger }),
    sources: buildSources(config, provider, deps, logger),
    outOfScopeMessage: config.scope.out_of_scope_message,
    onError: deps.onError,
    logger,
  });

  const orchestrator = new ResponseOrchestrator({
    router,
    session,
    provider,
    tracer: deps.tracer ?? createNoopTracer(),
    logger,
    random: deps.random,
    settings: {
      routingTimeoutMs: config.pipeline.routing_timeout_ms,
      maxTokens: config.llm.max_tokens,
      temperature: config.llm.temperature,
      enforceUrlAllowlist: config.security.enforce_url_allowlist,
      urlAllowlist: config.security.url_allowlist,
      sampleRate: config.observability.sample_rate,
    },
  });

  return {
    session,
    router,
    orchestrator,
    hasProvider: provider !== undefined,
    answerQuery: (query, history, options) => orchestrator.answer(query, history, options),
    streamAnswerQuery: (query, history, options) => ({
      fragments: orchestrator.streamAnswer(query, history, options),
      sourcesMarkdown: '',
    }),
    routeQuery: (query, options = {}) => router.route(query, { signal: options.signal }),
  };
}
