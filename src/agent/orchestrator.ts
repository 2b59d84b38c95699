/**
 * Response Orchestrator
 *
 * Turns a routed question into an answer. One instance per session; the
 * router, provider and tracer are shared across its requests.
 *
 * streamAnswer() sequence:
 *   ''                 heartbeat, before any network call
 *   ⚠️ message         no completion provider configured, then stop
 *   route              scope → classify → dispatch, under routing_timeout_ms
 *   refusal            out_of_scope, then stop (no completion call)
 *   deltas             streamed completion
 *   ❌ fragment         streaming failed; earlier deltas stand
 *
 * Each answer records one trace:
 *
 *   opsguide-answer
 *     ├── routing            (route, method, confidence, result count)
 *     └── answer-generation  (model, messages, answer text)
 */

import type { CompletionProvider, ChatMessage, CompletionOptions } from '../providers/types.js';
import { detectPromptInjection } from '../security/injection.js';
import { buildSourcesMarkdown } from '../security/sanitize.js';
import type { Tracer, TraceHandle } from '../observability/types.js';
import { createNoopTracer } from '../observability/noop-tracer.js';
import { selectTracer } from '../observability/factory.js';
import { withTimeout, isTimeoutError } from '../utils/timeout.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError } from '../errors/index.js';
import { buildEnhancedContext, type SourceRouter } from './router.js';
import {
  buildAnswerMessages,
  buildFollowupMessages,
  buildReformatMessages,
  parseFollowups,
} from './prompts.js';
import { recordRouting, type SessionContext } from './session.js';
import type { AnswerOptions, AnswerResult, EnhancedContext, Intent, ReformatStyle } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const MISSING_PROVIDER_MESSAGE =
  '⚠️ OpenRouter API key not configured. Please add your API key to continue.';

const FOLLOWUP_MAX_TOKENS = 150;
const FOLLOWUP_TEMPERATURE = 0.5;
const REFORMAT_TEMPERATURE = 0.3;

// ============================================================================
// TYPES
// ============================================================================

export interface OrchestratorSettings {
  /** Budget for scope check, classification and source fetch */
  routingTimeoutMs: number;
  maxTokens: number;
  temperature: number;
  enforceUrlAllowlist: boolean;
  urlAllowlist: readonly string[];
  /** Fraction of answers traced when the tracer is remote */
  sampleRate: number;
}

export interface ResponseOrchestratorOptions {
  router: SourceRouter;
  session: SessionContext;
  settings: OrchestratorSettings;
  /** Undefined when no API key is configured */
  provider?: CompletionProvider;
  tracer?: Tracer;
  logger?: Logger;
  /** Sampling source (tests) */
  random?: () => number;
}

// ============================================================================
// RESPONSE ORCHESTRATOR
// ============================================================================

export class ResponseOrchestrator {
  private readonly router: SourceRouter;
  private readonly session: SessionContext;
  private readonly settings: OrchestratorSettings;
  private readonly provider?: CompletionProvider;
  private readonly tracer: Tracer;
  private readonly logger: Logger;
  private readonly random?: () => number;

  constructor(options: ResponseOrchestratorOptions) {
    this.router = options.router;
    this.session = options.session;
    this.settings = options.settings;
    this.provider = options.provider;
    this.tracer = options.tracer ?? createNoopTracer();
    this.logger = options.logger ?? silentLogger;
    this.random = options.random;
  }

  /**
   * Stream an answer as text fragments. Not restartable; call again to
   * regenerate. Stopping iteration early closes the completion stream.
   */
  async *streamAnswer(
    query: string,
    history: string,
    options: AnswerOptions = {}
  ): AsyncGenerator<string, void, undefined> {
    const { signal } = options;
    yield '';

    const provider = this.provider;
    if (!provider) {
      yield MISSING_PROVIDER_MESSAGE;
      return;
    }

    const trace = this.openTrace(query);
    try {
      let context: EnhancedContext;
      try {
        context = await this.routeWithinBudget(query, trace, signal);
      } catch (error) {
        if (signal?.aborted) return;
        trace.update({ level: 'ERROR', statusMessage: describeError(error) });
        yield `❌ Error generating response: ${describeError(error)}`;
        return;
      }

      if (context.intent.route === 'out_of_scope') {
        trace.update({ output: context.contextText });
        yield context.contextText;
        return;
      }

      const messages = this.buildMessages(query, history, context);
      const generation = trace.generation({
        name: 'answer-generation',
        model: this.session.selectedModel,
        input: messages,
      });

      let text = '';
      try {
        // for-await closes the provider stream when the consumer stops early
        for await (const delta of provider.stream(messages, this.answerOptions(signal))) {
          text += delta;
          yield delta;
        }
        generation.update({ output: text });
        trace.update({ output: text });
      } catch (error) {
        generation.update({ output: text, level: 'ERROR', statusMessage: describeError(error) });
        if (signal?.aborted) return;
        this.logger.warn(`Answer stream failed: ${describeError(error)}`);
        yield `\n\n❌ Streaming error: ${describeError(error)}`;
      } finally {
        generation.end();
      }
    } finally {
      trace.end();
    }
  }

  /**
   * Blocking answer with the same routing and messages as streamAnswer.
   * Never rejects; failures come back as ❌ text.
   */
  async answer(query: string, history: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const { signal } = options;
    const provider = this.provider;
    if (!provider) {
      return { text: MISSING_PROVIDER_MESSAGE, sourcesMarkdown: '' };
    }

    const trace = this.openTrace(query);
    try {
      const context = await this.routeWithinBudget(query, trace, signal);
      if (context.intent.route === 'out_of_scope') {
        trace.update({ output: context.contextText });
        return { text: context.contextText, sourcesMarkdown: '' };
      }

      const messages = this.buildMessages(query, history, context);
      const generation = trace.generation({
        name: 'answer-generation',
        model: this.session.selectedModel,
        input: messages,
      });
      try {
        const text = await provider.complete(messages, this.answerOptions(signal));
        generation.update({ output: text });
        trace.update({ output: text });
        return { text, sourcesMarkdown: this.session.lastSourcesMarkdown };
      } finally {
        generation.end();
      }
    } catch (error) {
      trace.update({ level: 'ERROR', statusMessage: describeError(error) });
      return { text: `❌ Error generating response: ${describeError(error)}`, sourcesMarkdown: '' };
    } finally {
      trace.end();
    }
  }

  /**
   * Up to three follow-up questions for an answer, also stored on the
   * session. Any failure yields [].
   */
  async generateFollowups(
    query: string,
    answer: string,
    contextText: string,
    options: AnswerOptions = {}
  ): Promise<string[]> {
    if (!this.provider) {
      return [];
    }
    try {
      const reply = await this.provider.complete(buildFollowupMessages(query, answer, contextText), {
        model: this.session.selectedModel,
        maxTokens: FOLLOWUP_MAX_TOKENS,
        temperature: FOLLOWUP_TEMPERATURE,
        signal: options.signal,
      });
      const followups = parseFollowups(reply);
      this.session.followups = Object.freeze([...followups]);
      return followups;
    } catch (error) {
      this.logger.debug?.(`Follow-up suggestions unavailable: ${describeError(error)}`);
      return [];
    }
  }

  /**
   * Re-render an answer in another structure. Any failure returns the
   * answer unchanged.
   */
  async reformat(
    answer: string,
    style: ReformatStyle,
    contextText: string,
    options: AnswerOptions = {}
  ): Promise<string> {
    if (!this.provider) {
      return answer;
    }
    try {
      return await this.provider.complete(buildReformatMessages(answer, style, contextText), {
        model: this.session.selectedModel,
        maxTokens: this.settings.maxTokens,
        temperature: REFORMAT_TEMPERATURE,
        signal: options.signal,
      });
    } catch (error) {
      this.logger.debug?.(`Reformat failed, keeping original answer: ${describeError(error)}`);
      return answer;
    }
  }

  /**
   * Route the question and record the outcome on the session. A routing
   * timeout degrades to an empty general-knowledge context.
   */
  private async routeWithinBudget(query: string, trace: TraceHandle, signal?: AbortSignal): Promise<EnhancedContext> {
    const { routingTimeoutMs } = this.settings;
    const span = trace.span({ name: 'routing', input: query });

    let context: EnhancedContext;
    try {
      context = await withTimeout((routeSignal) => this.router.route(query, { signal: routeSignal }), {
        timeoutMs: routingTimeoutMs,
        label: 'Routing',
        signal,
      });
    } catch (error) {
      if (!isTimeoutError(error)) {
        span.update({ level: 'ERROR', statusMessage: describeError(error) }).end();
        throw error;
      }
      this.logger.warn(`Routing exceeded ${routingTimeoutMs}ms; answering without source context`);
      const minimal: Intent = Object.freeze({
        route: 'general_knowledge',
        confidence: 0,
        method: 'timeout_minimal',
        reasoning: `Routing exceeded ${routingTimeoutMs}ms`,
      });
      context = buildEnhancedContext(minimal, [], '');
    }

    const sourcesMarkdown = buildSourcesMarkdown(context.results, {
      enforceAllowlist: this.settings.enforceUrlAllowlist,
      allowlist: this.settings.urlAllowlist,
    });
    recordRouting(this.session, context, sourcesMarkdown);

    span
      .update({
        output: {
          route: context.intent.route,
          method: context.intent.method,
          confidence: context.intent.confidence,
          resultCount: context.results.length,
        },
        level: context.intent.method === 'timeout_minimal' ? 'WARNING' : 'DEFAULT',
      })
      .end();
    return context;
  }

  private openTrace(query: string): TraceHandle {
    return selectTracer(this.tracer, this.settings.sampleRate, this.random).trace({
      name: 'opsguide-answer',
      input: query,
      metadata: { model: this.session.selectedModel },
      sessionId: this.session.sessionId,
    });
  }

  private buildMessages(query: string, history: string, context: EnhancedContext): ChatMessage[] {
    return buildAnswerMessages({
      query,
      history,
      contextText: context.contextText,
      injection: detectPromptInjection(query),
    });
  }

  private answerOptions(signal?: AbortSignal): CompletionOptions {
    return {
      model: this.session.selectedModel,
      maxTokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      signal,
    };
  }
}

export function createResponseOrchestrator(options: ResponseOrchestratorOptions): ResponseOrchestrator {
  return new ResponseOrchestrator(options);
}
