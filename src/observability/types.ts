/**
 * Observability Types
 *
 * Tracer abstraction for Langfuse v4 (OpenTelemetry-based) observability.
 * Null-object pattern: NoopTracer when not configured or not sampled,
 * LangfuseTracer when keys are present. The orchestrator records one
 * trace per answer without knowing which implementation it holds:
 *
 *   opsguide-answer (trace)
 *     ├── routing            (span: scope, intent, source, result count)
 *     └── answer-generation  (generation: model, messages, answer text)
 *
 * Maps to Langfuse v4 SDK:
 *   tracer.trace()           → startObservation(name, attrs)
 *   traceHandle.span()       → parent.startObservation(name, attrs)
 *   traceHandle.generation() → parent.startObservation(name, attrs, { asType: 'generation' })
 *   handle.update()          → obs.update({ output, metadata, level, statusMessage })
 *   handle.end()             → obs.end()
 *   tracer.flush()           → processor.forceFlush()
 *   tracer.shutdown()        → sdk.shutdown()
 */

// ============================================================================
// Input Options
// ============================================================================

/** Options for creating a new trace (root observation). */
export interface TraceOptions {
  /** Trace name, e.g. 'opsguide-answer' */
  name: string;
  /** User-provided input (the query/question) */
  input?: unknown;
  /** Arbitrary metadata */
  metadata?: Record<string, unknown>;
  /** Groups the answers of one assistant session */
  sessionId?: string;
}

/** Options for creating a span within a trace. */
export interface SpanOptions {
  /** Span name, e.g. 'routing' */
  name: string;
  /** Input data */
  input?: unknown;
  /** Arbitrary metadata */
  metadata?: Record<string, unknown>;
}

/** Options for creating a generation (LLM call) within a trace. */
export interface GenerationOptions {
  /** Generation name (e.g., 'answer-generation') */
  name: string;
  /** Model identifier, e.g. 'openai/gpt-4o-mini' */
  model?: string;
  /** Input messages/prompt */
  input?: unknown;
  /** Arbitrary metadata */
  metadata?: Record<string, unknown>;
}

/** Data to update a handle with before ending. */
export interface UpdateData {
  /** Output data */
  output?: unknown;
  /** Log level; 'ERROR' marks a failed step */
  level?: 'DEFAULT' | 'WARNING' | 'ERROR';
  /** Shown next to the level in the Langfuse UI */
  statusMessage?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Handles (returned by trace/span/generation creation)
// ============================================================================

/**
 * Handle for a span observation.
 * Returned by TraceHandle.span(). Call end() when the span completes.
 */
export interface SpanHandle {
  /** Update the span with output/metadata */
  update(data: UpdateData): SpanHandle;
  /** End the span */
  end(): void;
}

/**
 * Handle for a generation (completion call) observation.
 * Same lifecycle as a span; Langfuse renders it with model details.
 */
export type GenerationHandle = SpanHandle;

/**
 * Handle for a trace (root observation).
 * Returned by Tracer.trace(). Use to create child spans and generations.
 */
export interface TraceHandle {
  /** The trace ID (Langfuse trace ID when remote, undefined for noop) */
  readonly traceId?: string;
  /** Create a child span within this trace */
  span(options: SpanOptions): SpanHandle;
  /** Create a child generation (LLM call) within this trace */
  generation(options: GenerationOptions): GenerationHandle;
  /** Update the trace with output/metadata */
  update(data: UpdateData): TraceHandle;
  /** End the trace */
  end(): void;
}

// ============================================================================
// Core Tracer Interface
// ============================================================================

/**
 * Core tracer interface for observability.
 *
 * Implementations: NoopTracer (zero overhead) or LangfuseTracer.
 */
export interface Tracer {
  /** Open a trace for one answered question */
  trace(options: TraceOptions): TraceHandle;
  /** Flush all pending events to the backend */
  flush(): Promise<void>;
  /** Shut down the tracer (flushes and prevents further events) */
  shutdown(): Promise<void>;
  /** Whether this tracer sends data to a remote service */
  readonly isRemote: boolean;
}
