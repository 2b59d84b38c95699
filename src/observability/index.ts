/**
 * Observability Module
 *
 * Tracer abstraction for Langfuse v4 (OpenTelemetry-based) observability.
 *
 * @example
 * ```typescript
 * import { createTracer } from '../observability/index.js';
 *
 * const tracer = createTracer(config);
 * const trace = tracer.trace({ name: 'opsguide-answer', input: question });
 * // ... route and answer ...
 * trace.end();
 * await tracer.shutdown();
 * ```
 */

export type {
  Tracer,
  TraceHandle,
  SpanHandle,
  GenerationHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from './types.js';

export { createTracer, selectTracer } from './factory.js';
export { shouldRecord } from './sampling.js';
export { NoopTracer, createNoopTracer } from './noop-tracer.js';
export { LangfuseTracer, createLangfuseTracer, type LangfuseTracerConfig } from './langfuse-tracer.js';
