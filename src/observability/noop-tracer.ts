/**
 * NoopTracer: null-object implementation.
 *
 * Used when observability is disabled, unconfigured, or the interaction
 * was not sampled. Every call returns the same frozen handles.
 */

import type { Tracer, TraceHandle, SpanHandle } from './types.js';

const NOOP_SPAN: SpanHandle = Object.freeze({
  update: (): SpanHandle => NOOP_SPAN,
  end: (): void => {},
});

const NOOP_TRACE: TraceHandle = Object.freeze({
  span: (): SpanHandle => NOOP_SPAN,
  generation: (): SpanHandle => NOOP_SPAN,
  update: (): TraceHandle => NOOP_TRACE,
  end: (): void => {},
});

export class NoopTracer implements Tracer {
  readonly isRemote = false;

  trace(): TraceHandle {
    return NOOP_TRACE;
  }

  async flush(): Promise<void> {}

  async shutdown(): Promise<void> {}
}

export function createNoopTracer(): Tracer {
  return new NoopTracer();
}
