/**
 * LangfuseTracer: Langfuse v4 (OpenTelemetry-based) implementation.
 *
 * Starts an OpenTelemetry NodeSDK whose only span processor exports to
 * Langfuse, then maps the Tracer interface onto the handle-based
 * startObservation() API from @langfuse/tracing:
 *
 *   trace()       → startObservation(name, attrs)           (root)
 *   span()        → root.startObservation(name, attrs)
 *   generation()  → root.startObservation(name, attrs, { asType: 'generation' })
 *   flush()       → processor.forceFlush()
 *   shutdown()    → sdk.shutdown()
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { LangfuseSpanProcessor } from '@langfuse/otel';
import { startObservation } from '@langfuse/tracing';
import type {
  Tracer,
  TraceHandle,
  SpanHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from './types.js';

/** Configuration required to create a LangfuseTracer. */
export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

type Observation = ReturnType<typeof startObservation>;

interface ObservationUpdate {
  output?: unknown;
  metadata?: Record<string, unknown>;
  level?: UpdateData['level'];
  statusMessage?: string;
}

function toAttributes(data: UpdateData): ObservationUpdate {
  return {
    output: data.output,
    metadata: data.metadata,
    ...(data.level && { level: data.level }),
    ...(data.statusMessage && { statusMessage: data.statusMessage }),
  };
}

/**
 * Spans and generations share one wrapper; only creation differs.
 */
function wrapObservation(obs: Observation): SpanHandle {
  const handle: SpanHandle = {
    update(data: UpdateData): SpanHandle {
      obs.update(toAttributes(data));
      return handle;
    },
    end(): void {
      obs.end();
    },
  };
  return handle;
}

function wrapTrace(root: Observation): TraceHandle {
  const handle: TraceHandle = {
    traceId: root.traceId,
    span(options: SpanOptions): SpanHandle {
      return wrapObservation(
        root.startObservation(options.name, { input: options.input, metadata: options.metadata })
      );
    },
    generation(options: GenerationOptions): SpanHandle {
      return wrapObservation(
        root.startObservation(
          options.name,
          { model: options.model, input: options.input, metadata: options.metadata },
          { asType: 'generation' }
        )
      );
    },
    update(data: UpdateData): TraceHandle {
      root.update(toAttributes(data));
      return handle;
    },
    end(): void {
      root.end();
    },
  };
  return handle;
}

export class LangfuseTracer implements Tracer {
  readonly isRemote = true;

  private readonly processor: LangfuseSpanProcessor;
  private readonly sdk: NodeSDK;

  constructor(config: LangfuseTracerConfig) {
    this.processor = new LangfuseSpanProcessor({
      publicKey: config.publicKey,
      secretKey: config.secretKey,
      baseUrl: config.baseUrl,
    });
    this.sdk = new NodeSDK({ spanProcessors: [this.processor] });
    this.sdk.start();
  }

  trace(options: TraceOptions): TraceHandle {
    const root = startObservation(options.name, {
      input: options.input,
      metadata: options.metadata,
    });

    // Session is a trace-level attribute in Langfuse v4
    if (options.sessionId) {
      root.updateTrace({ sessionId: options.sessionId });
    }

    return wrapTrace(root);
  }

  async flush(): Promise<void> {
    await this.processor.forceFlush();
  }

  async shutdown(): Promise<void> {
    await this.sdk.shutdown();
  }
}

/**
 * Create a Langfuse-backed tracer. Shut it down before the process exits
 * so buffered spans are exported.
 */
export function createLangfuseTracer(config: LangfuseTracerConfig): Tracer {
  return new LangfuseTracer(config);
}
