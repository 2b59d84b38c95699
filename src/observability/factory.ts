/**
 * Tracer Factory
 *
 * Decision tree:
 *   1. observability.enabled === false    → NoopTracer
 *   2. No Langfuse keys (env or config)   → NoopTracer
 *   3. Keys present                       → LangfuseTracer
 *
 * LANGFUSE_PUBLIC_KEY / LANGFUSE_SECRET_KEY / LANGFUSE_BASE_URL take
 * precedence over config.toml. Sampling is applied per answer by
 * `selectTracer`, not here.
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import type { Tracer } from './types.js';
import { createNoopTracer } from './noop-tracer.js';
import { createLangfuseTracer } from './langfuse-tracer.js';
import { shouldRecord } from './sampling.js';

const DEFAULT_LANGFUSE_HOST = 'https://cloud.langfuse.com';

/**
 * Create the session tracer.
 */
export function createTracer(config: Config): Tracer {
  const obs = config.observability;
  if (!obs.enabled) {
    return createNoopTracer();
  }

  const publicKey = getEnv('LANGFUSE_PUBLIC_KEY') || obs.langfuse_public_key;
  const secretKey = getEnv('LANGFUSE_SECRET_KEY') || obs.langfuse_secret_key;
  if (!publicKey || !secretKey) {
    return createNoopTracer();
  }

  return createLangfuseTracer({
    publicKey,
    secretKey,
    baseUrl: getEnv('LANGFUSE_BASE_URL') || obs.langfuse_host || DEFAULT_LANGFUSE_HOST,
  });
}

const UNSAMPLED = createNoopTracer();

/**
 * The tracer to use for one answer: the session tracer when this answer
 * is sampled, a no-op otherwise.
 */
export function selectTracer(tracer: Tracer, sampleRate: number, random?: () => number): Tracer {
  return tracer.isRemote && !shouldRecord(sampleRate, random) ? UNSAMPLED : tracer;
}
