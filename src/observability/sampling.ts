/**
 * Trace Sampling
 *
 * `observability.sample_rate` is the fraction of answers exported to
 * Langfuse: 1.0 records everything, 0.0 nothing, anything between is a
 * per-answer coin flip.
 */

export function shouldRecord(sampleRate: number, random: () => number = Math.random): boolean {
  if (sampleRate >= 1.0) return true;
  if (sampleRate <= 0.0) return false;
  return random() < sampleRate;
}
