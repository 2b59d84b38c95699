/**
 * Shared command plumbing: building the session assistant and rendering
 * intents, sources and follow-ups.
 */

import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { createAssistant, type Assistant, type AssistantDependencies } from '../../agent/assistant.js';
import type { IntentExplanation } from '../../agent/types.js';
import { createTracer } from '../../observability/factory.js';
import type { Tracer } from '../../observability/types.js';

export interface AssistantSession {
  assistant: Assistant;
  tracer: Tracer;
  config: Config;
}

/**
 * Build the assistant for one command run. The caller shuts the tracer
 * down when the command finishes.
 */
export function openAssistant(
  ctx: CommandContext,
  deps: Pick<AssistantDependencies, 'model'> = {}
): AssistantSession {
  const config = loadConfig();
  const tracer = createTracer(config);
  ctx.debug(`Tracing: ${tracer.isRemote ? 'langfuse' : 'off'}`);

  const assistant = createAssistant(config, {
    model: deps.model,
    tracer,
    logger: ctx,
  });
  ctx.debug(`Model: ${assistant.session.selectedModel}`);

  return { assistant, tracer, config };
}

export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(1)}%`;
}

/**
 * Two-line intent summary:
 *
 *   Route: aws_docs (pattern_fallback, 70.0%)
 *   AWS-related query detected
 */
export function formatIntent(intent: IntentExplanation): string[] {
  return [
    `${chalk.bold('Route:')} ${chalk.cyan(intent.source)} ${chalk.dim(`(${intent.method}, ${formatConfidence(intent.confidence)})`)}`,
    chalk.dim(intent.reasoning),
  ];
}

export function formatFollowups(followups: readonly string[]): string[] {
  if (followups.length === 0) {
    return [];
  }
  return [chalk.bold('💡 Follow-up suggestions:'), ...followups.map((text, i) => `  ${chalk.cyan(`${i + 1}.`)} ${text}`)];
}
