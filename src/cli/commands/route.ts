/**
 * Route Command
 *
 * Runs the scope guard, the intent classifier and the source lookup without
 * generating an answer. Useful for checking how a question would be routed.
 *
 *   opsguide route "How do I resize an EBS volume?"
 *   opsguide --json route "Latest Kubernetes CVE"
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { CLIError } from '../../errors/index.js';
import type { Intent } from '../../agent/types.js';
import type { SearchResult } from '../../sources/types.js';
import { buildSourcesMarkdown } from '../../security/sanitize.js';
import { openAssistant, formatConfidence } from '../utils/assistant.js';

interface RouteOutputJSON {
  question: string;
  intent: Intent;
  explanation: string;
  results: readonly SearchResult[];
  contextText: string;
}

export function createRouteCommand(getContext: () => CommandContext): Command {
  return new Command('route')
    .argument('<question...>', 'IT question to route')
    .description('Show which source a question is routed to and what it returns')
    .action(async (words: string[]) => {
      const ctx = getContext();
      const question = words.join(' ').trim();

      if (!question) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: opsguide route "What is Azure AD?"'
        );
      }

      const { assistant, tracer, config } = openAssistant(ctx);

      try {
        const spinner = ctx.options.json ? null : ora({ text: 'Routing...', color: 'cyan' }).start();
        const context = await assistant.routeQuery(question);
        const { intent } = context;
        spinner?.succeed(`Routed to ${intent.route}`);

        if (ctx.options.json) {
          const output: RouteOutputJSON = {
            question,
            intent,
            explanation: context.confidenceExplanation,
            results: context.results,
            contextText: context.contextText,
          };
          console.log(JSON.stringify(output, null, 2));
          return;
        }

        ctx.log(`${chalk.bold('Route:')} ${chalk.cyan(intent.route)}`);
        ctx.log(`${chalk.bold('Method:')} ${intent.method}`);
        ctx.log(`${chalk.bold('Confidence:')} ${formatConfidence(intent.confidence)}`);
        ctx.log(chalk.dim(context.confidenceExplanation));
        ctx.log('');
        ctx.log(chalk.bold('Context:'));
        ctx.log(context.contextText);

        const sources = buildSourcesMarkdown(context.results, {
          enforceAllowlist: config.security.enforce_url_allowlist,
          allowlist: config.security.url_allowlist,
        });
        if (sources) {
          ctx.log(sources);
        }
      } finally {
        await tracer.shutdown().catch((err: unknown) => ctx.debug(`Tracer shutdown error: ${String(err)}`));
      }
    });
}
