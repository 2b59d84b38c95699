/**
 * Ask Command
 *
 * One-shot IT question. Runs the full pipeline (scope guard, intent
 * classification, source lookup, guarded prompt) and streams the answer.
 *
 *   opsguide ask "How do I rotate IAM access keys?"
 *   opsguide ask "Compare Azure Firewall and NSGs" --style comparison
 *   opsguide ask "What is a VPC endpoint?" --no-stream --explain
 *   opsguide --json ask "What is a VPN?"
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { CommandContext } from '../types.js';
import { CLIError, ValidationError } from '../../errors/index.js';
import { ReformatStyleSchema, type IntentExplanation, type ReformatStyle } from '../../agent/types.js';
import { sourcesForFollowups } from '../../agent/session.js';
import type { Assistant } from '../../agent/assistant.js';
import type { SearchResult } from '../../sources/types.js';
import { openAssistant, formatIntent, formatFollowups } from '../utils/assistant.js';

// ============================================================================
// Types
// ============================================================================

interface AskCommandOptions {
  /** False with --no-stream */
  stream: boolean;
  model?: string;
  style?: string;
  explain?: boolean;
  /** False with --no-followups */
  followups: boolean;
}

interface AskOutputJSON {
  question: string;
  answer: string;
  sources: SearchResult[];
  intent: IntentExplanation | null;
  followups: string[];
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Validate the --style option.
 *
 * @throws ValidationError for an unknown style
 */
export function parseStyle(style: string | undefined): ReformatStyle | undefined {
  if (style === undefined) {
    return undefined;
  }
  const parsed = ReformatStyleSchema.safeParse(style);
  if (!parsed.success) {
    throw new ValidationError(`Invalid --style value: "${style}"`, [
      `expected one of: ${ReformatStyleSchema.options.join(', ')}`,
    ]);
  }
  return parsed.data;
}

/**
 * Write fragments to stdout as they arrive. The spinner stays up until the
 * first visible fragment.
 */
async function streamToStdout(
  assistant: Assistant,
  question: string,
  spinner: Ora
): Promise<string> {
  const { fragments } = assistant.streamAnswerQuery(question, '');
  let answer = '';

  for await (const fragment of fragments) {
    if (!fragment) {
      continue;
    }
    if (spinner.isSpinning) {
      spinner.stop();
    }
    process.stdout.write(fragment);
    answer += fragment;
  }

  if (spinner.isSpinning) {
    spinner.stop();
  }
  process.stdout.write('\n');
  return answer;
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question...>', 'IT question to answer')
    .description('Ask an IT question, answered from AWS docs, Microsoft Learn or the web')
    .option('--no-stream', 'Wait for the full answer instead of streaming it')
    .option('-m, --model <id>', 'Override the completion model')
    .option('-s, --style <style>', `Reformat the answer (${ReformatStyleSchema.options.join(', ')})`)
    .option('-e, --explain', 'Show how the question was routed')
    .option('--no-followups', 'Skip follow-up suggestions')
    .action(async (words: string[], cmdOptions: AskCommandOptions) => {
      const ctx = getContext();
      const question = words.join(' ').trim();

      if (!question) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: opsguide ask "How do I configure a VPN?"'
        );
      }

      const style = parseStyle(cmdOptions.style);
      ctx.debug(`Question: "${question}"`);
      ctx.debug(`Options: ${JSON.stringify(cmdOptions)}`);

      const { assistant, tracer } = openAssistant(ctx, { model: cmdOptions.model });
      const { session, orchestrator } = assistant;

      try {
        // ─────────────────────────────────────────────────────────────────
        // 1. Answer (streamed only when nothing post-processes the text)
        // ─────────────────────────────────────────────────────────────────
        const streaming = cmdOptions.stream && !ctx.options.json && style === undefined;
        let answer: string;

        if (streaming) {
          const spinner = ora({ text: 'Thinking...', color: 'cyan' }).start();
          answer = await streamToStdout(assistant, question, spinner);
        } else {
          const spinner = ctx.options.json ? null : ora({ text: 'Thinking...', color: 'cyan' }).start();
          const result = await assistant.answerQuery(question, '');
          spinner?.stop();
          answer = result.text;
        }

        if (style !== undefined) {
          ctx.debug(`Reformatting as ${style}`);
          answer = await orchestrator.reformat(answer, style, sourcesForFollowups(session));
        }

        if (!streaming) {
          ctx.log(answer);
        }

        // ─────────────────────────────────────────────────────────────────
        // 2. Follow-ups (not for refusals)
        // ─────────────────────────────────────────────────────────────────
        const intent = session.lastIntent;
        const followups =
          cmdOptions.followups && intent !== null && intent.source !== 'out_of_scope'
            ? await orchestrator.generateFollowups(question, answer, sourcesForFollowups(session))
            : [];

        // ─────────────────────────────────────────────────────────────────
        // 3. Output
        // ─────────────────────────────────────────────────────────────────
        if (ctx.options.json) {
          const output: AskOutputJSON = {
            question,
            answer,
            sources: [...session.lastSources],
            intent,
            followups,
          };
          console.log(JSON.stringify(output, null, 2));
          return;
        }

        if (session.lastSourcesMarkdown) {
          ctx.log(session.lastSourcesMarkdown);
        }

        if (cmdOptions.explain && intent !== null) {
          ctx.log('');
          for (const line of formatIntent(intent)) {
            ctx.log(line);
          }
        }

        if (followups.length > 0) {
          ctx.log('');
          for (const line of formatFollowups(followups)) {
            ctx.log(line);
          }
        }

        if (ctx.options.verbose) {
          ctx.log(chalk.dim(`Model: ${session.selectedModel}`));
        }
      } finally {
        await tracer.shutdown().catch((err: unknown) => ctx.debug(`Tracer shutdown error: ${String(err)}`));
      }
    });
}
