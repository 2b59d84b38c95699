/**
 * Chat Command
 *
 * Interactive multi-turn IT assistant. The transcript lives in memory for
 * the session and a short summary of it is fed into every request.
 *
 *   opsguide chat
 *   opsguide chat --model openai/gpt-4o-mini
 *
 * REPL Commands:
 *   /help      - Show available commands
 *   /clear     - Clear conversation history
 *   /sources   - Show the sources of the last answer
 *   /intent    - Show how the last question was routed
 *   /exit      - Exit the chat
 *   1, 2, 3    - Ask the numbered follow-up suggestion
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { CLIError, describeError } from '../../errors/index.js';
import type { Assistant } from '../../agent/assistant.js';
import { sourcesForFollowups } from '../../agent/session.js';
import {
  buildConversationHistory,
  type ConversationMessage,
  type HistoryOptions,
} from '../../agent/history.js';
import { openAssistant, formatIntent, formatFollowups } from '../utils/assistant.js';

// ============================================================================
// Types
// ============================================================================

interface ChatCommandOptions {
  model?: string;
  /** False with --no-followups */
  followups: boolean;
}

/**
 * Mutable state for one chat session.
 */
export interface ChatState {
  assistant: Assistant;
  /** Full transcript; only a summary of the tail is sent */
  transcript: ConversationMessage[];
  history: HistoryOptions;
  showFollowups: boolean;
}

/**
 * REPL command definition.
 * Handler returns true to continue REPL, false to exit.
 */
interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  handler: (state: ChatState, ctx: CommandContext) => boolean;
}

// ============================================================================
// REPL Commands Registry
// ============================================================================

const EXIT_COMMAND: REPLCommand = {
  name: 'exit',
  aliases: ['quit', 'q'],
  description: 'Exit the chat',
  handler: (_state, ctx) => {
    ctx.log(chalk.dim('Goodbye!'));
    return false;
  },
};

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: (_state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      ctx.log('');
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0
            ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`)
            : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${aliasStr}`);
        ctx.log(`    ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Type a number to ask a follow-up suggestion, or any other text to ask a question.'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Clear conversation history',
    handler: (state, ctx) => {
      state.transcript.length = 0;
      state.assistant.session.followups = [];
      ctx.log(chalk.dim('Conversation cleared.'));
      return true;
    },
  },
  {
    name: 'sources',
    aliases: ['s'],
    description: 'Show the sources of the last answer',
    handler: (state, ctx) => {
      const { lastSourcesMarkdown } = state.assistant.session;
      ctx.log(lastSourcesMarkdown || chalk.dim('No sources for the last answer.'));
      return true;
    },
  },
  {
    name: 'intent',
    aliases: ['i'],
    description: 'Show how the last question was routed',
    handler: (state, ctx) => {
      const intent = state.assistant.session.lastIntent;
      if (intent === null) {
        ctx.log(chalk.dim('No question asked yet.'));
        return true;
      }
      for (const line of formatIntent(intent)) {
        ctx.log(line);
      }
      return true;
    },
  },
  EXIT_COMMAND,
];

// ============================================================================
// Input Parsing
// ============================================================================

/**
 * Parse user input to detect REPL commands.
 * Returns null if it's a regular question.
 *
 * @internal Exported for testing purposes
 */
export function parseREPLCommand(input: string): REPLCommand | null {
  const trimmed = input.trim();

  if (/^(exit|quit)$/i.test(trimmed)) {
    return EXIT_COMMAND;
  }

  if (!trimmed.startsWith('/')) {
    return null;
  }

  const name = trimmed.slice(1).split(/\s+/)[0]?.toLowerCase() ?? '';
  return REPL_COMMANDS.find((c) => c.name === name || c.aliases.includes(name)) ?? null;
}

/**
 * Map a bare number to the matching follow-up suggestion.
 *
 * @internal Exported for testing purposes
 */
export function resolveFollowupSelection(input: string, followups: readonly string[]): string | null {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return followups[Number(trimmed) - 1] ?? null;
}

// ============================================================================
// Question Handling
// ============================================================================

/**
 * Answer one question: stream it, record both turns, then print sources
 * and follow-ups.
 *
 * @internal Exported for testing purposes
 * @returns The full answer text
 */
export async function handleQuestion(
  question: string,
  state: ChatState,
  ctx: CommandContext
): Promise<string> {
  const { assistant } = state;
  const history = buildConversationHistory(state.transcript, state.history);
  ctx.debug(`History: ${history.length} chars`);

  const spinner = ora({ text: 'Thinking...', color: 'cyan' }).start();
  let answer = '';

  try {
    for await (const fragment of assistant.streamAnswerQuery(question, history).fragments) {
      if (!fragment) {
        continue;
      }
      if (spinner.isSpinning) {
        spinner.stop();
      }
      process.stdout.write(fragment);
      answer += fragment;
    }
  } finally {
    if (spinner.isSpinning) {
      spinner.stop();
    }
  }
  process.stdout.write('\n');

  state.transcript.push({ role: 'user', content: question }, { role: 'assistant', content: answer });

  const { session } = assistant;
  if (session.lastSourcesMarkdown) {
    ctx.log(session.lastSourcesMarkdown);
  }

  const intent = session.lastIntent;
  if (state.showFollowups && intent !== null && intent.source !== 'out_of_scope') {
    const followups = await assistant.orchestrator.generateFollowups(question, answer, sourcesForFollowups(session));
    if (followups.length > 0) {
      ctx.log('');
      for (const line of formatFollowups(followups)) {
        ctx.log(line);
      }
      ctx.log(chalk.dim('Type a number to ask one.'));
    }
  }

  return answer;
}

// ============================================================================
// REPL
// ============================================================================

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  ctx.log('');
  ctx.log(chalk.bold('opsguide chat'));
  ctx.log(chalk.dim(`Model: ${state.assistant.session.selectedModel}`));
  if (!state.assistant.hasProvider) {
    ctx.log(chalk.yellow('No completion key configured; answers are disabled.'));
  }
  ctx.log('');
  ctx.log(chalk.dim('Type /help for commands, "exit" to quit'));
  ctx.log('');
}

/**
 * Main REPL loop using readline's line events.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.green('> '),
    });

    const onLine = async (line: string): Promise<void> => {
      const input = line.trim();

      if (!input) {
        rl.prompt();
        return;
      }

      const command = parseREPLCommand(input);
      if (command) {
        if (!command.handler(state, ctx)) {
          rl.close();
          return;
        }
        rl.prompt();
        return;
      }

      const question = resolveFollowupSelection(input, state.assistant.session.followups) ?? input;
      if (question !== input) {
        ctx.log(chalk.dim(`> ${question}`));
      }

      try {
        await handleQuestion(question, state, ctx);
      } catch (error) {
        if (error instanceof CLIError) {
          ctx.error(error.message);
          if (error.hint) {
            ctx.log(chalk.dim(error.hint));
          }
        } else {
          ctx.error(`Failed to process question: ${describeError(error)}`);
        }
      }

      rl.prompt();
    };

    rl.on('line', (line) => {
      void onLine(line);
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', () => {
      resolve();
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive multi-turn IT assistant')
    .option('-m, --model <id>', 'Override the completion model')
    .option('--no-followups', 'Skip follow-up suggestions')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      if (ctx.options.json) {
        throw new CLIError('chat does not support --json', 'Use: opsguide --json ask "<question>"');
      }

      ctx.debug('Starting chat session...');
      const { assistant, tracer, config } = openAssistant(ctx, { model: cmdOptions.model });

      const state: ChatState = {
        assistant,
        transcript: [],
        history: {
          maxMessages: config.pipeline.history_messages,
          maxChars: config.pipeline.history_chars,
        },
        showFollowups: cmdOptions.followups,
      };

      try {
        await runChatREPL(state, ctx);
      } finally {
        await tracer.shutdown().catch((err: unknown) => ctx.debug(`Tracer shutdown error: ${String(err)}`));
      }
    });
}
