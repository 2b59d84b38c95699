/**
 * Tests for ask command
 *
 * Tests cover:
 * - Command structure and options
 * - Question and --style validation
 * - Streaming and blocking output
 * - Sources, intent and follow-up blocks
 * - JSON output format
 * - Refusals skip follow-ups
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { createAskCommand, parseStyle } from '../ask.js';
import type { CommandContext } from '../../types.js';
import { openAssistant } from '../../utils/assistant.js';
import { createAssistant } from '../../../agent/assistant.js';
import type { ChatMessage } from '../../../providers/types.js';
import { DEFAULT_CONFIG, DEFAULT_OUT_OF_SCOPE_MESSAGE } from '../../../config/defaults.js';
import { createNoopTracer } from '../../../observability/noop-tracer.js';
import {
  createFakeProvider,
  createFetchMock,
  jsonResponse,
  resetAll,
  type FakeProvider,
  type FetchMock,
} from '../../../test-utils/index.js';

vi.mock('../../utils/assistant.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../utils/assistant.js')>();
  return { ...actual, openAssistant: vi.fn() };
});

const VPN_RESULT = {
  title: 'What is a VPN?',
  text: 'A virtual private network encrypts traffic.',
  url: 'https://vpn.example.org/what-is',
};

const SOURCES_MARKDOWN =
  '\n\n**📚 Sources:**\n1. [What is a VPN?](https://vpn.example.org/what-is) (Exa Search) — https://vpn.example.org/what-is';

/**
 * Answer each kind of blocking completion the pipeline makes.
 */
function scriptReplies(provider: FakeProvider): void {
  provider.complete.mockImplementation(async (messages: ChatMessage[]) => {
    const first = messages[0]?.content ?? '';
    const second = messages[1]?.content ?? '';
    if (first.includes('IT query classifier')) {
      return '{"source": "web_search", "confidence": 0.8, "reasoning": "General networking concept"}';
    }
    if (first.startsWith('Suggest up to')) {
      return '1. How do I set up a VPN?\n2. What is IPsec?';
    }
    if (second.startsWith('Rewrite the answer below')) {
      return 'Reformatted answer';
    }
    return 'A VPN encrypts traffic.';
  });
}

describe('createAskCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: MockInstance<typeof console.log>;
  let stdoutWrites: string[];
  let provider: FakeProvider;
  let fetchMock: FetchMock;
  let shutdown: MockInstance<() => Promise<void>>;

  beforeEach(() => {
    resetAll();
    chalk.level = 0;
    logOutput = [];
    stdoutWrites = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdoutWrites.push(String(chunk));
      return true;
    });

    provider = createFakeProvider(['A VPN ', 'encrypts traffic.']);
    scriptReplies(provider);
    fetchMock = createFetchMock();
    fetchMock.mockImplementation(async () => jsonResponse({ results: [VPN_RESULT] }));

    const tracer = createNoopTracer();
    shutdown = vi.spyOn(tracer, 'shutdown');

    vi.mocked(openAssistant).mockImplementation(() => ({
      assistant: createAssistant(DEFAULT_CONFIG, {
        provider,
        fetchFn: fetchMock,
        exaApiKey: 'test-secret',
        now: () => new Date('2026-03-01T00:00:00Z'),
      }),
      tracer,
      config: DEFAULT_CONFIG,
    }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function runCommand(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createAskCommand(() => context));
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  describe('command structure', () => {
    it('creates a command named "ask" with a variadic question', () => {
      const command = createAskCommand(() => mockContext);

      expect(command.name()).toBe('ask');
      expect(command.registeredArguments).toHaveLength(1);
      expect(command.registeredArguments[0]?.name()).toBe('question');
      expect(command.registeredArguments[0]?.variadic).toBe(true);
    });

    it('has the answer options', () => {
      const command = createAskCommand(() => mockContext);
      const longs = command.options.map((o) => o.long);

      expect(longs).toEqual(['--no-stream', '--model', '--style', '--explain', '--no-followups']);
    });
  });

  describe('validation', () => {
    it('rejects an empty question', async () => {
      await expect(runCommand(['   '])).rejects.toThrow('Question cannot be empty');
      expect(openAssistant).not.toHaveBeenCalled();
    });

    it('rejects an unknown style before building the assistant', async () => {
      await expect(runCommand(['What is a VPN?', '--style', 'poem'])).rejects.toThrow(
        'Invalid --style value: "poem"'
      );
      expect(openAssistant).not.toHaveBeenCalled();
    });

    it('parses known styles', () => {
      expect(parseStyle('comparison')).toBe('comparison');
      expect(parseStyle(undefined)).toBeUndefined();
    });
  });

  describe('text output', () => {
    it('streams the answer and prints the sources block', async () => {
      await runCommand(['What', 'is', 'a', 'VPN?', '--no-followups']);

      expect(stdoutWrites).toEqual(['A VPN ', 'encrypts traffic.', '\n']);
      expect(logOutput).toEqual([SOURCES_MARKDOWN]);
      expect(shutdown).toHaveBeenCalledTimes(1);
    });

    it('passes --model through', async () => {
      await runCommand(['What is a VPN?', '--no-followups', '--model', 'other/model']);

      expect(openAssistant).toHaveBeenCalledWith(mockContext, { model: 'other/model' });
    });

    it('prints the blocking answer with --no-stream', async () => {
      await runCommand(['What is a VPN?', '--no-stream', '--no-followups']);

      expect(provider.stream).not.toHaveBeenCalled();
      expect(logOutput).toEqual(['A VPN encrypts traffic.', SOURCES_MARKDOWN]);
    });

    it('prints the routing explanation with --explain', async () => {
      await runCommand(['What is a VPN?', '--explain', '--no-followups']);

      expect(logOutput).toEqual([
        SOURCES_MARKDOWN,
        '',
        'Route: web_search (llm_classification, 80.0%)',
        'General networking concept',
      ]);
    });

    it('prints numbered follow-up suggestions', async () => {
      await runCommand(['What is a VPN?']);

      expect(logOutput).toEqual([
        SOURCES_MARKDOWN,
        '',
        '💡 Follow-up suggestions:',
        '  1. How do I set up a VPN?',
        '  2. What is IPsec?',
      ]);
    });

    it('reformats the blocking answer with --style', async () => {
      await runCommand(['What is a VPN?', '--style', 'comparison', '--no-followups']);

      expect(provider.stream).not.toHaveBeenCalled();
      expect(logOutput[0]).toBe('Reformatted answer');
      const reformatCall = provider.complete.mock.calls.find((call) =>
        (call[0][1]?.content ?? '').startsWith('Rewrite the answer below')
      );
      expect(reformatCall?.[0][1]?.content).toContain('Answer:\nA VPN encrypts traffic.');
      expect(reformatCall?.[0][1]?.content).toContain('Sources:\nWhat is a VPN?: https://vpn.example.org/what-is');
    });

    it('prints the refusal without follow-ups or sources', async () => {
      await runCommand(["What's", 'the', 'best', 'pizza', 'topping?']);

      expect(stdoutWrites).toEqual([DEFAULT_OUT_OF_SCOPE_MESSAGE, '\n']);
      expect(logOutput).toEqual([]);
      expect(provider.complete).not.toHaveBeenCalled();
    });
  });

  describe('JSON output', () => {
    it('prints question, answer, sources, intent and follow-ups', async () => {
      const jsonContext: CommandContext = { ...mockContext, options: { verbose: false, json: true } };

      await runCommand(['What is a VPN?'], jsonContext);

      expect(provider.stream).not.toHaveBeenCalled();
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output).toEqual({
        question: 'What is a VPN?',
        answer: 'A VPN encrypts traffic.',
        sources: [
          {
            title: 'What is a VPN?',
            excerpt: 'A virtual private network encrypts traffic....',
            url: 'https://vpn.example.org/what-is',
            source: 'Exa Search',
          },
        ],
        intent: {
          method: 'llm_classification',
          confidence: 0.8,
          source: 'web_search',
          reasoning: 'General networking concept',
          multiSource: false,
        },
        followups: ['How do I set up a VPN?', 'What is IPsec?'],
      });
    });
  });
});
