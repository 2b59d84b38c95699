/**
 * Tests for chat command helpers: REPL command parsing, follow-up
 * selection and question handling.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import {
  createChatCommand,
  handleQuestion,
  parseREPLCommand,
  resolveFollowupSelection,
  type ChatState,
} from '../chat.js';
import type { CommandContext } from '../../types.js';
import { createAssistant } from '../../../agent/assistant.js';
import type { ChatMessage } from '../../../providers/types.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { createFakeProvider, createFetchMock, resetAll, type FakeProvider } from '../../../test-utils/index.js';

describe('parseREPLCommand', () => {
  it('returns null for questions', () => {
    expect(parseREPLCommand('How do I reset MFA?')).toBeNull();
  });

  it('matches commands by name and alias', () => {
    expect(parseREPLCommand('/clear')?.name).toBe('clear');
    expect(parseREPLCommand('/s')?.name).toBe('sources');
    expect(parseREPLCommand('/INTENT')?.name).toBe('intent');
    expect(parseREPLCommand('/?')?.name).toBe('help');
  });

  it('accepts exit and quit with or without a slash', () => {
    expect(parseREPLCommand('exit')?.name).toBe('exit');
    expect(parseREPLCommand('QUIT')?.name).toBe('exit');
    expect(parseREPLCommand('/quit')?.name).toBe('exit');
  });

  it('treats unknown slash commands as questions', () => {
    expect(parseREPLCommand('/etc/hosts permissions')).toBeNull();
  });
});

describe('resolveFollowupSelection', () => {
  const followups = ['How do I set up a VPN?', 'What is IPsec?'];

  it('maps a number to the suggestion', () => {
    expect(resolveFollowupSelection('2', followups)).toBe('What is IPsec?');
    expect(resolveFollowupSelection(' 1 ', followups)).toBe('How do I set up a VPN?');
  });

  it('ignores numbers out of range and other text', () => {
    expect(resolveFollowupSelection('3', followups)).toBeNull();
    expect(resolveFollowupSelection('0', followups)).toBeNull();
    expect(resolveFollowupSelection('1.5', followups)).toBeNull();
    expect(resolveFollowupSelection('2', [])).toBeNull();
  });
});

describe('chat session', () => {
  let provider: FakeProvider;
  let logOutput: string[];
  let ctx: CommandContext;
  let state: ChatState;

  beforeEach(() => {
    resetAll();
    chalk.level = 0;
    logOutput = [];
    ctx = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    provider = createFakeProvider(['Hi ', 'there!']);
    provider.complete.mockImplementation(async (messages: ChatMessage[]) => {
      const prompt = messages[0]?.content ?? '';
      if (prompt.includes('IT query classifier')) {
        return '{"source": "general_knowledge", "confidence": 0.9, "reasoning": "Greeting"}';
      }
      return 'What can you do?\nHow do I reset MFA?';
    });

    state = {
      assistant: createAssistant(DEFAULT_CONFIG, { provider, fetchFn: createFetchMock() }),
      transcript: [],
      history: { maxMessages: 6, maxChars: 200 },
      showFollowups: true,
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records both turns and prints follow-ups', async () => {
    const answer = await handleQuestion('hello', state, ctx);

    expect(answer).toBe('Hi there!');
    expect(state.transcript).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: 'Hi there!' },
    ]);
    expect(state.assistant.session.followups).toEqual(['What can you do?', 'How do I reset MFA?']);
    expect(logOutput).toEqual([
      '',
      '💡 Follow-up suggestions:',
      '  1. What can you do?',
      '  2. How do I reset MFA?',
      'Type a number to ask one.',
    ]);
  });

  it('feeds the history summary into the next request', async () => {
    await handleQuestion('hello', state, ctx);
    await handleQuestion('thanks', state, ctx);

    const contextMessage = provider.stream.mock.calls[1]?.[0][2]?.content ?? '';
    expect(contextMessage).toContain('Previous conversation:\nHuman: hello...\nAssistant: Hi there!...');
    expect(state.transcript).toHaveLength(4);
  });

  it('skips follow-ups when disabled', async () => {
    state.showFollowups = false;

    await handleQuestion('hello', state, ctx);

    expect(logOutput).toEqual([]);
    expect(provider.complete).toHaveBeenCalledTimes(1);
  });

  it('/clear empties the transcript and follow-ups', async () => {
    await handleQuestion('hello', state, ctx);
    logOutput.length = 0;

    const keepGoing = parseREPLCommand('/clear')?.handler(state, ctx);

    expect(keepGoing).toBe(true);
    expect(state.transcript).toEqual([]);
    expect(state.assistant.session.followups).toEqual([]);
    expect(logOutput).toEqual(['Conversation cleared.']);
  });

  it('/intent shows the last routing decision', async () => {
    parseREPLCommand('/intent')?.handler(state, ctx);
    expect(logOutput).toEqual(['No question asked yet.']);

    await handleQuestion('hello', state, ctx);
    logOutput.length = 0;
    parseREPLCommand('/intent')?.handler(state, ctx);

    expect(logOutput).toEqual(['Route: general_knowledge (llm_classification, 90.0%)', 'Greeting']);
  });

  it('/sources reports when the last answer had none', async () => {
    await handleQuestion('hello', state, ctx);
    logOutput.length = 0;

    parseREPLCommand('/sources')?.handler(state, ctx);

    expect(logOutput).toEqual(['No sources for the last answer.']);
  });

  it('/exit stops the loop', () => {
    expect(parseREPLCommand('/exit')?.handler(state, ctx)).toBe(false);
    expect(logOutput).toEqual(['Goodbye!']);
  });
});

describe('createChatCommand', () => {
  it('creates a command named "chat" with its options', () => {
    const command = createChatCommand(() => {
      throw new Error('not called');
    });

    expect(command.name()).toBe('chat');
    expect(command.options.map((o) => o.long)).toEqual(['--model', '--no-followups']);
  });
});
