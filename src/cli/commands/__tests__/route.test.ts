/**
 * Tests for route command
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { createRouteCommand } from '../route.js';
import type { CommandContext } from '../../types.js';
import { openAssistant } from '../../utils/assistant.js';
import { createAssistant } from '../../../agent/assistant.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { createNoopTracer } from '../../../observability/noop-tracer.js';
import {
  createFakeProvider,
  createFetchMock,
  jsonResponse,
  resetAll,
  type FakeProvider,
} from '../../../test-utils/index.js';

vi.mock('../../utils/assistant.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../utils/assistant.js')>();
  return { ...actual, openAssistant: vi.fn() };
});

describe('createRouteCommand', () => {
  let logOutput: string[];
  let mockContext: CommandContext;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let provider: FakeProvider;

  beforeEach(() => {
    resetAll();
    chalk.level = 0;
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    provider = createFakeProvider();
    provider.complete.mockRejectedValue(new Error('classifier unavailable'));

    const fetchMock = createFetchMock();
    fetchMock.mockImplementation(async () =>
      jsonResponse({
        results: [{ title: 'Patch notes', text: 'Fixed in 3.0.1.', url: 'https://security.example.org/notes' }],
      })
    );

    vi.mocked(openAssistant).mockImplementation(() => ({
      assistant: createAssistant(DEFAULT_CONFIG, {
        provider,
        fetchFn: fetchMock,
        exaApiKey: 'test-secret',
        now: () => new Date('2026-03-01T00:00:00Z'),
      }),
      tracer: createNoopTracer(),
      config: DEFAULT_CONFIG,
    }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function runCommand(args: string[], context = mockContext) {
    const program = new Command();
    program.addCommand(createRouteCommand(() => context));
    await program.parseAsync(['node', 'test', 'route', ...args]);
  }

  it('prints the intent and context without generating an answer', async () => {
    await runCommand(['Latest', 'OpenSSL', 'patch']);

    expect(provider.stream).not.toHaveBeenCalled();
    expect(logOutput.slice(0, 7)).toEqual([
      'Route: web_search',
      'Method: pattern_fallback',
      'Confidence: 60.0%',
      'Pattern matching with 60.0% confidence: General IT query, using real-time search',
      '',
      'Context:',
      '**Patch notes** (Exa Search)\nFixed in 3.0.1....\nURL: https://security.example.org/notes\n',
    ]);
    expect(logOutput[7]).toBe(
      '\n\n**📚 Sources:**\n1. [Patch notes](https://security.example.org/notes) (Exa Search) — https://security.example.org/notes'
    );
  });

  it('prints the refusal context for out-of-scope questions', async () => {
    await runCommand(['best', 'pizza', 'topping']);

    expect(logOutput[0]).toBe('Route: out_of_scope');
    expect(logOutput[1]).toBe('Method: scope_guard');
    expect(logOutput).toHaveLength(7);
  });

  it('prints JSON with --json', async () => {
    await runCommand(['Latest', 'OpenSSL', 'patch'], { ...mockContext, options: { verbose: false, json: true } });

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toMatchObject({
      question: 'Latest OpenSSL patch',
      intent: { route: 'web_search', method: 'pattern_fallback', confidence: 0.6 },
      explanation: 'Pattern matching with 60.0% confidence: General IT query, using real-time search',
      results: [{ title: 'Patch notes', url: 'https://security.example.org/notes', source: 'Exa Search' }],
    });
    expect(logOutput).toEqual([]);
  });

  it('rejects an empty question', async () => {
    await expect(runCommand([' '])).rejects.toThrow('Question cannot be empty');
  });
});
