/**
 * Scripted completion provider for pipeline tests.
 */

import { vi, type Mock } from 'vitest';
import type { ChatMessage, CompletionOptions, CompletionProvider } from '../providers/types.js';

type CompleteFn = (messages: ChatMessage[], options?: CompletionOptions) => Promise<string>;
type StreamFn = (
  messages: ChatMessage[],
  options?: CompletionOptions
) => AsyncGenerator<string, void, undefined>;

export interface FakeProvider extends CompletionProvider {
  complete: Mock<CompleteFn>;
  stream: Mock<StreamFn>;
}

/**
 * Provider whose stream yields `fragments` and whose blocking call answers
 * `fragments.join('')`. Override either mock per test.
 */
export function createFakeProvider(
  fragments: readonly string[] = ['ok'],
  model = 'test-model'
): FakeProvider {
  return {
    model,
    complete: vi.fn<CompleteFn>(async () => fragments.join('')),
    stream: vi.fn<StreamFn>(async function* () {
      yield* fragments;
    }),
  };
}
