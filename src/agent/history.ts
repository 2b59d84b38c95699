/**
 * Conversation history summary fed into the answer context.
 */

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface HistoryOptions {
  /** Most recent messages kept */
  maxMessages?: number;
  /** Characters kept per message before "..." */
  maxChars?: number;
}

/**
 * Render the last `maxMessages` messages as `Human:` / `Assistant:` lines,
 * each truncated to `maxChars` and suffixed with "...".
 *
 * @example
 * buildConversationHistory([{ role: 'user', content: 'hi' }]);
 * // => 'Human: hi...'
 */
export function buildConversationHistory(
  messages: readonly ConversationMessage[],
  options: HistoryOptions = {}
): string {
  const { maxMessages = 6, maxChars = 200 } = options;
  if (maxMessages <= 0) {
    return '';
  }
  return messages
    .slice(-maxMessages)
    .map((message) => {
      const speaker = message.role === 'user' ? 'Human' : 'Assistant';
      return `${speaker}: ${message.content.slice(0, maxChars)}...`;
    })
    .join('\n');
}
