/**
 * opsguide - Library Entry Point
 *
 * The CLI (`opsguide ask`, `opsguide chat`) covers most use. This module
 * exposes the same pipeline for embedding in other front ends.
 *
 * @example One answer
 * ```typescript
 * import { createAssistant, loadConfig } from 'opsguide';
 *
 * const assistant = createAssistant(loadConfig());
 * const { text, sourcesMarkdown } = await assistant.answerQuery('How do I resize an EBS volume?', '');
 * ```
 *
 * @example Streaming with a conversation summary
 * ```typescript
 * import { createAssistant, buildConversationHistory, loadConfig } from 'opsguide';
 *
 * const assistant = createAssistant(loadConfig());
 * const history = buildConversationHistory(transcript);
 * for await (const fragment of assistant.streamAnswerQuery(question, history).fragments) {
 *   process.stdout.write(fragment);
 * }
 * console.log(assistant.session.lastSourcesMarkdown);
 * ```
 *
 * @packageDocumentation
 */

export * from './agent/index.js';
export * from './sources/index.js';
export * from './security/index.js';
export * from './providers/index.js';
export * from './observability/index.js';

export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
  getApiKey,
  hasApiKey,
  ConfigSchema,
  DEFAULT_CONFIG,
  type Config,
  type PartialConfig,
} from './config/index.js';

export {
  CLIError,
  ConfigError,
  APIKeyError,
  ValidationError,
  describeError,
} from './errors/index.js';

export { type Logger, consoleLogger, silentLogger } from './utils/index.js';
