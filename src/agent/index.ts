/**
 * Answer pipeline: intent classification, source routing and answer
 * orchestration.
 */

export * from './types.js';
export {
  IntentClassifier,
  createIntentClassifier,
  classifyByPattern,
  explainIntent,
  ClassificationResponseSchema,
  type ClassificationResponse,
  type IntentClassifierOptions,
} from './intent-classifier.js';
export {
  SourceRouter,
  createSourceRouter,
  formatContextText,
  buildEnhancedContext,
  GENERAL_KNOWLEDGE_CONTEXT,
  type SourceRoute,
  type SourceTable,
  type SourceRouterOptions,
  type RouteOptions,
} from './router.js';
export {
  ResponseOrchestrator,
  createResponseOrchestrator,
  MISSING_PROVIDER_MESSAGE,
  type OrchestratorSettings,
  type ResponseOrchestratorOptions,
} from './orchestrator.js';
export {
  classifyQueryType,
  buildRolePrompt,
  buildAnswerMessages,
  buildContextBlock,
  buildFollowupMessages,
  buildReformatMessages,
  parseFollowups,
  wrapUserQuery,
  BASE_ROLE_PROMPT,
  GUARDRAIL_INSTRUCTION,
  INJECTION_NOTICE,
  VERBATIM_MARKER,
  MAX_FOLLOWUPS,
  type AnswerPromptInput,
} from './prompts.js';
export { buildConversationHistory, type ConversationMessage, type HistoryOptions } from './history.js';
export {
  createSessionContext,
  recordRouting,
  sourcesForFollowups,
  type SessionContext,
} from './session.js';
export { createAssistant, type Assistant, type AssistantDependencies } from './assistant.js';
