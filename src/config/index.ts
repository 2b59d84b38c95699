/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `opsguide config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ScopeConfigSchema,
  SourcesConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  ScopeConfig,
  SourcesConfig,
  ToolSourceConfig,
  WebSearchConfig,
  LLMConfig,
} from './schema.js';

// Defaults
export {
  DEFAULT_CONFIG,
  CONFIG_TEMPLATE,
  DEFAULT_OUT_OF_SCOPE_MESSAGE,
  DEFAULT_URL_ALLOWLIST,
} from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getAppDir,
  getConfigPath,
} from './loader.js';

// Path constants
export { APP_DIR, CONFIG_PATH } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getApiKey,
  hasApiKey,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, KeyedService } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_COMPLETION,
  COMMANDS_USING_SEARCH,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
