/**
 * Security Module
 *
 * Topic-scope policy, prompt-injection heuristics and output sanitization.
 */

export {
  ScopeGuard,
  createLlmScopeChecker,
  loadScopeLexicons,
  ScopeLexiconsSchema,
  type ScopeVerdict,
  type ScopeMethod,
  type ScopeLexicons,
  type ScopeChecker,
  type ScopePolicy,
  type ScopeGuardOptions,
} from './scope-guard.js';

export {
  detectPromptInjection,
  INJECTION_PATTERNS,
  type InjectionPattern,
  type InjectionResult,
} from './injection.js';

export {
  escapeHtml,
  isUrlAllowed,
  buildSourcesMarkdown,
  type SourcesMarkdownOptions,
} from './sanitize.js';

export { matchesTerm, findTerms } from './terms.js';
