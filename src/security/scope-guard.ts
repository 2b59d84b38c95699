/**
 * Scope Guard
 *
 * Decides whether a question belongs to the assistant's topic domain
 * (IT infrastructure, cybersecurity, cloud, DevOps, IT careers) before any
 * remote call is made.
 *
 * Decision tiers:
 * 1. No non-IT term                                   → in scope (default_allow, 1.0)
 * 2. Non-IT term, no IT anchor, no allowed career term → out of scope (keyword, 0.95)
 * 3. Non-IT term + IT anchor, LLM check enabled        → model verdict, fail open
 * 4. Non-IT term + IT anchor, LLM check disabled       → in scope (keyword, 0.7)
 * 5. Non-IT term + allowed career term, no anchor      → in scope (keyword, 0.8)
 */

import { z } from 'zod';
import type { ScopeConfig } from '../config/schema.js';
import type { CompletionProvider } from '../providers/types.js';
import { loadDataFile } from '../utils/data-files.js';
import { extractJsonObject } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError } from '../errors/index.js';
import { findTerms } from './terms.js';

// ============================================================================
// TYPES
// ============================================================================

export type ScopeMethod = 'keyword' | 'llm' | 'default_allow';

export interface ScopeVerdict {
  readonly inScope: boolean;
  readonly method: ScopeMethod;
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly reasoning: string;
  /** Lexicon terms that drove the decision */
  readonly matchedTerms: readonly string[];
}

export const ScopeLexiconsSchema = z.object({
  nonItPatterns: z.array(z.string()),
  careerWhitelist: z.array(z.string()),
  itAnchors: z.array(z.string()),
});

export type ScopeLexicons = z.infer<typeof ScopeLexiconsSchema>;

/**
 * Secondary check for ambiguous questions. Resolves to the in-scope
 * boolean; rejection means "no verdict".
 */
export type ScopeChecker = (query: string, signal?: AbortSignal) => Promise<boolean>;

export type ScopePolicy = Pick<ScopeConfig, 'enforce' | 'allow_career_topics' | 'llm_check'>;

export interface ScopeGuardOptions {
  policy: ScopePolicy;
  /** Defaults to data/scope-keywords.json */
  lexicons?: ScopeLexicons;
  /** Required for tier 3; without it ambiguous questions use tier 4 */
  llmCheck?: ScopeChecker;
  logger?: Logger;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const SCOPE_CHECK_PROMPT = `Decide whether the question below belongs to IT infrastructure, cybersecurity, cloud, DevOps, software operations, or IT careers.

Question: "{{QUERY}}"

Respond with JSON only: {"in_scope": true} or {"in_scope": false}`;

const ScopeCheckResponseSchema = z.object({
  in_scope: z.boolean(),
});

// ============================================================================
// HELPERS
// ============================================================================

export function loadScopeLexicons(): ScopeLexicons {
  return loadDataFile('scope-keywords.json', ScopeLexiconsSchema);
}

function verdict(
  inScope: boolean,
  method: ScopeMethod,
  confidence: number,
  reasoning: string,
  matchedTerms: readonly string[] = []
): ScopeVerdict {
  return Object.freeze({
    inScope,
    method,
    confidence,
    reasoning,
    matchedTerms: Object.freeze([...matchedTerms]),
  });
}

/**
 * Build a ScopeChecker backed by one low-temperature completion call.
 */
export function createLlmScopeChecker(provider: CompletionProvider, model?: string): ScopeChecker {
  return async (query: string, signal?: AbortSignal): Promise<boolean> => {
    const reply = await provider.complete(
      [{ role: 'user', content: SCOPE_CHECK_PROMPT.replace('{{QUERY}}', query) }],
      { model, maxTokens: 20, temperature: 0, signal }
    );
    const parsed = ScopeCheckResponseSchema.safeParse(extractJsonObject(reply));
    if (!parsed.success) {
      throw new Error(`Unparseable scope verdict: ${reply.slice(0, 80)}`);
    }
    return parsed.data.in_scope;
  };
}

// ============================================================================
// SCOPE GUARD
// ============================================================================

export class ScopeGuard {
  private readonly policy: ScopePolicy;
  private readonly lexicons: ScopeLexicons;
  private readonly llmCheck?: ScopeChecker;
  private readonly logger: Logger;

  constructor(options: ScopeGuardOptions) {
    this.policy = options.policy;
    this.lexicons = options.lexicons ?? loadScopeLexicons();
    this.llmCheck = options.llmCheck;
    this.logger = options.logger ?? silentLogger;
  }

  async evaluateScope(query: string, signal?: AbortSignal): Promise<ScopeVerdict> {
    if (!this.policy.enforce) {
      return verdict(true, 'default_allow', 1.0, 'Scope enforcement disabled');
    }

    const nonIt = findTerms(query, this.lexicons.nonItPatterns);
    if (nonIt.length === 0) {
      return verdict(true, 'default_allow', 1.0, 'No non-IT topic detected');
    }

    const anchors = findTerms(query, this.lexicons.itAnchors);
    const careers = this.policy.allow_career_topics
      ? findTerms(query, this.lexicons.careerWhitelist)
      : [];

    if (anchors.length === 0) {
      if (careers.length > 0) {
        return verdict(true, 'keyword', 0.8, 'IT career topic allowed by policy', careers);
      }
      return verdict(false, 'keyword', 0.95, 'Detected non-IT topic per scope policy', nonIt);
    }

    const mixed = [...nonIt, ...anchors];

    if (this.policy.llm_check && this.llmCheck) {
      try {
        const inScope = await this.llmCheck(query, signal);
        return verdict(
          inScope,
          'llm',
          0.85,
          inScope ? 'Model judged the mixed-topic question in scope' : 'Model judged the question outside IT scope',
          mixed
        );
      } catch (error) {
        this.logger.debug?.(`Scope check failed, allowing question: ${describeError(error)}`);
        return verdict(true, 'default_allow', 0.5, 'Scope check unavailable; allowing question', mixed);
      }
    }

    return verdict(true, 'keyword', 0.7, 'IT anchor term present alongside non-IT topic', mixed);
  }
}
