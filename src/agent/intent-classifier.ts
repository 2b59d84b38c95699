/**
 * Intent Classifier
 *
 * Decides which knowledge source answers a question.
 *
 * Pipeline:
 * 1. Scope guard - out-of-scope questions stop here (no remote calls)
 * 2. Model classification - one low-temperature call, JSON reply validated
 * 3. Pattern fallback - fixed-priority keyword rules (never fails)
 *
 * Every intent carries a confidence and a reasoning string.
 *
 * @example
 * ```typescript
 * const classifier = createIntentClassifier({ scopeGuard, provider });
 *
 * await classifier.classify('How do I rotate IAM access keys on EC2?');
 * // { route: 'aws_docs', method: 'llm_classification', confidence: 0.92, ... }
 *
 * await classifier.classify("What's the best pizza topping?");
 * // { route: 'out_of_scope', method: 'scope_guard', confidence: 0.95, ... }
 * ```
 */

import { z } from 'zod';
import type { CompletionProvider } from '../providers/types.js';
import type { ScopeGuard } from '../security/scope-guard.js';
import { findTerms } from '../security/terms.js';
import { extractJsonObject } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { describeError } from '../errors/index.js';
import { ClassifiedRouteSchema, type Intent, type IntentMethod, type Route } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Classification prompt template. {{QUERY}} is replaced with the question.
 */
const CLASSIFICATION_PROMPT_TEMPLATE = `You are an IT query classifier. Choose the best source for the question below.

Sources:
1. microsoft_learn: Microsoft, Azure, Microsoft 365, Windows, PowerShell, Active Directory, Teams, SharePoint, Exchange
2. aws_docs: AWS, Amazon Web Services, EC2, S3, Lambda, CloudFormation, VPC, IAM, RDS
3. web_search: technical questions needing current information, vulnerabilities, troubleshooting, comparisons
4. general_knowledge: greetings, conversational or basic questions that need no external source

Question: "{{QUERY}}"

Consider the keywords, whether the answer must be current, and any vendor or platform named.

Respond with JSON only (no markdown):
{
  "source": "<one of the four source names>",
  "confidence": <0.0-1.0>,
  "reasoning": "<brief explanation>"
}`;

/**
 * Model classification reply. Unknown source names and out-of-range
 * confidences fail validation and drop to the pattern fallback.
 */
export const ClassificationResponseSchema = z.object({
  source: ClassifiedRouteSchema,
  confidence: z.number().min(0).max(1),
  reasoning: z.string().default('No reasoning provided'),
});

export type ClassificationResponse = z.infer<typeof ClassificationResponseSchema>;

const GREETING_TERMS = [
  'hello',
  'hi',
  'hey',
  'good morning',
  'good afternoon',
  'good evening',
  'how are you',
  'what can you do',
  'help',
  'thanks',
  'thank you',
];

/** Greetings only count in short messages */
const GREETING_MAX_LENGTH = 50;

const AWS_TERMS = ['aws', 'amazon', 'ec2', 's3', 'lambda'];
const MICROSOFT_TERMS = ['microsoft', 'azure', 'office', 'windows', 'powershell'];

const CLASSIFICATION_MAX_TOKENS = 200;
const CLASSIFICATION_TEMPERATURE = 0.1;

// ============================================================================
// HELPERS
// ============================================================================

function intent(route: Route, confidence: number, method: IntentMethod, reasoning: string): Intent {
  return Object.freeze({ route, confidence, method, reasoning });
}

/**
 * Deterministic rules, first match wins:
 * greeting > AWS keywords > Microsoft keywords > web search.
 */
export function classifyByPattern(query: string): Intent {
  const normalized = query.trim();

  if (normalized.length < GREETING_MAX_LENGTH && findTerms(normalized, GREETING_TERMS).length > 0) {
    return intent(
      'general_knowledge',
      0.9,
      'pattern_fallback',
      'Simple greeting or conversational query, no external sources needed'
    );
  }
  if (findTerms(normalized, AWS_TERMS).length > 0) {
    return intent('aws_docs', 0.7, 'pattern_fallback', 'AWS-related query detected');
  }
  if (findTerms(normalized, MICROSOFT_TERMS).length > 0) {
    return intent('microsoft_learn', 0.7, 'pattern_fallback', 'Microsoft-related query detected');
  }
  return intent('web_search', 0.6, 'pattern_fallback', 'General IT query, using real-time search');
}

/**
 * One-line human explanation of how an intent was reached.
 *
 * @example
 * explainIntent({ method: 'pattern_fallback', confidence: 0.7, reasoning: 'AWS-related query detected', ... });
 * // => 'Pattern matching with 70.0% confidence: AWS-related query detected'
 */
export function explainIntent(value: Intent): string {
  const pct = `${(value.confidence * 100).toFixed(1)}%`;
  switch (value.method) {
    case 'llm_classification':
      return `AI classified with ${pct} confidence: ${value.reasoning}`;
    case 'pattern_fallback':
      return `Pattern matching with ${pct} confidence: ${value.reasoning}`;
    default:
      return `Method: ${value.method}, confidence: ${pct}`;
  }
}

// ============================================================================
// INTENT CLASSIFIER
// ============================================================================

export interface IntentClassifierOptions {
  scopeGuard: ScopeGuard;
  /** Without a provider every in-scope question uses the pattern fallback */
  provider?: CompletionProvider;
  /** Model override for the classification call */
  model?: string;
  logger?: Logger;
}

export class IntentClassifier {
  private readonly scopeGuard: ScopeGuard;
  private readonly provider?: CompletionProvider;
  private readonly model?: string;
  private readonly logger: Logger;

  constructor(options: IntentClassifierOptions) {
    this.scopeGuard = options.scopeGuard;
    this.provider = options.provider;
    this.model = options.model;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Classify a question. Never rejects unless `signal` aborts.
   */
  async classify(query: string, signal?: AbortSignal): Promise<Intent> {
    const verdict = await this.scopeGuard.evaluateScope(query, signal);
    if (!verdict.inScope) {
      return intent('out_of_scope', verdict.confidence, 'scope_guard', verdict.reasoning);
    }

    if (this.provider) {
      try {
        const response = await this.classifyWithModel(this.provider, query, signal);
        return intent(response.source, response.confidence, 'llm_classification', response.reasoning);
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        this.logger.debug?.(`Intent classification fell back to patterns: ${describeError(error)}`);
      }
    }

    return classifyByPattern(query);
  }

  private async classifyWithModel(
    provider: CompletionProvider,
    query: string,
    signal?: AbortSignal
  ): Promise<ClassificationResponse> {
    const reply = await provider.complete(
      [{ role: 'user', content: CLASSIFICATION_PROMPT_TEMPLATE.replace('{{QUERY}}', query) }],
      {
        model: this.model,
        maxTokens: CLASSIFICATION_MAX_TOKENS,
        temperature: CLASSIFICATION_TEMPERATURE,
        signal,
      }
    );
    return this.parseClassificationResponse(reply);
  }

  private parseClassificationResponse(reply: string): ClassificationResponse {
    const json = extractJsonObject(reply);
    if (json === undefined) {
      throw new Error('No JSON found in classification reply');
    }
    return ClassificationResponseSchema.parse(json);
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createIntentClassifier(options: IntentClassifierOptions): IntentClassifier {
  return new IntentClassifier(options);
}
