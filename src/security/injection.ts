/**
 * Prompt-injection heuristics.
 *
 * Detection never blocks a question. A hit changes how the question is
 * wrapped in the completion prompt and adds a guardrail notice.
 */

export interface InjectionPattern {
  id: string;
  pattern: RegExp;
}

/** Checked in order; every match is reported. */
export const INJECTION_PATTERNS: readonly InjectionPattern[] = [
  { id: 'instruction_override', pattern: /ignore (the )?(previous|above) (instructions|rules)/i },
  { id: 'system_prompt_override', pattern: /disregard (the )?(system|previous) (prompt|instructions)/i },
  { id: 'prompt_disclosure', pattern: /reveal (the )?(system|hidden) (prompt|instructions)/i },
  { id: 'secret_disclosure', pattern: /print (environment|api|secret|token)/i },
  { id: 'exfiltration', pattern: /exfiltrat(e|ion)|leak (data|key|secret)/i },
  { id: 'out_of_band_action', pattern: /perform actions outside|execute code|run shell|launch process/i },
  { id: 'data_forwarding', pattern: /send (all|your) data to/i },
];

export interface InjectionResult {
  detected: boolean;
  matchedPatternIds: string[];
}

export function detectPromptInjection(text: string): InjectionResult {
  if (!text) {
    return { detected: false, matchedPatternIds: [] };
  }
  const matchedPatternIds = INJECTION_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(
    ({ id }) => id
  );
  return { detected: matchedPatternIds.length > 0, matchedPatternIds };
}
