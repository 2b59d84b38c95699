/**
 * Error type definitions for the opsguide CLI
 *
 * These custom error classes carry a recovery hint and an exit code so
 * commands can fail with an actionable message.
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: lets scripts tell failures apart
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - A value that fails schema validation
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: opsguide config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(service: string, envVar: string) {
    super(
      `${service} API key not configured`,
      `Set the ${envVar} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
