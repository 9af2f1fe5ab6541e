/**
 * Error type definitions for the errlens CLI
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - A separate ContractError for programming mistakes
 */

/**
 * Base class for all CLI errors.
 *
 * hint: tells the user HOW to fix the problem
 * code: lets scripts handle different errors differently
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
 * - Invalid TOML syntax in ~/.errlens/config.toml
 * - Unknown style or dispatch value
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Check ~/.errlens/config.toml or remove it to use defaults',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
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

/**
 * Thrown when library code is called with a value of the wrong type,
 * e.g. a number passed to the classifier or an empty error kind label.
 *
 * A bug in the caller, not a user error: no hint, exit code 70.
 */
export class ContractError extends TypeError {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ContractError';
  }
}

/**
 * Describe a runtime value's type for contract error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}
