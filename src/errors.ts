import type { ZodError } from 'zod';

/**
 * Base class for every error raised by the transition engine.
 */
export class TransitionEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Caller-supplied configuration is empty or inconsistent. Raised before any
 * enumeration starts.
 */
export class ConfigurationError extends TransitionEngineError {
  readonly reason: string; // message without the path prefix

  constructor(
    message: string,
    public readonly path: readonly (string | number)[] = [],
  ) {
    super(path.length > 0 ? `${path.join('.')}: ${message}` : message);
    this.reason = message;
  }
}

/**
 * A formula would need a negative atom count, or prices an element or isotope
 * the mass table does not know.
 */
export class FormulaError extends TransitionEngineError {
  constructor(
    message: string,
    public readonly element?: string,
  ) {
    super(message);
  }
}

/**
 * A fragment rule cannot apply to one species. Reported, never thrown out of
 * the generator.
 */
export class RuleApplicationSkip extends TransitionEngineError {
  constructor(
    public readonly species: string,
    public readonly rule: string,
    public readonly element: string,
  ) {
    super(`Rule ${rule} skipped for ${species}: negative ${element} count`);
  }
}

/**
 * First zod issue as a ConfigurationError, keeping the issue path.
 */
export function toConfigurationError(error: ZodError, rootPath: readonly (string | number)[] = []): ConfigurationError {
  const issue = error.issues[0];
  if (!issue) return new ConfigurationError(error.message, rootPath);
  return new ConfigurationError(issue.message, [...rootPath, ...issue.path]);
}
