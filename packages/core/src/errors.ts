/**
 * Core Error Classes
 *
 * Simple error classes for @stratlab/core.
 * This package has zero dependencies on other @stratlab packages,
 * so we define minimal error classes here rather than importing from utils.
 */

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends Error {
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A strategy produced a candidate that breaks the decision-function contract
 * (inverted stop/target ordering, non-finite prices, ...).
 */
export class InvalidCandidateError extends ValidationError {
  public readonly issues: string[];

  constructor(message: string, issues: string[], context?: Record<string, unknown>) {
    super(message, { ...context, issues });
    this.name = 'InvalidCandidateError';
    this.issues = issues;
  }
}

export class StrategyNotFoundError extends Error {
  public readonly strategyName: string;

  constructor(strategyName: string, available: string[]) {
    super(`Strategy '${strategyName}' not found. Available: ${available.join(', ') || '(none)'}`);
    this.name = 'StrategyNotFoundError';
    this.strategyName = strategyName;

    Error.captureStackTrace(this, this.constructor);
  }
}
