/**
 * @fileoverview Error classes for method security
 */

/**
 * Base error class for method security
 */
export class MethodSecurityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MethodSecurityError';
  }
}

/**
 * Thrown at setup time for an invalid expression engine or configuration value
 */
export class ConfigurationError extends MethodSecurityError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a declared policy expression is malformed
 */
export class PolicyParseError extends MethodSecurityError {
  constructor(
    public readonly expression: string,
    public readonly errors: readonly string[],
  ) {
    super(`Failed to parse policy expression '${expression}': ${errors.join(', ')}`);
    this.name = 'PolicyParseError';
  }
}

/**
 * Thrown when a policy expression fails to evaluate or does not yield a boolean
 */
export class PolicyEvaluationError extends MethodSecurityError {
  constructor(
    public readonly expression: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Failed to evaluate policy expression '${expression}': ${reason}`, { cause });
    this.name = 'PolicyEvaluationError';
  }
}
