import { z } from 'zod';
import { ConfigurationError } from '../method-security/errors';
import type { Authentication, MethodInvocation } from '../types/method-security.types';

/**
 * Pluggable expression language used by the decision manager.
 *
 * The parsed expression `E` and evaluation context `C` are opaque to the
 * manager; it only hands back to `evaluateAsBoolean` what the same engine
 * produced.
 */
export interface ExpressionEngine<E = unknown, C = unknown> {
  /**
   * Parse a raw policy declaration.
   * @throws PolicyParseError if the expression is malformed
   */
  parse(expression: string): E;

  createEvaluationContext(authentication: Authentication, invocation: MethodInvocation): C;

  /**
   * @throws PolicyEvaluationError if evaluation fails or the result is not a boolean
   */
  evaluateAsBoolean(expression: E, context: C): boolean;
}

const capability = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === 'function',
  { message: 'must be a function' },
);

const ExpressionEngineSchema = z.object({
  parse: capability,
  createEvaluationContext: capability,
  evaluateAsBoolean: capability,
});

/**
 * Fail fast on a missing or incomplete engine handed in by the host.
 */
export function assertExpressionEngine(engine: unknown): asserts engine is ExpressionEngine {
  if (engine === null || engine === undefined) {
    throw new ConfigurationError('expressionEngine cannot be null', 'expressionEngine');
  }

  const result = ExpressionEngineSchema.safeParse(engine);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigurationError(
      `Invalid expressionEngine: ${problems.join('; ')}`,
      'expressionEngine',
    );
  }
}
