/**
 * CEL Expression Engine
 *
 * Default {@link ExpressionEngine} for pre-authorize declarations, built on
 * cel-js. Declarations are parsed once into a CST; each check gets a fresh
 * context exposing the caller and the invocation, plus security functions
 * bound to that caller.
 *
 * @module @preauthorize/core/cel
 */

import { parse, evaluate, type ParseResult, type Success } from 'cel-js';
import { PolicyEvaluationError, PolicyParseError } from '../method-security/errors';
import { loadConfig } from '../config';
import type { ExpressionEngine } from './expression-engine';
import type { Authentication, MethodInvocation } from '../types/method-security.types';

/**
 * Custom CEL functions available during evaluation
 */
type CelFunctions = Record<string, (...args: unknown[]) => unknown>;

/**
 * Parsed CST type from cel-js Success result
 */
type ParsedCst = Success['cst'];

/**
 * A parsed pre-authorize declaration
 */
export interface CelExpression {
  readonly source: string;
  readonly cst: ParsedCst;
}

/**
 * Per-call evaluation context
 */
export interface CelEvaluationContext {
  readonly variables: Readonly<Record<string, unknown>>;
  readonly functions: CelFunctions;
}

export interface CelExpressionEngineOptions {
  /** Role prefix stripped before comparing roles (default: METHOD_SECURITY_ROLE_PREFIX, else 'ROLE_') */
  rolePrefix?: string;
  /** Clock used for the `now` variable */
  now?: () => Date;
}

/**
 * Production CEL expression engine
 *
 * Variables: `principal` (id, roles, authorities and attributes), `authentication`
 * (name, authenticated, anonymous), `args`, `params` (arguments by parameter
 * name), `target` (the receiver), `method` and `now`.
 *
 * Functions: `hasRole`, `hasAnyRole`, `hasAuthority`, `hasAnyAuthority`,
 * `isAuthenticated`, `isAnonymous`, `permitAll`, `denyAll`.
 *
 * @example
 * ```typescript
 * const engine = new CelExpressionEngine();
 * const expression = engine.parse('hasRole("ADMIN") || params.ownerId == principal.id');
 * const context = engine.createEvaluationContext(authentication, invocation);
 * const granted = engine.evaluateAsBoolean(expression, context);
 * ```
 */
export class CelExpressionEngine implements ExpressionEngine<CelExpression, CelEvaluationContext> {
  private readonly rolePrefix: string;
  private readonly clock: () => Date;

  constructor(options: CelExpressionEngineOptions = {}) {
    this.rolePrefix = options.rolePrefix ?? loadConfig().rolePrefix;
    this.clock = options.now ?? (() => new Date());
  }

  parse(expression: string): CelExpression {
    if (expression.trim().length === 0) {
      throw new PolicyParseError(expression, ['expression is empty']);
    }

    const parseResult: ParseResult = parse(expression);

    if (!parseResult.isSuccess) {
      throw new PolicyParseError(expression, parseResult.errors);
    }

    const successResult = parseResult as Success;
    return { source: expression, cst: successResult.cst };
  }

  createEvaluationContext(
    authentication: Authentication,
    invocation: MethodInvocation,
  ): CelEvaluationContext {
    return {
      variables: this.buildVariables(authentication, invocation),
      functions: this.buildSecurityFunctions(authentication),
    };
  }

  evaluateAsBoolean(expression: CelExpression, context: CelEvaluationContext): boolean {
    let value: unknown;
    try {
      value = evaluate(expression.cst, context.variables, context.functions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PolicyEvaluationError(expression.source, reason, error);
    }

    if (typeof value !== 'boolean') {
      throw new PolicyEvaluationError(
        expression.source,
        `expected a boolean result but got ${describeType(value)}`,
      );
    }
    return value;
  }

  private buildVariables(
    authentication: Authentication,
    invocation: MethodInvocation,
  ): Record<string, unknown> {
    const { principal } = authentication;
    const params: Record<string, unknown> = {};
    invocation.parameterNames?.forEach((name, index) => {
      params[name] = invocation.args[index];
    });

    return {
      principal: {
        ...principal.attributes,
        id: principal.id,
        roles: principal.roles,
        authorities: principal.authorities ?? [],
      },
      authentication: {
        name: principal.id,
        authenticated: authentication.authenticated,
        anonymous: authentication.anonymous ?? false,
      },
      args: [...invocation.args],
      params,
      target: invocation.receiver ?? {},
      method: String(invocation.method),
      now: this.clock(),
    };
  }

  /**
   * Build security functions bound to the caller
   */
  private buildSecurityFunctions(authentication: Authentication): CelFunctions {
    const roles = new Set(authentication.principal.roles);
    const authorities = new Set(authentication.principal.authorities ?? []);
    const hasRole = (role: unknown): boolean =>
      typeof role === 'string' && roles.has(this.stripRolePrefix(role));
    const hasAuthority = (authority: unknown): boolean =>
      typeof authority === 'string' && authorities.has(authority);

    return {
      hasRole,
      hasAnyRole: (list: unknown): boolean => Array.isArray(list) && list.some(hasRole),
      hasAuthority,
      hasAnyAuthority: (list: unknown): boolean => Array.isArray(list) && list.some(hasAuthority),
      isAuthenticated: (): boolean =>
        authentication.authenticated && authentication.anonymous !== true,
      isAnonymous: (): boolean => authentication.anonymous === true,
      permitAll: (): boolean => true,
      denyAll: (): boolean => false,
    };
  }

  private stripRolePrefix(role: string): string {
    if (this.rolePrefix && role.startsWith(this.rolePrefix)) {
      return role.slice(this.rolePrefix.length);
    }
    return role;
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}
