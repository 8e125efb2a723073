/**
 * Method Security Types
 *
 * Shapes exchanged between the interception layer, the authentication
 * supplier and the pre-authorization decision manager.
 */

// =============================================================================
// Identity
// =============================================================================

export interface Principal {
  /** Unique identifier for the principal (user, service, etc.) */
  id: string;
  /** Roles assigned to this principal, without any role prefix */
  roles: string[];
  /** Fine-grained authorities (e.g., 'document:write') */
  authorities?: string[];
  /** Additional attributes for policy evaluation */
  attributes: Record<string, unknown>;
}

export interface Authentication {
  principal: Principal;
  /** Whether the caller presented valid credentials */
  authenticated: boolean;
  /** Set for the anonymous identity used on unauthenticated paths */
  anonymous?: boolean;
}

/**
 * Zero-argument identity retrieval. Called at most once per check, and only
 * when a policy applies to the target.
 */
export type AuthenticationSupplier = () => Authentication;

// =============================================================================
// Invocation
// =============================================================================

/**
 * Constructor of the concrete class declaring the invoked method.
 */
export type TargetType = abstract new (...args: never[]) => unknown;

export type MethodKey = string | symbol;

export interface MethodInvocation {
  /** Name of the invoked method */
  readonly method: MethodKey;
  /** Instance the method is invoked on */
  readonly receiver?: object;
  /** Arguments in call order */
  readonly args: readonly unknown[];
  /** Parameter names aligned with `args`, when the interceptor knows them */
  readonly parameterNames?: readonly string[];
}

export interface MethodAuthorizationContext {
  /**
   * Concrete implementing class. Proxy and override indirection is resolved
   * by the interceptor before the context reaches the decision manager.
   */
  readonly targetType: TargetType;
  readonly invocation: MethodInvocation;
}

/**
 * Cache identity of an invocable unit: declaring type plus method key.
 */
export interface PolicyTarget {
  readonly type: TargetType;
  readonly method: MethodKey;
}

export function targetOf(context: MethodAuthorizationContext): PolicyTarget {
  return { type: context.targetType, method: context.invocation.method };
}

export function describeTarget(target: PolicyTarget): string {
  const typeName = target.type.name || '<anonymous>';
  return `${typeName}.${String(target.method)}`;
}

// =============================================================================
// Decisions
// =============================================================================

export class AuthorizationDecision {
  constructor(public readonly granted: boolean) {}

  isGranted(): boolean {
    return this.granted;
  }

  toString(): string {
    return `AuthorizationDecision [granted=${this.granted}]`;
  }
}

/**
 * Produces a decision for a secured object, or `undefined` to abstain.
 */
export interface AuthorizationManager<T> {
  check(authentication: AuthenticationSupplier, object: T): AuthorizationDecision | undefined;
}
