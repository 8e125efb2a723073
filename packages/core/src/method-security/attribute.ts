/**
 * Cached outcome of resolving a target's pre-authorize declaration.
 */
export interface NoPolicyAttribute {
  readonly kind: 'none';
}

export interface ExpressionAttribute<E = unknown> {
  readonly kind: 'expression';
  /** Raw declaration as written on the method or class */
  readonly source: string;
  /** Parsed form owned by the expression engine */
  readonly expression: E;
}

export type PolicyAttribute<E = unknown> = NoPolicyAttribute | ExpressionAttribute<E>;

/**
 * Shared marker for targets without any declaration.
 */
const noPolicy: NoPolicyAttribute = { kind: 'none' };

export const NO_POLICY: NoPolicyAttribute = Object.freeze(noPolicy);

export function isNoPolicy(attribute: PolicyAttribute): attribute is NoPolicyAttribute {
  return attribute === NO_POLICY;
}

export function createExpressionAttribute<E>(source: string, expression: E): ExpressionAttribute<E> {
  const attribute: ExpressionAttribute<E> = { kind: 'expression', source, expression };
  return Object.freeze(attribute);
}
