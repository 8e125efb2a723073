/**
 * @fileoverview Per-target cache of resolved policy attributes
 */

import type { MethodKey, PolicyTarget, TargetType } from '../types/method-security.types';

/**
 * Registry statistics for monitoring
 */
export interface RegistryStats {
  /** Number of resolved targets */
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  /** Hit rate as a fraction between 0 and 1 */
  readonly hitRate: number;
}

/**
 * Memoizes one attribute per target for the life of the registry.
 *
 * Entries are keyed by the target's declaring type and method key, never by
 * the context object that carried them, and are never evicted: declarations
 * are static once classes are loaded.
 *
 * The check-resolve-store sequence in {@link getAttribute} is synchronous, so
 * concurrently in-flight checks on the event loop cannot interleave inside it
 * and each target resolves at most once. A resolution that throws stores
 * nothing.
 */
export abstract class AbstractExpressionAttributeRegistry<A extends object> {
  private readonly cache: Map<TargetType, Map<MethodKey, A>> = new Map();
  private resolved = 0;
  private hits = 0;
  private misses = 0;

  getAttribute(target: PolicyTarget): A {
    const cached = this.cache.get(target.type)?.get(target.method);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const attribute = this.resolveAttribute(target);
    this.store(target, attribute);
    return attribute;
  }

  /**
   * Locate and parse the declaration for a target that has not been seen yet.
   */
  protected abstract resolveAttribute(target: PolicyTarget): A;

  get size(): number {
    return this.resolved;
  }

  getStats(): RegistryStats {
    const total = this.hits + this.misses;
    return {
      size: this.resolved,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  private store(target: PolicyTarget, attribute: A): void {
    // Read again: resolution may itself have stored entries for this type
    let methods = this.cache.get(target.type);
    if (!methods) {
      methods = new Map();
      this.cache.set(target.type, methods);
    }
    methods.set(target.method, attribute);
    this.resolved++;
  }
}
