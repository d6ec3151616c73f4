/**
 * Environment - maps variable names to values.
 *
 * Scopes are chained: lookups walk outward through parents. Closures hold on
 * to the scope they were created in, so a later `set` of a captured binding
 * is visible to them while a later `define` in an outer scope is not.
 */

import type { Value } from "./value";
import { RuntimeError, undefinedVariable } from "./errors";

// ============================================================================
// Environment
// ============================================================================

export class Env {
  private readonly bindings: Map<string, Value> = new Map();

  constructor(public readonly parent: Env | null = null) {}

  /**
   * Introduce (or replace) a binding in this scope.
   */
  define(name: string, value: Value): void {
    this.bindings.set(name, value);
  }

  /**
   * Look up a name through the scope chain.
   */
  get(name: string): Value | RuntimeError {
    for (let env: Env | null = this; env !== null; env = env.parent) {
      const value = env.bindings.get(name);
      if (value !== undefined) return value;
    }
    return undefinedVariable(name);
  }

  /**
   * Update the nearest existing binding. Never creates one.
   */
  set(name: string, value: Value): RuntimeError | undefined {
    for (let env: Env | null = this; env !== null; env = env.parent) {
      if (env.bindings.has(name)) {
        env.bindings.set(name, value);
        return undefined;
      }
    }
    return undefinedVariable(name);
  }

  /**
   * Check whether a name is bound anywhere in the chain.
   */
  has(name: string): boolean {
    for (let env: Env | null = this; env !== null; env = env.parent) {
      if (env.bindings.has(name)) return true;
    }
    return false;
  }

  /**
   * Check whether a name is bound in this scope itself.
   */
  hasOwn(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Names bound in this scope, in definition order.
   */
  names(): string[] {
    return Array.from(this.bindings.keys());
  }

  /**
   * Own bindings as entries.
   */
  entries(): IterableIterator<[string, Value]> {
    return this.bindings.entries();
  }

  /**
   * Create a nested scope.
   */
  child(): Env {
    return new Env(this);
  }
}
