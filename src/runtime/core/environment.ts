/**
 * Environment
 * Lexical scope: name -> (value, mutability) with a parent chain.
 * Shared by reference between nested scopes and the closures that capture them.
 */

import { err, ok, type Result } from '../../result.js';
import type { Value } from './value.js';

export interface Binding {
  value: Value;
  readonly mutable: boolean;
}

export type EnvironmentError =
  | { readonly kind: 'undefined_variable'; readonly name: string }
  | { readonly kind: 'immutable_assignment'; readonly name: string };

export class Environment {
  private readonly bindings = new Map<string, Binding>();

  constructor(public readonly parent: Environment | null = null) {}

  /** Create or replace a binding in this scope */
  define(name: string, value: Value, mutable = true): void {
    this.bindings.set(name, { value, mutable });
  }

  get(name: string): Result<Value, EnvironmentError> {
    const binding = this.lookup(name);
    if (!binding) return err({ kind: 'undefined_variable', name });
    return ok(binding.value);
  }

  /** Update the nearest binding; fails for undefined or immutable names */
  set(name: string, value: Value): Result<Value, EnvironmentError> {
    const binding = this.lookup(name);
    if (!binding) return err({ kind: 'undefined_variable', name });
    if (!binding.mutable) return err({ kind: 'immutable_assignment', name });
    binding.value = value;
    return ok(value);
  }

  /** True when the name resolves anywhere along the chain */
  exists(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** True when the name is bound in this scope itself */
  hasOwn(name: string): boolean {
    return this.bindings.has(name);
  }

  /** Names bound in this scope, in definition order */
  names(): string[] {
    return [...this.bindings.keys()];
  }

  /** Visit the values bound in this scope (not the parents) */
  forEachValue(fn: (value: Value) => void): void {
    for (const binding of this.bindings.values()) {
      fn(binding.value);
    }
  }

  private lookup(name: string): Binding | undefined {
    for (
      let env: Environment | null = this;
      env !== null;
      env = env.parent
    ) {
      const binding = env.bindings.get(name);
      if (binding) return binding;
    }
    return undefined;
  }
}
