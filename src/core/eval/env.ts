// src/core/eval/env.ts
// Environment frames. `define` writes into the frame it is given; lookups
// walk outward through parents.

import type { Val } from "./values";

export class Env {
  private readonly frame = new Map<string, Val>();

  constructor(readonly parent?: Env) {}

  define(name: string, v: Val): Val {
    this.frame.set(name, v);
    return v;
  }

  lookup(name: string): Val | undefined {
    const v = this.frame.get(name);
    if (v !== undefined) return v;
    return this.parent?.lookup(name);
  }

  has(name: string): boolean {
    return this.frame.has(name) || (this.parent?.has(name) ?? false);
  }

  /** New child frame holding `binds`; this frame is left untouched. */
  extend(binds: Iterable<[string, Val]>): Env {
    const child = new Env(this);
    for (const [name, v] of binds) child.define(name, v);
    return child;
  }

  /** Bindings of this frame only, in definition order. */
  entries(): Array<[string, Val]> {
    return [...this.frame.entries()];
  }

  names(): string[] {
    return [...this.frame.keys()];
  }

  get size(): number {
    return this.frame.size;
  }

  clear(): void {
    this.frame.clear();
  }
}

export function envEmpty(): Env {
  return new Env();
}

export function envExtend(env: Env, binds: Array<[string, Val]>): Env {
  return env.extend(binds);
}
