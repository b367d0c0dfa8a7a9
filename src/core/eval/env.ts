// src/core/eval/env.ts
// Variable environments: parent-linked scopes.
//
// Reads walk the whole chain, across call boundaries, so a callee sees its
// caller's variables. Writes update the nearest existing binding inside the
// current call frame and otherwise bind in the innermost scope; they never
// cross a call boundary, so a callee cannot modify its caller's variables.

export type ScopeKind = "global" | "call" | "block";

export class Scope {
  private readonly vars = new Map<string, number>();

  private constructor(
    public readonly kind: ScopeKind,
    public readonly parent?: Scope
  ) {}

  static global(): Scope {
    return new Scope("global");
  }

  /** Scope for a function activation, chained to the caller's current scope. */
  enterCall(parameters: ReadonlyArray<readonly [string, number]>): Scope {
    const frame = new Scope("call", this);
    for (const [name, value] of parameters) frame.vars.set(name, value);
    return frame;
  }

  enterBlock(): Scope {
    return new Scope("block", this);
  }

  lookup(name: string): number | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      const value = scope.vars.get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  assign(name: string, value: number): void {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      if (scope.vars.has(name)) {
        scope.vars.set(name, value);
        return;
      }
      if (scope.kind !== "block") break;
    }
    this.vars.set(name, value);
  }
}
