import { ScopeViolation } from "./errors.js";

export type Scoped = {
  readonly name: string;
};

/** Stack of open declaration scopes. One per elaboration, never shared. */
export class ScopeStack<T extends Scoped> {
  private readonly stack: T[] = [];

  get depth(): number {
    return this.stack.length;
  }

  current(): T | undefined {
    return this.stack[this.stack.length - 1];
  }

  enter(scope: T): void {
    this.stack.push(scope);
  }

  exit(scope: T): void {
    const top = this.current();
    if (!top) {
      throw new ScopeViolation(`${scope.name} tried to exit, but scope was empty`);
    }
    if (top !== scope) {
      throw new ScopeViolation(`${scope.name} exited before ${top.name} was closed`);
    }
    this.stack.pop();
  }

  /**
   * Runs `body` with `scope` open. The body must leave `scope` on top again.
   * However the body ends, the stack is cut back to where it was before the call.
   */
  within<R>(scope: T, body: () => R): R {
    const saved = this.stack.length;
    this.enter(scope);
    try {
      const out = body();
      this.exit(scope);
      return out;
    } finally {
      if (this.stack.length > saved) this.stack.length = saved;
    }
  }
}
