import { DoubleApplicationError, PrematureAccessError } from "./errors.js";
import type { Scoped } from "./scope.js";

/** Result of a body deferred until its container has been instantiated. */
export class ModuleValue<T> {
  private result: { value: T } | undefined;

  constructor(
    private readonly owner: Scoped,
    private readonly body: () => T,
  ) {}

  get ready(): boolean {
    return this.result !== undefined;
  }

  execute(): void {
    if (this.result) {
      throw new DoubleApplicationError(`deferred body of ${this.owner.name} ran twice`);
    }
    this.result = { value: this.body() };
  }

  get(): T {
    if (!this.result) {
      throw new PrematureAccessError(
        `deferred body of ${this.owner.name} was requested before the container was instantiated`,
      );
    }
    return this.result.value;
  }
}
