import { direction, type AutoBundle } from "./auto_bundle.js";
import { Container, SimpleContainer } from "./container.js";
import {
  DoubleApplicationError,
  ScopeViolation,
  UnresolvedBoundaryError,
} from "./errors.js";
import type { DanglingEnd } from "./half_edge.js";
import { ModuleValue } from "./module_value.js";
import { defaultRules, type ElaborationRules } from "./rules.js";
import { ScopeStack } from "./scope.js";

export type WarnFn = (msg: string) => void;

export type ElaborationStats = {
  containers: number;
  nodes: number;
  links: number;
  boundaryPorts: number;
};

export type ElaborationResult = {
  root: Container;
  auto: AutoBundle;
  unresolved: DanglingEnd[];
  stats: ElaborationStats;
};

export function collectStats(root: Container): ElaborationStats {
  const stats: ElaborationStats = { containers: 0, nodes: 0, links: 0, boundaryPorts: 0 };
  root.nodeIterator((c) => {
    stats.containers += 1;
    stats.nodes += c.nodes.length;
    if (c.state === "done") {
      stats.links += c.links.length;
      stats.boundaryPorts += c.auto.size;
    }
  });
  return stats;
}

/**
 * State for one declaration + instantiation pass: the scope stack and the
 * counters for container indices and node serials.
 */
export class Elaboration {
  readonly scope = new ScopeStack<Container>();
  private lastIndex = 0;
  private lastSerial = 0;

  constructor(
    readonly rules: ElaborationRules = defaultRules,
    readonly warn: WarnFn = console.error,
  ) {}

  /** Container indices start at 1. */
  nextIndex(): number {
    this.lastIndex += 1;
    return this.lastIndex;
  }

  nextSerial(): number {
    this.lastSerial += 1;
    return this.lastSerial;
  }

  /**
   * Closes the declaration of `c`, which must be the open scope. Suggests
   * `name` unless a name was already suggested.
   */
  close<T extends Container>(c: T, name?: string, site?: string): T {
    const where = site ? ` (${site})` : "";
    if (c.closed) {
      throw new DoubleApplicationError(`close() applied to ${c.name} twice${where}`);
    }
    const top = this.scope.current();
    if (!top) {
      throw new ScopeViolation(`close() applied to ${c.name} but no container is open${where}`);
    }
    if (top !== c) {
      throw new ScopeViolation(`close() applied to ${c.name} before ${top.name} was closed${where}`);
    }
    this.scope.exit(c);
    c.markClosed(name, site);
    return c;
  }

  /** Runs `body` with `c` as the open scope, so declarations inside land in `c`. */
  within<R>(c: Container, body: () => R): R {
    return this.scope.within(c, body);
  }

  /** Declares an empty container named `name` and runs `body` inside it. */
  lazyScope<R>(name: string, body: (scope: Container) => R): R {
    const scope = this.close(new SimpleContainer(this), name);
    return this.within(scope, () => body(scope));
  }

  /** Queues `body` on the open container; its value is available once that container is instantiated. */
  defer<T>(body: () => T): ModuleValue<T> {
    const scope = this.scope.current();
    if (!scope) {
      throw new ScopeViolation("defer() invoked outside a container");
    }
    const out = new ModuleValue(scope, body);
    scope.defer(() => out.execute());
    return out;
  }

  elaborate(root: Container): ElaborationResult {
    if (root.parent) {
      throw new ScopeViolation(`${root.name} is declared inside ${root.parent.name} and cannot be elaborated as a root`);
    }
    const { auto, dangles } = root.instantiate();
    root.finishInstantiate();

    if (dangles.length > 0) {
      const ends = dangles.map((d) => `${d.name} (${direction(d.flipped)})`);
      switch (this.rules.elaboration.unresolved_roots) {
        case "error":
          throw new UnresolvedBoundaryError(`${root.name} left ${ends.length} end(s) unresolved: ${ends.join(", ")}`, ends);
        case "warn":
          for (const e of ends) this.warn(`${root.name}: unresolved ${e}`);
          break;
        case "discard":
          break;
      }
    }
    return { root, auto, unresolved: dangles, stats: collectStats(root) };
  }
}
