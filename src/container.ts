import { AutoBundle } from "./auto_bundle.js";
import {
  DoubleApplicationError,
  InvariantViolation,
  PrematureAccessError,
  ScopeViolation,
} from "./errors.js";
import { pairDangles, type DanglingEnd, type ResolvedLink } from "./half_edge.js";
import type { Elaboration } from "./elaboration.js";
import type { ConnectionPoint } from "./node.js";

export type InstantiationState = "declared" | "instantiating" | "done";

export type InstanceResult = {
  auto: AutoBundle;
  dangles: DanglingEnd[];
};

function findClassName(obj: object): string {
  let proto: object | null = Object.getPrototypeOf(obj);
  while (proto) {
    const ctor: unknown = Reflect.get(proto, "constructor");
    if (typeof ctor === "function" && ctor.name) return ctor.name;
    proto = Object.getPrototypeOf(proto);
  }
  return "Container";
}

/**
 * A node of the declaration tree. Constructing one registers it with the open
 * scope and opens it; `Elaboration.close` closes it again. Nothing is wired
 * until `instantiate` runs.
 *
 * ```ts
 * class Adder extends Container {
 *   readonly a = new SimpleNode(this.ctx, "a", { direction: "in", width: 8 });
 *   readonly sum = new SimpleNode(this.ctx, "sum", { direction: "out", width: 9 });
 * }
 * const adder = ctx.close(new Adder(ctx), "adder");
 * ```
 */
export class Container {
  readonly index: number;
  readonly parent: Container | undefined;

  private readonly childList: Container[] = [];
  private readonly nodeList: ConnectionPoint[] = [];
  private readonly actions: Array<() => void> = [];
  private suggestedNameVar: string | undefined;
  private site: string | undefined;
  private closedVar = false;
  private stateVar: InstantiationState = "declared";
  private instance: InstanceResult | undefined;
  private linkList: ResolvedLink[] = [];

  constructor(readonly ctx: Elaboration) {
    this.parent = ctx.scope.current();
    this.index = ctx.nextIndex();
    this.parent?.register(this);
    ctx.scope.enter(this);
  }

  get className(): string {
    return findClassName(this);
  }

  get desiredName(): string {
    return this.className;
  }

  get suggestedName(): string {
    return this.suggestedNameVar ?? this.className;
  }

  get name(): string {
    return this.suggestedName;
  }

  /** Declaration site, formatted for messages; empty when unknown. */
  get line(): string {
    return this.site ? ` (${this.site})` : "";
  }

  get closed(): boolean {
    return this.closedVar;
  }

  get state(): InstantiationState {
    return this.stateVar;
  }

  get children(): readonly Container[] {
    return this.childList;
  }

  get nodes(): readonly ConnectionPoint[] {
    return this.nodeList;
  }

  get parents(): Container[] {
    const out: Container[] = [];
    for (let p = this.parent; p; p = p.parent) out.push(p);
    return out;
  }

  /** Last defined name wins; `undefined` is ignored. */
  suggestName(x: string | undefined): this {
    if (x === undefined) return this;
    if (this.stateVar !== "declared") {
      throw new DoubleApplicationError(`cannot rename ${this.name} to ${x} after instantiation started${this.line}`);
    }
    this.suggestedNameVar = x;
    return this;
  }

  private requireDeclaring(what: string): void {
    if (this.stateVar !== "declared") {
      throw new DoubleApplicationError(`${what} added to ${this.name} after instantiation started${this.line}`);
    }
  }

  register(item: Container | ConnectionPoint): void {
    this.requireDeclaring(item instanceof Container ? `container ${item.name}` : `node ${item.name}`);
    const top = this.ctx.scope.current();
    if (top !== this) {
      const what = item instanceof Container ? `container ${item.name}` : `node ${item.name}`;
      const open = top ? `${top.name} is open` : "no container is open";
      throw new ScopeViolation(`${what} registered with ${this.name} but ${open}${this.line}`);
    }
    if (item instanceof Container) {
      this.childList.push(item);
      return;
    }
    if (item.owner !== this) {
      throw new InvariantViolation(`node ${item.name} belongs to ${item.owner.name}, not ${this.name}`);
    }
    this.nodeList.push(item);
  }

  defer(action: () => void): void {
    this.requireDeclaring("deferred action");
    if (this.ctx.scope.current() !== this) {
      throw new ScopeViolation(`deferred action registered with ${this.name} while it is not the open scope${this.line}`);
    }
    this.actions.push(action);
  }

  /** @internal Called by `Elaboration.close` after the scope check. */
  markClosed(name: string | undefined, site: string | undefined): void {
    this.closedVar = true;
    this.site = site;
    if (this.suggestedNameVar === undefined) this.suggestName(name);
  }

  private requireInstance(what: string): InstanceResult {
    if (!this.instance) {
      throw new PrematureAccessError(`${this.name}.${what} accessed before ${this.name} was instantiated${this.line}`);
    }
    return this.instance;
  }

  get auto(): AutoBundle {
    return this.requireInstance("auto").auto;
  }

  get dangles(): readonly DanglingEnd[] {
    return this.requireInstance("dangles").dangles;
  }

  /** Dangling-end pairs resolved inside this container. */
  get links(): readonly ResolvedLink[] {
    this.requireInstance("links");
    return this.linkList;
  }

  get moduleName(): string {
    this.requireInstance("moduleName");
    return this.desiredName;
  }

  get pathName(): string {
    this.requireInstance("pathName");
    return [...this.parents.reverse(), this].map((c) => c.name).join(".");
  }

  get instanceName(): string {
    this.requireInstance("instanceName");
    return this.name;
  }

  get omitGraphML(): boolean {
    return !this.nodeList.some((n) => !n.omitGraphML) && !this.childList.some((c) => !c.omitGraphML);
  }

  nodeIterator(fn: (c: Container) => void): void {
    fn(this);
    for (const c of this.childList) c.nodeIterator(fn);
  }

  instantiate(): InstanceResult {
    if (this.stateVar !== "declared") {
      throw new DoubleApplicationError(`${this.name} instantiated while already ${this.stateVar}${this.line}`);
    }
    const open = this.ctx.scope.current();
    if (open) {
      throw new ScopeViolation(`${this.name} instantiated before ${open.name} was closed${this.line}`);
    }
    this.stateVar = "instantiating";

    const childDangles = this.childList.flatMap((c) => {
      const r = c.instantiate();
      c.finishInstantiate();
      return r.dangles;
    });
    const nodeDangles = this.nodeList.flatMap((n) => n.instantiate());

    const { links, forward } = pairDangles([...nodeDangles, ...childDangles], this.name);
    for (const l of links) l.sink.payload.connect(l.source.payload);
    this.linkList = links;

    const auto = new AutoBundle(forward.map((d) => ({ name: d.name, payload: d.payload, flipped: d.flipped })));
    const dangles = forward.map((d, i) => {
      const port = auto.elements[i];
      if (!port) throw new InvariantViolation(`${this.name}: no boundary port for ${d.name}`);
      if (d.flipped) d.payload.connect(port.signal);
      else port.signal.connect(d.payload);
      return { ...d, payload: port.signal, name: `${this.name}_${d.name}` };
    });
    this.instance = { auto, dangles };

    for (const action of this.actions) action();
    this.stateVar = "done";
    return this.instance;
  }

  /** Second pass over this container's nodes, once every dangle below it is resolved. */
  finishInstantiate(): void {
    if (this.stateVar !== "done") {
      throw new PrematureAccessError(`${this.name} finished before it was instantiated${this.line}`);
    }
    for (const n of this.nodeList) n.finishInstantiate();
  }
}

/** A container with no declarations of its own. */
export class SimpleContainer extends Container {}
