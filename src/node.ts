import { ScopeViolation } from "./errors.js";
import type { Container } from "./container.js";
import type { Elaboration } from "./elaboration.js";
import type { DanglingEnd } from "./half_edge.js";

export type RenderedEdge = {
  colour?: string;
  label: string;
  flipped: boolean;
};

export type NodeOutput = {
  target: ConnectionPoint;
  edge: RenderedEdge;
};

/** What the elaboration core needs from a connection point. */
export interface ConnectionPoint {
  readonly serial: number;
  readonly owner: Container;
  readonly name: string;
  readonly omitGraphML: boolean;
  /** Dangling ends in a stable order; called once, during the owner's instantiation. */
  instantiate(): DanglingEnd[];
  /** Called after every dangle in the owner's subtree is resolved. */
  finishInstantiate(): void;
  describe(): string;
  outputs(): NodeOutput[];
}

/** Registers itself with the open container and takes the next serial. */
export abstract class BaseNode implements ConnectionPoint {
  readonly serial: number;
  readonly owner: Container;
  omitGraphML = false;

  constructor(
    ctx: Elaboration,
    readonly name: string,
  ) {
    const owner = ctx.scope.current();
    if (!owner) {
      throw new ScopeViolation(`node ${name} created outside any container`);
    }
    this.owner = owner;
    this.serial = ctx.nextSerial();
    owner.register(this);
  }

  get path(): string {
    return `${this.owner.name}.${this.name}`;
  }

  abstract instantiate(): DanglingEnd[];

  finishInstantiate(): void {}

  describe(): string {
    return this.name;
  }

  outputs(): NodeOutput[] {
    return [];
  }
}
