import {
  ConnectionDirectionError,
  DoubleApplicationError,
  InvariantViolation,
  PrematureAccessError,
} from "./errors.js";
import type { Elaboration } from "./elaboration.js";
import { halfEdge, type DanglingEnd, type HalfEdge } from "./half_edge.js";
import { BaseNode, type NodeOutput } from "./node.js";
import { Wire } from "./signal.js";

export type NodeDirection = "out" | "in";

export type SimpleNodeOptions = {
  direction: NodeDirection;
  width?: number;
  omitGraphML?: boolean;
};

type Link = {
  peer: SimpleNode;
  key: HalfEdge;
};

/**
 * Point-to-point connection point carrying a `Wire`. An `out` node drives any
 * number of `in` nodes through `bind`; a node with no links surfaces as a
 * boundary port of its owner.
 */
export class SimpleNode extends BaseNode {
  readonly direction: NodeDirection;
  readonly width: number;

  private readonly outLinks: Link[] = [];
  private readonly inLinks: Link[] = [];
  private ends: DanglingEnd[] | undefined;
  private finished = false;

  constructor(ctx: Elaboration, name: string, options: SimpleNodeOptions) {
    super(ctx, name);
    this.direction = options.direction;
    this.width = options.width ?? 1;
    this.omitGraphML = options.omitGraphML ?? false;
  }

  get bound(): boolean {
    return this.outLinks.length > 0 || this.inLinks.length > 0;
  }

  bind(sink: SimpleNode): this {
    if (this.direction !== "out") {
      throw new ConnectionDirectionError(`${this.path} is an input and cannot drive ${sink.path}`);
    }
    if (sink.direction !== "in") {
      throw new ConnectionDirectionError(`${sink.path} is an output and cannot be driven by ${this.path}`);
    }
    if (this.ends || sink.ends) {
      throw new DoubleApplicationError(`cannot bind ${this.path} to ${sink.path} after instantiation`);
    }
    const key = halfEdge(this.serial, this.outLinks.length);
    this.outLinks.push({ peer: sink, key });
    sink.inLinks.push({ peer: this, key });
    return this;
  }

  /** Ends the instantiation produced; empty before it ran. */
  get dangles(): readonly DanglingEnd[] {
    return this.ends ?? [];
  }

  instantiate(): DanglingEnd[] {
    if (this.ends) {
      throw new DoubleApplicationError(`${this.path} instantiated twice`);
    }
    const ends: DanglingEnd[] = [];
    if (!this.bound) {
      const own = halfEdge(this.serial, 0);
      ends.push(this.end(own, own, this.direction === "in"));
    }
    for (const l of this.outLinks) {
      const sinkIndex = l.peer.inLinks.findIndex((x) => x.peer === this && x.key === l.key);
      ends.push(this.end(l.key, halfEdge(l.peer.serial, sinkIndex), false));
    }
    this.inLinks.forEach((l, i) => {
      ends.push(this.end(l.key, halfEdge(this.serial, i), true));
    });
    this.ends = ends;
    return ends;
  }

  /** Every receiving wire must have been driven by the time the owner is resolved. */
  finishInstantiate(): void {
    if (!this.ends) {
      throw new PrematureAccessError(`${this.path} finished before it was instantiated`);
    }
    if (this.finished) {
      throw new DoubleApplicationError(`${this.path} finished twice`);
    }
    for (const d of this.ends) {
      if (d.flipped && d.payload instanceof Wire && !d.payload.driver) {
        throw new InvariantViolation(`${this.path} input was never driven`);
      }
    }
    this.finished = true;
  }

  describe(): string {
    return `${this.direction} ${this.name} [${this.width}]`;
  }

  outputs(): NodeOutput[] {
    return this.outLinks.map((l) => ({
      target: l.peer,
      edge: { label: String(this.width), flipped: false },
    }));
  }

  private end(source: HalfEdge, sink: HalfEdge, flipped: boolean): DanglingEnd {
    return { source, sink, flipped, name: this.name, payload: new Wire(this.path, this.width) };
  }
}
