import { Container } from "../container.js";
import type { Elaboration } from "../elaboration.js";
import type { DanglingEnd } from "../half_edge.js";
import { BaseNode } from "../node.js";
import { Wire } from "../signal.js";
import { SimpleNode } from "../simple_node.js";

export class Producer extends Container {
  readonly tx = new SimpleNode(this.ctx, "tx", { direction: "out", width: 8 });

  constructor(ctx: Elaboration, log: string[] = []) {
    super(ctx);
    ctx.defer(() => log.push(this.name));
  }
}

export class Consumer extends Container {
  readonly rx = new SimpleNode(this.ctx, "rx", { direction: "in", width: 8 });

  constructor(ctx: Elaboration, log: string[] = []) {
    super(ctx);
    ctx.defer(() => log.push(this.name));
  }
}

/** Emits whatever dangles it was given, to drive the pairing rules directly. */
export class FixedNode extends BaseNode {
  constructor(
    ctx: Elaboration,
    name: string,
    private readonly ends: DanglingEnd[],
  ) {
    super(ctx, name);
  }

  instantiate(): DanglingEnd[] {
    return this.ends;
  }
}

export function wireOf(node: SimpleNode, i = 0): Wire {
  const payload = node.dangles[i]?.payload;
  if (!(payload instanceof Wire)) throw new Error(`${node.path} has no wire at ${i}`);
  return payload;
}
