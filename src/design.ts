import fs from "fs";
import yaml from "js-yaml";
import type { PortDirection } from "./auto_bundle.js";
import { Container } from "./container.js";
import type { Elaboration } from "./elaboration.js";
import { DesignError } from "./errors.js";
import type { ModuleValue } from "./module_value.js";
import { Wire } from "./signal.js";
import { SimpleNode, type NodeDirection } from "./simple_node.js";
import { asArray, asNum, isRecord } from "./util.js";

export type PointSpec = {
  name: string;
  direction: NodeDirection;
  width: number;
};

export type LinkSpec = {
  from: string;
  to: string;
};

export type ContainerSpec = {
  name: string;
  class?: string;
  points: PointSpec[];
  children: ContainerSpec[];
  links: LinkSpec[];
};

export type PortSummary = {
  name: string;
  direction: PortDirection;
  width?: number;
};

export type BoundaryReport = Array<{
  path: string;
  ports: PortSummary[];
}>;

function requireName(v: unknown, where: string): string {
  if (typeof v !== "string" || v.trim().length === 0) {
    throw new DesignError(`${where}: missing name`);
  }
  return v.trim();
}

function parsePoint(raw: unknown, where: string): PointSpec {
  if (!isRecord(raw)) throw new DesignError(`${where}: point must be a mapping`);
  const name = requireName(raw.name, where);
  const direction = raw.direction;
  if (direction !== "in" && direction !== "out") {
    throw new DesignError(`${where}.${name}: direction must be "in" or "out"`);
  }
  return { name, direction, width: asNum(raw.width) ?? 1 };
}

function parseLink(raw: unknown, where: string): LinkSpec {
  if (!isRecord(raw) || typeof raw.from !== "string" || typeof raw.to !== "string") {
    throw new DesignError(`${where}: link needs string "from" and "to"`);
  }
  return { from: raw.from, to: raw.to };
}

function uniqueNames(names: string[], where: string): void {
  const seen = new Set<string>();
  for (const n of names) {
    if (seen.has(n)) throw new DesignError(`${where}: duplicate name ${n}`);
    seen.add(n);
  }
}

export function parseDesign(raw: unknown, where = "design"): ContainerSpec {
  if (!isRecord(raw)) throw new DesignError(`${where}: container must be a mapping`);
  const name = requireName(raw.name, where);
  const here = where === "design" ? name : `${where}.${name}`;
  const points = asArray<unknown>(raw.points).map((p) => parsePoint(p, here));
  const children = asArray<unknown>(raw.children).map((c) => parseDesign(c, here));
  const links = asArray<unknown>(raw.links).map((l) => parseLink(l, here));
  uniqueNames([...points.map((p) => p.name), ...children.map((c) => c.name)], here);
  const spec: ContainerSpec = { name, points, children, links };
  if (typeof raw.class === "string" && raw.class.length > 0) spec.class = raw.class;
  return spec;
}

export function loadDesign(path: string): ContainerSpec {
  return parseDesign(yaml.load(fs.readFileSync(path, "utf8")));
}

/** A container declared from a `ContainerSpec`; records its boundary once instantiated. */
export class DesignContainer extends Container {
  readonly points = new Map<string, SimpleNode>();
  readonly kids = new Map<string, DesignContainer>();
  readonly boundary: ModuleValue<PortSummary[]>;

  constructor(
    ctx: Elaboration,
    readonly spec: ContainerSpec,
    declaredAt: string,
  ) {
    super(ctx);
    for (const p of spec.points) {
      this.points.set(p.name, new SimpleNode(ctx, p.name, { direction: p.direction, width: p.width }));
    }
    for (const k of spec.children) {
      this.kids.set(k.name, declareDesign(ctx, k, `${declaredAt}.${k.name}`));
    }
    for (const l of spec.links) {
      this.endpoint(l.from, declaredAt).bind(this.endpoint(l.to, declaredAt));
    }
    this.boundary = ctx.defer(() =>
      this.auto.elements.map((e) => ({
        name: e.name,
        direction: e.direction,
        width: e.signal instanceof Wire ? e.signal.width : undefined,
      })),
    );
  }

  get desiredName(): string {
    return this.spec.class ?? this.className;
  }

  private endpoint(ref: string, where: string): SimpleNode {
    const parts = ref.split(".");
    const [first, second] = parts;
    const node =
      parts.length === 1 && first !== undefined
        ? this.points.get(first)
        : parts.length === 2 && first !== undefined && second !== undefined
          ? this.kids.get(first)?.points.get(second)
          : undefined;
    if (!node) throw new DesignError(`${where}: unknown link endpoint ${ref}`);
    return node;
  }
}

export function declareDesign(ctx: Elaboration, spec: ContainerSpec, declaredAt = spec.name): DesignContainer {
  return ctx.close(new DesignContainer(ctx, spec, declaredAt), spec.name, declaredAt);
}

export function boundaryReport(root: Container): BoundaryReport {
  const out: BoundaryReport = [];
  root.nodeIterator((c) => {
    if (c instanceof DesignContainer) out.push({ path: c.pathName, ports: c.boundary.get() });
  });
  return out;
}
