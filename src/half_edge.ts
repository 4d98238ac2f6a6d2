import { ConnectionDirectionError, InvariantViolation } from "./errors.js";
import type { Signal } from "./signal.js";

/** Ordering key: `serial` of the producing connection point, `index` among its outputs. */
export type HalfEdge = {
  readonly serial: number;
  readonly index: number;
};

/**
 * One still-unresolved endpoint of a connection.
 * `flipped` ends receive; unflipped ends supply.
 */
export type DanglingEnd = {
  source: HalfEdge;
  sink: HalfEdge;
  flipped: boolean;
  name: string;
  payload: Signal;
};

export type ResolvedLink = {
  key: HalfEdge;
  source: DanglingEnd;
  sink: DanglingEnd;
};

export type Pairing = {
  links: ResolvedLink[];
  forward: DanglingEnd[];
};

export function halfEdge(serial: number, index: number): HalfEdge {
  return { serial, index };
}

export function compareHalfEdge(a: HalfEdge, b: HalfEdge): number {
  return a.serial - b.serial || a.index - b.index;
}

export function halfEdgeKey(e: HalfEdge): string {
  return `${e.serial}:${e.index}`;
}

/** Groups by `source`, groups ordered by ascending key, members in input order. */
export function groupBySource(dangles: readonly DanglingEnd[]): DanglingEnd[][] {
  const groups = new Map<string, { key: HalfEdge; members: DanglingEnd[] }>();
  for (const d of dangles) {
    const k = halfEdgeKey(d.source);
    const g = groups.get(k);
    if (g) {
      g.members.push(d);
    } else {
      groups.set(k, { key: d.source, members: [d] });
    }
  }
  return Array.from(groups.values())
    .sort((a, b) => compareHalfEdge(a.key, b.key))
    .map((g) => g.members);
}

/**
 * Splits dangles into matched source/sink pairs and ends that must be forwarded
 * to the enclosing container. Does not connect anything.
 */
export function pairDangles(dangles: readonly DanglingEnd[], where: string): Pairing {
  const links: ResolvedLink[] = [];
  const forward: DanglingEnd[] = [];
  for (const group of groupBySource(dangles)) {
    const [a, b] = group;
    if (group.length === 1 && a) {
      forward.push(a);
      continue;
    }
    if (group.length !== 2 || !a || !b) {
      const key = group[0] ? halfEdgeKey(group[0].source) : "?";
      throw new InvariantViolation(
        `${where}: ${group.length} dangling ends share source ${key} (${group.map((d) => d.name).join(", ")})`,
      );
    }
    if (a.flipped === b.flipped) {
      const role = a.flipped ? "receivers" : "suppliers";
      throw new ConnectionDirectionError(
        `${where}: ${a.name} and ${b.name} are both ${role} for source ${halfEdgeKey(a.source)}`,
      );
    }
    const [sink, source] = a.flipped ? [a, b] : [b, a];
    links.push({ key: a.source, source, sink });
  }
  return { links, forward };
}
