import { invariant } from "./errors.js";
import type { Signal } from "./signal.js";

export type PortDirection = "input" | "output";

export type BundleInput = {
  name: string;
  payload: Signal;
  flipped: boolean;
};

export type BundleElement = {
  name: string;
  signal: Signal;
  flipped: boolean;
  direction: PortDirection;
};

const NUMERIC_SUFFIX = /(_[0-9]+)*$/;

export function direction(flipped: boolean): PortDirection {
  return flipped ? "input" : "output";
}

/** Trims trailing `_0_1_2` runs so appending `_<j>` cannot collide with a user name. */
export function trimNumericSuffix(name: string): string {
  return name.replace(NUMERIC_SUFFIX, "");
}

/**
 * Names unique per trimmed key stay as the key; repeated keys get `key_<j>`
 * in input order. The result lines up index for index with `raw`.
 */
export function disambiguateNames(raw: readonly string[]): string[] {
  const groups = new Map<string, number[]>();
  raw.forEach((name, i) => {
    const key = trimNumericSuffix(name);
    const members = groups.get(key);
    if (members) members.push(i);
    else groups.set(key, [i]);
  });
  const out = new Array<string>(raw.length);
  for (const [key, members] of groups) {
    if (members.length === 1) {
      out[members[0] ?? 0] = key;
    } else {
      members.forEach((i, j) => {
        out[i] = `${key}_${j}`;
      });
    }
  }
  return out;
}

/** The boundary ports a container exposes once its own dangles are resolved. */
export class AutoBundle {
  readonly elements: readonly BundleElement[];
  private readonly byName: Map<string, BundleElement>;

  constructor(elts: readonly BundleInput[]) {
    const names = disambiguateNames(elts.map((e) => e.name));
    this.elements = Object.freeze(
      elts.map((e, i) => ({
        name: names[i] ?? e.name,
        signal: e.flipped ? e.payload.cloneType().flip() : e.payload.cloneType(),
        flipped: e.flipped,
        direction: direction(e.flipped),
      })),
    );
    this.byName = new Map(this.elements.map((e) => [e.name, e]));
    invariant(
      this.byName.size === elts.length,
      `boundary bundle lost ports: ${elts.length} requested, ${this.byName.size} named`,
    );
  }

  get size(): number {
    return this.elements.length;
  }

  get names(): string[] {
    return this.elements.map((e) => e.name);
  }

  get(name: string): BundleElement | undefined {
    return this.byName.get(name);
  }
}
