import { InvariantViolation } from "./errors.js";

/**
 * Opaque payload carried by a dangling end. The circuit layer that renders
 * ports and wires supplies the implementation.
 */
export interface Signal {
  /** A fresh signal of the same shape, unconnected. */
  cloneType(): Signal;
  /** A fresh signal of the same shape with its direction reversed. */
  flip(): Signal;
  /** Drive this signal from `source`. */
  connect(source: Signal): void;
}

/** Minimal netlist signal: a named, sized wire that remembers its driver. */
export class Wire implements Signal {
  private driverVar: Wire | undefined;

  constructor(
    readonly label: string,
    readonly width = 1,
    readonly flipped = false,
  ) {}

  get driver(): Wire | undefined {
    return this.driverVar;
  }

  cloneType(): Wire {
    return new Wire(this.label, this.width, this.flipped);
  }

  flip(): Wire {
    return new Wire(this.label, this.width, !this.flipped);
  }

  connect(source: Signal): void {
    if (!(source instanceof Wire)) {
      throw new InvariantViolation(`wire ${this.label} can only be driven by another wire`);
    }
    if (this.driverVar) {
      throw new InvariantViolation(`wire ${this.label} already driven by ${this.driverVar.label}`);
    }
    this.driverVar = source;
  }

  /** Follows drivers back to the wire nothing drives. */
  root(): Wire {
    let w: Wire = this;
    const seen = new Set<Wire>();
    while (w.driverVar) {
      if (seen.has(w)) throw new InvariantViolation(`combinational loop through ${w.label}`);
      seen.add(w);
      w = w.driverVar;
    }
    return w;
  }
}
