import { describe, it, expect } from "vitest";
import { AutoBundle, disambiguateNames, trimNumericSuffix } from "../auto_bundle.js";
import { Wire } from "../signal.js";

describe("trimNumericSuffix", () => {
  it("strips every trailing _<digits> run", () => {
    expect(trimNumericSuffix("a_0_1")).toBe("a");
    expect(trimNumericSuffix("bus_07")).toBe("bus");
    expect(trimNumericSuffix("x_y")).toBe("x_y");
    expect(trimNumericSuffix("mem2")).toBe("mem2");
  });
});

describe("disambiguateNames", () => {
  it("numbers repeated keys in input order", () => {
    expect(disambiguateNames(["a_0", "a_0", "b", "a_0_1"])).toEqual(["a_0", "a_1", "b", "a_2"]);
  });

  it("keeps the trimmed key for names that do not collide", () => {
    expect(disambiguateNames(["clk_3", "rst"])).toEqual(["clk", "rst"]);
  });

  it("handles an empty input", () => {
    expect(disambiguateNames([])).toEqual([]);
  });
});

describe("AutoBundle", () => {
  it("creates one fresh port per input, flipped for receiving ends", () => {
    const tx = new Wire("tx", 8);
    const rx = new Wire("rx", 4);
    const bundle = new AutoBundle([
      { name: "tx", payload: tx, flipped: false },
      { name: "rx", payload: rx, flipped: true },
    ]);
    expect(bundle.names).toEqual(["tx", "rx"]);
    const out = bundle.get("tx");
    const inp = bundle.get("rx");
    expect(out?.direction).toBe("output");
    expect(inp?.direction).toBe("input");
    expect(out?.signal).not.toBe(tx);
    expect(out?.signal).toBeInstanceOf(Wire);
    const inWire = inp?.signal;
    expect(inWire).toBeInstanceOf(Wire);
    if (inWire instanceof Wire) {
      expect(inWire.flipped).toBe(true);
      expect(inWire.width).toBe(4);
    }
  });

  it("preserves count and order when names collide", () => {
    const w = new Wire("w");
    const bundle = new AutoBundle(
      ["a_0", "a_0", "b", "a_0_1"].map((name) => ({ name, payload: w, flipped: false })),
    );
    expect(bundle.size).toBe(4);
    expect(bundle.names).toEqual(["a_0", "a_1", "b", "a_2"]);
    expect(new Set(bundle.names).size).toBe(4);
  });
});
