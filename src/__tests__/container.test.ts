import { describe, it, expect } from "vitest";
import { Container, SimpleContainer } from "../container.js";
import { Elaboration } from "../elaboration.js";
import {
  ConnectionDirectionError,
  DoubleApplicationError,
  InvariantViolation,
  PrematureAccessError,
  ScopeViolation,
} from "../errors.js";
import { halfEdge } from "../half_edge.js";
import { defaultRules } from "../rules.js";
import { Wire } from "../signal.js";
import { SimpleNode } from "../simple_node.js";
import { Consumer, FixedNode, Producer, wireOf } from "./fixtures.js";

class Widget extends Container {}

describe("naming", () => {
  it("derives the name from the declared class", () => {
    const ctx = new Elaboration();
    const w = ctx.close(new Widget(ctx));
    expect(w.className).toBe("Widget");
    expect(w.name).toBe("Widget");
  });

  it("falls back to the nearest named base class for anonymous classes", () => {
    const ctx = new Elaboration();
    const c = ctx.close(new (class extends SimpleContainer {})(ctx));
    expect(c.className).toBe("SimpleContainer");
  });

  it("lets the last suggested name win and ignores undefined", () => {
    const ctx = new Elaboration();
    const w = new Widget(ctx).suggestName("first").suggestName("second").suggestName(undefined);
    ctx.close(w, "fromClose");
    expect(w.name).toBe("second");
  });

  it("uses the close() name when none was suggested", () => {
    const ctx = new Elaboration();
    const w = ctx.close(new Widget(ctx), "widget0");
    expect(w.name).toBe("widget0");
    expect(w.desiredName).toBe("Widget");
  });

  it("refuses renames once instantiation started", () => {
    const ctx = new Elaboration();
    const w = ctx.close(new Widget(ctx), "w");
    ctx.elaborate(w);
    expect(() => w.suggestName("late")).toThrow(DoubleApplicationError);
  });
});

describe("declaration", () => {
  it("registers children in declaration order with increasing indices", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const a = ctx.close(new Widget(ctx), "a");
    const b = ctx.close(new Widget(ctx), "b");
    ctx.close(root, "root");
    expect(root.index).toBe(1);
    expect(a.index).toBe(2);
    expect(b.index).toBe(3);
    expect(root.children).toEqual([a, b]);
    expect(a.parent).toBe(root);
    expect(root.parent).toBeUndefined();
    expect(ctx.scope.current()).toBeUndefined();
  });

  it("rejects closing a container twice", () => {
    const ctx = new Elaboration();
    const w = ctx.close(new Widget(ctx), "w");
    expect(() => ctx.close(w)).toThrow(DoubleApplicationError);
  });

  it("rejects closing a parent while a child is still open", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx).suggestName("root");
    new Widget(ctx).suggestName("child");
    expect(() => ctx.close(root)).toThrow("close() applied to root before child was closed");
  });

  it("rejects nodes and deferred bodies outside any container", () => {
    const ctx = new Elaboration();
    expect(() => new SimpleNode(ctx, "stray", { direction: "out" })).toThrow(ScopeViolation);
    expect(() => ctx.defer(() => 1)).toThrow(ScopeViolation);
  });

  it("rejects registration on a container that is not the open scope", () => {
    const ctx = new Elaboration();
    const w = ctx.close(new Widget(ctx), "w");
    expect(() => w.defer(() => undefined)).toThrow(ScopeViolation);
  });

  it("rejects declarations on a container that was already instantiated", () => {
    const ctx = new Elaboration();
    const root = ctx.close(new SimpleContainer(ctx), "root");
    ctx.elaborate(root);

    expect(() => ctx.within(root, () => new SimpleNode(ctx, "late", { direction: "out" }))).toThrow(
      "node late added to root after instantiation started",
    );
    expect(() => ctx.within(root, () => ctx.defer(() => 42))).toThrow(DoubleApplicationError);
    expect(() => ctx.within(root, () => new Widget(ctx))).toThrow(DoubleApplicationError);
    expect(root.nodes).toEqual([]);
    expect(root.children).toEqual([]);
    expect(ctx.scope.depth).toBe(0);
  });

  it("lazyScope declares a named container and runs the body inside it", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const node = ctx.lazyScope("bus", () => new SimpleNode(ctx, "beat", { direction: "out" }));
    ctx.close(root, "root");
    const [bus] = root.children;
    expect(bus?.name).toBe("bus");
    expect(node.owner).toBe(bus);
    expect(ctx.scope.current()).toBeUndefined();
  });
});

describe("instantiate", () => {
  it("resolves a link between siblings internally and runs deferred bodies children first", () => {
    const ctx = new Elaboration();
    const log: string[] = [];
    const root = new SimpleContainer(ctx);
    const a = ctx.close(new Producer(ctx, log), "a");
    const b = ctx.close(new Consumer(ctx, log), "b");
    a.tx.bind(b.rx);
    ctx.defer(() => log.push("root"));
    ctx.close(root, "root");

    const result = ctx.elaborate(root);
    expect(result.auto.size).toBe(0);
    expect(result.unresolved).toEqual([]);
    expect(log).toEqual(["a", "b", "root"]);
    expect(root.links).toHaveLength(1);
    expect(wireOf(b.rx).root()).toBe(wireOf(a.tx));
    expect(a.auto.names).toEqual(["tx"]);
    expect(b.auto.get("rx")?.direction).toBe("input");
  });

  it("surfaces an unmatched end as a boundary port named after its path", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const leaf = ctx.close(new Producer(ctx), "leaf");
    ctx.close(root, "root");

    const result = ctx.elaborate(root);
    expect(result.auto.names).toEqual(["leaf_tx"]);
    expect(result.auto.get("leaf_tx")?.direction).toBe("output");
    expect(result.unresolved.map((d) => d.name)).toEqual(["root_leaf_tx"]);
    expect(result.unresolved[0]?.flipped).toBe(false);
    expect(leaf.pathName).toBe("root.leaf");
    expect(leaf.instanceName).toBe("leaf");
    expect(leaf.moduleName).toBe("Producer");
  });

  it("drives a receiving leaf from the enclosing boundary", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const leaf = ctx.close(new Consumer(ctx), "sink");
    ctx.close(root, "root");

    const result = ctx.elaborate(root);
    const top = result.auto.get("sink_rx");
    expect(top?.direction).toBe("input");
    expect(wireOf(leaf.rx).root()).toBe(top?.signal);
  });

  it("numbers colliding boundary names", () => {
    const ctx = new Elaboration();
    const leaf = new Widget(ctx);
    new SimpleNode(ctx, "d_0", { direction: "out" });
    new SimpleNode(ctx, "d", { direction: "in" });
    ctx.close(leaf, "leaf");
    expect(ctx.elaborate(leaf).auto.names).toEqual(["d_0", "d_1"]);
  });

  it("produces nothing for an empty container", () => {
    const ctx = new Elaboration();
    const empty = ctx.close(new Widget(ctx), "empty");
    const result = ctx.elaborate(empty);
    expect(result.auto.size).toBe(0);
    expect(result.unresolved).toEqual([]);
  });

  it("rejects a second instantiation without disturbing the first result", () => {
    const ctx = new Elaboration();
    const leaf = ctx.close(new Producer(ctx), "leaf");
    const first = leaf.instantiate();
    expect(() => leaf.instantiate()).toThrow(DoubleApplicationError);
    expect(leaf.auto).toBe(first.auto);
    expect(leaf.state).toBe("done");
  });

  it("rejects instantiation while a declaration is still open", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    expect(() => root.instantiate()).toThrow(ScopeViolation);
  });

  it("rejects instantiation-only accessors before instantiation", () => {
    const ctx = new Elaboration();
    const leaf = ctx.close(new Producer(ctx), "leaf");
    expect(() => leaf.auto).toThrow(PrematureAccessError);
    expect(() => leaf.pathName).toThrow(PrematureAccessError);
    expect(() => leaf.finishInstantiate()).toThrow(PrematureAccessError);
  });

  it("rejects two suppliers sharing a source key", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const key = halfEdge(99, 0);
    const end = (name: string) => ({ source: key, sink: key, flipped: false, name, payload: new Wire(name) });
    new FixedNode(ctx, "x", [end("x")]);
    new FixedNode(ctx, "y", [end("y")]);
    ctx.close(root, "root");
    expect(() => ctx.elaborate(root)).toThrow(ConnectionDirectionError);
  });

  it("rejects three ends sharing a source key", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const key = halfEdge(99, 0);
    const end = (name: string, flipped: boolean) => ({ source: key, sink: key, flipped, name, payload: new Wire(name) });
    new FixedNode(ctx, "x", [end("x", false), end("y", true), end("z", true)]);
    ctx.close(root, "root");
    expect(() => ctx.elaborate(root)).toThrow(InvariantViolation);
  });
});

describe("root policy", () => {
  function declare(ctx: Elaboration): Container {
    const root = new SimpleContainer(ctx);
    ctx.close(new Producer(ctx), "leaf");
    return ctx.close(root, "root");
  }

  it("throws on unresolved ends when configured to", () => {
    const ctx = new Elaboration({ ...defaultRules, elaboration: { unresolved_roots: "error" } });
    expect(() => ctx.elaborate(declare(ctx))).toThrow("root left 1 end(s) unresolved: root_leaf_tx (output)");
  });

  it("warns once per unresolved end when configured to", () => {
    const lines: string[] = [];
    const ctx = new Elaboration({ ...defaultRules, elaboration: { unresolved_roots: "warn" } }, (m) => lines.push(m));
    ctx.elaborate(declare(ctx));
    expect(lines).toEqual(["root: unresolved root_leaf_tx (output)"]);
  });

  it("refuses to elaborate a non-root", () => {
    const ctx = new Elaboration();
    const root = new SimpleContainer(ctx);
    const leaf = ctx.close(new Producer(ctx), "leaf");
    ctx.close(root, "root");
    expect(() => ctx.elaborate(leaf)).toThrow(ScopeViolation);
  });
});
