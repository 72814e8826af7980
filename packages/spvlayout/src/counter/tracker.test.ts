import { describe, it, expect } from "vitest";

import { Types, type Annotations, type Declaration, type Type } from "#types";
import { TypeTable, TypeTranslator } from "#translator";
import { Diagnostics } from "#diagnostics";
import { resolveOptions } from "#options";

import { CounterTracker } from "./tracker";
import { Association } from "./association";

const { uint } = Types;
const append = Types.opaque("AppendStructuredBuffer", uint);
const consume = Types.opaque("ConsumeStructuredBuffer", uint);
const rw = Types.opaque("RWStructuredBuffer", uint);

// struct S { AppendStructuredBuffer<uint> a; int pad; ConsumeStructuredBuffer<uint> b; }
const S = Types.struct("S", [
  Types.field("a", append),
  Types.field("pad", Types.int),
  Types.field("b", consume),
]);

function setup() {
  const diagnostics = new Diagnostics();
  const translator = new TypeTranslator(
    new TypeTable(),
    resolveOptions(),
    diagnostics,
  );
  const tracker = new CounterTracker(translator, diagnostics);
  return { diagnostics, translator, tracker };
}

function variable(
  name: string,
  type: Type,
  scope: "global" | "local",
  annotations?: Annotations,
): Declaration.Variable {
  return {
    kind: "variable",
    id: name,
    name,
    type,
    scope,
    loc: { offset: 100, length: name.length },
    annotations,
  };
}

describe("CounterTracker", () => {
  describe("discovery", () => {
    it("should find buffers with counters at their field paths", () => {
      const { tracker } = setup();

      const associations = tracker.register(variable("s", S, "local"));

      expect(associations.map((association) => association.path)).toEqual([
        [0],
        [2],
      ]);
      expect(associations.every(Association.isAlias)).toBe(true);
      expect(tracker.counters().map((counter) => counter.name)).toEqual([
        "counter.s.a",
        "counter.s.b",
      ]);
    });

    it("should walk nested structs depth-first", () => {
      const { tracker } = setup();
      const Outer = Types.struct("Outer", [
        Types.field("inner", S),
        Types.field("c", rw),
      ]);

      const associations = tracker.register(variable("o", Outer, "local"));

      expect(associations.map((association) => association.path)).toEqual([
        [0, 0],
        [0, 2],
        [1],
      ]);
      expect(tracker.counters().map((counter) => counter.name)).toEqual([
        "counter.o.inner.a",
        "counter.o.inner.b",
        "counter.o.c",
      ]);
    });

    it("should give global buffers a direct counter", () => {
      const { tracker, translator } = setup();

      const [association] = tracker.register(
        variable("g", rw, "global", { counterBinding: { binding: 4 } }),
      );

      expect(association).toEqual({ kind: "direct", path: [], counter: 1 });
      expect(tracker.variable(1)).toEqual({
        handle: 1,
        name: "counter.var.g",
        declId: "g",
        path: [],
        storageClass: "Uniform",
        typeId: translator.counterType(),
        counterBinding: { binding: 4 },
      });
    });

    it("should give local buffers an alias slot", () => {
      const { tracker, translator } = setup();

      const [association] = tracker.register(variable("l", rw, "local"));
      const counter = tracker.variable(association.counter);

      expect(association.kind).toBe("alias");
      expect(counter?.name).toBe("counter.var.l");
      expect(counter?.storageClass).toBe("Private");
      expect(translator.table.get(counter?.typeId ?? 0)).toEqual({
        kind: "pointer",
        storageClass: "Uniform",
        pointee: translator.counterType(),
      });
    });

    it("should ignore buffers without counters", () => {
      const { tracker } = setup();
      const ReadOnly = Types.struct("ReadOnly", [
        Types.field("data", Types.opaque("StructuredBuffer", uint)),
        Types.field("bytes", Types.opaque("RWByteAddressBuffer")),
      ]);

      expect(tracker.register(variable("r", ReadOnly, "local"))).toEqual([]);
      expect(tracker.counters()).toEqual([]);
    });

    it("should register each declaration once", () => {
      const { tracker } = setup();
      const decl = variable("s", S, "local");

      const first = tracker.register(decl);
      const second = tracker.register(decl);

      expect(second).toBe(first);
      expect(tracker.counters()).toHaveLength(2);
    });
  });

  describe("assign", () => {
    function bound() {
      const context = setup();
      const { tracker } = context;
      const [g1] = tracker.register(variable("g1", append, "global"));
      const [g2] = tracker.register(variable("g2", consume, "global"));
      tracker.register(variable("s", S, "local"));
      return { ...context, g1, g2 };
    }

    it("should rebind members through prefixes", () => {
      const { tracker, g1, g2 } = bound();

      expect(tracker.assign("s", "g1", [0])).toBe(true);
      expect(tracker.assign("s", "g2", [2])).toBe(true);

      const resolved = tracker
        .associationsOf("s")
        .map((association) => Association.resolve(association));
      expect(resolved).toEqual([g1.counter, g2.counter]);
    });

    it("should rebind every counter of isomorphic structs", () => {
      const { tracker, g1, g2 } = bound();
      tracker.assign("s", "g1", [0]);
      tracker.assign("s", "g2", [2]);
      tracker.register(variable("t", S, "local"));

      expect(tracker.assign("t", "s")).toBe(true);

      const [a, b] = tracker.associationsOf("t");
      expect(Association.resolve(a)).toBe(g1.counter);
      expect(Association.resolve(b)).toBe(g2.counter);
    });

    it("should reject structs missing a buffer and rebind nothing", () => {
      const { tracker, diagnostics } = bound();
      const Truncated = Types.struct("Truncated", [
        Types.field("a", append),
        Types.field("pad", Types.int),
      ]);
      tracker.register(variable("p", Truncated, "local"));
      tracker.assign("s", "g1", [0]);
      const before = tracker.associationsOf("s").map(Association.resolve);

      expect(tracker.assign("s", "p")).toBe(false);

      expect(tracker.associationsOf("s").map(Association.resolve)).toEqual(
        before,
      );
      expect(diagnostics.all).toHaveLength(1);
      const [error] = diagnostics.all;
      expect(error.code).toBe("StructShapeMismatch");
      expect(error.location).toEqual({ offset: 100, length: 1 });
      expect(error.message).toBe(
        "Buffer-bearing members of the assigned values do not match: " +
          "s has a counter at [2] but p has none at [2]",
      );
    });

    it("should never rebind direct counters", () => {
      const { tracker, g1 } = bound();

      expect(tracker.assign("g1", "g2")).toBe(true);
      expect(tracker.get("g1")).toEqual(g1);
    });

    it("should rebind local aliases of whole buffers", () => {
      const { tracker, g2 } = bound();
      tracker.register(variable("local", consume, "local"));

      expect(tracker.assign("local", "g2")).toBe(true);
      expect(tracker.get("local")).toMatchObject({
        kind: "alias",
        target: g2.counter,
      });
    });
  });
});
