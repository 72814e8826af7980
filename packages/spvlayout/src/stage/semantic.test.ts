import { describe, it, expect } from "vitest";

import { Semantic } from "./semantic";
import { stageByName } from "./execution-model";

describe("Semantic", () => {
  it("should split a trailing index off the name", () => {
    expect(Semantic.parse("TEXCOORD12")).toEqual({ name: "TEXCOORD", index: 12 });
    expect(Semantic.parse("SV_Target1")).toEqual({ name: "SV_Target", index: 1 });
  });

  it("should default the index to zero", () => {
    expect(Semantic.parse("COLOR")).toEqual({ name: "COLOR", index: 0 });
    expect(Semantic.parse("7")).toEqual({ name: "7", index: 0 });
  });

  it("should compare names without regard to case", () => {
    const semantic = Semantic.parse("sv_position");

    expect(Semantic.isSystemValue(semantic)).toBe(true);
    expect(Semantic.is(semantic, "SV_Position")).toBe(true);
    expect(Semantic.key(semantic)).toBe("SV_POSITION0");
    expect(Semantic.key(Semantic.parse("Color2"))).toBe(
      Semantic.key(Semantic.parse("COLOR2")),
    );
  });

  it("should format with an explicit index", () => {
    expect(Semantic.format(Semantic.parse("NORMAL"))).toBe("NORMAL0");
  });
});

describe("stageByName", () => {
  it("should accept profile prefixes and full names", () => {
    expect(stageByName("ps")).toEqual({ kind: "pixel", model: "Fragment" });
    expect(stageByName("HS")).toEqual({
      kind: "hull",
      model: "TessellationControl",
    });
    expect(stageByName("closesthit")).toEqual({
      kind: "closesthit",
      model: "ClosestHitNV",
    });
  });

  it("should reject unknown names", () => {
    expect(stageByName("mesh")).toBeUndefined();
    expect(stageByName("constructor")).toBeUndefined();
    expect(stageByName("toString")).toBeUndefined();
  });
});
