import { describe, it, expect } from "vitest";

import { LayoutRule } from "#layout";

import { defaultOptions, resolveOptions } from "./options";

describe("resolveOptions", () => {
  it("should use the relaxed rules by default", () => {
    expect(resolveOptions()).toEqual(defaultOptions);
    expect(defaultOptions.cBufferLayoutRule).toBe(LayoutRule.RelaxedStd140);
    expect(defaultOptions.sBufferLayoutRule).toBe(LayoutRule.RelaxedStd430);
  });

  it("should take the rules of the chosen preset", () => {
    const options = resolveOptions({ layout: "dx" });

    expect(options.cBufferLayoutRule).toBe(LayoutRule.ConstantBufferPacking);
    expect(options.tBufferLayoutRule).toBe(LayoutRule.ConstantBufferPacking);
    expect(options.sBufferLayoutRule).toBe(
      LayoutRule.StructuredBufferPacking,
    );
  });

  it("should let explicit rules override the preset", () => {
    const options = resolveOptions({
      layout: "gl",
      pushConstantLayoutRule: LayoutRule.ScalarPacking,
    });

    expect(options.cBufferLayoutRule).toBe(LayoutRule.Std140);
    expect(options.pushConstantLayoutRule).toBe(LayoutRule.ScalarPacking);
  });

  it("should keep the other settings", () => {
    const options = resolveOptions({
      defaultRowMajor: true,
      stageIoOrder: "alpha",
      defaultDescriptorSet: 2,
    });

    expect(options.defaultRowMajor).toBe(true);
    expect(options.stageIoOrder).toBe("alpha");
    expect(options.defaultDescriptorSet).toBe(2);
    expect(options.enable16BitTypes).toBe(false);
  });
});
