/**
 * Code generation options that affect layout and interface assignment
 */

import { LayoutRule } from "#layout";

/**
 * Layout presets:
 * - relaxed: relaxed std140 for constant buffers, relaxed std430 elsewhere
 * - gl: plain std140 / std430
 * - dx: the legacy D3D packing rules
 * - scalar: component-aligned packing everywhere
 */
export type LayoutPreset = "relaxed" | "gl" | "dx" | "scalar";

export interface SpvOptions {
  layout: LayoutPreset;
  cBufferLayoutRule: LayoutRule;
  tBufferLayoutRule: LayoutRule;
  sBufferLayoutRule: LayoutRule;
  pushConstantLayoutRule: LayoutRule;
  /** Matrices without an explicit orientation are row-major */
  defaultRowMajor: boolean;
  /** Minimum-precision types become real 16-bit types */
  enable16BitTypes: boolean;
  /** Order in which automatic stage locations are handed out */
  stageIoOrder: "declaration" | "alpha";
  /** Descriptor set for resources without an explicit one */
  defaultDescriptorSet: number;
}

type PresetRules = Pick<
  SpvOptions,
  | "cBufferLayoutRule"
  | "tBufferLayoutRule"
  | "sBufferLayoutRule"
  | "pushConstantLayoutRule"
>;

const presets: Record<LayoutPreset, PresetRules> = {
  relaxed: {
    cBufferLayoutRule: LayoutRule.RelaxedStd140,
    tBufferLayoutRule: LayoutRule.RelaxedStd430,
    sBufferLayoutRule: LayoutRule.RelaxedStd430,
    pushConstantLayoutRule: LayoutRule.RelaxedStd430,
  },
  gl: {
    cBufferLayoutRule: LayoutRule.Std140,
    tBufferLayoutRule: LayoutRule.Std430,
    sBufferLayoutRule: LayoutRule.Std430,
    pushConstantLayoutRule: LayoutRule.Std430,
  },
  dx: {
    cBufferLayoutRule: LayoutRule.ConstantBufferPacking,
    tBufferLayoutRule: LayoutRule.ConstantBufferPacking,
    sBufferLayoutRule: LayoutRule.StructuredBufferPacking,
    pushConstantLayoutRule: LayoutRule.StructuredBufferPacking,
  },
  scalar: {
    cBufferLayoutRule: LayoutRule.ScalarPacking,
    tBufferLayoutRule: LayoutRule.ScalarPacking,
    sBufferLayoutRule: LayoutRule.ScalarPacking,
    pushConstantLayoutRule: LayoutRule.ScalarPacking,
  },
};

export const defaultOptions: SpvOptions = {
  layout: "relaxed",
  ...presets.relaxed,
  defaultRowMajor: false,
  enable16BitTypes: false,
  stageIoOrder: "declaration",
  defaultDescriptorSet: 0,
};

/**
 * Fill in defaults. Rules given explicitly win over the preset's.
 */
export function resolveOptions(options: Partial<SpvOptions> = {}): SpvOptions {
  const layout = options.layout ?? defaultOptions.layout;
  const rules = presets[layout];
  return {
    layout,
    cBufferLayoutRule: options.cBufferLayoutRule ?? rules.cBufferLayoutRule,
    tBufferLayoutRule: options.tBufferLayoutRule ?? rules.tBufferLayoutRule,
    sBufferLayoutRule: options.sBufferLayoutRule ?? rules.sBufferLayoutRule,
    pushConstantLayoutRule:
      options.pushConstantLayoutRule ?? rules.pushConstantLayoutRule,
    defaultRowMajor: options.defaultRowMajor ?? defaultOptions.defaultRowMajor,
    enable16BitTypes:
      options.enable16BitTypes ?? defaultOptions.enable16BitTypes,
    stageIoOrder: options.stageIoOrder ?? defaultOptions.stageIoOrder,
    defaultDescriptorSet:
      options.defaultDescriptorSet ?? defaultOptions.defaultDescriptorSet,
  };
}
