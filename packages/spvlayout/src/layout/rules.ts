/**
 * Layout rules
 *
 * The GL rules follow the std140/std430 definitions. The relaxed variants
 * align vectors to their component type inside structs as long as they do
 * not straddle a 16-byte boundary. The two packing rules reproduce the
 * legacy D3D compiler's cbuffer and structured buffer packing. Scalar
 * packing aligns everything to its component type.
 */
export enum LayoutRule {
  NoLayout = "void",
  Std140 = "std140",
  Std430 = "std430",
  RelaxedStd140 = "relaxed-std140",
  RelaxedStd430 = "relaxed-std430",
  ConstantBufferPacking = "fxc-cbuffer",
  StructuredBufferPacking = "fxc-sbuffer",
  ScalarPacking = "scalar",
}

export namespace LayoutRule {
  /** Rules that round arrays and structs up to a vec4 (16 bytes) */
  export const roundsToVec4 = (rule: LayoutRule): boolean =>
    rule === LayoutRule.Std140 ||
    rule === LayoutRule.RelaxedStd140 ||
    rule === LayoutRule.ConstantBufferPacking;

  /** Rules where vectors take their component's alignment */
  export const usesElementAlignment = (rule: LayoutRule): boolean =>
    rule === LayoutRule.ConstantBufferPacking ||
    rule === LayoutRule.StructuredBufferPacking ||
    rule === LayoutRule.ScalarPacking;

  /** Rules that place vector struct members with the relaxed adjustment */
  export const isRelaxed = (rule: LayoutRule): boolean =>
    rule === LayoutRule.RelaxedStd140 ||
    rule === LayoutRule.RelaxedStd430 ||
    rule === LayoutRule.ConstantBufferPacking;

  /** Legacy packing rules: no trailing padding after arrays and structs */
  export const isFxc = (rule: LayoutRule): boolean =>
    rule === LayoutRule.ConstantBufferPacking ||
    rule === LayoutRule.StructuredBufferPacking;

  /** Rules where arrays and matrices are packed without any rounding */
  export const isTight = (rule: LayoutRule): boolean =>
    rule === LayoutRule.StructuredBufferPacking ||
    rule === LayoutRule.ScalarPacking;
}
