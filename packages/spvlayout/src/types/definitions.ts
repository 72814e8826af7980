/**
 * Source type descriptors
 *
 * A closed tagged union describing the declared type of every declaration
 * the layout core is asked about. Descriptors are immutable; the same
 * object may be shared between declarations.
 */

import type { Annotations } from "./annotations";

export type Type =
  | Type.Scalar
  | Type.Vector
  | Type.Matrix
  | Type.Array
  | Type.Struct
  | Type.Opaque;

export namespace Type {
  export type Kind = Type["kind"];

  export interface Scalar {
    readonly kind: "scalar";
    readonly scalar: Scalar.Kind;
    readonly bits: Scalar.Bits;
    /**
     * min16float / min16int and friends: 16 bits wide when 16-bit types are
     * enabled, 32 bits otherwise
     */
    readonly minPrecision?: boolean;
  }

  export namespace Scalar {
    export type Kind =
      | "bool"
      | "int"
      | "uint"
      | "float"
      | "literal-int"
      | "literal-float";
    export type Bits = 16 | 32 | 64;
  }

  export interface Vector {
    readonly kind: "vector";
    readonly element: Scalar;
    readonly count: number;
  }

  export type Majorness = "row" | "column";

  export interface Matrix {
    readonly kind: "matrix";
    readonly element: Scalar;
    readonly rows: number;
    readonly columns: number;
    /** Undefined means "take it from the declaration or the options" */
    readonly majorness?: Majorness;
  }

  export interface Array {
    readonly kind: "array";
    readonly element: Type;
    /** Undefined for unbounded (runtime) arrays */
    readonly size?: number;
  }

  export interface Field {
    readonly name: string;
    readonly type: Type;
    readonly annotations?: Annotations;
  }

  export interface Struct {
    readonly kind: "struct";
    readonly name: string;
    readonly fields: readonly Field[];
    /** Base struct, laid out as an unnamed leading field */
    readonly base?: Struct;
  }

  export type OpaqueKind =
    | "Texture1D"
    | "Texture2D"
    | "Texture3D"
    | "TextureCube"
    | "Texture1DArray"
    | "Texture2DArray"
    | "Texture2DMS"
    | "Texture2DMSArray"
    | "TextureCubeArray"
    | "RWTexture1D"
    | "RWTexture2D"
    | "RWTexture3D"
    | "RWTexture1DArray"
    | "RWTexture2DArray"
    | "Buffer"
    | "RWBuffer"
    | "SamplerState"
    | "SamplerComparisonState"
    | "StructuredBuffer"
    | "RWStructuredBuffer"
    | "AppendStructuredBuffer"
    | "ConsumeStructuredBuffer"
    | "ByteAddressBuffer"
    | "RWByteAddressBuffer"
    | "SubpassInput"
    | "SubpassInputMS"
    | "InputPatch"
    | "OutputPatch"
    | "TriangleStream"
    | "LineStream"
    | "PointStream";

  export interface Opaque {
    readonly kind: "opaque";
    readonly opaque: OpaqueKind;
    /** Template argument, e.g. the `float4` of `Texture2D<float4>` */
    readonly element?: Type;
    /** Control point count of InputPatch / OutputPatch */
    readonly count?: number;
  }

  export const isScalar = (type: Type): type is Scalar =>
    type.kind === "scalar";
  export const isVector = (type: Type): type is Vector =>
    type.kind === "vector";
  export const isMatrix = (type: Type): type is Matrix =>
    type.kind === "matrix";
  export const isArray = (type: Type): type is Array => type.kind === "array";
  export const isStruct = (type: Type): type is Struct =>
    type.kind === "struct";
  export const isOpaque = (type: Type): type is Opaque =>
    type.kind === "opaque";

  export const isFloating = (scalar: Scalar): boolean =>
    scalar.scalar === "float" || scalar.scalar === "literal-float";

  export const isLiteral = (scalar: Scalar): boolean =>
    scalar.scalar === "literal-int" || scalar.scalar === "literal-float";

  /**
   * A matrix with one row or one column is a vector, and a `1x1` matrix is
   * a scalar. Only matrices with several rows and columns stay matrices.
   */
  export function reduceMatrix(type: Matrix): Scalar | Vector | Matrix {
    if (type.rows === 1 && type.columns === 1) {
      return type.element;
    }
    if (type.rows === 1 || type.columns === 1) {
      return {
        kind: "vector",
        element: type.element,
        count: type.rows * type.columns,
      };
    }
    return type;
  }

  /**
   * Fields in layout order: the base struct (if any) first, unnamed.
   */
  export function layoutFields(type: Struct): Field[] {
    const fields: Field[] = [];
    if (type.base) {
      fields.push({ name: "", type: type.base });
    }
    fields.push(...type.fields);
    return fields;
  }

  /**
   * Strip all outer arrayness
   */
  export function innermost(type: Type): Type {
    let current = type;
    while (current.kind === "array") {
      current = current.element;
    }
    return current;
  }
}
