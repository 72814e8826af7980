/**
 * Type classification
 *
 * Pure predicates over type descriptors. Nothing here depends on layout
 * rules or on the target type table.
 */

import { Type } from "./definitions";
import { assertExhausted } from "#errors";

export type Shape =
  | "scalar"
  | "vector"
  | "matrix"
  | "array"
  | "runtime-array"
  | "struct"
  | Opaque.Category;

export function classify(type: Type): Shape {
  switch (type.kind) {
    case "scalar":
    case "vector":
    case "struct":
      return type.kind;
    case "matrix":
      return Type.reduceMatrix(type).kind;
    case "array":
      return type.size === undefined ? "runtime-array" : "array";
    case "opaque":
      return Opaque.info(type.opaque).category;
    default:
      return assertExhausted(type);
  }
}

export namespace Opaque {
  export type Category =
    | "texture"
    | "storage-texture"
    | "texel-buffer"
    | "sampler"
    | "structured-buffer"
    | "byte-address-buffer"
    | "subpass-input"
    | "patch"
    | "stream";

  export type Dim = "1D" | "2D" | "3D" | "Cube" | "Buffer" | "SubpassData";

  export interface Info {
    category: Category;
    dim?: Dim;
    arrayed?: boolean;
    multisampled?: boolean;
    /** Shader may write through it */
    writable?: boolean;
    /** Needs a companion counter (RW / Append / Consume structured buffers) */
    counter?: boolean;
  }

  const table = {
    Texture1D: { category: "texture", dim: "1D" },
    Texture2D: { category: "texture", dim: "2D" },
    Texture3D: { category: "texture", dim: "3D" },
    TextureCube: { category: "texture", dim: "Cube" },
    Texture1DArray: { category: "texture", dim: "1D", arrayed: true },
    Texture2DArray: { category: "texture", dim: "2D", arrayed: true },
    Texture2DMS: { category: "texture", dim: "2D", multisampled: true },
    Texture2DMSArray: {
      category: "texture",
      dim: "2D",
      arrayed: true,
      multisampled: true,
    },
    TextureCubeArray: { category: "texture", dim: "Cube", arrayed: true },
    RWTexture1D: { category: "storage-texture", dim: "1D", writable: true },
    RWTexture2D: { category: "storage-texture", dim: "2D", writable: true },
    RWTexture3D: { category: "storage-texture", dim: "3D", writable: true },
    RWTexture1DArray: {
      category: "storage-texture",
      dim: "1D",
      arrayed: true,
      writable: true,
    },
    RWTexture2DArray: {
      category: "storage-texture",
      dim: "2D",
      arrayed: true,
      writable: true,
    },
    Buffer: { category: "texel-buffer", dim: "Buffer" },
    RWBuffer: { category: "texel-buffer", dim: "Buffer", writable: true },
    SamplerState: { category: "sampler" },
    SamplerComparisonState: { category: "sampler" },
    StructuredBuffer: { category: "structured-buffer" },
    RWStructuredBuffer: {
      category: "structured-buffer",
      writable: true,
      counter: true,
    },
    AppendStructuredBuffer: {
      category: "structured-buffer",
      writable: true,
      counter: true,
    },
    ConsumeStructuredBuffer: {
      category: "structured-buffer",
      writable: true,
      counter: true,
    },
    ByteAddressBuffer: { category: "byte-address-buffer" },
    RWByteAddressBuffer: { category: "byte-address-buffer", writable: true },
    SubpassInput: { category: "subpass-input", dim: "SubpassData" },
    SubpassInputMS: {
      category: "subpass-input",
      dim: "SubpassData",
      multisampled: true,
    },
    InputPatch: { category: "patch" },
    OutputPatch: { category: "patch" },
    TriangleStream: { category: "stream" },
    LineStream: { category: "stream" },
    PointStream: { category: "stream" },
  } as const satisfies Record<Type.OpaqueKind, Info>;

  export function info(kind: Type.OpaqueKind): Info {
    return table[kind];
  }

  export const isKind = (name: string): name is Type.OpaqueKind =>
    Object.hasOwn(table, name);
}

/**
 * Textures, texel buffers and samplers: resources that cannot live inside
 * a buffer and force legalization when placed in a struct
 */
export function isOpaqueType(type: Type): boolean {
  if (!Type.isOpaque(type)) {
    return false;
  }
  switch (Opaque.info(type.opaque).category) {
    case "texture":
    case "storage-texture":
    case "texel-buffer":
    case "sampler":
      return true;
    default:
      return false;
  }
}

export function isOpaqueStruct(type: Type): boolean {
  if (!Type.isStruct(type)) {
    return false;
  }
  return Type.layoutFields(type).some(
    (field) => isOpaqueType(field.type) || isOpaqueStruct(field.type),
  );
}

export function isOpaqueArray(type: Type): boolean {
  return Type.isArray(type) && isOpaqueType(type.element);
}

const isBufferCategory = (type: Type): type is Type.Opaque => {
  if (!Type.isOpaque(type)) {
    return false;
  }
  const { category } = Opaque.info(type.opaque);
  return category === "structured-buffer" || category === "byte-address-buffer";
};

/**
 * Structured or byte-address buffer, looking through arrays
 */
export function isAKindOfStructuredOrByteBuffer(type: Type): boolean {
  return isBufferCategory(Type.innermost(type));
}

export function isOrContainsAKindOfStructuredOrByteBuffer(type: Type): boolean {
  if (isBufferCategory(type)) {
    return true;
  }
  if (Type.isStruct(type)) {
    return Type.layoutFields(type).some((field) =>
      isOrContainsAKindOfStructuredOrByteBuffer(field.type),
    );
  }
  return false;
}

/**
 * Any opaque type, looking through arrays and struct fields
 */
export function isOrContainsOpaque(type: Type): boolean {
  const inner = Type.innermost(type);
  if (Type.isOpaque(inner)) {
    return true;
  }
  return (
    Type.isStruct(inner) &&
    Type.layoutFields(inner).some((field) => isOrContainsOpaque(field.type))
  );
}

/**
 * RW, Append or Consume structured buffer: the kinds with a counter
 */
export function isRWAppendConsumeSBuffer(type: Type): type is Type.Opaque {
  return Type.isOpaque(type) && Opaque.info(type.opaque).counter === true;
}

export function isAppendStructuredBuffer(type: Type): boolean {
  return Type.isOpaque(type) && type.opaque === "AppendStructuredBuffer";
}

export function isConsumeStructuredBuffer(type: Type): boolean {
  return Type.isOpaque(type) && type.opaque === "ConsumeStructuredBuffer";
}

/**
 * Whether a declaration of this type binds an external resource
 */
export function isResourceType(type: Type): boolean {
  const inner = Type.innermost(type);
  if (!Type.isOpaque(inner)) {
    return false;
  }
  const { category } = Opaque.info(inner.opaque);
  return category !== "patch" && category !== "stream";
}

export function isOrContains16BitType(
  type: Type,
  enable16BitTypes: boolean,
): boolean {
  switch (type.kind) {
    case "scalar":
      return type.minPrecision ? enable16BitTypes : type.bits === 16;
    case "vector":
    case "matrix":
      return isOrContains16BitType(type.element, enable16BitTypes);
    case "array":
      return isOrContains16BitType(type.element, enable16BitTypes);
    case "struct":
      return Type.layoutFields(type).some((field) =>
        isOrContains16BitType(field.type, enable16BitTypes),
      );
    case "opaque":
      return false;
    default:
      return assertExhausted(type);
  }
}

/**
 * Minimum-precision types that stay 32-bit and get a RelaxedPrecision
 * decoration instead
 */
export function isRelaxedPrecisionType(
  type: Type,
  enable16BitTypes: boolean,
): boolean {
  if (Type.isScalar(type)) {
    return type.minPrecision === true && !enable16BitTypes;
  }
  if (Type.isVector(type) || Type.isMatrix(type)) {
    return isRelaxedPrecisionType(type.element, enable16BitTypes);
  }
  return false;
}

/**
 * Bit width of a scalar in the target
 */
export function elementBitwidth(
  scalar: Type.Scalar,
  enable16BitTypes: boolean,
): Type.Scalar.Bits {
  if (scalar.minPrecision) {
    return enable16BitTypes ? 16 : 32;
  }
  switch (scalar.scalar) {
    case "bool":
      return 32;
    case "int":
    case "uint":
    case "float":
      return scalar.bits;
    case "literal-int":
    case "literal-float":
      return scalar.bits > 32 ? 64 : 32;
    default:
      return assertExhausted(scalar.scalar);
  }
}

/**
 * `literal float` matches any float, `literal int` any non-bool integer
 */
export function canTreatAsSameScalarType(
  a: Type.Scalar,
  b: Type.Scalar,
): boolean {
  if (a.scalar === b.scalar && a.bits === b.bits) {
    return true;
  }
  const isInteger = (s: Type.Scalar) => s.scalar === "int" || s.scalar === "uint";
  return (
    (a.scalar === "literal-float" && b.scalar === "float") ||
    (b.scalar === "literal-float" && a.scalar === "float") ||
    (a.scalar === "literal-int" && isInteger(b)) ||
    (b.scalar === "literal-int" && isInteger(a))
  );
}

export type RegisterFit =
  | { fits: true; element: Type.Scalar; count: number }
  | { fits: false; reason: string };

/**
 * Whether a struct used as a resource template argument packs into one
 * four-component register of a single scalar type
 */
export function fitIntoOneRegister(type: Type.Struct): RegisterFit {
  let element: Type.Scalar | undefined;
  let count = 0;

  for (const field of Type.layoutFields(type)) {
    let scalar: Type.Scalar;
    if (Type.isScalar(field.type)) {
      scalar = field.type;
      count += 1;
    } else if (Type.isVector(field.type)) {
      scalar = field.type.element;
      count += field.type.count;
    } else {
      return {
        fits: false,
        reason: "unsupported struct element type for resource template",
      };
    }

    if (!element) {
      element = scalar;
    } else if (!canTreatAsSameScalarType(element, scalar)) {
      return {
        fits: false,
        reason: "all struct members should have the same element type",
      };
    }
  }

  if (!element) {
    return { fits: false, reason: "empty struct cannot be a resource element" };
  }
  if (count > 4) {
    return {
      fits: false,
      reason: `${type.name} cannot fit into four 32-bit scalars`,
    };
  }
  return { fits: true, element, count };
}
