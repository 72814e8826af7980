/**
 * Constructors and shared instances for type descriptors
 */

import type { Type } from "./definitions";
import type { Annotations } from "./annotations";

const scalar = (
  kind: Type.Scalar.Kind,
  bits: Type.Scalar.Bits,
  minPrecision?: boolean,
): Type.Scalar =>
  minPrecision
    ? { kind: "scalar", scalar: kind, bits, minPrecision }
    : { kind: "scalar", scalar: kind, bits };

export const Types = {
  bool: scalar("bool", 32),
  int: scalar("int", 32),
  uint: scalar("uint", 32),
  float: scalar("float", 32),
  half: scalar("float", 16),
  double: scalar("float", 64),
  int16: scalar("int", 16),
  uint16: scalar("uint", 16),
  int64: scalar("int", 64),
  uint64: scalar("uint", 64),
  min16float: scalar("float", 32, true),
  min16int: scalar("int", 32, true),
  min16uint: scalar("uint", 32, true),
  literalInt: scalar("literal-int", 32),
  literalFloat: scalar("literal-float", 32),

  scalar,

  vector(element: Type.Scalar, count: number): Type.Vector {
    return { kind: "vector", element, count };
  },

  matrix(
    element: Type.Scalar,
    rows: number,
    columns: number,
    majorness?: Type.Majorness,
  ): Type.Matrix {
    return majorness
      ? { kind: "matrix", element, rows, columns, majorness }
      : { kind: "matrix", element, rows, columns };
  },

  array(element: Type, size?: number): Type.Array {
    return size === undefined
      ? { kind: "array", element }
      : { kind: "array", element, size };
  },

  field(name: string, type: Type, annotations?: Annotations): Type.Field {
    return annotations ? { name, type, annotations } : { name, type };
  },

  struct(
    name: string,
    fields: Type.Field[],
    base?: Type.Struct,
  ): Type.Struct {
    return base
      ? { kind: "struct", name, fields, base }
      : { kind: "struct", name, fields };
  },

  opaque(kind: Type.OpaqueKind, element?: Type, count?: number): Type.Opaque {
    return {
      kind: "opaque",
      opaque: kind,
      ...(element ? { element } : {}),
      ...(count !== undefined ? { count } : {}),
    };
  },
} as const;
