import { Type } from "./definitions";
import { assertExhausted } from "#errors";

/**
 * Render a descriptor in source syntax, e.g. `float4x4`, `Texture2D<float4>`
 */
export function formatType(type: Type): string {
  switch (type.kind) {
    case "scalar":
      return formatScalar(type);
    case "vector":
      return `${formatScalar(type.element)}${type.count}`;
    case "matrix": {
      const prefix =
        type.majorness === "row"
          ? "row_major "
          : type.majorness === "column"
            ? "column_major "
            : "";
      return `${prefix}${formatScalar(type.element)}${type.rows}x${type.columns}`;
    }
    case "array":
      return `${formatType(type.element)}[${type.size ?? ""}]`;
    case "struct":
      return type.name;
    case "opaque":
      return type.element
        ? `${type.opaque}<${formatType(type.element)}${
            type.count !== undefined ? `, ${type.count}` : ""
          }>`
        : type.opaque;
    default:
      return assertExhausted(type);
  }
}

function formatScalar(type: Type.Scalar): string {
  if (type.minPrecision) {
    return `min16${type.scalar}`;
  }
  switch (type.scalar) {
    case "bool":
      return "bool";
    case "int":
      return type.bits === 32 ? "int" : `int${type.bits}_t`;
    case "uint":
      return type.bits === 32 ? "uint" : `uint${type.bits}_t`;
    case "float":
      return type.bits === 16 ? "half" : type.bits === 64 ? "double" : "float";
    case "literal-int":
      return "literal int";
    case "literal-float":
      return "literal float";
    default:
      return assertExhausted(type.scalar);
  }
}
