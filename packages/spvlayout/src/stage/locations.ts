import { Type, elementBitwidth, formatType } from "#types";
import { SpvError, assertExhausted } from "#errors";

import { Error as StageError, ErrorCode } from "./errors";

/**
 * Number of consecutive interface locations a stage variable of this type
 * occupies.
 *
 * Structs must be flattened before they get here.
 *
 * @throws StageError with code UnsupportedType for unbounded arrays and
 *   resources
 */
export function locationCount(type: Type, enable16BitTypes = false): number {
  switch (type.kind) {
    case "scalar":
      return 1;
    case "vector":
      return type.count > 2 &&
        elementBitwidth(type.element, enable16BitTypes) === 64
        ? 2
        : 1;
    case "matrix": {
      const reduced = Type.reduceMatrix(type);
      if (!Type.isMatrix(reduced)) {
        return locationCount(reduced, enable16BitTypes);
      }
      // Stored as one vector per row
      return (
        type.rows *
        locationCount(
          { kind: "vector", element: type.element, count: type.columns },
          enable16BitTypes,
        )
      );
    }
    case "array":
      if (type.size === undefined) {
        throw new StageError(
          ErrorCode.UNSUPPORTED_TYPE,
          `unbounded array ${formatType(type)}`,
        );
      }
      return locationCount(type.element, enable16BitTypes) * type.size;
    case "struct":
      throw new SpvError(
        `struct ${type.name} must be flattened before counting locations`,
        "InternalError",
      );
    case "opaque":
      throw new StageError(ErrorCode.UNSUPPORTED_TYPE, formatType(type));
    default:
      return assertExhausted(type);
  }
}
