/**
 * SV_ClipDistance / SV_CullDistance packing
 *
 * The target exposes clip and cull distances as one float array per
 * direction, while the source may spread them over several float or
 * float-vector variables, each with its own semantic index. The variables
 * are sorted by semantic index and concatenated without gaps, so
 *
 *   float2 a : SV_ClipDistance2;
 *   float  b : SV_ClipDistance0;
 *   float3 c : SV_ClipDistance1;
 *
 * places b at 0, c at 1 and a at 4, in a six-element array.
 */

import { Type, formatType, type DeclId, type Declaration } from "#types";

import { Error as StageError, ErrorCode } from "./errors";

export type ClipCullKind = "clip" | "cull";

export interface ClipCullEntry {
  declId: DeclId;
  name: string;
  kind: ClipCullKind;
  direction: Declaration.Direction;
  semanticIndex: number;
  components: number;
  /** Float offset into the packed array */
  offset: number;
}

export interface ClipCullArray {
  kind: ClipCullKind;
  direction: Declaration.Direction;
  size: number;
}

export interface ClipCullLayout {
  entries: ClipCullEntry[];
  arrays: ClipCullArray[];
}

export class ClipCullPacker {
  private readonly recorded: Omit<ClipCullEntry, "offset">[] = [];

  /**
   * @throws StageError with code UnsupportedType unless the type is a
   *   float or a float vector
   */
  record(entry: Omit<ClipCullEntry, "offset" | "components">, type: Type): void {
    this.recorded.push({ ...entry, components: componentsOf(type) });
  }

  pack(): ClipCullLayout {
    const entries: ClipCullEntry[] = [];
    const arrays: ClipCullArray[] = [];

    for (const direction of ["input", "output"] as const) {
      for (const kind of ["clip", "cull"] as const) {
        const group = this.recorded
          .filter((entry) => entry.direction === direction && entry.kind === kind)
          .sort((a, b) => a.semanticIndex - b.semanticIndex);
        if (group.length === 0) {
          continue;
        }

        let offset = 0;
        for (const entry of group) {
          entries.push({ ...entry, offset });
          offset += entry.components;
        }
        arrays.push({ kind, direction, size: offset });
      }
    }

    return { entries, arrays };
  }
}

function componentsOf(type: Type): number {
  if (Type.isScalar(type) && type.scalar === "float") {
    return 1;
  }
  if (Type.isVector(type) && type.element.scalar === "float") {
    return type.count;
  }
  throw new StageError(
    ErrorCode.UNSUPPORTED_TYPE,
    `clip and cull distances must be float or vector of float, not ${formatType(type)}`,
  );
}
