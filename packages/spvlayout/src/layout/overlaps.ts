import { Type, type SourceLocation } from "#types";

import type { LayoutEvaluator, Placement } from "./evaluator";
import { Error as LayoutError, ErrorCode } from "./errors";
import type { LayoutRule } from "./rules";

export function overlapError(
  type: Type.Struct,
  { field, overlap }: Placement,
  location?: SourceLocation,
): LayoutError | undefined {
  if (!overlap) {
    return undefined;
  }
  return new LayoutError(
    ErrorCode.LAYOUT_OVERLAP,
    `member "${field.name}" of ${type.name} placed at ` +
      `${overlap.requested} but previous members end at ${overlap.previousEnd}`,
    location,
  );
}

/**
 * Every explicit offset overlapping an earlier member, in `type` and in
 * the structs nested in it. Each struct is reported once.
 */
export function findOverlaps(
  evaluator: LayoutEvaluator,
  type: Type,
  rule: LayoutRule,
): LayoutError[] {
  const errors: LayoutError[] = [];
  const visited = new Set<Type.Struct>();

  const visit = (current: Type): void => {
    if (Type.isArray(current)) {
      visit(current.element);
      return;
    }
    if (!Type.isStruct(current) || visited.has(current)) {
      return;
    }
    visited.add(current);

    for (const placement of evaluator.placeFields(current, rule)) {
      const error = overlapError(current, placement);
      if (error) {
        errors.push(error);
      }
      visit(placement.field.type);
    }
  };

  visit(type);
  return errors;
}
