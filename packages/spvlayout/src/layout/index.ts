/**
 * Layout rule evaluation
 */

import { Result } from "#result";
import type { Type } from "#types";

import { LayoutEvaluator, type EvaluatorOptions, type Layout } from "./evaluator";
import { Error as LayoutError, ErrorCode } from "./errors";
import { findOverlaps } from "./overlaps";
import type { LayoutRule } from "./rules";

export { LayoutRule } from "./rules";
export {
  LayoutEvaluator,
  type EvaluatorOptions,
  type Layout,
  type Placement,
} from "./evaluator";
export {
  VEC4_ALIGNMENT,
  improperStraddle,
  isPowerOfTwo,
  roundToPow2,
} from "./alignment";
export { Error, ErrorCode, ErrorMessages } from "./errors";
export { findOverlaps, overlapError } from "./overlaps";

/**
 * Compute the layout of a type, reporting unsupported shapes and
 * overlapping explicit offsets as a failed result instead of throwing
 */
export function computeLayout(
  type: Type,
  rule: LayoutRule,
  options: EvaluatorOptions,
  majorness?: Type.Majorness,
): Result<Layout, LayoutError> {
  try {
    const evaluator = new LayoutEvaluator(options);
    const layout = evaluator.evaluate(type, rule, majorness);
    const overlaps = findOverlaps(evaluator, type, rule);
    return overlaps.length > 0 ? Result.err(overlaps) : Result.ok(layout);
  } catch (error) {
    if (error instanceof LayoutError) {
      return Result.err(error);
    }
    return Result.err(
      new LayoutError(
        ErrorCode.UNSUPPORTED_TYPE,
        error instanceof globalThis.Error ? error.message : String(error),
      ),
    );
  }
}
