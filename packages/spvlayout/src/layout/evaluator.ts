/**
 * Alignment, size and stride of source types under a layout rule
 *
 * Every rule is expressed as a modification of std140:
 *
 * 1. A scalar of N bytes has base alignment N.
 * 2. A two- or four-component vector of N-byte components has base
 *    alignment 2N or 4N; a three-component vector 4N.
 * 3. An array of scalars or vectors has the base alignment and stride of
 *    its element, rounded up to a vec4; the member after it starts at the
 *    next multiple of that alignment.
 * 4. A matrix is stored as an array of vectors: column vectors for
 *    column-major matrices, row vectors for row-major ones.
 * 5. A struct has the largest base alignment of its members, rounded up
 *    to a vec4, and is padded at its end to that alignment.
 *
 * std430 drops the vec4 rounding of arrays and structs. The relaxed rules
 * place vectors at their component alignment inside structs. Constant
 * buffer packing aligns vectors to their component and lets arrays and
 * structs end without padding. Structured buffer packing and scalar
 * packing additionally pack arrays and matrices tightly.
 */

import { Type, elementBitwidth, formatType } from "#types";
import { assertExhausted } from "#errors";

import { LayoutRule } from "./rules";
import {
  VEC4_ALIGNMENT,
  improperStraddle,
  roundToPow2,
} from "./alignment";
import { Error as LayoutError, ErrorCode } from "./errors";

export interface Layout {
  alignment: number;
  size: number;
  /** Element spacing for arrays and vector spacing for matrices; 0 otherwise */
  stride: number;
}

/**
 * Where one struct member lands
 */
export interface Placement {
  field: Type.Field;
  /** Index among the struct's layout fields (base struct first) */
  index: number;
  offset: number;
  layout: Layout;
  /** Set when the member is a floating-point matrix or array of them */
  matrix?: {
    stride: number;
    rowMajor: boolean;
  };
  /**
   * Set when an explicit offset lands before the end of the previous
   * member. The explicit offset is still used for placement.
   */
  overlap?: {
    requested: number;
    previousEnd: number;
  };
}

export interface EvaluatorOptions {
  enable16BitTypes: boolean;
  defaultRowMajor: boolean;
}

export class LayoutEvaluator {
  constructor(private readonly options: EvaluatorOptions) {}

  /**
   * Compute the layout of `type`.
   *
   * `majorness` is the orientation annotated on the declaration owning
   * the type; it applies to matrices reached through arrays but not to
   * the members of nested structs, which carry their own annotations.
   *
   * @throws LayoutError with code UnsupportedType
   */
  evaluate(type: Type, rule: LayoutRule, majorness?: Type.Majorness): Layout {
    switch (type.kind) {
      case "scalar":
        return this.scalar(type);
      case "vector":
        return this.vector(type, rule);
      case "matrix": {
        const reduced = Type.reduceMatrix(type);
        return Type.isMatrix(reduced)
          ? this.matrix(reduced, rule, majorness)
          : this.evaluate(reduced, rule);
      }
      case "array":
        if (type.size === undefined) {
          throw new LayoutError(
            ErrorCode.UNSUPPORTED_TYPE,
            `unbounded array ${formatType(type)} has no size`,
          );
        }
        return this.array(type.element, type.size, rule, majorness);
      case "struct":
        return this.struct(type, rule);
      case "opaque":
        throw new LayoutError(
          ErrorCode.UNSUPPORTED_TYPE,
          `resource ${formatType(type)} cannot be placed in memory`,
        );
      default:
        return assertExhausted(type);
    }
  }

  /**
   * Spacing between elements of an array of `element`. Works for
   * unbounded arrays, which have a stride but no size.
   */
  arrayStride(
    element: Type,
    rule: LayoutRule,
    majorness?: Type.Majorness,
  ): number {
    return this.array(element, 1, rule, majorness).stride;
  }

  isRowMajor(matrix: Type.Matrix, majorness?: Type.Majorness): boolean {
    const resolved = matrix.majorness ?? majorness;
    return resolved ? resolved === "row" : this.options.defaultRowMajor;
  }

  /**
   * Place the members of a struct in declaration order
   */
  placeFields(type: Type.Struct, rule: LayoutRule): Placement[] {
    const placements: Placement[] = [];
    let offset = 0;

    Type.layoutFields(type).forEach((field, index) => {
      const annotations = field.annotations ?? {};
      const layout = this.evaluate(field.type, rule, annotations.majorness);

      // End of the previous member, before any alignment
      const previousEnd = offset;

      offset = LayoutRule.isRelaxed(rule)
        ? this.alignRelaxed(field.type, layout, offset)
        : roundToPow2(offset, layout.alignment);

      let requested: number | undefined;
      if (annotations.offset !== undefined) {
        requested = annotations.offset;
      } else if (annotations.packOffset) {
        const { subcomponent, component } = annotations.packOffset;
        requested = subcomponent * 16 + component * 4;
      }

      const placement: Placement = { field, index, offset, layout };
      if (requested !== undefined) {
        if (requested < previousEnd) {
          placement.overlap = { requested, previousEnd };
        }
        offset = requested;
        placement.offset = requested;
      }

      const matrix = this.matrixOf(field.type);
      if (matrix && Type.isFloating(matrix.element)) {
        placement.matrix = {
          stride: this.matrix(matrix, rule, annotations.majorness).stride,
          rowMajor: this.isRowMajor(matrix, annotations.majorness),
        };
      }

      placements.push(placement);
      offset += layout.size;
    });

    return placements;
  }

  private scalar(type: Type.Scalar): Layout {
    const bytes = elementBitwidth(type, this.options.enable16BitTypes) / 8;
    return { alignment: bytes, size: bytes, stride: 0 };
  }

  private vector(type: Type.Vector, rule: LayoutRule): Layout {
    const element = this.scalar(type.element);
    const alignment = LayoutRule.usesElementAlignment(rule)
      ? element.alignment
      : (type.count === 3 ? 4 : type.count) * element.size;
    return { alignment, size: type.count * element.size, stride: 0 };
  }

  private matrix(
    type: Type.Matrix,
    rule: LayoutRule,
    majorness?: Type.Majorness,
  ): Layout {
    const element = this.scalar(type.element);
    const rowMajor = this.isRowMajor(type, majorness);

    // Components per stored vector, and how many vectors are stored
    const vectorSize = rowMajor ? type.columns : type.rows;
    const vectorCount = rowMajor ? type.rows : type.columns;

    if (LayoutRule.isTight(rule)) {
      return {
        alignment: element.alignment,
        size: type.rows * type.columns * element.size,
        stride: vectorSize * element.size,
      };
    }

    let alignment = element.alignment * (vectorSize === 3 ? 4 : vectorSize);
    if (LayoutRule.roundsToVec4(rule)) {
      alignment = roundToPow2(alignment, VEC4_ALIGNMENT);
    }
    return { alignment, size: vectorCount * alignment, stride: alignment };
  }

  private array(
    elementType: Type,
    count: number,
    rule: LayoutRule,
    majorness?: Type.Majorness,
  ): Layout {
    const element = this.evaluate(elementType, rule, majorness);

    if (LayoutRule.isTight(rule)) {
      return {
        alignment: element.alignment,
        size: element.size * count,
        stride: element.size,
      };
    }

    let alignment = element.alignment;
    if (LayoutRule.roundsToVec4(rule)) {
      alignment = roundToPow2(alignment, VEC4_ALIGNMENT);
    }

    if (rule === LayoutRule.ConstantBufferPacking) {
      // Elements are padded internally but the last one is not, so the
      // array does not push out the member that follows it
      const stride = roundToPow2(element.size, alignment);
      const size = count === 0 ? 0 : element.size + stride * (count - 1);
      return { alignment, size, stride };
    }

    const stride = roundToPow2(element.size, alignment);
    const size = roundToPow2(stride * count, alignment);
    return { alignment, size, stride };
  }

  private struct(type: Type.Struct, rule: LayoutRule): Layout {
    const placements = this.placeFields(type, rule);
    if (placements.length === 0) {
      return { alignment: 1, size: 0, stride: 0 };
    }

    let alignment = Math.max(
      ...placements.map((placement) => placement.layout.alignment),
    );
    const last = placements[placements.length - 1];
    let size = last.offset + last.layout.size;

    if (rule === LayoutRule.ScalarPacking) {
      return { alignment, size, stride: 0 };
    }
    if (LayoutRule.roundsToVec4(rule)) {
      alignment = roundToPow2(alignment, VEC4_ALIGNMENT);
    }
    if (!LayoutRule.isFxc(rule)) {
      size = roundToPow2(size, alignment);
    }
    return { alignment, size, stride: 0 };
  }

  /**
   * Vectors are placed at their component alignment unless that makes
   * them straddle a 16-byte boundary, in which case they move to the next
   * boundary.
   */
  private alignRelaxed(fieldType: Type, layout: Layout, offset: number): number {
    if (!Type.isVector(fieldType)) {
      return roundToPow2(offset, layout.alignment);
    }

    const componentAlignment = this.scalar(fieldType.element).alignment;
    const alignment =
      componentAlignment <= 4 ? componentAlignment : layout.alignment;

    let placed = roundToPow2(offset, alignment);
    if (improperStraddle(layout.size, placed)) {
      placed = roundToPow2(placed, VEC4_ALIGNMENT);
    }
    return placed;
  }

  private matrixOf(type: Type): Type.Matrix | undefined {
    const candidate = Type.isArray(type) ? type.element : type;
    if (!Type.isMatrix(candidate)) {
      return undefined;
    }
    const reduced = Type.reduceMatrix(candidate);
    return Type.isMatrix(reduced) ? reduced : undefined;
  }
}
