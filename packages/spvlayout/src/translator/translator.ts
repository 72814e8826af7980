/**
 * Source type to target type translation
 *
 * Types are translated post-order: every nested type is interned before
 * the type that refers to it. Aggregates translated under a layout rule
 * carry the member decorations computed by the {@link LayoutEvaluator};
 * under {@link LayoutRule.NoLayout} they carry none.
 *
 * Failures are reported to the diagnostic sink and yield
 * {@link Spv.NO_TYPE}, so the caller can move on to the next declaration.
 */

import {
  Type,
  canTreatAsSameScalarType,
  elementBitwidth,
  isAKindOfStructuredOrByteBuffer,
  isResourceType,
  type SourceLocation,
} from "#types";
import { LayoutEvaluator, LayoutRule, overlapError } from "#layout";
import { SpvError, assertExhausted } from "#errors";
import { Severity } from "#result";
import type { DiagnosticSink } from "#diagnostics";
import type { SpvOptions } from "#options";

import { Spv } from "./spv";
import { TypeTable } from "./type-table";
import { TranslationContext } from "./context";
import { ResourceShapeBuilder } from "./resources";
import { Error as TranslatorError, ErrorCode } from "./errors";

export interface TranslateOptions {
  /** Where diagnostics raised by this translation point to */
  location?: SourceLocation | null;
  /** Majorness annotated on the declaration being translated */
  majorness?: Type.Majorness;
}

export class TypeTranslator {
  readonly context = new TranslationContext();
  readonly evaluator: LayoutEvaluator;
  private readonly resources: ResourceShapeBuilder;
  private readonly memo = new WeakMap<Type, Map<string, Spv.TypeId>>();
  private location: SourceLocation | undefined;

  constructor(
    readonly table: TypeTable,
    readonly options: SpvOptions,
    private readonly sink: DiagnosticSink,
  ) {
    this.evaluator = new LayoutEvaluator(options);
    this.resources = new ResourceShapeBuilder(this);
  }

  /**
   * Translate a declaration's type under `rule`
   */
  translate(
    type: Type,
    rule: LayoutRule,
    options: TranslateOptions = {},
  ): Spv.TypeId {
    return this.atBoundary(options, () => this.translateType(type, rule));
  }

  /**
   * Translate the struct of a constant buffer, texture buffer or push
   * constant block: laid out under `rule` and decorated as a Block
   */
  translateBlock(
    type: Type.Struct,
    rule: LayoutRule,
    options: TranslateOptions = {},
  ): Spv.TypeId {
    return this.atBoundary(options, () =>
      this.struct(type, rule, [{ kind: "Block" }]),
    );
  }

  /**
   * The block holding the counter of an append, consume or RW structured
   * buffer
   */
  counterType(): Spv.TypeId {
    const int = this.table.intern({ kind: "int", bits: 32, signed: true });
    return this.table.intern({
      kind: "struct",
      name: "type.ACSBuffer.counter",
      members: [int],
      memberNames: [""],
      decorations: [
        { kind: "Offset", member: 0, offset: 0 },
        { kind: "BufferBlock" },
      ],
    });
  }

  /**
   * Recursive entry point, also used by the resource shape builder for
   * element types. Must run inside {@link translate}.
   */
  translateType(type: Type, rule: LayoutRule): Spv.TypeId {
    const key = `${rule}|${this.context.key()}`;
    const cached = this.memo.get(type)?.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const id = this.build(type, rule);
    if (id !== Spv.NO_TYPE) {
      const entries = this.memo.get(type) ?? new Map<string, Spv.TypeId>();
      entries.set(key, id);
      this.memo.set(type, entries);
    }
    return id;
  }

  report(error: SpvError): void {
    this.sink.report(error);
  }

  get currentLocation(): SourceLocation | undefined {
    return this.location;
  }

  private atBoundary(
    options: TranslateOptions,
    fn: () => Spv.TypeId,
  ): Spv.TypeId {
    const previous = this.location;
    this.location = options.location ?? previous;
    try {
      return this.context.withMajorness(options.majorness, fn);
    } catch (error) {
      if (!(error instanceof SpvError)) {
        throw error;
      }
      this.report(
        new TranslatorError(
          ErrorCode.UNSUPPORTED_TYPE,
          error.message,
          this.location,
          Severity.Fatal,
        ),
      );
      return Spv.NO_TYPE;
    } finally {
      this.location = previous;
    }
  }

  private build(type: Type, rule: LayoutRule): Spv.TypeId {
    switch (type.kind) {
      case "scalar":
        return this.scalar(type, rule);
      case "vector": {
        const element = this.translateType(type.element, rule);
        if (element === Spv.NO_TYPE) {
          return Spv.NO_TYPE;
        }
        return this.table.intern({
          kind: "vector",
          element,
          count: type.count,
        });
      }
      case "matrix":
        return this.matrix(type, rule);
      case "array":
        return this.array(type, rule);
      case "struct":
        return this.struct(type, rule, []);
      case "opaque":
        return this.resources.build(type, rule);
      default:
        return assertExhausted(type);
    }
  }

  private scalar(type: Type.Scalar, rule: LayoutRule): Spv.TypeId {
    if (Type.isLiteral(type)) {
      const hint = this.context.currentLiteralHint;
      if (hint && !Type.isLiteral(hint) && canTreatAsSameScalarType(type, hint)) {
        return this.translateType(hint, rule);
      }
    }

    const bits = elementBitwidth(type, this.options.enable16BitTypes);
    switch (type.scalar) {
      case "bool":
        // Booleans have no defined layout; in memory they are uints
        return rule === LayoutRule.NoLayout
          ? this.table.intern({ kind: "bool" })
          : this.table.intern({ kind: "int", bits: 32, signed: false });
      case "int":
      case "literal-int":
        return this.table.intern({ kind: "int", bits, signed: true });
      case "uint":
        return this.table.intern({ kind: "int", bits, signed: false });
      case "float":
      case "literal-float":
        return this.table.intern({ kind: "float", bits });
      default:
        return assertExhausted(type.scalar);
    }
  }

  private matrix(matrix: Type.Matrix, rule: LayoutRule): Spv.TypeId {
    const type = Type.reduceMatrix(matrix);
    if (!Type.isMatrix(type)) {
      return this.translateType(type, rule);
    }

    const element = this.translateType(type.element, rule);
    if (element === Spv.NO_TYPE) {
      return Spv.NO_TYPE;
    }
    const row = this.table.intern({
      kind: "vector",
      element,
      count: type.columns,
    });

    if (Type.isFloating(type.element)) {
      return this.table.intern({
        kind: "matrix",
        column: row,
        columns: type.rows,
      });
    }

    // Non-float matrices are arrays of row vectors
    const decorations: Spv.Decoration[] = [];
    if (rule !== LayoutRule.NoLayout) {
      const { stride } = this.evaluator.evaluate(
        type,
        rule,
        this.context.currentMajorness,
      );
      decorations.push({ kind: "ArrayStride", stride });
    }
    return this.table.intern({
      kind: "array",
      element: row,
      length: type.rows,
      decorations,
    });
  }

  private array(type: Type.Array, rule: LayoutRule): Spv.TypeId {
    const element = this.translateType(type.element, rule);
    if (element === Spv.NO_TYPE) {
      return Spv.NO_TYPE;
    }

    const decorations: Spv.Decoration[] = [];
    if (
      rule !== LayoutRule.NoLayout &&
      !isAKindOfStructuredOrByteBuffer(type.element) &&
      !isResourceType(type.element)
    ) {
      decorations.push({
        kind: "ArrayStride",
        stride: this.evaluator.arrayStride(
          type.element,
          rule,
          this.context.currentMajorness,
        ),
      });
    }

    return type.size === undefined
      ? this.table.intern({ kind: "runtime-array", element, decorations })
      : this.table.intern({
          kind: "array",
          element,
          length: type.size,
          decorations,
        });
  }

  private struct(
    type: Type.Struct,
    rule: LayoutRule,
    extra: Spv.Decoration[],
  ): Spv.TypeId {
    const fields = Type.layoutFields(type);
    const members: Spv.TypeId[] = [];
    for (const field of fields) {
      const member = this.context.withMajorness(
        field.annotations?.majorness,
        () => this.translateType(field.type, rule),
      );
      if (member === Spv.NO_TYPE) {
        return Spv.NO_TYPE;
      }
      members.push(member);
    }

    const decorations =
      rule === LayoutRule.NoLayout ? [] : this.layoutDecorations(type, rule);

    return this.table.intern({
      kind: "struct",
      name: type.name,
      members,
      memberNames: fields.map((field) => field.name),
      decorations: [...decorations, ...extra],
    });
  }

  private layoutDecorations(
    type: Type.Struct,
    rule: LayoutRule,
  ): Spv.Decoration[] {
    const decorations: Spv.Decoration[] = [];

    for (const placement of this.evaluator.placeFields(type, rule)) {
      const member = placement.index;

      const overlap = overlapError(type, placement, this.location);
      if (overlap) {
        this.report(overlap);
      }

      decorations.push({ kind: "Offset", member, offset: placement.offset });

      if (placement.matrix) {
        decorations.push({
          kind: "MatrixStride",
          member,
          stride: placement.matrix.stride,
        });
        // Source rows are target columns
        decorations.push(
          placement.matrix.rowMajor
            ? { kind: "ColMajor", member }
            : { kind: "RowMajor", member },
        );
      }
    }

    return decorations;
  }
}
