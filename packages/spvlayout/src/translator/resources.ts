/**
 * Target encodings of opaque resource types
 */

import {
  Opaque,
  Type,
  Types,
  elementBitwidth,
  fitIntoOneRegister,
  formatType,
} from "#types";
import { LayoutRule } from "#layout";
import { assertExhausted } from "#errors";

import { Spv } from "./spv";
import type { TypeTranslator } from "./translator";
import { Error as TranslatorError, ErrorCode } from "./errors";

/** Texture and texel buffer element type when none is given */
const defaultElement: Type = Types.vector(Types.float, 4);

/** One, two and three-or-four component formats per scalar kind */
const formatsByScalar: Record<
  Type.Scalar.Kind,
  readonly [Spv.ImageFormat, Spv.ImageFormat, Spv.ImageFormat] | undefined
> = {
  int: ["R32i", "Rg32i", "Rgba32i"],
  "literal-int": ["R32i", "Rg32i", "Rgba32i"],
  uint: ["R32ui", "Rg32ui", "Rgba32ui"],
  float: ["R32f", "Rg32f", "Rgba32f"],
  "literal-float": ["R32f", "Rg32f", "Rgba32f"],
  bool: undefined,
};

interface SampledElement {
  scalar: Type.Scalar;
  count: number;
}

export class ResourceShapeBuilder {
  constructor(private readonly translator: TypeTranslator) {}

  build(type: Type.Opaque, rule: LayoutRule): Spv.TypeId {
    const info = Opaque.info(type.opaque);
    switch (info.category) {
      case "texture":
        return this.image(type, info, 1, false);
      case "storage-texture":
        return this.image(type, info, 2, true);
      case "texel-buffer":
        if (info.writable && type.element && Type.isStruct(type.element)) {
          return this.fail(
            `cannot instantiate ${type.opaque} with struct type ${type.element.name}`,
          );
        }
        return this.image(type, info, info.writable ? 2 : 1, true);
      case "subpass-input":
        return this.image(type, info, 2, false);
      case "sampler":
        return this.table.intern({ kind: "sampler" });
      case "structured-buffer":
        return this.structuredBuffer(type, rule);
      case "byte-address-buffer":
        return this.byteAddressBuffer(type, info, rule);
      case "patch":
        return this.patch(type);
      case "stream":
        if (!type.element) {
          return this.fail(`${type.opaque} needs a vertex type`);
        }
        return this.translator.translateType(type.element, rule);
      default:
        return assertExhausted(info.category);
    }
  }

  private get table() {
    return this.translator.table;
  }

  private image(
    type: Type.Opaque,
    info: Opaque.Info,
    sampled: 1 | 2,
    withFormat: boolean,
  ): Spv.TypeId {
    const element = this.sampledElement(type.element ?? defaultElement);
    if (!element) {
      return Spv.NO_TYPE;
    }

    const sampledType = this.translator.translateType(
      element.scalar,
      LayoutRule.NoLayout,
    );
    if (sampledType === Spv.NO_TYPE) {
      return Spv.NO_TYPE;
    }

    return this.table.intern({
      kind: "image",
      sampledType,
      dim: info.dim ?? "2D",
      arrayed: info.arrayed ?? false,
      multisampled: info.multisampled ?? false,
      sampled,
      format: withFormat ? this.imageFormat(type, element) : "Unknown",
    });
  }

  /**
   * Scalar type and component count of a texture's element: a scalar, a
   * vector, or a struct that packs into one register
   */
  private sampledElement(element: Type): SampledElement | undefined {
    if (Type.isScalar(element)) {
      return { scalar: element, count: 1 };
    }
    if (Type.isVector(element)) {
      return { scalar: element.element, count: element.count };
    }
    if (Type.isStruct(element)) {
      const fit = fitIntoOneRegister(element);
      if (fit.fits) {
        return { scalar: fit.element, count: fit.count };
      }
      this.fail(fit.reason);
      return undefined;
    }
    this.fail(`${formatType(element)} cannot be a resource element`);
    return undefined;
  }

  /**
   * Storage image format implied by the element. Unrecognized elements are
   * reported and get the Unknown format.
   */
  private imageFormat(
    type: Type.Opaque,
    { scalar, count }: SampledElement,
  ): Spv.ImageFormat {
    const bits = elementBitwidth(scalar, this.translator.options.enable16BitTypes);
    const formats = bits === 32 ? formatsByScalar[scalar.scalar] : undefined;
    if (formats) {
      return formats[Math.min(count, 3) - 1];
    }
    this.fail(
      `cannot translate ${formatType(type.element ?? defaultElement)} ` +
        `to an image format`,
    );
    return "Unknown";
  }

  /**
   * A struct holding one runtime array of the element. Without a layout
   * rule the buffer is a local alias, so the result is a pointer to the
   * buffer laid out with the structured buffer rule.
   */
  private structuredBuffer(type: Type.Opaque, rule: LayoutRule): Spv.TypeId {
    const element = type.element;
    if (!element) {
      return this.fail(`${type.opaque} needs an element type`);
    }

    const asAlias = rule === LayoutRule.NoLayout;
    const bufferRule = asAlias
      ? this.translator.options.sBufferLayoutRule
      : rule;
    const majorness = this.translator.context.currentMajorness;

    const elementType = this.translator.translateType(element, bufferRule);
    if (elementType === Spv.NO_TYPE) {
      return Spv.NO_TYPE;
    }

    const { size } = this.translator.evaluator.evaluate(
      element,
      bufferRule,
      majorness,
    );
    const runtimeArray = this.table.intern({
      kind: "runtime-array",
      element: elementType,
      decorations: [{ kind: "ArrayStride", stride: size }],
    });

    const decorations: Spv.Decoration[] = [];
    if (Type.isMatrix(element) && Type.isMatrix(Type.reduceMatrix(element))) {
      decorations.push(
        this.translator.evaluator.isRowMajor(element, majorness)
          ? { kind: "ColMajor", member: 0 }
          : { kind: "RowMajor", member: 0 },
      );
    }
    decorations.push({ kind: "Offset", member: 0, offset: 0 });
    if (type.opaque === "StructuredBuffer") {
      decorations.push({ kind: "NonWritable", member: 0 });
    }
    decorations.push({ kind: "BufferBlock" });

    const elementName = Type.isStruct(element)
      ? element.name
      : formatType(element);
    const buffer = this.table.intern({
      kind: "struct",
      name: `type.${type.opaque}.${elementName}`,
      members: [runtimeArray],
      memberNames: [""],
      decorations,
    });

    return asAlias ? this.uniformPointer(buffer) : buffer;
  }

  private byteAddressBuffer(
    type: Type.Opaque,
    info: Opaque.Info,
    rule: LayoutRule,
  ): Spv.TypeId {
    const uint = this.table.intern({ kind: "int", bits: 32, signed: false });
    const runtimeArray = this.table.intern({
      kind: "runtime-array",
      element: uint,
      decorations: [{ kind: "ArrayStride", stride: 4 }],
    });

    const decorations: Spv.Decoration[] = [
      { kind: "Offset", member: 0, offset: 0 },
    ];
    if (!info.writable) {
      decorations.push({ kind: "NonWritable", member: 0 });
    }
    decorations.push({ kind: "BufferBlock" });

    const buffer = this.table.intern({
      kind: "struct",
      name: `type.${type.opaque}`,
      members: [runtimeArray],
      memberNames: [""],
      decorations,
    });

    return rule === LayoutRule.NoLayout ? this.uniformPointer(buffer) : buffer;
  }

  private patch(type: Type.Opaque): Spv.TypeId {
    if (!type.element || type.count === undefined) {
      return this.fail(`${type.opaque} needs a control point type and count`);
    }
    const element = this.translator.translateType(
      type.element,
      LayoutRule.NoLayout,
    );
    if (element === Spv.NO_TYPE) {
      return Spv.NO_TYPE;
    }
    return this.table.intern({
      kind: "array",
      element,
      length: type.count,
      decorations: [],
    });
  }

  private uniformPointer(pointee: Spv.TypeId): Spv.TypeId {
    return this.table.intern({
      kind: "pointer",
      storageClass: "Uniform",
      pointee,
    });
  }

  private fail(message: string): Spv.TypeId {
    this.translator.report(
      new TranslatorError(
        ErrorCode.UNSUPPORTED_RESOURCE_ELEMENT,
        message,
        this.translator.currentLocation,
      ),
    );
    return Spv.NO_TYPE;
  }
}
