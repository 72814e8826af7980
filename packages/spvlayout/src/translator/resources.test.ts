import { describe, it, expect } from "vitest";

import { Types } from "#types";
import { LayoutRule } from "#layout";
import { Diagnostics } from "#diagnostics";
import { resolveOptions, type SpvOptions } from "#options";

import { Spv } from "./spv";
import { TypeTable } from "./type-table";
import { TypeTranslator } from "./translator";

const { float, int, uint, half } = Types;
const float2 = Types.vector(float, 2);
const float3 = Types.vector(float, 3);
const float4 = Types.vector(float, 4);

function setup(options: Partial<SpvOptions> = {}) {
  const diagnostics = new Diagnostics();
  const table = new TypeTable();
  const translator = new TypeTranslator(
    table,
    resolveOptions(options),
    diagnostics,
  );
  const shapeOf = (
    type: Parameters<TypeTranslator["translate"]>[0],
    rule = LayoutRule.NoLayout,
  ) => table.get(translator.translate(type, rule));
  const idOf = (type: Parameters<TypeTranslator["translate"]>[0]) =>
    translator.translate(type, LayoutRule.NoLayout);
  return { diagnostics, table, translator, shapeOf, idOf };
}

describe("ResourceShapeBuilder", () => {
  describe("images", () => {
    it("should build sampled images for textures", () => {
      const { shapeOf, idOf } = setup();

      expect(shapeOf(Types.opaque("Texture2D", float4))).toEqual({
        kind: "image",
        sampledType: idOf(float),
        dim: "2D",
        arrayed: false,
        multisampled: false,
        sampled: 1,
        format: "Unknown",
      });
    });

    it("should default the element to float4", () => {
      const { shapeOf, idOf } = setup();

      expect(shapeOf(Types.opaque("Texture2DMSArray"))).toEqual({
        kind: "image",
        sampledType: idOf(float),
        dim: "2D",
        arrayed: true,
        multisampled: true,
        sampled: 1,
        format: "Unknown",
      });
    });

    it("should pick a storage format from the element", () => {
      const { shapeOf } = setup();
      const formatOf = (element: Parameters<typeof Types.opaque>[1]) => {
        const shape = shapeOf(Types.opaque("RWTexture2D", element));
        return shape?.kind === "image" ? shape.format : undefined;
      };

      expect(formatOf(float)).toBe("R32f");
      expect(formatOf(float2)).toBe("Rg32f");
      expect(formatOf(Types.vector(int, 4))).toBe("Rgba32i");
      expect(formatOf(Types.vector(uint, 3))).toBe("Rgba32ui");
    });

    it("should mark storage images and writable texel buffers as sampled 2", () => {
      const { shapeOf } = setup();

      const storage = shapeOf(Types.opaque("RWTexture3D", float4));
      const texel = shapeOf(Types.opaque("RWBuffer", uint));
      const readOnly = shapeOf(Types.opaque("Buffer", uint));

      expect(storage?.kind === "image" && storage.sampled).toBe(2);
      expect(texel?.kind === "image" && [texel.dim, texel.sampled]).toEqual([
        "Buffer",
        2,
      ]);
      expect(
        readOnly?.kind === "image" && [readOnly.sampled, readOnly.format],
      ).toEqual([1, "R32ui"]);
    });

    it("should accept structs that fit in one register", () => {
      const { shapeOf } = setup();
      const packed = Types.struct("Packed", [
        Types.field("a", float),
        Types.field("b", float2),
      ]);

      const shape = shapeOf(Types.opaque("Buffer", packed));
      expect(shape?.kind === "image" && shape.format).toBe("Rgba32f");
    });

    it("should reject structs that do not fit in one register", () => {
      const { diagnostics, translator } = setup();
      const mixed = Types.struct("Mixed", [
        Types.field("a", float),
        Types.field("b", int),
      ]);

      expect(
        translator.translate(Types.opaque("Buffer", mixed), LayoutRule.NoLayout),
      ).toBe(Spv.NO_TYPE);
      expect(diagnostics.all.map((error) => error.message)).toEqual([
        "Unsupported resource element type: " +
          "all struct members should have the same element type",
      ]);
    });

    it("should reject structs in writable texel buffers", () => {
      const { diagnostics, translator } = setup();
      const single = Types.struct("Single", [Types.field("a", float)]);

      expect(
        translator.translate(
          Types.opaque("RWBuffer", single),
          LayoutRule.NoLayout,
        ),
      ).toBe(Spv.NO_TYPE);
      expect(diagnostics.all[0].message).toBe(
        "Unsupported resource element type: " +
          "cannot instantiate RWBuffer with struct type Single",
      );
    });

    it("should report elements without a storage format", () => {
      const { diagnostics, shapeOf } = setup();

      const shape = shapeOf(Types.opaque("RWTexture2D", Types.vector(half, 4)));

      expect(shape?.kind === "image" && shape.format).toBe("Unknown");
      expect(diagnostics.all.map((error) => error.message)).toEqual([
        "Unsupported resource element type: " +
          "cannot translate half4 to an image format",
      ]);
    });

    it("should build subpass inputs and samplers", () => {
      const { shapeOf } = setup();

      const subpass = shapeOf(Types.opaque("SubpassInput", float4));
      expect(
        subpass?.kind === "image" && [subpass.dim, subpass.sampled, subpass.format],
      ).toEqual(["SubpassData", 2, "Unknown"]);
      expect(shapeOf(Types.opaque("SamplerComparisonState"))).toEqual({
        kind: "sampler",
      });
    });
  });

  describe("structured buffers", () => {
    it("should wrap a runtime array of the element", () => {
      const { shapeOf, idOf, table } = setup();

      const shape = shapeOf(
        Types.opaque("StructuredBuffer", float4),
        LayoutRule.Std430,
      );

      expect(shape).toEqual({
        kind: "struct",
        name: "type.StructuredBuffer.float4",
        members: [
          table.intern({
            kind: "runtime-array",
            element: idOf(float4),
            decorations: [{ kind: "ArrayStride", stride: 16 }],
          }),
        ],
        memberNames: [""],
        decorations: [
          { kind: "Offset", member: 0, offset: 0 },
          { kind: "NonWritable", member: 0 },
          { kind: "BufferBlock" },
        ],
      });
    });

    it("should make local buffers pointers to the laid out buffer", () => {
      const { shapeOf, table } = setup();
      const S = Types.struct("S", [
        Types.field("a", float),
        Types.field("b", float3),
      ]);

      const shape = shapeOf(Types.opaque("RWStructuredBuffer", S));
      expect(shape?.kind).toBe("pointer");
      if (shape?.kind !== "pointer") {
        return;
      }
      expect(shape.storageClass).toBe("Uniform");

      const buffer = table.get(shape.pointee);
      expect(Spv.isStruct(buffer) && buffer.name).toBe(
        "type.RWStructuredBuffer.S",
      );
      expect(Spv.isStruct(buffer) && buffer.decorations).toEqual([
        { kind: "Offset", member: 0, offset: 0 },
        { kind: "BufferBlock" },
      ]);

      // relaxed std430 packs b right after a: the element is 16 bytes
      const array = Spv.isStruct(buffer) ? table.get(buffer.members[0]) : undefined;
      expect(Spv.hasDecorations(array) && array.decorations).toEqual([
        { kind: "ArrayStride", stride: 16 },
      ]);
    });

    it("should decorate matrix elements with their majorness", () => {
      const { table, translator } = setup();

      const id = translator.translate(
        Types.opaque("StructuredBuffer", Types.matrix(float, 3, 3)),
        LayoutRule.Std430,
        { majorness: "row" },
      );

      const shape = table.get(id);
      expect(Spv.isStruct(shape) && shape.decorations).toEqual([
        { kind: "ColMajor", member: 0 },
        { kind: "Offset", member: 0, offset: 0 },
        { kind: "NonWritable", member: 0 },
        { kind: "BufferBlock" },
      ]);
    });
  });

  describe("byte address buffers", () => {
    it("should wrap a runtime array of uints", () => {
      const { shapeOf, idOf, table } = setup();

      expect(
        shapeOf(Types.opaque("ByteAddressBuffer"), LayoutRule.Std430),
      ).toEqual({
        kind: "struct",
        name: "type.ByteAddressBuffer",
        members: [
          table.intern({
            kind: "runtime-array",
            element: idOf(uint),
            decorations: [{ kind: "ArrayStride", stride: 4 }],
          }),
        ],
        memberNames: [""],
        decorations: [
          { kind: "Offset", member: 0, offset: 0 },
          { kind: "NonWritable", member: 0 },
          { kind: "BufferBlock" },
        ],
      });
    });

    it("should leave writable buffers writable", () => {
      const { shapeOf, table } = setup();

      const shape = shapeOf(Types.opaque("RWByteAddressBuffer"));
      const buffer = shape?.kind === "pointer" ? table.get(shape.pointee) : undefined;

      expect(Spv.isStruct(buffer) && buffer.decorations).toEqual([
        { kind: "Offset", member: 0, offset: 0 },
        { kind: "BufferBlock" },
      ]);
    });
  });

  describe("patches and streams", () => {
    it("should translate patches to arrays of control points", () => {
      const { shapeOf, idOf } = setup();

      expect(shapeOf(Types.opaque("InputPatch", float4, 3))).toEqual({
        kind: "array",
        element: idOf(float4),
        length: 3,
        decorations: [],
      });
    });

    it("should translate streams to their vertex type", () => {
      const { idOf } = setup();
      const vertex = Types.struct("Vertex", [Types.field("pos", float4)]);

      expect(idOf(Types.opaque("TriangleStream", vertex))).toBe(idOf(vertex));
    });

    it("should require a control point count", () => {
      const { diagnostics, idOf } = setup();

      expect(idOf(Types.opaque("OutputPatch", float4))).toBe(Spv.NO_TYPE);
      expect(diagnostics.all[0].code).toBe("UnsupportedResourceElement");
    });
  });
});
