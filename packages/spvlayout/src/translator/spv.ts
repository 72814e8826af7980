/**
 * Target types and decorations
 *
 * Types refer to each other by the numeric id handed out by the
 * {@link TypeTable}. A source matrix of R rows and C columns becomes a
 * target matrix of R column vectors of C components: source rows map to
 * target columns, and member majorness decorations are flipped to match.
 */
export namespace Spv {
  export type TypeId = number;

  /** Returned when a type could not be translated */
  export const NO_TYPE: TypeId = 0;

  export type Type =
    | { kind: "void" }
    | { kind: "bool" }
    | { kind: "int"; bits: number; signed: boolean }
    | { kind: "float"; bits: number }
    | { kind: "vector"; element: TypeId; count: number }
    | { kind: "matrix"; column: TypeId; columns: number }
    | {
        kind: "array";
        element: TypeId;
        length: number;
        decorations: Decoration[];
      }
    | { kind: "runtime-array"; element: TypeId; decorations: Decoration[] }
    | {
        kind: "struct";
        name: string;
        members: TypeId[];
        memberNames: string[];
        decorations: Decoration[];
      }
    | Image
    | { kind: "sampler" }
    | { kind: "pointer"; storageClass: StorageClass; pointee: TypeId };

  export interface Image {
    kind: "image";
    sampledType: TypeId;
    dim: Dim;
    arrayed: boolean;
    multisampled: boolean;
    /** 1 when used with a sampler, 2 for storage images */
    sampled: 1 | 2;
    format: ImageFormat;
  }

  export type Dim = "1D" | "2D" | "3D" | "Cube" | "Buffer" | "SubpassData";

  export type ImageFormat =
    | "Unknown"
    | "R32f"
    | "Rg32f"
    | "Rgba32f"
    | "R32i"
    | "Rg32i"
    | "Rgba32i"
    | "R32ui"
    | "Rg32ui"
    | "Rgba32ui";

  export type StorageClass =
    | "UniformConstant"
    | "Uniform"
    | "PushConstant"
    | "Private"
    | "Function"
    | "Input"
    | "Output";

  /**
   * Member decorations name the member index they apply to; the others
   * apply to the whole type.
   */
  export type Decoration =
    | { kind: "Offset"; member: number; offset: number }
    | { kind: "MatrixStride"; member: number; stride: number }
    | { kind: "RowMajor"; member: number }
    | { kind: "ColMajor"; member: number }
    | { kind: "NonWritable"; member: number }
    | { kind: "ArrayStride"; stride: number }
    | { kind: "BufferBlock" }
    | { kind: "Block" };

  export type DecorationKind = Decoration["kind"];

  export const isStruct = (
    type: Type | undefined,
  ): type is Extract<Type, { kind: "struct" }> => type?.kind === "struct";

  export const isPointer = (
    type: Type | undefined,
  ): type is Extract<Type, { kind: "pointer" }> => type?.kind === "pointer";

  export const hasDecorations = (
    type: Type | undefined,
  ): type is Extract<Type, { decorations: Decoration[] }> =>
    !!type && "decorations" in type;

  /**
   * Decorations of one struct member
   */
  export function memberDecorations(
    decorations: readonly Decoration[],
    member: number,
  ): Decoration[] {
    return decorations.filter(
      (decoration) => "member" in decoration && decoration.member === member,
    );
  }
}
