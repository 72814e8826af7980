/**
 * Stage variable flattening and location assignment
 *
 * Each entry point input or output is flattened into one stage variable
 * per scalar, vector, matrix or array leaf. A struct given a semantic
 * passes it down to all its leaves, with the index incremented per leaf:
 * a struct of two fields bound to `COLOR1` yields `COLOR1` and `COLOR2`.
 *
 * Geometry, hull and domain shaders receive one struct per vertex or
 * control point, and hull shaders write one per control point. There the
 * outermost array (or patch) is taken off and each leaf becomes an array
 * of that size: `VSOut input[3]` yields `COLOR0` as a `float4[3]`.
 *
 * Locations are handed out by {@link StageVariableAssignor.finalize},
 * separately for inputs and outputs, once every declaration of the unit
 * has been registered.
 */

import {
  Type,
  Types,
  formatType,
  type Annotations,
  type DeclId,
  type Declaration,
  type SourceLocation,
} from "#types";
import { LayoutRule } from "#layout";
import { Spv, type TypeTranslator } from "#translator";
import type { DiagnosticSink } from "#diagnostics";
import type { SpvOptions } from "#options";

import { Semantic } from "./semantic";
import type { Stage } from "./execution-model";
import {
  isClipOrCull,
  isTarget,
  lookupSystemValue,
  validateBuiltinAnnotation,
} from "./builtins";
import { locationCount } from "./locations";
import { ClipCullPacker, type ClipCullLayout } from "./clip-cull";
import { Error as StageError, ErrorCode } from "./errors";

export interface StageVariable {
  declId: DeclId;
  /** `in.var.TEXCOORD0`, `out.var.SV_Target1`, or the builtin's name */
  name: string;
  /** Source path of the flattened leaf, e.g. `input.uv` */
  path: string;
  semantic?: Semantic;
  direction: Declaration.Direction;
  storageClass: "Input" | "Output";
  type: Type;
  typeId: Spv.TypeId;
  locationCount: number;
  builtin?: string;
  explicitLocation?: number;
  /** Output index for dual-source blending */
  index?: number;
  /** Resolved by finalize for every non-builtin variable */
  location?: number;
  loc: SourceLocation | null;
}

export interface StageLayout {
  variables: readonly StageVariable[];
  clipCull: ClipCullLayout;
}

export class StageVariableAssignor {
  private readonly variables: StageVariable[] = [];
  private readonly byDecl = new Map<DeclId, StageVariable[]>();
  /** Claimed semantics per direction, mapped to the claiming leaf */
  private readonly claimed = new Map<string, string>();
  private readonly clipCull = new ClipCullPacker();
  private layout: StageLayout | undefined;

  constructor(
    private readonly stage: Stage,
    private readonly translator: TypeTranslator,
    private readonly options: SpvOptions,
    private readonly sink: DiagnosticSink,
  ) {}

  /**
   * Create the stage variables of a declaration. Registering the same
   * declaration again returns the variables created the first time.
   */
  register(decl: Declaration.StageIO): readonly StageVariable[] {
    const existing = this.byDecl.get(decl.id);
    if (existing) {
      return existing;
    }

    const created: StageVariable[] = [];
    this.byDecl.set(decl.id, created);
    const arrayed = this.perVertex(decl);
    this.flatten(
      decl,
      arrayed ? arrayed.element : decl.type,
      decl.annotations ?? {},
      decl.name,
      undefined,
      created,
      arrayed?.size,
    );
    return created;
  }

  variablesOf(declId: DeclId): readonly StageVariable[] {
    return this.byDecl.get(declId) ?? [];
  }

  /**
   * Assign locations and pack clip and cull distances. Later calls return
   * the first result.
   */
  finalize(): StageLayout {
    if (!this.layout) {
      this.assignLocations("input");
      this.assignLocations("output");
      this.layout = {
        variables: this.variables,
        clipCull: this.clipCull.pack(),
      };
    }
    return this.layout;
  }

  private flatten(
    decl: Declaration.StageIO,
    type: Type,
    annotations: Annotations,
    path: string,
    inherited: Semantic | undefined,
    out: StageVariable[],
    arraySize?: number,
  ): void {
    if (Type.isStruct(type)) {
      const inherit =
        inherited ??
        (annotations.semantic !== undefined
          ? Semantic.parse(annotations.semantic)
          : undefined);
      for (const field of Type.layoutFields(type)) {
        this.flatten(
          decl,
          field.type,
          field.annotations ?? {},
          field.name ? `${path}.${field.name}` : path,
          inherit,
          out,
          arraySize,
        );
      }
      return;
    }

    let semantic: Semantic | undefined;
    if (inherited) {
      semantic = { name: inherited.name, index: inherited.index };
      inherited.index++;
    } else if (annotations.semantic !== undefined) {
      semantic = Semantic.parse(annotations.semantic);
    }

    const variable = this.leaf(
      decl,
      arraySize === undefined ? type : Types.array(type, arraySize),
      annotations,
      path,
      semantic,
    );
    if (variable) {
      this.variables.push(variable);
      out.push(variable);
    }
  }

  private leaf(
    decl: Declaration.StageIO,
    type: Type,
    annotations: Annotations,
    path: string,
    semantic: Semantic | undefined,
  ): StageVariable | undefined {
    const { direction } = decl;

    const unsupported = this.unsupported(type);
    if (unsupported) {
      this.fail(decl, ErrorCode.UNSUPPORTED_TYPE, `${path}: ${unsupported}`);
      return undefined;
    }

    let builtin: string | undefined;
    if (annotations.builtin !== undefined) {
      const problem = validateBuiltinAnnotation(
        annotations.builtin,
        this.stage.kind,
        direction,
      );
      if (problem) {
        this.fail(decl, ErrorCode.INVALID_BUILTIN, problem);
        return undefined;
      }
      builtin = annotations.builtin;
    } else if (!semantic) {
      this.fail(decl, ErrorCode.MISSING_SEMANTIC, `${path} has no semantic`);
      return undefined;
    }

    const claim = semantic ? Semantic.key(semantic) : `builtin ${builtin}`;
    const claimKey = `${direction} ${claim}`;
    const previous = this.claimed.get(claimKey);
    if (previous !== undefined) {
      this.fail(
        decl,
        ErrorCode.DUPLICATE_SEMANTIC,
        `${claim} ${direction} of ${path} is already used by ${previous}`,
      );
      return undefined;
    }
    this.claimed.set(claimKey, path);

    if (builtin === undefined && semantic && Semantic.isSystemValue(semantic)) {
      const lookup = lookupSystemValue(semantic, this.stage.kind, direction);
      switch (lookup.kind) {
        case "unknown":
          this.fail(
            decl,
            ErrorCode.INVALID_BUILTIN,
            `unknown system value ${semantic.name}`,
          );
          return undefined;
        case "not-allowed":
          this.fail(
            decl,
            ErrorCode.INVALID_BUILTIN,
            `${semantic.name} cannot be used as ${this.stage.kind} ${direction}`,
          );
          return undefined;
        case "builtin":
          builtin = lookup.builtin;
          break;
        case "location":
          break;
      }
    }

    const clipCull = semantic ? isClipOrCull(semantic) : undefined;
    if (semantic && clipCull && builtin !== undefined) {
      try {
        this.clipCull.record(
          {
            declId: decl.id,
            name: path,
            kind: clipCull,
            direction,
            semanticIndex: semantic.index,
          },
          type,
        );
      } catch (error) {
        if (!(error instanceof StageError)) {
          throw error;
        }
        this.fail(
          decl,
          ErrorCode.UNSUPPORTED_TYPE,
          `${path}: ${formatType(type)} is not a float or float vector`,
        );
      }
      return undefined;
    }

    const typeId = this.translator.translate(type, LayoutRule.NoLayout, {
      location: decl.loc,
    });
    if (typeId === Spv.NO_TYPE) {
      return undefined;
    }

    const prefix = direction === "input" ? "in" : "out";
    const variable: StageVariable = {
      declId: decl.id,
      name:
        builtin !== undefined
          ? builtin
          : `${prefix}.var.${semantic ? Semantic.format(semantic) : path}`,
      path,
      direction,
      storageClass: direction === "input" ? "Input" : "Output",
      type,
      typeId,
      locationCount: locationCount(type, this.options.enable16BitTypes),
      loc: decl.loc,
    };
    if (semantic) {
      variable.semantic = semantic;
    }
    if (builtin !== undefined) {
      variable.builtin = builtin;
    } else {
      const explicit =
        annotations.location ??
        (semantic && isTarget(semantic) ? semantic.index : undefined);
      if (explicit !== undefined) {
        variable.explicitLocation = explicit;
      }
    }
    if (annotations.index !== undefined) {
      variable.index = annotations.index;
    }
    return variable;
  }

  /**
   * The per-vertex element and count of a declaration whose outermost
   * level is an array of structs or a patch, in a stage where that level
   * is one entry per vertex or control point
   */
  private perVertex(
    decl: Declaration.StageIO,
  ): { element: Type; size: number } | undefined {
    const { kind } = this.stage;
    const arrayed =
      decl.direction === "input"
        ? kind === "geometry" || kind === "hull" || kind === "domain"
        : kind === "hull";
    if (!arrayed) {
      return undefined;
    }

    const { type } = decl;
    if (
      Type.isArray(type) &&
      type.size !== undefined &&
      Type.isStruct(type.element)
    ) {
      return { element: type.element, size: type.size };
    }
    if (
      Type.isOpaque(type) &&
      (type.opaque === "InputPatch" || type.opaque === "OutputPatch") &&
      type.element !== undefined &&
      type.count !== undefined
    ) {
      return { element: type.element, size: type.count };
    }
    return undefined;
  }

  /**
   * Why a leaf type cannot be a stage variable, if it cannot
   */
  private unsupported(type: Type): string | undefined {
    if (Type.isArray(type) && Type.isStruct(Type.innermost(type))) {
      return `arrays of structs cannot be flattened (${formatType(type)})`;
    }
    if (Type.isArray(type) && type.size === undefined) {
      return `unbounded array ${formatType(type)}`;
    }
    if (Type.isOpaque(Type.innermost(type))) {
      return `resource ${formatType(type)}`;
    }
    return undefined;
  }

  private assignLocations(direction: Declaration.Direction): void {
    const pending = this.variables.filter(
      (variable) =>
        variable.direction === direction && variable.builtin === undefined,
    );

    // Dual-source outputs share a location between index 0 and 1
    const used = new Set<string>();
    const slot = (location: number, variable: StageVariable) =>
      `${location}/${variable.index ?? 0}`;
    const slots = (start: number, variable: StageVariable) =>
      Array.from({ length: variable.locationCount }, (_, i) => start + i);

    for (const variable of pending) {
      if (variable.explicitLocation === undefined) {
        continue;
      }
      const start = variable.explicitLocation;
      const taken = slots(start, variable).find((location) =>
        used.has(slot(location, variable)),
      );
      if (taken !== undefined) {
        this.sink.report(
          new StageError(
            ErrorCode.DUPLICATE_SEMANTIC,
            `${direction} location ${taken} of ${variable.path} is already assigned`,
            variable.loc ?? undefined,
          ),
        );
      }
      for (const location of slots(start, variable)) {
        used.add(slot(location, variable));
      }
      variable.location = start;
    }

    const automatic = pending.filter(
      (variable) => variable.explicitLocation === undefined,
    );
    if (this.options.stageIoOrder === "alpha") {
      const text = (variable: StageVariable) =>
        variable.semantic ? Semantic.format(variable.semantic) : variable.path;
      automatic.sort((a, b) =>
        text(a) < text(b) ? -1 : text(a) > text(b) ? 1 : 0,
      );
    }

    for (const variable of automatic) {
      let start = 0;
      while (
        slots(start, variable).some((location) =>
          used.has(slot(location, variable)),
        )
      ) {
        start++;
      }
      for (const location of slots(start, variable)) {
        used.add(slot(location, variable));
      }
      variable.location = start;
    }
  }

  private fail(
    decl: Declaration.StageIO,
    code: ErrorCode,
    message: string,
  ): void {
    this.sink.report(new StageError(code, message, decl.loc ?? undefined));
  }
}
