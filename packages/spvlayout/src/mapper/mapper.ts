/**
 * Per-declaration orchestration
 *
 * Routes every declaration of a unit to the components that need it:
 * the type translator for its target type, the stage variable assignor
 * for entry point interfaces, the counter tracker for buffers with
 * counters, and the binding assignor for bound resources. Each
 * declaration is processed once; registering it again returns the same
 * record.
 *
 * Non-static globals that are not resources are shader parameters. They
 * are gathered, in declaration order, into one implicit constant buffer
 * named `$Globals`, laid out under the constant buffer rule and bound
 * like any other constant buffer.
 */

import {
  Types,
  isAKindOfStructuredOrByteBuffer,
  isOrContainsAKindOfStructuredOrByteBuffer,
  isOrContainsOpaque,
  isResourceType,
  type DeclId,
  type Declaration,
  type SourceLocation,
  type Type,
} from "#types";
import { LayoutRule } from "#layout";
import { Spv, TypeTable, TypeTranslator } from "#translator";
import {
  StageVariableAssignor,
  type ClipCullLayout,
  type Stage,
  type StageVariable,
} from "#stage";
import {
  CounterTracker,
  type Association,
  type CounterVariable,
} from "#counter";
import {
  BindingAssignor,
  Error as BindingError,
  ErrorCode as BindingErrorCode,
  type ResourceBinding,
} from "#bindings";
import { assertExhausted } from "#errors";
import type { DiagnosticSink } from "#diagnostics";
import type { SpvOptions } from "#options";

/** Declaration id of the implicit constant buffer holding plain globals */
export const GLOBALS_ID: DeclId = "$Globals";

export interface DeclInfo {
  declId: DeclId;
  /** {@link Spv.NO_TYPE} when the type could not be translated */
  typeId: Spv.TypeId;
  storageClass: Spv.StorageClass;
  rule: LayoutRule;
  /** Refers to a buffer bound elsewhere, through a pointer */
  alias: boolean;
  stageVariables?: readonly StageVariable[];
  counters?: readonly Association[];
  /** Member index within `$Globals`, for globals gathered there */
  member?: number;
}

export interface LayoutOutput {
  stage: Stage;
  types: TypeTable;
  declarations: ReadonlyMap<DeclId, DeclInfo>;
  stageVariables: readonly StageVariable[];
  clipCull: ClipCullLayout;
  counters: readonly CounterVariable[];
  bindings: readonly ResourceBinding[];
}

export class DeclMapper {
  readonly types = new TypeTable();
  readonly translator: TypeTranslator;
  readonly counters: CounterTracker;
  private readonly stageVariables: StageVariableAssignor;
  private readonly bindings: BindingAssignor;
  private readonly infos = new Map<DeclId, DeclInfo>();
  /** Name of the push constant block, once one is seen */
  private pushConstant: string | undefined;
  private readonly globals: Type.Field[] = [];
  private globalsLoc: SourceLocation | null = null;

  constructor(
    readonly stage: Stage,
    private readonly options: SpvOptions,
    private readonly sink: DiagnosticSink,
  ) {
    this.translator = new TypeTranslator(this.types, options, sink);
    this.counters = new CounterTracker(this.translator, sink);
    this.stageVariables = new StageVariableAssignor(
      stage,
      this.translator,
      options,
      sink,
    );
    this.bindings = new BindingAssignor(options.defaultDescriptorSet, sink);
  }

  register(decl: Declaration): DeclInfo {
    const existing = this.infos.get(decl.id);
    if (existing) {
      return existing;
    }

    let info: DeclInfo;
    switch (decl.kind) {
      case "variable":
        info = this.variable(decl);
        break;
      case "block":
        info = this.block(decl);
        break;
      case "stage-io":
        info = this.stageIO(decl);
        break;
      default:
        return assertExhausted(decl);
    }

    this.infos.set(decl.id, info);
    return info;
  }

  get(declId: DeclId): DeclInfo | undefined {
    return this.infos.get(declId);
  }

  /**
   * Resolve locations and bindings for everything registered so far
   */
  finalize(): LayoutOutput {
    if (this.globals.length > 0 && !this.infos.has(GLOBALS_ID)) {
      const rule = this.options.cBufferLayoutRule;
      this.infos.set(GLOBALS_ID, {
        declId: GLOBALS_ID,
        typeId: this.translator.translateBlock(
          Types.struct("type.$Globals", this.globals),
          rule,
          { location: this.globalsLoc },
        ),
        storageClass: "Uniform",
        rule,
        alias: false,
      });
    }

    const { variables, clipCull } = this.stageVariables.finalize();
    return {
      stage: this.stage,
      types: this.types,
      declarations: this.infos,
      stageVariables: variables,
      clipCull,
      counters: this.counters.counters(),
      bindings: this.bindings.finalize(),
    };
  }

  private variable(decl: Declaration.Variable): DeclInfo {
    const bound = decl.scope === "global" && isResourceType(decl.type);
    const buffer = isAKindOfStructuredOrByteBuffer(decl.type);
    const gathered =
      decl.scope === "global" &&
      decl.static !== true &&
      !isOrContainsOpaque(decl.type);

    let rule: LayoutRule = LayoutRule.NoLayout;
    let storageClass: Spv.StorageClass;
    if (bound) {
      if (buffer) {
        rule = this.options.sBufferLayoutRule;
        storageClass = "Uniform";
      } else {
        storageClass = "UniformConstant";
      }
    } else if (gathered) {
      rule = this.options.cBufferLayoutRule;
      storageClass = "Uniform";
    } else {
      storageClass = decl.scope === "global" ? "Private" : "Function";
    }

    const typeId = this.translator.translate(decl.type, rule, {
      location: decl.loc,
      majorness: decl.annotations?.majorness,
    });

    if (bound) {
      this.bindings.addResource(
        decl.id,
        decl.name,
        decl.annotations?.binding,
        decl.loc,
      );
    }

    const member = gathered ? this.gather(decl) : undefined;

    const counters = this.counters.register(decl);
    for (const association of counters) {
      const counter = this.counters.variable(association.counter);
      if (association.kind === "direct" && counter) {
        const requested = counter.counterBinding;
        this.bindings.addCounter(
          decl.id,
          counter.name,
          requested && {
            binding: requested.binding,
            set: requested.set ?? decl.annotations?.binding?.set,
          },
          decl.loc,
        );
      }
    }

    return {
      declId: decl.id,
      typeId,
      storageClass,
      rule,
      alias: !bound && isOrContainsAKindOfStructuredOrByteBuffer(decl.type),
      ...(counters.length > 0 ? { counters } : {}),
      ...(member !== undefined ? { member } : {}),
    };
  }

  /**
   * Add a global to `$Globals`, requesting the block's binding when the
   * first one arrives
   */
  private gather(decl: Declaration.Variable): number {
    if (this.globals.length === 0) {
      this.bindings.addResource(GLOBALS_ID, GLOBALS_ID, undefined, decl.loc);
      this.globalsLoc = decl.loc;
    }
    this.globals.push(Types.field(decl.name, decl.type, decl.annotations));
    return this.globals.length - 1;
  }

  private block(decl: Declaration.Block): DeclInfo {
    let rule: LayoutRule;
    let storageClass: Spv.StorageClass = "Uniform";

    switch (decl.usage) {
      case "cbuffer":
        rule = this.options.cBufferLayoutRule;
        break;
      case "tbuffer":
        rule = this.options.tBufferLayoutRule;
        break;
      case "push-constant":
        rule = this.options.pushConstantLayoutRule;
        storageClass = "PushConstant";
        break;
      default:
        return assertExhausted(decl.usage);
    }

    if (decl.usage === "push-constant") {
      if (this.pushConstant !== undefined) {
        this.sink.report(
          new BindingError(
            BindingErrorCode.MULTIPLE_PUSH_CONSTANTS,
            `${decl.name} declared after ${this.pushConstant}`,
            decl.loc ?? undefined,
          ),
        );
        return {
          declId: decl.id,
          typeId: Spv.NO_TYPE,
          storageClass,
          rule,
          alias: false,
        };
      }
      this.pushConstant = decl.name;
    } else {
      this.bindings.addResource(
        decl.id,
        decl.name,
        decl.annotations?.binding,
        decl.loc,
      );
    }

    return {
      declId: decl.id,
      typeId: this.translator.translateBlock(decl.type, rule, {
        location: decl.loc,
      }),
      storageClass,
      rule,
      alias: false,
    };
  }

  private stageIO(decl: Declaration.StageIO): DeclInfo {
    const stageVariables = this.stageVariables.register(decl);
    return {
      declId: decl.id,
      typeId: this.translator.translate(decl.type, LayoutRule.NoLayout, {
        location: decl.loc,
        majorness: decl.annotations?.majorness,
      }),
      storageClass: "Function",
      rule: LayoutRule.NoLayout,
      alias: false,
      stageVariables,
    };
  }
}
