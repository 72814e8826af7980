/**
 * Counter alias tracking
 *
 * Every append, consume or RW structured buffer reachable from a
 * declaration gets a counter variable when the declaration is registered.
 * Struct members are discovered depth-first and addressed by their field
 * path; for
 *
 *   struct S { AppendStructuredBuffer<uint> a; int pad;
 *              ConsumeStructuredBuffer<uint> b; };
 *
 * a declaration of type S has counters at paths [0] and [2]. A buffer
 * declared on its own has a single counter at path [].
 */

import {
  Type,
  isRWAppendConsumeSBuffer,
  type Binding,
  type DeclId,
  type Declaration,
  type SourceLocation,
} from "#types";
import type { Spv, TypeTranslator } from "#translator";
import type { DiagnosticSink } from "#diagnostics";

import {
  Association,
  type CounterHandle,
  type FieldPath,
} from "./association";
import { Error as CounterError, ErrorCode } from "./errors";

export interface CounterVariable {
  handle: CounterHandle;
  /** `counter.var.<buffer>` or `counter.<decl>.<field>...` */
  name: string;
  declId: DeclId;
  path: FieldPath;
  /** Direct counters are bound resources; alias slots are private */
  storageClass: "Uniform" | "Private";
  typeId: Spv.TypeId;
  counterBinding?: Binding;
}

export class CounterTracker {
  private readonly associations = new Map<DeclId, Association[]>();
  private readonly locations = new Map<DeclId, SourceLocation | undefined>();
  private readonly variables: CounterVariable[] = [];

  constructor(
    private readonly translator: TypeTranslator,
    private readonly sink: DiagnosticSink,
  ) {}

  /**
   * Create the counters of a declaration. Registering it again returns
   * the associations created the first time.
   */
  register(decl: Declaration.Variable): readonly Association[] {
    const existing = this.associations.get(decl.id);
    if (existing) {
      return existing;
    }

    const found: Association[] = [];
    this.associations.set(decl.id, found);
    this.locations.set(decl.id, decl.loc ?? undefined);

    if (isRWAppendConsumeSBuffer(decl.type)) {
      found.push(
        decl.scope === "global"
          ? this.createDirect(decl)
          : this.createAlias(decl, [], []),
      );
    } else if (Type.isStruct(decl.type)) {
      this.discover(decl, decl.type, [], [], found);
    }

    return found;
  }

  /**
   * The association of the buffer at `path` within the declaration
   */
  get(declId: DeclId, path: FieldPath = []): Association | undefined {
    return this.associationsOf(declId).find((association) =>
      Association.samePath(association.path, path),
    );
  }

  associationsOf(declId: DeclId): readonly Association[] {
    return this.associations.get(declId) ?? [];
  }

  counters(): readonly CounterVariable[] {
    return this.variables;
  }

  variable(handle: CounterHandle): CounterVariable | undefined {
    return this.variables.find((variable) => variable.handle === handle);
  }

  /**
   * Rebind the counters of `dst` to the counters of `src`, as when one is
   * assigned to the other.
   *
   * With prefixes, only the counters of `dst` under `dstPrefix` take part,
   * each matched with the counter of `src` at the same relative path under
   * `srcPrefix`. That covers assigning nested members, such as `t.s = u`.
   *
   * Every counter of `dst` must have a counterpart in `src`; otherwise
   * StructShapeMismatch is reported and nothing is rebound. Direct
   * counters are never rebound.
   */
  assign(
    dst: DeclId,
    src: DeclId,
    dstPrefix: FieldPath = [],
    srcPrefix: FieldPath = [],
  ): boolean {
    const pairs: [Association, Association][] = [];

    for (const target of this.associationsOf(dst)) {
      if (!Association.startsWith(target.path, dstPrefix)) {
        continue;
      }
      const path = [...srcPrefix, ...target.path.slice(dstPrefix.length)];
      const source = this.get(src, path);
      if (!source) {
        this.sink.report(
          new CounterError(
            ErrorCode.STRUCT_SHAPE_MISMATCH,
            `${dst} has a counter at [${target.path.join(", ")}] ` +
              `but ${src} has none at [${path.join(", ")}]`,
            this.locations.get(dst),
          ),
        );
        return false;
      }
      pairs.push([target, source]);
    }

    for (const [target, source] of pairs) {
      if (Association.isAlias(target)) {
        target.target = Association.resolve(source);
      }
    }
    return true;
  }

  private discover(
    decl: Declaration.Variable,
    type: Type.Struct,
    path: number[],
    names: string[],
    found: Association[],
  ): void {
    Type.layoutFields(type).forEach((field, index) => {
      const fieldPath = [...path, index];
      const fieldNames = [...names, field.name];
      if (isRWAppendConsumeSBuffer(field.type)) {
        found.push(this.createAlias(decl, fieldPath, fieldNames));
      } else if (Type.isStruct(field.type)) {
        this.discover(decl, field.type, fieldPath, fieldNames, found);
      }
    });
  }

  private createDirect(decl: Declaration.Variable): Association.Direct {
    const variable: CounterVariable = {
      handle: this.variables.length + 1,
      name: `counter.var.${decl.name}`,
      declId: decl.id,
      path: [],
      storageClass: "Uniform",
      typeId: this.translator.counterType(),
    };
    if (decl.annotations?.counterBinding) {
      variable.counterBinding = decl.annotations.counterBinding;
    }
    this.variables.push(variable);
    return { kind: "direct", path: [], counter: variable.handle };
  }

  private createAlias(
    decl: Declaration.Variable,
    path: number[],
    names: string[],
  ): Association.Alias {
    const pointer = this.translator.table.intern({
      kind: "pointer",
      storageClass: "Uniform",
      pointee: this.translator.counterType(),
    });
    const variable: CounterVariable = {
      handle: this.variables.length + 1,
      name:
        names.length === 0
          ? `counter.var.${decl.name}`
          : `counter.${[decl.name, ...names].join(".")}`,
      declId: decl.id,
      path,
      storageClass: "Private",
      typeId: pointer,
    };
    this.variables.push(variable);
    return { kind: "alias", path, counter: variable.handle };
  }
}
