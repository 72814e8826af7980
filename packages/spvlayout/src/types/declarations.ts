/**
 * Declarations handed to the layout core by the front end
 */

import type { Type } from "./definitions";
import type { Annotations } from "./annotations";
import type { SourceLocation } from "./location";

/** Stable per-declaration identifier assigned by the front end */
export type DeclId = string;

export type Declaration =
  | Declaration.Variable
  | Declaration.Block
  | Declaration.StageIO;

export namespace Declaration {
  interface Base {
    id: DeclId;
    name: string;
    type: Type;
    loc: SourceLocation | null;
    annotations?: Annotations;
  }

  /**
   * A plain variable. Global resource variables are externally bound;
   * local ones (and function parameters) are aliases of some global.
   */
  export interface Variable extends Base {
    kind: "variable";
    scope: "global" | "local";
    /** `static` globals are private to the invocation, not shader inputs */
    static?: boolean;
  }

  /** cbuffer / tbuffer / push constant block; `type` is its struct */
  export interface Block extends Base {
    kind: "block";
    usage: "cbuffer" | "tbuffer" | "push-constant";
    type: Type.Struct;
  }

  /** Entry point parameter or return value carrying semantics */
  export interface StageIO extends Base {
    kind: "stage-io";
    direction: Direction;
  }

  export type Direction = "input" | "output";

  export const isVariable = (decl: Declaration): decl is Variable =>
    decl.kind === "variable";
  export const isBlock = (decl: Declaration): decl is Block =>
    decl.kind === "block";
  export const isStageIO = (decl: Declaration): decl is StageIO =>
    decl.kind === "stage-io";
}

/**
 * All declarations of one translation unit plus the entry point's stage
 */
export interface TranslationUnit {
  name: string;
  /** Stage name, e.g. `vs`, `ps`, `cs` */
  stage: string;
  declarations: Declaration[];
  /** Source text, only used to render diagnostics */
  source?: string;
}
