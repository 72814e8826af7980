/**
 * Annotations already parsed by the front end. They are syntactically
 * valid; semantic checks (overlap, duplication) happen in this package.
 */

import type { Type } from "./definitions";

export interface PackOffset {
  /** Register number, in 16-byte units */
  subcomponent: number;
  /** Component within the register, in 4-byte units */
  component: number;
}

export interface Binding {
  binding: number;
  set?: number;
}

export interface Annotations {
  /** Explicit byte offset within the enclosing struct */
  offset?: number;
  packOffset?: PackOffset;
  /** Explicit interface location */
  location?: number;
  /** Explicit output index (dual-source blending) */
  index?: number;
  binding?: Binding;
  counterBinding?: Binding;
  majorness?: Type.Majorness;
  /** Interface semantic string, e.g. `TEXCOORD2` or `SV_Position` */
  semantic?: string;
  /** Explicit target builtin name, e.g. `PointSize` */
  builtin?: string;
}
