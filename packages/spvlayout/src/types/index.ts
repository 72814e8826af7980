/**
 * Source type system
 *
 * Type descriptors, declarations and classification, kept apart from the
 * layout and translation logic so every component can depend on them.
 */

export { Type } from "./definitions";
export type { Annotations, Binding, PackOffset } from "./annotations";
export { type SourceLocation, isSourceLocation } from "./location";
export {
  Declaration,
  type DeclId,
  type TranslationUnit,
} from "./declarations";
export { Types } from "./factories";
export { formatType } from "./formatter";
export * from "./classify";
