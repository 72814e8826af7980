/**
 * Entry point interface: stage variables, locations and builtins
 */

export {
  StageVariableAssignor,
  type StageLayout,
  type StageVariable,
} from "./assignor";
export { locationCount } from "./locations";
export { Semantic } from "./semantic";
export {
  lookupSystemValue,
  validateBuiltinAnnotation,
  type SystemValueLookup,
} from "./builtins";
export {
  stageByName,
  type ExecutionModel,
  type ShaderKind,
  type Stage,
} from "./execution-model";
export {
  ClipCullPacker,
  type ClipCullArray,
  type ClipCullEntry,
  type ClipCullKind,
  type ClipCullLayout,
} from "./clip-cull";
export { Error, ErrorCode, ErrorMessages } from "./errors";
