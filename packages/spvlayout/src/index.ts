/**
 * Memory layout, target type translation and interface assignment for
 * shader declarations
 */

export {
  Result,
  Severity,
  type Message,
  type MessagesBySeverity,
} from "#result";
export { SpvError } from "#errors";
export {
  defaultOptions,
  resolveOptions,
  type LayoutPreset,
  type SpvOptions,
} from "#options";

export * from "#types";
export {
  LayoutRule,
  LayoutEvaluator,
  computeLayout,
  type EvaluatorOptions,
  type Layout,
  type Placement,
} from "#layout";
export {
  Spv,
  TypeTable,
  TypeTranslator,
  TranslationContext,
  ResourceShapeBuilder,
  type TranslateOptions,
} from "#translator";
export {
  StageVariableAssignor,
  locationCount,
  stageByName,
  Semantic,
  type ClipCullLayout,
  type ExecutionModel,
  type ShaderKind,
  type Stage,
  type StageLayout,
  type StageVariable,
} from "#stage";
export {
  CounterTracker,
  Association,
  type CounterHandle,
  type CounterVariable,
  type FieldPath,
} from "#counter";
export { BindingAssignor, type ResourceBinding } from "#bindings";
export {
  Diagnostics,
  formatDiagnostic,
  type DiagnosticSink,
} from "#diagnostics";
export {
  DeclMapper,
  GLOBALS_ID,
  type DeclInfo,
  type LayoutOutput,
} from "#mapper";
export {
  compile,
  layoutPass,
  type CompileOptions,
  type LayoutPass,
  type LayoutPassInput,
  type LayoutPassOutput,
} from "#compiler";
