/**
 * Shader stages and the execution models they run as
 */

export type ShaderKind =
  | "pixel"
  | "vertex"
  | "geometry"
  | "hull"
  | "domain"
  | "compute"
  | "raygeneration"
  | "intersection"
  | "anyhit"
  | "closesthit"
  | "miss"
  | "callable";

export type ExecutionModel =
  | "Fragment"
  | "Vertex"
  | "Geometry"
  | "TessellationControl"
  | "TessellationEvaluation"
  | "GLCompute"
  | "RayGenerationNV"
  | "IntersectionNV"
  | "AnyHitNV"
  | "ClosestHitNV"
  | "MissNV"
  | "CallableNV";

export interface Stage {
  kind: ShaderKind;
  model: ExecutionModel;
}

const models: Record<ShaderKind, ExecutionModel> = {
  pixel: "Fragment",
  vertex: "Vertex",
  geometry: "Geometry",
  hull: "TessellationControl",
  domain: "TessellationEvaluation",
  compute: "GLCompute",
  raygeneration: "RayGenerationNV",
  intersection: "IntersectionNV",
  anyhit: "AnyHitNV",
  closesthit: "ClosestHitNV",
  miss: "MissNV",
  callable: "CallableNV",
};

const shortNames = new Map<string, ShaderKind>([
  ["ps", "pixel"],
  ["vs", "vertex"],
  ["gs", "geometry"],
  ["hs", "hull"],
  ["ds", "domain"],
  ["cs", "compute"],
]);

const isShaderKind = (name: string): name is ShaderKind =>
  Object.hasOwn(models, name);

/**
 * Look up a stage by its profile prefix (`vs`, `ps`, ...) or its full
 * name (`vertex`, `closesthit`, ...)
 */
export function stageByName(name: string): Stage | undefined {
  const lowered = name.toLowerCase();
  const kind =
    shortNames.get(lowered) ?? (isShaderKind(lowered) ? lowered : undefined);
  return kind ? { kind, model: models[kind] } : undefined;
}
