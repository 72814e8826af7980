/**
 * System-value semantics and explicit builtin annotations
 */

import type { Declaration } from "#types";

import type { ShaderKind } from "./execution-model";
import { Semantic } from "./semantic";

type Direction = Declaration.Direction;

/**
 * What a system-value semantic becomes for one stage and direction: a
 * builtin name, or `location` for an ordinary location-assigned variable
 */
type Mapping = string;

type SignatureTable = Partial<
  Record<ShaderKind, Partial<Record<Direction, Mapping>>>
>;

const systemValues: Partial<Record<string, SignatureTable>> = {
  SV_POSITION: {
    vertex: { input: "location", output: "Position" },
    geometry: { input: "Position", output: "Position" },
    hull: { input: "Position", output: "Position" },
    domain: { input: "Position", output: "Position" },
    pixel: { input: "FragCoord" },
  },
  SV_VERTEXID: { vertex: { input: "VertexIndex" } },
  SV_INSTANCEID: { vertex: { input: "InstanceIndex" } },
  SV_ISFRONTFACE: { pixel: { input: "FrontFacing" } },
  SV_DEPTH: { pixel: { output: "FragDepth" } },
  SV_DEPTHGREATEREQUAL: { pixel: { output: "FragDepth" } },
  SV_DEPTHLESSEQUAL: { pixel: { output: "FragDepth" } },
  SV_TARGET: { pixel: { output: "location" } },
  SV_COVERAGE: { pixel: { input: "SampleMask", output: "SampleMask" } },
  SV_SAMPLEINDEX: { pixel: { input: "SampleId" } },
  SV_STENCILREF: { pixel: { output: "FragStencilRefEXT" } },
  SV_PRIMITIVEID: {
    pixel: { input: "PrimitiveId" },
    geometry: { input: "PrimitiveId", output: "PrimitiveId" },
    hull: { input: "PrimitiveId" },
    domain: { input: "PrimitiveId" },
  },
  SV_RENDERTARGETARRAYINDEX: {
    vertex: { output: "Layer" },
    geometry: { output: "Layer" },
    domain: { output: "Layer" },
    pixel: { input: "Layer" },
  },
  SV_VIEWPORTARRAYINDEX: {
    vertex: { output: "ViewportIndex" },
    geometry: { output: "ViewportIndex" },
    domain: { output: "ViewportIndex" },
    pixel: { input: "ViewportIndex" },
  },
  SV_CLIPDISTANCE: {
    vertex: { output: "ClipDistance" },
    geometry: { input: "ClipDistance", output: "ClipDistance" },
    hull: { input: "ClipDistance", output: "ClipDistance" },
    domain: { input: "ClipDistance", output: "ClipDistance" },
    pixel: { input: "ClipDistance" },
  },
  SV_CULLDISTANCE: {
    vertex: { output: "CullDistance" },
    geometry: { input: "CullDistance", output: "CullDistance" },
    hull: { input: "CullDistance", output: "CullDistance" },
    domain: { input: "CullDistance", output: "CullDistance" },
    pixel: { input: "CullDistance" },
  },
  SV_TESSFACTOR: {
    hull: { output: "TessLevelOuter" },
    domain: { input: "TessLevelOuter" },
  },
  SV_INSIDETESSFACTOR: {
    hull: { output: "TessLevelInner" },
    domain: { input: "TessLevelInner" },
  },
  SV_DOMAINLOCATION: { domain: { input: "TessCoord" } },
  SV_OUTPUTCONTROLPOINTID: { hull: { input: "InvocationId" } },
  SV_GSINSTANCEID: { geometry: { input: "InvocationId" } },
  SV_DISPATCHTHREADID: { compute: { input: "GlobalInvocationId" } },
  SV_GROUPID: { compute: { input: "WorkgroupId" } },
  SV_GROUPTHREADID: { compute: { input: "LocalInvocationId" } },
  SV_GROUPINDEX: { compute: { input: "LocalInvocationIndex" } },
  SV_VIEWID: {
    vertex: { input: "ViewIndex" },
    geometry: { input: "ViewIndex" },
    hull: { input: "ViewIndex" },
    domain: { input: "ViewIndex" },
    pixel: { input: "ViewIndex" },
  },
};

export type SystemValueLookup =
  | { kind: "builtin"; builtin: string }
  | { kind: "location" }
  | { kind: "unknown" }
  | { kind: "not-allowed" };

/**
 * Resolve a system-value semantic for a stage and direction
 */
export function lookupSystemValue(
  semantic: Semantic,
  stage: ShaderKind,
  direction: Direction,
): SystemValueLookup {
  const table = systemValues[semantic.name.toUpperCase()];
  if (!table) {
    return { kind: "unknown" };
  }
  const mapping = table[stage]?.[direction];
  if (!mapping) {
    return { kind: "not-allowed" };
  }
  return mapping === "location"
    ? { kind: "location" }
    : { kind: "builtin", builtin: mapping };
}

/** Builtins with no semantic, requested through an annotation */
const annotatedBuiltins: Record<string, SignatureTable> = {
  PointSize: {
    vertex: { output: "PointSize" },
    hull: { input: "PointSize", output: "PointSize" },
    domain: { input: "PointSize", output: "PointSize" },
    geometry: { input: "PointSize", output: "PointSize" },
  },
  HelperInvocation: { pixel: { input: "HelperInvocation" } },
  BaseVertex: { vertex: { input: "BaseVertex" } },
  BaseInstance: { vertex: { input: "BaseInstance" } },
  DrawIndex: { vertex: { input: "DrawIndex" } },
  DeviceIndex: {
    vertex: { input: "DeviceIndex" },
    pixel: { input: "DeviceIndex" },
    geometry: { input: "DeviceIndex" },
    hull: { input: "DeviceIndex" },
    domain: { input: "DeviceIndex" },
    compute: { input: "DeviceIndex" },
  },
};

/**
 * Check an explicit builtin annotation. Returns the problem, if any.
 */
export function validateBuiltinAnnotation(
  builtin: string,
  stage: ShaderKind,
  direction: Direction,
): string | undefined {
  const table = Object.hasOwn(annotatedBuiltins, builtin)
    ? annotatedBuiltins[builtin]
    : undefined;
  if (!table) {
    return `unknown builtin "${builtin}"`;
  }
  if (!table[stage]?.[direction]) {
    return `builtin "${builtin}" cannot be used as ${stage} ${direction}`;
  }
  return undefined;
}

export const isClipOrCull = (semantic: Semantic): "clip" | "cull" | undefined =>
  Semantic.is(semantic, "SV_ClipDistance")
    ? "clip"
    : Semantic.is(semantic, "SV_CullDistance")
      ? "cull"
      : undefined;

export const isTarget = (semantic: Semantic): boolean =>
  Semantic.is(semantic, "SV_Target");
