export { type DiagnosticSink, Diagnostics } from "./sink";
export { formatDiagnostic, positionOf, type Position } from "./format";
