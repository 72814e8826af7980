import type { SpvError } from "#errors";
import type { SourceLocation } from "#types";

export interface Position {
  line: number;
  column: number;
}

/**
 * One-based line and column of a source offset
 */
export function positionOf(source: string, offset: number): Position {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart + 1 };
}

/**
 * Render a diagnostic as `line:col: severity[Code]: message`. Without
 * source text the raw offset is shown as `@offset` instead.
 */
export function formatDiagnostic(error: SpvError, source?: string): string {
  const body = `${error.severity}[${error.code}]: ${error.message}`;
  const where = formatLocation(error.location, source);
  return where ? `${where}: ${body}` : body;
}

function formatLocation(
  location: SourceLocation | undefined,
  source: string | undefined,
): string | undefined {
  if (!location) {
    return undefined;
  }
  if (source === undefined) {
    return `@${location.offset}`;
  }
  const { line, column } = positionOf(source, location.offset);
  return `${line}:${column}`;
}
