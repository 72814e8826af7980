export interface SourceLocation {
  offset: number;
  length: number;
}

export const isSourceLocation = (loc: unknown): loc is SourceLocation =>
  typeof loc === "object" &&
  !!loc &&
  "offset" in loc &&
  typeof loc.offset === "number" &&
  loc.offset >= 0 &&
  "length" in loc &&
  typeof loc.length === "number" &&
  loc.length >= 0;
