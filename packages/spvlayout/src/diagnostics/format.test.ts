import { describe, it, expect } from "vitest";

import { SpvError } from "#errors";
import { Severity } from "#result";

import { formatDiagnostic, positionOf } from "./format";
import { Diagnostics } from "./sink";

const source = "cbuffer Globals {\n  float4 tint;\n};\n";

describe("positionOf", () => {
  it("should count lines and columns from one", () => {
    expect(positionOf(source, 0)).toEqual({ line: 1, column: 1 });
    expect(positionOf(source, 20)).toEqual({ line: 2, column: 3 });
  });

  it("should clamp offsets past the end", () => {
    expect(positionOf("ab", 10)).toEqual({ line: 1, column: 3 });
  });
});

describe("formatDiagnostic", () => {
  const error = new SpvError(
    "Type has no memory layout",
    "UnsupportedType",
    { offset: 20, length: 6 },
    Severity.Fatal,
  );

  it("should render line and column when the source is known", () => {
    expect(formatDiagnostic(error, source)).toBe(
      "2:3: fatal[UnsupportedType]: Type has no memory layout",
    );
  });

  it("should fall back to the raw offset", () => {
    expect(formatDiagnostic(error)).toBe(
      "@20: fatal[UnsupportedType]: Type has no memory layout",
    );
  });

  it("should omit the location when there is none", () => {
    const unlocated = new SpvError("Unknown stage", "UnknownStage");
    expect(formatDiagnostic(unlocated, source)).toBe(
      "error[UnknownStage]: Unknown stage",
    );
  });
});

describe("Diagnostics", () => {
  it("should group reported errors by severity", () => {
    const diagnostics = new Diagnostics();
    const warning = new SpvError("w", "DuplicateBinding", undefined, Severity.Warning);
    const error = new SpvError("e", "LayoutOverlap");

    diagnostics.report(warning);
    expect(diagnostics.hasErrors()).toBe(false);

    diagnostics.report(error);
    expect(diagnostics.hasErrors()).toBe(true);
    expect(diagnostics.hasFatal()).toBe(false);
    expect(diagnostics.toMessages()).toEqual({
      [Severity.Warning]: [warning],
      [Severity.Error]: [error],
    });
  });
});
