/**
 * Fixture Test Suite
 *
 * Discovers every YAML file under cases/ and runs the layout and unit
 * cases it declares. See schema.ts for the file format.
 */

import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { glob } from "glob";
import YAML from "yaml";

import { computeLayout, LayoutEvaluator } from "#layout";
import { resolveOptions } from "#options";
import { compile } from "#compiler";
import { Result } from "#result";
import { Spv } from "#translator";
import type { LayoutOutput } from "#mapper";
import { Type } from "#types";

import {
  parseFixture,
  type Fixture,
  type LayoutCase,
  type UnitCase,
} from "./schema";

const CASES_DIR = path.resolve(__dirname, "cases");

async function loadFixtures(): Promise<[string, Fixture][]> {
  const files = await glob("**/*.yaml", { cwd: CASES_DIR });
  files.sort();

  return Promise.all(
    files.map(async (file): Promise<[string, Fixture]> => {
      const source = await fs.readFile(path.join(CASES_DIR, file), "utf-8");
      return [file, parseFixture(YAML.parse(source), file)];
    }),
  );
}

function runLayoutCase({ rule, type, options, expect: expected }: LayoutCase) {
  const resolved = resolveOptions(options);
  const result = computeLayout(type, rule, resolved);

  if (expected.error !== undefined) {
    expect(result.success).toBe(false);
    expect(Result.errors(result).map((error) => error.message)).toEqual([
      expected.error,
    ]);
    return;
  }

  expect(result.success).toBe(true);
  if (!result.success) {
    return;
  }
  const layout = result.value;
  if (expected.alignment !== undefined) {
    expect(layout.alignment).toBe(expected.alignment);
  }
  if (expected.size !== undefined) {
    expect(layout.size).toBe(expected.size);
  }
  if (expected.stride !== undefined) {
    expect(layout.stride).toBe(expected.stride);
  }
  if (expected.offsets !== undefined) {
    if (!Type.isStruct(type)) {
      throw new Error("offsets are only expected of structs");
    }
    const evaluator = new LayoutEvaluator(resolved);
    expect(
      evaluator.placeFields(type, rule).map(({ offset }) => offset),
    ).toEqual(expected.offsets);
  }
}

/** Member offsets of a declaration's struct, looking through pointers */
function memberOffsets(layout: LayoutOutput, declId: string): number[] {
  const info = layout.declarations.get(declId);
  const declared = info ? layout.types.get(info.typeId) : undefined;
  const type = Spv.isPointer(declared)
    ? layout.types.get(declared.pointee)
    : declared;
  if (!Spv.isStruct(type)) {
    throw new Error(`${declId} is not laid out as a struct`);
  }
  const { members, decorations } = type;
  return members.map((_, member) => {
    const offset = Spv.memberDecorations(decorations, member).find(
      (decoration) => decoration.kind === "Offset",
    );
    return offset?.kind === "Offset" ? offset.offset : -1;
  });
}

async function runUnitCase({ unit, options, expect: expected }: UnitCase) {
  const result = await compile(unit, options);

  if (expected.errors !== undefined) {
    expect(Result.errors(result).map((error) => error.code)).toEqual(
      expected.errors,
    );
  }
  if (expected.warnings !== undefined) {
    expect(Result.warnings(result).map((warning) => warning.code)).toEqual(
      expected.warnings,
    );
  }

  const success = expected.success ?? expected.errors === undefined;
  expect(result.success).toBe(success);
  if (!result.success) {
    return;
  }
  const layout = result.value;

  if (expected.locations !== undefined) {
    expect(
      Object.fromEntries(
        layout.stageVariables
          .filter(({ builtin }) => builtin === undefined)
          .map(({ name, location }) => [name, location]),
      ),
    ).toEqual(expected.locations);
  }
  if (expected.builtins !== undefined) {
    expect(
      Object.fromEntries(
        layout.stageVariables.flatMap(({ path, builtin }) =>
          builtin === undefined ? [] : [[path, builtin]],
        ),
      ),
    ).toEqual(expected.builtins);
  }
  if (expected.bindings !== undefined) {
    expect(
      Object.fromEntries(
        layout.bindings.map(({ name, binding, set }) => [name, [binding, set]]),
      ),
    ).toEqual(expected.bindings);
  }
  if (expected.offsets !== undefined) {
    for (const [declId, offsets] of Object.entries(expected.offsets)) {
      expect(memberOffsets(layout, declId)).toEqual(offsets);
    }
  }
  if (expected.counters !== undefined) {
    expect(layout.counters.map(({ name }) => name)).toEqual(expected.counters);
  }
  if (expected.clipCull !== undefined) {
    expect(
      Object.fromEntries(
        layout.clipCull.entries.map(({ name, offset }) => [name, offset]),
      ),
    ).toEqual(expected.clipCull);
  }
}

describe("Fixtures", async () => {
  const fixtures = await loadFixtures();

  for (const [file, { layouts, units }] of fixtures) {
    describe(file, () => {
      for (const layoutCase of layouts) {
        it(`should lay out ${layoutCase.name}`, () => {
          runLayoutCase(layoutCase);
        });
      }
      for (const unitCase of units) {
        it(`should compile ${unitCase.name}`, async () => {
          await runUnitCase(unitCase);
        });
      }
    });
  }
});
