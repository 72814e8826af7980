import { Result, Severity } from "#result";
import type { SpvError } from "#errors";
import type { TranslationUnit } from "#types";
import { resolveOptions, type SpvOptions } from "#options";
import { Diagnostics } from "#diagnostics";
import { DeclMapper, type LayoutOutput } from "#mapper";
import {
  Error as StageError,
  ErrorCode as StageErrorCode,
  stageByName,
} from "#stage";

export interface LayoutPassInput {
  unit: TranslationUnit;
  options?: Partial<SpvOptions>;
}

export interface LayoutPassOutput {
  layout: LayoutOutput;
}

/**
 * A pure function from a unit to its layout, along with the messages
 * (errors/warnings) it produced
 */
export interface LayoutPass {
  run(input: LayoutPassInput): Promise<Result<LayoutPassOutput, SpvError>>;
}

/**
 * Layout pass - translates types, places stage variables and assigns
 * bindings for every declaration of a unit.
 *
 * Declarations are processed in order. Errors do not stop the pass, so a
 * single run reports every independent problem; a fatal error stops it
 * after the declaration that raised it.
 */
export const layoutPass: LayoutPass = {
  async run({ unit, options }) {
    const diagnostics = new Diagnostics();

    const stage = stageByName(unit.stage);
    if (!stage) {
      return Result.err<LayoutPassOutput, SpvError>(
        new StageError(
          StageErrorCode.UNKNOWN_STAGE,
          `"${unit.stage}"`,
          undefined,
          Severity.Fatal,
        ),
      );
    }

    const mapper = new DeclMapper(stage, resolveOptions(options), diagnostics);
    for (const decl of unit.declarations) {
      mapper.register(decl);
      if (diagnostics.hasFatal()) {
        break;
      }
    }

    if (diagnostics.hasFatal()) {
      return { success: false, messages: diagnostics.toMessages() };
    }

    const layout = mapper.finalize();
    if (diagnostics.hasErrors()) {
      return { success: false, messages: diagnostics.toMessages() };
    }
    return Result.okWith({ layout }, diagnostics.toMessages());
  },
};
