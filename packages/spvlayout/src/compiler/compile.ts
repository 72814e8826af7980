import { Result } from "#result";
import type { SpvError } from "#errors";
import type { TranslationUnit } from "#types";
import type { SpvOptions } from "#options";
import type { LayoutOutput } from "#mapper";

import { layoutPass } from "./layout-pass";

export type CompileOptions = Partial<SpvOptions>;

/**
 * Lay out one translation unit
 */
export async function compile(
  unit: TranslationUnit,
  options: CompileOptions = {},
): Promise<Result<LayoutOutput, SpvError>> {
  const result = await layoutPass.run({ unit, options });
  return Result.map(result, ({ layout }) => layout);
}
