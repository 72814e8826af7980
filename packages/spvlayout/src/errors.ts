/**
 * Base error class for everything the layout core reports
 */

import { Severity } from "#result";
import type { SourceLocation } from "#types";

export class SpvError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly location?: SourceLocation,
    public readonly severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = "SpvError";
  }
}

/**
 * Used in the default branch of a switch over a closed union so that the
 * compiler flags any unhandled variant.
 */
export function assertExhausted(value: never): never {
  throw new SpvError(
    `Unexpected variant: ${JSON.stringify(value)}`,
    "InternalError",
  );
}
