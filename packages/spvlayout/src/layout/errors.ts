/**
 * Layout error types
 */

import { SpvError } from "#errors";
import { Severity } from "#result";
import type { SourceLocation } from "#types";

export enum ErrorCode {
  UNSUPPORTED_TYPE = "UnsupportedType",
  LAYOUT_OVERLAP = "LayoutOverlap",
}

export const ErrorMessages = {
  [ErrorCode.UNSUPPORTED_TYPE]: "Type has no memory layout",
  [ErrorCode.LAYOUT_OVERLAP]: "Explicit offset overlaps previous members",
};

export class Error extends SpvError {
  constructor(
    code: ErrorCode,
    message?: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, location, severity);
  }
}
