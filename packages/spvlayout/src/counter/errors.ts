/**
 * Counter association error types
 */

import { SpvError } from "#errors";
import { Severity } from "#result";
import type { SourceLocation } from "#types";

export enum ErrorCode {
  STRUCT_SHAPE_MISMATCH = "StructShapeMismatch",
}

export const ErrorMessages = {
  [ErrorCode.STRUCT_SHAPE_MISMATCH]:
    "Buffer-bearing members of the assigned values do not match",
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
