/**
 * Stage interface error types
 */

import { SpvError } from "#errors";
import { Severity } from "#result";
import type { SourceLocation } from "#types";

export enum ErrorCode {
  UNSUPPORTED_TYPE = "UnsupportedType",
  DUPLICATE_SEMANTIC = "DuplicateSemantic",
  MISSING_SEMANTIC = "MissingSemantic",
  INVALID_BUILTIN = "InvalidBuiltin",
  UNKNOWN_STAGE = "UnknownStage",
}

export const ErrorMessages = {
  [ErrorCode.UNSUPPORTED_TYPE]: "Type cannot be a stage variable",
  [ErrorCode.DUPLICATE_SEMANTIC]: "Duplicate stage interface",
  [ErrorCode.MISSING_SEMANTIC]: "Missing semantic",
  [ErrorCode.INVALID_BUILTIN]: "Invalid builtin",
  [ErrorCode.UNKNOWN_STAGE]: "Unknown shader stage",
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
