/**
 * Type translation error types
 */

import { SpvError } from "#errors";
import { Severity } from "#result";
import type { SourceLocation } from "#types";

export enum ErrorCode {
  UNSUPPORTED_TYPE = "UnsupportedType",
  UNSUPPORTED_RESOURCE_ELEMENT = "UnsupportedResourceElement",
}

export const ErrorMessages = {
  [ErrorCode.UNSUPPORTED_TYPE]: "Cannot translate type",
  [ErrorCode.UNSUPPORTED_RESOURCE_ELEMENT]:
    "Unsupported resource element type",
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
