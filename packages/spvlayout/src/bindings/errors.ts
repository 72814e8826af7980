/**
 * Resource binding error types
 */

import { SpvError } from "#errors";
import { Severity } from "#result";
import type { SourceLocation } from "#types";

export enum ErrorCode {
  DUPLICATE_BINDING = "DuplicateBinding",
  MULTIPLE_PUSH_CONSTANTS = "MultiplePushConstants",
}

export const ErrorMessages = {
  [ErrorCode.DUPLICATE_BINDING]: "Binding number already used",
  [ErrorCode.MULTIPLE_PUSH_CONSTANTS]: "Only one push constant block allowed",
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
