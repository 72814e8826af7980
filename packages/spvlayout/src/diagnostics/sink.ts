/**
 * Collection point for diagnostics raised while laying out a unit
 */

import { Result, Severity, type MessagesBySeverity } from "#result";
import type { SpvError } from "#errors";

export interface DiagnosticSink {
  report(error: SpvError): void;
}

export class Diagnostics implements DiagnosticSink {
  private readonly reported: SpvError[] = [];

  report(error: SpvError): void {
    this.reported.push(error);
  }

  get all(): readonly SpvError[] {
    return this.reported;
  }

  hasFatal(): boolean {
    return this.reported.some((error) => error.severity === Severity.Fatal);
  }

  hasErrors(): boolean {
    return this.reported.some(
      (error) =>
        error.severity === Severity.Fatal || error.severity === Severity.Error,
    );
  }

  toMessages(): MessagesBySeverity<SpvError> {
    return Result.group(this.reported);
  }
}
