/**
 * Result type shared by every component.
 *
 * A result is either a success carrying a value or a failure; both carry
 * the messages produced while computing it, grouped by severity.
 */

export enum Severity {
  Fatal = "fatal",
  Error = "error",
  Warning = "warning",
  Note = "note",
}

export interface Message {
  message: string;
  severity: Severity;
}

export type MessagesBySeverity<E extends Message> = {
  [S in Severity]?: E[];
};

export type Result<T, E extends Message> =
  | { success: true; value: T; messages: MessagesBySeverity<E> }
  | { success: false; messages: MessagesBySeverity<E> };

export namespace Result {
  export function ok<T, E extends Message = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  export function okWith<T, E extends Message>(
    value: T,
    messages: MessagesBySeverity<E>,
  ): Result<T, E> {
    return { success: true, value, messages };
  }

  export function err<T, E extends Message>(errors: E | E[]): Result<T, E> {
    return {
      success: false,
      messages: group(Array.isArray(errors) ? errors : [errors]),
    };
  }

  export function map<T, U, E extends Message>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  }

  /**
   * Every message of error severity or worse
   */
  export function errors<T, E extends Message>(result: Result<T, E>): E[] {
    return [
      ...(result.messages[Severity.Fatal] ?? []),
      ...(result.messages[Severity.Error] ?? []),
    ];
  }

  export function warnings<T, E extends Message>(result: Result<T, E>): E[] {
    return result.messages[Severity.Warning] ?? [];
  }

  export function hasErrors<T, E extends Message>(
    result: Result<T, E>,
  ): boolean {
    return errors(result).length > 0;
  }

  /**
   * Group a flat list of messages by their severity
   */
  export function group<E extends Message>(
    messages: Iterable<E>,
  ): MessagesBySeverity<E> {
    const grouped: MessagesBySeverity<E> = {};
    for (const message of messages) {
      const bucket = grouped[message.severity] ?? [];
      bucket.push(message);
      grouped[message.severity] = bucket;
    }
    return grouped;
  }
}
