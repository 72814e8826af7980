/**
 * Descriptor binding assignment
 *
 * Resources with an explicit binding keep it; binding the same
 * (binding, set) twice is allowed but warned about. Counters with an
 * explicit counter binding come next. Everything else receives the lowest
 * binding not yet used in the default descriptor set, in the order the
 * resources were added.
 */

import type { Binding, DeclId, SourceLocation } from "#types";
import { Severity } from "#result";
import type { DiagnosticSink } from "#diagnostics";

import { Error as BindingError, ErrorCode } from "./errors";

export interface ResourceBinding {
  declId: DeclId;
  /** Variable name; counters are named after their buffer */
  name: string;
  counter: boolean;
  binding: number;
  set: number;
  explicit: boolean;
}

interface Request {
  declId: DeclId;
  name: string;
  counter: boolean;
  requested?: Binding;
  loc: SourceLocation | null;
}

export class BindingAssignor {
  private readonly requests: Request[] = [];
  private assigned: ResourceBinding[] | undefined;

  constructor(
    private readonly defaultSet: number,
    private readonly sink: DiagnosticSink,
  ) {}

  addResource(
    declId: DeclId,
    name: string,
    requested: Binding | undefined,
    loc: SourceLocation | null,
  ): void {
    this.add({ declId, name, counter: false, loc, ...withBinding(requested) });
  }

  addCounter(
    declId: DeclId,
    name: string,
    requested: Binding | undefined,
    loc: SourceLocation | null,
  ): void {
    this.add({ declId, name, counter: true, loc, ...withBinding(requested) });
  }

  /**
   * Resolve every binding. The result is kept until another resource is
   * added.
   */
  finalize(): ResourceBinding[] {
    if (this.assigned) {
      return this.assigned;
    }

    const used = new Set<string>();
    const key = (binding: number, set: number) => `${set}/${binding}`;
    const resolved = new Map<Request, ResourceBinding>();

    const reserve = (request: Request, requested: Binding) => {
      const set = requested.set ?? this.defaultSet;
      if (used.has(key(requested.binding, set))) {
        this.sink.report(
          new BindingError(
            ErrorCode.DUPLICATE_BINDING,
            `${request.name} uses binding ${requested.binding} in set ${set}`,
            request.loc ?? undefined,
            Severity.Warning,
          ),
        );
      }
      used.add(key(requested.binding, set));
      resolved.set(request, {
        declId: request.declId,
        name: request.name,
        counter: request.counter,
        binding: requested.binding,
        set,
        explicit: true,
      });
    };

    for (const counterPass of [false, true]) {
      for (const request of this.requests) {
        if (request.counter === counterPass && request.requested) {
          reserve(request, request.requested);
        }
      }
    }

    let next = 0;
    for (const request of this.requests) {
      if (resolved.has(request)) {
        continue;
      }
      while (used.has(key(next, this.defaultSet))) {
        next++;
      }
      used.add(key(next, this.defaultSet));
      resolved.set(request, {
        declId: request.declId,
        name: request.name,
        counter: request.counter,
        binding: next,
        set: this.defaultSet,
        explicit: false,
      });
    }

    this.assigned = this.requests.flatMap((request) => {
      const binding = resolved.get(request);
      return binding ? [binding] : [];
    });
    return this.assigned;
  }

  private add(request: Request): void {
    this.assigned = undefined;
    this.requests.push(request);
  }
}

const withBinding = (requested: Binding | undefined) =>
  requested ? { requested } : {};
