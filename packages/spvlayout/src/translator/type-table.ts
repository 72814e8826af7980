import { Spv } from "./spv";

/**
 * Interns target types: structurally equal types share one id.
 * Ids start at 1; 0 is {@link Spv.NO_TYPE}.
 */
export class TypeTable {
  private readonly types: Spv.Type[] = [];
  private readonly ids = new Map<string, Spv.TypeId>();

  intern(type: Spv.Type): Spv.TypeId {
    const key = canonicalKey(type);
    const existing = this.ids.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.types.push(type);
    const id = this.types.length;
    this.ids.set(key, id);
    return id;
  }

  get(id: Spv.TypeId): Spv.Type | undefined {
    return id === Spv.NO_TYPE ? undefined : this.types[id - 1];
  }

  get size(): number {
    return this.types.length;
  }

  *entries(): IterableIterator<[Spv.TypeId, Spv.Type]> {
    for (let index = 0; index < this.types.length; index++) {
      yield [index + 1, this.types[index]];
    }
  }
}

function canonicalKey(value: unknown): string {
  return JSON.stringify(value, (_key, entry: unknown) =>
    entry !== null && typeof entry === "object" && !Array.isArray(entry)
      ? Object.fromEntries(
          Object.entries(entry).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
        )
      : entry,
  );
}
