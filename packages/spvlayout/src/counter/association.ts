/**
 * Links between buffers that keep a counter and the counter variables
 *
 * A buffer declared at global scope owns its counter directly. Any other
 * buffer (a local, a parameter, or a struct member) is an alias that may
 * be pointed at different buffers over time, so its counter is an alias
 * too: a slot holding a reference to some direct counter, rebound by
 * assignment.
 */

/** Identifies one counter variable within a unit */
export type CounterHandle = number;

/** Struct member indices leading from a declaration to a buffer field */
export type FieldPath = readonly number[];

export type Association = Association.Direct | Association.Alias;

export namespace Association {
  export interface Direct {
    kind: "direct";
    path: FieldPath;
    counter: CounterHandle;
  }

  export interface Alias {
    kind: "alias";
    path: FieldPath;
    /** The alias slot itself */
    counter: CounterHandle;
    /** Direct counter the slot currently refers to, once assigned */
    target?: CounterHandle;
  }

  export const isDirect = (association: Association): association is Direct =>
    association.kind === "direct";

  export const isAlias = (association: Association): association is Alias =>
    association.kind === "alias";

  /**
   * The direct counter an association resolves to, if any
   */
  export const resolve = (
    association: Association,
  ): CounterHandle | undefined =>
    isDirect(association) ? association.counter : association.target;

  export const samePath = (a: FieldPath, b: FieldPath): boolean =>
    a.length === b.length && a.every((index, i) => index === b[i]);

  export const startsWith = (path: FieldPath, prefix: FieldPath): boolean =>
    prefix.length <= path.length &&
    prefix.every((index, i) => index === path[i]);
}
