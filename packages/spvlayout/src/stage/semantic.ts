/**
 * A semantic string split into name and index: `TEXCOORD3` is `TEXCOORD`
 * with index 3, `COLOR` is `COLOR` with index 0.
 */
export interface Semantic {
  name: string;
  index: number;
}

export namespace Semantic {
  export function parse(text: string): Semantic {
    const match = /^(.*?)(\d+)$/.exec(text);
    if (!match || match[1] === "") {
      return { name: text, index: 0 };
    }
    return { name: match[1], index: Number(match[2]) };
  }

  export const format = ({ name, index }: Semantic): string =>
    `${name}${index}`;

  /** Semantic names are case-insensitive */
  export const key = (semantic: Semantic): string =>
    format({ name: semantic.name.toUpperCase(), index: semantic.index });

  export const isSystemValue = ({ name }: Semantic): boolean =>
    name.toUpperCase().startsWith("SV_");

  export const is = (semantic: Semantic, name: string): boolean =>
    semantic.name.toUpperCase() === name.toUpperCase();
}
