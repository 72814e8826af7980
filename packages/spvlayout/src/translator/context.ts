import type { Type } from "#types";

/**
 * Transient state of one translation: the majorness annotated on the
 * declaration or field being translated, and the type a literal should
 * resolve to. Frames are pushed and popped around a callback so they are
 * strictly nested and never outlive the call that pushed them.
 */
export class TranslationContext {
  private readonly majorness: (Type.Majorness | undefined)[] = [];
  private readonly literalHints: Type.Scalar[] = [];

  get currentMajorness(): Type.Majorness | undefined {
    return this.majorness[this.majorness.length - 1];
  }

  get currentLiteralHint(): Type.Scalar | undefined {
    return this.literalHints[this.literalHints.length - 1];
  }

  /** Number of open frames; zero between top-level calls */
  get depth(): number {
    return this.majorness.length + this.literalHints.length;
  }

  withMajorness<T>(majorness: Type.Majorness | undefined, fn: () => T): T {
    this.majorness.push(majorness);
    try {
      return fn();
    } finally {
      this.majorness.pop();
    }
  }

  withLiteralHint<T>(hint: Type.Scalar, fn: () => T): T {
    this.literalHints.push(hint);
    try {
      return fn();
    } finally {
      this.literalHints.pop();
    }
  }

  /** Distinguishes memoized translations made under different frames */
  key(): string {
    const hint = this.currentLiteralHint;
    return `${this.currentMajorness ?? "-"}|${
      hint ? `${hint.scalar}${hint.bits}` : "-"
    }`;
  }
}
