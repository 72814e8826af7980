/** Base alignment of a four-component 32-bit vector */
export const VEC4_ALIGNMENT = 16;

export function roundToPow2(value: number, pow2: number): number {
  if (pow2 <= 0 || (pow2 & (pow2 - 1)) !== 0) {
    throw new RangeError(`alignment ${pow2} is not a power of two`);
  }
  return Math.ceil(value / pow2) * pow2;
}

export const isPowerOfTwo = (value: number): boolean =>
  value > 0 && (value & (value - 1)) === 0;

/**
 * Whether a vector of `size` bytes placed at `offset` crosses a 16-byte
 * boundary in a way the relaxed rules forbid.
 *
 * Vectors wider than 16 bytes (three- and four-component 64-bit vectors)
 * must start on a boundary. Their alignment already guarantees that under
 * every rule that reaches this check, so that branch never reports a
 * straddle in practice.
 */
export function improperStraddle(size: number, offset: number): boolean {
  return size <= VEC4_ALIGNMENT
    ? Math.floor(offset / VEC4_ALIGNMENT) !==
        Math.floor((offset + size - 1) / VEC4_ALIGNMENT)
    : offset % VEC4_ALIGNMENT !== 0;
}
