import { describe, it, expect } from "vitest";

import { Types } from "#types";
import { SpvError } from "#errors";

import { locationCount } from "./locations";

const { float, double, half } = Types;

describe("locationCount", () => {
  it("should give scalars and narrow vectors one location", () => {
    expect(locationCount(float)).toBe(1);
    expect(locationCount(double)).toBe(1);
    expect(locationCount(Types.vector(float, 4))).toBe(1);
    expect(locationCount(Types.vector(double, 2))).toBe(1);
  });

  it("should give wide 64-bit vectors two locations", () => {
    expect(locationCount(Types.vector(double, 3))).toBe(2);
    expect(locationCount(Types.vector(double, 4))).toBe(2);
    expect(locationCount(Types.vector(Types.int64, 3))).toBe(2);
    expect(locationCount(Types.vector(half, 4), true)).toBe(1);
  });

  it("should count one location per matrix row", () => {
    expect(locationCount(Types.matrix(float, 3, 4, "row"))).toBe(3);
    expect(locationCount(Types.matrix(double, 2, 3))).toBe(4);
  });

  it("should count single-row and single-column matrices as vectors", () => {
    expect(locationCount(Types.matrix(float, 1, 4))).toBe(1);
    expect(locationCount(Types.matrix(float, 4, 1))).toBe(1);
    expect(locationCount(Types.matrix(float, 1, 1))).toBe(1);
    expect(locationCount(Types.matrix(double, 4, 1))).toBe(2);
  });

  it("should multiply by the array size", () => {
    expect(locationCount(Types.array(Types.vector(float, 2), 4))).toBe(4);
    expect(
      locationCount(Types.array(Types.array(Types.vector(double, 4), 2), 3)),
    ).toBe(12);
  });

  it("should reject shapes without a location count", () => {
    expect(() => locationCount(Types.array(float))).toThrow(
      "Type cannot be a stage variable: unbounded array float[]",
    );
    expect(() => locationCount(Types.opaque("Texture2D"))).toThrow(SpvError);
    expect(() => locationCount(Types.struct("S", []))).toThrow(
      "struct S must be flattened before counting locations",
    );
  });
});
