import { describe, test, expect } from "vitest";
import { decodeGrant, isBitSet, packWeights, setBits } from "./grant.js";

describe("decodeGrant", () => {
  test("zero is idle", () => {
    expect(decodeGrant(0n, 4)).toEqual({ kind: "idle" });
  });

  test("a single bit decodes to its index", () => {
    expect(decodeGrant(0b0100n, 4)).toEqual({ kind: "granted", client: 2 });
  });

  test("several bits are illegal", () => {
    expect(decodeGrant(0b1001n, 4)).toEqual({
      kind: "illegal",
      reason: "multiple",
      clients: [0, 3],
    });
  });

  test("a bit beyond the client count is illegal", () => {
    expect(decodeGrant(0b1_0000n, 4)).toEqual({
      kind: "illegal",
      reason: "out-of-range",
      clients: [4],
    });
  });
});

describe("bit vectors", () => {
  test("setBits lists indices lowest first", () => {
    expect(setBits(0b1010_0001n)).toEqual([0, 5, 7]);
    expect(setBits(0n)).toEqual([]);
  });

  test("isBitSet", () => {
    expect(isBitSet(0b0100n, 2)).toBe(true);
    expect(isBitSet(0b0100n, 1)).toBe(false);
  });
});

describe("weight packing", () => {
  test("client i occupies bits [i*W, i*W+W)", () => {
    expect(packWeights([1, 3, 0, 2], 4)).toBe(0x2031n);
  });

  test("weights are truncated to the field width", () => {
    expect(packWeights([0x1f, 1], 4)).toBe(0x1fn);
  });

  test("narrow fields", () => {
    expect(packWeights([1, 2, 3], 2)).toBe(0b11_10_01n);
  });
});
