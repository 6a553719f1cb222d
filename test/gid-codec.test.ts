import { describe, expect, it } from "vitest";

import { decodeGid, encodeGid, TILE_ID_MASK } from "../src/tiled/gid.js";

// Deterministic spread of u32 values (LCG), so failures reproduce.
function sampleU32(n: number): number[] {
  const out: number[] = [];
  let s = 0x12345678;
  for (let i = 0; i < n; i++) {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    out.push(s);
  }
  return out;
}

describe("GID codec", () => {
  it("decodes 0 as the empty cell with no flags", () => {
    expect(decodeGid(0)).toEqual({
      tileId: 0,
      flippedHorizontally: false,
      flippedVertically: false,
      flippedDiagonally: false,
    });
  });

  it("splits flag bits from the tile id", () => {
    expect(decodeGid(0x80000005)).toEqual({
      tileId: 5,
      flippedHorizontally: true,
      flippedVertically: false,
      flippedDiagonally: false,
    });
    expect(decodeGid(0x40000002).flippedVertically).toBe(true);
    expect(decodeGid(0x20000003).flippedDiagonally).toBe(true);

    const all = decodeGid(0xe0000007);
    expect(all.tileId).toBe(7);
    expect([all.flippedHorizontally, all.flippedVertically, all.flippedDiagonally]).toEqual([
      true,
      true,
      true,
    ]);
  });

  it("keeps all 29 id bits", () => {
    expect(decodeGid(TILE_ID_MASK).tileId).toBe(0x1fffffff);
    expect(decodeGid(0xffffffff).tileId).toBe(0x1fffffff);
  });

  it("treats inputs modulo 2^32", () => {
    expect(decodeGid(-1)).toEqual(decodeGid(0xffffffff));
  });

  it("encode(decode(v)) == v for edge values and a sample of u32s", () => {
    const edges = [0, 1, 2, 0x1fffffff, 0x20000000, 0x40000000, 0x80000000, 0xffffffff, 2147483653];
    for (const v of [...edges, ...sampleU32(2000)]) {
      expect(encodeGid(decodeGid(v)), `v=0x${v.toString(16)}`).toBe(v);
    }
  });

  it("encode masks tile ids wider than 29 bits", () => {
    expect(
      encodeGid({
        tileId: 0x20000001,
        flippedHorizontally: false,
        flippedVertically: false,
        flippedDiagonally: false,
      }),
    ).toBe(1);
  });

  it("encode sets flags as unsigned", () => {
    expect(
      encodeGid({
        tileId: 5,
        flippedHorizontally: true,
        flippedVertically: false,
        flippedDiagonally: false,
      }),
    ).toBe(2147483653);
  });
});
