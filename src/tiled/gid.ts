// Tile references in layer data pack three orientation flags into the top bits
// of an unsigned 32-bit value. The low 29 bits hold the global tile id.

export const FLIPPED_HORIZONTALLY = 0x80000000;
export const FLIPPED_VERTICALLY = 0x40000000;
export const FLIPPED_DIAGONALLY = 0x20000000;

export const FLAG_MASK = 0xe0000000;
export const TILE_ID_MASK = 0x1fffffff;

/** The "no tile" cell. Never looked up in a tileset. */
export const EMPTY_GID = 0;

export type DecodedGid = Readonly<{
  tileId: number;
  flippedHorizontally: boolean;
  flippedVertically: boolean;
  /** Anti-diagonal transpose; combined with the other flips it expresses 90° rotations. */
  flippedDiagonally: boolean;
}>;

export function decodeGid(raw: number): DecodedGid {
  const v = raw >>> 0;
  return {
    tileId: (v & TILE_ID_MASK) >>> 0,
    flippedHorizontally: (v & FLIPPED_HORIZONTALLY) !== 0,
    flippedVertically: (v & FLIPPED_VERTICALLY) !== 0,
    flippedDiagonally: (v & FLIPPED_DIAGONALLY) !== 0,
  };
}

export function encodeGid(d: DecodedGid): number {
  let v = d.tileId & TILE_ID_MASK;
  if (d.flippedHorizontally) v |= FLIPPED_HORIZONTALLY;
  if (d.flippedVertically) v |= FLIPPED_VERTICALLY;
  if (d.flippedDiagonally) v |= FLIPPED_DIAGONALLY;
  return v >>> 0;
}

export function isU32(v: number): boolean {
  return Number.isInteger(v) && v >= 0 && v <= 0xffffffff;
}
