import { parseColor } from "./color.js";
import type { Color } from "./color.js";
import { MapParseError } from "./errors.js";
import { TILE_ID_MASK, decodeGid } from "./gid.js";
import type { AnimationFrame, Cell, ImageRef, TileMetadata, Tileset } from "./model.js";
import { buildObjects } from "./objects.js";
import { resolveProperties } from "./properties.js";
import type { RawTile, RawTileset } from "./rawSchema.js";

function isPositiveInt(v: number): boolean {
  return Number.isInteger(v) && v > 0;
}

function isNonNegativeInt(v: number): boolean {
  return Number.isInteger(v) && v >= 0;
}

/** How many tiles of `tile` px fit along `extent` px. Matches the editor's own formula. */
export function tilesAlong(extent: number, tile: number, margin: number, spacing: number): number {
  return Math.floor((extent - margin + spacing) / (tile + spacing));
}

function buildTile(
  raw: RawTile,
  path: string,
  tilesetName: string,
  tileCount: number,
  invalid: (p: string, m: string) => MapParseError,
): TileMetadata {
  if (!isNonNegativeInt(raw.id) || raw.id >= tileCount) {
    throw invalid(`${path}.id`, `tile id ${raw.id} outside [0, ${tileCount})`);
  }

  const animation: AnimationFrame[] = (raw.animation ?? []).map((f, i) => {
    const fp = `${path}.animation[${i}]`;
    if (!isNonNegativeInt(f.tileid) || f.tileid >= tileCount) {
      throw invalid(`${fp}.tileid`, `frame tile id ${f.tileid} outside [0, ${tileCount})`);
    }
    if (!isNonNegativeInt(f.duration)) {
      throw invalid(`${fp}.duration`, `invalid frame duration ${f.duration}`);
    }
    return { tileId: f.tileid, duration: f.duration };
  });

  let image: ImageRef | undefined;
  if (raw.image !== undefined) {
    const w = raw.imagewidth;
    const h = raw.imageheight;
    if ((w !== undefined && !isPositiveInt(w)) || (h !== undefined && !isPositiveInt(h))) {
      throw invalid(path, `invalid image size ${w ?? "?"}x${h ?? "?"}`);
    }
    image = { source: raw.image, width: w, height: h };
  }

  const collision =
    raw.objectgroup === undefined
      ? undefined
      : buildObjects(raw.objectgroup.objects, `${path}.objectgroup.objects`, {
          owner: `tileset '${tilesetName}' tile ${raw.id}`,
        });

  return {
    id: raw.id,
    class: raw.class ?? raw.type,
    probability: raw.probability,
    image,
    properties: resolveProperties(raw.properties, `${path}.properties`),
    animation,
    collision,
  };
}

/**
 * Validates one embedded tileset. `index` is its position in the map's
 * tileset list and becomes the identifier tile references point at.
 */
export function buildTileset(raw: RawTileset, index: number): Tileset {
  const path = `tilesets[${index}]`;
  const label = raw.name ?? `#${index}`;

  if (raw.source !== undefined) {
    throw new MapParseError(
      "UnsupportedFeature",
      `tileset '${raw.source}' is an external reference; only embedded tilesets are supported`,
      { path: `${path}.source`, tileset: label, feature: "external-tileset" },
    );
  }

  const invalid = (p: string, m: string): MapParseError =>
    new MapParseError("InvalidTileset", m, { path: p, tileset: label });
  const missing = (key: string): MapParseError =>
    new MapParseError("MalformedInput", "missing required field", {
      path: `${path}.${key}`,
      tileset: label,
    });

  if (raw.firstgid === undefined) throw missing("firstgid");
  if (raw.name === undefined) throw missing("name");
  if (raw.tilewidth === undefined) throw missing("tilewidth");
  if (raw.tileheight === undefined) throw missing("tileheight");

  const name = raw.name;
  const firstGid = raw.firstgid;
  const tileWidth = raw.tilewidth;
  const tileHeight = raw.tileheight;
  const spacing = raw.spacing ?? 0;
  const margin = raw.margin ?? 0;

  if (!isPositiveInt(firstGid)) throw invalid(`${path}.firstgid`, `invalid first GID ${firstGid}`);
  if (!isPositiveInt(tileWidth) || !isPositiveInt(tileHeight)) {
    throw invalid(path, `invalid tile size ${tileWidth}x${tileHeight}`);
  }
  if (!isNonNegativeInt(spacing)) throw invalid(`${path}.spacing`, `invalid spacing ${spacing}`);
  if (!isNonNegativeInt(margin)) throw invalid(`${path}.margin`, `invalid margin ${margin}`);

  let image: ImageRef | undefined;
  let columns: number;
  let tileCount: number;

  if (raw.image !== undefined) {
    if (raw.imagewidth === undefined) throw missing("imagewidth");
    if (raw.imageheight === undefined) throw missing("imageheight");
    const w = raw.imagewidth;
    const h = raw.imageheight;
    if (!isPositiveInt(w) || !isPositiveInt(h)) {
      throw invalid(path, `invalid image size ${w}x${h}`);
    }
    image = { source: raw.image, width: w, height: h };

    columns = raw.columns ?? tilesAlong(w, tileWidth, margin, spacing);
    const rows = tilesAlong(h, tileHeight, margin, spacing);
    if (!isPositiveInt(columns) || rows <= 0) {
      throw invalid(path, `image ${w}x${h} holds no ${tileWidth}x${tileHeight} tiles`);
    }

    tileCount = columns * rows;
    if (raw.tilecount !== undefined && raw.tilecount !== tileCount) {
      throw invalid(
        `${path}.tilecount`,
        `tile count ${raw.tilecount} does not match ${columns} columns x ${rows} rows`,
      );
    }
  } else {
    if (raw.tilecount === undefined) throw missing("tilecount");
    tileCount = raw.tilecount;
    columns = raw.columns ?? 0;
    if (!isNonNegativeInt(tileCount)) throw invalid(`${path}.tilecount`, `invalid tile count ${tileCount}`);
    if (!isNonNegativeInt(columns)) throw invalid(`${path}.columns`, `invalid columns ${columns}`);
  }

  if (firstGid + tileCount - 1 > TILE_ID_MASK) {
    throw invalid(path, `GID range ${firstGid}+${tileCount} exceeds 29 bits`);
  }

  const tiles = new Map<number, TileMetadata>();
  (raw.tiles ?? []).forEach((t, i) => {
    const tile = buildTile(t, `${path}.tiles[${i}]`, name, tileCount, invalid);
    if (tiles.has(tile.id)) throw invalid(`${path}.tiles[${i}].id`, `duplicate tile id ${tile.id}`);
    tiles.set(tile.id, tile);
  });

  let transparentColor: Color | undefined;
  if (raw.transparentcolor !== undefined) {
    const c = parseColor(raw.transparentcolor);
    if (!c) throw invalid(`${path}.transparentcolor`, `invalid color '${raw.transparentcolor}'`);
    transparentColor = c;
  }

  return {
    index,
    firstGid,
    name,
    class: raw.class,
    tileWidth,
    tileHeight,
    tileCount,
    columns,
    spacing,
    margin,
    image,
    transparentColor,
    tileOffset: { x: raw.tileoffset?.x ?? 0, y: raw.tileoffset?.y ?? 0 },
    properties: resolveProperties(raw.properties, `${path}.properties`),
    tiles,
  };
}

export type ResolveContext = Readonly<{ path: string; layer: string }>;

/**
 * GID range ownership over a map's tilesets. Construction rejects overlapping
 * ranges; lookups binary-search the tilesets ordered by first GID.
 */
export class TilesetIndex {
  private readonly sorted: ReadonlyArray<Tileset>;

  public constructor(tilesets: ReadonlyArray<Tileset>) {
    this.sorted = [...tilesets].sort((a, b) => a.firstGid - b.firstGid);

    for (let i = 1; i < this.sorted.length; i++) {
      const prev = this.sorted[i - 1];
      const cur = this.sorted[i];
      if (!prev || !cur) continue;
      if (cur.firstGid === prev.firstGid || prev.firstGid + prev.tileCount > cur.firstGid) {
        throw new MapParseError(
          "OverlappingTilesetRanges",
          `tileset '${prev.name}' [${prev.firstGid}, ${prev.firstGid + prev.tileCount}) overlaps ` +
            `tileset '${cur.name}' starting at ${cur.firstGid}`,
          { path: `tilesets[${cur.index}]`, tileset: cur.name },
        );
      }
    }
  }

  /** The tileset owning `tileId` (flags stripped), if any. */
  public find(tileId: number): Tileset | undefined {
    let lo = 0;
    let hi = this.sorted.length - 1;
    let best: Tileset | undefined;

    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const ts = this.sorted[mid];
      if (!ts) break;
      if (ts.firstGid <= tileId) {
        best = ts;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }

    if (!best || tileId >= best.firstGid + best.tileCount) return undefined;
    return best;
  }

  /** Decodes and resolves a raw GID. Tile id 0 is the empty cell. */
  public resolve(rawGid: number, ctx: ResolveContext): Cell {
    const d = decodeGid(rawGid);
    if (d.tileId === 0) return null;

    const ts = this.find(d.tileId);
    if (!ts) {
      throw new MapParseError(
        "UnresolvedTileReference",
        `GID ${rawGid} (tile id ${d.tileId}) is not owned by any tileset`,
        { path: ctx.path, layer: ctx.layer, gid: rawGid },
      );
    }

    return {
      gid: d.tileId,
      tileset: ts.index,
      localId: d.tileId - ts.firstGid,
      flippedHorizontally: d.flippedHorizontally,
      flippedVertically: d.flippedVertically,
      flippedDiagonally: d.flippedDiagonally,
    };
  }
}
