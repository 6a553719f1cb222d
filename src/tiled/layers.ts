import { parseColor } from "./color.js";
import type { Color } from "./color.js";
import { MapParseError } from "./errors.js";
import type {
  Cell,
  GroupLayer,
  ImageLayer,
  Layer,
  ObjectGroup,
  Properties,
  TileChunk,
  TileLayer,
  TileLayerData,
} from "./model.js";
import { buildObjects } from "./objects.js";
import type { ResolveTile } from "./objects.js";
import { resolveProperties } from "./properties.js";
import type { RawChunk, RawLayer } from "./rawSchema.js";
import { decodeTileData, parseTileCompression, parseTileEncoding } from "./tileData.js";
import type { TileCompression, TileEncoding } from "./tileData.js";
import type { TilesetIndex } from "./tileset.js";

export type LayerBuildContext = Readonly<{
  tilesets: TilesetIndex;
  /** The map-level `infinite` flag. */
  infinite: boolean;
}>;

type Common = {
  id?: number;
  name: string;
  class?: string;
  visible: boolean;
  opacity: number;
  offsetX: number;
  offsetY: number;
  parallaxX: number;
  parallaxY: number;
  tintColor?: Color;
  properties: Properties;
};

function malformed(path: string, msg: string, layer: string): MapParseError {
  return new MapParseError("MalformedInput", msg, { path, layer });
}

function optColor(v: string | undefined, path: string, layer: string): Color | undefined {
  if (v === undefined) return undefined;
  const c = parseColor(v);
  if (!c) throw malformed(path, `invalid color '${v}'`, layer);
  return c;
}

function buildCommon(raw: RawLayer, path: string): Common {
  const name = raw.name ?? "";
  const opacity = raw.opacity ?? 1;
  if (opacity < 0 || opacity > 1) throw malformed(`${path}.opacity`, `opacity ${opacity} outside [0, 1]`, name);

  return {
    id: raw.id,
    name,
    class: raw.class,
    visible: raw.visible ?? true,
    opacity,
    offsetX: raw.offsetx ?? 0,
    offsetY: raw.offsety ?? 0,
    parallaxX: raw.parallaxx ?? 1,
    parallaxY: raw.parallaxy ?? 1,
    tintColor: optColor(raw.tintcolor, `${path}.tintcolor`, name),
    properties: resolveProperties(raw.properties, `${path}.properties`),
  };
}

function requireDimension(v: number | undefined, path: string, layer: string): number {
  if (v === undefined) throw malformed(path, "missing required field", layer);
  if (!Number.isInteger(v) || v <= 0) throw malformed(path, `expected positive integer, got ${v}`, layer);
  return v;
}

type CellDecoder = Readonly<{
  encoding: TileEncoding;
  compression: TileCompression;
  tilesets: TilesetIndex;
  layer: string;
}>;

function decodeCells(
  data: RawChunk["data"],
  width: number,
  height: number,
  path: string,
  dec: CellDecoder,
): Cell[] {
  const gids = decodeTileData(data, dec.encoding, dec.compression, path, dec.layer);
  if (gids.length !== width * height) {
    throw new MapParseError(
      "InconsistentLayerData",
      `expected ${width * height} cells (${width}x${height}), got ${gids.length}`,
      { path, layer: dec.layer },
    );
  }
  return gids.map((g, i) => dec.tilesets.resolve(g, { path: `${path}[${i}]`, layer: dec.layer }));
}

function buildChunks(chunks: ReadonlyArray<RawChunk>, path: string, dec: CellDecoder): TileChunk[] {
  const origins = new Set<string>();
  let size: { width: number; height: number } | undefined;

  return chunks.map((c, i) => {
    const cp = `${path}[${i}]`;
    const width = requireDimension(c.width, `${cp}.width`, dec.layer);
    const height = requireDimension(c.height, `${cp}.height`, dec.layer);
    if (!Number.isInteger(c.x) || !Number.isInteger(c.y)) {
      throw malformed(cp, `chunk origin (${c.x}, ${c.y}) is not integral`, dec.layer);
    }

    if (!size) size = { width, height };
    else if (size.width !== width || size.height !== height) {
      throw new MapParseError(
        "InconsistentLayerData",
        `chunk size ${width}x${height} differs from ${size.width}x${size.height}`,
        { path: cp, layer: dec.layer },
      );
    }

    const key = `${c.x},${c.y}`;
    if (origins.has(key)) {
      throw new MapParseError("InconsistentLayerData", `duplicate chunk at (${key})`, {
        path: cp,
        layer: dec.layer,
      });
    }
    origins.add(key);

    return { x: c.x, y: c.y, width, height, tiles: decodeCells(c.data, width, height, `${cp}.data`, dec) };
  });
}

function buildTileLayer(raw: RawLayer, common: Common, path: string, ctx: LayerBuildContext): TileLayer {
  const layer = common.name;
  const dec: CellDecoder = {
    encoding: parseTileEncoding(raw.encoding, `${path}.encoding`),
    compression: parseTileCompression(raw.compression, `${path}.compression`),
    tilesets: ctx.tilesets,
    layer,
  };

  const inconsistent = (msg: string): MapParseError =>
    new MapParseError("InconsistentLayerData", msg, { path, layer });

  let data: TileLayerData;
  let width: number;
  let height: number;

  if (raw.chunks !== undefined) {
    if (!ctx.infinite) throw inconsistent("chunked tile data in a map that is not infinite");
    if (raw.data !== undefined) throw inconsistent("layer has both 'data' and 'chunks'");
    width = raw.width ?? 0;
    height = raw.height ?? 0;
    data = { kind: "infinite", chunks: buildChunks(raw.chunks, `${path}.chunks`, dec) };
  } else {
    if (ctx.infinite) throw inconsistent("infinite map tile layer has no 'chunks'");
    width = requireDimension(raw.width, `${path}.width`, layer);
    height = requireDimension(raw.height, `${path}.height`, layer);
    if (raw.data === undefined) throw malformed(`${path}.data`, "missing required field", layer);
    data = { kind: "finite", tiles: decodeCells(raw.data, width, height, `${path}.data`, dec) };
  }

  return { ...common, kind: "tile", width, height, data };
}

function buildObjectGroup(raw: RawLayer, common: Common, path: string, ctx: LayerBuildContext): ObjectGroup {
  const layer = common.name;
  const drawOrder = raw.draworder ?? "topdown";
  if (drawOrder !== "topdown" && drawOrder !== "index") {
    throw new MapParseError("UnsupportedFeature", `unknown draw order '${drawOrder}'`, {
      path: `${path}.draworder`,
      layer,
      feature: `draworder:${drawOrder}`,
    });
  }

  const resolveTile: ResolveTile = (gid, p) => {
    const cell = ctx.tilesets.resolve(gid, { path: p, layer });
    if (!cell) throw new MapParseError("InvalidObject", "tile object has no tile", { path: p, layer });
    return cell;
  };

  return {
    ...common,
    kind: "objects",
    drawOrder,
    color: optColor(raw.color, `${path}.color`, layer),
    objects: buildObjects(raw.objects ?? [], `${path}.objects`, { owner: layer, resolveTile }),
  };
}

function buildImageLayer(raw: RawLayer, common: Common, path: string): ImageLayer {
  if (raw.image === undefined) throw malformed(`${path}.image`, "missing required field", common.name);
  return {
    ...common,
    kind: "image",
    image: { source: raw.image, width: raw.imagewidth, height: raw.imageheight },
    transparentColor: optColor(raw.transparentcolor, `${path}.transparentcolor`, common.name),
    repeatX: raw.repeatx ?? false,
    repeatY: raw.repeaty ?? false,
  };
}

function buildGroupLayer(raw: RawLayer, common: Common, path: string, ctx: LayerBuildContext): GroupLayer {
  const children = (raw.layers ?? []).map((l, i) => buildLayer(l, `${path}.layers[${i}]`, ctx));
  return { ...common, kind: "group", layers: children };
}

/** Builds one layer, recursing into groups. `path` is the layer's JSON path, e.g. `layers[1].layers[0]`. */
export function buildLayer(raw: RawLayer, path: string, ctx: LayerBuildContext): Layer {
  switch (raw.type) {
    case "tilelayer":
      return buildTileLayer(raw, buildCommon(raw, path), path, ctx);
    case "objectgroup":
      return buildObjectGroup(raw, buildCommon(raw, path), path, ctx);
    case "imagelayer":
      return buildImageLayer(raw, buildCommon(raw, path), path);
    case "group":
      return buildGroupLayer(raw, buildCommon(raw, path), path, ctx);
    default:
      throw new MapParseError("UnknownLayerKind", `unknown layer type '${raw.type}'`, {
        path: `${path}.type`,
        layer: raw.name ?? "",
      });
  }
}
