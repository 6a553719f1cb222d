import { parseColor } from "./color.js";
import type { Color } from "./color.js";
import { MapParseError, isMapParseError } from "./errors.js";
import type { WarnFn } from "./errors.js";
import { buildLayer } from "./layers.js";
import type { Orientation, RenderOrder, Stagger, TiledMap } from "./model.js";
import { resolveProperties } from "./properties.js";
import { locateJsonSyntaxError } from "./jsonLocate.js";
import { decodeRawMap } from "./rawSchema.js";
import type { RawMap } from "./rawSchema.js";
import { TilesetIndex, buildTileset } from "./tileset.js";

export type ParseOptions = Readonly<{
  /** Receives non-fatal notes such as an unrecognised format version. */
  warn?: WarnFn;
}>;

export type ParseResult =
  | Readonly<{ ok: true; map: TiledMap }>
  | Readonly<{ ok: false; error: MapParseError }>;

/** Newest format version this decoder was written against. */
export const LATEST_KNOWN_VERSION: readonly [number, number] = [1, 11];

const ORIENTATIONS: ReadonlyArray<Orientation> = ["orthogonal", "isometric", "staggered", "hexagonal"];
const RENDER_ORDERS: ReadonlyArray<RenderOrder> = ["right-down", "right-up", "left-down", "left-up"];

function oneOf<T extends string>(v: string, allowed: ReadonlyArray<T>): v is T {
  return allowed.some((a) => a === v);
}

function unsupported(path: string, msg: string, feature: string): MapParseError {
  return new MapParseError("UnsupportedFeature", msg, { path, feature });
}

function requirePositiveInt(v: number, path: string): number {
  if (!Number.isInteger(v) || v <= 0) {
    throw new MapParseError("MalformedInput", `expected positive integer, got ${v}`, { path });
  }
  return v;
}

function lineAndColumn(text: string, position: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < position && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: position - lineStart + 1 };
}

function parseJsonText(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    const position = locateJsonSyntaxError(text);
    if (position === undefined) {
      throw new MapParseError("MalformedInput", `invalid JSON: ${msg}`);
    }
    const { line, column } = lineAndColumn(text, position);
    throw new MapParseError("MalformedInput", `invalid JSON at ${line}:${column}: ${msg}`, {
      position,
      line,
      column,
    });
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeText(input: string | Uint8Array): string {
  if (typeof input !== "string") {
    // The decoder drops a leading byte order mark itself.
    try {
      return utf8.decode(input);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new MapParseError("MalformedInput", `input is not valid UTF-8: ${msg}`);
    }
  }
  return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
}

function checkVersion(version: string, warn: WarnFn): void {
  const m = /^(\d+)\.(\d+)/.exec(version);
  if (!m) {
    warn(`Unrecognised map format version '${version}'; decoding anyway.`);
    return;
  }
  const major = Number(m[1]);
  const minor = Number(m[2]);
  const [knownMajor, knownMinor] = LATEST_KNOWN_VERSION;
  if (major > knownMajor || (major === knownMajor && minor > knownMinor)) {
    warn(`Map format version ${version} is newer than ${knownMajor}.${knownMinor}; decoding best-effort.`);
  }
}

function buildStagger(raw: RawMap, orientation: Orientation): Stagger | undefined {
  if (orientation !== "staggered" && orientation !== "hexagonal") return undefined;

  const axis = raw.staggeraxis ?? "y";
  if (axis !== "x" && axis !== "y") {
    throw unsupported("staggeraxis", `unknown stagger axis '${axis}'`, `staggeraxis:${axis}`);
  }
  const index = raw.staggerindex ?? "odd";
  if (index !== "odd" && index !== "even") {
    throw unsupported("staggerindex", `unknown stagger index '${index}'`, `staggerindex:${index}`);
  }
  return { axis, index };
}

/** Second stage: validates and assembles an already structurally decoded map. */
export function assembleMap(raw: RawMap, options: ParseOptions = {}): TiledMap {
  const warn = options.warn ?? (() => {});

  if (raw.type !== undefined && raw.type !== "map") {
    throw new MapParseError("MalformedInput", `expected a map document, got type '${raw.type}'`, {
      path: "type",
    });
  }

  let version: string | undefined;
  if (raw.version === undefined) {
    warn("Map has no format version; assuming the latest known.");
  } else {
    version = String(raw.version);
    checkVersion(version, warn);
  }

  if (!oneOf(raw.orientation, ORIENTATIONS)) {
    throw unsupported("orientation", `unsupported orientation '${raw.orientation}'`, `orientation:${raw.orientation}`);
  }
  const orientation = raw.orientation;

  const renderOrder = raw.renderorder ?? "right-down";
  if (!oneOf(renderOrder, RENDER_ORDERS)) {
    throw unsupported("renderorder", `unsupported render order '${renderOrder}'`, `renderorder:${renderOrder}`);
  }

  const width = requirePositiveInt(raw.width, "width");
  const height = requirePositiveInt(raw.height, "height");
  const tileWidth = requirePositiveInt(raw.tilewidth, "tilewidth");
  const tileHeight = requirePositiveInt(raw.tileheight, "tileheight");

  let hexSideLength: number | undefined;
  if (orientation === "hexagonal") {
    if (raw.hexsidelength === undefined) {
      throw new MapParseError("MalformedInput", "missing required field for hexagonal maps", {
        path: "hexsidelength",
      });
    }
    if (!Number.isInteger(raw.hexsidelength) || raw.hexsidelength < 0) {
      throw new MapParseError("MalformedInput", `expected non-negative integer, got ${raw.hexsidelength}`, {
        path: "hexsidelength",
      });
    }
    hexSideLength = raw.hexsidelength;
  }

  const stagger = buildStagger(raw, orientation);

  let backgroundColor: Color | undefined;
  if (raw.backgroundcolor !== undefined) {
    const c = parseColor(raw.backgroundcolor);
    if (!c) {
      throw new MapParseError("MalformedInput", `invalid color '${raw.backgroundcolor}'`, {
        path: "backgroundcolor",
      });
    }
    backgroundColor = c;
  }

  const properties = resolveProperties(raw.properties, "properties");

  const tilesets = raw.tilesets.map((t, i) => buildTileset(t, i));
  const infinite = raw.infinite ?? false;
  const ctx = { tilesets: new TilesetIndex(tilesets), infinite };

  const layers = raw.layers.map((l, i) => buildLayer(l, `layers[${i}]`, ctx));

  return {
    version,
    tiledVersion: raw.tiledversion,
    class: raw.class,
    orientation,
    renderOrder,
    width,
    height,
    tileWidth,
    tileHeight,
    infinite,
    hexSideLength,
    stagger,
    backgroundColor,
    nextLayerId: raw.nextlayerid,
    nextObjectId: raw.nextobjectid,
    tilesets,
    layers,
    properties,
  };
}

/** Builds a map from an already parsed JSON value. */
export function buildMap(json: unknown, options: ParseOptions = {}): TiledMap {
  return assembleMap(decodeRawMap(json), options);
}

/**
 * Decodes a map document. Throws `MapParseError` on any validation failure;
 * no partial map is ever returned.
 */
export function parseMap(input: string | Uint8Array, options: ParseOptions = {}): TiledMap {
  return buildMap(parseJsonText(decodeText(input)), options);
}

/** Like `parseMap`, but reports decode failures as a value. Other exceptions still throw. */
export function tryParseMap(input: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, map: parseMap(input, options) };
  } catch (e: unknown) {
    if (isMapParseError(e)) return { ok: false, error: e };
    throw e;
  }
}
