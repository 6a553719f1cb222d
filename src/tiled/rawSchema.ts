// Raw records mirror the editor's JSON field names one-to-one. Decoding here
// only checks JSON types and presence of structurally required fields; enum
// strings, ranges and cross references are validated by the builders.

import { MapParseError } from "./errors.js";

export type RawProperty = {
  name: string;
  type?: string;
  propertytype?: string;
  value: unknown;
};

export type RawPoint = { x: number; y: number };

export type RawText = {
  text: string;
  wrap?: boolean;
  fontfamily?: string;
  pixelsize?: number;
  color?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikeout?: boolean;
  kerning?: boolean;
  halign?: string;
  valign?: string;
};

export type RawObject = {
  id?: number;
  name?: string;
  type?: string;
  class?: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  rotation?: number;
  visible?: boolean;
  gid?: number;
  point?: boolean;
  ellipse?: boolean;
  polygon?: RawPoint[];
  polyline?: RawPoint[];
  text?: RawText;
  template?: string;
  properties?: RawProperty[];
};

/** Layer data: plain GIDs, or a base64 string when `encoding` is "base64". */
export type RawTileData = number[] | string;

export type RawChunk = {
  x: number;
  y: number;
  width: number;
  height: number;
  data: RawTileData;
};

export type RawLayer = {
  type: string;
  id?: number;
  name?: string;
  class?: string;
  visible?: boolean;
  opacity?: number;
  offsetx?: number;
  offsety?: number;
  parallaxx?: number;
  parallaxy?: number;
  tintcolor?: string;
  properties?: RawProperty[];

  // tilelayer
  width?: number;
  height?: number;
  startx?: number;
  starty?: number;
  data?: RawTileData;
  chunks?: RawChunk[];
  encoding?: string;
  compression?: string;

  // objectgroup
  objects?: RawObject[];
  draworder?: string;
  color?: string;

  // imagelayer
  image?: string;
  imagewidth?: number;
  imageheight?: number;
  transparentcolor?: string;
  repeatx?: boolean;
  repeaty?: boolean;

  // group
  layers?: RawLayer[];
};

export type RawFrame = { tileid: number; duration: number };

export type RawCollisionGroup = {
  draworder?: string;
  objects: RawObject[];
};

export type RawTile = {
  id: number;
  type?: string;
  class?: string;
  probability?: number;
  image?: string;
  imagewidth?: number;
  imageheight?: number;
  properties?: RawProperty[];
  animation?: RawFrame[];
  objectgroup?: RawCollisionGroup;
};

export type RawTileset = {
  firstgid?: number;
  source?: string;
  name?: string;
  class?: string;
  tilewidth?: number;
  tileheight?: number;
  tilecount?: number;
  columns?: number;
  spacing?: number;
  margin?: number;
  image?: string;
  imagewidth?: number;
  imageheight?: number;
  transparentcolor?: string;
  tileoffset?: RawPoint;
  properties?: RawProperty[];
  tiles?: RawTile[];
};

export type RawMap = {
  type?: string;
  version?: string | number;
  tiledversion?: string;
  class?: string;
  orientation: string;
  renderorder?: string;
  width: number;
  height: number;
  tilewidth: number;
  tileheight: number;
  infinite?: boolean;
  hexsidelength?: number;
  staggeraxis?: string;
  staggerindex?: string;
  backgroundcolor?: string;
  nextlayerid?: number;
  nextobjectid?: number;
  properties?: RawProperty[];
  tilesets: RawTileset[];
  layers: RawLayer[];
};

type Obj = Record<string, unknown>;

function isRecord(v: unknown): v is Obj {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function at(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function malformed(path: string, msg: string): MapParseError {
  return new MapParseError("MalformedInput", msg, { path });
}

function expectRecord(v: unknown, path: string): Obj {
  if (!isRecord(v)) throw malformed(path, "expected object");
  return v;
}

function optString(o: Obj, key: string, path: string): string | undefined {
  const v = o[key];
  if (v === undefined) return undefined;
  if (typeof v !== "string") throw malformed(at(path, key), "expected string");
  return v;
}

function reqString(o: Obj, key: string, path: string): string {
  const v = optString(o, key, path);
  if (v === undefined) throw malformed(at(path, key), "missing required field");
  return v;
}

function optNumber(o: Obj, key: string, path: string): number | undefined {
  const v = o[key];
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) throw malformed(at(path, key), "expected number");
  return v;
}

function reqNumber(o: Obj, key: string, path: string): number {
  const v = optNumber(o, key, path);
  if (v === undefined) throw malformed(at(path, key), "missing required field");
  return v;
}

function optBool(o: Obj, key: string, path: string): boolean | undefined {
  const v = o[key];
  if (v === undefined) return undefined;
  if (typeof v !== "boolean") throw malformed(at(path, key), "expected boolean");
  return v;
}

function optArray<T>(
  o: Obj,
  key: string,
  path: string,
  item: (v: unknown, itemPath: string) => T,
): T[] | undefined {
  const v = o[key];
  if (v === undefined) return undefined;
  const p = at(path, key);
  if (!Array.isArray(v)) throw malformed(p, "expected array");
  return v.map((x: unknown, i) => item(x, `${p}[${i}]`));
}

function reqArray<T>(
  o: Obj,
  key: string,
  path: string,
  item: (v: unknown, itemPath: string) => T,
): T[] {
  const v = optArray(o, key, path, item);
  if (v === undefined) throw malformed(at(path, key), "missing required field");
  return v;
}

function decodeRawProperty(v: unknown, path: string): RawProperty {
  const o = expectRecord(v, path);
  if (!("value" in o)) throw malformed(at(path, "value"), "missing required field");
  return {
    name: reqString(o, "name", path),
    type: optString(o, "type", path),
    propertytype: optString(o, "propertytype", path),
    value: o.value,
  };
}

function decodeRawPoint(v: unknown, path: string): RawPoint {
  const o = expectRecord(v, path);
  return { x: reqNumber(o, "x", path), y: reqNumber(o, "y", path) };
}

function decodeRawText(v: unknown, path: string): RawText {
  const o = expectRecord(v, path);
  return {
    text: reqString(o, "text", path),
    wrap: optBool(o, "wrap", path),
    fontfamily: optString(o, "fontfamily", path),
    pixelsize: optNumber(o, "pixelsize", path),
    color: optString(o, "color", path),
    bold: optBool(o, "bold", path),
    italic: optBool(o, "italic", path),
    underline: optBool(o, "underline", path),
    strikeout: optBool(o, "strikeout", path),
    kerning: optBool(o, "kerning", path),
    halign: optString(o, "halign", path),
    valign: optString(o, "valign", path),
  };
}

function decodeRawObject(v: unknown, path: string): RawObject {
  const o = expectRecord(v, path);
  const text = o.text === undefined ? undefined : decodeRawText(o.text, at(path, "text"));
  return {
    id: optNumber(o, "id", path),
    name: optString(o, "name", path),
    type: optString(o, "type", path),
    class: optString(o, "class", path),
    x: optNumber(o, "x", path),
    y: optNumber(o, "y", path),
    width: optNumber(o, "width", path),
    height: optNumber(o, "height", path),
    rotation: optNumber(o, "rotation", path),
    visible: optBool(o, "visible", path),
    gid: optNumber(o, "gid", path),
    point: optBool(o, "point", path),
    ellipse: optBool(o, "ellipse", path),
    polygon: optArray(o, "polygon", path, decodeRawPoint),
    polyline: optArray(o, "polyline", path, decodeRawPoint),
    text,
    template: optString(o, "template", path),
    properties: optArray(o, "properties", path, decodeRawProperty),
  };
}

function decodeRawTileData(o: Obj, key: string, path: string): RawTileData | undefined {
  const v = o[key];
  if (v === undefined) return undefined;
  if (typeof v === "string") return v;
  const p = at(path, key);
  if (!Array.isArray(v)) throw malformed(p, "expected array or base64 string");
  return v.map((x: unknown, i) => {
    if (typeof x !== "number") throw malformed(`${p}[${i}]`, "expected number");
    return x;
  });
}

function decodeRawChunk(v: unknown, path: string): RawChunk {
  const o = expectRecord(v, path);
  const data = decodeRawTileData(o, "data", path);
  if (data === undefined) throw malformed(at(path, "data"), "missing required field");
  return {
    x: reqNumber(o, "x", path),
    y: reqNumber(o, "y", path),
    width: reqNumber(o, "width", path),
    height: reqNumber(o, "height", path),
    data,
  };
}

function decodeRawLayer(v: unknown, path: string): RawLayer {
  const o = expectRecord(v, path);
  return {
    type: reqString(o, "type", path),
    id: optNumber(o, "id", path),
    name: optString(o, "name", path),
    class: optString(o, "class", path),
    visible: optBool(o, "visible", path),
    opacity: optNumber(o, "opacity", path),
    offsetx: optNumber(o, "offsetx", path),
    offsety: optNumber(o, "offsety", path),
    parallaxx: optNumber(o, "parallaxx", path),
    parallaxy: optNumber(o, "parallaxy", path),
    tintcolor: optString(o, "tintcolor", path),
    properties: optArray(o, "properties", path, decodeRawProperty),

    width: optNumber(o, "width", path),
    height: optNumber(o, "height", path),
    startx: optNumber(o, "startx", path),
    starty: optNumber(o, "starty", path),
    data: decodeRawTileData(o, "data", path),
    chunks: optArray(o, "chunks", path, decodeRawChunk),
    encoding: optString(o, "encoding", path),
    compression: optString(o, "compression", path),

    objects: optArray(o, "objects", path, decodeRawObject),
    draworder: optString(o, "draworder", path),
    color: optString(o, "color", path),

    image: optString(o, "image", path),
    imagewidth: optNumber(o, "imagewidth", path),
    imageheight: optNumber(o, "imageheight", path),
    transparentcolor: optString(o, "transparentcolor", path),
    repeatx: optBool(o, "repeatx", path),
    repeaty: optBool(o, "repeaty", path),

    layers: optArray(o, "layers", path, decodeRawLayer),
  };
}

function decodeRawFrame(v: unknown, path: string): RawFrame {
  const o = expectRecord(v, path);
  return { tileid: reqNumber(o, "tileid", path), duration: reqNumber(o, "duration", path) };
}

function decodeRawCollisionGroup(v: unknown, path: string): RawCollisionGroup {
  const o = expectRecord(v, path);
  return {
    draworder: optString(o, "draworder", path),
    objects: optArray(o, "objects", path, decodeRawObject) ?? [],
  };
}

function decodeRawTile(v: unknown, path: string): RawTile {
  const o = expectRecord(v, path);
  return {
    id: reqNumber(o, "id", path),
    type: optString(o, "type", path),
    class: optString(o, "class", path),
    probability: optNumber(o, "probability", path),
    image: optString(o, "image", path),
    imagewidth: optNumber(o, "imagewidth", path),
    imageheight: optNumber(o, "imageheight", path),
    properties: optArray(o, "properties", path, decodeRawProperty),
    animation: optArray(o, "animation", path, decodeRawFrame),
    objectgroup:
      o.objectgroup === undefined
        ? undefined
        : decodeRawCollisionGroup(o.objectgroup, at(path, "objectgroup")),
  };
}

function decodeRawTileset(v: unknown, path: string): RawTileset {
  const o = expectRecord(v, path);
  return {
    firstgid: optNumber(o, "firstgid", path),
    source: optString(o, "source", path),
    name: optString(o, "name", path),
    class: optString(o, "class", path),
    tilewidth: optNumber(o, "tilewidth", path),
    tileheight: optNumber(o, "tileheight", path),
    tilecount: optNumber(o, "tilecount", path),
    columns: optNumber(o, "columns", path),
    spacing: optNumber(o, "spacing", path),
    margin: optNumber(o, "margin", path),
    image: optString(o, "image", path),
    imagewidth: optNumber(o, "imagewidth", path),
    imageheight: optNumber(o, "imageheight", path),
    transparentcolor: optString(o, "transparentcolor", path),
    tileoffset:
      o.tileoffset === undefined ? undefined : decodeRawPoint(o.tileoffset, at(path, "tileoffset")),
    properties: optArray(o, "properties", path, decodeRawProperty),
    tiles: optArray(o, "tiles", path, decodeRawTile),
  };
}

// Older editor releases wrote the format version as a number.
function decodeVersion(v: unknown): string | number | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "string") return v;
  if (typeof v === "number") return v;
  throw malformed("version", "expected string or number");
}

export function decodeRawMap(input: unknown): RawMap {
  const o = expectRecord(input, "");

  return {
    type: optString(o, "type", ""),
    version: decodeVersion(o.version),
    tiledversion: optString(o, "tiledversion", ""),
    class: optString(o, "class", ""),
    orientation: reqString(o, "orientation", ""),
    renderorder: optString(o, "renderorder", ""),
    width: reqNumber(o, "width", ""),
    height: reqNumber(o, "height", ""),
    tilewidth: reqNumber(o, "tilewidth", ""),
    tileheight: reqNumber(o, "tileheight", ""),
    infinite: optBool(o, "infinite", ""),
    hexsidelength: optNumber(o, "hexsidelength", ""),
    staggeraxis: optString(o, "staggeraxis", ""),
    staggerindex: optString(o, "staggerindex", ""),
    backgroundcolor: optString(o, "backgroundcolor", ""),
    nextlayerid: optNumber(o, "nextlayerid", ""),
    nextobjectid: optNumber(o, "nextobjectid", ""),
    properties: optArray(o, "properties", "", decodeRawProperty),
    tilesets: optArray(o, "tilesets", "", decodeRawTileset) ?? [],
    layers: reqArray(o, "layers", "", decodeRawLayer),
  };
}
