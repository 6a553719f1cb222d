import { parseColor } from "./color.js";
import { MapParseError } from "./errors.js";
import { decodeGid, isU32 } from "./gid.js";
import type {
  HorizontalAlign,
  MapObject,
  ObjectShape,
  Point,
  TextData,
  TileRef,
  VerticalAlign,
} from "./model.js";
import { resolveProperties } from "./properties.js";
import type { RawObject, RawPoint, RawText } from "./rawSchema.js";

/** Resolves a raw GID (flags included) on a tile object. */
export type ResolveTile = (rawGid: number, path: string) => TileRef;

export type ObjectContext = Readonly<{
  /** Name of the owning layer, or a description of the owning tile for collision shapes. */
  owner: string;
  /** Absent where tile objects cannot appear, e.g. inside tile collision shapes. */
  resolveTile?: ResolveTile;
}>;

const H_ALIGN: ReadonlyArray<HorizontalAlign> = ["left", "center", "right", "justify"];
const V_ALIGN: ReadonlyArray<VerticalAlign> = ["top", "center", "bottom"];

function oneOf<T extends string>(v: string, allowed: ReadonlyArray<T>): v is T {
  return allowed.some((a) => a === v);
}

function buildText(raw: RawText, path: string, invalid: (p: string, m: string) => MapParseError): TextData {
  const color = raw.color === undefined ? { r: 0, g: 0, b: 0, a: 0xff } : parseColor(raw.color);
  if (!color) throw invalid(`${path}.color`, `invalid color '${raw.color ?? ""}'`);

  const halign = raw.halign ?? "left";
  if (!oneOf(halign, H_ALIGN)) throw invalid(`${path}.halign`, `unknown alignment '${halign}'`);
  const valign = raw.valign ?? "top";
  if (!oneOf(valign, V_ALIGN)) throw invalid(`${path}.valign`, `unknown alignment '${valign}'`);

  const pixelSize = raw.pixelsize ?? 16;
  if (!Number.isInteger(pixelSize) || pixelSize <= 0) {
    throw invalid(`${path}.pixelsize`, `expected positive integer, got ${pixelSize}`);
  }

  return {
    text: raw.text,
    wrap: raw.wrap ?? false,
    fontFamily: raw.fontfamily ?? "sans-serif",
    pixelSize,
    color,
    bold: raw.bold ?? false,
    italic: raw.italic ?? false,
    underline: raw.underline ?? false,
    strikeout: raw.strikeout ?? false,
    kerning: raw.kerning ?? true,
    horizontalAlign: halign,
    verticalAlign: valign,
  };
}

function points(raw: ReadonlyArray<RawPoint>): Point[] {
  return raw.map((p) => ({ x: p.x, y: p.y }));
}

function buildShape(
  raw: RawObject,
  path: string,
  ctx: ObjectContext,
  invalid: (p: string, m: string) => MapParseError,
): ObjectShape {
  const markers = [
    raw.gid !== undefined ? "gid" : null,
    raw.point === true ? "point" : null,
    raw.ellipse === true ? "ellipse" : null,
    raw.polygon !== undefined ? "polygon" : null,
    raw.polyline !== undefined ? "polyline" : null,
    raw.text !== undefined ? "text" : null,
  ].filter((m): m is string => m !== null);

  if (markers.length > 1) throw invalid(path, `conflicting shape fields: ${markers.join(", ")}`);

  const width = raw.width ?? 0;
  const height = raw.height ?? 0;
  if (width < 0 || height < 0) throw invalid(path, `negative size ${width}x${height}`);

  if (raw.gid !== undefined) {
    if (!isU32(raw.gid)) throw invalid(`${path}.gid`, `invalid GID ${raw.gid}`);
    if (decodeGid(raw.gid).tileId === 0) throw invalid(`${path}.gid`, "tile object has no tile");
    if (!ctx.resolveTile) throw invalid(`${path}.gid`, "tile objects are not allowed here");
    return { kind: "tile", width, height, tile: ctx.resolveTile(raw.gid, `${path}.gid`) };
  }

  if (raw.point === true) return { kind: "point" };
  if (raw.ellipse === true) return { kind: "ellipse", width, height };

  if (raw.polygon !== undefined) {
    if (raw.polygon.length === 0) throw invalid(`${path}.polygon`, "polygon has no points");
    return { kind: "polygon", points: points(raw.polygon) };
  }

  if (raw.polyline !== undefined) {
    if (raw.polyline.length === 0) throw invalid(`${path}.polyline`, "polyline has no points");
    return { kind: "polyline", points: points(raw.polyline) };
  }

  if (raw.text !== undefined) {
    return { kind: "text", width, height, text: buildText(raw.text, `${path}.text`, invalid) };
  }

  return { kind: "rectangle", width, height };
}

export function buildObject(raw: RawObject, path: string, ctx: ObjectContext): MapObject {
  const invalid = (p: string, m: string): MapParseError =>
    new MapParseError("InvalidObject", m, { path: p, layer: ctx.owner });

  if (raw.template !== undefined) {
    throw new MapParseError(
      "UnsupportedFeature",
      `object template '${raw.template}' is an external reference`,
      { path: `${path}.template`, layer: ctx.owner, feature: "object-template" },
    );
  }

  const id = raw.id ?? 0;
  if (!Number.isInteger(id) || id < 0) throw invalid(`${path}.id`, `invalid object id ${id}`);

  return {
    id,
    name: raw.name ?? "",
    class: raw.class ?? raw.type ?? "",
    x: raw.x ?? 0,
    y: raw.y ?? 0,
    rotation: raw.rotation ?? 0,
    visible: raw.visible ?? true,
    shape: buildShape(raw, path, ctx, invalid),
    properties: resolveProperties(raw.properties, `${path}.properties`),
  };
}

export function buildObjects(
  raw: ReadonlyArray<RawObject>,
  path: string,
  ctx: ObjectContext,
): MapObject[] {
  return raw.map((o, i) => buildObject(o, `${path}[${i}]`, ctx));
}
