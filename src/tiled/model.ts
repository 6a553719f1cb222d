import type { Color } from "./color.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<JsonValue>
  | Readonly<{ [key: string]: JsonValue }>;

export type PropertyValue =
  | Readonly<{ type: "string"; value: string }>
  | Readonly<{ type: "int"; value: number }>
  | Readonly<{ type: "float"; value: number }>
  | Readonly<{ type: "bool"; value: boolean }>
  | Readonly<{ type: "color"; value: Color }>
  | Readonly<{ type: "file"; value: string }>
  | Readonly<{ type: "object"; value: number }> // object id, 0 = none
  | Readonly<{
      type: "class";
      propertyType?: string;
      value: Readonly<Record<string, JsonValue>>;
    }>;

export type PropertyType = PropertyValue["type"];

export type Properties = Readonly<Record<string, PropertyValue>>;

export type Orientation = "orthogonal" | "isometric" | "staggered" | "hexagonal";
export type RenderOrder = "right-down" | "right-up" | "left-down" | "left-up";

export type Stagger = Readonly<{
  axis: "x" | "y";
  index: "odd" | "even";
}>;

export type Point = Readonly<{ x: number; y: number }>;

export type ImageRef = Readonly<{
  source: string;
  width?: number;
  height?: number;
}>;

/** A resolved, non-empty cell. Empty cells are `null`. */
export type TileRef = Readonly<{
  /** Global tile id with the flag bits stripped. */
  gid: number;
  /** Position of the owning tileset in `TiledMap.tilesets`. */
  tileset: number;
  localId: number;
  flippedHorizontally: boolean;
  flippedVertically: boolean;
  flippedDiagonally: boolean;
}>;

export type AnimationFrame = Readonly<{
  tileId: number;
  /** Milliseconds. */
  duration: number;
}>;

export type TileMetadata = Readonly<{
  id: number;
  class?: string;
  probability?: number;
  image?: ImageRef;
  properties: Properties;
  animation: ReadonlyArray<AnimationFrame>;
  collision?: ReadonlyArray<MapObject>;
}>;

export type Tileset = Readonly<{
  index: number;
  firstGid: number;
  name: string;
  class?: string;
  tileWidth: number;
  tileHeight: number;
  tileCount: number;
  columns: number;
  spacing: number;
  margin: number;
  /** Present for single-image tilesets. Image collections carry per-tile images instead. */
  image?: ImageRef;
  transparentColor?: Color;
  tileOffset: Point;
  properties: Properties;
  tiles: ReadonlyMap<number, TileMetadata>;
}>;

export type HorizontalAlign = "left" | "center" | "right" | "justify";
export type VerticalAlign = "top" | "center" | "bottom";

export type TextData = Readonly<{
  text: string;
  wrap: boolean;
  fontFamily: string;
  pixelSize: number;
  color: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikeout: boolean;
  kerning: boolean;
  horizontalAlign: HorizontalAlign;
  verticalAlign: VerticalAlign;
}>;

export type ObjectShape =
  | Readonly<{ kind: "rectangle"; width: number; height: number }>
  | Readonly<{ kind: "ellipse"; width: number; height: number }>
  | Readonly<{ kind: "point" }>
  | Readonly<{ kind: "polygon"; points: ReadonlyArray<Point> }>
  | Readonly<{ kind: "polyline"; points: ReadonlyArray<Point> }>
  | Readonly<{ kind: "tile"; width: number; height: number; tile: TileRef }>
  | Readonly<{ kind: "text"; width: number; height: number; text: TextData }>;

export type MapObject = Readonly<{
  id: number;
  name: string;
  class: string;
  x: number;
  y: number;
  /** Degrees, clockwise. */
  rotation: number;
  visible: boolean;
  shape: ObjectShape;
  properties: Properties;
}>;

type LayerCommon = {
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

export type Cell = TileRef | null;

export type TileChunk = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
  /** Row-major, `width * height` cells. */
  tiles: ReadonlyArray<Cell>;
}>;

export type TileLayerData =
  | Readonly<{ kind: "finite"; tiles: ReadonlyArray<Cell> }>
  | Readonly<{ kind: "infinite"; chunks: ReadonlyArray<TileChunk> }>;

export type TileLayer = Readonly<
  LayerCommon & {
    kind: "tile";
    width: number;
    height: number;
    data: TileLayerData;
  }
>;

export type ObjectGroup = Readonly<
  LayerCommon & {
    kind: "objects";
    drawOrder: "topdown" | "index";
    color?: Color;
    objects: ReadonlyArray<MapObject>;
  }
>;

export type ImageLayer = Readonly<
  LayerCommon & {
    kind: "image";
    image: ImageRef;
    transparentColor?: Color;
    repeatX: boolean;
    repeatY: boolean;
  }
>;

export type GroupLayer = Readonly<
  LayerCommon & {
    kind: "group";
    layers: ReadonlyArray<Layer>;
  }
>;

export type Layer = TileLayer | ObjectGroup | ImageLayer | GroupLayer;

export type TiledMap = Readonly<{
  /** Format version as declared; absent when the file declares none. */
  version?: string;
  tiledVersion?: string;
  class?: string;
  orientation: Orientation;
  renderOrder: RenderOrder;
  width: number;
  height: number;
  tileWidth: number;
  tileHeight: number;
  infinite: boolean;
  hexSideLength?: number;
  stagger?: Stagger;
  backgroundColor?: Color;
  nextLayerId?: number;
  nextObjectId?: number;
  tilesets: ReadonlyArray<Tileset>;
  layers: ReadonlyArray<Layer>;
  properties: Properties;
}>;

function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

/**
 * Cell at tile coordinates (x, y). Works for both finite layers and chunked
 * infinite ones; coordinates outside the stored data yield null.
 */
export function getTile(layer: TileLayer, x: number, y: number): Cell {
  if (layer.data.kind === "finite") {
    if (x < 0 || y < 0 || x >= layer.width || y >= layer.height) return null;
    return layer.data.tiles[x + y * layer.width] ?? null;
  }

  for (const c of layer.data.chunks) {
    if (floorDiv(x - c.x, c.width) !== 0 || floorDiv(y - c.y, c.height) !== 0) continue;
    return c.tiles[x - c.x + (y - c.y) * c.width] ?? null;
  }
  return null;
}

export function getTileset(map: TiledMap, ref: TileRef): Tileset {
  const ts = map.tilesets[ref.tileset];
  if (!ts) throw new Error(`TileRef points at missing tileset #${ref.tileset}`);
  return ts;
}

export function getTileMetadata(map: TiledMap, ref: TileRef): TileMetadata | undefined {
  return getTileset(map, ref).tiles.get(ref.localId);
}

/** Depth-first, declaration order; group layers are visited before their children. */
export function* walkLayers(layers: ReadonlyArray<Layer>): Generator<Layer> {
  for (const l of layers) {
    yield l;
    if (l.kind === "group") yield* walkLayers(l.layers);
  }
}
