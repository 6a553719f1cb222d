export { parseMap, tryParseMap, buildMap, assembleMap, LATEST_KNOWN_VERSION } from "./tiled/map.js";
export type { ParseOptions, ParseResult } from "./tiled/map.js";
export { parseMapFile } from "./tiled/mapFile.js";
export { decodeRawMap } from "./tiled/rawSchema.js";
export type {
  RawMap,
  RawTileset,
  RawTile,
  RawLayer,
  RawChunk,
  RawObject,
  RawProperty,
} from "./tiled/rawSchema.js";
export { MapParseError, isMapParseError } from "./tiled/errors.js";
export type { MapErrorKind, MapErrorContext, WarnFn } from "./tiled/errors.js";
export {
  decodeGid,
  encodeGid,
  EMPTY_GID,
  FLIPPED_HORIZONTALLY,
  FLIPPED_VERTICALLY,
  FLIPPED_DIAGONALLY,
  TILE_ID_MASK,
} from "./tiled/gid.js";
export type { DecodedGid } from "./tiled/gid.js";
export { parseColor, formatColor } from "./tiled/color.js";
export type { Color } from "./tiled/color.js";
export { resolveProperties, resolveProperty } from "./tiled/properties.js";
export { buildTileset, TilesetIndex } from "./tiled/tileset.js";
export { buildLayer } from "./tiled/layers.js";
export { getTile, getTileset, getTileMetadata, walkLayers } from "./tiled/model.js";
export type {
  TiledMap,
  Orientation,
  RenderOrder,
  Stagger,
  Tileset,
  TileMetadata,
  AnimationFrame,
  ImageRef,
  Layer,
  TileLayer,
  TileLayerData,
  TileChunk,
  ObjectGroup,
  ImageLayer,
  GroupLayer,
  MapObject,
  ObjectShape,
  TextData,
  Point,
  TileRef,
  Cell,
  Properties,
  PropertyValue,
  PropertyType,
  JsonValue,
} from "./tiled/model.js";
