export type MapErrorKind =
  | "MalformedInput"
  | "UnsupportedFeature"
  | "InvalidTileset"
  | "InvalidProperty"
  | "UnknownLayerKind"
  | "InconsistentLayerData"
  | "UnresolvedTileReference"
  | "OverlappingTilesetRanges"
  | "InvalidObject";

export type MapErrorContext = Readonly<{
  /** JSON path of the offending value, e.g. `layers[2].data[17]`. */
  path?: string;
  layer?: string;
  tileset?: string;
  /** Raw GID as it appeared in the file, flag bits included. */
  gid?: number;
  feature?: string;
  /** Character offset of a JSON syntax error. */
  position?: number;
  line?: number;
  column?: number;
}>;

export class MapParseError extends Error {
  public readonly kind: MapErrorKind;
  public readonly context: MapErrorContext;

  public constructor(kind: MapErrorKind, message: string, context: MapErrorContext = {}) {
    super(context.path ? `${context.path}: ${message}` : message);
    this.name = "MapParseError";
    this.kind = kind;
    this.context = context;
  }
}

export function isMapParseError(e: unknown): e is MapParseError {
  return e instanceof MapParseError;
}

export type WarnFn = (msg: string) => void;
