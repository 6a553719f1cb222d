import { describe, expect, it } from "vitest";

import { MapParseError } from "../src/tiled/errors.js";
import { buildMap, parseMap, tryParseMap } from "../src/tiled/map.js";
import type { Layer, TileLayer } from "../src/tiled/model.js";

type Json = Record<string, unknown>;

function catchMapError(fn: () => unknown): MapParseError {
  try {
    fn();
  } catch (e: unknown) {
    if (e instanceof MapParseError) return e;
    throw e;
  }
  throw new Error("expected a MapParseError");
}

function tileset(firstgid: number, tilecount: number, name: string): Json {
  return { firstgid, name, tilewidth: 16, tileheight: 16, tilecount, columns: 0, margin: 0, spacing: 0 };
}

function tileLayer(data: number[], width = data.length, height = 1): Json {
  return { type: "tilelayer", id: 1, name: "ground", width, height, data, opacity: 1, visible: true };
}

function mapJson(over: Json = {}): Json {
  return {
    type: "map",
    version: "1.10",
    orientation: "orthogonal",
    renderorder: "right-down",
    width: 4,
    height: 1,
    tilewidth: 16,
    tileheight: 16,
    infinite: false,
    tilesets: [tileset(1, 4, "first"), tileset(5, 8, "second")],
    layers: [],
    ...over,
  };
}

function parse(over: Json = {}) {
  return parseMap(JSON.stringify(mapJson(over)));
}

function firstTileLayer(layers: ReadonlyArray<Layer>): TileLayer {
  const l = layers[0];
  if (!l || l.kind !== "tile") throw new Error("expected a tile layer first");
  return l;
}

describe("map assembler", () => {
  it("decodes the two-tileset scenario", () => {
    const map = parse({ layers: [tileLayer([0, 1, 6, 2147483653])] });
    const layer = firstTileLayer(map.layers);
    if (layer.data.kind !== "finite") throw new Error("expected finite data");

    const [empty, a, b, c] = layer.data.tiles;
    expect(empty).toBeNull();
    expect(a).toEqual({
      gid: 1,
      tileset: 0,
      localId: 0,
      flippedHorizontally: false,
      flippedVertically: false,
      flippedDiagonally: false,
    });
    expect(b).toMatchObject({ gid: 6, tileset: 1, localId: 1, flippedHorizontally: false });
    expect(c).toEqual({
      gid: 5,
      tileset: 1,
      localId: 0,
      flippedHorizontally: true,
      flippedVertically: false,
      flippedDiagonally: false,
    });
  });

  it("fails the whole map when any tileset is an external reference", () => {
    const e = catchMapError(() =>
      parse({
        tilesets: [tileset(1, 4, "first"), { firstgid: 5, source: "props.tsx" }],
        layers: [tileLayer([1, 1, 1, 1])],
      }),
    );
    expect(e.kind).toBe("UnsupportedFeature");
    expect(e.context.path).toBe("tilesets[1].source");
  });

  it("fails with UnresolvedTileReference one past the last range", () => {
    const e = catchMapError(() => parse({ width: 1, layers: [tileLayer([13])] }));
    expect(e.kind).toBe("UnresolvedTileReference");
    expect(e.context).toEqual({ path: "layers[0].data[0]", layer: "ground", gid: 13 });
  });

  it("rejects overlapping tileset ranges", () => {
    const e = catchMapError(() =>
      parse({ tilesets: [tileset(1, 4, "first"), tileset(3, 8, "second")] }),
    );
    expect(e.kind).toBe("OverlappingTilesetRanges");
  });

  it("keeps tilesets in declaration order and resolves against the owning one", () => {
    const map = parse({
      tilesets: [tileset(5, 8, "second"), tileset(1, 4, "first")],
      layers: [tileLayer([1, 5, 12, 4])],
    });
    expect(map.tilesets.map((t) => t.name)).toEqual(["second", "first"]);
    const layer = firstTileLayer(map.layers);
    if (layer.data.kind !== "finite") throw new Error("expected finite data");
    expect(layer.data.tiles.map((t) => (t ? [t.tileset, t.localId] : null))).toEqual([
      [1, 0],
      [0, 0],
      [0, 7],
      [1, 3],
    ]);
  });

  it("reports malformed JSON as MalformedInput", () => {
    const e = catchMapError(() => parseMap('{"orientation": "orthogonal",'));
    expect(e.kind).toBe("MalformedInput");
    expect(e.message.startsWith("invalid JSON at 1:30: ")).toBe(true);
    expect(e.context).toEqual({ position: 29, line: 1, column: 30 });
  });

  it("locates every JSON syntax error", () => {
    const tru = catchMapError(() => parseMap('{"a": tru}'));
    expect(tru.kind).toBe("MalformedInput");
    expect(tru.context).toEqual({ position: 9, line: 1, column: 10 });

    const bare = catchMapError(() => parseMap('{"a": x}'));
    expect(bare.context).toEqual({ position: 6, line: 1, column: 7 });

    const multiline = catchMapError(() => parseMap('{\n  "width": 4,\n  "height": 01\n}'));
    expect(multiline.context).toEqual({ position: 29, line: 3, column: 14 });

    const badEscape = catchMapError(() => parseMap('["a\\qb"]'));
    expect(badEscape.context).toEqual({ position: 4, line: 1, column: 5 });
  });

  it("rejects bytes that are not valid UTF-8", () => {
    const bytes = new TextEncoder().encode(
      JSON.stringify(mapJson({ properties: [{ name: "n", type: "string", value: "AB" }] })),
    );
    bytes[bytes.indexOf(0x41)] = 0xff;

    const e = catchMapError(() => parseMap(bytes));
    expect(e.kind).toBe("MalformedInput");
    expect(e.message.startsWith("input is not valid UTF-8")).toBe(true);
  });

  it("reports missing required fields with their path", () => {
    const json = mapJson();
    delete json.width;
    const e = catchMapError(() => buildMap(json));
    expect(e.kind).toBe("MalformedInput");
    expect(e.context.path).toBe("width");
  });

  it("reports wrongly typed fields with their path", () => {
    const e = catchMapError(() => parse({ layers: [{ type: "tilelayer", name: 7 }] }));
    expect(e.kind).toBe("MalformedInput");
    expect(e.message).toBe("layers[0].name: expected string");
  });

  it("rejects non-positive dimensions", () => {
    expect(catchMapError(() => parse({ width: 0 })).context.path).toBe("width");
    expect(catchMapError(() => parse({ tileheight: 2.5 })).kind).toBe("MalformedInput");
  });

  it("rejects unknown orientation and render order", () => {
    const o = catchMapError(() => parse({ orientation: "diagonal" }));
    expect(o.kind).toBe("UnsupportedFeature");
    expect(o.context.feature).toBe("orientation:diagonal");

    expect(catchMapError(() => parse({ renderorder: "down" })).kind).toBe("UnsupportedFeature");
  });

  it("requires a non-negative hex side length for hexagonal maps", () => {
    expect(catchMapError(() => parse({ orientation: "hexagonal" })).kind).toBe("MalformedInput");
    expect(catchMapError(() => parse({ orientation: "hexagonal", hexsidelength: -1 })).kind).toBe(
      "MalformedInput",
    );

    const map = parse({ orientation: "hexagonal", hexsidelength: 0 });
    expect(map.hexSideLength).toBe(0);
    expect(map.stagger).toEqual({ axis: "y", index: "odd" });
  });

  it("rejects unknown stagger values", () => {
    const e = catchMapError(() => parse({ orientation: "staggered", staggeraxis: "z" }));
    expect(e.kind).toBe("UnsupportedFeature");
  });

  it("rejects documents that are not maps", () => {
    const e = catchMapError(() => parse({ type: "tileset" }));
    expect(e.kind).toBe("MalformedInput");
    expect(e.context.path).toBe("type");
  });

  it("applies defaults for optional map fields", () => {
    const json = mapJson();
    delete json.renderorder;
    delete json.infinite;
    delete json.type;
    const map = buildMap(json);
    expect(map.renderOrder).toBe("right-down");
    expect(map.infinite).toBe(false);
    expect(map.stagger).toBeUndefined();
    expect(map.properties).toEqual({});
  });

  it("parses bytes, including a UTF-8 byte order mark", () => {
    const text = "\uFEFF" + JSON.stringify(mapJson({ layers: [tileLayer([1, 2, 3, 4])] }));
    const map = parseMap(new TextEncoder().encode(text));
    expect(map.layers).toHaveLength(1);
  });

  it("returns structurally equal maps for identical bytes", () => {
    const bytes = JSON.stringify(
      mapJson({
        properties: [{ name: "level", type: "int", value: 3 }],
        layers: [tileLayer([0, 1, 6, 2147483653])],
      }),
    );
    expect(parseMap(bytes)).toEqual(parseMap(bytes));

    const bad = JSON.stringify(mapJson({ layers: [tileLayer([99, 0, 0, 0])] }));
    expect(catchMapError(() => parseMap(bad)).kind).toBe(catchMapError(() => parseMap(bad)).kind);
  });

  it("tryParseMap reports failures as values", () => {
    const ok = tryParseMap(JSON.stringify(mapJson()));
    expect(ok.ok).toBe(true);

    const failed = tryParseMap(JSON.stringify(mapJson({ orientation: "spiral" })));
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.kind).toBe("UnsupportedFeature");
  });

  it("warns about newer or missing format versions without failing", () => {
    const warnings: string[] = [];
    const warn = (m: string): void => {
      warnings.push(m);
    };

    parseMap(JSON.stringify(mapJson({ version: "1.10" })), { warn });
    expect(warnings).toEqual([]);

    const newer = parseMap(JSON.stringify(mapJson({ version: "2.0" })), { warn });
    expect(newer.version).toBe("2.0");
    expect(warnings).toEqual(["Map format version 2.0 is newer than 1.11; decoding best-effort."]);

    warnings.length = 0;
    const json = mapJson();
    delete json.version;
    expect(buildMap(json, { warn }).version).toBeUndefined();
    expect(warnings).toEqual(["Map has no format version; assuming the latest known."]);
  });

  it("stringifies numeric versions", () => {
    expect(parse({ version: 1.2 }).version).toBe("1.2");
  });

  it("decodes map-level properties and background color", () => {
    const map = parse({
      backgroundcolor: "#ff102030",
      properties: [
        { name: "title", type: "string", value: "Caves" },
        { name: "dark", type: "bool", value: true },
      ],
    });
    expect(map.backgroundColor).toEqual({ r: 0x10, g: 0x20, b: 0x30, a: 0xff });
    expect(map.properties).toEqual({
      title: { type: "string", value: "Caves" },
      dark: { type: "bool", value: true },
    });
  });
});
