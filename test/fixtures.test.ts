import path from "node:path";
import { describe, expect, it } from "vitest";

import { summarizeMap, stringifyMap } from "../src/tiled/inspectTool.js";
import { parseMapFile } from "../src/tiled/mapFile.js";
import { getTile, getTileMetadata, walkLayers } from "../src/tiled/model.js";
import type { Layer, TiledMap, TileLayer } from "../src/tiled/model.js";

function fixture(name: string): string {
  return path.resolve(process.cwd(), "fixtures", "maps", name);
}

async function load(name: string): Promise<{ map: TiledMap; warnings: string[] }> {
  const warnings: string[] = [];
  const map = await parseMapFile(fixture(name), { warn: (m) => warnings.push(m) });
  return { map, warnings };
}

function layerNamed(map: TiledMap, name: string): Layer {
  for (const l of walkLayers(map.layers)) if (l.name === name) return l;
  throw new Error(`no layer named '${name}'`);
}

function tileLayerNamed(map: TiledMap, name: string): TileLayer {
  const l = layerNamed(map, name);
  if (l.kind !== "tile") throw new Error(`'${name}' is a ${l.kind} layer`);
  return l;
}

describe("fixture: village (orthogonal, csv)", () => {
  it("summarizes the map", async () => {
    const { map, warnings } = await load("village.json");
    expect(warnings).toEqual([]);
    expect(summarizeMap(map)).toEqual([
      "orthogonal 4x3 tiles of 16x16 px, right-down (version 1.10)",
      "tilesets: 2",
      "  [0] terrain gids 1..8 (8 tiles)",
      "  [1] props gids 9..10 (2 tiles)",
      "layers: 3",
      '  tile "ground" 4x3, 10 tiles',
      '  objects "spawns" 5 objects',
      '  group "decor" (1 layers)',
      '    image "sky" sky.png',
    ]);
  });

  it("keeps flip flags on cells", async () => {
    const { map } = await load("village.json");
    const ground = tileLayerNamed(map, "ground");

    expect(getTile(ground, 1, 2)).toEqual({
      gid: 1,
      tileset: 0,
      localId: 0,
      flippedHorizontally: true,
      flippedVertically: false,
      flippedDiagonally: false,
    });
    expect(getTile(ground, 2, 2)).toMatchObject({ localId: 1, flippedVertically: true, flippedHorizontally: false });
    expect(getTile(ground, 0, 2)).toBeNull();
  });

  it("exposes tile metadata through cell references", async () => {
    const { map } = await load("village.json");
    const water = getTile(tileLayerNamed(map, "ground"), 0, 1);
    if (!water) throw new Error("expected a tile");

    const meta = getTileMetadata(map, water);
    expect(meta?.class).toBe("water");
    expect(meta?.animation).toEqual([
      { tileId: 2, duration: 200 },
      { tileId: 3, duration: 200 },
    ]);
    expect(meta?.properties).toEqual({ walkable: { type: "bool", value: false } });

    const terrain = map.tilesets[0];
    expect(terrain?.tiles.get(5)?.collision?.[0]).toMatchObject({
      x: 0,
      y: 8,
      shape: { kind: "rectangle", width: 16, height: 8 },
    });
    expect(map.tilesets[1]?.tiles.get(1)?.image).toEqual({ source: "crate.png", width: 32, height: 32 });
  });

  it("decodes objects of every shape", async () => {
    const { map } = await load("village.json");
    const spawns = layerNamed(map, "spawns");
    if (spawns.kind !== "objects") throw new Error("expected an object group");

    expect(spawns.objects.map((o) => o.shape.kind)).toEqual(["point", "tile", "ellipse", "polyline", "text"]);
    expect(spawns.objects[0]).toMatchObject({ id: 1, name: "player", class: "spawn", x: 16, y: 32 });

    const barrel = spawns.objects[1]?.shape;
    expect(barrel).toEqual({
      kind: "tile",
      width: 16,
      height: 24,
      tile: {
        gid: 9,
        tileset: 1,
        localId: 0,
        flippedHorizontally: false,
        flippedVertically: false,
        flippedDiagonally: false,
      },
    });

    const sign = spawns.objects[4]?.shape;
    if (sign?.kind !== "text") throw new Error("expected a text object");
    expect(sign.text).toMatchObject({ text: "Welcome", wrap: true, pixelSize: 16, horizontalAlign: "left" });
  });

  it("decodes map properties, background color and nested image layers", async () => {
    const { map } = await load("village.json");
    expect(map.backgroundColor).toEqual({ r: 0x33, g: 0x66, b: 0x99, a: 255 });
    expect(map.properties).toEqual({
      title: { type: "string", value: "Village" },
      difficulty: { type: "int", value: 2 },
    });

    const sky = layerNamed(map, "sky");
    expect(sky).toMatchObject({ kind: "image", opacity: 0.5, repeatX: true, repeatY: false });
  });

  it("dumps tile tables as plain objects", async () => {
    const { map } = await load("village.json");
    const dumped: unknown = JSON.parse(stringifyMap(map));
    expect(dumped).toMatchObject({
      tilesets: [{ name: "terrain", tiles: { "2": { class: "water" } } }, { name: "props" }],
    });
  });
});

describe("fixture: caves (isometric, infinite)", () => {
  it("summarizes the chunked layer", async () => {
    const { map, warnings } = await load("caves.json");
    expect(warnings).toEqual([]);
    const lines = summarizeMap(map);
    expect(lines[0]).toBe("isometric 32x32 tiles of 32x16 px, right-down, infinite (version 1.11)");
    expect(lines).toContain('  tile "floor" 2 chunks, 5 tiles');
  });

  it("reads cells from chunks at negative coordinates", async () => {
    const { map } = await load("caves.json");
    const floor = tileLayerNamed(map, "floor");

    expect(getTile(floor, -2, 1)?.localId).toBe(3);
    expect(getTile(floor, -1, 1)).toBeNull();
    expect(getTile(floor, 1, 0)?.localId).toBe(1);
    expect(getTile(floor, 0, 2)).toBeNull();
  });
});

describe("fixture: hex-base64 (hexagonal, binary data)", () => {
  it("decodes plain, zlib and gzip layers to the same cells", async () => {
    const { map, warnings } = await load("hex-base64.json");
    expect(warnings).toEqual([]);

    const plain = tileLayerNamed(map, "plain");
    if (plain.data.kind !== "finite") throw new Error("expected finite data");
    expect(plain.data.tiles.map((t) => (t ? t.localId : null))).toEqual([0, 1, 2, null, 4, 5]);

    expect(tileLayerNamed(map, "zipped").data).toEqual(plain.data);
    expect(tileLayerNamed(map, "gzipped").data).toEqual(plain.data);
  });

  it("keeps the hex geometry", async () => {
    const { map } = await load("hex-base64.json");
    expect(map.orientation).toBe("hexagonal");
    expect(map.hexSideLength).toBe(8);
    expect(map.stagger).toEqual({ axis: "x", index: "even" });
  });
});
