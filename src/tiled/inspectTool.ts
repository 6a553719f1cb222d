// src/tiled/inspectTool.ts
import path from "node:path";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";

import { isMapParseError } from "./errors.js";
import { decodeGid } from "./gid.js";
import { parseMap } from "./map.js";
import type { Layer, TiledMap } from "./model.js";

export type InspectToolOptions = Readonly<{
  recursive?: boolean;
}>;

export type InspectSummary = Readonly<{
  processed: number;
  failed: number;
}>;

export type DumpToolOptions = Readonly<{
  output?: string;
}>;

function isMapPath(p: string): boolean {
  const lower = p.toLowerCase();
  return lower.endsWith(".json") || lower.endsWith(".tmj");
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const st = await stat(p);
    return st.isDirectory();
  } catch {
    return false;
  }
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const out: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (recursive) out.push(...(await listFiles(full, true)));
    } else if (e.isFile()) {
      out.push(full);
    }
  }

  out.sort();
  return out;
}

async function ensureParentDir(p: string): Promise<void> {
  await mkdir(path.dirname(p), { recursive: true });
}

function countTiles(layer: Extract<Layer, { kind: "tile" }>): number {
  if (layer.data.kind === "finite") return layer.data.tiles.filter((c) => c !== null).length;
  let n = 0;
  for (const c of layer.data.chunks) n += c.tiles.filter((t) => t !== null).length;
  return n;
}

function describeLayer(layer: Layer, indent: string, out: string[]): void {
  switch (layer.kind) {
    case "tile": {
      const shape =
        layer.data.kind === "finite"
          ? `${layer.width}x${layer.height}`
          : `${layer.data.chunks.length} chunks`;
      out.push(`${indent}tile "${layer.name}" ${shape}, ${countTiles(layer)} tiles`);
      break;
    }
    case "objects":
      out.push(`${indent}objects "${layer.name}" ${layer.objects.length} objects`);
      break;
    case "image":
      out.push(`${indent}image "${layer.name}" ${layer.image.source}`);
      break;
    case "group":
      out.push(`${indent}group "${layer.name}" (${layer.layers.length} layers)`);
      for (const child of layer.layers) describeLayer(child, indent + "  ", out);
      break;
  }
}

/** Human-readable overview of a decoded map, one line per tileset and layer. */
export function summarizeMap(map: TiledMap): string[] {
  const out: string[] = [];
  out.push(
    `${map.orientation} ${map.width}x${map.height} tiles of ${map.tileWidth}x${map.tileHeight} px, ` +
      `${map.renderOrder}${map.infinite ? ", infinite" : ""} (version ${map.version ?? "unknown"})`,
  );

  out.push(`tilesets: ${map.tilesets.length}`);
  for (const ts of map.tilesets) {
    const last = ts.firstGid + ts.tileCount - 1;
    out.push(`  [${ts.index}] ${ts.name} gids ${ts.firstGid}..${last} (${ts.tileCount} tiles)`);
  }

  out.push(`layers: ${map.layers.length}`);
  for (const l of map.layers) describeLayer(l, "  ", out);
  return out;
}

/** JSON text for a decoded map. Tileset tile tables become plain objects keyed by local id. */
export function stringifyMap(map: TiledMap): string {
  const replacer = (_key: string, value: unknown): unknown =>
    value instanceof Map ? Object.fromEntries(value) : value;
  return JSON.stringify(map, replacer, 2) + "\n";
}

export function formatGid(raw: number): string {
  const d = decodeGid(raw);
  const flags = [
    d.flippedHorizontally ? "H" : null,
    d.flippedVertically ? "V" : null,
    d.flippedDiagonally ? "D" : null,
  ].filter((f): f is string => f !== null);
  const suffix = flags.length > 0 ? ` flips=${flags.join("")}` : "";
  return `${raw >>> 0} -> tile ${d.tileId}${suffix}${d.tileId === 0 ? " (empty)" : ""}`;
}

export function parseGidArgument(s: string): number {
  const t = s.trim();
  const v = /^0x[0-9a-f]+$/i.test(t) ? parseInt(t.slice(2), 16) : /^\d+$/.test(t) ? Number(t) : NaN;
  if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) {
    throw new Error(`Invalid GID '${s}': expected an unsigned 32-bit integer`);
  }
  return v;
}

async function inspectOne(file: string, label: string): Promise<boolean> {
  const bytes = await readFile(file);
  const warnings: string[] = [];

  try {
    const map = parseMap(bytes, { warn: (m) => warnings.push(m) });
    for (const w of warnings) console.warn(`${label}: ${w}`);
    console.log(label);
    for (const line of summarizeMap(map)) console.log(`  ${line}`);
    return true;
  } catch (e: unknown) {
    if (!isMapParseError(e)) throw e;
    console.error(`${label}: ${e.kind}: ${e.message}`);
    return false;
  }
}

export async function runInspectTool(inputPath: string, opts: InspectToolOptions): Promise<InspectSummary> {
  const recursive = opts.recursive === true;

  if (!(await isDirectory(inputPath))) {
    const ok = await inspectOne(inputPath, inputPath);
    return { processed: 1, failed: ok ? 0 : 1 };
  }

  let processed = 0;
  let failed = 0;

  for (const f of await listFiles(inputPath, recursive)) {
    if (!isMapPath(f)) continue;
    processed++;
    if (!(await inspectOne(f, path.relative(inputPath, f)))) failed++;
  }

  console.log(`Done. processed=${processed} failed=${failed}`);
  return { processed, failed };
}

export async function runDumpTool(inputPath: string, opts: DumpToolOptions): Promise<void> {
  const bytes = await readFile(inputPath);

  const warnings: string[] = [];
  const map = parseMap(bytes, { warn: (m) => warnings.push(m) });
  for (const w of warnings) console.warn(w);

  const text = stringifyMap(map);
  if (opts.output) {
    await ensureParentDir(opts.output);
    await writeFile(opts.output, text, "utf8");
  } else {
    process.stdout.write(text);
  }
}
