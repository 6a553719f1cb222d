import { gunzipSync, inflateSync } from "node:zlib";

import { BinaryReader } from "./binary.js";
import { MapParseError } from "./errors.js";
import { isU32 } from "./gid.js";
import type { RawTileData } from "./rawSchema.js";

export type TileEncoding = "csv" | "base64";
export type TileCompression = "none" | "zlib" | "gzip";

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function parseTileEncoding(v: string | undefined, path: string): TileEncoding {
  if (v === undefined || v === "csv") return "csv";
  if (v === "base64") return "base64";
  throw new MapParseError("UnsupportedFeature", `unknown tile data encoding '${v}'`, {
    path,
    feature: `encoding:${v}`,
  });
}

export function parseTileCompression(v: string | undefined, path: string): TileCompression {
  if (v === undefined || v === "") return "none";
  if (v === "zlib" || v === "gzip") return v;
  throw new MapParseError("UnsupportedFeature", `unsupported tile data compression '${v}'`, {
    path,
    feature: `compression:${v}`,
  });
}

function decompress(bytes: Buffer, compression: TileCompression): Buffer {
  switch (compression) {
    case "none":
      return bytes;
    case "zlib":
      return inflateSync(bytes);
    case "gzip":
      return gunzipSync(bytes);
  }
}

/**
 * Turns layer or chunk data into raw 32-bit GIDs (flags still set). Callers
 * check the cell count against the declared dimensions.
 */
export function decodeTileData(
  data: RawTileData,
  encoding: TileEncoding,
  compression: TileCompression,
  path: string,
  layer: string,
): number[] {
  const inconsistent = (msg: string): MapParseError =>
    new MapParseError("InconsistentLayerData", msg, { path, layer });

  if (encoding === "csv") {
    if (typeof data === "string") throw inconsistent("string data requires encoding 'base64'");
    if (compression !== "none") throw inconsistent("compression requires encoding 'base64'");

    data.forEach((v, i) => {
      if (!isU32(v)) {
        throw new MapParseError("InconsistentLayerData", `invalid GID ${v}`, {
          path: `${path}[${i}]`,
          layer,
        });
      }
    });
    return data;
  }

  if (typeof data !== "string") throw inconsistent("encoding 'base64' requires string data");

  const text = data.replace(/\s+/g, "");
  if (!BASE64.test(text) || text.length % 4 === 1) throw inconsistent("invalid base64 data");

  let bytes: Buffer;
  try {
    bytes = decompress(Buffer.from(text, "base64"), compression);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw inconsistent(`cannot decompress ${compression} data: ${msg}`);
  }

  try {
    return new BinaryReader(bytes).readAllU32LE();
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw inconsistent(msg);
  }
}
