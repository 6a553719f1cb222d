import { readFile } from "node:fs/promises";

import { parseMap } from "./map.js";
import type { ParseOptions } from "./map.js";
import type { TiledMap } from "./model.js";

export async function parseMapFile(filePath: string, options: ParseOptions = {}): Promise<TiledMap> {
  const bytes = await readFile(filePath);
  return parseMap(bytes, options);
}
