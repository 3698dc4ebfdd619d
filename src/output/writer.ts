import { writeFile } from "node:fs/promises";
import { IoError, stringifyError } from "../common/errors.js";
import type { GeoBufferEntry } from "../types.js";

export function formatGeoBuffer(entries: readonly GeoBufferEntry[]): string {
  return entries.map(([x, y, z]) => `${x},${y},${z}\n`).join("");
}

export async function writeGeoBuffer(path: string, entries: readonly GeoBufferEntry[]): Promise<void> {
  try {
    await writeFile(path, formatGeoBuffer(entries), "utf8");
  } catch (error) {
    throw new IoError(path, `Error writing output file ${path}: ${stringifyError(error)}`, error);
  }
}
