import { ConfigurationError } from "../common/errors.js";
import type { MappingTable } from "../mapping/mappingTable.js";
import type { LevelGrid, MaxCountTable } from "../types.js";

export const DEFAULT_WINDOW_SIZE = 200;

export function assertWindowSize(windowSize: number): void {
  if (!Number.isSafeInteger(windowSize) || windowSize <= 0) {
    throw new ConfigurationError(`Window size must be a positive integer, got ${windowSize}.`);
  }
}

export function parseWindowSize(raw: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`Window size must be an integer, got "${raw}".`);
  }
  const value = Number.parseInt(trimmed, 10);
  assertWindowSize(value);
  return value;
}

export function countWindows(rowCount: number, windowSize: number): number {
  return Math.max(0, rowCount - windowSize + 1);
}

/**
 * Highest number of times each mapped id occurs within any `windowSize`
 * consecutive rows. Every id of `table` is present in the result, 0 when it
 * never occurs or when the grid is shorter than one window.
 *
 * Each window is recounted from scratch: O(rows * windowSize * 5).
 */
export function analyzeWindows(
  grid: LevelGrid,
  windowSize: number,
  table: MappingTable,
): MaxCountTable {
  assertWindowSize(windowSize);

  const maxCounts: MaxCountTable = new Map();
  for (const id of table.ids()) {
    maxCounts.set(id, 0);
  }

  const windows = countWindows(grid.length, windowSize);
  for (let start = 0; start < windows; start += 1) {
    const freq = new Map<number, number>();
    for (let offset = 0; offset < windowSize; offset += 1) {
      for (const item of grid[start + offset]) {
        if (table.has(item)) {
          freq.set(item, (freq.get(item) ?? 0) + 1);
        }
      }
    }
    for (const [id, count] of freq) {
      if (count > (maxCounts.get(id) ?? 0)) {
        maxCounts.set(id, count);
      }
    }
  }
  return maxCounts;
}
