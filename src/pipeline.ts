import { aggregate, countMatchedIds } from "./analysis/aggregator.js";
import { analyzeWindows, countWindows } from "./analysis/windowAnalyzer.js";
import { EmptyResultError } from "./common/errors.js";
import { parseLevelFile } from "./level/parser.js";
import { type Logger, silentLogger } from "./logger.js";
import type { MappingTable } from "./mapping/mappingTable.js";
import { writeGeoBuffer } from "./output/writer.js";
import { injectPreset, PRESET_GEOBUFFER0 } from "./preset/geoBuffer0.js";
import type { GeoBufferRunSummary } from "./types.js";

export interface GeoBufferRunOptions {
  inputPath: string;
  outputPath: string;
  windowSize: number;
  includePreset: boolean;
  table: MappingTable;
  strict?: boolean;
  logger?: Logger;
}

/**
 * Level file in, geoBuffer file out. Throws {@link EmptyResultError} when the
 * level file has no rows or nothing is left to write; nothing is written then.
 */
export async function runGeoBuffer(options: GeoBufferRunOptions): Promise<GeoBufferRunSummary> {
  const logger = options.logger ?? silentLogger;
  const { inputPath, outputPath, windowSize, table } = options;

  const grid = await parseLevelFile(inputPath, { strict: options.strict });
  logger.debug(`Parsed ${grid.length} level rows from ${inputPath}.`);
  if (grid.length === 0) {
    throw new EmptyResultError("no_level_data");
  }

  const maxCounts = analyzeWindows(grid, windowSize, table);
  const windows = countWindows(grid.length, windowSize);
  const matchedIds = countMatchedIds(maxCounts);
  logger.debug(
    `Window analysis: rows=${grid.length} window_size=${windowSize} windows=${windows} ` +
      `mapped_ids=${table.size} matched_ids=${matchedIds}`,
  );
  if (windows === 0) {
    logger.warn(`Window size ${windowSize} exceeds ${grid.length} level rows; all counts are 0.`);
  }

  const computed = aggregate(table, maxCounts);
  const entries = injectPreset(computed, options.includePreset);
  if (entries.length === 0) {
    throw new EmptyResultError("no_matches");
  }

  await writeGeoBuffer(outputPath, entries);
  const presetEntries = options.includePreset ? PRESET_GEOBUFFER0.length : 0;
  logger.info(
    `GeoBuffer information written to ${outputPath} ` +
      `(computed=${computed.length} preset=${presetEntries} total=${entries.length}).`,
  );

  return {
    inputPath,
    outputPath,
    rows: grid.length,
    windows,
    matchedIds,
    computedEntries: computed.length,
    presetEntries,
    totalEntries: entries.length,
  };
}
