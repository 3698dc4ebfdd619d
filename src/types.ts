/** One line of level data: exactly five item ids. */
export type Row = readonly [number, number, number, number, number];

export type LevelGrid = readonly Row[];

/** Output category an item id converts to: `[categoryX, categoryY]`. */
export type CategoryKey = readonly [number, number];

/** `[categoryX, categoryY, count]` */
export type GeoBufferEntry = readonly [number, number, number];

/** Item id -> highest occurrence count seen in any window. */
export type MaxCountTable = Map<number, number>;

export interface ConversionGroup {
  ids: number[];
  to: CategoryKey;
}

export interface RollerOverride {
  name: string;
  to: CategoryKey;
}

export interface ParseOptions {
  /** Throw on malformed data lines instead of dropping them. */
  strict?: boolean;
}

export interface RunConfig {
  inputPath?: string;
  outputPath?: string;
  windowSize: number;
  includePreset: boolean;
  roller: string;
  conversionMapPath: string;
  rollerMappingPaths: string[];
  strict: boolean;
  debug: boolean;
  listRollers: boolean;
}

export interface GeoBufferRunSummary {
  inputPath: string;
  outputPath: string;
  rows: number;
  windows: number;
  matchedIds: number;
  computedEntries: number;
  presetEntries: number;
  totalEntries: number;
}
