export type GeoBufferErrorCode =
  | "io_error"
  | "configuration_error"
  | "empty_result"
  | "level_format_error";

export class GeoBufferError extends Error {
  readonly code: GeoBufferErrorCode;

  constructor(code: GeoBufferErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class IoError extends GeoBufferError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super("io_error", message, { cause });
    this.path = path;
  }
}

export class ConfigurationError extends GeoBufferError {
  constructor(message: string, cause?: unknown) {
    super("configuration_error", message, { cause });
  }
}

export type EmptyResultReason = "no_level_data" | "no_matches";

const EMPTY_RESULT_MESSAGES: Record<EmptyResultReason, string> = {
  no_level_data: "No valid level data found in the file.",
  no_matches: "No matching item IDs were found in the level data.",
};

export class EmptyResultError extends GeoBufferError {
  readonly reason: EmptyResultReason;

  constructor(reason: EmptyResultReason) {
    super("empty_result", EMPTY_RESULT_MESSAGES[reason]);
    this.reason = reason;
  }
}

export class LevelFormatError extends GeoBufferError {
  readonly line: number;

  constructor(line: number, detail: string) {
    super("level_format_error", `Malformed level row at line ${line}: ${detail}`);
    this.line = line;
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
