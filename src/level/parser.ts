import { readFile } from "node:fs/promises";
import { IoError, LevelFormatError, stringifyError } from "../common/errors.js";
import type { LevelGrid, ParseOptions, Row } from "../types.js";

export const ROW_WIDTH = 5;

const DATA_MARKER = "data=";
const INTEGER_TOKEN = /^\s*[+-]?\d+\s*$/;

export async function parseLevelFile(path: string, options: ParseOptions = {}): Promise<LevelGrid> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new IoError(path, `Cannot read level file ${path}: ${stringifyError(error)}`, error);
  }
  return parseLevelText(text, options);
}

/**
 * Reads fixed-width level rows from raw text.
 *
 * Everything after a `data=` marker line is a data candidate; before it (or
 * when there is no marker) only lines containing a comma are. Candidates that
 * do not split into exactly five integers are dropped, or rejected with
 * {@link LevelFormatError} when `strict` is set.
 */
export function parseLevelText(text: string, options: ParseOptions = {}): LevelGrid {
  const strict = options.strict ?? false;
  const rows: Row[] = [];
  let dataStarted = false;

  const lines = text.split(/\r\n|\r|\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const stripped = lines[index].trim();
    if (!stripped) {
      continue;
    }
    if (stripped.toLowerCase().startsWith(DATA_MARKER)) {
      dataStarted = true;
      continue;
    }
    if (!dataStarted && !stripped.includes(",")) {
      continue;
    }

    const parsed = parseRow(stripped);
    if (typeof parsed === "string") {
      if (strict) {
        throw new LevelFormatError(index + 1, parsed);
      }
      continue;
    }
    rows.push(parsed);
  }
  return rows;
}

function parseRow(line: string): Row | string {
  const parts = line
    .replace(/,+$/, "")
    .split(",")
    .filter((part) => part !== "");
  if (parts.length !== ROW_WIDTH) {
    return `expected ${ROW_WIDTH} values, found ${parts.length}`;
  }

  const values: number[] = [];
  for (const part of parts) {
    if (!INTEGER_TOKEN.test(part)) {
      return `"${part.trim()}" is not an integer`;
    }
    values.push(Number.parseInt(part, 10));
  }
  const [a, b, c, d, e] = values;
  return [a, b, c, d, e];
}
