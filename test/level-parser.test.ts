import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { IoError, LevelFormatError } from "../src/common/errors.js";
import { parseLevelFile, parseLevelText } from "../src/level/parser.js";

test("parseLevelText reads rows after a data= marker", () => {
  const text = "header\nversion 3\nDATA=\n1,2,3,4,5,\n\n6,7,8,9,10\nfoo\n";
  assert.deepEqual(parseLevelText(text), [
    [1, 2, 3, 4, 5],
    [6, 7, 8, 9, 10],
  ]);
});

test("parseLevelText treats comma lines as data when there is no marker", () => {
  const text = "title,x\n1,2,3,4,5\n1,2,3\n1,2,x,4,5\n 1, 2 ,3,4,5 \n";
  assert.deepEqual(parseLevelText(text), [
    [1, 2, 3, 4, 5],
    [1, 2, 3, 4, 5],
  ]);
});

test("parseLevelText drops empty tokens from repeated separators", () => {
  assert.deepEqual(parseLevelText("1,,2,3,4,5,,\n"), [[1, 2, 3, 4, 5]]);
});

test("parseLevelText accepts signs and CRLF line endings", () => {
  assert.deepEqual(parseLevelText("data=\r\n-1,2,3,4,+5\r\n"), [[-1, 2, 3, 4, 5]]);
});

test("parseLevelText splits lines on a bare carriage return", () => {
  assert.deepEqual(parseLevelText("data=\r1,2,3,4,5\r6,7,8,9,10\r"), [
    [1, 2, 3, 4, 5],
    [6, 7, 8, 9, 10],
  ]);
});

test("parseLevelText numbers lines the same for every line ending", () => {
  assert.throws(
    () => parseLevelText("data=\r\n1,2,3,4,5\r1,2\n", { strict: true }),
    (error: unknown) => error instanceof LevelFormatError && error.line === 3,
  );
});

test("parseLevelText discards rows with non-integer tokens", () => {
  const text = "1.5,2,3,4,5\n0x10,2,3,4,5\n1e3,2,3,4,5\n1_000,2,3,4,5\n7,7,7,7,7\n";
  assert.deepEqual(parseLevelText(text), [[7, 7, 7, 7, 7]]);
});

test("parseLevelText returns an empty grid for empty input", () => {
  assert.deepEqual(parseLevelText(""), []);
  assert.deepEqual(parseLevelText("\n  \n\n"), []);
});

test("parseLevelText gives identical grids on repeated parses", () => {
  const text = "data=\n1,2,3,4,5\n5,4,3,2,1\n";
  assert.deepEqual(parseLevelText(text), parseLevelText(text));
});

test("parseLevelText in strict mode reports the malformed line", () => {
  assert.throws(
    () => parseLevelText("data=\n1,2,3,4,5\n1,2,3\n", { strict: true }),
    (error: unknown) => error instanceof LevelFormatError && error.line === 3,
  );
});

test("parseLevelText in strict mode still ignores lines before the data", () => {
  assert.deepEqual(parseLevelText("name level one\ndata=\n1,2,3,4,5\n", { strict: true }), [
    [1, 2, 3, 4, 5],
  ]);
});

test("parseLevelFile reads a level file from disk", async () => {
  const dir = await mkdtemp(join(tmpdir(), "geobuffer-level-"));
  try {
    const path = join(dir, "level.txt");
    await writeFile(path, "data=\n1,1,1,1,1,\n2,2,2,2,2,\n", "utf8");
    assert.deepEqual(await parseLevelFile(path), [
      [1, 1, 1, 1, 1],
      [2, 2, 2, 2, 2],
    ]);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("parseLevelFile fails with IoError for a missing file", async () => {
  const dir = await mkdtemp(join(tmpdir(), "geobuffer-level-missing-"));
  try {
    const path = join(dir, "nope.txt");
    await assert.rejects(
      () => parseLevelFile(path),
      (error: unknown) => error instanceof IoError && error.path === path,
    );
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
