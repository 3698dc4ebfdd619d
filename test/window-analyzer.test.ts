import test from "node:test";
import assert from "node:assert/strict";
import {
  analyzeWindows,
  countWindows,
  parseWindowSize,
} from "../src/analysis/windowAnalyzer.js";
import { ConfigurationError } from "../src/common/errors.js";
import { MappingTable } from "../src/mapping/mappingTable.js";
import type { LevelGrid } from "../src/types.js";

const table = MappingTable.fromGroups([
  { ids: [1], to: [0, 0] },
  { ids: [2], to: [1, 0] },
]);

test("analyzeWindows keeps the per-id maximum over sliding windows", () => {
  const grid: LevelGrid = [
    [1, 1, 1, 1, 1],
    [2, 2, 2, 2, 2],
    [1, 1, 1, 1, 1],
  ];
  assert.deepEqual(
    analyzeWindows(grid, 2, table),
    new Map([
      [1, 5],
      [2, 5],
    ]),
  );
});

test("analyzeWindows finds the densest window", () => {
  const grid: LevelGrid = [
    [1, 1, 0, 0, 0],
    [1, 0, 0, 0, 0],
    [0, 0, 0, 0, 0],
    [1, 1, 1, 0, 0],
  ];
  assert.equal(analyzeWindows(grid, 2, table).get(1), 3);
  assert.equal(analyzeWindows(grid, 3, table).get(1), 4);
  assert.equal(analyzeWindows(grid, 1, table).get(1), 3);
});

test("analyzeWindows with one window counts the whole grid", () => {
  const wide = MappingTable.fromGroups([{ ids: [1, 2, 3], to: [0, 0] }]);
  const grid: LevelGrid = [
    [1, 2, 3, 9, 9],
    [1, 1, 2, 9, 9],
  ];
  assert.deepEqual(
    analyzeWindows(grid, 2, wide),
    new Map([
      [1, 3],
      [2, 2],
      [3, 1],
    ]),
  );
});

test("analyzeWindows returns zeros for every id when the window exceeds the grid", () => {
  const grid: LevelGrid = [[1, 2, 1, 2, 1]];
  assert.deepEqual(
    analyzeWindows(grid, 5, table),
    new Map([
      [1, 0],
      [2, 0],
    ]),
  );
});

test("analyzeWindows rejects window sizes that are not positive integers", () => {
  for (const size of [0, -1, 1.5, Number.NaN]) {
    assert.throws(() => analyzeWindows([], size, table), ConfigurationError);
  }
});

test("parseWindowSize accepts integer text only", () => {
  assert.equal(parseWindowSize("200"), 200);
  assert.equal(parseWindowSize(" 12 "), 12);
  for (const raw of ["abc", "1.5", "0", "-3", ""]) {
    assert.throws(() => parseWindowSize(raw), ConfigurationError);
  }
});

test("countWindows never goes below zero", () => {
  assert.equal(countWindows(3, 2), 2);
  assert.equal(countWindows(3, 3), 1);
  assert.equal(countWindows(2, 5), 0);
});
