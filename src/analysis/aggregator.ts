import type { MappingTable } from "../mapping/mappingTable.js";
import type { CategoryKey, GeoBufferEntry, MaxCountTable } from "../types.js";

/**
 * Folds per-id maxima into per-category totals, in table order. Ids that
 * never occurred add nothing. The result is ordered by category x only;
 * equal x values keep fold order.
 */
export function aggregate(table: MappingTable, counts: MaxCountTable): GeoBufferEntry[] {
  const totals = new Map<string, { category: CategoryKey; total: number }>();
  for (const [id, category] of table.entries()) {
    const count = counts.get(id) ?? 0;
    if (count <= 0) {
      continue;
    }
    const key = `${category[0]},${category[1]}`;
    const slot = totals.get(key);
    if (slot) {
      slot.total += count;
    } else {
      totals.set(key, { category, total: count });
    }
  }

  const entries: GeoBufferEntry[] = [...totals.values()].map(({ category, total }) => [
    category[0],
    category[1],
    total,
  ]);
  // Array.prototype.sort is stable.
  entries.sort((a, b) => a[0] - b[0]);
  return entries;
}

export function countMatchedIds(counts: MaxCountTable): number {
  let matched = 0;
  for (const count of counts.values()) {
    if (count > 0) {
      matched += 1;
    }
  }
  return matched;
}
