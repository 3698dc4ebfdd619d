import type { CategoryKey, ConversionGroup, RollerOverride } from "../types.js";

/** Item ids whose category follows the selected roller override. */
export const ROLLER_IDS: readonly number[] = [41, 42, 43, 44, 579, 580, 587, 588];

export const DEFAULT_ROLLER_NAME = "Default";
export const FALLBACK_ROLLER_CATEGORY: CategoryKey = [24, 4];

/**
 * Named roller categories in file order. An empty catalog means no override
 * configuration could be loaded.
 */
export type RollerCatalog = ReadonlyMap<string, CategoryKey>;

export function buildRollerCatalog(overrides: readonly RollerOverride[]): RollerCatalog {
  const catalog = new Map<string, CategoryKey>();
  for (const override of overrides) {
    catalog.set(override.name.trim(), override.to);
  }
  return catalog;
}

export function listRollerNames(catalog: RollerCatalog): string[] {
  return [...catalog.keys()];
}

export function resolveRollerCategory(catalog: RollerCatalog, name: string): CategoryKey {
  return catalog.get(name.trim()) ?? catalog.get(DEFAULT_ROLLER_NAME) ?? FALLBACK_ROLLER_CATEGORY;
}

/**
 * Item id -> output category lookup shared by the window analyzer and the
 * aggregator. Iteration follows the order ids were first inserted; reassigning
 * an id keeps its position.
 */
export class MappingTable {
  private readonly categories = new Map<number, CategoryKey>();

  static fromGroups(groups: readonly ConversionGroup[]): MappingTable {
    const table = new MappingTable();
    for (const group of groups) {
      for (const id of group.ids) {
        table.categories.set(id, group.to);
      }
    }
    return table;
  }

  get size(): number {
    return this.categories.size;
  }

  has(id: number): boolean {
    return this.categories.has(id);
  }

  getCategory(id: number): CategoryKey | undefined {
    return this.categories.get(id);
  }

  ids(): number[] {
    return [...this.categories.keys()];
  }

  entries(): Array<[number, CategoryKey]> {
    return [...this.categories.entries()];
  }

  /**
   * Points every roller id at the category named in `catalog`, falling back to
   * the `Default` entry and then to {@link FALLBACK_ROLLER_CATEGORY}. Does
   * nothing when the catalog is empty. Returns the category applied, if any.
   */
  applyOverride(catalog: RollerCatalog, name: string): CategoryKey | undefined {
    if (catalog.size === 0) {
      return undefined;
    }
    const category = resolveRollerCategory(catalog, name);
    for (const id of ROLLER_IDS) {
      this.categories.set(id, category);
    }
    return category;
  }
}
