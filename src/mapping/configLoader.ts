import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, IoError, stringifyError } from "../common/errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { CategoryKey, ConversionGroup, RollerOverride } from "../types.js";
import { buildRollerCatalog, type RollerCatalog } from "./mappingTable.js";

const categorySchema = z
  .tuple([z.number().int(), z.number().int()])
  .transform((to): CategoryKey => [to[0], to[1]]);

const conversionGroupSchema = z.object({
  ids: z.array(z.number().int()),
  to: categorySchema,
});

const conversionMapSchema = z.array(conversionGroupSchema);

const rollerOverrideSchema = z.object({
  name: z.string().min(1),
  to: z.array(z.number().int()).min(2).transform((to): CategoryKey => [to[0], to[1]]),
});

export async function loadConversionGroups(path: string): Promise<ConversionGroup[]> {
  const raw = await readJsonFile(path);
  return parseConversionGroups(raw, path);
}

export function parseConversionGroups(raw: unknown, source = "conversion map"): ConversionGroup[] {
  const result = conversionMapSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid conversion map in ${source}: ${formatIssues(result.error)}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Loads named roller categories from the first candidate file that reads and
 * holds a JSON array. Entries without a usable name or category are skipped.
 * Returns an empty catalog when no candidate works.
 */
export async function loadRollerOverrides(
  paths: readonly string[],
  logger: Logger = silentLogger,
): Promise<RollerCatalog> {
  for (const path of paths) {
    let raw: unknown;
    try {
      raw = await readJsonFile(path);
    } catch (error) {
      logger.debug(`Roller mappings not loaded from ${path}: ${stringifyError(error)}`);
      continue;
    }
    if (!Array.isArray(raw)) {
      logger.warn(`Roller mappings in ${path} must be a JSON array; ignoring file.`);
      continue;
    }
    const overrides = parseRollerOverrides(raw);
    logger.debug(`Loaded ${overrides.length} roller mappings from ${path}.`);
    return buildRollerCatalog(overrides);
  }
  logger.warn(`No roller mappings found (tried ${paths.join(", ")}); roller ids keep their primary category.`);
  return new Map();
}

export function parseRollerOverrides(raw: readonly unknown[]): RollerOverride[] {
  const out: RollerOverride[] = [];
  for (const item of raw) {
    const result = rollerOverrideSchema.safeParse(item);
    if (result.success) {
      out.push(result.data);
    }
  }
  return out;
}

async function readJsonFile(path: string): Promise<unknown> {
  let body: string;
  try {
    body = await readFile(path, "utf8");
  } catch (error) {
    throw new IoError(path, `Cannot read ${path}: ${stringifyError(error)}`, error);
  }
  try {
    return JSON.parse(body) as unknown;
  } catch (error) {
    throw new ConfigurationError(`${path} is not valid JSON: ${stringifyError(error)}`, error);
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
