import { z } from "zod";
import { DEFAULT_WINDOW_SIZE, parseWindowSize } from "./analysis/windowAnalyzer.js";
import { ConfigurationError } from "./common/errors.js";
import { DEFAULT_ROLLER_NAME } from "./mapping/mappingTable.js";
import { formatIssues } from "./mapping/configLoader.js";
import { DEFAULT_CONVERSION_MAP_PATH, DEFAULT_ROLLER_MAPPING_PATHS } from "./paths.js";
import type { RunConfig } from "./types.js";

const schema = z
  .object({
    inputPath: z.string().min(1).optional(),
    outputPath: z.string().min(1).optional(),
    windowSize: z.number().int().positive(),
    includePreset: z.boolean(),
    roller: z.string().trim().min(1),
    conversionMapPath: z.string().min(1),
    rollerMappingPaths: z.array(z.string().min(1)).min(1),
    strict: z.boolean(),
    debug: z.boolean(),
    listRollers: z.boolean(),
  })
  .superRefine((value, ctx) => {
    if (value.listRollers) {
      return;
    }
    if (!value.inputPath) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["input"], message: "Please select an input file." });
    }
    if (!value.outputPath) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["output"], message: "Please select an output file." });
    }
  });

const DEFAULTS = {
  includePreset: true,
  roller: DEFAULT_ROLLER_NAME,
  strict: false,
  debug: false,
} as const;

type CliRaw = Record<string, string | boolean>;

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);
  const rollerMappings = readOptionalString(args, "roller-mappings");

  const parsed = schema.safeParse({
    inputPath: readOptionalString(args, "input"),
    outputPath: readOptionalString(args, "output"),
    windowSize: parseWindowSize(
      readOptionalString(args, "window-size") ??
        (env.GEOBUFFER_WINDOW_SIZE || String(DEFAULT_WINDOW_SIZE)),
    ),
    includePreset: readBool(args, "preset", DEFAULTS.includePreset),
    roller: readOptionalString(args, "roller") ?? DEFAULTS.roller,
    conversionMapPath: readOptionalString(args, "conversion-map") ?? DEFAULT_CONVERSION_MAP_PATH,
    rollerMappingPaths: rollerMappings ? [rollerMappings] : DEFAULT_ROLLER_MAPPING_PATHS,
    strict: readBool(args, "strict", DEFAULTS.strict),
    debug: readBool(args, "debug", readEnvBool(env, "GEOBUFFER_DEBUG", DEFAULTS.debug)),
    listRollers: readBool(args, "list-rollers", false),
  });
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error), parsed.error);
  }
  return parsed.data;
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return undefined;
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  return parseBool(value) ?? fallback;
}

function readEnvBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (!raw) {
    return fallback;
  }
  return parseBool(raw) ?? fallback;
}

function parseBool(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return undefined;
}
