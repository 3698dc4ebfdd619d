import { ConfigurationError, EmptyResultError, stringifyError } from "./common/errors.js";
import { buildRunConfig } from "./config.js";
import { Logger } from "./logger.js";
import { loadConversionGroups, loadRollerOverrides } from "./mapping/configLoader.js";
import { listRollerNames, MappingTable } from "./mapping/mappingTable.js";
import { runGeoBuffer } from "./pipeline.js";

const EXIT_EMPTY_RESULT = 2;

async function main(): Promise<void> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  const logger = new Logger({ debugEnabled: config.debug });

  const catalog = await loadRollerOverrides(config.rollerMappingPaths, logger);
  if (config.listRollers) {
    for (const name of listRollerNames(catalog)) {
      process.stdout.write(`${name}\n`);
    }
    return;
  }

  const { inputPath, outputPath } = config;
  if (!inputPath || !outputPath) {
    throw new ConfigurationError("Both --input and --output are required.");
  }

  const table = MappingTable.fromGroups(await loadConversionGroups(config.conversionMapPath));
  const roller = table.applyOverride(catalog, config.roller);
  if (roller) {
    logger.debug(`Roller "${config.roller}" -> ${roller[0]},${roller[1]}`);
  }

  const summary = await runGeoBuffer({
    inputPath,
    outputPath,
    windowSize: config.windowSize,
    includePreset: config.includePreset,
    strict: config.strict,
    table,
    logger,
  });
  process.stdout.write(
    `Finished. rows=${summary.rows} windows=${summary.windows} matched=${summary.matchedIds} ` +
      `entries=${summary.totalEntries} output=${summary.outputPath}\n`,
  );
}

main().catch((error) => {
  if (error instanceof EmptyResultError) {
    process.stderr.write(`${error.message}\n`);
    process.exit(EXIT_EMPTY_RESULT);
  }
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  process.exit(1);
});
