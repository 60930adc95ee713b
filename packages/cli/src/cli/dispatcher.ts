/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import {
  createConsoleLogger,
  createDiagnostic,
  formatDiagnostic,
  type Diagnostic,
  type ItemStore,
  type Logger,
} from "@bindery/core";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { loadStoreFile, saveStoreFile } from "../store-file.js";
import { initCommand } from "../commands/init.js";
import { statusCommand } from "../commands/status.js";
import { clearCommand } from "../commands/clear.js";
import { envSyncCommand } from "../commands/env-sync.js";
import type { ResolvedConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const STORE_COMMANDS: readonly string[] = ["status", "clear", "env:sync"];

/**
 * Exit code for a config or store file failure
 */
export const exitCodeFor = (diagnostic: Diagnostic): number => {
  switch (diagnostic.code) {
    case "BND9001":
      return 3;
    case "BND9004":
    case "BND9005":
    case "BND9006":
    case "BND9007":
      return 4;
    default:
      return 1;
  }
};

const report = (diagnostic: Diagnostic): number => {
  console.error(formatDiagnostic(diagnostic));
  return exitCodeFor(diagnostic);
};

const save = (
  config: ResolvedConfig,
  store: ItemStore,
  logger: Logger
): number => {
  const result = saveStoreFile(config.databasePath, store);
  if (!result.ok) {
    return report(result.error);
  }
  if (result.value) {
    logger.debug(`Saved ${config.databasePath}`);
  }
  return 0;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`bindery v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "init" && !STORE_COMMANDS.includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'bindery --help' for usage information");
    return 2;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    return report(
      createDiagnostic(
        "BND9001",
        "error",
        `No bindery.json found in ${cwd} or its parents`,
        "Create a bindery.json with at least a 'packageName'"
      )
    );
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    return report(configResult.error);
  }

  // Project root is the directory containing bindery.json
  const config = resolveConfig(
    configResult.value,
    parsed.options,
    dirname(configPath)
  );
  const logger = createConsoleLogger({
    verbose: config.verbose,
    quiet: config.quiet,
  });

  if (parsed.command === "init") {
    const result = initCommand(config, logger);
    if (!result.ok) {
      logger.error(result.error);
      return 1;
    }
    return save(config, result.value, logger);
  }

  const loaded = loadStoreFile(config.databasePath, logger);
  if (!loaded.ok) {
    return report(loaded.error);
  }
  const store = loaded.value;

  // Dispatch to command handlers
  switch (parsed.command) {
    case "status":
      statusCommand(store, logger);
      return 0;

    case "clear": {
      const result = clearCommand(store, parsed.target, logger);
      if (!result.ok) {
        logger.error(result.error);
        return 1;
      }
      return save(config, store, logger);
    }

    case "env:sync":
      envSyncCommand(store, config.environments, logger);
      return save(config, store, logger);

    default:
      logger.error(`Unknown command '${parsed.command}'`);
      return 2;
  }
};
