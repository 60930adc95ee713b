/**
 * bindery init command
 */

import { existsSync } from "node:fs";
import { ItemStore, error, ok, type Logger, type Result } from "@bindery/core";
import type { ResolvedConfig } from "../types.js";

/**
 * Create an empty store for the configured package. The caller saves it.
 */
export const initCommand = (
  config: ResolvedConfig,
  logger: Logger
): Result<ItemStore, string> => {
  if (existsSync(config.databasePath) && !config.force) {
    return error(
      `Store file already exists: ${config.databasePath} (use --force to overwrite)`
    );
  }

  const store = ItemStore.empty(config.packageName, { logger });
  if (config.packageVersion !== undefined) {
    store.setPackageVersion(config.packageVersion);
  }
  for (const environment of config.environments) {
    store.registerEnvironment(environment);
  }

  logger.info(
    `Initialized store for '${store.packageName()}' v${store.packageVersion()}`
  );
  logger.debug(`  Store file: ${config.databasePath}`);
  logger.debug(`  Environments: ${store.registeredEnvironments().length}`);
  return ok(store);
};
