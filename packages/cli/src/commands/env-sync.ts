/**
 * bindery env sync command
 */

import {
  formatEnvironment,
  type Environment,
  type ItemStore,
  type Logger,
} from "@bindery/core";

/**
 * Register every configured environment. Returns how many were new.
 */
export const envSyncCommand = (
  store: ItemStore,
  environments: readonly Environment[],
  logger: Logger
): number => {
  let added = 0;
  for (const environment of environments) {
    if (store.registerEnvironment(environment)) {
      added++;
      logger.debug(`  + ${formatEnvironment(environment)}`);
    }
  }

  if (added === 0) {
    logger.info("Environments already up to date");
  } else {
    logger.info(`Registered ${added} environment${added === 1 ? "" : "s"}`);
  }
  return added;
};
