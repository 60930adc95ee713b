/**
 * bindery clear command
 */

import { error, ok, type ItemStore, type Logger, type Result } from "@bindery/core";

export const CLEAR_TARGETS = [
  "native",
  "ffi",
  "surface",
  "checks",
  "environments",
] as const;

export type ClearTarget = (typeof CLEAR_TARGETS)[number];

const isClearTarget = (value: string): value is ClearTarget =>
  CLEAR_TARGETS.some((target) => target === value);

const applyClear = (store: ItemStore, target: ClearTarget): void => {
  switch (target) {
    case "native":
      store.clearNative();
      return;
    case "ffi":
      store.clearFfi();
      return;
    case "surface":
      store.clearSurface();
      return;
    case "checks":
      store.clearAllCheckerResults();
      return;
    case "environments":
      store.clearEnvironments();
      return;
  }
};

export const clearCommand = (
  store: ItemStore,
  target: string | undefined,
  logger: Logger
): Result<ClearTarget, string> => {
  if (target === undefined) {
    return error(`clear needs a target: ${CLEAR_TARGETS.join(", ")}`);
  }
  if (!isClearTarget(target)) {
    return error(
      `Unknown clear target '${target}' (expected one of: ${CLEAR_TARGETS.join(", ")})`
    );
  }

  applyClear(store, target);
  logger.info(`Cleared ${target}`);
  return ok(target);
};
