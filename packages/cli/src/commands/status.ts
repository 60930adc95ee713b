/**
 * bindery status command
 */

import {
  formatEnvironment,
  type ItemStore,
  type Logger,
} from "@bindery/core";

export type StoreStatus = {
  readonly packageName: string;
  readonly packageVersion: string;
  readonly nativeItems: number;
  readonly ffiItems: number;
  readonly surfaceItems: number;
  readonly environments: readonly string[];
  readonly passing: number;
  readonly failing: number;
  readonly unchecked: number;
};

export const summarizeStore = (store: ItemStore): StoreStatus => {
  let passing = 0;
  let failing = 0;
  let unchecked = 0;
  for (const { checks } of store.ffiItems()) {
    if (checks.isEmpty()) unchecked++;
    else if (checks.anyPassed()) passing++;
    else failing++;
  }

  return {
    packageName: store.packageName(),
    packageVersion: store.packageVersion(),
    nativeItems: store.nativeItems().length,
    ffiItems: store.ffiItems().length,
    surfaceItems: store.surfaceItems().length,
    environments: store.registeredEnvironments().map(formatEnvironment),
    passing,
    failing,
    unchecked,
  };
};

export const formatStatus = (status: StoreStatus): string[] => {
  const lines = [
    `Package: ${status.packageName} v${status.packageVersion}`,
    `Native items: ${status.nativeItems}`,
    `FFI items: ${status.ffiItems} (passing: ${status.passing}, failing: ${status.failing}, unchecked: ${status.unchecked})`,
    `Surface items: ${status.surfaceItems}`,
  ];
  if (status.environments.length === 0) {
    lines.push("Environments: none");
  } else {
    lines.push("Environments:");
    for (const env of status.environments) {
      lines.push(`  ${env}`);
    }
  }
  return lines;
};

export const statusCommand = (store: ItemStore, logger: Logger): StoreStatus => {
  const status = summarizeStore(store);
  for (const line of formatStatus(status)) {
    logger.info(line);
  }
  return status;
};
