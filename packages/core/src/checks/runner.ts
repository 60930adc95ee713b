/**
 * Compatibility check driver
 *
 * Environments of one FFI item are evaluated concurrently; their results
 * are then recorded one at a time, so each item's ledger has a single
 * writer. Items are processed in identifier order.
 */

import { formatPath } from "../paths/item-path.js";
import { ffiItemPath } from "../ffi/ffi-items.js";
import type { FfiItemId } from "../store/ids.js";
import type { FfiItemView, ItemStore } from "../store/item-store.js";
import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  type DiagnosticsCollector,
} from "../types/diagnostic.js";
import { silentLogger, type Logger } from "../types/logger.js";
import { storeErrorToDiagnostic } from "../types/store-error.js";
import { formatEnvironment, type Environment } from "./environment.js";

/**
 * Compile and run the wrapper on `environment`. Resolves to the failure
 * message, or `undefined` if the wrapper works there.
 */
export type EvaluateCheck = (
  item: FfiItemView,
  environment: Environment
) => Promise<string | undefined>;

export type CheckRunOptions = {
  /** Skip items that already have results */
  readonly onlyUnchecked?: boolean;
  readonly logger?: Logger;
};

export type CheckChange = {
  readonly ffiItem: FfiItemId;
  readonly environment: Environment;
  readonly previousError?: string;
  readonly error?: string;
};

export type CheckReport = {
  readonly checkedItems: number;
  readonly added: number;
  readonly unchanged: number;
  readonly failures: number;
  readonly changed: readonly CheckChange[];
  readonly diagnostics: DiagnosticsCollector;
};

const describeError = (checkError: string | undefined): string =>
  checkError === undefined ? "passed" : `failed (${checkError})`;

const evaluateToMessage = (
  evaluate: EvaluateCheck,
  item: FfiItemView,
  environment: Environment
): Promise<string | undefined> =>
  Promise.resolve()
    .then(() => evaluate(item, environment))
    .then(
      (result) => result,
      (reason: unknown) =>
        reason instanceof Error ? reason.message : String(reason)
    );

export const runCompatibilityChecks = async (
  store: ItemStore,
  evaluate: EvaluateCheck,
  options: CheckRunOptions = {}
): Promise<CheckReport> => {
  const logger = options.logger ?? silentLogger;
  const environments = [...store.registeredEnvironments()];
  const items = store
    .ffiItems()
    .filter((entry) => !options.onlyUnchecked || entry.checks.isEmpty());

  let diagnostics = createDiagnosticsCollector();
  const changed: CheckChange[] = [];
  let added = 0;
  let unchanged = 0;
  let failures = 0;

  for (const item of items) {
    const path = formatPath(ffiItemPath(item.item));
    const results = await Promise.all(
      environments.map((environment) =>
        evaluateToMessage(evaluate, item, environment)
      )
    );

    environments.forEach((environment, index) => {
      const checkError = results[index];
      if (checkError !== undefined) {
        failures++;
        logger.debug(
          `${path} failed on ${formatEnvironment(environment)}: ${checkError}`
        );
        diagnostics = addDiagnostic(
          diagnostics,
          createDiagnostic(
            "BND3001",
            "info",
            `${path} failed on ${formatEnvironment(environment)}: ${checkError}`
          )
        );
      }

      const recorded = store.recordCheck(item.id, environment, checkError);
      if (!recorded.ok) {
        logger.error(recorded.error.message);
        diagnostics = addDiagnostic(
          diagnostics,
          storeErrorToDiagnostic(recorded.error)
        );
        return;
      }

      const outcome = recorded.value;
      switch (outcome.kind) {
        case "added":
          added++;
          break;
        case "unchanged":
          unchanged++;
          break;
        case "changed": {
          const message = `check result changed for ${path} on ${formatEnvironment(environment)}: ${describeError(outcome.previousError)} -> ${describeError(checkError)}`;
          logger.warn(message);
          diagnostics = addDiagnostic(
            diagnostics,
            createDiagnostic("BND3002", "warning", message)
          );
          changed.push({
            ffiItem: item.id,
            environment,
            previousError: outcome.previousError,
            error: checkError,
          });
          break;
        }
      }
    });
  }

  return {
    checkedItems: items.length,
    added,
    unchanged,
    failures,
    changed,
    diagnostics,
  };
};
