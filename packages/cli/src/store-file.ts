/**
 * Reading and writing the persisted item store
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  ItemStore,
  createDiagnostic,
  error,
  map,
  mapError,
  ok,
  validateStoreData,
  type Diagnostic,
  type Logger,
  type Result,
  type StoreData,
} from "@bindery/core";

const describeFailure = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export const loadStoreFile = (
  filePath: string,
  logger?: Logger
): Result<ItemStore, Diagnostic> => {
  if (!existsSync(filePath)) {
    return error(
      createDiagnostic(
        "BND9004",
        "error",
        `Store file not found: ${filePath}`,
        "Run 'bindery init' to create one"
      )
    );
  }

  let data: StoreData;
  try {
    data = JSON.parse(readFileSync(filePath, "utf-8")) as StoreData;
  } catch (err) {
    return error(
      createDiagnostic(
        "BND9005",
        "error",
        `Failed to read store file ${filePath}: ${describeFailure(err)}`
      )
    );
  }

  const validated = mapError(validateStoreData(data), (message) =>
    createDiagnostic(
      "BND9006",
      "error",
      `Invalid store file ${filePath}: ${message}`
    )
  );
  return map(validated, (valid) => ItemStore.fromData(valid, { logger }));
};

/**
 * Write the store back if it changed since it was loaded.
 * Returns whether anything was written.
 */
export const saveStoreFile = (
  filePath: string,
  store: ItemStore
): Result<boolean, Diagnostic> => {
  if (!store.isModified()) {
    return ok(false);
  }

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, JSON.stringify(store.toData(), null, 2) + "\n");
  } catch (err) {
    return error(
      createDiagnostic(
        "BND9007",
        "error",
        `Failed to write store file ${filePath}: ${describeFailure(err)}`
      )
    );
  }

  store.markSaved();
  return ok(true);
};
