/**
 * Persisted shape of the item store
 */

import type { CheckEntry } from "../checks/ledger.js";
import {
  isValidEnvironment,
  type Environment,
} from "../checks/environment.js";
import type { FfiItem } from "../ffi/ffi-items.js";
import type { NativeItem } from "../native/native-items.js";
import { error, ok, type Result } from "../types/result.js";
import type {
  FfiItemId,
  NativeItemId,
  NextIds,
  SurfaceItemId,
} from "./ids.js";
import type { SurfaceItem } from "./surface-items.js";

export type NativeItemData = {
  readonly id: NativeItemId;
  readonly item: NativeItem;
  /** FFI item this declaration was synthesized from, if any */
  readonly sourceFfiItem?: FfiItemId;
};

export type FfiItemData = {
  readonly id: FfiItemId;
  readonly item: FfiItem;
  readonly checks: readonly CheckEntry[];
  readonly isProcessed: boolean;
};

export type SurfaceItemData = {
  readonly id: SurfaceItemId;
  readonly item: SurfaceItem;
};

export type StoreData = {
  readonly packageName: string;
  readonly packageVersion: string;
  readonly nativeItems: readonly NativeItemData[];
  readonly ffiItems: readonly FfiItemData[];
  readonly surfaceItems: readonly SurfaceItemData[];
  readonly environments: readonly Environment[];
  readonly nextIds: NextIds;
};

const checkCollection = (
  name: string,
  items: readonly { readonly id: number }[] | undefined,
  nextId: number | undefined
): string | undefined => {
  if (!Array.isArray(items)) {
    return `'${name}' must be an array`;
  }
  if (typeof nextId !== "number" || !Number.isInteger(nextId) || nextId < 1) {
    return `'nextIds' must give a positive integer for '${name}'`;
  }
  let previous = 0;
  for (const entry of items) {
    if (typeof entry?.id !== "number" || entry.id <= previous) {
      return `'${name}' must be sorted by strictly increasing id`;
    }
    if (entry.id >= nextId) {
      return `'${name}' contains id ${entry.id} not below next id ${nextId}`;
    }
    previous = entry.id;
  }
  return undefined;
};

const checkEnvironments = (
  name: string,
  environments: readonly (Environment | undefined)[]
): string | undefined => {
  const index = environments.findIndex((env) => !isValidEnvironment(env));
  return index === -1
    ? undefined
    : `'${name}' has an invalid environment at index ${index}`;
};

const checkFfiChecks = (items: readonly FfiItemData[]): string | undefined => {
  for (const entry of items) {
    if (!Array.isArray(entry.checks)) {
      return `'ffiItems' entry ${entry.id} must have a 'checks' array`;
    }
    const problem = checkEnvironments(
      `ffiItems[${entry.id}].checks`,
      entry.checks.map((check) => check?.environment)
    );
    if (problem) return problem;
  }
  return undefined;
};

/**
 * Check the top-level shape of data read back by the persistence layer,
 * including identifier order within each collection.
 */
export const validateStoreData = (data: StoreData): Result<StoreData, string> => {
  if (typeof data !== "object" || data === null) {
    return error("store data must be an object");
  }
  if (typeof data.packageName !== "string" || data.packageName.length === 0) {
    return error("'packageName' must be a non-empty string");
  }
  if (typeof data.packageVersion !== "string") {
    return error("'packageVersion' must be a string");
  }
  if (!Array.isArray(data.environments)) {
    return error("'environments' must be an array");
  }
  const environmentProblem = checkEnvironments(
    "environments",
    data.environments
  );
  if (environmentProblem) {
    return error(environmentProblem);
  }
  if (typeof data.nextIds !== "object" || data.nextIds === null) {
    return error("'nextIds' must be an object");
  }

  const problem =
    checkCollection("nativeItems", data.nativeItems, data.nextIds.native) ??
    checkCollection("ffiItems", data.ffiItems, data.nextIds.ffi) ??
    checkCollection("surfaceItems", data.surfaceItems, data.nextIds.surface) ??
    checkFfiChecks(data.ffiItems);

  return problem ? error(problem) : ok(data);
};
