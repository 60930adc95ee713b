/**
 * Item Store - versioned database of native, FFI and surface items
 *
 * Three parallel collections, each kept in identifier order. Inserting an
 * item that is structurally identical to a stored one is not an error: the
 * stored item is kept and the `ignored` counter goes up.
 */

import { CompatibilityLedger, type RecordOutcome } from "../checks/ledger.js";
import {
  environmentsEqual,
  formatEnvironment,
  type Environment,
} from "../checks/environment.js";
import { formatFfiItem, isSameFfiItem, type FfiItem } from "../ffi/ffi-items.js";
import {
  formatNativeItem,
  isSameNativeItem,
  type NativeItem,
} from "../native/native-items.js";
import {
  formatPath,
  isChildOf,
  lastSegment,
  packageNameOf,
  parentPath,
  pathsEqual,
  withLastSegment,
  type ItemPath,
} from "../paths/item-path.js";
import { silentLogger, type Logger } from "../types/logger.js";
import { error, ok, type Result } from "../types/result.js";
import {
  notFound,
  packageMismatch,
  pathError,
  type StoreError,
} from "../types/store-error.js";
import {
  findIndexById,
  INITIAL_NEXT_IDS,
  type FfiItemId,
  type NativeItemId,
  type SurfaceItemId,
} from "./ids.js";
import type { StoreData } from "./store-data.js";
import {
  formatSurfaceItem,
  isPackageRoot,
  isSameSurfaceItem,
  type SurfaceItem,
} from "./surface-items.js";

export const INITIAL_PACKAGE_VERSION = "0.0.0";

export type StoredNativeItem = {
  readonly id: NativeItemId;
  readonly item: NativeItem;
  readonly sourceFfiItem?: FfiItemId;
};

/**
 * Read-only view of the ledger handed out with FFI items.
 */
export type CompatibilityView = Pick<
  CompatibilityLedger,
  "anyPassed" | "isEmpty" | "resultFor" | "passedEnvironments" | "entries"
>;

export type FfiItemView = {
  readonly id: FfiItemId;
  readonly item: FfiItem;
  readonly checks: CompatibilityView;
  readonly isProcessed: boolean;
};

export type StoredFfiItem = {
  readonly id: FfiItemId;
  readonly item: FfiItem;
  readonly checks: CompatibilityLedger;
  isProcessed: boolean;
};

export type StoredSurfaceItem = {
  readonly id: SurfaceItemId;
  readonly item: SurfaceItem;
};

export type Counters = {
  readonly added: number;
  readonly ignored: number;
};

export type ItemStoreOptions = {
  readonly logger?: Logger;
};

export class ItemStore {
  private readonly name: string;
  private version: string;
  private natives: StoredNativeItem[];
  private ffis: StoredFfiItem[];
  private surfaces: StoredSurfaceItem[];
  private environments: Environment[];
  private nextNativeId: number;
  private nextFfiId: number;
  private nextSurfaceId: number;
  private modified: boolean;
  private added = 0;
  private ignored = 0;
  private readonly logger: Logger;

  private constructor(
    data: StoreData,
    modified: boolean,
    options: ItemStoreOptions
  ) {
    this.name = data.packageName;
    this.version = data.packageVersion;
    this.natives = data.nativeItems.map((entry) => ({ ...entry }));
    this.ffis = data.ffiItems.map((entry) => ({
      id: entry.id,
      item: entry.item,
      checks: CompatibilityLedger.fromEntries(entry.checks),
      isProcessed: entry.isProcessed,
    }));
    this.surfaces = data.surfaceItems.map((entry) => ({ ...entry }));
    this.environments = [...data.environments];
    this.nextNativeId = data.nextIds.native;
    this.nextFfiId = data.nextIds.ffi;
    this.nextSurfaceId = data.nextIds.surface;
    this.modified = modified;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * New store for `packageName`. It has never been saved, so it starts
   * out modified.
   */
  static empty(packageName: string, options: ItemStoreOptions = {}): ItemStore {
    return new ItemStore(
      {
        packageName,
        packageVersion: INITIAL_PACKAGE_VERSION,
        nativeItems: [],
        ffiItems: [],
        surfaceItems: [],
        environments: [],
        nextIds: INITIAL_NEXT_IDS,
      },
      true,
      options
    );
  }

  static fromData(data: StoreData, options: ItemStoreOptions = {}): ItemStore {
    return new ItemStore(data, false, options);
  }

  toData(): StoreData {
    return {
      packageName: this.name,
      packageVersion: this.version,
      nativeItems: this.natives.map((entry) => ({ ...entry })),
      ffiItems: this.ffis.map((entry) => ({
        id: entry.id,
        item: entry.item,
        checks: entry.checks.toEntries(),
        isProcessed: entry.isProcessed,
      })),
      surfaceItems: this.surfaces.map((entry) => ({ ...entry })),
      environments: [...this.environments],
      nextIds: {
        native: this.nextNativeId,
        ffi: this.nextFfiId,
        surface: this.nextSurfaceId,
      },
    };
  }

  packageName(): string {
    return this.name;
  }

  packageVersion(): string {
    return this.version;
  }

  setPackageVersion(version: string): void {
    if (this.version !== version) {
      this.version = version;
      this.modified = true;
    }
  }

  isModified(): boolean {
    return this.modified;
  }

  /** Called by the persistence layer after writing the store out */
  markSaved(): void {
    this.modified = false;
  }

  // ---------------------------------------------------------------------
  // Native items
  // ---------------------------------------------------------------------

  nativeItems(): readonly StoredNativeItem[] {
    return this.natives;
  }

  addNative(
    sourceFfiItem: FfiItemId | undefined,
    item: NativeItem
  ): NativeItemId | undefined {
    if (this.natives.some((other) => isSameNativeItem(other.item, item))) {
      this.ignored++;
      return undefined;
    }

    const id = this.nextNativeId++;
    this.natives.push(
      sourceFfiItem === undefined ? { id, item } : { id, item, sourceFfiItem }
    );
    this.added++;
    this.modified = true;
    this.logger.debug(`added native item #${id}: ${formatNativeItem(item)}`);
    return id;
  }

  getNative(id: NativeItemId): Result<StoredNativeItem, StoreError> {
    const index = findIndexById(this.natives, id);
    const entry = index === undefined ? undefined : this.natives[index];
    return entry ? ok(entry) : error(notFound(`invalid native item id: ${id}`));
  }

  /**
   * Native items synthesized while deriving the given FFI item.
   */
  nativeItemsDerivedFrom(ffiId: FfiItemId): readonly StoredNativeItem[] {
    return this.natives.filter((entry) => entry.sourceFfiItem === ffiId);
  }

  clearNative(): void {
    this.natives = [];
    this.modified = true;
  }

  // ---------------------------------------------------------------------
  // FFI items
  // ---------------------------------------------------------------------

  ffiItems(): readonly FfiItemView[] {
    return this.ffis;
  }

  addFfi(item: FfiItem): boolean {
    if (this.ffis.some((other) => isSameFfiItem(other.item, item))) {
      this.ignored++;
      return false;
    }

    const id = this.nextFfiId++;
    this.ffis.push({
      id,
      item,
      checks: new CompatibilityLedger(),
      isProcessed: false,
    });
    this.added++;
    this.modified = true;
    this.logger.debug(`added ffi item #${id}: ${formatFfiItem(item)}`);
    return true;
  }

  getFfi(id: FfiItemId): Result<FfiItemView, StoreError> {
    return this.findFfi(id);
  }

  /**
   * Mutable access to an FFI item. The store counts as modified afterwards.
   */
  ffiItemMut(id: FfiItemId): Result<StoredFfiItem, StoreError> {
    const result = this.findFfi(id);
    if (result.ok) this.modified = true;
    return result;
  }

  recordCheck(
    id: FfiItemId,
    environment: Environment,
    checkError: string | undefined
  ): Result<RecordOutcome, StoreError> {
    const found = this.findFfi(id);
    if (!found.ok) return found;

    const outcome = found.value.checks.record(environment, checkError);
    if (outcome.kind !== "unchanged") {
      this.modified = true;
    }
    return ok(outcome);
  }

  markFfiProcessed(id: FfiItemId): Result<boolean, StoreError> {
    const found = this.findFfi(id);
    if (!found.ok) return found;
    if (found.value.isProcessed) return ok(false);

    found.value.isProcessed = true;
    this.modified = true;
    return ok(true);
  }

  /**
   * FFI items the generation stage should consume: checked to work on at
   * least one environment and not yet processed.
   */
  ffiItemsReadyForGeneration(): readonly FfiItemView[] {
    return this.ffis.filter(
      (entry) => !entry.isProcessed && entry.checks.anyPassed()
    );
  }

  /**
   * Drop every FFI item, and every native item synthesized from one.
   * Parser-sourced native items stay.
   */
  clearFfi(): void {
    this.ffis = [];
    this.natives = this.natives.filter(
      (entry) => entry.sourceFfiItem === undefined
    );
    this.modified = true;
  }

  clearAllCheckerResults(): void {
    for (const entry of this.ffis) {
      entry.checks.clear();
    }
    this.modified = true;
  }

  private findFfi(id: FfiItemId): Result<StoredFfiItem, StoreError> {
    const index = findIndexById(this.ffis, id);
    const entry = index === undefined ? undefined : this.ffis[index];
    return entry ? ok(entry) : error(notFound(`invalid ffi item id: ${id}`));
  }

  // ---------------------------------------------------------------------
  // Surface items
  // ---------------------------------------------------------------------

  surfaceItems(): readonly StoredSurfaceItem[] {
    return this.surfaces;
  }

  addSurface(item: SurfaceItem): Result<SurfaceItemId | undefined, StoreError> {
    const validation = this.validateSurfaceItem(item);
    if (validation) return error(validation);

    if (this.surfaces.some((other) => isSameSurfaceItem(other.item, item))) {
      this.ignored++;
      return ok(undefined);
    }

    const id = this.nextSurfaceId++;
    this.surfaces.push({ id, item });
    this.added++;
    this.modified = true;
    this.logger.debug(`added surface item #${id}: ${formatSurfaceItem(item)}`);
    return ok(id);
  }

  getSurface(id: SurfaceItemId): Result<StoredSurfaceItem, StoreError> {
    const index = findIndexById(this.surfaces, id);
    const entry = index === undefined ? undefined : this.surfaces[index];
    return entry ? ok(entry) : error(notFound(`invalid surface item id: ${id}`));
  }

  findByPath(path: ItemPath): StoredSurfaceItem | undefined {
    return this.surfaces.find((entry) => pathsEqual(entry.item.path, path));
  }

  /**
   * Direct children of `path`. The returned sequence is lazy and can be
   * iterated more than once.
   */
  childrenOf(path: ItemPath): Iterable<StoredSurfaceItem> {
    const surfaces = (): readonly StoredSurfaceItem[] => this.surfaces;
    return {
      *[Symbol.iterator]() {
        for (const entry of surfaces()) {
          if (isChildOf(entry.item.path, path)) yield entry;
        }
      },
    };
  }

  /**
   * `desired` if it is free, otherwise the first free `name_2`, `name_3`, ...
   */
  makeUniquePath(desired: ItemPath): ItemPath {
    const base = lastSegment(desired);
    let candidate = desired;
    let suffix = 1;
    while (this.findByPath(candidate)) {
      suffix++;
      candidate = withLastSegment(desired, `${base}_${suffix}`);
    }
    return candidate;
  }

  clearSurface(): void {
    this.surfaces = [];
    for (const entry of this.ffis) {
      entry.isProcessed = false;
    }
    this.modified = true;
  }

  private validateSurfaceItem(item: SurfaceItem): StoreError | undefined {
    const label = formatSurfaceItem(item);
    const ownPackage = item.path.parts[0];

    if (isPackageRoot(item)) {
      if (parentPath(item.path)) {
        return packageMismatch(
          `package root must not have a parent path: ${label}`
        );
      }
      if (ownPackage !== this.name) {
        return packageMismatch(
          `can't add item with different package name (expected '${this.name}'): ${label}`
        );
      }
      return undefined;
    }

    let ancestor = parentPath(item.path);
    if (!ancestor) {
      return pathError(`path has no parent: ${label}`);
    }
    if (packageNameOf(item.path) !== this.name) {
      return packageMismatch(
        `can't add item with different package name (expected '${this.name}'): ${label}`
      );
    }

    while (ancestor) {
      if (!this.findByPath(ancestor)) {
        return pathError(
          `unreachable ancestor ${formatPath(ancestor)} for ${label}`
        );
      }
      ancestor = parentPath(ancestor);
    }
    return undefined;
  }

  // ---------------------------------------------------------------------
  // Environments and counters
  // ---------------------------------------------------------------------

  registeredEnvironments(): readonly Environment[] {
    return this.environments;
  }

  registerEnvironment(environment: Environment): boolean {
    if (this.environments.some((e) => environmentsEqual(e, environment))) {
      return false;
    }
    this.environments.push(environment);
    this.modified = true;
    this.logger.debug(`registered environment ${formatEnvironment(environment)}`);
    return true;
  }

  clearEnvironments(): void {
    this.environments = [];
    this.modified = true;
  }

  /**
   * Counts accumulated since the previous drain; resets them.
   */
  drainCounters(): Counters {
    const counters = { added: this.added, ignored: this.ignored };
    this.added = 0;
    this.ignored = 0;
    return counters;
  }
}
