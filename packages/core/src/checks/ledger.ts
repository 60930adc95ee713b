/**
 * Per-wrapper record of which environments it compiles and runs on
 */

import { environmentsEqual, type Environment } from "./environment.js";

export type CheckEntry = {
  readonly environment: Environment;
  /** Compile or run failure; absent when the wrapper passed */
  readonly error?: string;
};

export type RecordOutcome =
  | { readonly kind: "added" }
  | { readonly kind: "changed"; readonly previousError?: string }
  | { readonly kind: "unchanged" };

/**
 * Ordered (environment, error) pairs with at most one entry per
 * environment. Failures are data here, never thrown.
 */
export class CompatibilityLedger {
  private items: CheckEntry[];

  constructor(entries: readonly CheckEntry[] = []) {
    this.items = [];
    for (const entry of entries) {
      this.record(entry.environment, entry.error);
    }
  }

  static fromEntries(entries: readonly CheckEntry[]): CompatibilityLedger {
    return new CompatibilityLedger(entries);
  }

  record(environment: Environment, error: string | undefined): RecordOutcome {
    const index = this.items.findIndex((entry) =>
      environmentsEqual(entry.environment, environment)
    );
    const entry: CheckEntry =
      error === undefined ? { environment } : { environment, error };

    if (index === -1) {
      this.items.push(entry);
      return { kind: "added" };
    }

    const previous = this.items[index];
    if (previous?.error === error) {
      return { kind: "unchanged" };
    }

    this.items[index] = entry;
    return previous?.error === undefined
      ? { kind: "changed" }
      : { kind: "changed", previousError: previous.error };
  }

  anyPassed(): boolean {
    return this.items.some((entry) => entry.error === undefined);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  resultFor(environment: Environment): CheckEntry | undefined {
    return this.items.find((entry) =>
      environmentsEqual(entry.environment, environment)
    );
  }

  passedEnvironments(): readonly Environment[] {
    return this.items
      .filter((entry) => entry.error === undefined)
      .map((entry) => entry.environment);
  }

  entries(): readonly CheckEntry[] {
    return this.items;
  }

  clear(): void {
    this.items = [];
  }

  toEntries(): readonly CheckEntry[] {
    return this.items.map((entry) => ({ ...entry }));
  }
}
