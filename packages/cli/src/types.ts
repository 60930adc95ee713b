/**
 * Type definitions for CLI
 */

import type { Environment } from "@bindery/core";

/**
 * Bindery configuration file (bindery.json)
 */
export type BinderyConfig = {
  readonly $schema?: string;
  readonly packageName: string;
  readonly packageVersion?: string;
  /** Store file, relative to the config file */
  readonly database?: string;
  readonly environments?: readonly Environment[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  force?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly packageName: string;
  readonly packageVersion: string | undefined;
  readonly projectRoot: string; // Directory containing bindery.json
  readonly databasePath: string; // Absolute store file path
  readonly environments: readonly Environment[];
  readonly force: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
