/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  createDiagnostic,
  error,
  isValidEnvironment,
  ok,
  type Diagnostic,
  type Result,
} from "@bindery/core";
import type { BinderyConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "bindery.json";
export const DEFAULT_DATABASE = "bindery.store.json";

const invalidConfig = (message: string): Diagnostic =>
  createDiagnostic("BND9003", "error", `bindery.json: ${message}`);

const validateEnvironments = (config: BinderyConfig): string | undefined => {
  if (config.environments === undefined) return undefined;
  if (!Array.isArray(config.environments)) {
    return "'environments' must be an array";
  }
  const index = config.environments.findIndex(
    (env) => !isValidEnvironment(env)
  );
  return index === -1
    ? undefined
    : `environments[${index}] needs a target with arch, os, family, env, pointerWidth and endian, and a string libraryVersion if any`;
};

/**
 * Load bindery.json
 */
export const loadConfig = (
  configPath: string
): Result<BinderyConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "BND9001",
        "error",
        `Config file not found: ${configPath}`,
        "Create a bindery.json with at least a 'packageName'"
      )
    );
  }

  let config: BinderyConfig;
  try {
    const content = readFileSync(configPath, "utf-8");
    config = JSON.parse(content) as BinderyConfig;
  } catch (err) {
    return error(
      createDiagnostic(
        "BND9002",
        "error",
        `Failed to parse bindery.json: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }

  if (typeof config !== "object" || config === null || !config.packageName) {
    return error(invalidConfig("'packageName' is required"));
  }

  const problem = validateEnvironments(config);
  return problem ? error(invalidConfig(problem)) : ok(config);
};

/**
 * Find bindery.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 */
export const resolveConfig = (
  config: BinderyConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd()
): ResolvedConfig => ({
  packageName: config.packageName,
  packageVersion: config.packageVersion,
  projectRoot,
  databasePath: resolve(projectRoot, config.database ?? DEFAULT_DATABASE),
  environments: config.environments ?? [],
  force: cliOptions.force ?? false,
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
