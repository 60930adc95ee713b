/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly target?: string; // Positional argument after the command
  readonly options: CliOptions;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let target: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      // Handle "env sync" as two-word command
      if (command === "env" && args[i + 1] === "sync") {
        command = "env:sync";
        i++;
      }
      continue;
    }

    // First positional arg after command (clear target)
    if (command && target === undefined && !arg.startsWith("-")) {
      target = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--force":
        options.force = true;
        break;
    }
  }

  return { command, target, options };
};
