/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Bindery - binding generator item store v${VERSION}

USAGE:
  bindery <command> [options]

COMMANDS:
  init                      Create an empty store for the configured package
  status                    Show store contents and compatibility results
  clear <target>            Clear native, ffi, surface, checks or environments
  env sync                  Register the environments listed in bindery.json

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: bindery.json)

INIT OPTIONS:
  --force                   Overwrite an existing store file

EXAMPLES:
  bindery init
  bindery status
  bindery clear checks
  bindery env sync --verbose
`);
};
