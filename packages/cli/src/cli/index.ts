/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs, type ParsedArgs } from "./parser.js";
export { exitCodeFor, runCli } from "./dispatcher.js";
