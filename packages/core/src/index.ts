/**
 * Bindery Core - item store, path model, type conversion algebra and
 * compatibility checks for the binding generator
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/store-error.js";
export * from "./types/logger.js";
export { stableKey } from "./types/stable-key.js";

export * from "./paths/item-path.js";
export * from "./paths/naming.js";

export * from "./conversion/types.js";
export * from "./conversion/type-ops.js";
export * from "./conversion/caption.js";
export * from "./conversion/unsafety.js";
export * from "./conversion/final-type.js";

export * from "./native/native-types.js";
export * from "./native/native-items.js";
export * from "./ffi/ffi-items.js";

export * from "./checks/environment.js";
export * from "./checks/ledger.js";
export * from "./checks/runner.js";

export * from "./store/ids.js";
export * from "./store/surface-items.js";
export * from "./store/store-data.js";
export * from "./store/item-store.js";
export * from "./store/counters.js";
