/**
 * Diagnostic types for bindery stage drivers
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Item store (BND1001-BND1099)
  | "BND1001" // Item not found
  | "BND1002" // Unreachable ancestor path
  | "BND1003" // Package name mismatch
  // Type conversions (BND2001-BND2099)
  | "BND2001" // Conversion applied to a type of the wrong shape
  | "BND2002" // Conversion already applied
  // Compatibility checks (BND3001-BND3099)
  | "BND3001" // Wrapper failed on an environment
  | "BND3002" // Check result changed since the previous run
  // Config and store file loading (BND9001-BND9007)
  | "BND9001" // Config file not found
  | "BND9002" // Failed to read config file
  | "BND9003" // Invalid config file
  | "BND9004" // Store file not found
  | "BND9005" // Failed to read store file
  | "BND9006" // Invalid store file
  | "BND9007"; // Failed to write store file

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  hint,
});

const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [`${diagnostic.severity} ${diagnostic.code}:`];
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});
