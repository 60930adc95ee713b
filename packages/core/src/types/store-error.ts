/**
 * Item-level failures reported by the store and the type algebra
 */

import { createDiagnostic, type Diagnostic, type DiagnosticCode } from "./diagnostic.js";

export type StoreErrorKind =
  | "notFound"
  | "pathError"
  | "packageMismatch"
  | "conversionError";

export type StoreError = {
  readonly kind: StoreErrorKind;
  readonly code: DiagnosticCode;
  readonly message: string;
};

export const notFound = (message: string): StoreError => ({
  kind: "notFound",
  code: "BND1001",
  message,
});

export const pathError = (message: string): StoreError => ({
  kind: "pathError",
  code: "BND1002",
  message,
});

export const packageMismatch = (message: string): StoreError => ({
  kind: "packageMismatch",
  code: "BND1003",
  message,
});

/**
 * `alreadyApplied` distinguishes a second conversion on the same type
 * (BND2002) from a conversion on a type of the wrong shape (BND2001).
 */
export const conversionError = (
  message: string,
  alreadyApplied = false
): StoreError => ({
  kind: "conversionError",
  code: alreadyApplied ? "BND2002" : "BND2001",
  message,
});

export const storeErrorToDiagnostic = (err: StoreError): Diagnostic =>
  createDiagnostic(err.code, "error", err.message);
