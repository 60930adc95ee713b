/**
 * Constructors and structural queries for surface types
 */

import type { ItemPath } from "../paths/item-path.js";
import { error, ok, type Result } from "../types/result.js";
import { conversionError, type StoreError } from "../types/store-error.js";
import type {
  FunctionSignatureType,
  IndirectionType,
  NamedType,
  SurfaceType,
  UnitType,
} from "./types.js";

export const unitType: UnitType = { kind: "unit" };

export const namedType = (
  path: ItemPath,
  typeArguments?: readonly SurfaceType[]
): NamedType =>
  typeArguments ? { kind: "named", path, typeArguments } : { kind: "named", path };

export const functionSignatureType = (
  returnType: SurfaceType,
  parameters: readonly SurfaceType[]
): FunctionSignatureType => ({
  kind: "functionSignature",
  returnType,
  parameters,
});

export const pointerType = (
  pointee: SurfaceType,
  isConst: boolean
): IndirectionType => ({
  kind: "indirection",
  indirection: { kind: "pointer" },
  isConst,
  pointee,
});

export const borrowType = (
  pointee: SurfaceType,
  isConst: boolean,
  lifetime?: string
): IndirectionType => ({
  kind: "indirection",
  indirection:
    lifetime === undefined ? { kind: "borrow" } : { kind: "borrow", lifetime },
  isConst,
  pointee,
});

export const isRawPointer = (type: SurfaceType): boolean =>
  type.kind === "indirection" && type.indirection.kind === "pointer";

export const isBorrow = (type: SurfaceType): boolean =>
  type.kind === "indirection" && type.indirection.kind === "borrow";

export const lifetimeOf = (type: SurfaceType): string | undefined =>
  type.kind === "indirection" && type.indirection.kind === "borrow"
    ? type.indirection.lifetime
    : undefined;

/**
 * Copy of a borrow with `lifetime` attached. Other types are returned as is.
 */
export const withLifetime = (
  type: SurfaceType,
  lifetime: string
): SurfaceType =>
  type.kind === "indirection" && type.indirection.kind === "borrow"
    ? { ...type, indirection: { kind: "borrow", lifetime } }
    : type;

export const pointeeOf = (
  type: SurfaceType
): Result<SurfaceType, StoreError> =>
  type.kind === "indirection"
    ? ok(type.pointee)
    : error(conversionError(`not an indirection: ${type.kind}`));

export const isConstIndirection = (
  type: SurfaceType
): Result<boolean, StoreError> =>
  type.kind === "indirection"
    ? ok(type.isConst)
    : error(conversionError(`not an indirection: ${type.kind}`));

export const setConst = (
  type: SurfaceType,
  isConst: boolean
): Result<SurfaceType, StoreError> =>
  type.kind === "indirection"
    ? ok({ ...type, isConst })
    : error(conversionError(`not an indirection: ${type.kind}`));

export const asNamed = (type: SurfaceType): Result<NamedType, StoreError> =>
  type.kind === "named"
    ? ok(type)
    : error(conversionError(`expected a named type, got ${type.kind}`));

/**
 * Stable structural key. Two types are the same iff their keys are equal.
 */
export const stableTypeKey = (type: SurfaceType): string => {
  switch (type.kind) {
    case "unit":
      return "unit";

    case "named": {
      const name = JSON.stringify(type.path.parts);
      if (!type.typeArguments) return `named:${name}`;
      return `named:${name}<${type.typeArguments.map(stableTypeKey).join(",")}>`;
    }

    case "functionSignature":
      return `fn(${type.parameters.map(stableTypeKey).join(",")}):${stableTypeKey(type.returnType)}`;

    case "indirection": {
      const kind =
        type.indirection.kind === "pointer"
          ? "ptr"
          : `ref'${type.indirection.lifetime ?? ""}`;
      return `${kind}:${type.isConst ? "const" : "mut"}:${stableTypeKey(type.pointee)}`;
    }
  }
};

export const typesEqual = (a: SurfaceType, b: SurfaceType): boolean =>
  stableTypeKey(a) === stableTypeKey(b);
