/**
 * Reversible conversions between the FFI type and the surface type.
 *
 * Every operation keeps `ffiType` untouched and replaces `surfaceType` and
 * `conversion` together. A conversion can be applied only once: the
 * descriptor must still be `identity`.
 */

import { error, ok, type Result } from "../types/result.js";
import { conversionError, type StoreError } from "../types/store-error.js";
import { stableTypeKey } from "./type-ops.js";
import type {
  ConversionDescriptor,
  DirectConversion,
  FinalType,
  SurfaceType,
} from "./types.js";

export const identityFinalType = (ffiType: SurfaceType): FinalType => ({
  ffiType,
  surfaceType: ffiType,
  conversion: "identity",
});

const requireIdentity = (
  finalType: FinalType,
  operation: string
): StoreError | undefined =>
  finalType.conversion === "identity"
    ? undefined
    : conversionError(
        `${operation}: conversion already applied (${finalType.conversion})`,
        true
      );

/**
 * `*const T` / `*mut T` on the surface side becomes a borrow of `T`
 * with the requested constness and no lifetime.
 */
export const pointerToBorrow = (
  finalType: FinalType,
  makeConst: boolean
): Result<FinalType, StoreError> => {
  const applied = requireIdentity(finalType, "pointerToBorrow");
  if (applied) return error(applied);

  const surface = finalType.surfaceType;
  if (surface.kind !== "indirection" || surface.indirection.kind !== "pointer") {
    return error(
      conversionError(`pointerToBorrow: not a raw pointer: ${stableTypeKey(surface)}`)
    );
  }

  return ok({
    ffiType: finalType.ffiType,
    surfaceType: {
      kind: "indirection",
      indirection: { kind: "borrow" },
      isConst: makeConst,
      pointee: surface.pointee,
    },
    conversion: "referenceFromPointer",
  });
};

/**
 * `*const T` / `*mut T` on the surface side becomes `T` passed by value.
 */
export const pointerToValue = (
  finalType: FinalType
): Result<FinalType, StoreError> => {
  const applied = requireIdentity(finalType, "pointerToValue");
  if (applied) return error(applied);

  const surface = finalType.surfaceType;
  if (surface.kind !== "indirection" || surface.indirection.kind !== "pointer") {
    return error(
      conversionError(`pointerToValue: not a raw pointer: ${stableTypeKey(surface)}`)
    );
  }

  return ok({
    ffiType: finalType.ffiType,
    surfaceType: surface.pointee,
    conversion: "valueFromPointer",
  });
};

/**
 * Attach a descriptor the generation stage decides on its own (optional
 * pointees, owning handles, smart-pointer adapters, flag enums).
 */
export const assignConversion = (
  finalType: FinalType,
  descriptor: DirectConversion,
  surfaceType: SurfaceType
): Result<FinalType, StoreError> => {
  const applied = requireIdentity(finalType, "assignConversion");
  if (applied) return error(applied);

  return ok({
    ffiType: finalType.ffiType,
    surfaceType,
    conversion: descriptor,
  });
};

export const describeConversion = (descriptor: ConversionDescriptor): string => {
  switch (descriptor) {
    case "identity":
      return "types are the same";
    case "referenceFromPointer":
      return "reference from raw pointer";
    case "optionalWrapperFromPointer":
      return "optional pointer wrapper from raw pointer";
    case "valueFromPointer":
      return "value from raw pointer";
    case "owningHandleFromPointer":
      return "owning handle from raw pointer";
    case "smartPointerFromPointer":
      return "smart pointer adapter from raw pointer";
    case "integerFromFlags":
      return "integer from flags";
  }
};

export const finalTypesEqual = (a: FinalType, b: FinalType): boolean =>
  a.conversion === b.conversion &&
  stableTypeKey(a.ffiType) === stableTypeKey(b.ffiType) &&
  stableTypeKey(a.surfaceType) === stableTypeKey(b.surfaceType);
