/**
 * Unsafety analysis: a type is unsafe when it is, or contains, a raw pointer
 */

import type { FinalType, SurfaceType } from "./types.js";

export const isUnsafe = (type: SurfaceType): boolean => {
  switch (type.kind) {
    case "unit":
      return false;

    case "named":
      return (type.typeArguments ?? []).some(isUnsafe);

    case "functionSignature":
      return isUnsafe(type.returnType) || type.parameters.some(isUnsafe);

    case "indirection":
      return type.indirection.kind === "pointer" || isUnsafe(type.pointee);
  }
};

/**
 * A wrapper that exposes this type to users must be marked unsafe.
 */
export const isFinalTypeUnsafe = (finalType: FinalType): boolean =>
  isUnsafe(finalType.surfaceType);
