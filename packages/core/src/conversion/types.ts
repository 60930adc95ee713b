/**
 * Types as seen on either side of the FFI boundary
 */

import type { ItemPath } from "../paths/item-path.js";

export type SurfaceType =
  | UnitType
  | NamedType
  | FunctionSignatureType
  | IndirectionType;

/**
 * No value crosses the boundary (native `void` return).
 */
export type UnitType = {
  readonly kind: "unit";
};

/**
 * Enum, struct or numeric alias, optionally with type arguments.
 */
export type NamedType = {
  readonly kind: "named";
  readonly path: ItemPath;
  readonly typeArguments?: readonly SurfaceType[];
};

export type FunctionSignatureType = {
  readonly kind: "functionSignature";
  readonly returnType: SurfaceType;
  readonly parameters: readonly SurfaceType[];
};

export type IndirectionKind =
  | { readonly kind: "pointer" }
  | { readonly kind: "borrow"; readonly lifetime?: string };

export type IndirectionType = {
  readonly kind: "indirection";
  readonly indirection: IndirectionKind;
  readonly isConst: boolean;
  readonly pointee: SurfaceType;
};

/**
 * How the surface-facing type was derived from the FFI-facing type.
 */
export type ConversionDescriptor =
  | "identity"
  | "referenceFromPointer"
  | "optionalWrapperFromPointer"
  | "valueFromPointer"
  | "owningHandleFromPointer"
  | "smartPointerFromPointer"
  | "integerFromFlags";

/**
 * Descriptors the generation stage assigns directly rather than deriving
 * through `pointerToBorrow` / `pointerToValue`.
 */
export type DirectConversion = Extract<
  ConversionDescriptor,
  | "optionalWrapperFromPointer"
  | "owningHandleFromPointer"
  | "smartPointerFromPointer"
  | "integerFromFlags"
>;

/**
 * A fully processed type: the FFI type is fixed, the surface type and the
 * descriptor change together.
 */
export type FinalType = {
  readonly ffiType: SurfaceType;
  readonly surfaceType: SurfaceType;
  readonly conversion: ConversionDescriptor;
};
