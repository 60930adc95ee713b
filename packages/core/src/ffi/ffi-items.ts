/**
 * FFI wrappers derived from native declarations
 */

import { formatPath, type ItemPath } from "../paths/item-path.js";
import { formatNativeType, type NativeType } from "../native/native-types.js";
import { stableKey } from "../types/stable-key.js";

/**
 * How a native argument or return value is passed through the wrapper.
 */
export type FfiTypeConversion =
  | "none"
  | "valueToPointer"
  | "referenceToPointer"
  | "flagsToInteger"
  | "implicitReturnValue";

export type FfiType = {
  readonly originalType: NativeType;
  readonly ffiType: NativeType;
  readonly conversion: FfiTypeConversion;
};

export type FfiArgumentMeaning = "this" | "argument" | "returnValue";

export type FfiArgument = {
  readonly name: string;
  readonly argumentType: FfiType;
  readonly meaning: FfiArgumentMeaning;
  /** Position in the native argument list, for `meaning: "argument"` */
  readonly index?: number;
};

export type FieldAccessorKind = "getter" | "setter" | "referenceGetter";

export type FfiWrapperKind =
  | {
      readonly kind: "function";
      readonly nativePath: ItemPath;
      readonly nativeArgumentTypes: readonly NativeType[];
    }
  | {
      readonly kind: "fieldAccessor";
      readonly fieldPath: ItemPath;
      readonly accessorKind: FieldAccessorKind;
    };

export type FfiWrapperFunction = {
  readonly kind: "wrapperFunction";
  readonly path: ItemPath;
  readonly wrapperKind: FfiWrapperKind;
  readonly arguments: readonly FfiArgument[];
  readonly returnType: FfiType;
  readonly allowsVariadic: boolean;
};

/**
 * Helper class connecting a native signal to a callback; unlike a plain
 * wrapper it needs emitted helper source, not just a signature.
 */
export type FfiSourceSlotWrapper = {
  readonly kind: "sourceSlotWrapper";
  readonly classPath: ItemPath;
  readonly signalArguments: readonly NativeType[];
  readonly functionType: NativeType;
};

export type FfiItem = FfiWrapperFunction | FfiSourceSlotWrapper;

export const ffiItemPath = (item: FfiItem): ItemPath => {
  switch (item.kind) {
    case "wrapperFunction":
      return item.path;
    case "sourceSlotWrapper":
      return item.classPath;
  }
};

export const isSourceItem = (item: FfiItem): boolean => {
  switch (item.kind) {
    case "wrapperFunction":
      return false;
    case "sourceSlotWrapper":
      return true;
  }
};

export const isSameFfiItem = (a: FfiItem, b: FfiItem): boolean =>
  stableKey(a) === stableKey(b);

export const formatFfiItem = (item: FfiItem): string => {
  switch (item.kind) {
    case "wrapperFunction": {
      const args = item.arguments.map(
        (arg) => `${formatNativeType(arg.argumentType.ffiType)} ${arg.name}`
      );
      if (item.allowsVariadic) args.push("...");
      return `${formatNativeType(item.returnType.ffiType)} ${formatPath(item.path)}(${args.join(", ")})`;
    }
    case "sourceSlotWrapper":
      return `slot wrapper ${formatPath(item.classPath)}(${item.signalArguments.map(formatNativeType).join(", ")})`;
  }
};
