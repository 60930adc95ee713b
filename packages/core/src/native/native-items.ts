/**
 * Declarations discovered in the wrapped native library
 */

import { formatPath, type ItemPath } from "../paths/item-path.js";
import { stableKey } from "../types/stable-key.js";
import { formatNativeType, type NativeType } from "./native-types.js";

export type NativeVisibility = "public" | "protected" | "private";

export type NativeItem =
  | NativeNamespace
  | NativeTypeDeclaration
  | NativeEnumValue
  | NativeFunction
  | NativeClassField
  | NativeClassBase
  | NativeSignalArguments;

export type NativeNamespace = {
  readonly kind: "namespace";
  readonly path: ItemPath;
};

export type NativeTypeDeclaration = {
  readonly kind: "typeDeclaration";
  readonly path: ItemPath;
  readonly declarationKind: "class" | "enum";
  readonly isMovable?: boolean;
};

export type NativeEnumValue = {
  readonly kind: "enumValue";
  readonly path: ItemPath;
  readonly value: number;
};

export type NativeFunctionArgument = {
  readonly name: string;
  readonly argumentType: NativeType;
  readonly hasDefaultValue: boolean;
};

export type NativeMethodInfo = {
  readonly methodKind: "regular" | "constructor" | "destructor";
  readonly isConst: boolean;
  readonly isStatic: boolean;
  readonly isVirtual: boolean;
  readonly isPureVirtual: boolean;
  readonly visibility: NativeVisibility;
};

export type NativeFunction = {
  readonly kind: "function";
  readonly path: ItemPath;
  readonly memberOf?: NativeMethodInfo;
  readonly operator?: string;
  readonly returnType: NativeType;
  readonly arguments: readonly NativeFunctionArgument[];
  readonly allowsVariadic: boolean;
};

export type NativeClassField = {
  readonly kind: "classField";
  readonly path: ItemPath;
  readonly fieldType: NativeType;
  readonly visibility: NativeVisibility;
  readonly isStatic: boolean;
};

export type NativeClassBase = {
  readonly kind: "classBase";
  readonly derivedClass: ItemPath;
  readonly baseClass: ItemPath;
  readonly baseIndex: number;
  readonly isVirtual: boolean;
  readonly visibility: NativeVisibility;
};

/**
 * Argument list of a signal; one item per distinct list across the library.
 */
export type NativeSignalArguments = {
  readonly kind: "signalArguments";
  readonly argumentTypes: readonly NativeType[];
};

/**
 * Path that names the declaration, if it has one.
 */
export const nativeItemPath = (item: NativeItem): ItemPath | undefined => {
  switch (item.kind) {
    case "namespace":
    case "typeDeclaration":
    case "enumValue":
    case "function":
    case "classField":
      return item.path;
    case "classBase":
      return item.derivedClass;
    case "signalArguments":
      return undefined;
  }
};

/**
 * Same declaration, regardless of the identifier or back-link of the
 * stored item.
 */
export const isSameNativeItem = (a: NativeItem, b: NativeItem): boolean =>
  stableKey(a) === stableKey(b);

export const formatNativeItem = (item: NativeItem): string => {
  switch (item.kind) {
    case "namespace":
      return `namespace ${formatPath(item.path)}`;
    case "typeDeclaration":
      return `${item.declarationKind} ${formatPath(item.path)}`;
    case "enumValue":
      return `enum value ${formatPath(item.path)} = ${item.value}`;
    case "function": {
      const args = item.arguments.map(
        (arg) => `${formatNativeType(arg.argumentType)} ${arg.name}`
      );
      if (item.allowsVariadic) args.push("...");
      const prefix = item.memberOf?.isStatic ? "static " : "";
      const suffix = item.memberOf?.isConst ? " const" : "";
      return `${prefix}${formatNativeType(item.returnType)} ${formatPath(item.path)}(${args.join(", ")})${suffix}`;
    }
    case "classField":
      return `field ${formatNativeType(item.fieldType)} ${formatPath(item.path)}`;
    case "classBase":
      return `${formatPath(item.derivedClass)} : ${item.visibility} ${formatPath(item.baseClass)}`;
    case "signalArguments":
      return `signal arguments (${item.argumentTypes.map(formatNativeType).join(", ")})`;
  }
};
