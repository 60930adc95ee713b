/**
 * Types of the wrapped native library as discovered by the header parser
 */

import { formatPath, type ItemPath } from "../paths/item-path.js";

export type NativeType =
  | { readonly kind: "void" }
  | {
      readonly kind: "builtin";
      /** Spelling in the native language, e.g. "int", "unsigned long" */
      readonly name: string;
      readonly isConst?: boolean;
    }
  | {
      readonly kind: "enum";
      readonly path: ItemPath;
      readonly isConst?: boolean;
    }
  | {
      readonly kind: "class";
      readonly path: ItemPath;
      readonly templateArguments?: readonly NativeType[];
      readonly isConst?: boolean;
    }
  | {
      readonly kind: "templateParameter";
      readonly nestedLevel: number;
      readonly index: number;
      readonly name: string;
    }
  | {
      readonly kind: "functionPointer";
      readonly returnType: NativeType;
      readonly arguments: readonly NativeType[];
      readonly allowsVariadic: boolean;
    }
  | {
      readonly kind: "pointerLike";
      readonly indirection: NativePointerKind;
      readonly isConst: boolean;
      readonly target: NativeType;
    };

export type NativePointerKind = "pointer" | "reference" | "rvalueReference";

const constPrefix = (isConst: boolean | undefined): string =>
  isConst ? "const " : "";

/**
 * Human-readable spelling, for logs and reports.
 */
export const formatNativeType = (type: NativeType): string => {
  switch (type.kind) {
    case "void":
      return "void";
    case "builtin":
      return `${constPrefix(type.isConst)}${type.name}`;
    case "enum":
      return `${constPrefix(type.isConst)}${formatPath(type.path)}`;
    case "class": {
      const args = type.templateArguments
        ? `<${type.templateArguments.map(formatNativeType).join(", ")}>`
        : "";
      return `${constPrefix(type.isConst)}${formatPath(type.path)}${args}`;
    }
    case "templateParameter":
      return type.name;
    case "functionPointer": {
      const args = type.arguments.map(formatNativeType);
      if (type.allowsVariadic) args.push("...");
      return `${formatNativeType(type.returnType)} (*)(${args.join(", ")})`;
    }
    case "pointerLike": {
      const marker =
        type.indirection === "pointer"
          ? "*"
          : type.indirection === "reference"
            ? "&"
            : "&&";
      return `${formatNativeType(type.target)}${type.isConst ? " const" : ""}${marker}`;
    }
  }
};
