/**
 * Items generated in the target language's namespace
 */

import type { FinalType, SurfaceType } from "../conversion/types.js";
import { isFinalTypeUnsafe } from "../conversion/unsafety.js";
import { formatPath, type ItemPath } from "../paths/item-path.js";
import { stableKey } from "../types/stable-key.js";
import type { FfiItemId, NativeItemId } from "./ids.js";

export type SurfaceModuleKind = "regular" | "ffi" | "types" | "signals";

export type SurfaceArgument = {
  readonly name: string;
  readonly argumentType: FinalType;
};

export type SurfacePayload =
  | { readonly kind: "packageRoot" }
  | { readonly kind: "module"; readonly moduleKind: SurfaceModuleKind }
  | {
      readonly kind: "struct";
      readonly isPublic: boolean;
      /** Native class or enum the struct wraps, if any */
      readonly nativePath?: ItemPath;
    }
  | { readonly kind: "enumValue"; readonly value: number }
  | {
      readonly kind: "function";
      readonly arguments: readonly SurfaceArgument[];
      readonly returnType: FinalType;
      readonly isUnsafe: boolean;
    }
  | { readonly kind: "typeAlias"; readonly target: SurfaceType };

export type SurfaceItemSource = {
  readonly ffiItem?: FfiItemId;
  readonly nativeItem?: NativeItemId;
};

export type SurfaceItem = {
  readonly path: ItemPath;
  readonly payload: SurfacePayload;
  readonly source?: SurfaceItemSource;
};

export const isPackageRoot = (item: SurfaceItem): boolean =>
  item.payload.kind === "packageRoot";

export const isSameSurfaceItem = (a: SurfaceItem, b: SurfaceItem): boolean =>
  stableKey(a) === stableKey(b);

/**
 * Build a function payload, deriving `isUnsafe` from the exposed types.
 */
export const surfaceFunction = (
  args: readonly SurfaceArgument[],
  returnType: FinalType
): SurfacePayload => ({
  kind: "function",
  arguments: args,
  returnType,
  isUnsafe:
    isFinalTypeUnsafe(returnType) ||
    args.some((arg) => isFinalTypeUnsafe(arg.argumentType)),
});

export const formatSurfaceItem = (item: SurfaceItem): string => {
  const path = formatPath(item.path);
  switch (item.payload.kind) {
    case "packageRoot":
      return `package ${path}`;
    case "module":
      return `${item.payload.moduleKind} module ${path}`;
    case "struct":
      return `struct ${path}`;
    case "enumValue":
      return `enum value ${path} = ${item.payload.value}`;
    case "function":
      return `${item.payload.isUnsafe ? "unsafe " : ""}fn ${path}`;
    case "typeAlias":
      return `type ${path}`;
  }
};
