/**
 * Shared builders for unit tests
 */

import type { Environment } from "./checks/environment.js";
import type { FfiItem } from "./ffi/ffi-items.js";
import type { NativeItem } from "./native/native-items.js";
import type { NativeType } from "./native/native-types.js";
import { parsePath, type ItemPath } from "./paths/item-path.js";
import type { SurfaceItem, SurfacePayload } from "./store/surface-items.js";

export const path = (text: string): ItemPath => {
  const parsed = parsePath(text);
  if (!parsed.ok) throw new Error(parsed.error);
  return parsed.value;
};

export const intType: NativeType = { kind: "builtin", name: "int" };

export const nativeFunction = (
  name: string,
  args: readonly string[] = []
): NativeItem => ({
  kind: "function",
  path: path(name),
  returnType: intType,
  arguments: args.map((argName) => ({
    name: argName,
    argumentType: intType,
    hasDefaultValue: false,
  })),
  allowsVariadic: false,
});

export const ffiWrapper = (
  nativeName: string,
  wrapperName: string
): FfiItem => ({
  kind: "wrapperFunction",
  path: path(wrapperName),
  wrapperKind: {
    kind: "function",
    nativePath: path(nativeName),
    nativeArgumentTypes: [],
  },
  arguments: [],
  returnType: { originalType: intType, ffiType: intType, conversion: "none" },
  allowsVariadic: false,
});

export const linuxEnv: Environment = {
  target: {
    arch: "x86_64",
    os: "linux",
    family: "unix",
    env: "gnu",
    pointerWidth: 64,
    endian: "little",
  },
  libraryVersion: "5.11",
};

export const windowsEnv: Environment = {
  target: {
    arch: "x86_64",
    os: "windows",
    family: "windows",
    env: "msvc",
    pointerWidth: 64,
    endian: "little",
  },
};

export const surfaceItem = (
  text: string,
  payload: SurfacePayload = { kind: "module", moduleKind: "regular" }
): SurfaceItem => ({ path: path(text), payload });

export const packageRoot = (name: string): SurfaceItem => ({
  path: path(name),
  payload: { kind: "packageRoot" },
});
