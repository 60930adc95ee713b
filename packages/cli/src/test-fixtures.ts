/**
 * Shared fixtures for CLI tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  parsePath,
  type Environment,
  type FfiItem,
  type ItemPath,
  type NativeType,
} from "@bindery/core";

export const withTempDir = (body: (dir: string) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), "bindery-cli-"));
  try {
    body(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

export const withTempDirAsync = async (
  body: (dir: string) => Promise<void>
): Promise<void> => {
  const dir = mkdtempSync(join(tmpdir(), "bindery-cli-"));
  try {
    await body(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

export const path = (text: string): ItemPath => {
  const parsed = parsePath(text);
  if (!parsed.ok) throw new Error(parsed.error);
  return parsed.value;
};

const intType: NativeType = { kind: "builtin", name: "int" };

export const ffiWrapper = (nativeName: string, wrapperName: string): FfiItem => ({
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

export const writeConfig = (dir: string, config: object): string => {
  const configPath = join(dir, "bindery.json");
  writeFileSync(configPath, JSON.stringify(config, null, 2));
  return configPath;
};
