/**
 * Environments an FFI wrapper is checked under
 */

import { stableKey } from "../types/stable-key.js";

export type TargetDescriptor = {
  /** e.g. "x86_64", "aarch64" */
  readonly arch: string;
  /** e.g. "linux", "windows", "macos" */
  readonly os: string;
  readonly family: "unix" | "windows" | "other";
  /** ABI environment, e.g. "gnu", "msvc", "none" */
  readonly env: string;
  readonly pointerWidth: 32 | 64;
  readonly endian: "little" | "big";
};

export type Environment = {
  readonly target: TargetDescriptor;
  /** Version of the wrapped native library, when it matters */
  readonly libraryVersion?: string;
};

const FAMILIES: readonly string[] = ["unix", "windows", "other"];
const ENDIANS: readonly string[] = ["little", "big"];

/**
 * Shape check for environments read back from JSON.
 */
export const isValidEnvironment = (
  environment: Environment | undefined
): boolean => {
  const target = environment?.target;
  return (
    typeof target?.arch === "string" &&
    typeof target.os === "string" &&
    typeof target.env === "string" &&
    FAMILIES.includes(target.family) &&
    ENDIANS.includes(target.endian) &&
    (target.pointerWidth === 32 || target.pointerWidth === 64) &&
    (environment?.libraryVersion === undefined ||
      typeof environment.libraryVersion === "string")
  );
};

export const environmentKey = (environment: Environment): string =>
  stableKey(environment);

export const environmentsEqual = (a: Environment, b: Environment): boolean =>
  environmentKey(a) === environmentKey(b);

/**
 * `x86_64-linux-gnu (lib 5.11)`
 */
export const formatEnvironment = (environment: Environment): string => {
  const { arch, os, env } = environment.target;
  const base = `${arch}-${os}-${env}`;
  return environment.libraryVersion === undefined
    ? base
    : `${base} (lib ${environment.libraryVersion})`;
};
