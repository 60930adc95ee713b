/**
 * Hierarchical item paths shared by native and surface entities.
 *
 * A path of length 1 names a built-in type with no owning package
 * (e.g. `["i32"]`). Longer paths start with the package name, end with the
 * entity's own name, and have module names in between.
 */

import { error, ok, type Result } from "../types/result.js";

export const PATH_SEPARATOR = "::";

/** Prefix used when a path is rendered from inside its own package */
export const PACKAGE_ROOT_ALIAS = "crate";

export type ItemPath = {
  readonly parts: readonly string[];
};

/**
 * Create a path from segments. Returns undefined for an empty list or an
 * empty segment.
 */
export const createPath = (
  parts: readonly string[]
): ItemPath | undefined => {
  if (parts.length === 0) return undefined;
  if (parts.some((part) => part.length === 0)) return undefined;
  return { parts: [...parts] };
};

export const parsePath = (text: string): Result<ItemPath, string> => {
  const path = createPath(text.split(PATH_SEPARATOR));
  return path ? ok(path) : error(`invalid item path: '${text}'`);
};

export const formatPath = (path: ItemPath): string =>
  path.parts.join(PATH_SEPARATOR);

/**
 * Package name of the path, or undefined for built-in names.
 */
export const packageNameOf = (path: ItemPath): string | undefined =>
  path.parts.length > 1 ? path.parts[0] : undefined;

export const lastSegment = (path: ItemPath): string =>
  path.parts[path.parts.length - 1] ?? "";

export const parentPath = (path: ItemPath): ItemPath | undefined =>
  path.parts.length > 1 ? { parts: path.parts.slice(0, -1) } : undefined;

export const joinPath = (path: ItemPath, segment: string): ItemPath => ({
  parts: [...path.parts, segment],
});

export const withLastSegment = (path: ItemPath, segment: string): ItemPath => ({
  parts: [...path.parts.slice(0, -1), segment],
});

export const pathsEqual = (a: ItemPath, b: ItemPath): boolean =>
  a.parts.length === b.parts.length &&
  a.parts.every((part, index) => part === b.parts[index]);

/**
 * True if `other` is nested (at any depth) within `ancestor`.
 */
export const isAncestorOf = (ancestor: ItemPath, other: ItemPath): boolean =>
  other.parts.length > ancestor.parts.length &&
  ancestor.parts.every((part, index) => part === other.parts[index]);

export const isDirectParentOf = (parent: ItemPath, other: ItemPath): boolean =>
  other.parts.length === parent.parts.length + 1 &&
  isAncestorOf(parent, other);

export const isChildOf = (child: ItemPath, parent: ItemPath): boolean =>
  isDirectParentOf(parent, child);

/**
 * Render the path for use inside `currentPackage`.
 *
 * - same package: `crate::module::Name`
 * - other package (or no context): `::package::module::Name`
 * - built-in: `Name`
 */
export const renderPath = (
  path: ItemPath,
  currentPackage?: string
): string => {
  const ownPackage = packageNameOf(path);
  if (ownPackage === undefined) {
    return path.parts[0] ?? "";
  }
  if (currentPackage !== undefined && ownPackage === currentPackage) {
    return [PACKAGE_ROOT_ALIAS, ...path.parts.slice(1)].join(PATH_SEPARATOR);
  }
  return `${PATH_SEPARATOR}${formatPath(path)}`;
};

/**
 * Lexicographic order over segments. Unrelated to store identifier order.
 */
export const comparePaths = (a: ItemPath, b: ItemPath): number => {
  const shared = Math.min(a.parts.length, b.parts.length);
  for (let i = 0; i < shared; i++) {
    const left = a.parts[i] ?? "";
    const right = b.parts[i] ?? "";
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return a.parts.length - b.parts.length;
};

export const pathKey = (path: ItemPath): string => JSON.stringify(path.parts);
