/**
 * Identifier-safe type captions used to disambiguate synthesized names
 * (e.g. overloaded wrappers keyed by argument type).
 *
 * Captions feed name uniqueness, so they must stay deterministic: the same
 * type and context always give the same caption.
 */

import {
  lastSegment,
  packageNameOf,
  type ItemPath,
} from "../paths/item-path.js";
import { toSnakeCase } from "../paths/naming.js";
import type { NamedType, SurfaceType } from "./types.js";

/** Packages whose items are captioned by their last segment only */
export const STANDARD_PACKAGES: ReadonlySet<string> = new Set(["std", "core"]);

const captionNamedPath = (path: ItemPath, context: ItemPath): string => {
  if (path.parts.length === 1) {
    return toSnakeCase(lastSegment(path));
  }

  const ownPackage = packageNameOf(path);
  if (ownPackage !== undefined && STANDARD_PACKAGES.has(ownPackage)) {
    return toSnakeCase(lastSegment(path));
  }

  // Drop the prefix shared with the context, then collapse repeats.
  let remainingContext = context.parts;
  const words: string[] = [];
  for (const part of path.parts) {
    if (remainingContext.length > 0 && remainingContext[0] === part) {
      remainingContext = remainingContext.slice(1);
      continue;
    }
    remainingContext = [];
    const word = toSnakeCase(part);
    if (words[words.length - 1] !== word) {
      words.push(word);
    }
  }

  return words.length > 0 ? words.join("_") : lastSegment(path);
};

const captionNamed = (type: NamedType, context: ItemPath): string => {
  const name = captionNamedPath(type.path, context);
  if (!type.typeArguments) return name;
  const args = type.typeArguments.map((arg) => caption(arg, context));
  return [name, ...args].join("_");
};

export const caption = (type: SurfaceType, context: ItemPath): string => {
  switch (type.kind) {
    case "unit":
      return "unit";

    case "indirection": {
      const constText = type.isConst ? "_const" : "";
      const kindText = type.indirection.kind === "pointer" ? "_ptr" : "_ref";
      return `${caption(type.pointee, context)}${constText}${kindText}`;
    }

    case "named":
      return captionNamed(type, context);

    case "functionSignature":
      return "fn";
  }
};
