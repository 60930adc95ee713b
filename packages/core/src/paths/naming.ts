/**
 * Case helpers for synthesized identifiers
 */

const splitIntoWords = (name: string): readonly string[] => {
  const tokens = name.split(/[-_]+/g).filter((t) => t.length > 0);
  const words: string[] = [];

  for (const token of tokens) {
    const matches =
      token.match(/[A-Z]+[0-9]*(?![a-z])|[A-Z]?[a-z]+[0-9]*|[0-9]+/g) ?? [];
    if (matches.length === 0) {
      words.push(token);
    } else {
      words.push(...matches);
    }
  }

  return words;
};

/**
 * Lowercase words joined by `_`.
 *
 * - "QString" -> "q_string"
 * - "XMLHttpRequest" -> "xml_http_request"
 * - "Vector3D" -> "vector3_d"
 * - "i32" -> "i32"
 */
export const toSnakeCase = (name: string): string =>
  splitIntoWords(name)
    .map((word) => word.toLowerCase())
    .join("_");
