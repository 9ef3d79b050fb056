/**
 * String Utilities
 * Shared string helper functions
 */

/**
 * Code-point order comparison, independent of locale
 *
 * @example
 * ["b", "B", "a"].sort(compareStrings) // ["B", "a", "b"]
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * First non-empty line of a text block, trimmed
 *
 * @example
 * firstLine("\n  class Foo {\n};") // "class Foo {"
 */
export function firstLine(text: string): string {
  const [line = ""] = text.trim().split(/\r?\n/);
  return line.trim();
}

/**
 * Flatten a relative path into a single artifact filename
 *
 * @example
 * artifactName("src/core/value.cpp") // "src__core__value.cpp.lst.json"
 */
export function artifactName(relativePath: string): string {
  return `${relativePath.replace(/[\\/]/g, "__")}.lst.json`;
}
