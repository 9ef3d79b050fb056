/**
 * Symbol Index
 * Collects named constructs across trees: (kind, name) -> locations
 */

import { compareStrings } from "../utils/string";
import type { NodeKind, StructuralNode, StructuralTree, SymbolEntry } from "../types";

export const SYMBOL_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  "namespace",
  "class",
  "struct",
  "function",
  "using",
]);

/**
 * Entries sorted by (kind, name); locations keep tree order, then source
 * order within a tree
 */
export function indexSymbols(trees: StructuralTree[]): SymbolEntry[] {
  const entries = new Map<string, SymbolEntry>();

  const walk = (nodes: StructuralNode[], file: string) => {
    for (const node of nodes) {
      if (SYMBOL_KINDS.has(node.kind)) {
        const name = node.name ?? "";
        const key = `${node.kind}\u0000${name}`;
        let entry = entries.get(key);
        if (!entry) {
          entry = { kind: node.kind, name, locations: [] };
          entries.set(key, entry);
        }
        entry.locations.push({ file, span: node.span });
      }
      walk(node.children, file);
    }
  };

  for (const tree of trees) walk(tree.nodes, tree.file);

  return [...entries.values()].sort(
    (a, b) => compareStrings(a.kind, b.kind) || compareStrings(a.name, b.name),
  );
}
