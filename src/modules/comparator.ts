/**
 * Structural Comparator
 * Compares two trees as multisets of normalized (kind, name) tokens.
 * Children are flattened into the same multiset as their parents.
 */

import { compareStrings } from "../utils/string";
import type {
  CompareOptions,
  ComparisonResult,
  Mapping,
  MappingFile,
  StructuralNode,
  StructuralToken,
  StructuralTree,
  TokenDiff,
} from "../types";

export const DEFAULT_TOP = 20;

export const EMPTY_MAPPING: Mapping = {
  renames: {},
  ignoreKinds: [],
  ignoreNames: [],
  ignoreTokens: [],
};

// ============================================================================
// Mapping
// ============================================================================

/**
 * Mapping from its file form; "symbol_renames" entries are merged under
 * "renames", which wins on conflicts
 */
export function createMapping(file: MappingFile): Mapping {
  return {
    renames: { ...file.symbol_renames, ...file.renames },
    ignoreKinds: file.ignore_kinds ?? [],
    ignoreNames: file.ignore_names ?? [],
    ignoreTokens: file.ignore_tokens ?? [],
  };
}

function lookup(renames: Record<string, string>, name: string): string | undefined {
  return Object.hasOwn(renames, name) ? renames[name] : undefined;
}

/**
 * Rename a possibly qualified name: the whole name first, otherwise each
 * "::" segment on its own (destructor tildes kept)
 */
export function renameName(renames: Record<string, string>, name: string): string {
  const whole = lookup(renames, name);
  if (whole !== undefined) return whole;

  return name
    .split("::")
    .map((segment) => {
      const tilde = segment.startsWith("~");
      const base = tilde ? segment.slice(1) : segment;
      const renamed = lookup(renames, base) ?? base;
      return tilde ? `~${renamed}` : renamed;
    })
    .join("::");
}

function containsRun(segments: string[], run: string[]): boolean {
  for (let i = 0; i + run.length <= segments.length; i++) {
    if (run.every((segment, j) => segments[i + j] === segment)) return true;
  }
  return false;
}

/**
 * Problems that would make normalization non-idempotent: a rename target
 * that is renamed again, or a qualified source name containing a rename
 * target as a run of segments
 */
export function validateMapping(mapping: Mapping): string[] {
  const { renames } = mapping;
  const problems: string[] = [];
  const targets = new Set<string>();

  for (const [from, to] of Object.entries(renames)) {
    if (from !== to) targets.add(to);
  }

  for (const [from, to] of Object.entries(renames)) {
    const next = renameName(renames, to);
    if (next !== to) {
      problems.push(`rename chain: "${from}" -> "${to}" -> "${next}"`);
      continue;
    }

    if (from === to || !from.includes("::")) continue;
    const segments = from.split("::").map((segment) => segment.replace(/^~/, ""));
    const reachable = [...targets].some((target) =>
      containsRun(segments, target.split("::")),
    );
    if (reachable) {
      problems.push(`"${from}" can be produced by renaming its segments`);
    }
  }

  return problems;
}

// ============================================================================
// Tokens
// ============================================================================

/**
 * "kind name", or just the kind for unnamed tokens
 */
export function formatToken(token: StructuralToken): string {
  return token.name ? `${token.kind} ${token.name}` : token.kind;
}

export function tokenKey(token: StructuralToken): string {
  return `${token.kind}\u0000${token.name}`;
}

/**
 * One token per node, depth-first; gap nodes carry no structure
 */
export function flatten(tree: StructuralTree): StructuralToken[] {
  const tokens: StructuralToken[] = [];

  const walk = (nodes: StructuralNode[]) => {
    for (const node of nodes) {
      if (node.kind === "other") continue;
      tokens.push({ kind: node.kind, name: node.name ?? "" });
      walk(node.children);
    }
  };

  walk(tree.nodes);
  return tokens;
}

/**
 * Apply the mapping to one token; null when the token is ignored.
 * Ignored names and token labels match before or after renaming.
 */
export function normalize(
  token: StructuralToken,
  mapping: Mapping,
): StructuralToken | null {
  if (token.kind === "other" || mapping.ignoreKinds.includes(token.kind)) {
    return null;
  }

  const name = token.name ? renameName(mapping.renames, token.name) : token.name;
  if (
    token.name &&
    (mapping.ignoreNames.includes(token.name) || mapping.ignoreNames.includes(name))
  ) {
    return null;
  }

  const renamed = { kind: token.kind, name };
  if (
    mapping.ignoreTokens.includes(formatToken(token)) ||
    mapping.ignoreTokens.includes(formatToken(renamed))
  ) {
    return null;
  }

  return renamed;
}

function countTokens(
  tree: StructuralTree,
  mapping: Mapping,
): Map<string, { token: StructuralToken; count: number }> {
  const counts = new Map<string, { token: StructuralToken; count: number }>();

  for (const raw of flatten(tree)) {
    const token = normalize(raw, mapping);
    if (!token) continue;

    const key = tokenKey(token);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { token, count: 1 });
  }

  return counts;
}

function multisetSize(
  counts: Map<string, { token: StructuralToken; count: number }>,
): number {
  let size = 0;
  for (const { count } of counts.values()) size += count;
  return size;
}

/**
 * Multiset difference of the normalized tokens of both trees.
 * delta = origin count - ported count; sorted by |delta| descending, then
 * by (kind, name).
 */
export function compare(
  origin: StructuralTree,
  ported: StructuralTree,
  mapping: Mapping = EMPTY_MAPPING,
  options: CompareOptions = {},
): ComparisonResult {
  const top = options.top ?? DEFAULT_TOP;
  const originCounts = countTokens(origin, mapping);
  const portedCounts = countTokens(ported, mapping);

  const diffs: TokenDiff[] = [];
  const keys = new Set([...originCounts.keys(), ...portedCounts.keys()]);

  for (const key of keys) {
    const a = originCounts.get(key);
    const b = portedCounts.get(key);
    const delta = (a?.count ?? 0) - (b?.count ?? 0);
    const token = a?.token ?? b?.token;
    if (delta !== 0 && token) diffs.push({ token, delta });
  }

  diffs.sort(
    (x, y) =>
      Math.abs(y.delta) - Math.abs(x.delta) ||
      compareStrings(x.token.kind, y.token.kind) ||
      compareStrings(x.token.name, y.token.name),
  );

  return {
    match: diffs.length === 0,
    origin_multiset_size: multisetSize(originCounts),
    ported_multiset_size: multisetSize(portedCounts),
    total_diffs: diffs.length,
    top_diffs: diffs.slice(0, top),
  };
}
