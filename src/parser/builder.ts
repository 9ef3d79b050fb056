/**
 * Tree Builder
 * Decomposes one source file into a lossless structural tree: recognized
 * constructs become typed nodes, everything between them becomes "other"
 * gap nodes, so the top-level texts concatenate back to the input.
 */

import { createHash } from "crypto";
import { SourceIndex } from "./source-index";
import { segment, type StatementSegment } from "./segmenter";
import { blankTrivia, classifyDirective, classifyStatement } from "./classifier";
import { InputError } from "../utils/errors";
import { TREE_VERSION } from "../types";
import type { GapNode, StructuralNode, StructuralTree } from "../types";

interface PlacedNode {
  start: number;
  end: number;
  node: StructuralNode;
}

/**
 * Strict UTF-8 decoding; the byte-order mark stays part of the text
 */
export function decodeSource(bytes: Uint8Array, path: string): string {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputError("decode-error", path, message);
  }
}

function buildStatement(
  index: SourceIndex,
  statement: StatementSegment,
  container?: string,
): StructuralNode | null {
  // A body that never closes cannot be delimited
  if (statement.unterminated) return null;

  const { text: src } = index;
  const { start, end, bodyStart, bodyEnd } = statement;
  const body =
    bodyStart !== undefined && bodyEnd !== undefined
      ? { start: bodyStart, end: bodyEnd }
      : null;

  const classification = classifyStatement({
    head: blankTrivia(src, start, body ? body.start : end),
    raw: src.slice(start, end),
    hasBody: body !== null,
    trailer: body ? blankTrivia(src, body.end, end) : undefined,
    container,
  });
  if (!classification) return null;

  const span = index.span(start, end);
  const text = src.slice(start, end);

  switch (classification.kind) {
    case "namespace":
    case "class":
    case "struct":
      if (!body) return null;
      return {
        kind: classification.kind,
        name: classification.name ?? null,
        span,
        header_span: index.span(start, body.start),
        body_span: index.span(body.start, body.end),
        text,
        children: buildLevel(
          index,
          body.start + 1,
          body.end - 1,
          classification.kind === "namespace" ? undefined : memberOf(classification.name),
        ).map((placed) => placed.node),
      };

    case "function":
      return {
        kind: "function",
        name: classification.name,
        span,
        header_span: body ? index.span(start, body.start) : span,
        body_span: body ? index.span(body.start, body.end) : null,
        text,
        children: [],
      };

    default:
      return {
        kind: classification.kind,
        name: classification.name ?? null,
        span,
        text,
        children: [],
      };
  }
}

/**
 * Constructor name of members of a type: "ns::Vec<T>" -> "Vec"
 */
function memberOf(typeName: string | undefined): string | undefined {
  if (!typeName) return undefined;
  const unqualified = typeName.slice(typeName.lastIndexOf(":") + 1);
  return unqualified.replace(/<.*$/, "").trim() || undefined;
}

/**
 * Recognized constructs in [from, to), in source order. `container` names
 * the enclosing class or struct.
 */
function buildLevel(
  index: SourceIndex,
  from: number,
  to: number,
  container?: string,
): PlacedNode[] {
  const placed: PlacedNode[] = [];

  for (const seg of segment(index.text, from, to)) {
    if (seg.type === "punctuation") continue;

    if (seg.type === "directive") {
      const directive = classifyDirective(index.text.slice(seg.start, seg.end));
      placed.push({
        start: seg.start,
        end: seg.end,
        node: {
          kind: directive.kind,
          name: directive.name ?? null,
          span: index.span(seg.start, seg.end),
          text: index.text.slice(seg.start, seg.end),
          children: [],
        },
      });
      continue;
    }

    const node = buildStatement(index, seg, container);
    if (node) placed.push({ start: seg.start, end: seg.end, node });
  }

  return placed;
}

function gap(index: SourceIndex, start: number, end: number): GapNode {
  return {
    kind: "other",
    name: null,
    span: index.span(start, end),
    text: index.text.slice(start, end),
    children: [],
  };
}

/**
 * Top-level nodes with every unclaimed range turned into a gap node
 */
function fillGaps(index: SourceIndex, placed: PlacedNode[]): StructuralNode[] {
  const nodes: StructuralNode[] = [];
  let cursor = 0;

  for (const { start, end, node } of placed) {
    if (start > cursor) nodes.push(gap(index, cursor, start));
    nodes.push(node);
    cursor = end;
  }
  if (cursor < index.text.length) {
    nodes.push(gap(index, cursor, index.text.length));
  }

  return nodes;
}

/**
 * Build the structural tree of one source file.
 * Throws InputError ("decode-error") when the bytes are not valid UTF-8.
 */
export function build(source: Uint8Array | string, file: string): StructuralTree {
  const bytes =
    typeof source === "string" ? new TextEncoder().encode(source) : source;
  const index = new SourceIndex(decodeSource(bytes, file));

  return {
    version: TREE_VERSION,
    file,
    source_hash: createHash("sha256").update(bytes).digest("hex"),
    source_length: bytes.length,
    nodes: fillGaps(index, buildLevel(index, 0, index.text.length)),
  };
}
