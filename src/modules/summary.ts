/**
 * Tree Summary
 * Markdown outline of one structural tree
 */

import { compareStrings, firstLine } from "../utils/string";
import type { StructuralNode, StructuralTree } from "../types";

function range(node: StructuralNode): string {
  const { span } = node;
  return `L${span.start_line}-${span.end_line} B${span.start_byte}-${span.end_byte}`;
}

export function nodeLabel(node: StructuralNode): string {
  if (node.kind === "other") {
    const length = node.span.end_byte - node.span.start_byte;
    return `other · ${length} bytes (${range(node)})`;
  }
  if (node.name) return `${node.kind} ${node.name} (${range(node)})`;

  const sample = firstLine(node.text);
  return `${node.kind}${sample ? ` ${sample}` : ""} (${range(node)})`;
}

/**
 * Header (or first text line) of a node, for the fenced detail block
 */
function detail(node: StructuralNode): string {
  if ("header_span" in node && node.header_span) {
    const length = node.header_span.end_byte - node.header_span.start_byte;
    // Header spans are byte ranges, the text is decoded
    const header = Buffer.from(node.text, "utf-8")
      .subarray(0, length)
      .toString("utf-8")
      .trim();
    if (header) return header;
  }
  return firstLine(node.text);
}

function emitTree(nodes: StructuralNode[], depth: number, lines: string[]): void {
  const indent = "  ".repeat(depth);

  for (const node of nodes) {
    lines.push(`${indent}- ${nodeLabel(node)}`);
    if (node.kind === "other") continue;

    const body = detail(node);
    if (body) lines.push("", `${indent}\`\`\``, `${indent}${body}`, `${indent}\`\`\``, "");

    emitTree(node.children, depth + 1, lines);
  }
}

/**
 * Node counts per kind over the top level, in kind order
 */
export function countKinds(nodes: StructuralNode[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const node of nodes) {
    counts.set(node.kind, (counts.get(node.kind) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([a], [b]) => compareStrings(a, b));
}

export function summarize(tree: StructuralTree): string {
  const lines = [
    `# Structure Summary: ${tree.file}`,
    "",
    `- Version: \`${tree.version}\``,
    `- Source length: \`${tree.source_length}\` bytes`,
    `- Source hash (sha256): \`${tree.source_hash}\``,
  ];

  const counts = countKinds(tree.nodes);
  if (counts.length > 0) {
    lines.push(
      `- Node counts: ${counts.map(([kind, count]) => `${kind}=${count}`).join(", ")}`,
    );
  }

  lines.push("", "## Tree", "");
  emitTree(tree.nodes, 0, lines);
  lines.push("");

  return lines.join("\n");
}
