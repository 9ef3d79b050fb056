/**
 * Verifier
 * Checks the reconstruction invariant of a tree against its source bytes
 */

import type { StructuralTree, VerificationResult } from "../types";

const encoder = new TextEncoder();

/**
 * Concatenate top-level texts in span order and compare them byte for byte
 * with the source. Never throws.
 */
export function verify(
  tree: StructuralTree,
  source: Uint8Array | string,
): VerificationResult {
  const expected = typeof source === "string" ? encoder.encode(source) : source;
  const ordered = [...tree.nodes].sort(
    (a, b) => a.span.start_byte - b.span.start_byte,
  );
  const actual = encoder.encode(ordered.map((node) => node.text).join(""));

  const shared = Math.min(expected.length, actual.length);
  let divergence: number | undefined;

  for (let i = 0; i < shared; i++) {
    if (expected[i] !== actual[i]) {
      divergence = i;
      break;
    }
  }

  // One side is a prefix of the other
  if (divergence === undefined && expected.length !== actual.length) {
    divergence = shared;
  }

  const result: VerificationResult = {
    ok: divergence === undefined,
    expected_length: expected.length,
    actual_length: actual.length,
  };
  if (divergence !== undefined) result.first_divergence_offset = divergence;

  return result;
}
