import { describe, it, expect } from "vitest";
import { formatComparison, formatDuration, formatVerification } from "./report";

describe("formatComparison", () => {
  it("reports a match with multiset sizes", () => {
    expect(
      formatComparison({
        match: true,
        origin_multiset_size: 2,
        ported_multiset_size: 2,
        total_diffs: 0,
        top_diffs: [],
      }),
    ).toEqual([
      "[ok] Structural token multiset matches after mapping (origin 2 tokens · ported 2 tokens).",
    ]);
  });

  it("groups differences by the side holding the excess", () => {
    expect(
      formatComparison({
        match: false,
        origin_multiset_size: 3,
        ported_multiset_size: 1,
        total_diffs: 3,
        top_diffs: [
          { token: { kind: "function", name: "a" }, delta: 2 },
          { token: { kind: "class", name: "W" }, delta: -1 },
        ],
      }),
    ).toEqual([
      "[diff] 3 differing token(s), showing 2 (origin 3 tokens · ported 1 tokens):",
      "-- In origin more than ported --",
      "function a\t+2",
      "-- In ported more than origin --",
      "class W\t+1",
    ]);
  });
});

describe("formatVerification", () => {
  it("shows lengths and the divergence offset", () => {
    expect(
      formatVerification("t.lst.json", {
        ok: false,
        first_divergence_offset: 13,
        expected_length: 22,
        actual_length: 21,
      }),
    ).toBe("t.lst.json: MISMATCH at byte 13  len(src)=22 len(rebuilt)=21");
    expect(
      formatVerification("t.lst.json", { ok: true, expected_length: 4, actual_length: 4 }),
    ).toBe("t.lst.json: OK  len(src)=4 len(rebuilt)=4");
  });
});

describe("formatDuration", () => {
  it("scales units", () => {
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});
