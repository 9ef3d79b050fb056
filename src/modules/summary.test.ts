import { describe, it, expect } from "vitest";
import { countKinds, nodeLabel, summarize } from "./summary";
import { build } from "../parser";

const SOURCE = "#include <a.h>\nnamespace N {\nint f() { return 1; }\n}\n";

describe("summarize", () => {
  const tree = build(SOURCE, "demo.cpp");
  const lines = summarize(tree).split("\n");

  it("starts with file metadata and top-level counts", () => {
    expect(lines.slice(0, 6)).toEqual([
      "# Structure Summary: demo.cpp",
      "",
      "- Version: `1.0`",
      "- Source length: `53` bytes",
      `- Source hash (sha256): \`${tree.source_hash}\``,
      "- Node counts: include=1, namespace=1, other=2",
    ]);
  });

  it("renders the node outline with header blocks", () => {
    expect(lines.slice(lines.indexOf("## Tree"))).toEqual([
      "## Tree",
      "",
      "- include <a.h> (L1-1 B0-14)",
      "",
      "```",
      "#include <a.h>",
      "```",
      "",
      "- other · 1 bytes (L1-1 B14-15)",
      "- namespace N (L2-4 B15-52)",
      "",
      "```",
      "namespace N",
      "```",
      "",
      "  - function f (L3-3 B29-50)",
      "",
      "  ```",
      "  int f()",
      "  ```",
      "",
      "- other · 1 bytes (L4-4 B52-53)",
      "",
    ]);
  });
});

describe("nodeLabel", () => {
  it("falls back to the first text line for unnamed nodes", () => {
    const [macro] = build("#pragma once\n", "p.h").nodes;
    expect(nodeLabel(macro)).toBe("macro #pragma once (L1-1 B0-12)");
  });
});

describe("countKinds", () => {
  it("sorts kinds in code-point order", () => {
    const { nodes } = build("void f();\n#define A\n", "c.h");
    expect(countKinds(nodes)).toEqual([
      ["function", 1],
      ["macro", 1],
      ["other", 2],
    ]);
  });
});
