import { describe, it, expect } from "vitest";
import {
  compare,
  createMapping,
  EMPTY_MAPPING,
  flatten,
  formatToken,
  normalize,
  renameName,
  validateMapping,
} from "./comparator";
import { build } from "../parser";

const tree = (src: string) => build(src, "test.cpp");

describe("flatten", () => {
  it("walks children depth-first and skips gaps", () => {
    const src = "#include <a.h>\n\nnamespace X {\nvoid f();\n}\nvoid g();\n";
    expect(flatten(tree(src))).toEqual([
      { kind: "include", name: "<a.h>" },
      { kind: "namespace", name: "X" },
      { kind: "function", name: "f" },
      { kind: "function", name: "g" },
    ]);
  });

  it("uses an empty name for unnamed nodes", () => {
    expect(flatten(tree("#pragma once\n"))).toEqual([{ kind: "macro", name: "" }]);
  });
});

describe("formatToken", () => {
  it("omits empty names", () => {
    expect(formatToken({ kind: "macro", name: "" })).toBe("macro");
    expect(formatToken({ kind: "using", name: "Id" })).toBe("using Id");
  });
});

describe("renameName", () => {
  it("prefers a whole-name rename", () => {
    expect(renameName({ "a::b": "c", a: "z" }, "a::b")).toBe("c");
  });

  it("renames each segment and keeps destructor tildes", () => {
    expect(renameName({ Widget: "View" }, "Widget::~Widget")).toBe("View::~View");
  });

  it("ignores inherited object keys", () => {
    expect(renameName({}, "constructor")).toBe("constructor");
  });
});

describe("validateMapping", () => {
  it("accepts plain renames", () => {
    expect(validateMapping(createMapping({ renames: { Foo: "foo", Bar: "bar" } }))).toEqual([]);
  });

  it("rejects chained renames", () => {
    expect(validateMapping(createMapping({ renames: { A: "B", B: "C" } }))).toEqual([
      'rename chain: "A" -> "B" -> "C"',
    ]);
  });

  it("rejects qualified names reachable through segment renames", () => {
    expect(validateMapping(createMapping({ renames: { x: "y", "y::z": "w" } }))).toEqual([
      '"y::z" can be produced by renaming its segments',
    ]);
  });

  it("rejects qualified names containing a qualified rename target", () => {
    const mapping = createMapping({ renames: { A: "X::Y", "X::Y::Z": "W" } });
    expect(validateMapping(mapping)).toEqual([
      '"X::Y::Z" can be produced by renaming its segments',
    ]);
  });
});

describe("createMapping", () => {
  it("merges symbol_renames under renames", () => {
    const mapping = createMapping({
      symbol_renames: { A: "a", C: "c" },
      renames: { A: "b" },
      ignore_kinds: ["include"],
    });
    expect(mapping).toEqual({
      renames: { A: "b", C: "c" },
      ignoreKinds: ["include"],
      ignoreNames: [],
      ignoreTokens: [],
    });
  });
});

describe("normalize", () => {
  const mapping = createMapping({
    renames: { Foo: "Bar" },
    ignore_kinds: ["macro"],
    ignore_names: ["main"],
    ignore_tokens: ["using Id", "include"],
  });

  it("drops gaps, ignored kinds and ignored names", () => {
    expect(normalize({ kind: "other", name: "" }, mapping)).toBeNull();
    expect(normalize({ kind: "macro", name: "" }, mapping)).toBeNull();
    expect(normalize({ kind: "function", name: "main" }, mapping)).toBeNull();
  });

  it("drops ignored token labels before or after renaming", () => {
    expect(normalize({ kind: "using", name: "Id" }, mapping)).toBeNull();
    expect(normalize({ kind: "include", name: "" }, mapping)).toBeNull();
    expect(normalize({ kind: "include", name: "<a.h>" }, mapping)).toEqual({
      kind: "include",
      name: "<a.h>",
    });
    expect(
      normalize({ kind: "class", name: "Foo" }, { ...mapping, ignoreTokens: ["class Bar"] }),
    ).toBeNull();
  });

  it("is idempotent", () => {
    const src = "#define X\nclass Foo {\nvoid Foo::run();\n};\nint main() {}\nvoid Bar();\n";
    for (const token of flatten(tree(src))) {
      const once = normalize(token, mapping);
      const twice = once ? normalize(once, mapping) : null;
      expect(twice).toEqual(once);
    }
  });
});

describe("compare", () => {
  it("matches a tree against itself", () => {
    const src = "namespace X {\nclass A {\nvoid f();\n};\n}\n";
    const result = compare(tree(src), tree(src), EMPTY_MAPPING);
    expect(result.match).toBe(true);
    expect(result.top_diffs).toEqual([]);
    expect(result.origin_multiset_size).toBe(3);
  });

  it("tolerates mapped renames", () => {
    const origin = tree("void Foo();\n");
    const ported = tree("void foo();\n");

    expect(compare(origin, ported, createMapping({ renames: { Foo: "foo" } })).match).toBe(true);
    expect(compare(origin, ported).top_diffs).toEqual([
      { token: { kind: "function", name: "Foo" }, delta: 1 },
      { token: { kind: "function", name: "foo" }, delta: -1 },
    ]);
  });

  it("reports an omitted function with delta 1", () => {
    const result = compare(tree("void a();\nvoid b();\n"), tree("void a();\n"));
    expect(result).toEqual({
      match: false,
      origin_multiset_size: 2,
      ported_multiset_size: 1,
      total_diffs: 1,
      top_diffs: [{ token: { kind: "function", name: "b" }, delta: 1 }],
    });
  });

  it("respects multiplicity", () => {
    const result = compare(tree("void a();\nvoid a();\n"), tree("void a();\n"));
    expect(result.top_diffs).toEqual([{ token: { kind: "function", name: "a" }, delta: 1 }]);
  });

  it("sorts by magnitude then (kind, name) and truncates to top", () => {
    const origin = tree("void c();\nvoid b();\nvoid a();\nvoid a();\n");
    const result = compare(origin, tree(""), EMPTY_MAPPING, { top: 2 });

    expect(result.total_diffs).toBe(3);
    expect(result.top_diffs).toEqual([
      { token: { kind: "function", name: "a" }, delta: 2 },
      { token: { kind: "function", name: "b" }, delta: 1 },
    ]);
  });

  it("ignores kinds listed in the mapping", () => {
    const origin = tree("#include <a.h>\nvoid f();\n");
    const ported = tree("void f();\n");
    expect(compare(origin, ported, createMapping({ ignore_kinds: ["include"] })).match).toBe(true);
  });
});
