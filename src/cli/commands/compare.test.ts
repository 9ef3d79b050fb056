import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "node:path";
import { runCompare } from "./compare";
import { build } from "../../parser";
import { loadDefaultConfig, Logger, Tracker, writeJson } from "../../utils";
import type { CommandContext } from "../../types";

let root: string;
let origin: string;
let ported: string;

async function context(): Promise<CommandContext> {
  return {
    config: await loadDefaultConfig(),
    tracker: new Tracker(),
    logger: new Logger("error"),
  };
}

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), "structmatch-compare-"));
  origin = path.join(root, "origin.lst.json");
  ported = path.join(root, "ported.lst.json");
  await writeJson(origin, build("class Widget {\nvoid draw();\n};\n", "widget.h"));
  await writeJson(
    ported,
    build("class widget {\nvoid draw();\n};\nvoid extra();\n", "widget.hpp"),
  );
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

// ============================================================================
// compare
// ============================================================================

describe("runCompare", () => {
  it("reports differences without a mapping", async () => {
    const { code, result } = await runCompare(origin, ported, await context());

    expect(code).toBe(1);
    expect(result?.top_diffs).toEqual([
      { token: { kind: "class", name: "Widget" }, delta: 1 },
      { token: { kind: "class", name: "widget" }, delta: -1 },
      { token: { kind: "function", name: "extra" }, delta: -1 },
    ]);
  });

  it("matches once the mapping renames and ignores", async () => {
    const mapping = path.join(root, "mapping.json");
    await writeFile(
      mapping,
      JSON.stringify({ renames: { Widget: "widget" }, ignore_names: ["extra"] }),
    );

    const { code, result } = await runCompare(origin, ported, await context(), { mapping });

    expect(code).toBe(0);
    expect(result).toMatchObject({ match: true, origin_multiset_size: 2, ported_multiset_size: 2 });
  });

  it("adds configured ignore kinds to the mapping", async () => {
    const ctx = await context();
    ctx.config.compare.ignoreKinds = ["function"];

    const { result } = await runCompare(origin, ported, ctx, { top: 1 });

    expect(result).toEqual({
      match: false,
      origin_multiset_size: 1,
      ported_multiset_size: 1,
      total_diffs: 2,
      top_diffs: [{ token: { kind: "class", name: "Widget" }, delta: 1 }],
    });
  });

  it("fails with an input error on an invalid mapping", async () => {
    const mapping = path.join(root, "mapping.json");
    await writeFile(mapping, JSON.stringify({ renames: { A: "B", B: "C" } }));
    const ctx = await context();

    const { code, result } = await runCompare(origin, ported, ctx, { mapping });

    expect(code).toBe(2);
    expect(result).toBeUndefined();
    expect(ctx.tracker.getIssues()).toMatchObject([
      { type: "mapping", reason: "invalid-mapping" },
    ]);
  });
});
