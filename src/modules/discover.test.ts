import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "node:path";
import { discover, extensionPatterns } from "./discover";
import type { BuildConfig } from "../types";

const config: BuildConfig = {
  extensions: [".cpp", ".hpp"],
  ignore: ["**/node_modules/**"],
  outDir: "out",
};

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), "structmatch-discover-"));
  await mkdir(path.join(root, "core"));
  await mkdir(path.join(root, "node_modules", "dep"), { recursive: true });
  await writeFile(path.join(root, "a.cpp"), "int a;\n");
  await writeFile(path.join(root, "core", "b.hpp"), "int b;\n");
  await writeFile(path.join(root, "notes.txt"), "notes\n");
  await writeFile(path.join(root, "node_modules", "dep", "c.hpp"), "int c;\n");
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("extensionPatterns", () => {
  it("builds one recursive pattern per extension", () => {
    expect(extensionPatterns([".c", ".h"])).toEqual(["**/*.c", "**/*.h"]);
  });
});

describe("discover", () => {
  it("scans directories for configured extensions", async () => {
    const sources = await discover(["."], config, root);

    expect(sources.map((s) => s.relativePath)).toEqual(["a.cpp", "core/b.hpp"]);
    expect(sources[1]).toEqual({
      inputPath: path.join(root, "core", "b.hpp"),
      relativePath: "core/b.hpp",
      outputPath: path.join(root, "out", "core__b.hpp.lst.json"),
    });
  });

  it("takes explicit files whatever their extension", async () => {
    const sources = await discover(["notes.txt"], config, root);
    expect(sources.map((s) => s.relativePath)).toEqual(["notes.txt"]);
  });

  it("drops duplicates", async () => {
    const sources = await discover([".", "a.cpp"], config, root);
    expect(sources.map((s) => s.relativePath)).toEqual(["a.cpp", "core/b.hpp"]);
  });

  it("rejects missing inputs", async () => {
    await expect(discover(["missing"], config, root)).rejects.toMatchObject({
      reason: "read-error",
      path: "missing",
    });
  });
});
