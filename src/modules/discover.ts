/**
 * Discover Module
 * Expands build inputs (files and directories) into source descriptors
 */

import glob from "fast-glob";
import path from "node:path";
import { artifactName, compareStrings, pathKind } from "../utils";
import { InputError } from "../utils/errors";
import type { BuildConfig, SourceDescriptor } from "../types";

/**
 * Glob patterns matching every configured extension
 */
export function extensionPatterns(extensions: string[]): string[] {
  return extensions.map((ext) => `**/*${ext}`);
}

/**
 * Resolve inputs to source files
 *
 * - Directories are scanned recursively with fast-glob
 * - Files are taken as given, whatever their extension
 * - Recorded paths are relative to the working directory, so trees verify
 *   against the sources from there
 * - Duplicates are dropped; results are sorted by recorded path
 */
export async function discover(
  inputs: string[],
  config: BuildConfig,
  cwd: string = process.cwd(),
): Promise<SourceDescriptor[]> {
  const found = new Set<string>();

  for (const input of inputs) {
    const resolved = path.resolve(cwd, input);
    const kind = await pathKind(resolved);

    if (kind === null) {
      throw new InputError("read-error", input, "file not found");
    }

    if (kind === "file") {
      found.add(resolved);
      continue;
    }

    const files = await glob(extensionPatterns(config.extensions), {
      cwd: resolved,
      absolute: true,
      onlyFiles: true,
      ignore: config.ignore,
    });

    for (const file of files) found.add(path.resolve(file));
  }

  return [...found]
    .map((inputPath) => {
      const relativePath = path.relative(cwd, inputPath).split(path.sep).join("/");
      return {
        inputPath,
        relativePath,
        outputPath: path.resolve(cwd, config.outDir, artifactName(relativePath)),
      };
    })
    .sort((a, b) => compareStrings(a.relativePath, b.relativePath));
}
