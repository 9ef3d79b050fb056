/**
 * Build command - Builds structural trees for source files and directories
 */

import ora, { type Ora } from "ora";
import { z } from "zod";
import type { Command } from "commander";
import { build } from "../../parser";
import { discover, displayStats } from "../../modules";
import { InputError, readSource, writeJson } from "../../utils";
import { createContext, failCommand, GlobalOptionsSchema } from "../context";
import {
  EXIT_INPUT_ERROR,
  EXIT_OK,
  type CommandContext,
  type SourceDescriptor,
  type StructuralTree,
} from "../../types";

const BuildOptionsSchema = GlobalOptionsSchema.extend({
  outDir: z.string().optional(),
  stdout: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

interface BuildRunOptions {
  stdout?: boolean;
  cwd?: string;
  onProgress?: (text: string) => void;
}

/**
 * Sources whose artifact path is already taken by an earlier source are
 * reported and skipped
 */
function dropCollisions(sources: SourceDescriptor[], ctx: CommandContext): SourceDescriptor[] {
  const owners = new Map<string, SourceDescriptor>();

  return sources.filter((source) => {
    const owner = owners.get(source.outputPath);
    if (!owner) {
      owners.set(source.outputPath, source);
      return true;
    }

    ctx.tracker.trackError(
      source.inputPath,
      new InputError(
        "write-error",
        source.inputPath,
        `${source.outputPath} is already written for ${owner.relativePath}`,
      ),
      "source",
    );
    ctx.tracker.incrementFailed();
    return false;
  });
}

/**
 * Build every discovered source; one tree per file. Returns the exit code.
 * With `stdout`, trees are returned instead of written (one object, or an
 * array for several files).
 */
export async function runBuild(
  inputs: string[],
  ctx: CommandContext,
  options: BuildRunOptions = {},
): Promise<{ code: number; trees: StructuralTree[] }> {
  const { config, tracker, logger } = ctx;

  options.onProgress?.("Discovering sources...");
  let sources: SourceDescriptor[];
  try {
    sources = await discover(inputs, config.build, options.cwd);
  } catch (error) {
    tracker.trackError(inputs.join(", "), error, "source");
    return { code: EXIT_INPUT_ERROR, trees: [] };
  }

  tracker.setTotalFiles(sources.length);
  logger.debug(`Found ${sources.length} source file(s)`);

  if (!options.stdout) {
    sources = dropCollisions(sources, ctx);
  }

  const trees: StructuralTree[] = [];
  let done = 0;

  await Promise.all(
    sources.map(async (source, i) => {
      try {
        const tree = build(await readSource(source.inputPath), source.relativePath);
        if (options.stdout) {
          trees[i] = tree;
        } else {
          await writeJson(source.outputPath, tree);
          logger.debug(`Wrote ${source.outputPath}`);
        }
        tracker.incrementSuccessful();
      } catch (error) {
        tracker.trackError(source.inputPath, error, "source");
        tracker.incrementFailed();
      }
      options.onProgress?.(`Building trees... ${++done}/${sources.length}`);
    }),
  );

  return {
    code: tracker.hasInputIssues() ? EXIT_INPUT_ERROR : EXIT_OK,
    trees: trees.filter((tree) => tree !== undefined),
  };
}

export async function buildCommand(
  paths: string[],
  _opts: Options,
  command: Command,
): Promise<void> {
  let ctx: CommandContext | undefined;
  let spinner: Ora | null = null;

  try {
    const options = BuildOptionsSchema.parse(command.optsWithGlobals());
    ctx = await createContext(options);

    if (options.outDir) {
      ctx.config.build.outDir = options.outDir;
    }

    // Keep stdout clean for piping trees
    spinner = options.stdout ? null : ora({ text: "Initializing...", indent: 2 }).start();
    const current = spinner;

    const { code, trees } = await runBuild(paths, ctx, {
      stdout: options.stdout,
      onProgress: (text) => {
        if (current) current.text = text;
      },
    });

    spinner?.clear();
    spinner?.stop();

    if (options.stdout) {
      const output = trees.length === 1 ? trees[0] : trees;
      console.log(JSON.stringify(output, null, 2));
      for (const issue of ctx.tracker.getIssues()) {
        ctx.logger.error(`${issue.path}: ${issue.reason} (${issue.details ?? ""})`);
      }
    } else {
      displayStats("Build Complete", ctx.tracker.getStats(), ctx.verbose);
    }

    process.exitCode = code;
  } catch (error) {
    spinner?.fail("Build failed");
    failCommand(error, ctx);
  }
}
