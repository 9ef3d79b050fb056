/**
 * Index command - Symbol index across many trees
 */

import path from "node:path";
import { z } from "zod";
import type { Command } from "commander";
import { indexSymbols, displayIssues } from "../../modules";
import { loadTree, writeJson } from "../../utils";
import { createContext, failCommand, GlobalOptionsSchema } from "../context";
import {
  EXIT_INPUT_ERROR,
  EXIT_OK,
  type CommandContext,
  type StructuralTree,
} from "../../types";

const IndexOptionsSchema = GlobalOptionsSchema.extend({
  output: z.string().optional(),
});

type Options = z.infer<typeof IndexOptionsSchema>;

/**
 * Index every loadable tree; unreadable trees are reported and skipped,
 * and make the exit code non-zero
 */
export async function runIndex(
  treePaths: string[],
  ctx: CommandContext,
  output: string = path.join(ctx.config.build.outDir, "symbols.index.json"),
): Promise<number> {
  const { tracker, logger } = ctx;

  const loaded = await Promise.all(
    treePaths.map(async (treePath) => {
      try {
        return await loadTree(treePath);
      } catch (error) {
        tracker.trackError(treePath, error, "tree");
        return null;
      }
    }),
  );
  const trees = loaded.filter((tree): tree is StructuralTree => tree !== null);

  const entries = indexSymbols(trees);
  try {
    await writeJson(output, entries);
  } catch (error) {
    tracker.trackError(output, error, "tree", "write");
    return EXIT_INPUT_ERROR;
  }

  logger.info(`Wrote ${output} with ${entries.length} symbols`);
  return tracker.hasInputIssues() ? EXIT_INPUT_ERROR : EXIT_OK;
}

export async function indexCommand(
  trees: string[],
  _opts: Options,
  command: Command,
): Promise<void> {
  let ctx: CommandContext | undefined;

  try {
    const options = IndexOptionsSchema.parse(command.optsWithGlobals());
    ctx = await createContext(options);

    process.exitCode = await runIndex(trees, ctx, options.output);
    displayIssues(ctx.tracker.getIssues(), ctx.verbose);
  } catch (error) {
    failCommand(error, ctx);
  }
}
