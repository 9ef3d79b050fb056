/**
 * Summary command - Renders trees as markdown outlines
 */

import { z } from "zod";
import type { Command } from "commander";
import { summarize, displayIssues } from "../../modules";
import { InputError, loadTree, writeText } from "../../utils";
import { createContext, failCommand, GlobalOptionsSchema } from "../context";
import { EXIT_INPUT_ERROR, EXIT_OK, type CommandContext } from "../../types";

const SummaryOptionsSchema = GlobalOptionsSchema.extend({
  output: z.string().optional(),
});

type Options = z.infer<typeof SummaryOptionsSchema>;

/**
 * "foo.cpp.lst.json" -> "foo.cpp.md"
 */
export function summaryPath(treePath: string): string {
  return `${treePath.replace(/(?:\.lst)?\.json$/, "")}.md`;
}

/**
 * Write one outline per tree, next to it. `output` names the outline file
 * and is only accepted for a single tree.
 */
export async function runSummary(
  treePaths: string[],
  ctx: CommandContext,
  output?: string,
): Promise<number> {
  const { tracker, logger } = ctx;

  if (output && treePaths.length > 1) {
    tracker.trackError(
      output,
      new InputError("write-error", output, "--output takes a single tree"),
      "tree",
      "write",
    );
    return EXIT_INPUT_ERROR;
  }

  tracker.setTotalFiles(treePaths.length);

  for (const treePath of treePaths) {
    const target = output ?? summaryPath(treePath);
    try {
      const tree = await loadTree(treePath);
      await writeText(target, summarize(tree));
      logger.info(`Wrote ${target}`);
      tracker.incrementSuccessful();
    } catch (error) {
      tracker.trackError(treePath, error, "tree");
      tracker.incrementFailed();
    }
  }

  return tracker.hasInputIssues() ? EXIT_INPUT_ERROR : EXIT_OK;
}

export async function summaryCommand(
  trees: string[],
  _opts: Options,
  command: Command,
): Promise<void> {
  let ctx: CommandContext | undefined;

  try {
    const options = SummaryOptionsSchema.parse(command.optsWithGlobals());
    ctx = await createContext(options);

    process.exitCode = await runSummary(trees, ctx, options.output);
    displayIssues(ctx.tracker.getIssues(), ctx.verbose);
  } catch (error) {
    failCommand(error, ctx);
  }
}
