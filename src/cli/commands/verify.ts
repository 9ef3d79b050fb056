/**
 * Verify command - Checks trees reproduce their sources byte for byte
 */

import path from "node:path";
import { z } from "zod";
import type { Command } from "commander";
import { verify, displayIssues, displayVerification } from "../../modules";
import { loadTree, readSource } from "../../utils";
import { createContext, failCommand, GlobalOptionsSchema } from "../context";
import {
  EXIT_INPUT_ERROR,
  EXIT_MISMATCH,
  EXIT_OK,
  type CommandContext,
  type VerificationResult,
} from "../../types";

const VerifyOptionsSchema = GlobalOptionsSchema.extend({
  root: z.string().optional(),
});

type Options = z.infer<typeof VerifyOptionsSchema>;

/**
 * Verify each tree against the source its "file" field names, resolved
 * against `root`. Input errors take precedence over mismatches in the exit
 * code.
 */
export async function runVerify(
  treePaths: string[],
  ctx: CommandContext,
  root: string = process.cwd(),
): Promise<{ code: number; results: Map<string, VerificationResult> }> {
  const { tracker } = ctx;
  const results = new Map<string, VerificationResult>();
  tracker.setTotalFiles(treePaths.length);

  // Sequential so report lines follow argument order
  for (const treePath of treePaths) {
    try {
      const tree = await loadTree(treePath);
      const source = await readSource(path.resolve(root, tree.file));
      const result = verify(tree, source);

      results.set(treePath, result);
      displayVerification(treePath, result);
      if (result.ok) tracker.incrementSuccessful();
      else tracker.incrementFailed();
    } catch (error) {
      tracker.trackError(treePath, error, "tree");
    }
  }

  if (tracker.hasInputIssues()) return { code: EXIT_INPUT_ERROR, results };
  const allOk = [...results.values()].every((r) => r.ok);
  return { code: allOk ? EXIT_OK : EXIT_MISMATCH, results };
}

export async function verifyCommand(
  trees: string[],
  _opts: Options,
  command: Command,
): Promise<void> {
  let ctx: CommandContext | undefined;

  try {
    const options = VerifyOptionsSchema.parse(command.optsWithGlobals());
    ctx = await createContext(options);

    const { code } = await runVerify(trees, ctx, options.root);
    displayIssues(ctx.tracker.getIssues(), ctx.verbose);
    process.exitCode = code;
  } catch (error) {
    failCommand(error, ctx);
  }
}
