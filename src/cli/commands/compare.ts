/**
 * Compare command - Structural token diff between an origin and a ported tree
 */

import { z } from "zod";
import type { Command } from "commander";
import { compare, displayComparison, displayIssues, EMPTY_MAPPING } from "../../modules";
import { loadMapping, loadTree } from "../../utils";
import { createContext, failCommand, GlobalOptionsSchema } from "../context";
import {
  EXIT_INPUT_ERROR,
  EXIT_MISMATCH,
  EXIT_OK,
  type CommandContext,
  type ComparisonResult,
  type Mapping,
} from "../../types";

const CompareOptionsSchema = GlobalOptionsSchema.extend({
  mapping: z.string().optional(),
  top: z.coerce.number().int().positive().optional(),
  json: z.boolean().optional(),
});

type Options = z.infer<typeof CompareOptionsSchema>;

interface CompareRunOptions {
  mapping?: string;
  top?: number;
}

/**
 * Load both trees and the mapping, then compare. Kinds ignored in the
 * config are added to the mapping's own.
 */
export async function runCompare(
  originPath: string,
  portedPath: string,
  ctx: CommandContext,
  options: CompareRunOptions = {},
): Promise<{ code: number; result?: ComparisonResult }> {
  const { config, tracker, logger } = ctx;

  const load = async <T>(
    path: string,
    type: "tree" | "mapping",
    loader: (path: string) => Promise<T>,
  ): Promise<T | null> => {
    try {
      return await loader(path);
    } catch (error) {
      tracker.trackError(path, error, type);
      return null;
    }
  };

  const [origin, ported, mapping] = await Promise.all([
    load(originPath, "tree", loadTree),
    load(portedPath, "tree", loadTree),
    options.mapping
      ? load(options.mapping, "mapping", loadMapping)
      : Promise.resolve<Mapping>(EMPTY_MAPPING),
  ]);

  if (!origin || !ported || !mapping) {
    return { code: EXIT_INPUT_ERROR };
  }

  const effective: Mapping = {
    ...mapping,
    ignoreKinds: [...new Set([...mapping.ignoreKinds, ...config.compare.ignoreKinds])],
  };

  const result = compare(origin, ported, effective, {
    top: options.top ?? config.compare.top,
  });
  logger.debug(
    `Compared ${result.origin_multiset_size} origin and ${result.ported_multiset_size} ported tokens`,
  );

  return { code: result.match ? EXIT_OK : EXIT_MISMATCH, result };
}

export async function compareCommand(
  origin: string,
  ported: string,
  _opts: Options,
  command: Command,
): Promise<void> {
  let ctx: CommandContext | undefined;

  try {
    const options = CompareOptionsSchema.parse(command.optsWithGlobals());
    ctx = await createContext(options);

    const { code, result } = await runCompare(origin, ported, ctx, options);

    if (result) {
      if (options.json) console.log(JSON.stringify(result, null, 2));
      else displayComparison(result);
    }

    displayIssues(ctx.tracker.getIssues(), ctx.verbose);
    process.exitCode = code;
  } catch (error) {
    failCommand(error, ctx);
  }
}
