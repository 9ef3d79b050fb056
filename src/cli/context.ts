/**
 * Command context - Loads config and sets up tracking and logging
 */

import { z, ZodError } from "zod";
import { loadConfig, Logger, toInputError, Tracker } from "../utils";
import { EXIT_INPUT_ERROR, type CommandContext } from "../types";

export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/**
 * Load configuration (default → user → custom) and track its errors
 */
export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const { config, errors } = await loadConfig(options.config);

  if (options.verbose) {
    config.logging.level = "debug";
  }

  const tracker = new Tracker();
  const logger = new Logger(config.logging.level);

  for (const err of errors) {
    tracker.trackError(err.path, err.error, "config");
    logger.warn(`Ignoring invalid config file ${err.path}`);
  }

  return { config, tracker, logger, verbose: options.verbose };
}

/**
 * Report an error that aborted a command. Invalid options count as input
 * errors like any other.
 */
export function failCommand(error: unknown, ctx?: CommandContext): void {
  const logger = ctx?.logger ?? new Logger();
  if (error instanceof ZodError) {
    logger.error(`Invalid options: ${toInputError("options", error).message}`);
  } else {
    logger.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = EXIT_INPUT_ERROR;
}
