/**
 * Command-line program for structmatch
 * Builds lossless structural trees of C-family sources, verifies them and
 * compares an origin tree with its port
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { verifyCommand } from "./commands/verify";
import { compareCommand } from "./commands/compare";
import { summaryCommand } from "./commands/summary";
import { indexCommand } from "./commands/index-symbols";
import { configCommand } from "./commands/config";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("structmatch")
    .description("Lossless structural trees for C-family sources, verified and compared")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-v, --verbose", "Verbose output");

  program
    .command("build <paths...>")
    .description("Build .lst.json trees for source files and directories")
    .option("-o, --out-dir <dir>", "Output directory for tree artifacts")
    .option("--stdout", "Print trees as JSON instead of writing files")
    .action(buildCommand);

  program
    .command("verify <trees...>")
    .description("Check that trees reproduce their sources byte for byte")
    .option("--root <dir>", "Directory the trees' file paths are relative to")
    .action(verifyCommand);

  program
    .command("compare <origin> <ported>")
    .description("Compare two trees as multisets of (kind, name) tokens")
    .option("-m, --mapping <path>", "Rename/ignore mapping JSON")
    .option("-t, --top <n>", "Number of differences to show")
    .option("--json", "Print the comparison result as JSON")
    .action(compareCommand);

  program
    .command("summary <trees...>")
    .description("Render trees as markdown outlines")
    .option("-o, --output <path>", "Output .md path for a single tree (default: alongside each tree)")
    .action(summaryCommand);

  program
    .command("index <trees...>")
    .description("Index symbols (kind, name) across trees")
    .option("-o, --output <path>", "Output JSON path")
    .action(indexCommand);

  // Config command - show config location
  program
    .command("config")
    .description("Show configuration file location")
    .action(configCommand);

  return program;
}
