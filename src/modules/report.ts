/**
 * Report Module
 * Console output for build, verification and comparison runs. Plain-text
 * formatters build the lines; display functions add color.
 */

import chalk from "chalk";
import { formatToken } from "./comparator";
import type {
  ComparisonResult,
  InputIssue,
  RunStats,
  TokenDiff,
  VerificationResult,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Diff lines grouped by side; counts are shown as positive excess
 */
export function formatComparison(result: ComparisonResult): string[] {
  const sizes = `origin ${result.origin_multiset_size} tokens · ported ${result.ported_multiset_size} tokens`;

  if (result.match) {
    return [`[ok] Structural token multiset matches after mapping (${sizes}).`];
  }

  const shown = result.top_diffs.length;
  const lines = [
    `[diff] ${result.total_diffs} differing token(s), showing ${shown} (${sizes}):`,
  ];

  const excess = (diffs: TokenDiff[], title: string) => {
    if (diffs.length === 0) return;
    lines.push(`-- ${title} --`);
    for (const { token, delta } of diffs) {
      lines.push(`${formatToken(token)}\t+${Math.abs(delta)}`);
    }
  };

  excess(
    result.top_diffs.filter((d) => d.delta > 0),
    "In origin more than ported",
  );
  excess(
    result.top_diffs.filter((d) => d.delta < 0),
    "In ported more than origin",
  );

  return lines;
}

export function displayComparison(result: ComparisonResult): void {
  for (const line of formatComparison(result)) {
    if (line.startsWith("[ok]")) console.log(chalk.green(line));
    else if (line.startsWith("[diff]")) console.log(chalk.red(line));
    else if (line.startsWith("--")) console.log(chalk.bold(line));
    else console.log(`  ${line}`);
  }
}

// ============================================================================
// Verification
// ============================================================================

export function formatVerification(path: string, result: VerificationResult): string {
  const lengths = `len(src)=${result.expected_length} len(rebuilt)=${result.actual_length}`;
  if (result.ok) return `${path}: OK  ${lengths}`;
  return `${path}: MISMATCH at byte ${result.first_divergence_offset}  ${lengths}`;
}

export function displayVerification(path: string, result: VerificationResult): void {
  const line = formatVerification(path, result);
  console.log(result.ok ? chalk.green(line) : chalk.red(line));
}

// ============================================================================
// Run Stats
// ============================================================================

/**
 * Summary of a batch run and the issues collected on the way
 */
export function displayStats(
  title: string,
  stats: RunStats,
  verbose?: boolean,
): void {
  const hasErrors = stats.failedFiles > 0 || stats.issues.length > 0;
  const statusIcon = hasErrors ? chalk.red("✖") : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  if (stats.totalFiles > 0) {
    console.log(sectionHeader("Files"));
    console.log(`   ${progressBar(stats.successfulFiles, stats.totalFiles)}`);
    console.log(
      statRow(chalk.green("◉"), "Processed", stats.successfulFiles, chalk.green),
    );
    if (stats.failedFiles > 0) {
      console.log(statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red));
    }
  }

  displayIssues(stats.issues, verbose);
  console.log("");
}

/**
 * Issues grouped by reason; paths and details listed in verbose mode, or
 * when there are only a few
 */
export function displayIssues(issues: InputIssue[], verbose?: boolean): void {
  if (issues.length === 0) return;

  console.log(sectionHeader(chalk.red("Errors")));

  const byReason = new Map<string, InputIssue[]>();
  for (const issue of issues) {
    const group = byReason.get(issue.reason) ?? [];
    group.push(issue);
    byReason.set(issue.reason, group);
  }

  for (const [reason, group] of byReason) {
    console.log(statRow(chalk.red("✖"), reason, group.length, chalk.red));
    if (!verbose && group.length > 3) continue;
    for (const issue of group) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
