/**
 * Run Tracker
 * Unified tracking for stats and input issues
 */

import { toInputError } from "./errors";
import type { InputIssue, InputIssueType, RunStats } from "../types";

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private issues: InputIssue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Record a failure from reading, parsing or writing an input
   */
  trackError(
    path: string,
    error: unknown,
    type: InputIssueType,
    context: "read" | "write" = "read",
  ): void {
    const { reason, message } = toInputError(path, error, context);
    this.issues.push({ type, path, reason, details: message });
  }

  getIssues(type?: InputIssueType): InputIssue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  /**
   * Whether any input (not configuration) failed; configuration problems
   * fall back to defaults and do not fail a run
   */
  hasInputIssues(): boolean {
    return this.issues.some((i) => i.type !== "config");
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RunStats {
    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      issues: this.issues,
      duration: Date.now() - this.startTime.getTime(),
    };
  }
}
