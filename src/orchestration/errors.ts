/**
 * Orchestration errors
 */

import type { BulkRunReport } from "@/types";

/**
 * Run options rejected before any network call is made
 */
export class BulkRunValidationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid bulk run options: ${issues.join("; ")}`);
    this.name = "BulkRunValidationError";
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BulkRunValidationError);
    }
  }
}

/**
 * A fail-hard item failure stopped the run; `report` holds the counts so far
 */
export class BulkRunAbortedError extends Error {
  public readonly report: BulkRunReport;

  constructor(report: BulkRunReport, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Bulk run aborted after ${report.success} succeeded and ${report.failed} failed: ${reason}`,
      { cause },
    );
    this.name = "BulkRunAbortedError";
    this.report = report;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BulkRunAbortedError);
    }
  }
}
