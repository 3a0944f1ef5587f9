/**
 * Error carrying report items out of an operation that cannot continue.
 *
 * @packageDocumentation
 */

import { splitBySeverity } from './factory.js';
import type { ReportItem } from './types.js';

/**
 * Raised by the constraint builder and by {@link assertNoErrors}.
 */
export class ReportListError extends Error {
  /** Report items explaining the failure. */
  public readonly reports: readonly ReportItem[];

  /**
   * Creates a new ReportListError.
   *
   * @param reports - Report items explaining the failure.
   * @param message - Summary message; derived from the report kinds when omitted.
   */
  constructor(reports: readonly ReportItem[], message?: string) {
    super(message ?? `Operation refused: ${reports.map((r) => r.kind).join(', ')}`);
    this.name = 'ReportListError';
    this.reports = reports;
  }
}

/**
 * Applies the commit policy: throws when any ERROR is present.
 *
 * Warnings never block.
 *
 * @param reports - Collected report items of a validation pass.
 * @throws ReportListError listing the errors.
 */
export function assertNoErrors(reports: readonly ReportItem[]): void {
  const { errors } = splitBySeverity(reports);
  if (errors.length > 0) {
    throw new ReportListError(
      errors,
      `Validation failed with ${String(errors.length)} error(s): ${errors.map((r) => r.kind).join(', ')}`
    );
  }
}
