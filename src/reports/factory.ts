/**
 * Report item construction and severity helpers.
 *
 * @packageDocumentation
 */

import type {
  ForceCode,
  ForceOptions,
  ReportItem,
  ReportKind,
  ReportPayloads,
  ReportSeverity,
} from './types.js';

/**
 * Builds a report item of the given kind.
 *
 * @param kind - The report kind.
 * @param severity - ERROR or WARNING.
 * @param forceCode - Force code for a forceable error, otherwise null.
 * @param payload - Kind-specific payload.
 * @returns A frozen report item.
 */
export function reportItem<K extends ReportKind>(
  kind: K,
  severity: ReportSeverity,
  forceCode: ForceCode | null,
  payload: ReportPayloads[K]
): ReportItem<K> {
  return Object.freeze({ kind, severity, forceCode, payload });
}

/**
 * Builds a non-forceable error.
 */
export function error<K extends ReportKind>(kind: K, payload: ReportPayloads[K]): ReportItem<K> {
  return reportItem(kind, 'ERROR', null, payload);
}

/**
 * Builds a warning.
 */
export function warning<K extends ReportKind>(kind: K, payload: ReportPayloads[K]): ReportItem<K> {
  return reportItem(kind, 'WARNING', null, payload);
}

/**
 * Function that creates a report item with a severity fixed in advance.
 */
export type ProblemCreator = <K extends ReportKind>(
  kind: K,
  payload: ReportPayloads[K]
) => ReportItem<K>;

/**
 * Returns a report creator whose severity is decided once, when a check is
 * constructed.
 *
 * Without a force code every problem is a plain error. With a force code the
 * problem is a forceable error, or a warning when it has already been forced.
 *
 * @param force - Force settings of the check.
 * @returns A creator producing items with the decided severity.
 */
export function getProblemCreator(force: ForceOptions = {}): ProblemCreator {
  const { forceCode, allowExtra = false } = force;
  if (forceCode === undefined) {
    return error;
  }
  if (allowExtra) {
    return warning;
  }
  return (kind, payload) => reportItem(kind, 'ERROR', forceCode, payload);
}

/**
 * Force settings for value checks.
 *
 * @param forceCode - Code the caller passes back to force the problem.
 * @param allowExtraValues - Whether the caller already forced it.
 */
export function allowExtraValues(forceCode: ForceCode, allowExtraValues: boolean): ForceOptions {
  return { forceCode, allowExtra: allowExtraValues };
}

/**
 * Force settings for option name checks.
 *
 * @param forceCode - Code the caller passes back to force the problem.
 * @param allowExtraNames - Whether the caller already forced it.
 */
export function allowExtraNames(forceCode: ForceCode, allowExtraNames: boolean): ForceOptions {
  return { forceCode, allowExtra: allowExtraNames };
}

/**
 * Type guard narrowing a report item to one kind.
 *
 * @example
 * ```typescript
 * const names = reports.filter((r) => isReportOf(r, 'DuplicateNodeNames'));
 * names[0]?.payload.names;
 * ```
 */
export function isReportOf<K extends ReportKind>(
  item: ReportItem,
  kind: K
): item is ReportItem<K> {
  return item.kind === kind;
}

/**
 * Whether any item blocks the operation.
 */
export function hasErrors(reports: readonly ReportItem[]): boolean {
  return reports.some((item) => item.severity === 'ERROR');
}

/**
 * Splits report items by severity, keeping their order.
 */
export function splitBySeverity(reports: readonly ReportItem[]): {
  errors: ReportItem[];
  warnings: ReportItem[];
} {
  return {
    errors: reports.filter((item) => item.severity === 'ERROR'),
    warnings: reports.filter((item) => item.severity === 'WARNING'),
  };
}
