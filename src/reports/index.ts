/**
 * Report items: the structured diagnostics produced by every check.
 *
 * @packageDocumentation
 */

export type {
  ExportedConstraint,
  ExportedResourceSet,
  ForceCode,
  ForceOptions,
  ReportItem,
  ReportKind,
  ReportPayloads,
  ReportSeverity,
} from './types.js';
export type { ProblemCreator } from './factory.js';
export {
  allowExtraNames,
  allowExtraValues,
  error,
  getProblemCreator,
  hasErrors,
  isReportOf,
  reportItem,
  splitBySeverity,
  warning,
} from './factory.js';
export { assertNoErrors, ReportListError } from './errors.js';
