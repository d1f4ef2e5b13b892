/**
 * Report module.
 *
 * @packageDocumentation
 */

export type { AnalysisReport, ElementReport, ElementStatus, ReportSummary } from './types.js';
export { buildElementReport, formatReport, renderReportJson, summarizeReports } from './renderer.js';
export { formatModuleMap } from './module-map.js';
