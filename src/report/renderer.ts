/**
 * Report rendering: structured records, JSON output and a human-readable
 * summary.
 *
 * @packageDocumentation
 */

import type { Diagnostic } from '../diagnostics/types.js';
import type { Element } from '../element/types.js';
import type { AnalysisReport, ElementReport, ElementStatus, ReportSummary } from './types.js';

/**
 * Pairs an element with its outcome.
 *
 * @param element - The analyzed element.
 * @param status - Its outcome.
 * @param diagnostics - Diagnostics in pipeline order.
 * @param regeneratedText - Synthesized text, kept only for `regenerated`.
 */
export function buildElementReport(
  element: Element,
  status: ElementStatus,
  diagnostics: readonly Diagnostic[],
  regeneratedText?: string
): ElementReport {
  return {
    qualifiedPath: element.qualifiedPath,
    kind: element.kind,
    status,
    diagnostics,
    ...(status === 'regenerated' && regeneratedText !== undefined && { regeneratedText }),
  };
}

/**
 * Counts records by status.
 *
 * @param records - Element records.
 */
export function summarizeReports(records: readonly ElementReport[]): ReportSummary {
  const count = (status: ElementStatus): number =>
    records.filter((record) => record.status === status).length;

  return {
    total: records.length,
    compliant: count('compliant'),
    regenerated: count('regenerated'),
    unresolved: count('unresolved'),
    failed: count('failed'),
  };
}

function diagnosticToJson(diagnostic: Diagnostic): Record<string, string | number> {
  return {
    code: diagnostic.code,
    severity: diagnostic.severity,
    message: diagnostic.message,
    ...(diagnostic.section !== undefined && { section: diagnostic.section }),
    ...(diagnostic.subsection !== undefined && { subsection: diagnostic.subsection }),
    ...(diagnostic.statement !== undefined && { statement: diagnostic.statement }),
    ...(diagnostic.line !== undefined && { line: diagnostic.line }),
  };
}

/**
 * Renders a report as JSON with a fixed key order, so identical runs
 * produce identical bytes.
 *
 * @param report - The analysis report.
 * @returns Pretty-printed JSON.
 */
export function renderReportJson(report: AnalysisReport): string {
  const payload = {
    summary: {
      total: report.summary.total,
      compliant: report.summary.compliant,
      regenerated: report.summary.regenerated,
      unresolved: report.summary.unresolved,
      failed: report.summary.failed,
    },
    records: report.records.map((record) => ({
      qualifiedPath: record.qualifiedPath,
      kind: record.kind,
      status: record.status,
      diagnostics: record.diagnostics.map(diagnosticToJson),
      ...(record.regeneratedText !== undefined && { regeneratedText: record.regeneratedText }),
    })),
  };
  return JSON.stringify(payload, null, 2);
}

const STATUS_MARKERS: Record<ElementStatus, string> = {
  compliant: '✓',
  regenerated: '↻',
  unresolved: '?',
  failed: '✗',
};

/**
 * Formats a report for people.
 *
 * @param report - The analysis report.
 * @returns Multi-line text: a summary, then every element that is not
 *   compliant with its diagnostics.
 *
 * @example
 * ```ts
 * console.log(formatReport(report));
 * // "Documentation Report
 * // ====================
 * // Elements analyzed: 4
 * // ..."
 * ```
 */
export function formatReport(report: AnalysisReport): string {
  const lines: string[] = [];

  lines.push('Documentation Report');
  lines.push('====================');
  lines.push('');
  lines.push(`Elements analyzed: ${String(report.summary.total)}`);
  lines.push(
    `Compliant: ${String(report.summary.compliant)}, Regenerated: ${String(report.summary.regenerated)}, Unresolved: ${String(report.summary.unresolved)}, Failed: ${String(report.summary.failed)}`
  );

  const attention = report.records.filter((record) => record.status !== 'compliant');
  if (attention.length === 0) {
    return lines.join('\n');
  }

  lines.push('');
  lines.push('Elements');
  lines.push('--------');

  for (const record of attention) {
    lines.push(`${STATUS_MARKERS[record.status]} ${record.qualifiedPath} (${record.kind}): ${record.status}`);
    for (const diagnostic of record.diagnostics) {
      const where = diagnostic.section !== undefined ? ` [${diagnostic.section}]` : '';
      lines.push(`    ${diagnostic.severity} ${diagnostic.code}${where}: ${diagnostic.message}`);
    }
  }

  return lines.join('\n');
}
