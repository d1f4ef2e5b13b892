/**
 * Diagnostics module.
 *
 * @packageDocumentation
 */

export type { Diagnostic, DiagnosticCode, DiagnosticSeverity } from './types.js';
