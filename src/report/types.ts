/**
 * Report types: per-element outcomes of an engine run.
 *
 * @packageDocumentation
 */

import type { Diagnostic } from '../diagnostics/types.js';
import type { ElementKind } from '../element/types.js';

/**
 * Outcome for one element.
 *
 * - `compliant`: documentation passed validation
 * - `regenerated`: canonical text was synthesized
 * - `unresolved`: a required section could not be synthesized
 * - `failed`: strict raise verification failed, or processing threw
 */
export type ElementStatus = 'compliant' | 'regenerated' | 'unresolved' | 'failed';

/**
 * Report record for one element.
 */
export interface ElementReport {
  readonly qualifiedPath: string;
  readonly kind: ElementKind;
  readonly status: ElementStatus;
  /** Parser, extractor, validator and synthesis diagnostics, in that order. */
  readonly diagnostics: readonly Diagnostic[];
  /** Canonical text, present only for `regenerated` records. */
  readonly regeneratedText?: string;
}

/**
 * Counts of records by status.
 */
export interface ReportSummary {
  readonly total: number;
  readonly compliant: number;
  readonly regenerated: number;
  readonly unresolved: number;
  readonly failed: number;
}

/**
 * Result of analyzing a whole Element Tree.
 */
export interface AnalysisReport {
  /** One record per element, in pre-order. */
  readonly records: readonly ElementReport[];
  readonly summary: ReportSummary;
}
