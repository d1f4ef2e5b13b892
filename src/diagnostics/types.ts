/**
 * Diagnostic records shared by every pipeline stage.
 *
 * Diagnostics are advisory data. Only programming errors between the front
 * end and the engine are thrown.
 *
 * @packageDocumentation
 */

import type { ContractSubsectionName } from '../schema/types.js';

/**
 * Diagnostic codes, grouped by the stage that emits them.
 */
export type DiagnosticCode =
  // Documentation Parser
  | 'ParseError'
  // Fact Extractor
  | 'UnreadableBodyError'
  | 'UnconditionalRaiseNotice'
  // Contract Validator, in check order
  | 'MissingSectionError'
  | 'UnknownSectionError'
  | 'FormattingError'
  | 'EmptyContractBlockError'
  | 'RedundantContractError'
  | 'UnverifiedRaiseError'
  | 'MissingContractsError'
  // Contract Synthesizer
  | 'SynthesisUnresolvedError'
  // Engine
  | 'ElementFailedError';

/**
 * Diagnostic severity.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A single finding about one element.
 */
export interface Diagnostic {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Section the finding is about; may be an unknown section name. */
  readonly section?: string;
  readonly subsection?: ContractSubsectionName;
  /** The contract statement the finding is about. */
  readonly statement?: string;
  /** 1-indexed line within the dedented documentation or body text. */
  readonly line?: number;
}
