/**
 * Contract derivation and the redundancy heuristic.
 *
 * @packageDocumentation
 */

export {
  type RedundancySensitivity,
  type RedundancySubject,
  isRedundantStatement,
  redundancySubjects,
} from './redundancy.js';

export {
  type ContractApplicabilityOptions,
  contractsMandatory,
  deriveContracts,
  formatRaisesStatement,
  isVerifiedRaise,
  raisedExceptionName,
} from './derive.js';
