/**
 * Contract derivation from facts.
 *
 * The validator and the synthesizer both call {@link deriveContracts}, so a
 * CONTRACTS block is mandatory exactly when synthesis could fill it.
 *
 * @packageDocumentation
 */

import type { ContractBlock, SectionTree } from '../docs/types.js';
import { hasContractStatements } from '../docs/serializer.js';
import type { Element } from '../element/types.js';
import { type Fact, type RaisesFact, UNCONDITIONAL } from '../facts/types.js';
import { getSchemaRule } from '../schema/registry.js';
import { type RedundancySensitivity, isRedundantStatement, redundancySubjects } from './redundancy.js';

/**
 * Formats a raises fact as a RAISES statement.
 *
 * @example
 * ```typescript
 * formatRaisesStatement(fact); // 'InsufficientFundsError - when this.balance < amount'
 * ```
 */
export function formatRaisesStatement(fact: RaisesFact): string {
  return fact.triggerCondition === UNCONDITIONAL
    ? `${fact.exception} - unconditionally`
    : `${fact.exception} - when ${fact.triggerCondition}`;
}

/**
 * Extracts the exception name from a RAISES statement: the text before
 * ` - `, or the first word without a trailing colon.
 *
 * @param statement - A RAISES statement such as `ValueError - when x is absent`.
 */
export function raisedExceptionName(statement: string): string {
  const trimmed = statement.trim();
  const separator = trimmed.indexOf(' - ');
  const head = separator >= 0 ? trimmed.slice(0, separator) : trimmed;
  return (head.split(/\s+/)[0] ?? '').replace(/[:,]$/, '');
}

function lastSegment(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot >= 0 ? name.slice(dot + 1) : name;
}

/**
 * Checks whether a RAISES statement is backed by a raise site in the body.
 * Names match in full or by their last dotted segment.
 *
 * @param statement - A RAISES statement.
 * @param facts - Facts of the element.
 */
export function isVerifiedRaise(statement: string, facts: readonly Fact[]): boolean {
  const name = raisedExceptionName(statement);
  if (name === '') {
    return false;
  }
  return facts.some(
    (fact) =>
      fact.kind === 'raises' &&
      (fact.exception === name || lastSegment(fact.exception) === lastSegment(name))
  );
}

function unique(statements: readonly string[]): string[] {
  return Array.from(new Set(statements));
}

/**
 * Derives the contract statements an element's facts support.
 *
 * - PRECONDITION: guard-clause candidates
 * - POSTCONDITION: unguarded attribute mutations (methods and functions)
 * - RAISES: one statement per distinct raise site
 *
 * Statements the redundancy heuristic flags are left out. Modules yield
 * an empty block.
 *
 * @param element - The documented element.
 * @param tree - Its documentation, used for redundancy subjects.
 * @param facts - Facts of the element.
 * @param sensitivity - Redundancy sensitivity.
 */
export function deriveContracts(
  element: Element,
  tree: SectionTree,
  facts: readonly Fact[],
  sensitivity: RedundancySensitivity
): ContractBlock {
  const rule = getSchemaRule(element.kind);
  if (rule.contracts.mandatory === 'never') {
    return { precondition: [], postcondition: [], raises: [] };
  }

  const subjects = redundancySubjects(element, tree);
  const keep = (statement: string): boolean => !isRedundantStatement(statement, subjects, sensitivity);

  const precondition: string[] = [];
  const postcondition: string[] = [];
  const raises: string[] = [];

  for (const fact of facts) {
    switch (fact.kind) {
      case 'precondition_candidate':
        precondition.push(fact.description);
        break;
      case 'mutates':
        if (rule.contracts.mandatory === 'when-derivable' && !fact.guarded) {
          postcondition.push(fact.description);
        }
        break;
      case 'raises':
        raises.push(formatRaisesStatement(fact));
        break;
      case 'returns':
        break;
    }
  }

  return {
    precondition: unique(precondition.filter(keep)),
    postcondition: unique(postcondition.filter(keep)),
    raises: unique(raises),
  };
}

/**
 * Options deciding when CONTRACTS is mandatory.
 */
export interface ContractApplicabilityOptions {
  /** Require CONTRACTS on every class. */
  readonly contractMandatoryForClasses: boolean;
}

/**
 * Decides whether an element must carry a CONTRACTS block.
 *
 * @param element - The documented element.
 * @param derived - Result of {@link deriveContracts} for the element.
 * @param options - Applicability options.
 */
export function contractsMandatory(
  element: Element,
  derived: ContractBlock,
  options: ContractApplicabilityOptions
): boolean {
  switch (getSchemaRule(element.kind).contracts.mandatory) {
    case 'never':
      return false;
    case 'when-derivable':
      return hasContractStatements(derived);
    case 'when-enforcing-invariants':
      return options.contractMandatoryForClasses || hasContractStatements(derived);
  }
}
