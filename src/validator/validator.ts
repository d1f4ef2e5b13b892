/**
 * Contract Validator: checks a Section Tree against the schema and the
 * element's facts.
 *
 * @packageDocumentation
 */

import type { ContractSubsectionName } from '../schema/types.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { SectionTree } from '../docs/types.js';
import { hasContractStatements } from '../docs/serializer.js';
import type { Element } from '../element/types.js';
import type { Fact } from '../facts/types.js';
import { requiredSectionsFor } from '../schema/registry.js';
import { type RedundancySensitivity, isRedundantStatement, redundancySubjects } from '../contracts/redundancy.js';
import { contractsMandatory, deriveContracts, isVerifiedRaise } from '../contracts/derive.js';

/**
 * Options controlling validation strictness.
 */
export interface ValidationOptions {
  /** Report unverified RAISES entries as errors instead of warnings. */
  readonly strictRaises: boolean;
  readonly redundancySensitivity: RedundancySensitivity;
  /** Require CONTRACTS on every class. */
  readonly contractMandatoryForClasses: boolean;
}

/**
 * Default validation options.
 */
export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  strictRaises: false,
  redundancySensitivity: 'low',
  contractMandatoryForClasses: false,
};

function sectionValue(tree: SectionTree, section: string): unknown {
  switch (section) {
    case 'PURPOSE':
      return tree.purpose;
    case 'DESCRIPTION':
      return tree.description;
    case 'ATTRIBUTES':
      return tree.attributes;
    case 'ARGUMENTS':
      return tree.arguments;
    case 'RETURNS':
      return tree.returns;
    case 'CONTRACTS':
      return tree.contracts;
    default:
      return undefined;
  }
}

/**
 * Checks whether a section carries content. Empty text and mappings
 * without entries count as missing.
 */
export function sectionPresent(tree: SectionTree, section: string): boolean {
  const value = sectionValue(tree, section);
  if (value === undefined) {
    return false;
  }
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
}

function checkMissingSections(element: Element, tree: SectionTree): Diagnostic[] {
  return requiredSectionsFor(element)
    .filter((section) => !sectionPresent(tree, section))
    .map((section): Diagnostic => ({
      code: 'MissingSectionError',
      severity: 'error',
      message: `Required section ${section} is missing`,
      section,
    }));
}

function checkUnknownSections(tree: SectionTree): Diagnostic[] {
  return tree.layout.unknownSections.map((unknown): Diagnostic => ({
    code: 'UnknownSectionError',
    severity: 'error',
    message: unknown.nested
      ? `Unknown subsection ${unknown.name} inside CONTRACTS`
      : `Unknown section ${unknown.name}`,
    section: unknown.name,
    line: unknown.line,
  }));
}

function checkFormatting(tree: SectionTree): Diagnostic[] {
  const diagnostics: Diagnostic[] = tree.layout.blankLineGaps.map((gap): Diagnostic => ({
    code: 'FormattingError',
    severity: 'error',
    message: `Blank line between ${gap.before} and ${gap.after}`,
    section: gap.after,
    line: gap.line,
  }));

  if (tree.preamble !== undefined) {
    diagnostics.push({
      code: 'FormattingError',
      severity: 'error',
      message: 'Text outside any section',
      line: 1,
    });
  }

  return diagnostics;
}

function checkEmptyContractBlock(tree: SectionTree): Diagnostic[] {
  if (tree.contracts === undefined || hasContractStatements(tree.contracts)) {
    return [];
  }
  return [
    {
      code: 'EmptyContractBlockError',
      severity: 'error',
      message: 'CONTRACTS block has no statements',
      section: 'CONTRACTS',
    },
  ];
}

function checkRedundancy(element: Element, tree: SectionTree, options: ValidationOptions): Diagnostic[] {
  if (tree.contracts === undefined) {
    return [];
  }
  const subjects = redundancySubjects(element, tree);
  const diagnostics: Diagnostic[] = [];

  const scan = (subsection: ContractSubsectionName, statements: readonly string[]): void => {
    for (const statement of statements) {
      if (isRedundantStatement(statement, subjects, options.redundancySensitivity)) {
        diagnostics.push({
          code: 'RedundantContractError',
          severity: 'warning',
          message: `${subsection} statement restates the signature: '${statement}'`,
          section: 'CONTRACTS',
          subsection,
          statement,
        });
      }
    }
  };

  scan('PRECONDITION', tree.contracts.precondition);
  scan('POSTCONDITION', tree.contracts.postcondition);
  return diagnostics;
}

function checkRaises(tree: SectionTree, facts: readonly Fact[], options: ValidationOptions): Diagnostic[] {
  if (tree.contracts === undefined) {
    return [];
  }
  return tree.contracts.raises
    .filter((statement) => !isVerifiedRaise(statement, facts))
    .map((statement): Diagnostic => ({
      code: 'UnverifiedRaiseError',
      severity: options.strictRaises ? 'error' : 'warning',
      message: `No raise site in the body matches '${statement}'`,
      section: 'CONTRACTS',
      subsection: 'RAISES',
      statement,
    }));
}

function checkMissingContracts(
  element: Element,
  tree: SectionTree,
  facts: readonly Fact[],
  options: ValidationOptions
): Diagnostic[] {
  if (tree.contracts !== undefined) {
    return [];
  }
  const derived = deriveContracts(element, tree, facts, options.redundancySensitivity);
  if (!contractsMandatory(element, derived, options)) {
    return [];
  }
  return [
    {
      code: 'MissingContractsError',
      severity: 'error',
      message: 'CONTRACTS block is required for this element',
      section: 'CONTRACTS',
    },
  ];
}

/**
 * Validates an element's documentation.
 *
 * Every check runs; results come back in check order: missing sections,
 * unknown sections, formatting, empty contract block, redundant
 * statements, unverified raises, missing contracts.
 *
 * @param element - The documented element.
 * @param tree - Its parsed documentation.
 * @param facts - Facts extracted from its body.
 * @param options - Validation options.
 * @returns Diagnostics; empty when the documentation is compliant.
 * @throws SchemaLookupError if the element's kind is not recognized.
 */
export function validateDocumentation(
  element: Element,
  tree: SectionTree,
  facts: readonly Fact[],
  options: ValidationOptions = DEFAULT_VALIDATION_OPTIONS
): Diagnostic[] {
  return [
    ...checkMissingSections(element, tree),
    ...checkUnknownSections(tree),
    ...checkFormatting(tree),
    ...checkEmptyContractBlock(tree),
    ...checkRedundancy(element, tree, options),
    ...checkRaises(tree, facts, options),
    ...checkMissingContracts(element, tree, facts, options),
  ];
}
