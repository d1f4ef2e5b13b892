/**
 * Contract Synthesizer: regenerates documentation that passes validation.
 *
 * @packageDocumentation
 */

import type { DiagnosticCode, Diagnostic } from '../diagnostics/types.js';
import type { ContractBlock, MappingEntry, SectionTree } from '../docs/types.js';
import { hasContractStatements, isEntryName, serializeSectionTree } from '../docs/serializer.js';
import { type Element, attributesOf, parametersOf } from '../element/types.js';
import type { Fact } from '../facts/types.js';
import { normalizeSourceText } from '../facts/conditions.js';
import type { SectionName } from '../schema/types.js';
import { requiredSectionsFor } from '../schema/registry.js';
import { type RedundancySensitivity, isRedundantStatement, redundancySubjects } from '../contracts/redundancy.js';
import { contractsMandatory, deriveContracts, isVerifiedRaise } from '../contracts/derive.js';

/**
 * Error thrown when a required section cannot be produced from the
 * element's own signature, body or documentation.
 */
export class SynthesisUnresolvedError extends Error {
  /** The section that could not be produced. */
  public readonly section: SectionName;
  public readonly qualifiedPath: string;

  /**
   * Creates a new SynthesisUnresolvedError.
   *
   * @param section - The unresolved section.
   * @param qualifiedPath - Path of the element being synthesized.
   */
  constructor(section: SectionName, qualifiedPath: string) {
    super(`Cannot synthesize ${section} for '${qualifiedPath}'`);
    this.name = 'SynthesisUnresolvedError';
    this.section = section;
    this.qualifiedPath = qualifiedPath;
  }
}

/**
 * Options for {@link synthesizeDocumentation}.
 */
export interface SynthesisOptions {
  readonly redundancySensitivity: RedundancySensitivity;
  /** Require CONTRACTS on every class. */
  readonly contractMandatoryForClasses: boolean;
}

/** Diagnostics that send the CONTRACTS block back through synthesis. */
const CONTRACT_DIAGNOSTICS: ReadonlySet<DiagnosticCode> = new Set<DiagnosticCode>([
  'MissingContractsError',
  'EmptyContractBlockError',
  'RedundantContractError',
  'UnverifiedRaiseError',
]);

function present(text: string | undefined): text is string {
  return text !== undefined && text !== '';
}

/**
 * Splits preamble prose into its first sentence and the remainder.
 */
function splitFirstSentence(text: string): { first: string; rest: string } {
  const match = /^(.+?[.!?])(?:\s+(.*))?$/.exec(text);
  if (match === null) {
    return { first: text, rest: '' };
  }
  return { first: match[1] ?? text, rest: (match[2] ?? '').trim() };
}

interface ProseSections {
  readonly purpose: string;
  readonly description: string;
}

/**
 * Fills PURPOSE and DESCRIPTION, drawing on preamble text for whatever the
 * author left out. Preamble text not consumed is appended to DESCRIPTION.
 */
function resolveProse(element: Element, tree: SectionTree): ProseSections {
  let remaining = tree.preamble ?? '';

  let purpose = tree.purpose;
  if (!present(purpose) && remaining !== '') {
    const split = splitFirstSentence(remaining);
    purpose = split.first;
    remaining = split.rest;
  }

  let description = tree.description;
  if (!present(description) && remaining !== '') {
    description = remaining;
    remaining = '';
  }
  if (present(description) && remaining !== '') {
    description = `${description} ${remaining}`;
  }

  if (!present(purpose)) {
    throw new SynthesisUnresolvedError('PURPOSE', element.qualifiedPath);
  }
  if (!present(description)) {
    throw new SynthesisUnresolvedError('DESCRIPTION', element.qualifiedPath);
  }
  return { purpose, description };
}

/**
 * Builds mapping entries from declared names and types, reusing any entry
 * the author already wrote for the same name. A name the parser would not
 * read back as an entry is written by position instead (`arg0`, `attr1`),
 * and a repeated name is written once.
 */
function entriesFromSignature(
  declared: readonly { readonly name: string; readonly type: string }[],
  prior: readonly MappingEntry[] | undefined,
  positionalPrefix: string
): MappingEntry[] {
  const entries: MappingEntry[] = [];
  declared.forEach((item, index) => {
    const name = isEntryName(item.name) ? item.name : `${positionalPrefix}${String(index)}`;
    if (entries.some((entry) => entry.name === name)) {
      return;
    }
    entries.push(prior?.find((entry) => entry.name === name) ?? { name, value: normalizeSourceText(item.type) });
  });
  return entries;
}

function unique(statements: readonly string[]): string[] {
  return Array.from(new Set(statements));
}

/**
 * Rebuilds the CONTRACTS block: author statements that are verified and
 * not redundant, followed by derived statements not already present.
 */
function rebuildContracts(
  element: Element,
  tree: SectionTree,
  facts: readonly Fact[],
  options: SynthesisOptions
): ContractBlock | undefined {
  const authored = tree.contracts ?? { precondition: [], postcondition: [], raises: [] };
  const subjects = redundancySubjects(element, tree);
  const informative = (statement: string): boolean =>
    !isRedundantStatement(statement, subjects, options.redundancySensitivity);

  const derived = deriveContracts(element, tree, facts, options.redundancySensitivity);
  const block: ContractBlock = {
    precondition: unique([...authored.precondition.filter(informative), ...derived.precondition]),
    postcondition: unique([...authored.postcondition.filter(informative), ...derived.postcondition]),
    raises: unique([...authored.raises.filter((statement) => isVerifiedRaise(statement, facts)), ...derived.raises]),
  };

  if (hasContractStatements(block)) {
    return block;
  }
  if (contractsMandatory(element, derived, options)) {
    throw new SynthesisUnresolvedError('CONTRACTS', element.qualifiedPath);
  }
  return undefined;
}

/**
 * Produces canonical documentation text for an element.
 *
 * Sections that passed validation are kept as written. Missing PURPOSE and
 * DESCRIPTION come from preamble prose only; missing ATTRIBUTES, ARGUMENTS
 * and RETURNS come from the signature. Any contract diagnostic rebuilds the
 * whole CONTRACTS block from verified author statements and derived ones;
 * a block left with no statements is omitted.
 *
 * The output validates cleanly against the same facts, and synthesizing
 * it again yields the same text.
 *
 * @param element - The element being documented.
 * @param tree - Its parsed documentation.
 * @param facts - Facts extracted from its body.
 * @param diagnostics - Validator diagnostics for the tree.
 * @param options - Synthesis options.
 * @returns Canonical documentation text.
 * @throws SynthesisUnresolvedError when a required section cannot be
 *   produced.
 *
 * @example
 * ```typescript
 * const text = synthesizeDocumentation(transfer, tree, facts, diagnostics, options);
 * // ...
 * // CONTRACTS:
 * //     POSTCONDITION:
 * //         - this.balance reflects amount deducted
 * //     RAISES:
 * //         - InsufficientFundsError - when this.balance < amount
 * ```
 */
export function synthesizeDocumentation(
  element: Element,
  tree: SectionTree,
  facts: readonly Fact[],
  diagnostics: readonly Diagnostic[],
  options: SynthesisOptions
): string {
  const required = new Set(requiredSectionsFor(element));
  const { purpose, description } = resolveProse(element, tree);

  const attributes =
    required.has('ATTRIBUTES') && (tree.attributes === undefined || tree.attributes.length === 0)
      ? entriesFromSignature(attributesOf(element), tree.attributes, 'attr')
      : tree.attributes;
  const args =
    required.has('ARGUMENTS') && (tree.arguments === undefined || tree.arguments.length === 0)
      ? entriesFromSignature(parametersOf(element), tree.arguments, 'arg')
      : tree.arguments;
  const returns =
    required.has('RETURNS') && !present(tree.returns) && element.returnType !== undefined
      ? normalizeSourceText(element.returnType)
      : tree.returns;

  const resolved: SectionTree = {
    purpose,
    description,
    ...(attributes !== undefined && { attributes }),
    ...(args !== undefined && { arguments: args }),
    ...(returns !== undefined && { returns }),
    layout: { unknownSections: [], blankLineGaps: [] },
  };

  const rebuild = diagnostics.some((diagnostic) => CONTRACT_DIAGNOSTICS.has(diagnostic.code));
  const contracts = rebuild ? rebuildContracts(element, resolved, facts, options) : tree.contracts;

  return serializeSectionTree({
    ...resolved,
    ...(contracts !== undefined && { contracts }),
  });
}
