/**
 * Section Tree types: the structured form of documentation text.
 *
 * @packageDocumentation
 */

import type { ContractSubsectionName, SectionName } from '../schema/types.js';

/**
 * One `name: value` entry of an ATTRIBUTES or ARGUMENTS section.
 */
export interface MappingEntry {
  readonly name: string;
  /** Everything after the colon, usually `Type - description`. */
  readonly value: string;
}

/**
 * The CONTRACTS composite. An empty list means the subsection is absent.
 */
export interface ContractBlock {
  readonly precondition: readonly string[];
  readonly postcondition: readonly string[];
  readonly raises: readonly string[];
}

/**
 * A header whose name is outside the legal set.
 */
export interface UnknownSection {
  readonly name: string;
  /** Whether the header appeared inside a CONTRACTS block. */
  readonly nested: boolean;
  readonly line: number;
}

/**
 * A blank line separating two consecutive sections or subsections.
 */
export interface BlankLineGap {
  /** Section or subsection preceding the gap. */
  readonly before: SectionName | ContractSubsectionName;
  /** Section or subsection following the gap. */
  readonly after: SectionName | ContractSubsectionName;
  /** Line of the header following the gap. */
  readonly line: number;
}

/**
 * Layout observations made while parsing, consumed by the validator.
 */
export interface DocumentLayout {
  readonly unknownSections: readonly UnknownSection[];
  readonly blankLineGaps: readonly BlankLineGap[];
}

/**
 * Structured parse of an element's documentation.
 *
 * An absent key means the section is absent.
 */
export interface SectionTree {
  readonly purpose?: string;
  readonly description?: string;
  readonly attributes?: readonly MappingEntry[];
  readonly arguments?: readonly MappingEntry[];
  readonly returns?: string;
  readonly contracts?: ContractBlock;
  /** Free text that appeared before the first header. */
  readonly preamble?: string;
  readonly layout: DocumentLayout;
}

/**
 * A tree with no sections, used for absent documentation and as the
 * fallback after a parse failure.
 */
export const EMPTY_SECTION_TREE: SectionTree = {
  layout: { unknownSections: [], blankLineGaps: [] },
};
