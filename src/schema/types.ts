/**
 * Type definitions for the Schema Registry.
 *
 * @packageDocumentation
 */

import type { ElementKind } from '../element/types.js';

/**
 * Top-level documentation sections, in canonical order.
 */
export type SectionName =
  | 'PURPOSE'
  | 'DESCRIPTION'
  | 'ATTRIBUTES'
  | 'ARGUMENTS'
  | 'RETURNS'
  | 'CONTRACTS';

/**
 * Subsections of a CONTRACTS block, in canonical order.
 */
export type ContractSubsectionName = 'PRECONDITION' | 'POSTCONDITION' | 'RAISES';

/**
 * When a required section applies to a particular element.
 *
 * - `always`: every element of the kind
 * - `has-parameters`: callables with at least one parameter
 * - `has-attributes`: classes declaring at least one attribute
 * - `has-return-type`: callables with a declared return type
 */
export type SectionApplicability = 'always' | 'has-parameters' | 'has-attributes' | 'has-return-type';

/**
 * A section the schema requires, with its applicability condition.
 */
export interface SectionRequirement {
  readonly section: SectionName;
  readonly when: SectionApplicability;
}

/**
 * How mandatory a CONTRACTS block is for an element kind.
 *
 * - `when-derivable`: required whenever the implementation yields at
 *   least one contract statement (methods, functions)
 * - `when-enforcing-invariants`: required when the class enforces
 *   invariants at construction, or always when configured
 * - `never`: modules carry no contracts
 */
export type ContractRequirement = 'when-derivable' | 'when-enforcing-invariants' | 'never';

/**
 * Schema rule for one element kind.
 */
export interface SchemaRule {
  readonly kind: ElementKind;
  /** Required top-level sections in canonical order. */
  readonly requiredSections: readonly SectionRequirement[];
  readonly contracts: {
    readonly mandatory: ContractRequirement;
    readonly legalSubsections: readonly ContractSubsectionName[];
  };
}
