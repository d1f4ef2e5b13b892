/**
 * Schema Registry: declarative documentation rules per element kind.
 *
 * @packageDocumentation
 */

import type { Element, ElementKind } from '../element/types.js';
import { attributesOf, parametersOf } from '../element/types.js';
import type {
  ContractSubsectionName,
  SchemaRule,
  SectionName,
  SectionRequirement,
} from './types.js';

/**
 * Error thrown when the registry is queried with a kind it does not know.
 *
 * Signals a contract violation between the front end and the engine, so
 * it aborts the run instead of becoming a diagnostic.
 */
export class SchemaLookupError extends Error {
  /** The unrecognized kind. */
  public readonly kind: string;

  /**
   * Creates a new SchemaLookupError.
   *
   * @param kind - The kind that was looked up.
   */
  constructor(kind: string) {
    super(`No schema rule for element kind '${kind}'`);
    this.name = 'SchemaLookupError';
    this.kind = kind;
  }
}

/**
 * Legal top-level section names, in canonical order.
 */
export const TOP_LEVEL_SECTIONS: readonly SectionName[] = [
  'PURPOSE',
  'DESCRIPTION',
  'ATTRIBUTES',
  'ARGUMENTS',
  'RETURNS',
  'CONTRACTS',
];

/**
 * Legal CONTRACTS subsection names, in canonical order.
 */
export const CONTRACT_SUBSECTIONS: readonly ContractSubsectionName[] = [
  'PRECONDITION',
  'POSTCONDITION',
  'RAISES',
];

const CALLABLE_SECTIONS: readonly SectionRequirement[] = [
  { section: 'PURPOSE', when: 'always' },
  { section: 'DESCRIPTION', when: 'always' },
  { section: 'ARGUMENTS', when: 'has-parameters' },
  { section: 'RETURNS', when: 'has-return-type' },
];

const SCHEMA_RULES: Readonly<Record<ElementKind, SchemaRule>> = {
  module: {
    kind: 'module',
    requiredSections: [
      { section: 'PURPOSE', when: 'always' },
      { section: 'DESCRIPTION', when: 'always' },
    ],
    contracts: { mandatory: 'never', legalSubsections: CONTRACT_SUBSECTIONS },
  },
  class: {
    kind: 'class',
    requiredSections: [
      { section: 'PURPOSE', when: 'always' },
      { section: 'DESCRIPTION', when: 'always' },
      { section: 'ATTRIBUTES', when: 'has-attributes' },
    ],
    contracts: { mandatory: 'when-enforcing-invariants', legalSubsections: CONTRACT_SUBSECTIONS },
  },
  method: {
    kind: 'method',
    requiredSections: CALLABLE_SECTIONS,
    contracts: { mandatory: 'when-derivable', legalSubsections: CONTRACT_SUBSECTIONS },
  },
  function: {
    kind: 'function',
    requiredSections: CALLABLE_SECTIONS,
    contracts: { mandatory: 'when-derivable', legalSubsections: CONTRACT_SUBSECTIONS },
  },
};

/**
 * Checks if a string names a recognized element kind.
 *
 * @param value - The value to check.
 * @returns True if the value is an element kind.
 */
export function isElementKind(value: string): value is ElementKind {
  return Object.prototype.hasOwnProperty.call(SCHEMA_RULES, value);
}

/**
 * Checks if a header name is a legal top-level section.
 *
 * @param name - Header name without the trailing colon.
 */
export function isTopLevelSection(name: string): name is SectionName {
  return TOP_LEVEL_SECTIONS.some((section) => section === name);
}

/**
 * Checks if a header name is a legal CONTRACTS subsection.
 *
 * @param name - Header name without the trailing colon.
 */
export function isContractSubsection(name: string): name is ContractSubsectionName {
  return CONTRACT_SUBSECTIONS.some((subsection) => subsection === name);
}

/**
 * Looks up the schema rule for an element kind.
 *
 * @param kind - The element kind. Accepts any string so that kinds coming
 *   from an external front end can be checked here.
 * @returns The schema rule for the kind.
 * @throws SchemaLookupError if the kind is not recognized.
 */
export function getSchemaRule(kind: string): SchemaRule {
  if (!isElementKind(kind)) {
    throw new SchemaLookupError(kind);
  }
  return SCHEMA_RULES[kind];
}

/**
 * Evaluates the schema's required sections against one element.
 *
 * @param element - The element being documented.
 * @returns The sections this element must carry, in canonical order.
 * @throws SchemaLookupError if the element's kind is not recognized.
 */
export function requiredSectionsFor(element: Element): SectionName[] {
  const rule = getSchemaRule(element.kind);

  return rule.requiredSections
    .filter((requirement) => {
      switch (requirement.when) {
        case 'always':
          return true;
        case 'has-parameters':
          return parametersOf(element).length > 0;
        case 'has-attributes':
          return attributesOf(element).length > 0;
        case 'has-return-type':
          return element.returnType !== undefined && element.returnType.trim() !== '';
      }
    })
    .map((requirement) => requirement.section);
}
