/**
 * Schema Registry module.
 *
 * @packageDocumentation
 */

export type {
  ContractRequirement,
  ContractSubsectionName,
  SchemaRule,
  SectionApplicability,
  SectionName,
  SectionRequirement,
} from './types.js';

export {
  CONTRACT_SUBSECTIONS,
  SchemaLookupError,
  TOP_LEVEL_SECTIONS,
  getSchemaRule,
  isContractSubsection,
  isElementKind,
  isTopLevelSection,
  requiredSectionsFor,
} from './registry.js';
