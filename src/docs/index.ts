/**
 * Documentation module: Section Tree types, parser and serializer.
 *
 * @packageDocumentation
 */

export type {
  BlankLineGap,
  ContractBlock,
  DocumentLayout,
  MappingEntry,
  SectionTree,
  UnknownSection,
} from './types.js';

export { EMPTY_SECTION_TREE } from './types.js';

export { ParseError, dedentLines, parseDocumentation } from './parser.js';

export type { EntryParts } from './serializer.js';

export { hasContractStatements, isEntryName, serializeSectionTree, splitEntryValue } from './serializer.js';
