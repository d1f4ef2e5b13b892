/**
 * Canonical serialization of Section Trees.
 *
 * @packageDocumentation
 */

import type { ContractBlock, MappingEntry, SectionTree } from './types.js';

const INDENT = '    ';

/**
 * Splits a mapping entry or RETURNS value into its type and description.
 */
export interface EntryParts {
  /** Declared type written in the documentation, if any. */
  readonly type: string | undefined;
  readonly description: string;
}

/** A bare type such as `Money`, `string[]`, `Map<string, User> | null`. */
const TYPE_ONLY_PATTERN = /^[\w$.]+(?:<[^<>]*>)?(?:\[\])*(?:\s*\|\s*[\w$.]+(?:<[^<>]*>)?(?:\[\])*)*$/;

/**
 * Splits `Type - description` into its parts. A value without ` - ` is a
 * type when it looks like one, and a description otherwise.
 *
 * @param value - The text after `name:` or `RETURNS:`.
 *
 * @example
 * ```typescript
 * splitEntryValue("int - the user's id"); // { type: 'int', description: "the user's id" }
 * splitEntryValue('Money');               // { type: 'Money', description: '' }
 * ```
 */
export function splitEntryValue(value: string): EntryParts {
  const trimmed = value.trim();
  const separator = trimmed.indexOf(' - ');
  if (separator >= 0) {
    return {
      type: trimmed.slice(0, separator).trim() || undefined,
      description: trimmed.slice(separator + 3).trim(),
    };
  }
  if (TYPE_ONLY_PATTERN.test(trimmed)) {
    return { type: trimmed, description: '' };
  }
  return { type: undefined, description: trimmed };
}

/**
 * Checks whether a contract block has at least one statement.
 *
 * @param block - The block to inspect.
 */
export function hasContractStatements(block: ContractBlock): boolean {
  return block.precondition.length > 0 || block.postcondition.length > 0 || block.raises.length > 0;
}

/** Mapping entry names the parser accepts: no whitespace and no colon. */
const ENTRY_NAME_PATTERN = /^[^\s:]+$/;

/**
 * Checks whether a name can head a `name: value` mapping entry.
 *
 * @param name - Candidate entry name.
 */
export function isEntryName(name: string): boolean {
  return ENTRY_NAME_PATTERN.test(name);
}

/** Values are written on one line; the parser joins continuation lines anyway. */
function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function pushText(lines: string[], header: string, value: string | undefined): void {
  const text = value === undefined ? '' : oneLine(value);
  if (text !== '') {
    lines.push(`${header}: ${text}`);
  }
}

function pushMapping(lines: string[], header: string, entries: readonly MappingEntry[] | undefined): void {
  if (entries === undefined || entries.length === 0) {
    return;
  }
  lines.push(`${header}:`);
  for (const entry of entries) {
    const value = oneLine(entry.value);
    lines.push(value === '' ? `${INDENT}${entry.name}:` : `${INDENT}${entry.name}: ${value}`);
  }
}

function pushSubsection(lines: string[], header: string, statements: readonly string[]): void {
  if (statements.length === 0) {
    return;
  }
  lines.push(`${INDENT}${header}:`);
  for (const statement of statements) {
    lines.push(`${INDENT}${INDENT}- ${statement}`);
  }
}

function cleanStatements(statements: readonly string[]): string[] {
  return statements.map(oneLine).filter((statement) => statement !== '');
}

/**
 * Writes a Section Tree as canonical documentation text.
 *
 * Sections appear in canonical order with four-space indentation and no
 * blank lines; every value is written on a single line. Empty sections,
 * empty contract subsections, and a CONTRACTS block without statements
 * are omitted. Preamble and layout information
 * are not written.
 *
 * @param tree - The tree to serialize.
 * @returns Documentation text without a trailing newline.
 */
export function serializeSectionTree(tree: SectionTree): string {
  const lines: string[] = [];

  pushText(lines, 'PURPOSE', tree.purpose);
  pushText(lines, 'DESCRIPTION', tree.description);
  pushMapping(lines, 'ATTRIBUTES', tree.attributes);
  pushMapping(lines, 'ARGUMENTS', tree.arguments);
  pushText(lines, 'RETURNS', tree.returns);

  if (tree.contracts !== undefined) {
    const contracts: ContractBlock = {
      precondition: cleanStatements(tree.contracts.precondition),
      postcondition: cleanStatements(tree.contracts.postcondition),
      raises: cleanStatements(tree.contracts.raises),
    };
    if (hasContractStatements(contracts)) {
      lines.push('CONTRACTS:');
      pushSubsection(lines, 'PRECONDITION', contracts.precondition);
      pushSubsection(lines, 'POSTCONDITION', contracts.postcondition);
      pushSubsection(lines, 'RAISES', contracts.raises);
    }
  }

  return lines.join('\n');
}
