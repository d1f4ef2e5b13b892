/**
 * Documentation Parser: turns raw documentation text into a Section Tree.
 *
 * @packageDocumentation
 */

import type { ElementKind } from '../element/types.js';
import { getSchemaRule, isContractSubsection, isTopLevelSection } from '../schema/registry.js';
import type { ContractSubsectionName, SectionName } from '../schema/types.js';
import type {
  BlankLineGap,
  ContractBlock,
  MappingEntry,
  SectionTree,
  UnknownSection,
} from './types.js';
import { EMPTY_SECTION_TREE } from './types.js';

/**
 * Error thrown when documentation text is malformed beyond recovery.
 *
 * Callers treat it as recoverable: the element falls back to an empty
 * Section Tree and the error becomes a diagnostic.
 */
export class ParseError extends Error {
  /** 1-indexed line within the dedented text. */
  public readonly line: number;
  /** Section being parsed when the error occurred, if any. */
  public readonly section: string | undefined;

  /**
   * Creates a new ParseError.
   *
   * @param message - Descriptive error message.
   * @param line - Offending line.
   * @param section - Section being parsed.
   */
  constructor(message: string, line: number, section?: string) {
    super(message);
    this.name = 'ParseError';
    this.line = line;
    this.section = section;
  }
}

/** `NAME:` optionally followed by inline text. */
const HEADER_PATTERN = /^([A-Z][A-Z0-9_]*):\s*(.*)$/;

/** `name: value` where the name holds no whitespace. */
const ENTRY_PATTERN = /^([^\s:][^\s:]*)\s*:\s*(.*)$/;

type TextSection = 'PURPOSE' | 'DESCRIPTION' | 'RETURNS';
type MappingSection = 'ATTRIBUTES' | 'ARGUMENTS';

type Cursor =
  | { readonly kind: 'start' }
  | { readonly kind: 'preamble' }
  | { readonly kind: 'text'; readonly section: TextSection }
  | { readonly kind: 'mapping'; readonly section: MappingSection }
  | { readonly kind: 'contracts' }
  | { readonly kind: 'subsection'; readonly name: ContractSubsectionName }
  | { readonly kind: 'unknown' };

interface DraftEntry {
  name: string;
  parts: string[];
}

/**
 * Mutable accumulator used while scanning; frozen into a SectionTree at
 * the end of a parse.
 */
interface Draft {
  preamble: string[];
  texts: Map<TextSection, string[]>;
  mappings: Map<MappingSection, DraftEntry[]>;
  contracts: Map<ContractSubsectionName, string[]> | undefined;
  seenSections: Set<SectionName>;
  unknownSections: UnknownSection[];
  blankLineGaps: BlankLineGap[];
}

/**
 * Normalizes documentation text into lines: line endings unified, the
 * first line stripped, the common indentation of the remaining lines
 * removed, and leading or trailing blank lines dropped.
 *
 * @param text - Raw documentation text.
 * @returns The dedented lines.
 */
export function dedentLines(text: string): string[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const [first = '', ...rest] = lines;

  let commonIndent = Number.POSITIVE_INFINITY;
  for (const line of rest) {
    if (line.trim() === '') {
      continue;
    }
    commonIndent = Math.min(commonIndent, line.length - line.trimStart().length);
  }
  if (!Number.isFinite(commonIndent)) {
    commonIndent = 0;
  }

  const result = [first.trim(), ...rest.map((line) => line.slice(commonIndent).trimEnd())];

  while (result.length > 0 && result[0] === '') {
    result.shift();
  }
  while (result.length > 0 && result[result.length - 1] === '') {
    result.pop();
  }
  return result;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function joinParts(parts: readonly string[]): string {
  return parts
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function stripBullet(text: string): string {
  return text.startsWith('-') ? text.slice(1).trim() : text.trim();
}

/**
 * Scans dedented lines and fills a draft.
 */
class DocumentationScanner {
  private readonly draft: Draft = {
    preamble: [],
    texts: new Map(),
    mappings: new Map(),
    contracts: undefined,
    seenSections: new Set(),
    unknownSections: [],
    blankLineGaps: [],
  };

  private cursor: Cursor = { kind: 'start' };
  private inContracts = false;
  private subsectionIndent: number | undefined;
  private entryIndent: number | undefined;
  private lastHeader: SectionName | ContractSubsectionName | undefined;
  private sawBlank = false;

  constructor(private readonly kind: ElementKind) {}

  scan(lines: readonly string[]): Draft {
    lines.forEach((raw, index) => {
      this.scanLine(raw, index + 1);
    });
    return this.draft;
  }

  private scanLine(raw: string, line: number): void {
    if (raw.trim() === '') {
      this.sawBlank = true;
      return;
    }

    const trimmed = raw.trim();
    const indent = indentOf(raw);
    const header = HEADER_PATTERN.exec(trimmed);

    if (header !== null) {
      const name = header[1] ?? '';
      const inline = (header[2] ?? '').trim();

      // Indented `RETURNS:` and the like are entries or prose, not headers.
      if (isTopLevelSection(name) && indent === 0) {
        this.openSection(name, inline, line);
        return;
      }
      if (isContractSubsection(name) && this.inContracts) {
        this.openSubsection(name, inline, indent, line);
        return;
      }
      if (this.isUnknownHeader(trimmed, indent)) {
        const nested = this.inContracts && indent > 0;
        this.draft.unknownSections.push({ name, nested, line });
        if (!nested) {
          this.inContracts = false;
        }
        this.cursor = { kind: 'unknown' };
        this.sawBlank = false;
        return;
      }
    }

    this.sawBlank = false;
    this.addContent(trimmed, indent, line);
  }

  /**
   * Decides whether an `UPPER_CASE:` line that is not a legal header starts
   * an unknown section or is ordinary content. Only headers at their
   * level's indentation count.
   */
  private isUnknownHeader(trimmed: string, indent: number): boolean {
    if (this.inContracts) {
      if (trimmed.startsWith('-')) {
        return false;
      }
      return this.subsectionIndent === undefined || indent <= this.subsectionIndent;
    }
    return indent === 0;
  }

  private recordGap(after: SectionName | ContractSubsectionName, line: number): void {
    if (this.sawBlank && this.lastHeader !== undefined) {
      this.draft.blankLineGaps.push({ before: this.lastHeader, after, line });
    }
    this.sawBlank = false;
    this.lastHeader = after;
  }

  private openSection(name: SectionName, inline: string, line: number): void {
    if (this.draft.seenSections.has(name)) {
      throw new ParseError(`Duplicate ${name} section in ${this.kind} documentation`, line, name);
    }
    this.draft.seenSections.add(name);
    this.recordGap(name, line);
    this.inContracts = false;
    this.subsectionIndent = undefined;
    this.entryIndent = undefined;

    switch (name) {
      case 'PURPOSE':
      case 'DESCRIPTION':
      case 'RETURNS':
        this.draft.texts.set(name, inline === '' ? [] : [inline]);
        this.cursor = { kind: 'text', section: name };
        break;
      case 'ATTRIBUTES':
      case 'ARGUMENTS':
        this.draft.mappings.set(name, []);
        this.cursor = { kind: 'mapping', section: name };
        if (inline !== '') {
          this.addEntry(name, inline, undefined, line);
        }
        break;
      case 'CONTRACTS':
        if (inline !== '') {
          throw new ParseError('CONTRACTS header takes no inline text', line, name);
        }
        this.draft.contracts = new Map();
        this.inContracts = true;
        this.cursor = { kind: 'contracts' };
        break;
    }
  }

  private openSubsection(
    name: ContractSubsectionName,
    inline: string,
    indent: number,
    line: number
  ): void {
    const contracts = this.draft.contracts ?? new Map<ContractSubsectionName, string[]>();
    if (contracts.has(name)) {
      throw new ParseError(`Duplicate ${name} subsection`, line, name);
    }
    this.recordGap(name, line);
    this.subsectionIndent ??= indent;

    const statements: string[] = [];
    const first = stripBullet(inline);
    if (first !== '') {
      statements.push(first);
    }
    contracts.set(name, statements);
    this.draft.contracts = contracts;
    this.cursor = { kind: 'subsection', name };
  }

  private addContent(trimmed: string, indent: number, line: number): void {
    const cursor = this.cursor;

    switch (cursor.kind) {
      case 'start':
      case 'preamble':
        this.draft.preamble.push(trimmed);
        this.cursor = { kind: 'preamble' };
        return;
      case 'text':
        this.draft.texts.get(cursor.section)?.push(trimmed);
        return;
      case 'mapping':
        this.addEntry(cursor.section, trimmed, indent, line);
        return;
      case 'contracts':
        throw new ParseError('Contract statement outside of a subsection', line, 'CONTRACTS');
      case 'subsection':
        this.addStatement(cursor.name, trimmed);
        return;
      case 'unknown':
        return;
    }
  }

  private addEntry(
    section: MappingSection,
    trimmed: string,
    indent: number | undefined,
    line: number
  ): void {
    const entries = this.draft.mappings.get(section);
    if (entries === undefined) {
      return;
    }
    const previous = entries[entries.length - 1];

    if (
      previous !== undefined &&
      indent !== undefined &&
      this.entryIndent !== undefined &&
      indent > this.entryIndent
    ) {
      previous.parts.push(trimmed);
      return;
    }

    const match = ENTRY_PATTERN.exec(trimmed);
    if (match === null) {
      if (previous !== undefined) {
        previous.parts.push(trimmed);
        return;
      }
      throw new ParseError(
        `Expected 'name: description' entry in ${section}, got '${trimmed}'`,
        line,
        section
      );
    }

    const name = match[1] ?? '';
    if (entries.some((entry) => entry.name === name)) {
      throw new ParseError(`Duplicate entry '${name}' in ${section}`, line, section);
    }
    if (indent !== undefined) {
      this.entryIndent ??= indent;
    }
    entries.push({ name, parts: [match[2] ?? ''] });
  }

  private addStatement(name: ContractSubsectionName, trimmed: string): void {
    const statements = this.draft.contracts?.get(name);
    if (statements === undefined) {
      return;
    }
    if (trimmed.startsWith('-')) {
      const statement = stripBullet(trimmed);
      if (statement !== '') {
        statements.push(statement);
      }
      return;
    }
    const lastIndex = statements.length - 1;
    const last = statements[lastIndex];
    if (last === undefined) {
      statements.push(trimmed);
    } else {
      statements[lastIndex] = `${last} ${trimmed}`;
    }
  }
}

function freezeEntries(entries: readonly DraftEntry[] | undefined): MappingEntry[] | undefined {
  return entries?.map((entry) => ({ name: entry.name, value: joinParts(entry.parts) }));
}

function freezeText(parts: readonly string[] | undefined): string | undefined {
  return parts === undefined ? undefined : joinParts(parts);
}

function freezeContracts(
  contracts: Map<ContractSubsectionName, string[]> | undefined
): ContractBlock | undefined {
  if (contracts === undefined) {
    return undefined;
  }
  const clean = (name: ContractSubsectionName): string[] =>
    (contracts.get(name) ?? []).map((statement) => joinParts([statement]));
  return {
    precondition: clean('PRECONDITION'),
    postcondition: clean('POSTCONDITION'),
    raises: clean('RAISES'),
  };
}

/**
 * Parses documentation text into a Section Tree.
 *
 * Section headers are recognized by exact keyword match. Blank lines
 * between sections and unknown headers do not fail the parse; they are
 * recorded in the tree's layout for the validator.
 *
 * @param text - The element's documentation text, or undefined when none
 *   is attached.
 * @param kind - Kind of the owning element.
 * @returns The parsed Section Tree; empty when the text is absent or blank.
 * @throws ParseError for duplicate sections, subsections or entries, and
 *   for content that belongs to no section.
 * @throws SchemaLookupError if `kind` is not recognized.
 *
 * @example
 * ```typescript
 * const tree = parseDocumentation('PURPOSE: Move funds\nDESCRIPTION: Debits the account.', 'method');
 * console.log(tree.purpose); // "Move funds"
 * ```
 */
export function parseDocumentation(text: string | undefined, kind: ElementKind): SectionTree {
  getSchemaRule(kind);

  if (text === undefined || text.trim() === '') {
    return EMPTY_SECTION_TREE;
  }

  const draft = new DocumentationScanner(kind).scan(dedentLines(text));

  const purpose = freezeText(draft.texts.get('PURPOSE'));
  const description = freezeText(draft.texts.get('DESCRIPTION'));
  const returns = freezeText(draft.texts.get('RETURNS'));
  const attributes = freezeEntries(draft.mappings.get('ATTRIBUTES'));
  const args = freezeEntries(draft.mappings.get('ARGUMENTS'));
  const contracts = freezeContracts(draft.contracts);
  const preamble = draft.preamble.length > 0 ? joinParts(draft.preamble) : undefined;

  return {
    ...(purpose !== undefined && { purpose }),
    ...(description !== undefined && { description }),
    ...(attributes !== undefined && { attributes }),
    ...(args !== undefined && { arguments: args }),
    ...(returns !== undefined && { returns }),
    ...(contracts !== undefined && { contracts }),
    ...(preamble !== undefined && { preamble }),
    layout: {
      unknownSections: draft.unknownSections,
      blankLineGaps: draft.blankLineGaps,
    },
  };
}
