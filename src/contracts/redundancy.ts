/**
 * Redundancy heuristic for contract statements.
 *
 * A PRECONDITION or POSTCONDITION statement is redundant when it tells the
 * reader nothing the signature or the ARGUMENTS/ATTRIBUTES/RETURNS entries
 * already say. DESCRIPTION is prose and is never consulted.
 *
 * @packageDocumentation
 */

import type { SectionTree } from '../docs/types.js';
import { splitEntryValue } from '../docs/serializer.js';
import { type Element, attributesOf, parametersOf } from '../element/types.js';

/**
 * How eagerly statements are flagged.
 *
 * - `low`: a statement must restate every token of a declared type with at
 *   most one other content word, or closely repeat an entry description
 * - `high`: any declared type token or a looser word overlap suffices
 */
export type RedundancySensitivity = 'low' | 'high';

/**
 * Something a statement can be about: an argument, an attribute or the
 * return value.
 */
export interface RedundancySubject {
  /** Lowercase words that refer to the subject. */
  readonly aliases: readonly string[];
  /** Declared types from the signature and the documentation entry. */
  readonly types: readonly string[];
  /** Entry description written by the author, if any. */
  readonly description: string | undefined;
}

/** Word overlap at or above which a statement repeats a description. */
const OVERLAP_THRESHOLDS: Record<RedundancySensitivity, number> = {
  high: 0.5,
  low: 0.8,
};

const RETURN_ALIASES = ['result', 'return', 'returns', 'returned'];

/** Type tokens that say nothing about the value. */
const IGNORED_TYPE_TOKENS = new Set(['null', 'undefined', 'readonly', 'keyof', 'typeof']);

const STOPWORDS = new Set([
  'a',
  'an',
  'the',
  'is',
  'are',
  'be',
  'must',
  'should',
  'of',
  'to',
  'and',
  'or',
  'not',
  'it',
  'its',
  'this',
  'that',
  'argument',
  'value',
]);

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9_]+/g) ?? [];
}

function typeTokens(type: string): string[] {
  const tokens = (type.match(/[A-Za-z_$][\w$]*/g) ?? [])
    .map((token) => token.toLowerCase())
    .filter((token) => token.length >= 2 && !IGNORED_TYPE_TOKENS.has(token));
  return Array.from(new Set(tokens));
}

function contentWords(text: string): Set<string> {
  return new Set(words(text).filter((word) => !STOPWORDS.has(word)));
}

function jaccard(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  if (left.size === 0 || right.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of left) {
    if (right.has(word)) {
      shared += 1;
    }
  }
  return shared / (left.size + right.size - shared);
}

function normalizePhrase(text: string): string {
  return words(text).join(' ');
}

/**
 * Builds the subjects a statement about this element may mention.
 *
 * Signature parameters and attributes are merged with the documented
 * ARGUMENTS and ATTRIBUTES entries by name. The return value is a subject
 * when the element declares a return type or documents RETURNS.
 *
 * @param element - The documented element.
 * @param tree - Its parsed documentation.
 */
export function redundancySubjects(element: Element, tree: SectionTree): RedundancySubject[] {
  const byName = new Map<string, { types: string[]; description: string | undefined }>();

  const declare = (name: string, type: string | undefined, description: string | undefined): void => {
    const existing = byName.get(name) ?? { types: [], description: undefined };
    if (type !== undefined && type !== '' && !existing.types.includes(type)) {
      existing.types.push(type);
    }
    if (description !== undefined && description !== '' && existing.description === undefined) {
      existing.description = description;
    }
    byName.set(name, existing);
  };

  for (const parameter of parametersOf(element)) {
    declare(parameter.name, parameter.type, undefined);
  }
  for (const attribute of attributesOf(element)) {
    declare(attribute.name, attribute.type, undefined);
  }
  for (const entry of [...(tree.arguments ?? []), ...(tree.attributes ?? [])]) {
    const parts = splitEntryValue(entry.value);
    declare(entry.name, parts.type, parts.description);
  }

  const subjects: RedundancySubject[] = Array.from(byName.entries()).map(([name, info]) => ({
    aliases: [name.toLowerCase()],
    types: info.types,
    description: info.description,
  }));

  const returnParts = tree.returns !== undefined ? splitEntryValue(tree.returns) : undefined;
  const returnTypes = [element.returnType, returnParts?.type].filter(
    (type): type is string => type !== undefined && type !== ''
  );
  if (returnTypes.length > 0 || returnParts !== undefined) {
    subjects.push({
      aliases: RETURN_ALIASES,
      types: Array.from(new Set(returnTypes)),
      description: returnParts?.description === '' ? undefined : returnParts?.description,
    });
  }

  return subjects;
}

function restatesType(
  statementWords: readonly string[],
  subject: RedundancySubject,
  sensitivity: RedundancySensitivity
): boolean {
  const present = new Set(statementWords);

  return subject.types.some((type) => {
    const tokens = typeTokens(type).filter((token) => !subject.aliases.includes(token));
    if (tokens.length === 0) {
      return false;
    }
    if (sensitivity === 'high') {
      return tokens.some((token) => present.has(token));
    }
    if (!tokens.every((token) => present.has(token))) {
      return false;
    }
    const remaining = statementWords.filter(
      (word) => !STOPWORDS.has(word) && !subject.aliases.includes(word) && !tokens.includes(word)
    );
    return new Set(remaining).size <= 1;
  });
}

function restatesDescription(
  statement: string,
  subject: RedundancySubject,
  sensitivity: RedundancySensitivity
): boolean {
  if (subject.description === undefined) {
    return false;
  }
  const phrase = normalizePhrase(subject.description);
  const statementPhrase = normalizePhrase(statement);
  if (phrase === '' || statementPhrase === '') {
    return false;
  }
  if (statementPhrase.includes(phrase) || phrase.includes(statementPhrase)) {
    return true;
  }
  const subjectWords = new Set(subject.aliases);
  const withoutSubject = (text: string): Set<string> =>
    new Set(Array.from(contentWords(text)).filter((word) => !subjectWords.has(word)));
  return jaccard(withoutSubject(statement), withoutSubject(subject.description)) >= OVERLAP_THRESHOLDS[sensitivity];
}

/**
 * Decides whether a contract statement restates what the signature or the
 * mapping entries already say about one of its subjects.
 *
 * @param statement - A PRECONDITION or POSTCONDITION statement.
 * @param subjects - Subjects from {@link redundancySubjects}.
 * @param sensitivity - How eagerly to flag statements.
 *
 * @example
 * ```typescript
 * // ARGUMENTS: user_id: int - the user's id
 * isRedundantStatement('user_id is a positive int', subjects, 'low');            // true
 * isRedundantStatement('user_id exists in the active session', subjects, 'low'); // false
 * ```
 */
export function isRedundantStatement(
  statement: string,
  subjects: readonly RedundancySubject[],
  sensitivity: RedundancySensitivity
): boolean {
  const statementWords = words(statement);

  return subjects.some((subject) => {
    if (!subject.aliases.some((alias) => statementWords.includes(alias))) {
      return false;
    }
    return restatesType(statementWords, subject, sensitivity) || restatesDescription(statement, subject, sensitivity);
  });
}
