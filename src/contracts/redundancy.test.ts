import { describe, expect, it } from 'vitest';
import { parseDocumentation } from '../docs/parser.js';
import type { Element } from '../element/types.js';
import { isRedundantStatement, redundancySubjects } from './redundancy.js';

const lookupUser: Element = {
  kind: 'function',
  name: 'lookupUser',
  qualifiedPath: 'users.lookupUser',
  signature: { kind: 'callable', parameters: [{ name: 'user_id', type: 'number', hasDefault: false }] },
  returnType: 'User',
  children: [],
};

const lookupDoc = parseDocumentation(
  [
    'PURPOSE: Find a user.',
    'DESCRIPTION: Reads the user from the session store.',
    'ARGUMENTS:',
    "    user_id: int - the user's id",
    'RETURNS: User - the matching user record',
  ].join('\n'),
  'function'
);

describe('redundancySubjects', () => {
  it('should merge signature types with documented entries and add the return value', () => {
    expect(redundancySubjects(lookupUser, lookupDoc)).toEqual([
      { aliases: ['user_id'], types: ['number', 'int'], description: "the user's id" },
      {
        aliases: ['result', 'return', 'returns', 'returned'],
        types: ['User'],
        description: 'the matching user record',
      },
    ]);
  });

  it('should omit the return subject when nothing is returned', () => {
    const withoutReturn: Element = {
      kind: 'function',
      name: 'lookupUser',
      qualifiedPath: 'users.lookupUser',
      signature: lookupUser.signature,
      children: [],
    };
    const tree = parseDocumentation('PURPOSE: Find a user.', 'function');
    expect(redundancySubjects(withoutReturn, tree)).toEqual([
      { aliases: ['user_id'], types: ['number'], description: undefined },
    ]);
  });
});

describe('isRedundantStatement', () => {
  const subjects = redundancySubjects(lookupUser, lookupDoc);

  it('should flag a precondition that only restates the declared type', () => {
    expect(isRedundantStatement('user_id is a positive int', subjects, 'low')).toBe(true);
  });

  it('should accept a precondition that adds a checkable predicate', () => {
    expect(isRedundantStatement('user_id exists in the active session', subjects, 'low')).toBe(false);
  });

  it('should require the statement to mention a subject', () => {
    expect(isRedundantStatement('the cache holds an int', subjects, 'high')).toBe(false);
  });

  it('should flag any type mention at high sensitivity only', () => {
    const statement = 'user_id is a non-negative int below the limit';
    expect(isRedundantStatement(statement, subjects, 'low')).toBe(false);
    expect(isRedundantStatement(statement, subjects, 'high')).toBe(true);
  });

  it('should flag a statement that repeats an entry description', () => {
    expect(isRedundantStatement('result is the matching user record', subjects, 'low')).toBe(true);
  });

  it('should compare description overlap against the sensitivity threshold', () => {
    const recordSubjects = redundancySubjects(
      lookupUser,
      parseDocumentation('PURPOSE: a\nARGUMENTS:\n    user_id: the active account identifier', 'function')
    );
    // Shares two of four distinct content words.
    const statement = 'user_id is an active account record';
    expect(isRedundantStatement(statement, recordSubjects, 'high')).toBe(true);
    expect(isRedundantStatement(statement, recordSubjects, 'low')).toBe(false);
  });
});
