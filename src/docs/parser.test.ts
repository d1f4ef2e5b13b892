import { describe, expect, it } from 'vitest';
import { ParseError, dedentLines, parseDocumentation } from './parser.js';
import { EMPTY_SECTION_TREE } from './types.js';

const TRANSFER_DOC = [
  'PURPOSE: Move funds between accounts.',
  'DESCRIPTION: Debits this account and',
  '    credits the target.',
  'ARGUMENTS:',
  '    target: Account - the receiving account',
  '    amount: Money - the amount to move,',
  '        in cents',
  'RETURNS: Receipt - proof of transfer',
  'CONTRACTS:',
  '    PRECONDITION:',
  '        - amount is positive',
  '          and finite',
  '    RAISES:',
  '        - InsufficientFunds: when the balance is too low',
].join('\n');

function expectParseError(text: string, message: string, line: number): void {
  try {
    parseDocumentation(text, 'method');
    expect.fail('Expected ParseError');
  } catch (error) {
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.message).toBe(message);
      expect(error.line).toBe(line);
    }
  }
}

describe('dedentLines', () => {
  it('should strip the first line and the common indentation of the rest', () => {
    expect(dedentLines('  Summary line\n    body\n      nested\n')).toEqual([
      'Summary line',
      'body',
      '  nested',
    ]);
  });

  it('should unify line endings and drop surrounding blank lines', () => {
    expect(dedentLines('\r\nPURPOSE: a\r\nDESCRIPTION: b\r\n\r\n')).toEqual(['PURPOSE: a', 'DESCRIPTION: b']);
  });
});

describe('parseDocumentation', () => {
  it('should return the empty tree for absent or blank text', () => {
    expect(parseDocumentation(undefined, 'function')).toBe(EMPTY_SECTION_TREE);
    expect(parseDocumentation('   \n  ', 'function')).toBe(EMPTY_SECTION_TREE);
  });

  it('should parse every section of a complete document', () => {
    expect(parseDocumentation(TRANSFER_DOC, 'method')).toEqual({
      purpose: 'Move funds between accounts.',
      description: 'Debits this account and credits the target.',
      arguments: [
        { name: 'target', value: 'Account - the receiving account' },
        { name: 'amount', value: 'Money - the amount to move, in cents' },
      ],
      returns: 'Receipt - proof of transfer',
      contracts: {
        precondition: ['amount is positive and finite'],
        postcondition: [],
        raises: ['InsufficientFunds: when the balance is too low'],
      },
      layout: { unknownSections: [], blankLineGaps: [] },
    });
  });

  it('should keep free text before the first header as preamble', () => {
    const tree = parseDocumentation('Moves funds. Quickly and safely.\nPURPOSE: Move funds.', 'function');
    expect(tree.preamble).toBe('Moves funds. Quickly and safely.');
    expect(tree.purpose).toBe('Move funds.');
  });

  it('should treat indented upper-case lines inside a text section as content', () => {
    const tree = parseDocumentation('PURPOSE: a\nDESCRIPTION: Intro\n    NOTE: keep the lock', 'function');
    expect(tree.description).toBe('Intro NOTE: keep the lock');
    expect(tree.layout.unknownSections).toEqual([]);
  });

  it('should read indented section keywords as content rather than headers', () => {
    const description = parseDocumentation('PURPOSE: a\nDESCRIPTION: Intro\n    RETURNS: nothing useful', 'function');
    expect(description.description).toBe('Intro RETURNS: nothing useful');
    expect(description.returns).toBeUndefined();

    const args = parseDocumentation(
      ['PURPOSE: a', 'DESCRIPTION: b', 'ARGUMENTS:', '    RETURNS: string', '    CONTRACTS:', 'RETURNS: number'].join('\n'),
      'function'
    );
    expect(args.arguments).toEqual([
      { name: 'RETURNS', value: 'string' },
      { name: 'CONTRACTS', value: '' },
    ]);
    expect(args.returns).toBe('number');
    expect(args.contracts).toBeUndefined();
  });

  it('should record an empty CONTRACTS block with no statements', () => {
    expect(parseDocumentation('PURPOSE: a\nCONTRACTS:', 'method').contracts).toEqual({
      precondition: [],
      postcondition: [],
      raises: [],
    });
  });

  it('should take a subsection statement written inline with its header', () => {
    const tree = parseDocumentation('PURPOSE: a\nCONTRACTS:\n    RAISES: - Error: always', 'function');
    expect(tree.contracts?.raises).toEqual(['Error: always']);
  });

  it('should keep an entry with no description', () => {
    const tree = parseDocumentation('PURPOSE: a\nARGUMENTS:\n    flag:', 'function');
    expect(tree.arguments).toEqual([{ name: 'flag', value: '' }]);
  });

  describe('layout observations', () => {
    it('should record a blank line between sections', () => {
      const tree = parseDocumentation('PURPOSE: a\n\nDESCRIPTION: b', 'function');
      expect(tree.layout.blankLineGaps).toEqual([{ before: 'PURPOSE', after: 'DESCRIPTION', line: 3 }]);
      expect(tree.description).toBe('b');
    });

    it('should record a blank line between contract subsections', () => {
      const text = 'PURPOSE: a\nCONTRACTS:\n    PRECONDITION:\n        - x is set\n\n    RAISES:\n        - Error: always';
      expect(parseDocumentation(text, 'function').layout.blankLineGaps).toEqual([
        { before: 'PRECONDITION', after: 'RAISES', line: 6 },
      ]);
    });

    it('should record an unknown top-level section and skip its content', () => {
      const tree = parseDocumentation('PURPOSE: a\nEXAMPLES:\n    foo()\nDESCRIPTION: b', 'function');
      expect(tree.layout.unknownSections).toEqual([{ name: 'EXAMPLES', nested: false, line: 2 }]);
      expect(tree.purpose).toBe('a');
      expect(tree.description).toBe('b');
    });

    it('should record an unknown subsection inside CONTRACTS', () => {
      const text = 'PURPOSE: a\nCONTRACTS:\n    PRECONDITION:\n        - x is set\n    INVARIANT:\n        - y holds';
      const tree = parseDocumentation(text, 'method');
      expect(tree.layout.unknownSections).toEqual([{ name: 'INVARIANT', nested: true, line: 5 }]);
      expect(tree.contracts?.precondition).toEqual(['x is set']);
    });
  });

  describe('malformed text', () => {
    it('should reject a duplicate section', () => {
      expectParseError('PURPOSE: a\nPURPOSE: b', 'Duplicate PURPOSE section in method documentation', 2);
    });

    it('should reject a duplicate subsection', () => {
      expectParseError(
        'PURPOSE: a\nCONTRACTS:\n    RAISES:\n        - E: x\n    RAISES:\n        - F: y',
        'Duplicate RAISES subsection',
        5
      );
    });

    it('should reject a statement outside any subsection', () => {
      expectParseError(
        'PURPOSE: a\nCONTRACTS:\n    amount is positive',
        'Contract statement outside of a subsection',
        3
      );
    });

    it('should reject inline text on the CONTRACTS header', () => {
      expectParseError('PURPOSE: a\nCONTRACTS: none', 'CONTRACTS header takes no inline text', 2);
    });

    it('should reject a mapping line that is not an entry', () => {
      expectParseError(
        'PURPOSE: a\nARGUMENTS:\n    the amount',
        "Expected 'name: description' entry in ARGUMENTS, got 'the amount'",
        3
      );
    });

    it('should reject a duplicate entry', () => {
      expectParseError(
        'PURPOSE: a\nARGUMENTS:\n    a: int\n    a: str',
        "Duplicate entry 'a' in ARGUMENTS",
        4
      );
    });
  });
});
