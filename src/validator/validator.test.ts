import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { parseDocumentation } from '../docs/parser.js';
import { EMPTY_SECTION_TREE } from '../docs/types.js';
import type { Element } from '../element/types.js';
import type { Fact } from '../facts/types.js';
import { requiredSectionsFor } from '../schema/registry.js';
import { DEFAULT_VALIDATION_OPTIONS, sectionPresent, validateDocumentation } from './validator.js';

function callable(name: string, parameters: Array<{ name: string; type: string }>, returnType?: string): Element {
  return {
    kind: 'method',
    name,
    qualifiedPath: `billing.Account.${name}`,
    signature: { kind: 'callable', parameters: parameters.map((p) => ({ ...p, hasDefault: false })) },
    ...(returnType !== undefined && { returnType }),
    children: [],
  };
}

function validate(element: Element, lines: string[], facts: Fact[] = [], options = DEFAULT_VALIDATION_OPTIONS) {
  return validateDocumentation(element, parseDocumentation(lines.join('\n'), element.kind), facts, options);
}

const transfer = callable('transfer', [{ name: 'amount', type: 'Money' }]);

const transferFacts: Fact[] = [
  {
    kind: 'raises',
    exception: 'InsufficientFundsError',
    triggerCondition: 'this.balance < amount',
    description: 'InsufficientFundsError raised when this.balance < amount',
    line: 3,
  },
  { kind: 'mutates', subject: 'balance', description: 'this.balance reflects amount deducted', guarded: false, line: 5 },
];

const flush = callable('flush', []);

describe('sectionPresent', () => {
  it('should count empty text and empty mappings as missing', () => {
    const tree = { purpose: '', arguments: [], description: 'x', layout: EMPTY_SECTION_TREE.layout };
    expect(sectionPresent(tree, 'PURPOSE')).toBe(false);
    expect(sectionPresent(tree, 'ARGUMENTS')).toBe(false);
    expect(sectionPresent(tree, 'DESCRIPTION')).toBe(true);
    expect(sectionPresent(tree, 'RETURNS')).toBe(false);
  });
});

describe('validateDocumentation', () => {
  it('should accept compliant documentation', () => {
    const diagnostics = validate(
      transfer,
      [
        'PURPOSE: Move funds out of this account.',
        'DESCRIPTION: Deducts the amount from the balance.',
        'ARGUMENTS:',
        '    amount: Money - the amount to move',
        'CONTRACTS:',
        '    POSTCONDITION:',
        '        - this.balance reflects amount deducted',
        '    RAISES:',
        '        - InsufficientFundsError - when this.balance < amount',
      ],
      transferFacts
    );
    expect(diagnostics).toEqual([]);
  });

  it('should report exactly one diagnostic for an empty CONTRACTS block', () => {
    const diagnostics = validate(flush, [
      'PURPOSE: Flush the queue.',
      'DESCRIPTION: Writes pending entries to disk.',
      'CONTRACTS:',
    ]);
    expect(diagnostics).toEqual([
      {
        code: 'EmptyContractBlockError',
        severity: 'error',
        message: 'CONTRACTS block has no statements',
        section: 'CONTRACTS',
      },
    ]);
  });

  it('should report every required section of undocumented elements and nothing else', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.constantFrom('amount', 'target', 'memo', 'currency'), { maxLength: 4 }),
        fc.option(fc.constantFrom('Money', 'Receipt', 'boolean'), { nil: undefined }),
        (names, returnType) => {
          const element = callable('run', names.map((name) => ({ name, type: 'string' })), returnType);
          const diagnostics = validateDocumentation(element, EMPTY_SECTION_TREE, []);

          expect(diagnostics.map((d) => d.code)).toEqual(
            requiredSectionsFor(element).map(() => 'MissingSectionError')
          );
          expect(diagnostics.map((d) => d.section)).toEqual(requiredSectionsFor(element));
        }
      )
    );
  });

  it('should report unknown sections before formatting problems', () => {
    const diagnostics = validate(flush, ['Summary.', 'PURPOSE: a', '', 'DESCRIPTION: b', 'NOTES:', '    x']);
    expect(diagnostics).toEqual([
      { code: 'UnknownSectionError', severity: 'error', message: 'Unknown section NOTES', section: 'NOTES', line: 5 },
      {
        code: 'FormattingError',
        severity: 'error',
        message: 'Blank line between PURPOSE and DESCRIPTION',
        section: 'DESCRIPTION',
        line: 4,
      },
      { code: 'FormattingError', severity: 'error', message: 'Text outside any section', line: 1 },
    ]);
  });

  it('should name unknown subsections inside CONTRACTS', () => {
    const diagnostics = validate(flush, [
      'PURPOSE: a',
      'DESCRIPTION: b',
      'CONTRACTS:',
      '    INVARIANT:',
      '        - the queue is bounded',
    ]);
    expect(diagnostics.map((d) => d.message)).toEqual([
      'Unknown subsection INVARIANT inside CONTRACTS',
      'CONTRACTS block has no statements',
    ]);
  });

  describe('redundant statements', () => {
    const lookup = callable('lookup', [{ name: 'user_id', type: 'number' }]);
    const lines = (precondition: string): string[] => [
      'PURPOSE: Find a user.',
      'DESCRIPTION: Reads the session store.',
      'ARGUMENTS:',
      "    user_id: int - the user's id",
      'CONTRACTS:',
      '    PRECONDITION:',
      `        - ${precondition}`,
    ];

    it('should flag a precondition that restates the argument type', () => {
      expect(validate(lookup, lines('user_id is a positive int'))).toEqual([
        {
          code: 'RedundantContractError',
          severity: 'warning',
          message: "PRECONDITION statement restates the signature: 'user_id is a positive int'",
          section: 'CONTRACTS',
          subsection: 'PRECONDITION',
          statement: 'user_id is a positive int',
        },
      ]);
    });

    it('should accept a precondition that adds information', () => {
      expect(validate(lookup, lines('user_id exists in the active session'))).toEqual([]);
    });
  });

  describe('raises verification', () => {
    const lines = [
      'PURPOSE: Flush the queue.',
      'DESCRIPTION: Writes pending entries.',
      'CONTRACTS:',
      '    RAISES:',
      '        - TimeoutError - when the disk is slow',
    ];

    it('should warn about a RAISES entry with no raise site', () => {
      expect(validate(flush, lines)).toEqual([
        {
          code: 'UnverifiedRaiseError',
          severity: 'warning',
          message: "No raise site in the body matches 'TimeoutError - when the disk is slow'",
          section: 'CONTRACTS',
          subsection: 'RAISES',
          statement: 'TimeoutError - when the disk is slow',
        },
      ]);
    });

    it('should escalate to an error under strict raises', () => {
      const diagnostics = validate(flush, lines, [], { ...DEFAULT_VALIDATION_OPTIONS, strictRaises: true });
      expect(diagnostics.map((d) => d.severity)).toEqual(['error']);
    });
  });

  describe('missing contracts', () => {
    it('should require CONTRACTS when the body supports some', () => {
      const diagnostics = validate(
        transfer,
        ['PURPOSE: Move funds.', 'DESCRIPTION: Deducts the amount.', 'ARGUMENTS:', '    amount: Money - the amount'],
        transferFacts
      );
      expect(diagnostics).toEqual([
        {
          code: 'MissingContractsError',
          severity: 'error',
          message: 'CONTRACTS block is required for this element',
          section: 'CONTRACTS',
        },
      ]);
    });

    it('should require CONTRACTS on classes only when configured', () => {
      const account: Element = {
        kind: 'class',
        name: 'Account',
        qualifiedPath: 'billing.Account',
        signature: { kind: 'attributes', attributes: [] },
        children: [],
      };
      const lines = ['PURPOSE: Hold a balance.', 'DESCRIPTION: A ledger account.'];

      expect(validate(account, lines)).toEqual([]);
      expect(
        validate(account, lines, [], { ...DEFAULT_VALIDATION_OPTIONS, contractMandatoryForClasses: true }).map(
          (d) => d.code
        )
      ).toEqual(['MissingContractsError']);
    });
  });
});
