import { describe, it, expect } from 'vitest';
import { Project } from 'ts-morph';
import { extractElementTree, extractElementTreeFromSource, modulePathFromFile } from './typescript.js';

const BILLING_SOURCE = [
  '/**',
  ' * PURPOSE: Billing helpers.',
  ' * DESCRIPTION: Moves money between accounts.',
  ' */',
  '',
  "import { Money } from './money';",
  '',
  '/**',
  ' * PURPOSE: Hold a balance.',
  ' * DESCRIPTION: A ledger account.',
  ' */',
  'export class Account {',
  '  private balance: Money;',
  "  static readonly CURRENCY = 'EUR';",
  '',
  '  constructor(public readonly owner: string, balance: Money) {',
  '    if (!owner) {',
  "      throw new TypeError('owner is required');",
  '    }',
  '    this.balance = balance;',
  '  }',
  '',
  '  /** PURPOSE: Move funds. */',
  '  transfer(amount: Money, memo?: string): void {',
  '    this.balance -= amount;',
  '  }',
  '',
  '  get total(): Money {',
  '    return this.balance;',
  '  }',
  '}',
  '',
  'export function audit(accounts: Account[], limit = 10): number {',
  '  return accounts.length;',
  '}',
  '',
  'export const total = (a: Money, b: Money): Money => a + b;',
  '',
  'export function overloaded(x: string): string;',
  'export function overloaded(x: number): number;',
  'export function overloaded(x: unknown): unknown {',
  '  return x;',
  '}',
].join('\n');

const CONSTRUCTOR_BODY = [
  '{',
  '    if (!owner) {',
  "      throw new TypeError('owner is required');",
  '    }',
  '    this.balance = balance;',
  '  }',
].join('\n');

describe('modulePathFromFile', () => {
  it('should turn file paths into dotted module paths', () => {
    expect(modulePathFromFile('./src/billing/account.ts')).toBe('src.billing.account');
    expect(modulePathFromFile('lib\\util.d.ts')).toBe('lib.util');
    expect(modulePathFromFile('/abs/worker.mts')).toBe('abs.worker');
  });
});

describe('extractElementTreeFromSource', () => {
  const root = extractElementTreeFromSource(BILLING_SOURCE, 'src/billing.ts');

  it('should describe the module with its leading documentation', () => {
    expect(root.kind).toBe('module');
    expect(root.name).toBe('billing');
    expect(root.qualifiedPath).toBe('src.billing');
    expect(root.existingDocText).toBe('PURPOSE: Billing helpers.\nDESCRIPTION: Moves money between accounts.');
    expect(root.location).toEqual({ filePath: 'src/billing.ts', startLine: 1, endLine: 43 });
    expect(root.children.map((child) => child.qualifiedPath)).toEqual([
      'src.billing.Account',
      'src.billing.audit',
      'src.billing.total',
      'src.billing.overloaded',
    ]);
  });

  it('should describe a class with its attributes, constructor and methods', () => {
    const account = root.children[0];

    expect(account).toEqual({
      kind: 'class',
      name: 'Account',
      qualifiedPath: 'src.billing.Account',
      signature: {
        kind: 'attributes',
        attributes: [
          { name: 'owner', type: 'string' },
          { name: 'balance', type: 'Money' },
        ],
      },
      bodyReference: { language: 'typescript', text: CONSTRUCTOR_BODY },
      existingDocText: 'PURPOSE: Hold a balance.\nDESCRIPTION: A ledger account.',
      children: [
        {
          kind: 'method',
          name: 'constructor',
          qualifiedPath: 'src.billing.Account.constructor',
          signature: {
            kind: 'callable',
            parameters: [
              { name: 'owner', type: 'string', hasDefault: false },
              { name: 'balance', type: 'Money', hasDefault: false },
            ],
          },
          bodyReference: { language: 'typescript', text: CONSTRUCTOR_BODY },
          children: [],
          location: { filePath: 'src/billing.ts', startLine: 16, endLine: 21 },
        },
        {
          kind: 'method',
          name: 'transfer',
          qualifiedPath: 'src.billing.Account.transfer',
          signature: {
            kind: 'callable',
            parameters: [
              { name: 'amount', type: 'Money', hasDefault: false },
              { name: 'memo', type: 'string', hasDefault: true },
            ],
          },
          bodyReference: { language: 'typescript', text: '{\n    this.balance -= amount;\n  }' },
          existingDocText: 'PURPOSE: Move funds.',
          children: [],
          location: { filePath: 'src/billing.ts', startLine: 24, endLine: 26 },
        },
      ],
      location: { filePath: 'src/billing.ts', startLine: 12, endLine: 31 },
    });
  });

  it('should describe function declarations and arrow function constants', () => {
    const [, audit, total, overloaded] = root.children;

    expect(audit?.signature).toEqual({
      kind: 'callable',
      parameters: [
        { name: 'accounts', type: 'Account[]', hasDefault: false },
        { name: 'limit', type: '', hasDefault: true },
      ],
    });
    expect(audit?.returnType).toBe('number');
    expect(audit?.location).toEqual({ filePath: 'src/billing.ts', startLine: 33, endLine: 35 });

    expect(total?.kind).toBe('function');
    expect(total?.returnType).toBe('Money');
    expect(total?.bodyReference).toEqual({ language: 'typescript', text: '{ return a + b; }' });

    expect(overloaded?.signature).toEqual({
      kind: 'callable',
      parameters: [{ name: 'x', type: 'unknown', hasDefault: false }],
    });
    expect(overloaded?.location).toEqual({ filePath: 'src/billing.ts', startLine: 41, endLine: 43 });
  });

  it('should leave out returnType for void results', () => {
    const transfer = root.children[0]?.children[1];
    expect(transfer?.name).toBe('transfer');
    expect(transfer !== undefined && 'returnType' in transfer).toBe(false);
  });

  it('should name destructured parameters by position and flatten multi-line types', () => {
    const source = [
      'export function build({ a, b }: Parts, [first]: string[], opts: {',
      '  a: number;',
      '}): string',
      '  | undefined {',
      '  return undefined;',
      '}',
    ].join('\n');
    const build = extractElementTreeFromSource(source, 'build.ts').children[0];

    expect(build?.signature).toEqual({
      kind: 'callable',
      parameters: [
        { name: 'arg0', type: 'Parts', hasDefault: false },
        { name: 'arg1', type: 'string[]', hasDefault: false },
        { name: 'opts', type: '{ a: number; }', hasDefault: false },
      ],
    });
    expect(build?.returnType).toBe('string | undefined');
  });

  it('should give a leading comment to the first declaration when no blank line follows it', () => {
    const tree = extractElementTreeFromSource('/** PURPOSE: Only thing. */\nexport function f(): void {}', 'f.ts');
    expect(tree.existingDocText).toBeUndefined();
    expect(tree.children[0]?.existingDocText).toBe('PURPOSE: Only thing.');
  });

  it('should read the module documentation of a file holding only a comment', () => {
    const tree = extractElementTreeFromSource('/**\n * PURPOSE: Nothing yet.\n */\n', 'empty.ts');
    expect(tree.existingDocText).toBe('PURPOSE: Nothing yet.');
    expect(tree.children).toEqual([]);
  });
});

describe('extractElementTree', () => {
  it('should default to the source file path', () => {
    const project = new Project({ useInMemoryFileSystem: true });
    const sourceFile = project.createSourceFile('/repo/lib/math.ts', 'export function add(a: number, b: number): number { return a + b; }');

    const tree = extractElementTree(sourceFile);
    expect(tree.qualifiedPath).toBe('repo.lib.math');
    expect(tree.children[0]?.qualifiedPath).toBe('repo.lib.math.add');
  });
});
