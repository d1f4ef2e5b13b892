import { describe, expect, it } from 'vitest';
import type { Element } from '../element/types.js';
import { formatModuleMap } from './module-map.js';

function leaf(kind: Element['kind'], name: string, extra: Partial<Element> = {}): Element {
  return { kind, name, qualifiedPath: `billing.${name}`, signature: { kind: 'none' }, children: [], ...extra };
}

describe('formatModuleMap', () => {
  it('should group classes, methods and functions with their descriptions', () => {
    const root: Element = {
      ...leaf('module', 'billing'),
      qualifiedPath: 'billing',
      children: [
        leaf('class', 'Account', {
          existingDocText: 'PURPOSE: Hold a balance.\nDESCRIPTION: A ledger account with overdraft checks.',
          location: { filePath: 'src/billing.ts', startLine: 3, endLine: 40 },
          children: [
            leaf('method', 'transfer', {
              qualifiedPath: 'billing.Account.transfer',
              existingDocText: 'PURPOSE: Move funds.',
              location: { filePath: 'src/billing.ts', startLine: 12, endLine: 20 },
            }),
          ],
        }),
        leaf('function', 'audit', { existingDocText: 'Checks every account.' }),
        leaf('function', 'sync', { existingDocText: 'PURPOSE: a\nPURPOSE: b' }),
      ],
    };

    expect(formatModuleMap(root)).toBe(
      [
        'MODULE_MAP:',
        '',
        'CLASSES:',
        '- @src/billing.ts#L3-40 - Account - A ledger account with overdraft checks.',
        '',
        'METHODS:',
        '- @src/billing.ts#L12-20 - transfer - Move funds.',
        '',
        'FUNCTIONS:',
        '- @billing.audit - audit - Checks every account.',
        '- @billing.sync - sync - No description available',
      ].join('\n')
    );
  });

  it('should mark empty groups', () => {
    expect(formatModuleMap(leaf('module', 'empty'))).toBe(
      ['MODULE_MAP:', '', 'CLASSES:', '- No classes found', '', 'METHODS:', '- No methods found', '', 'FUNCTIONS:', '- No functions found'].join(
        '\n'
      )
    );
  });
});
