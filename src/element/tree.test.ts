import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import type { Element } from './types.js';
import { DuplicateQualifiedPathError, assertUniqueQualifiedPaths, findElement, walkElements } from './tree.js';

function element(qualifiedPath: string, children: Element[] = []): Element {
  const segments = qualifiedPath.split('.');
  return {
    kind: children.length > 0 ? 'class' : 'method',
    name: segments[segments.length - 1] ?? qualifiedPath,
    qualifiedPath,
    signature: { kind: 'none' },
    children,
  };
}

const tree: Element = {
  kind: 'module',
  name: 'billing',
  qualifiedPath: 'billing',
  signature: { kind: 'none' },
  children: [
    element('billing.Account', [element('billing.Account.deposit'), element('billing.Account.transfer')]),
    element('billing.audit'),
  ],
};

describe('Element Tree', () => {
  describe('walkElements', () => {
    it('should list parents before children and keep sibling order', () => {
      expect(walkElements(tree).map((e) => e.qualifiedPath)).toEqual([
        'billing',
        'billing.Account',
        'billing.Account.deposit',
        'billing.Account.transfer',
        'billing.audit',
      ]);
    });

    it('should visit every element exactly once', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 8 }), fc.integer({ min: 0, max: 4 }), (classes, methods) => {
          const root: Element = {
            ...element('m'),
            kind: 'module',
            children: Array.from({ length: classes }, (_, c) =>
              element(
                `m.C${String(c)}`,
                Array.from({ length: methods }, (_, f) => element(`m.C${String(c)}.f${String(f)}`))
              )
            ),
          };
          expect(walkElements(root)).toHaveLength(1 + classes + classes * methods);
        })
      );
    });
  });

  describe('assertUniqueQualifiedPaths', () => {
    it('should accept a tree with unique paths', () => {
      expect(() => {
        assertUniqueQualifiedPaths(tree);
      }).not.toThrow();
    });

    it('should reject a repeated path', () => {
      const duplicated: Element = { ...tree, children: [...tree.children, element('billing.audit')] };

      expect(() => {
        assertUniqueQualifiedPaths(duplicated);
      }).toThrow(DuplicateQualifiedPathError);
      try {
        assertUniqueQualifiedPaths(duplicated);
      } catch (error) {
        expect(error instanceof DuplicateQualifiedPathError && error.qualifiedPath).toBe('billing.audit');
      }
    });
  });

  describe('findElement', () => {
    it('should find nested elements by path', () => {
      expect(findElement(tree, 'billing.Account.transfer')?.name).toBe('transfer');
    });

    it('should return undefined for unknown paths', () => {
      expect(findElement(tree, 'billing.Ledger')).toBeUndefined();
    });
  });
});
