/**
 * Traversal helpers for the Element Tree.
 *
 * @packageDocumentation
 */

import type { Element } from './types.js';

/**
 * Error thrown when two elements in one tree share a qualified path.
 *
 * Qualified paths are the join key between runs, so a front end that
 * produces duplicates has broken its contract with the engine.
 */
export class DuplicateQualifiedPathError extends Error {
  /** The duplicated qualified path. */
  public readonly qualifiedPath: string;

  /**
   * Creates a new DuplicateQualifiedPathError.
   *
   * @param qualifiedPath - The path that appeared more than once.
   */
  constructor(qualifiedPath: string) {
    super(`Qualified path '${qualifiedPath}' appears more than once in the element tree`);
    this.name = 'DuplicateQualifiedPathError';
    this.qualifiedPath = qualifiedPath;
  }
}

/**
 * Flattens a tree into pre-order: each element precedes its children, and
 * siblings keep their source order.
 *
 * @param root - The root element.
 * @returns Every element of the tree.
 */
export function walkElements(root: Element): Element[] {
  const result: Element[] = [];
  const stack: Element[] = [root];

  while (stack.length > 0) {
    const element = stack.pop();
    if (element === undefined) {
      break;
    }
    result.push(element);
    for (let i = element.children.length - 1; i >= 0; i--) {
      const child = element.children[i];
      if (child !== undefined) {
        stack.push(child);
      }
    }
  }

  return result;
}

/**
 * Verifies that every qualified path in a tree is unique.
 *
 * @param root - The root element.
 * @throws DuplicateQualifiedPathError on the first repeated path.
 */
export function assertUniqueQualifiedPaths(root: Element): void {
  const seen = new Set<string>();
  for (const element of walkElements(root)) {
    if (seen.has(element.qualifiedPath)) {
      throw new DuplicateQualifiedPathError(element.qualifiedPath);
    }
    seen.add(element.qualifiedPath);
  }
}

/**
 * Finds an element by qualified path.
 *
 * @param root - The root element.
 * @param qualifiedPath - The path to look for.
 * @returns The element, or undefined when no element has that path.
 */
export function findElement(root: Element, qualifiedPath: string): Element | undefined {
  return walkElements(root).find((element) => element.qualifiedPath === qualifiedPath);
}
