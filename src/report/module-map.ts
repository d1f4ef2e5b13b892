/**
 * Module map: a flat listing of classes, methods and functions with their
 * source ranges and one-line descriptions.
 *
 * @packageDocumentation
 */

import { ParseError, parseDocumentation } from '../docs/parser.js';
import type { Element } from '../element/types.js';
import { walkElements } from '../element/tree.js';

const NO_DESCRIPTION = 'No description available';

function descriptionOf(element: Element): string {
  try {
    const tree = parseDocumentation(element.existingDocText, element.kind);
    const text = [tree.description, tree.purpose, tree.preamble].find(
      (candidate) => candidate !== undefined && candidate !== ''
    );
    return text ?? NO_DESCRIPTION;
  } catch (error) {
    if (error instanceof ParseError) {
      return NO_DESCRIPTION;
    }
    throw error;
  }
}

function entryFor(element: Element): string {
  const reference =
    element.location !== undefined
      ? `@${element.location.filePath}#L${String(element.location.startLine)}-${String(element.location.endLine)}`
      : `@${element.qualifiedPath}`;
  return `- ${reference} - ${element.name} - ${descriptionOf(element)}`;
}

function pushGroup(lines: string[], header: string, entries: readonly string[], emptyLabel: string): void {
  lines.push(`${header}:`);
  if (entries.length === 0) {
    lines.push(`- No ${emptyLabel} found`);
  } else {
    lines.push(...entries);
  }
}

/**
 * Renders the module map of an Element Tree.
 *
 * Descriptions come from each element's DESCRIPTION, falling back to its
 * PURPOSE. Persisting the text is up to the caller.
 *
 * @param root - Root of the tree, usually a module.
 * @returns `MODULE_MAP:` text with CLASSES, METHODS and FUNCTIONS groups.
 */
export function formatModuleMap(root: Element): string {
  const elements = walkElements(root);
  const entries = (kind: Element['kind']): string[] =>
    elements.filter((element) => element.kind === kind).map(entryFor);

  const lines: string[] = ['MODULE_MAP:', ''];
  pushGroup(lines, 'CLASSES', entries('class'), 'classes');
  lines.push('');
  pushGroup(lines, 'METHODS', entries('method'), 'methods');
  lines.push('');
  pushGroup(lines, 'FUNCTIONS', entries('function'), 'functions');

  return lines.join('\n');
}
