/**
 * Conversion between `/** *\/` comment blocks and bare documentation text.
 *
 * @packageDocumentation
 */

/**
 * Removes comment delimiters and leading `*` gutters from a block comment.
 *
 * @param comment - A `/** ... *\/` comment as it appears in source.
 * @returns The documentation text, without leading or trailing blank lines.
 *
 * @example
 * ```typescript
 * stripCommentMarkers('/**\n * PURPOSE: Move funds\n *\/'); // 'PURPOSE: Move funds'
 * ```
 */
export function stripCommentMarkers(comment: string): string {
  const body = comment.trim().replace(/^\/\*\*?/, '').replace(/\*\/$/, '');
  const lines = body
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line, index) => (index === 0 ? line.trim() : line.replace(/^\s*\* ?/, '').trimEnd()));

  while (lines.length > 0 && lines[0] === '') {
    lines.shift();
  }
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.join('\n');
}

/**
 * Wraps documentation text in a block comment.
 *
 * @param text - Documentation text, one section per line.
 * @param indent - Indentation placed before every comment line.
 * @returns The comment, without a trailing newline.
 */
export function formatDocComment(text: string, indent = ''): string {
  const body = text
    .split('\n')
    .map((line) => (line.trim() === '' ? `${indent} *` : `${indent} * ${line}`));
  return [`${indent}/**`, ...body, `${indent} */`].join('\n');
}
