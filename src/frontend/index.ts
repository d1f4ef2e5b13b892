/**
 * TypeScript front end.
 *
 * @packageDocumentation
 */

export {
  type FrontendOptions,
  extractElementTree,
  extractElementTreeFromSource,
  modulePathFromFile,
} from './typescript.js';
export { formatDocComment, stripCommentMarkers } from './doc-comment.js';
