/**
 * Element Tree module.
 *
 * @packageDocumentation
 */

export type {
  AttributeDescriptor,
  BodyReference,
  Element,
  ElementKind,
  ParameterDescriptor,
  Signature,
  SourceLocation,
} from './types.js';

export { ELEMENT_KINDS, attributesOf, parametersOf } from './types.js';

export {
  DuplicateQualifiedPathError,
  assertUniqueQualifiedPaths,
  findElement,
  walkElements,
} from './tree.js';

export { ElementTreeError, elementTreeFromJson } from './loader.js';
