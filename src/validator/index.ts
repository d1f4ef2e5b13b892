/**
 * Contract Validator module.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_VALIDATION_OPTIONS,
  type ValidationOptions,
  sectionPresent,
  validateDocumentation,
} from './validator.js';
