/**
 * Contract Synthesizer module.
 *
 * @packageDocumentation
 */

export { type SynthesisOptions, SynthesisUnresolvedError, synthesizeDocumentation } from './synthesizer.js';
