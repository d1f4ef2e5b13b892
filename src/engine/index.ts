/**
 * Engine module.
 *
 * @packageDocumentation
 */

export { DEFAULT_ENGINE_OPTIONS, type EngineOptions, analyzeElement, analyzeTree } from './engine.js';
