/**
 * Fact extraction from element bodies.
 *
 * @packageDocumentation
 */

export type {
  BodyAnalyzer,
  Fact,
  FactExtraction,
  FactKind,
  MutatesFact,
  PreconditionCandidateFact,
  RaisesFact,
  ReturnShape,
  ReturnsFact,
} from './types.js';
export { UNCONDITIONAL, UnreadableBodyError } from './types.js';
export { type ConditionContext, describeCondition, normalizeSourceText } from './conditions.js';
export { analyzeTypeScriptBody } from './typescript-analyzer.js';
export { DEFAULT_BODY_ANALYZERS, type FactExtractorOptions, extractFacts } from './extractor.js';
