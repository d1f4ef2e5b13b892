/**
 * Fact Extractor: dispatches an element's body to the analyzer for its
 * source language.
 *
 * @packageDocumentation
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { type Element, parametersOf } from '../element/types.js';
import { analyzeTypeScriptBody } from './typescript-analyzer.js';
import {
  type BodyAnalyzer,
  type Fact,
  type FactExtraction,
  type RaisesFact,
  UNCONDITIONAL,
  UnreadableBodyError,
} from './types.js';

/**
 * Analyzers available when none are supplied, keyed by body language.
 */
export const DEFAULT_BODY_ANALYZERS: ReadonlyMap<string, BodyAnalyzer> = new Map([
  ['typescript', analyzeTypeScriptBody],
]);

/**
 * Options for {@link extractFacts}.
 */
export interface FactExtractorOptions {
  /** Analyzers keyed by body language. Defaults to {@link DEFAULT_BODY_ANALYZERS}. */
  readonly analyzers?: ReadonlyMap<string, BodyAnalyzer>;
}

function unreadable(message: string, line: number | undefined): Diagnostic {
  return {
    code: 'UnreadableBodyError',
    severity: 'warning',
    message,
    ...(line !== undefined && { line }),
  };
}

function isUnconditionalRaise(fact: Fact): fact is RaisesFact {
  return fact.kind === 'raises' && fact.triggerCondition === UNCONDITIONAL;
}

/**
 * Extracts facts from an element's implementation.
 *
 * Elements without a body reference yield no facts. A body no analyzer
 * can read yields no facts and an `UnreadableBodyError` diagnostic; every
 * unconditional raise adds an informational notice.
 *
 * @param element - The element to analyze.
 * @param options - Analyzer overrides.
 * @returns Facts in source order and extractor diagnostics.
 */
export function extractFacts(element: Element, options: FactExtractorOptions = {}): FactExtraction {
  const body = element.bodyReference;
  if (body === undefined) {
    return { facts: [], diagnostics: [] };
  }

  const analyzer = (options.analyzers ?? DEFAULT_BODY_ANALYZERS).get(body.language);
  if (analyzer === undefined) {
    return {
      facts: [],
      diagnostics: [unreadable(`No body analyzer for language '${body.language}'`, undefined)],
    };
  }

  let facts: Fact[];
  try {
    facts = analyzer(body, parametersOf(element));
  } catch (error) {
    if (error instanceof UnreadableBodyError) {
      return { facts: [], diagnostics: [unreadable(error.message, error.line)] };
    }
    throw error;
  }

  const diagnostics = facts.filter(isUnconditionalRaise).map(
    (fact): Diagnostic => ({
      code: 'UnconditionalRaiseNotice',
      severity: 'info',
      message: `${fact.exception} is raised unconditionally`,
      line: fact.line,
    })
  );

  return { facts, diagnostics };
}
