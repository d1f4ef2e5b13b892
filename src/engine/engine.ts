/**
 * Engine: runs the documentation pipeline for single elements and whole
 * Element Trees.
 *
 * Elements are processed independently. A tree run is sequential and in
 * pre-order, so reports are deterministic for identical input.
 *
 * @packageDocumentation
 */

import type { Diagnostic } from '../diagnostics/types.js';
import { ParseError, parseDocumentation } from '../docs/parser.js';
import { EMPTY_SECTION_TREE, type SectionTree } from '../docs/types.js';
import type { Element } from '../element/types.js';
import { DuplicateQualifiedPathError, assertUniqueQualifiedPaths, walkElements } from '../element/tree.js';
import { extractFacts } from '../facts/extractor.js';
import type { BodyAnalyzer } from '../facts/types.js';
import { buildElementReport, summarizeReports } from '../report/renderer.js';
import type { AnalysisReport, ElementReport } from '../report/types.js';
import { SchemaLookupError } from '../schema/registry.js';
import { SynthesisUnresolvedError, synthesizeDocumentation } from '../synthesizer/synthesizer.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { DEFAULT_VALIDATION_OPTIONS, type ValidationOptions, validateDocumentation } from '../validator/validator.js';

/**
 * Options for an engine run.
 */
export interface EngineOptions extends ValidationOptions {
  /** Body analyzers keyed by language; defaults to the TypeScript analyzer. */
  readonly analyzers?: ReadonlyMap<string, BodyAnalyzer>;
  /** Logger for run events; defaults to the shared engine logger. */
  readonly logger?: Logger;
}

/**
 * Default engine options.
 */
export const DEFAULT_ENGINE_OPTIONS: EngineOptions = DEFAULT_VALIDATION_OPTIONS;

interface ParsedDocumentation {
  readonly tree: SectionTree;
  readonly diagnostics: readonly Diagnostic[];
}

function parseElementDocumentation(element: Element): ParsedDocumentation {
  try {
    return { tree: parseDocumentation(element.existingDocText, element.kind), diagnostics: [] };
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    return {
      tree: EMPTY_SECTION_TREE,
      diagnostics: [
        {
          code: 'ParseError',
          severity: 'error',
          message: error.message,
          ...(error.section !== undefined && { section: error.section }),
          line: error.line,
        },
      ],
    };
  }
}

/**
 * Runs the pipeline for one element: parse, extract, validate, and
 * synthesize when the documentation is not compliant.
 *
 * Under `strictRaises` an unverified RAISES entry fails the element
 * without synthesis.
 *
 * @param element - The element to analyze.
 * @param options - Engine options.
 * @returns The element's report record.
 * @throws SchemaLookupError if the element's kind is not recognized.
 */
export function analyzeElement(element: Element, options: EngineOptions = DEFAULT_ENGINE_OPTIONS): ElementReport {
  const parsed = parseElementDocumentation(element);
  const extraction = extractFacts(element, options.analyzers !== undefined ? { analyzers: options.analyzers } : {});
  const findings = validateDocumentation(element, parsed.tree, extraction.facts, options);

  const diagnostics: Diagnostic[] = [...parsed.diagnostics, ...extraction.diagnostics, ...findings];

  if (parsed.diagnostics.length === 0 && findings.length === 0) {
    return buildElementReport(element, 'compliant', diagnostics);
  }

  if (options.strictRaises && findings.some((diagnostic) => diagnostic.code === 'UnverifiedRaiseError')) {
    return buildElementReport(element, 'failed', diagnostics);
  }

  try {
    const text = synthesizeDocumentation(element, parsed.tree, extraction.facts, findings, options);
    return buildElementReport(element, 'regenerated', diagnostics, text);
  } catch (error) {
    if (!(error instanceof SynthesisUnresolvedError)) {
      throw error;
    }
    diagnostics.push({
      code: 'SynthesisUnresolvedError',
      severity: 'error',
      message: error.message,
      section: error.section,
    });
    return buildElementReport(element, 'unresolved', diagnostics);
  }
}

/**
 * Analyzes every element of a tree in pre-order.
 *
 * @param root - Root of the Element Tree.
 * @param options - Engine options.
 * @returns One record per element and a status summary.
 * @throws DuplicateQualifiedPathError if two elements share a path.
 * @throws SchemaLookupError if an element's kind is not recognized.
 *
 * @example
 * ```typescript
 * const report = analyzeTree(extractElementTreeFromSource(source, 'src/billing.ts'));
 * console.log(report.summary.regenerated);
 * ```
 */
export function analyzeTree(root: Element, options: EngineOptions = DEFAULT_ENGINE_OPTIONS): AnalysisReport {
  const log = (options.logger ?? defaultLogger).child('Engine');
  assertUniqueQualifiedPaths(root);

  const elements = walkElements(root);
  log.debug('run_started', { root: root.qualifiedPath, elements: elements.length });

  const records: ElementReport[] = [];
  for (const element of elements) {
    try {
      const record = analyzeElement(element, options);
      log.debug('element_analyzed', { qualifiedPath: element.qualifiedPath, status: record.status });
      records.push(record);
    } catch (error) {
      if (error instanceof SchemaLookupError || error instanceof DuplicateQualifiedPathError) {
        log.error('run_aborted', { qualifiedPath: element.qualifiedPath, error: error.message });
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      log.warn('element_failed', { qualifiedPath: element.qualifiedPath, error: message });
      records.push(
        buildElementReport(element, 'failed', [
          { code: 'ElementFailedError', severity: 'error', message: `Analysis failed: ${message}` },
        ])
      );
    }
  }

  const summary = summarizeReports(records);
  log.info('run_completed', { root: root.qualifiedPath, ...summary });
  return { records, summary };
}
