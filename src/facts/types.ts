/**
 * Fact types produced by static analysis of element bodies.
 *
 * @packageDocumentation
 */

import type { Diagnostic } from '../diagnostics/types.js';
import type { BodyReference, ParameterDescriptor } from '../element/types.js';

/**
 * Trigger recorded for a raise site with no enclosing condition.
 */
export const UNCONDITIONAL = 'unconditional';

/**
 * An explicit error-raising statement.
 */
export interface RaisesFact {
  readonly kind: 'raises';
  /** Raised exception, e.g. `InsufficientFundsError`. */
  readonly exception: string;
  /** Described condition of the nearest enclosing branch, or `unconditional`. */
  readonly triggerCondition: string;
  readonly description: string;
  /** 1-indexed line within the body text. */
  readonly line: number;
}

/**
 * A write to an attribute reachable through the element's own instance.
 */
export interface MutatesFact {
  readonly kind: 'mutates';
  /** Attribute name without the `this.` prefix. */
  readonly subject: string;
  /** Postcondition-style statement, e.g. `this.balance reflects amount deducted`. */
  readonly description: string;
  /**
   * True when every write to the attribute sits under a branch, loop or
   * short-circuit, or follows an early return. Guarded writes are not
   * asserted as postconditions.
   */
  readonly guarded: boolean;
  readonly line: number;
}

/**
 * Shape of a returned expression.
 */
export type ReturnShape = 'literal' | 'attribute' | 'call' | 'variable' | 'computed' | 'void';

/**
 * A return statement.
 */
export interface ReturnsFact {
  readonly kind: 'returns';
  readonly shape: ReturnShape;
  /** Attribute or parameter the value comes from, when applicable. */
  readonly subject?: string;
  readonly description: string;
  readonly line: number;
}

/**
 * A guard clause that rejects some argument values before any work is
 * done; its negated test is a candidate precondition.
 */
export interface PreconditionCandidateFact {
  readonly kind: 'precondition_candidate';
  /** First parameter the guard inspects. */
  readonly subject?: string;
  /** Precondition statement, e.g. `amount > 0`. */
  readonly description: string;
  readonly line: number;
}

/**
 * A single static observation about an element's implementation.
 */
export type Fact = RaisesFact | MutatesFact | ReturnsFact | PreconditionCandidateFact;

/**
 * Kinds of facts.
 */
export type FactKind = Fact['kind'];

/**
 * Output of fact extraction for one element.
 */
export interface FactExtraction {
  readonly facts: readonly Fact[];
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Analyzer for bodies written in one source language.
 *
 * @param body - Body to analyze.
 * @param parameters - Parameters of the owning callable; used to describe
 *   conditions in terms of arguments.
 * @returns Facts in source order.
 * @throws UnreadableBodyError when the body cannot be analyzed.
 */
export type BodyAnalyzer = (
  body: BodyReference,
  parameters: readonly ParameterDescriptor[]
) => Fact[];

/**
 * Error thrown by a body analyzer for text it cannot analyze.
 */
export class UnreadableBodyError extends Error {
  /** Line of the first problem, when known. */
  public readonly line: number | undefined;

  /**
   * Creates a new UnreadableBodyError.
   *
   * @param message - Descriptive error message.
   * @param line - Line of the first problem.
   */
  constructor(message: string, line?: number) {
    super(message);
    this.name = 'UnreadableBodyError';
    this.line = line;
  }
}
