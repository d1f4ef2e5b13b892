/**
 * Describes branch conditions in terms of what they inspect.
 *
 * @packageDocumentation
 */

import { Node, SyntaxKind } from 'ts-morph';

/**
 * Names the describer needs to know about the analyzed callable.
 */
export interface ConditionContext {
  /** Parameter names of the callable. */
  readonly parameters: ReadonlySet<string>;
}

/** Identifiers that never make a guard depend on state. */
const NEUTRAL_IDENTIFIERS = new Set([
  'undefined',
  'NaN',
  'Infinity',
  'Number',
  'String',
  'Boolean',
  'Array',
  'Object',
  'Math',
  'Date',
]);

/** Comparison operators mapped to their negation. */
const NEGATED_OPERATORS: ReadonlyMap<SyntaxKind, string> = new Map([
  [SyntaxKind.EqualsEqualsEqualsToken, '!=='],
  [SyntaxKind.ExclamationEqualsEqualsToken, '==='],
  [SyntaxKind.EqualsEqualsToken, '!='],
  [SyntaxKind.ExclamationEqualsToken, '=='],
  [SyntaxKind.LessThanToken, '>='],
  [SyntaxKind.GreaterThanToken, '<='],
  [SyntaxKind.LessThanEqualsToken, '>'],
  [SyntaxKind.GreaterThanEqualsToken, '<'],
]);

const EQUALITY_OPERATORS = new Set([
  SyntaxKind.EqualsEqualsEqualsToken,
  SyntaxKind.EqualsEqualsToken,
  SyntaxKind.ExclamationEqualsEqualsToken,
  SyntaxKind.ExclamationEqualsToken,
]);

const POSITIVE_EQUALITY = new Set([SyntaxKind.EqualsEqualsEqualsToken, SyntaxKind.EqualsEqualsToken]);

/**
 * Collapses whitespace in source text so that multi-line expressions read
 * as one line.
 *
 * @param text - Source text.
 */
export function normalizeSourceText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function article(word: string): string {
  return /^[aeiou]/i.test(word) ? 'an' : 'a';
}

/**
 * Names the value a node reads: `argument x` for parameters, `this.x` for
 * own attributes, the plain text for other identifiers and property paths.
 */
function subjectLabel(node: Node, context: ConditionContext): string | undefined {
  if (Node.isIdentifier(node)) {
    const name = node.getText();
    return context.parameters.has(name) ? `argument ${name}` : name;
  }
  if (Node.isPropertyAccessExpression(node)) {
    return normalizeSourceText(node.getText());
  }
  return undefined;
}

function isNullish(node: Node): boolean {
  return (
    node.getKind() === SyntaxKind.NullKeyword ||
    (Node.isIdentifier(node) && node.getText() === 'undefined')
  );
}

function describeEquality(
  left: Node,
  right: Node,
  operator: SyntaxKind,
  context: ConditionContext,
  negate: boolean
): string | undefined {
  const equal = POSITIVE_EQUALITY.has(operator) !== negate;

  const nullishSide = isNullish(right) ? left : isNullish(left) ? right : undefined;
  if (nullishSide !== undefined) {
    const label = subjectLabel(nullishSide, context);
    if (label !== undefined) {
      return equal ? `${label} is absent` : `${label} is present`;
    }
  }

  const typeofSide = Node.isTypeOfExpression(left) ? left : Node.isTypeOfExpression(right) ? right : undefined;
  const literalSide = Node.isStringLiteral(right) ? right : Node.isStringLiteral(left) ? left : undefined;
  if (typeofSide !== undefined && literalSide !== undefined) {
    const label = subjectLabel(typeofSide.getExpression(), context);
    const typeName = literalSide.getLiteralValue();
    if (label !== undefined) {
      return equal
        ? `${label} is ${article(typeName)} ${typeName}`
        : `${label} is not ${article(typeName)} ${typeName}`;
    }
  }

  return undefined;
}

/**
 * Describes a condition expression.
 *
 * Absence checks, truthiness tests and `typeof` tests are phrased in terms
 * of the argument or attribute they inspect; comparisons are kept as
 * written; `&&`/`||` are described part by part.
 *
 * @param node - The condition expression.
 * @param context - Parameters of the analyzed callable.
 * @param negate - Describe the condition being false instead.
 * @returns A one-line description.
 *
 * @example
 * ```typescript
 * // if (name === undefined)  ->  "argument name is absent"
 * // if (this.balance < amount)  ->  "this.balance < amount"
 * // negated: "this.balance >= amount"
 * ```
 */
export function describeCondition(node: Node, context: ConditionContext, negate = false): string {
  if (Node.isParenthesizedExpression(node)) {
    return describeCondition(node.getExpression(), context, negate);
  }

  if (Node.isPrefixUnaryExpression(node) && node.getOperatorToken() === SyntaxKind.ExclamationToken) {
    const operand = node.getOperand();
    const label = subjectLabel(operand, context);
    if (label !== undefined) {
      return negate ? `${label} is present` : `${label} is absent`;
    }
    return describeCondition(operand, context, !negate);
  }

  if (Node.isIdentifier(node) || Node.isPropertyAccessExpression(node)) {
    const label = subjectLabel(node, context);
    if (label !== undefined) {
      return negate ? `${label} is absent` : `${label} is present`;
    }
  }

  if (Node.isBinaryExpression(node)) {
    const operator = node.getOperatorToken().getKind();
    const left = node.getLeft();
    const right = node.getRight();

    if (operator === SyntaxKind.AmpersandAmpersandToken || operator === SyntaxKind.BarBarToken) {
      const conjunction = (operator === SyntaxKind.AmpersandAmpersandToken) !== negate;
      return `${describeCondition(left, context, negate)} ${conjunction ? 'and' : 'or'} ${describeCondition(right, context, negate)}`;
    }

    if (EQUALITY_OPERATORS.has(operator)) {
      const described = describeEquality(left, right, operator, context, negate);
      if (described !== undefined) {
        return described;
      }
    }

    if (operator === SyntaxKind.InstanceOfKeyword) {
      const label = subjectLabel(left, context) ?? normalizeSourceText(left.getText());
      const typeName = normalizeSourceText(right.getText());
      return negate
        ? `${label} is not an instance of ${typeName}`
        : `${label} is an instance of ${typeName}`;
    }

    const negatedOperator = NEGATED_OPERATORS.get(operator);
    if (negate && negatedOperator !== undefined) {
      return `${normalizeSourceText(left.getText())} ${negatedOperator} ${normalizeSourceText(right.getText())}`;
    }
  }

  const text = normalizeSourceText(node.getText());
  return negate ? `not (${text})` : text;
}

/**
 * Lists the parameters a condition reads, in order of first appearance.
 *
 * @param node - The condition expression.
 * @param context - Parameters of the analyzed callable.
 */
export function referencedParameters(node: Node, context: ConditionContext): string[] {
  const names: string[] = [];
  const visit = (candidate: Node): void => {
    if (Node.isIdentifier(candidate) && !isPropertyName(candidate)) {
      const name = candidate.getText();
      if (context.parameters.has(name) && !names.includes(name)) {
        names.push(name);
      }
    }
  };
  visit(node);
  node.forEachDescendant(visit);
  return names;
}

/**
 * Checks whether a condition depends only on the callable's arguments: it
 * reads at least one parameter, never `this`, and no other free
 * identifier apart from well-known globals.
 *
 * @param node - The condition expression.
 * @param context - Parameters of the analyzed callable.
 */
export function readsOnlyParameters(node: Node, context: ConditionContext): boolean {
  let onlyParameters = true;
  const visit = (candidate: Node): void => {
    if (candidate.getKind() === SyntaxKind.ThisKeyword) {
      onlyParameters = false;
      return;
    }
    if (Node.isIdentifier(candidate) && !isPropertyName(candidate)) {
      const name = candidate.getText();
      if (!context.parameters.has(name) && !NEUTRAL_IDENTIFIERS.has(name)) {
        onlyParameters = false;
      }
    }
  };
  visit(node);
  node.forEachDescendant(visit);
  return onlyParameters && referencedParameters(node, context).length > 0;
}

function isPropertyName(identifier: Node): boolean {
  const parent = identifier.getParent();
  return Node.isPropertyAccessExpression(parent) && parent.getNameNode() === identifier;
}
