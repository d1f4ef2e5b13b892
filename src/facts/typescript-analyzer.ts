/**
 * TypeScript body analyzer built on ts-morph.
 *
 * Runs the raise, mutation and return scans over a callable body. Nested
 * functions and classes are separate scopes and are not scanned.
 *
 * @packageDocumentation
 */

import { Node, Project, SyntaxKind, type Block, type ReturnStatement } from 'ts-morph';
import type { BodyReference, ParameterDescriptor } from '../element/types.js';
import {
  type ConditionContext,
  describeCondition,
  normalizeSourceText,
  readsOnlyParameters,
  referencedParameters,
} from './conditions.js';
import {
  type Fact,
  type MutatesFact,
  type PreconditionCandidateFact,
  type ReturnShape,
  type ReturnsFact,
  UNCONDITIONAL,
  UnreadableBodyError,
} from './types.js';

/**
 * In-memory project holding one body at a time while it is analyzed.
 */
const BODY_PROJECT = new Project({
  useInMemoryFileSystem: true,
  compilerOptions: {
    strict: true,
    target: 99, // ScriptTarget.ESNext
  },
});

/** Wrapper that makes `await`, `yield` and `return` legal in any body. */
const WRAPPER_NAME = '__body__';
const WRAPPER_PREFIX = `async function* ${WRAPPER_NAME}() `;

/** Collection methods that modify their receiver. */
const MUTATING_METHODS = new Set([
  'push',
  'pop',
  'shift',
  'unshift',
  'splice',
  'sort',
  'reverse',
  'fill',
  'set',
  'delete',
  'clear',
  'add',
]);

let bodyCounter = 0;

function isNestedScope(node: Node): boolean {
  return (
    Node.isFunctionDeclaration(node) ||
    Node.isFunctionExpression(node) ||
    Node.isArrowFunction(node) ||
    Node.isClassDeclaration(node) ||
    Node.isClassExpression(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node) ||
    Node.isConstructorDeclaration(node)
  );
}

/**
 * Collects every node of the body's own scope in source order.
 */
function collectScopeNodes(block: Block): Node[] {
  const nodes: Node[] = [];
  block.forEachDescendant((node, traversal) => {
    if (isNestedScope(node)) {
      traversal.skip();
      return;
    }
    nodes.push(node);
  });
  return nodes;
}

function exceptionName(expression: Node): string {
  if (Node.isNewExpression(expression) || Node.isCallExpression(expression)) {
    return normalizeSourceText(expression.getExpression().getText());
  }
  return normalizeSourceText(expression.getText());
}

/**
 * Describes the nearest enclosing condition of a node, or returns
 * undefined when the node runs unconditionally.
 */
function enclosingTrigger(node: Node, block: Block, context: ConditionContext): string | undefined {
  let child: Node = node;
  let parent = node.getParent();

  while (parent !== undefined && parent !== block) {
    if (Node.isIfStatement(parent)) {
      if (child === parent.getThenStatement()) {
        return describeCondition(parent.getExpression(), context);
      }
      if (child === parent.getElseStatement()) {
        return describeCondition(parent.getExpression(), context, true);
      }
    }
    if (Node.isCaseClause(parent) || Node.isDefaultClause(parent)) {
      const switchStatement = parent.getParent().getParent();
      const subject = Node.isSwitchStatement(switchStatement)
        ? normalizeSourceText(switchStatement.getExpression().getText())
        : 'the switch subject';
      return Node.isCaseClause(parent)
        ? `${subject} is ${normalizeSourceText(parent.getExpression().getText())}`
        : `${subject} matches no case`;
    }
    if (Node.isCatchClause(parent)) {
      return 'the try block throws';
    }
    child = parent;
    parent = parent.getParent();
  }

  return undefined;
}

/**
 * Returns the guard's precondition when a throw is the then-branch of a
 * top-level `if` without `else` whose test reads only parameters.
 */
function guardPrecondition(
  node: Node,
  block: Block,
  context: ConditionContext
): PreconditionCandidateFact | undefined {
  const parent = node.getParent();
  const ifStatement = Node.isBlock(parent) && parent !== block ? parent.getParent() : parent;
  if (!Node.isIfStatement(ifStatement) || ifStatement.getParent() !== block) {
    return undefined;
  }
  if (ifStatement.getElseStatement() !== undefined) {
    return undefined;
  }
  const thenStatement = ifStatement.getThenStatement();
  if (thenStatement !== node && thenStatement !== parent) {
    return undefined;
  }

  const condition = ifStatement.getExpression();
  if (!readsOnlyParameters(condition, context)) {
    return undefined;
  }

  const subject = referencedParameters(condition, context)[0];
  return {
    kind: 'precondition_candidate',
    ...(subject !== undefined && { subject }),
    description: describeCondition(condition, context, true),
    line: ifStatement.getStartLineNumber(),
  };
}

function scanRaises(nodes: readonly Node[], block: Block, context: ConditionContext): Fact[] {
  const facts: Fact[] = [];
  const seenCandidates = new Set<string>();

  for (const node of nodes) {
    if (!Node.isThrowStatement(node)) {
      continue;
    }
    const exception = exceptionName(node.getExpression());
    const trigger = enclosingTrigger(node, block, context);

    facts.push({
      kind: 'raises',
      exception,
      triggerCondition: trigger ?? UNCONDITIONAL,
      description:
        trigger === undefined ? `${exception} raised unconditionally` : `${exception} raised when ${trigger}`,
      line: node.getStartLineNumber(),
    });

    const candidate = guardPrecondition(node, block, context);
    if (candidate !== undefined && !seenCandidates.has(candidate.description)) {
      seenCandidates.add(candidate.description);
      facts.push(candidate);
    }
  }

  return facts;
}

interface AttributeTarget {
  readonly subject: string;
  /** True for `this.x`, false for writes through it such as `this.x.y`. */
  readonly direct: boolean;
}

function attributeTarget(node: Node): AttributeTarget | undefined {
  let current: Node = node;
  let direct = true;

  while (Node.isPropertyAccessExpression(current) || Node.isElementAccessExpression(current)) {
    const inner = current.getExpression();
    if (inner.getKind() === SyntaxKind.ThisKeyword) {
      return Node.isPropertyAccessExpression(current) ? { subject: current.getName(), direct } : undefined;
    }
    current = inner;
    direct = false;
  }

  return undefined;
}

function isAssignmentOperator(kind: SyntaxKind): boolean {
  return kind >= SyntaxKind.FirstAssignment && kind <= SyntaxKind.LastAssignment;
}

function isShortCircuitOperator(kind: SyntaxKind): boolean {
  return (
    kind === SyntaxKind.AmpersandAmpersandToken ||
    kind === SyntaxKind.BarBarToken ||
    kind === SyntaxKind.QuestionQuestionToken ||
    kind === SyntaxKind.AmpersandAmpersandEqualsToken ||
    kind === SyntaxKind.BarBarEqualsToken ||
    kind === SyntaxKind.QuestionQuestionEqualsToken
  );
}

/**
 * Checks whether a node may be skipped on a normal pass through the body.
 */
function isGuarded(node: Node, block: Block, returnEnds: readonly number[]): boolean {
  const start = node.getStart();
  if (returnEnds.some((end) => end <= start)) {
    return true;
  }

  if (Node.isBinaryExpression(node) && isShortCircuitOperator(node.getOperatorToken().getKind())) {
    return true;
  }

  let child: Node = node;
  let parent = node.getParent();
  while (parent !== undefined && parent !== block) {
    if (Node.isIfStatement(parent) && child !== parent.getExpression()) {
      return true;
    }
    if (Node.isConditionalExpression(parent) && child !== parent.getCondition()) {
      return true;
    }
    if (
      Node.isBinaryExpression(parent) &&
      isShortCircuitOperator(parent.getOperatorToken().getKind()) &&
      child === parent.getRight()
    ) {
      return true;
    }
    if (
      Node.isCaseClause(parent) ||
      Node.isDefaultClause(parent) ||
      Node.isCatchClause(parent) ||
      Node.isForStatement(parent) ||
      Node.isForOfStatement(parent) ||
      Node.isForInStatement(parent) ||
      Node.isWhileStatement(parent) ||
      Node.isDoStatement(parent)
    ) {
      return true;
    }
    child = parent;
    parent = parent.getParent();
  }

  return false;
}

function describeAssignment(target: AttributeTarget, operator: SyntaxKind, right: Node): string {
  const attribute = `this.${target.subject}`;
  if (!target.direct) {
    return `${attribute} is modified`;
  }
  const value = normalizeSourceText(right.getText());
  switch (operator) {
    case SyntaxKind.EqualsToken:
      return `${attribute} is set to ${value}`;
    case SyntaxKind.PlusEqualsToken:
      return `${attribute} reflects ${value} added`;
    case SyntaxKind.MinusEqualsToken:
      return `${attribute} reflects ${value} deducted`;
    default:
      return `${attribute} is updated`;
  }
}

interface MutationOccurrence {
  readonly target: AttributeTarget;
  readonly description: string;
  readonly node: Node;
}

function mutationOf(node: Node): MutationOccurrence | undefined {
  if (Node.isBinaryExpression(node)) {
    const operator = node.getOperatorToken().getKind();
    const target = isAssignmentOperator(operator) ? attributeTarget(node.getLeft()) : undefined;
    return target === undefined
      ? undefined
      : { target, description: describeAssignment(target, operator, node.getRight()), node };
  }

  if (Node.isPrefixUnaryExpression(node) || Node.isPostfixUnaryExpression(node)) {
    const operator = node.getOperatorToken();
    if (operator !== SyntaxKind.PlusPlusToken && operator !== SyntaxKind.MinusMinusToken) {
      return undefined;
    }
    const target = attributeTarget(node.getOperand());
    if (target === undefined) {
      return undefined;
    }
    const verb = operator === SyntaxKind.PlusPlusToken ? 'incremented' : 'decremented';
    return {
      target,
      description: target.direct ? `this.${target.subject} is ${verb}` : `this.${target.subject} is modified`,
      node,
    };
  }

  if (Node.isDeleteExpression(node)) {
    const target = attributeTarget(node.getExpression());
    if (target === undefined) {
      return undefined;
    }
    return {
      target,
      description: target.direct ? `this.${target.subject} is removed` : `this.${target.subject} is modified`,
      node,
    };
  }

  if (Node.isCallExpression(node)) {
    const callee = node.getExpression();
    if (!Node.isPropertyAccessExpression(callee) || !MUTATING_METHODS.has(callee.getName())) {
      return undefined;
    }
    const target = attributeTarget(callee.getExpression());
    if (target === undefined) {
      return undefined;
    }
    return {
      target,
      description: `this.${target.subject} is modified via ${callee.getName()}`,
      node,
    };
  }

  return undefined;
}

function scanMutations(nodes: readonly Node[], block: Block): MutatesFact[] {
  const returnEnds = nodes.filter((node) => Node.isReturnStatement(node)).map((node) => node.getEnd());
  const bySubject = new Map<string, { kept: MutationOccurrence; guarded: boolean; allGuarded: boolean }>();

  for (const node of nodes) {
    const occurrence = mutationOf(node);
    if (occurrence === undefined) {
      continue;
    }
    const guarded = isGuarded(node, block, returnEnds);
    const existing = bySubject.get(occurrence.target.subject);

    if (existing === undefined) {
      bySubject.set(occurrence.target.subject, { kept: occurrence, guarded, allGuarded: guarded });
    } else if (existing.guarded && !guarded) {
      bySubject.set(occurrence.target.subject, { kept: occurrence, guarded, allGuarded: false });
    } else if (!guarded) {
      existing.allGuarded = false;
    }
  }

  return Array.from(bySubject.entries()).map(([subject, entry]) => ({
    kind: 'mutates',
    subject,
    description: entry.kept.description,
    guarded: entry.allGuarded,
    line: entry.kept.node.getStartLineNumber(),
  }));
}

function unwrapReturned(node: Node): Node {
  let current = node;
  while (
    Node.isParenthesizedExpression(current) ||
    Node.isAsExpression(current) ||
    Node.isNonNullExpression(current) ||
    Node.isAwaitExpression(current) ||
    Node.isSatisfiesExpression(current)
  ) {
    current = current.getExpression();
  }
  return current;
}

const LITERAL_KINDS = new Set([
  SyntaxKind.StringLiteral,
  SyntaxKind.NumericLiteral,
  SyntaxKind.BigIntLiteral,
  SyntaxKind.NoSubstitutionTemplateLiteral,
  SyntaxKind.RegularExpressionLiteral,
  SyntaxKind.TrueKeyword,
  SyntaxKind.FalseKeyword,
  SyntaxKind.NullKeyword,
]);

function classifyReturn(
  expression: Node | undefined,
  context: ConditionContext
): { shape: ReturnShape; subject?: string; description: string } {
  if (expression === undefined) {
    return { shape: 'void', description: 'returns without a value' };
  }

  const node = unwrapReturned(expression);
  const text = normalizeSourceText(node.getText());

  if (LITERAL_KINDS.has(node.getKind()) || (Node.isIdentifier(node) && text === 'undefined')) {
    return { shape: 'literal', description: `returns literal ${text}` };
  }
  if (Node.isPropertyAccessExpression(node) && node.getExpression().getKind() === SyntaxKind.ThisKeyword) {
    return { shape: 'attribute', subject: node.getName(), description: `returns attribute ${text}` };
  }
  if (Node.isCallExpression(node)) {
    return {
      shape: 'call',
      description: `returns the result of ${normalizeSourceText(node.getExpression().getText())}()`,
    };
  }
  if (Node.isNewExpression(node)) {
    return {
      shape: 'call',
      description: `returns a new ${normalizeSourceText(node.getExpression().getText())}`,
    };
  }
  if (Node.isIdentifier(node)) {
    return context.parameters.has(text)
      ? { shape: 'variable', subject: text, description: `returns argument ${text}` }
      : { shape: 'variable', description: `returns variable ${text}` };
  }
  return { shape: 'computed', description: `returns computed expression ${text}` };
}

function scanReturns(nodes: readonly Node[], context: ConditionContext): ReturnsFact[] {
  return nodes.filter((node): node is ReturnStatement => Node.isReturnStatement(node)).map((node) => {
    const classified = classifyReturn(node.getExpression(), context);
    return {
      kind: 'returns',
      shape: classified.shape,
      ...(classified.subject !== undefined && { subject: classified.subject }),
      description: classified.description,
      line: node.getStartLineNumber(),
    };
  });
}

function firstSyntaxError(sourceFileName: string): { message: string; line: number | undefined } | undefined {
  const sourceFile = BODY_PROJECT.getSourceFileOrThrow(sourceFileName);
  const diagnostic = BODY_PROJECT.getProgram().getSyntacticDiagnostics(sourceFile)[0];
  if (diagnostic === undefined) {
    return undefined;
  }
  const messageText = diagnostic.getMessageText();
  return {
    message: typeof messageText === 'string' ? messageText : messageText.getMessageText(),
    line: diagnostic.getLineNumber(),
  };
}

/**
 * Analyzes a TypeScript block body.
 *
 * @param body - Body whose text is a block statement (`{ ... }`).
 * @param parameters - Parameters of the owning callable.
 * @returns Raise-scan facts (with precondition candidates), then mutation
 *   facts, then return facts, each group in source order.
 * @throws UnreadableBodyError when the text is not a single block or has
 *   syntax errors.
 *
 * @example
 * ```typescript
 * const facts = analyzeTypeScriptBody(
 *   { language: 'typescript', text: '{ if (!name) { throw new TypeError(); } this.name = name; }' },
 *   [{ name: 'name', type: 'string', hasDefault: false }]
 * );
 * // raises TypeError when "argument name is absent", precondition "argument name is present",
 * // mutates name
 * ```
 */
export function analyzeTypeScriptBody(
  body: BodyReference,
  parameters: readonly ParameterDescriptor[]
): Fact[] {
  if (!body.text.trim().startsWith('{')) {
    throw new UnreadableBodyError('TypeScript body must be a block statement');
  }

  bodyCounter += 1;
  const fileName = `/bodies/body-${String(bodyCounter)}.ts`;
  const sourceFile = BODY_PROJECT.createSourceFile(fileName, WRAPPER_PREFIX + body.text);

  try {
    const syntaxError = firstSyntaxError(fileName);
    if (syntaxError !== undefined) {
      throw new UnreadableBodyError(`Body has syntax errors: ${syntaxError.message}`, syntaxError.line);
    }

    const wrapper = sourceFile.getFunction(WRAPPER_NAME);
    const block = wrapper?.getBody();
    if (wrapper === undefined || !Node.isBlock(block) || sourceFile.getStatements().length !== 1) {
      throw new UnreadableBodyError('Body text is not a single block statement');
    }

    const context: ConditionContext = { parameters: new Set(parameters.map((p) => p.name)) };
    const nodes = collectScopeNodes(block);

    return [
      ...scanRaises(nodes, block, context),
      ...scanMutations(nodes, block),
      ...scanReturns(nodes, context),
    ];
  } finally {
    BODY_PROJECT.removeSourceFile(sourceFile);
  }
}
