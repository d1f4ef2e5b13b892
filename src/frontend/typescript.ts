/**
 * TypeScript front end: builds an Element Tree from a source file with
 * ts-morph.
 *
 * @packageDocumentation
 */

import {
  type ArrowFunction,
  type ClassDeclaration,
  type ConstructorDeclaration,
  type FunctionDeclaration,
  type FunctionExpression,
  type JSDocableNode,
  type MethodDeclaration,
  Node,
  type ParameterDeclaration,
  Project,
  type SourceFile,
} from 'ts-morph';
import type { AttributeDescriptor, BodyReference, Element, ParameterDescriptor } from '../element/types.js';
import { normalizeSourceText } from '../facts/conditions.js';
import { stripCommentMarkers } from './doc-comment.js';

/**
 * Options for {@link extractElementTree}.
 */
export interface FrontendOptions {
  /**
   * Path used for qualified paths and locations. Defaults to the source
   * file's own path.
   */
  readonly filePath?: string;
}

/** Declared return types that mean "nothing is returned". */
const NO_RESULT_TYPES = new Set(['void', 'never', 'Promise<void>']);

/** Leading `/** *\/` block followed by a blank line or the end of file. */
const MODULE_DOC_PATTERN = /^\s*(\/\*\*[\s\S]*?\*\/)[ \t]*(?:\r?\n[ \t]*\r?\n|\s*$)/;

type Callable = FunctionDeclaration | MethodDeclaration | ConstructorDeclaration | ArrowFunction | FunctionExpression;

/**
 * Derives a module's qualified path from a file path:
 * `src/billing/account.ts` becomes `src.billing.account`.
 *
 * @param filePath - Path of the source file.
 */
export function modulePathFromFile(filePath: string): string {
  return filePath
    .replace(/\\/g, '/')
    .replace(/^\/+/, '')
    .replace(/^\.\//, '')
    .replace(/(\.d)?\.[cm]?tsx?$/, '')
    .split('/')
    .filter((segment) => segment !== '')
    .join('.');
}

interface ModuleDoc {
  readonly text: string;
  /** Offset just past the comment; element docs start after it. */
  readonly end: number;
}

function findModuleDoc(sourceFile: SourceFile): ModuleDoc | undefined {
  const fullText = sourceFile.getFullText();
  const match = MODULE_DOC_PATTERN.exec(fullText);
  const comment = match?.[1];
  if (match === null || comment === undefined) {
    return undefined;
  }
  return { text: stripCommentMarkers(comment), end: fullText.indexOf(comment) + comment.length };
}

function docTextOf(node: JSDocableNode, moduleDocEnd: number): string | undefined {
  const own = node.getJsDocs().filter((doc) => doc.getStart() >= moduleDocEnd);
  const last = own[own.length - 1];
  return last === undefined ? undefined : stripCommentMarkers(last.getText());
}

function typeTextOf(node: Node | undefined): string {
  return node === undefined ? '' : normalizeSourceText(node.getText());
}

/**
 * Destructured parameters have no name of their own; they are named by
 * position, e.g. `arg0`.
 */
function parameterOf(parameter: ParameterDeclaration, index: number): ParameterDescriptor {
  const nameNode = parameter.getNameNode();
  return {
    name: Node.isIdentifier(nameNode) ? nameNode.getText() : `arg${String(index)}`,
    type: typeTextOf(parameter.getTypeNode()),
    hasDefault: parameter.isOptional() || parameter.hasInitializer(),
  };
}

function returnTypeOf(callable: Callable): string | undefined {
  if (Node.isConstructorDeclaration(callable)) {
    return undefined;
  }
  const returnTypeNode = callable.getReturnTypeNode();
  const declared = returnTypeNode === undefined ? undefined : typeTextOf(returnTypeNode);
  return declared === undefined || NO_RESULT_TYPES.has(declared) ? undefined : declared;
}

function bodyOf(callable: Callable): BodyReference | undefined {
  const body = callable.getBody();
  if (body === undefined) {
    return undefined;
  }
  if (Node.isBlock(body)) {
    return { language: 'typescript', text: body.getText() };
  }
  return { language: 'typescript', text: `{ return ${body.getText()}; }` };
}

interface ElementContext {
  readonly filePath: string;
  readonly moduleDocEnd: number;
}

function callableElement(
  kind: 'method' | 'function',
  name: string,
  qualifiedPath: string,
  callable: Callable,
  docHost: JSDocableNode,
  locationNode: Node,
  context: ElementContext
): Element {
  const returnType = returnTypeOf(callable);
  const bodyReference = bodyOf(callable);
  const existingDocText = docTextOf(docHost, context.moduleDocEnd);

  return {
    kind,
    name,
    qualifiedPath,
    signature: {
      kind: 'callable',
      parameters: callable.getParameters().map((parameter, index) => parameterOf(parameter, index)),
    },
    ...(returnType !== undefined && { returnType }),
    ...(bodyReference !== undefined && { bodyReference }),
    ...(existingDocText !== undefined && { existingDocText }),
    children: [],
    location: {
      filePath: context.filePath,
      startLine: locationNode.getStartLineNumber(),
      endLine: locationNode.getEndLineNumber(),
    },
  };
}

function classAttributes(declaration: ClassDeclaration, constructor: ConstructorDeclaration | undefined): AttributeDescriptor[] {
  const properties = declaration
    .getProperties()
    .filter((property) => !property.isStatic())
    .map((property) => ({ name: property.getName(), type: typeTextOf(property.getTypeNode()) }));

  const parameterProperties = (constructor?.getParameters() ?? [])
    .filter((parameter) => parameter.isParameterProperty())
    .map((parameter) => ({ name: parameter.getName(), type: typeTextOf(parameter.getTypeNode()) }));

  return [...parameterProperties, ...properties];
}

function classElement(declaration: ClassDeclaration, modulePath: string, context: ElementContext): Element | undefined {
  const name = declaration.getName();
  if (name === undefined) {
    return undefined;
  }
  const qualifiedPath = `${modulePath}.${name}`;
  const constructor = declaration.getConstructors().find((candidate) => !candidate.isOverload());

  const children: Element[] = [];
  if (constructor !== undefined) {
    children.push(
      callableElement('method', 'constructor', `${qualifiedPath}.constructor`, constructor, constructor, constructor, context)
    );
  }
  for (const method of declaration.getMethods()) {
    if (method.isOverload()) {
      continue;
    }
    const methodName = method.getName();
    children.push(
      callableElement('method', methodName, `${qualifiedPath}.${methodName}`, method, method, method, context)
    );
  }

  const bodyReference = constructor !== undefined ? bodyOf(constructor) : undefined;
  const existingDocText = docTextOf(declaration, context.moduleDocEnd);

  return {
    kind: 'class',
    name,
    qualifiedPath,
    signature: { kind: 'attributes', attributes: classAttributes(declaration, constructor) },
    ...(bodyReference !== undefined && { bodyReference }),
    ...(existingDocText !== undefined && { existingDocText }),
    children,
    location: {
      filePath: context.filePath,
      startLine: declaration.getStartLineNumber(),
      endLine: declaration.getEndLineNumber(),
    },
  };
}

/**
 * Builds the Element Tree of one source file.
 *
 * The module element carries the leading `/** *\/` block when a blank line
 * separates it from the first statement. Children, in source order, are
 * classes (with their constructor and methods), function declarations,
 * and `const` declarations initialized with an arrow function or function
 * expression. Overload signatures and accessors are skipped.
 *
 * @param sourceFile - The parsed source file.
 * @param options - Front end options.
 * @returns The module element.
 */
export function extractElementTree(sourceFile: SourceFile, options: FrontendOptions = {}): Element {
  const filePath = options.filePath ?? sourceFile.getFilePath();
  const modulePath = modulePathFromFile(filePath);
  const moduleDoc = findModuleDoc(sourceFile);
  const context: ElementContext = { filePath, moduleDocEnd: moduleDoc?.end ?? 0 };

  const children: Element[] = [];
  for (const statement of sourceFile.getStatements()) {
    if (Node.isClassDeclaration(statement)) {
      const element = classElement(statement, modulePath, context);
      if (element !== undefined) {
        children.push(element);
      }
    } else if (Node.isFunctionDeclaration(statement)) {
      const name = statement.getName();
      if (name !== undefined && !statement.isOverload() && statement.hasBody()) {
        children.push(
          callableElement('function', name, `${modulePath}.${name}`, statement, statement, statement, context)
        );
      }
    } else if (Node.isVariableStatement(statement)) {
      for (const declaration of statement.getDeclarations()) {
        const initializer = declaration.getInitializer();
        if (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer)) {
          const name = declaration.getName();
          children.push(
            callableElement('function', name, `${modulePath}.${name}`, initializer, statement, statement, context)
          );
        }
      }
    }
  }

  const segments = modulePath.split('.');
  return {
    kind: 'module',
    name: segments[segments.length - 1] ?? modulePath,
    qualifiedPath: modulePath,
    signature: { kind: 'none' },
    ...(moduleDoc !== undefined && { existingDocText: moduleDoc.text }),
    children,
    location: {
      filePath,
      startLine: 1,
      endLine: sourceFile.getEndLineNumber(),
    },
  };
}

/**
 * Builds the Element Tree of TypeScript source text held in memory.
 *
 * @param text - Source text.
 * @param fileName - Path used for qualified paths, e.g. `src/billing.ts`.
 *
 * @example
 * ```typescript
 * const root = extractElementTreeFromSource('export function add(a: number, b: number): number { return a + b; }', 'src/math.ts');
 * root.children[0]?.qualifiedPath; // 'src.math.add'
 * ```
 */
export function extractElementTreeFromSource(text: string, fileName: string): Element {
  const project = new Project({ useInMemoryFileSystem: true });
  const sourceFile = project.createSourceFile(fileName, text);
  return extractElementTree(sourceFile, { filePath: fileName });
}
