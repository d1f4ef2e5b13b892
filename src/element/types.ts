/**
 * Type definitions for the Element Tree.
 *
 * The Element Tree is the only input the engine accepts. A language
 * specific front end builds it from source; every component downstream
 * treats it as a read-only snapshot for the duration of a run.
 *
 * @packageDocumentation
 */

/**
 * Kinds of documentable code elements.
 */
export type ElementKind = 'module' | 'class' | 'method' | 'function';

/**
 * All recognized element kinds, in schema order.
 */
export const ELEMENT_KINDS: readonly ElementKind[] = ['module', 'class', 'method', 'function'];

/**
 * A parameter of a callable element.
 */
export interface ParameterDescriptor {
  /** The parameter name as written in source. */
  readonly name: string;
  /** The declared type descriptor (e.g., "Money", "string | undefined"). */
  readonly type: string;
  /** Whether the parameter is optional or has a default value. */
  readonly hasDefault: boolean;
}

/**
 * An attribute declared by a class.
 */
export interface AttributeDescriptor {
  /** The attribute name. */
  readonly name: string;
  /** The declared type descriptor. */
  readonly type: string;
}

/**
 * Signature of an element: parameters for callables, attributes for
 * classes, nothing for modules.
 */
export type Signature =
  | { readonly kind: 'callable'; readonly parameters: readonly ParameterDescriptor[] }
  | { readonly kind: 'attributes'; readonly attributes: readonly AttributeDescriptor[] }
  | { readonly kind: 'none' };

/**
 * Opaque handle to an element's implementation.
 *
 * Only the Fact Extractor interprets it. For TypeScript the text is a
 * block statement (`{ ... }`) holding the callable's body.
 */
export interface BodyReference {
  /** Source language of the body, used to pick an analyzer. */
  readonly language: string;
  /** Materialized body text. */
  readonly text: string;
}

/**
 * Where an element lives in its source file (1-indexed, inclusive).
 */
export interface SourceLocation {
  readonly filePath: string;
  readonly startLine: number;
  readonly endLine: number;
}

/**
 * A documentable unit of code.
 *
 * Parents own their children exclusively; children carry no reference to
 * their parent.
 */
export interface Element {
  readonly kind: ElementKind;
  readonly name: string;
  /** Unique within a tree and stable across re-parses of one revision. */
  readonly qualifiedPath: string;
  readonly signature: Signature;
  /** Declared return type; absent for modules, classes and constructors. */
  readonly returnType?: string;
  readonly bodyReference?: BodyReference;
  /** Raw documentation text currently attached to the element. */
  readonly existingDocText?: string;
  readonly children: readonly Element[];
  readonly location?: SourceLocation;
}

/**
 * Returns the parameters of a callable element, or an empty list.
 *
 * @param element - The element to inspect.
 */
export function parametersOf(element: Element): readonly ParameterDescriptor[] {
  return element.signature.kind === 'callable' ? element.signature.parameters : [];
}

/**
 * Returns the attributes of a class element, or an empty list.
 *
 * @param element - The element to inspect.
 */
export function attributesOf(element: Element): readonly AttributeDescriptor[] {
  return element.signature.kind === 'attributes' ? element.signature.attributes : [];
}
