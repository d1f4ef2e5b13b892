/**
 * Loader for element trees handed over as JSON by an external front end.
 *
 * @packageDocumentation
 */

import { getSchemaRule } from '../schema/registry.js';
import type {
  AttributeDescriptor,
  BodyReference,
  Element,
  ParameterDescriptor,
  Signature,
  SourceLocation,
} from './types.js';

/**
 * Error class for structurally invalid element trees.
 */
export class ElementTreeError extends Error {
  /** Path to the offending field, e.g. `root.children[2].name`. */
  public readonly fieldPath: string;

  /**
   * Creates a new ElementTreeError.
   *
   * @param message - Descriptive error message.
   * @param fieldPath - Path to the offending field.
   */
  constructor(message: string, fieldPath: string) {
    super(message);
    this.name = 'ElementTreeError';
    this.fieldPath = fieldPath;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ElementTreeError(`Invalid type for '${fieldPath}': expected object`, fieldPath);
  }
  return value;
}

function expectString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ElementTreeError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`,
      fieldPath
    );
  }
  return value;
}

function expectNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ElementTreeError(`Invalid type for '${fieldPath}': expected integer`, fieldPath);
  }
  return value;
}

function expectArray(value: unknown, fieldPath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ElementTreeError(`Invalid type for '${fieldPath}': expected array`, fieldPath);
  }
  return value;
}

function parseParameter(raw: unknown, fieldPath: string): ParameterDescriptor {
  const record = expectRecord(raw, fieldPath);
  const hasDefault = record.hasDefault ?? false;
  if (typeof hasDefault !== 'boolean') {
    throw new ElementTreeError(
      `Invalid type for '${fieldPath}.hasDefault': expected boolean`,
      `${fieldPath}.hasDefault`
    );
  }
  return {
    name: expectString(record.name, `${fieldPath}.name`),
    type: expectString(record.type, `${fieldPath}.type`),
    hasDefault,
  };
}

function parseAttribute(raw: unknown, fieldPath: string): AttributeDescriptor {
  const record = expectRecord(raw, fieldPath);
  return {
    name: expectString(record.name, `${fieldPath}.name`),
    type: expectString(record.type, `${fieldPath}.type`),
  };
}

function parseSignature(raw: unknown, fieldPath: string): Signature {
  if (raw === undefined) {
    return { kind: 'none' };
  }
  const record = expectRecord(raw, fieldPath);
  const kind = expectString(record.kind, `${fieldPath}.kind`);

  switch (kind) {
    case 'callable':
      return {
        kind,
        parameters: expectArray(record.parameters, `${fieldPath}.parameters`).map((p, i) =>
          parseParameter(p, `${fieldPath}.parameters[${String(i)}]`)
        ),
      };
    case 'attributes':
      return {
        kind,
        attributes: expectArray(record.attributes, `${fieldPath}.attributes`).map((a, i) =>
          parseAttribute(a, `${fieldPath}.attributes[${String(i)}]`)
        ),
      };
    case 'none':
      return { kind };
    default:
      throw new ElementTreeError(
        `Invalid value for '${fieldPath}.kind': expected 'callable', 'attributes', or 'none', got '${kind}'`,
        `${fieldPath}.kind`
      );
  }
}

function parseBodyReference(raw: unknown, fieldPath: string): BodyReference {
  const record = expectRecord(raw, fieldPath);
  return {
    language: expectString(record.language, `${fieldPath}.language`),
    text: expectString(record.text, `${fieldPath}.text`),
  };
}

function parseLocation(raw: unknown, fieldPath: string): SourceLocation {
  const record = expectRecord(raw, fieldPath);
  return {
    filePath: expectString(record.filePath, `${fieldPath}.filePath`),
    startLine: expectNumber(record.startLine, `${fieldPath}.startLine`),
    endLine: expectNumber(record.endLine, `${fieldPath}.endLine`),
  };
}

function parseElement(raw: unknown, fieldPath: string): Element {
  const record = expectRecord(raw, fieldPath);
  const kind = expectString(record.kind, `${fieldPath}.kind`);
  // Throws SchemaLookupError for kinds the engine does not know.
  const rule = getSchemaRule(kind);

  const children =
    record.children === undefined
      ? []
      : expectArray(record.children, `${fieldPath}.children`).map((child, i) =>
          parseElement(child, `${fieldPath}.children[${String(i)}]`)
        );

  return {
    kind: rule.kind,
    name: expectString(record.name, `${fieldPath}.name`),
    qualifiedPath: expectString(record.qualifiedPath, `${fieldPath}.qualifiedPath`),
    signature: parseSignature(record.signature, `${fieldPath}.signature`),
    children,
    ...(record.returnType !== undefined && {
      returnType: expectString(record.returnType, `${fieldPath}.returnType`),
    }),
    ...(record.bodyReference !== undefined && {
      bodyReference: parseBodyReference(record.bodyReference, `${fieldPath}.bodyReference`),
    }),
    ...(record.existingDocText !== undefined && {
      existingDocText: expectString(record.existingDocText, `${fieldPath}.existingDocText`),
    }),
    ...(record.location !== undefined && {
      location: parseLocation(record.location, `${fieldPath}.location`),
    }),
  };
}

/**
 * Validates an untrusted JSON value and returns it as a typed element tree.
 *
 * @param raw - Parsed JSON, typically from a front end written in another
 *   language.
 * @returns The root element.
 * @throws ElementTreeError for structural problems.
 * @throws SchemaLookupError for an unrecognized element kind.
 *
 * @example
 * ```typescript
 * const root = elementTreeFromJson(JSON.parse(await readFile('tree.json', 'utf-8')));
 * ```
 */
export function elementTreeFromJson(raw: unknown): Element {
  return parseElement(raw, 'root');
}
