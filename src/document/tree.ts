/**
 * Hierarchical document model with dot-path flattening.
 *
 * A loaded config file is represented as a tree of maps whose leaves are
 * scalar values. Flattening joins the keys along each path with `.`;
 * unflattening splits them back into nested maps.
 *
 * @packageDocumentation
 */

import { Value, type Scalar } from '../value/index.js';

/**
 * Leaf node holding a single value.
 */
export interface ScalarNode {
  readonly kind: 'scalar';
  readonly value: Value;
}

/**
 * Inner node holding ordered named children.
 */
export interface MapNode {
  readonly kind: 'map';
  readonly children: Map<string, DocumentNode>;
}

export type DocumentNode = ScalarNode | MapNode;

/**
 * Plain nested object produced by document parsers and consumed by writers.
 */
export interface PlainDocument {
  [key: string]: Scalar | PlainDocument;
}

/** Separator between dot-path segments. */
export const PATH_SEPARATOR = '.';

/**
 * Error thrown when a document cannot be represented as a tree of maps and scalars.
 */
export class DocumentFormatError extends Error {
  /** Dot path of the offending node, or the empty string for the root. */
  public readonly path: string;

  /**
   * Creates a new DocumentFormatError.
   *
   * @param message - Descriptive error message.
   * @param path - Dot path of the offending node.
   */
  constructor(message: string, path: string) {
    super(message);
    this.name = 'DocumentFormatError';
    this.path = path;
  }
}

export function scalarNode(value: Value): ScalarNode {
  return { kind: 'scalar', value };
}

export function mapNode(children: Map<string, DocumentNode> = new Map()): MapNode {
  return { kind: 'map', children };
}

function joinPath(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}${PATH_SEPARATOR}${key}`;
}

/**
 * Flattens a document into dot-path entries, depth first and in document order.
 *
 * @param root - The document root.
 * @returns One entry per scalar leaf.
 *
 * @example
 * ```typescript
 * flattenDocument(documentFromPlain({ a: { b: 1 }, c: 'x' }));
 * // [['a.b', Value.int(1)], ['c', Value.text('x')]]
 * ```
 */
export function flattenDocument(root: MapNode): Array<[string, Value]> {
  const entries: Array<[string, Value]> = [];

  const visit = (node: MapNode, prefix: string): void => {
    for (const [key, child] of node.children) {
      const path = joinPath(prefix, key);
      if (child.kind === 'scalar') {
        entries.push([path, child.value.copy()]);
      } else {
        visit(child, path);
      }
    }
  };

  visit(root, '');
  return entries;
}

/**
 * Builds a document from dot-path entries, creating intermediate maps as needed.
 *
 * @param entries - Flat dot-path entries.
 * @returns The document root.
 * @throws DocumentFormatError for an empty segment, or when a path is used both
 *   as a value and as a section.
 */
export function unflattenEntries(entries: Iterable<readonly [string, Value]>): MapNode {
  const root = mapNode();

  for (const [path, value] of entries) {
    const segments = path.split(PATH_SEPARATOR);
    if (segments.some((segment) => segment === '')) {
      throw new DocumentFormatError(`Key '${path}' contains an empty segment`, path);
    }

    const leaf = segments.pop() ?? '';
    let node = root;
    let walked = '';

    for (const segment of segments) {
      walked = joinPath(walked, segment);
      const existing = node.children.get(segment);
      if (existing === undefined) {
        const created = mapNode();
        node.children.set(segment, created);
        node = created;
      } else if (existing.kind === 'map') {
        node = existing;
      } else {
        throw new DocumentFormatError(
          `Key '${walked}' is both a value and a section (while adding '${path}')`,
          walked
        );
      }
    }

    if (node.children.get(leaf)?.kind === 'map') {
      throw new DocumentFormatError(`Key '${path}' is both a value and a section`, path);
    }
    node.children.set(leaf, scalarNode(value.copy()));
  }

  return root;
}

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  return (
    typeof raw === 'object' && raw !== null && !Array.isArray(raw) && !(raw instanceof Date)
  );
}

function scalarFromPlain(raw: unknown, path: string): Value {
  if (typeof raw === 'string' || typeof raw === 'boolean') {
    return Value.from(raw);
  }
  if (typeof raw === 'number') {
    if (Number.isNaN(raw)) {
      throw new DocumentFormatError(`Unsupported NaN value at '${path}'`, path);
    }
    return Value.from(raw);
  }
  if (typeof raw === 'bigint') {
    const asNumber = Number(raw);
    if (!Number.isSafeInteger(asNumber)) {
      throw new DocumentFormatError(`Integer at '${path}' is outside the safe range`, path);
    }
    return Value.int(asNumber);
  }
  if (raw instanceof Date) {
    return Value.text(raw.toISOString());
  }
  if (Array.isArray(raw)) {
    throw new DocumentFormatError(`Arrays are not supported (at '${path}')`, path);
  }
  const description = raw === null ? 'null' : typeof raw;
  throw new DocumentFormatError(`Unsupported ${description} value at '${path}'`, path);
}

/**
 * Converts a parsed JSON, TOML or YAML object into a document tree.
 *
 * Integral numbers become `int` leaves and other numbers `number` leaves.
 * Dates become ISO-8601 text. Arrays, nulls and other non-scalars are rejected.
 *
 * @param raw - The parsed object.
 * @returns The document root.
 * @throws DocumentFormatError if the object contains an unsupported node.
 */
export function documentFromPlain(raw: unknown): MapNode {
  const convert = (node: Record<string, unknown>, prefix: string): MapNode => {
    const result = mapNode();
    for (const [key, child] of Object.entries(node)) {
      const path = joinPath(prefix, key);
      result.children.set(
        key,
        isPlainObject(child) ? convert(child, path) : scalarNode(scalarFromPlain(child, path))
      );
    }
    return result;
  };

  if (!isPlainObject(raw)) {
    throw new DocumentFormatError('Document root must be a table of keys', '');
  }
  return convert(raw, '');
}

/**
 * Converts a document tree into a plain nested object for writers.
 *
 * Empty leaves are skipped.
 *
 * @param root - The document root.
 * @returns A plain nested object.
 */
export function documentToPlain(root: MapNode): PlainDocument {
  const result: PlainDocument = {};
  const set = (key: string, value: PlainDocument[string]): void => {
    // Own data property, so a key such as `__proto__` stays a key.
    Object.defineProperty(result, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  };
  for (const [key, child] of root.children) {
    if (child.kind === 'map') {
      set(key, documentToPlain(child));
      continue;
    }
    const scalar = child.value.toScalar();
    if (scalar !== undefined) {
      set(key, scalar);
    }
  }
  return result;
}
