/**
 * Document readers and writers keyed by file extension.
 *
 * Supported formats:
 * - `json` (also the fallback for missing or unrecognized extensions)
 * - `toml`
 * - `yaml` (`.yaml`, `.yml`)
 * - `csv`: flat `key,value` lines
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { dump as dumpYaml, load as loadYaml } from 'js-yaml';
import { safeReadTextFileSync, safeWriteFileSync } from '../utils/safe-fs.js';
import { Value } from '../value/index.js';
import { isNumericLiteral } from '../resolution/tokens.js';
import {
  documentFromPlain,
  documentToPlain,
  flattenDocument,
  mapNode,
  unflattenEntries,
  type MapNode,
} from './tree.js';

export type DocumentFormat = 'json' | 'toml' | 'yaml' | 'csv';

/**
 * Reads the document at a path.
 */
export type DocumentReader = (filePath: string) => MapNode;

/**
 * Error class for document parsing errors.
 */
export class DocumentParseError extends Error {
  /** Format the content was parsed as. */
  public readonly format: DocumentFormat;

  /**
   * Creates a new DocumentParseError.
   *
   * @param message - Descriptive error message.
   * @param format - Format the content was parsed as.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, format: DocumentFormat, cause?: unknown) {
    super(message, { cause });
    this.name = 'DocumentParseError';
    this.format = format;
  }
}

/**
 * Error thrown when a format name is not one of the supported formats.
 */
export class UnsupportedFormatError extends Error {
  /** The rejected format name. */
  public readonly format: string;

  constructor(format: string) {
    super(`Unsupported document format '${format}'. Supported formats: json, toml, yaml, csv`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

const EXTENSION_FORMATS: ReadonlyMap<string, DocumentFormat> = new Map([
  ['.json', 'json'],
  ['.toml', 'toml'],
  ['.yaml', 'yaml'],
  ['.yml', 'yaml'],
  ['.csv', 'csv'],
]);

const FORMAT_NAMES: ReadonlyMap<string, DocumentFormat> = new Map([
  ['json', 'json'],
  ['toml', 'toml'],
  ['yaml', 'yaml'],
  ['csv', 'csv'],
]);

const INTEGER_LITERAL = /^[-+]?\d+$/;

/**
 * Narrows a format name supplied by a user.
 *
 * @param name - Format name, case-insensitive.
 * @returns The format.
 * @throws UnsupportedFormatError if the name is not a supported format.
 */
export function parseFormatName(name: string): DocumentFormat {
  const format = FORMAT_NAMES.get(name.toLowerCase());
  if (format === undefined) {
    throw new UnsupportedFormatError(name);
  }
  return format;
}

/**
 * Picks a format from a file's extension, falling back to JSON.
 */
export function formatForPath(filePath: string): DocumentFormat {
  return EXTENSION_FORMATS.get(path.extname(filePath).toLowerCase()) ?? 'json';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseCsvCell(cell: string, lineNumber: number): Value {
  if (cell.startsWith('"')) {
    try {
      const parsed: unknown = JSON.parse(cell);
      if (typeof parsed === 'string') {
        return Value.text(parsed);
      }
    } catch (error) {
      throw new DocumentParseError(
        `Invalid quoted value on line ${String(lineNumber)}: ${errorMessage(error)}`,
        'csv',
        error
      );
    }
  }
  if (cell === 'true' || cell === 'false') {
    return Value.bool(cell === 'true');
  }
  if (INTEGER_LITERAL.test(cell)) {
    const parsed = Number.parseInt(cell, 10);
    if (Number.isSafeInteger(parsed)) {
      return Value.int(parsed);
    }
  }
  if (isNumericLiteral(cell)) {
    return Value.number(Number.parseFloat(cell));
  }
  return Value.text(cell);
}

function parseCsv(content: string): MapNode {
  const entries: Array<[string, Value]> = [];
  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }
    const comma = line.indexOf(',');
    if (comma <= 0) {
      throw new DocumentParseError(
        `Expected 'key,value' on line ${String(index + 1)}, got '${line}'`,
        'csv'
      );
    }
    const key = line.slice(0, comma).trim();
    entries.push([key, parseCsvCell(line.slice(comma + 1).trim(), index + 1)]);
  });
  return unflattenEntries(entries);
}

/**
 * Parses document content in the given format.
 *
 * Empty content yields an empty document.
 *
 * @param content - Raw document text.
 * @param format - Format to parse as.
 * @returns The document root.
 * @throws DocumentParseError for a syntax error.
 * @throws DocumentFormatError for arrays or other unsupported nodes.
 */
export function parseDocument(content: string, format: DocumentFormat): MapNode {
  if (content.trim() === '') {
    return mapNode();
  }
  if (format === 'csv') {
    return parseCsv(content);
  }

  let raw: unknown;
  try {
    switch (format) {
      case 'json':
        raw = JSON.parse(content);
        break;
      case 'toml':
        raw = TOML.parse(content);
        break;
      case 'yaml':
        raw = loadYaml(content);
        break;
    }
  } catch (error) {
    throw new DocumentParseError(
      `Invalid ${format.toUpperCase()} syntax: ${errorMessage(error)}`,
      format,
      error
    );
  }
  return documentFromPlain(raw);
}

/**
 * Reads and parses the document at a path, choosing the format by extension.
 *
 * This is the default {@link DocumentReader}.
 *
 * @param filePath - Path to the document.
 * @returns The document root.
 */
export function readDocumentFile(filePath: string): MapNode {
  const content = safeReadTextFileSync(filePath);
  return parseDocument(content, formatForPath(filePath));
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([-+]\d+)$/;

/**
 * Writes a number as plain decimal text that always carries a fraction, so
 * that it reads back as a number rather than an int.
 *
 * @example
 * ```typescript
 * decimalText(2);    // "2.0"
 * decimalText(1e-7); // "0.0000001"
 * ```
 */
function decimalText(n: number): string {
  const text = String(n);
  const match = EXPONENT_FORM.exec(text);
  if (match === null) {
    return Number.isInteger(n) ? `${text}.0` : text;
  }

  const [, sign = '', lead = '', fraction = '', exponent = '0'] = match;
  const digits = lead + fraction;
  // Digits before the decimal point.
  const point = 1 + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}.0`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function csvCell(value: Value): string {
  switch (value.type()) {
    case 'int':
      return String(value.getInt());
    case 'number':
      return decimalText(value.getNumber());
    case 'bool':
    case 'text':
    case 'unknown':
      return value.print();
  }
}

/**
 * Serializes flat dot-path entries.
 *
 * JSON, TOML and YAML output is nested by splitting keys on `.`. CSV output
 * is one `key,value` line per entry: numbers as decimal text, booleans as
 * `true`/`false`, text double-quoted. Empty values are skipped.
 *
 * @param entries - Flat entries, typically from resolved options.
 * @param format - Output format.
 * @returns The serialized document.
 * @throws DocumentFormatError if the keys cannot be nested.
 */
export function serializeValues(
  entries: Iterable<readonly [string, Value]>,
  format: DocumentFormat
): string {
  const present = [...entries].filter(([, value]) => !value.isEmpty());

  if (format === 'csv') {
    return present.map(([key, value]) => `${key},${csvCell(value)}\n`).join('');
  }

  const plain = documentToPlain(unflattenEntries(present));
  switch (format) {
    case 'json':
      return JSON.stringify(plain, null, 2) + '\n';
    case 'toml':
      return TOML.stringify(plain);
    case 'yaml':
      return dumpYaml(plain);
  }
}

/**
 * Serializes entries and writes them to a file.
 *
 * @param filePath - Destination path.
 * @param entries - Flat entries to write.
 * @param format - Output format; chosen from the extension when omitted.
 */
export function writeDocumentFile(
  filePath: string,
  entries: Iterable<readonly [string, Value]>,
  format: DocumentFormat = formatForPath(filePath)
): void {
  safeWriteFileSync(filePath, serializeValues(entries, format), 'utf-8');
}

/**
 * Reads a document and returns its flattened entries.
 *
 * @param filePath - Path to the document.
 * @param reader - Reader to use.
 * @returns Flat dot-path entries.
 */
export function readFlatEntries(
  filePath: string,
  reader: DocumentReader = readDocumentFile
): Array<[string, Value]> {
  return flattenDocument(reader(filePath));
}
