import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Value } from '../value/index.js';
import {
  DocumentParseError,
  UnsupportedFormatError,
  formatForPath,
  parseDocument,
  parseFormatName,
  readDocumentFile,
  readFlatEntries,
  serializeValues,
  writeDocumentFile,
  type DocumentFormat,
} from './formats.js';
import { DocumentFormatError, flattenDocument } from './tree.js';

function flat(content: string, format: DocumentFormat): Array<[string, string, unknown]> {
  return flattenDocument(parseDocument(content, format)).map(([key, value]) => [
    key,
    value.type(),
    value.toScalar(),
  ]);
}

const SAMPLE: Array<[string, Value]> = [
  ['server.host', Value.text('localhost')],
  ['server.port', Value.int(8080)],
  ['server.tls.enabled', Value.bool(true)],
  ['ratio', Value.number(2.5)],
];

describe('formatForPath', () => {
  it('should pick the format from the extension', () => {
    expect(formatForPath('settings.toml')).toBe('toml');
    expect(formatForPath('settings.TOML')).toBe('toml');
    expect(formatForPath('settings.yml')).toBe('yaml');
    expect(formatForPath('settings.yaml')).toBe('yaml');
    expect(formatForPath('settings.csv')).toBe('csv');
  });

  it('should fall back to JSON', () => {
    expect(formatForPath('settings')).toBe('json');
    expect(formatForPath('settings.ini')).toBe('json');
  });
});

describe('parseFormatName', () => {
  it('should accept supported names in any case', () => {
    expect(parseFormatName('YAML')).toBe('yaml');
    expect(parseFormatName('csv')).toBe('csv');
  });

  it('should reject unsupported names', () => {
    expect(() => parseFormatName('xml')).toThrow(UnsupportedFormatError);
    expect(() => parseFormatName('xml')).toThrow("Unsupported document format 'xml'");
  });
});

describe('parseDocument', () => {
  it('should parse JSON with typed scalars', () => {
    expect(flat('{"a": {"b": 1, "c": 1.5}, "d": "x", "e": false}', 'json')).toEqual([
      ['a.b', 'int', 1],
      ['a.c', 'number', 1.5],
      ['d', 'text', 'x'],
      ['e', 'bool', false],
    ]);
  });

  it('should parse TOML tables', () => {
    const toml = `
name = "demo"

[server]
host = "localhost"
port = 8080
ratio = 0.75
`;
    expect(flat(toml, 'toml')).toEqual([
      ['name', 'text', 'demo'],
      ['server.host', 'text', 'localhost'],
      ['server.port', 'int', 8080],
      ['server.ratio', 'number', 0.75],
    ]);
  });

  it('should parse YAML mappings', () => {
    const yaml = 'server:\n  port: 8080\n  debug: true\nname: demo\n';
    expect(flat(yaml, 'yaml')).toEqual([
      ['server.port', 'int', 8080],
      ['server.debug', 'bool', true],
      ['name', 'text', 'demo'],
    ]);
  });

  it('should parse CSV lines, skipping blanks and comments', () => {
    const csv = '# settings\n\nname,"a,b"\nserver.port,8080\nratio,-0.5\non,true\nmode,fast\n';
    expect(flat(csv, 'csv')).toEqual([
      ['name', 'text', 'a,b'],
      ['server.port', 'int', 8080],
      ['ratio', 'number', -0.5],
      ['on', 'bool', true],
      ['mode', 'text', 'fast'],
    ]);
  });

  it('should treat empty content as an empty document', () => {
    expect(flat('', 'json')).toEqual([]);
    expect(flat('  \n', 'yaml')).toEqual([]);
  });

  it('should wrap syntax errors in DocumentParseError', () => {
    expect(() => parseDocument('{"a": ', 'json')).toThrow(DocumentParseError);
    expect(() => parseDocument('{"a": ', 'json')).toThrow(/^Invalid JSON syntax: /);
    expect(() => parseDocument('a = = 1', 'toml')).toThrow(/^Invalid TOML syntax: /);
  });

  it('should reject CSV lines without a key', () => {
    expect(() => parseDocument('novalue\n', 'csv')).toThrow(
      "Expected 'key,value' on line 1, got 'novalue'"
    );
    expect(() => parseDocument(',1\n', 'csv')).toThrow(DocumentParseError);
  });

  it('should reject arrays in every structured format', () => {
    expect(() => parseDocument('{"list": [1, 2]}', 'json')).toThrow(DocumentFormatError);
    expect(() => parseDocument('list = [1, 2]', 'toml')).toThrow(DocumentFormatError);
    expect(() => parseDocument('list:\n  - 1\n', 'yaml')).toThrow(DocumentFormatError);
  });
});

describe('serializeValues', () => {
  it('should write nested JSON', () => {
    expect(serializeValues(SAMPLE, 'json')).toBe(
      [
        '{',
        '  "server": {',
        '    "host": "localhost",',
        '    "port": 8080,',
        '    "tls": {',
        '      "enabled": true',
        '    }',
        '  },',
        '  "ratio": 2.5',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should write flat CSV lines with quoted text', () => {
    const entries: Array<[string, Value]> = [
      ['name', Value.text('a,b')],
      ['count', Value.int(-3)],
      ['ratio', Value.number(2.5)],
      ['on', Value.bool(false)],
    ];
    expect(serializeValues(entries, 'csv')).toBe(
      'name,"a,b"\ncount,-3\nratio,2.5\non,false\n'
    );
  });

  it('should write CSV numbers as decimal text that reads back as a number', () => {
    const entries: Array<[string, Value]> = [
      ['whole', Value.number(2)],
      ['tiny', Value.number(1e-7)],
      ['small', Value.number(-1.5e-7)],
      ['huge', Value.number(1e21)],
    ];
    const content = serializeValues(entries, 'csv');

    expect(content).toBe(
      'whole,2.0\ntiny,0.0000001\nsmall,-0.00000015\nhuge,1000000000000000000000.0\n'
    );
    expect(flat(content, 'csv')).toEqual([
      ['whole', 'number', 2],
      ['tiny', 'number', 1e-7],
      ['small', 'number', -1.5e-7],
      ['huge', 'number', 1e21],
    ]);
  });

  it('should round-trip a __proto__ key through JSON', () => {
    const entries = flattenDocument(parseDocument('{"__proto__": {"x": 1}, "a": 2}', 'json'));
    const content = serializeValues(entries, 'json');

    expect(content).toBe('{\n  "__proto__": {\n    "x": 1\n  },\n  "a": 2\n}\n');
    expect(flat(content, 'json')).toEqual([
      ['__proto__.x', 'int', 1],
      ['a', 'int', 2],
    ]);
  });

  it('should skip empty values', () => {
    const entries: Array<[string, Value]> = [
      ['a', Value.unknown()],
      ['b', Value.int(1)],
    ];
    expect(serializeValues(entries, 'csv')).toBe('b,1\n');
    expect(serializeValues(entries, 'json')).toBe('{\n  "b": 1\n}\n');
  });

  it('should read back what it writes in every format', () => {
    const expected = [
      ['server.host', 'text', 'localhost'],
      ['server.port', 'int', 8080],
      ['server.tls.enabled', 'bool', true],
      ['ratio', 'number', 2.5],
    ];
    for (const format of ['json', 'toml', 'yaml', 'csv'] as const) {
      const parsed = flat(serializeValues(SAMPLE, format), format);
      const byKey = [...parsed].sort(([a], [b]) => a.localeCompare(b));
      expect(byKey).toEqual([...expected].sort(([a], [b]) => String(a).localeCompare(String(b))));
    }
  });
});

describe('document files', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'formats-test-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should read a file using its extension', async () => {
    const filePath = join(tempDir, 'settings.yaml');
    await writeFile(filePath, 'limits:\n  retries: 3\n', 'utf-8');

    const entries = readFlatEntries(filePath);
    expect(entries.map(([key, value]) => [key, value.getInt()])).toEqual([['limits.retries', 3]]);
  });

  it('should write a file in the format its extension names', async () => {
    const filePath = join(tempDir, 'out.csv');
    writeDocumentFile(filePath, [['a.b', Value.text('x')]]);
    expect(await readFile(filePath, 'utf-8')).toBe('a.b,"x"\n');
    expect(flattenDocument(readDocumentFile(filePath))[0]?.[1].getText()).toBe('x');
  });

  it('should honour an explicit format over the extension', async () => {
    const filePath = join(tempDir, 'out.txt');
    writeDocumentFile(filePath, [['n', Value.int(1)]], 'json');
    expect(await readFile(filePath, 'utf-8')).toBe('{\n  "n": 1\n}\n');
  });
});
