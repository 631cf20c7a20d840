/**
 * Integration tests for CLI commands.
 *
 * Drives the command dispatcher end to end against documents written to a
 * temporary directory, capturing console output.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { runCli } from '../../src/cli/app.js';
import { readFlatEntries } from '../../src/document/index.js';

describe('CLI Integration Tests', () => {
  let testDir: string;
  let inputPath: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'tierconf-cli-'));
    inputPath = join(testDir, 'settings.json');
    writeFileSync(
      inputPath,
      JSON.stringify({ title: 'demo', server: { port: 8080, debug: true } }),
      'utf-8'
    );

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  function errors(): string[] {
    return consoleErrorSpy.mock.calls.map((call) => String(call[0]));
  }

  describe('flatten', () => {
    it('should print flat key,value lines', () => {
      const result = runCli(['flatten', inputPath]);

      expect(result.exitCode).toBe(0);
      expect(printed()).toEqual(['title,"demo"\nserver.port,8080\nserver.debug,true']);
    });

    it('should print a table of values', () => {
      const result = runCli(['flatten', inputPath, '--table']);

      expect(result.exitCode).toBe(0);
      const lines = (printed()[0] ?? '').split('\n');
      expect(lines[1]).toBe('| Key          | Type | Value  | Source |');
      expect(lines[4]).toBe('| server.port  | INT  | 8080   | file   |');
    });

    it('should write the lines to a file', () => {
      const outputPath = join(testDir, 'flat.csv');
      const result = runCli(['flatten', inputPath, '-o', outputPath]);

      expect(result.exitCode).toBe(0);
      expect(readFileSync(outputPath, 'utf-8')).toBe(
        'title,"demo"\nserver.port,8080\nserver.debug,true\n'
      );
      expect(printed()).toEqual([`Wrote 3 entries to ${outputPath}`]);
    });

    it('should warn about unrecognized options and carry on', () => {
      const result = runCli(['flatten', inputPath, '--zzz', '1']);

      expect(result.exitCode).toBe(0);
      expect(errors()).toEqual(["warning: Unrecognized option '--zzz'; its value is kept as text"]);
    });

    it('should fail on a malformed token', () => {
      const result = runCli(['flatten', inputPath, '--']);

      expect(result.exitCode).toBe(1);
      expect(errors()).toEqual(["error: Malformed token '--'"]);
      expect(printed()).toEqual([]);
    });

    it('should fail without an input document', () => {
      const result = runCli(['flatten']);

      expect(result.exitCode).toBe(1);
      expect(errors()[0]).toBe('Error: Missing input document');
    });

    it('should throw for a document that does not exist', () => {
      expect(() => runCli(['flatten', join(testDir, 'missing.json')])).toThrow(/ENOENT/);
    });
  });

  describe('convert', () => {
    it('should print JSON by default', () => {
      const result = runCli(['convert', inputPath]);

      expect(result.exitCode).toBe(0);
      expect(JSON.parse(printed()[0] ?? '')).toEqual({
        title: 'demo',
        server: { port: 8080, debug: true },
      });
    });

    it('should print YAML when asked', () => {
      const result = runCli(['convert', inputPath, '--to', 'yaml']);

      expect(result.exitCode).toBe(0);
      expect(printed()).toEqual(['title: demo\nserver:\n  port: 8080\n  debug: true']);
    });

    it('should pick the format from the output extension', () => {
      const outputPath = join(testDir, 'settings.toml');
      const result = runCli(['convert', inputPath, '-o', outputPath]);

      expect(result.exitCode).toBe(0);
      expect(printed()).toEqual([`Wrote toml document to ${outputPath}`]);
      expect(readFlatEntries(outputPath).map(([key, value]) => [key, value.print()])).toEqual([
        ['title', '"demo"'],
        ['server.port', '8080'],
        ['server.debug', 'true'],
      ]);
    });

    it('should let an explicit format override the output extension', () => {
      const outputPath = join(testDir, 'settings.txt');
      runCli(['convert', inputPath, '-t', 'csv', '-o', outputPath]);

      expect(readFileSync(outputPath, 'utf-8')).toBe(
        'title,"demo"\nserver.port,8080\nserver.debug,true\n'
      );
    });

    it('should throw for an unsupported format', () => {
      expect(() => runCli(['convert', inputPath, '--to', 'ini'])).toThrow(
        "Unsupported document format 'ini'"
      );
    });
  });

  describe('dispatch', () => {
    it('should print top-level help without a command', () => {
      const result = runCli([]);

      expect(result.exitCode).toBe(0);
      expect(printed()[0]).toContain('tierconf <command> [options]');
    });

    it('should print command usage for help <command>', () => {
      const result = runCli(['help', 'flatten']);

      expect(result.exitCode).toBe(0);
      expect((printed()[0] ?? '').split('\n')[0]).toBe(
        'Usage: tierconf flatten <document> [options]'
      );
    });

    it('should print command usage for --help after the command', () => {
      const result = runCli(['convert', '--help']);

      expect(result.exitCode).toBe(0);
      expect(printed()[0]).toContain('  -t, --to <TEXT>');
    });

    it('should print the package version', () => {
      const result = runCli(['--version']);

      expect(result.exitCode).toBe(0);
      expect(printed()).toEqual(['tierconf v0.1.0']);
    });

    it('should reject an unknown command', () => {
      const result = runCli(['bogus']);

      expect(result.exitCode).toBe(1);
      expect(errors()).toEqual([
        'Error: Unknown command: bogus',
        '\nRun "tierconf help" for usage information.',
      ]);
    });
  });
});
