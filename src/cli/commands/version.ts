/**
 * Version command handler.
 *
 * Reads the version directly from package.json.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { CliCommandResult } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Reads the package version.
 *
 * @returns The version string, or '(unknown)' if package.json cannot be read.
 */
export function getVersion(): string {
  let parsed: unknown;
  try {
    // src/cli/commands and dist/cli/commands both sit three levels below the root.
    parsed = JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf-8'));
  } catch {
    return '(unknown)';
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return '(unknown)';
}

export function handleVersionCommand(): CliCommandResult {
  console.log(`tierconf v${getVersion()}`);
  return { exitCode: 0 };
}
