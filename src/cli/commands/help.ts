/**
 * Top-level help text.
 */

import type { CliCommandResult } from '../types.js';
import { getVersion } from './version.js';

export function handleHelpCommand(): CliCommandResult {
  console.log(`
tierconf v${getVersion()}

USAGE:
  tierconf <command> [options]

COMMANDS:
  flatten     Print a config document as flat key,value lines
  convert     Convert a config document to another format
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  tierconf flatten settings.toml
  tierconf flatten settings.yaml --table
  tierconf convert settings.toml --to yaml
  tierconf convert settings.json -o settings.toml

Run "tierconf help <command>" for the options of a command.
`);
  return { exitCode: 0 };
}
