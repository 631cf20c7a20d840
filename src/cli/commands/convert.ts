/**
 * Convert command: rewrites a config document in another format.
 */

import { Config } from '../../config/index.js';
import {
  formatForPath,
  parseFormatName,
  readFlatEntries,
  serializeValues,
  writeDocumentFile,
  type DocumentFormat,
} from '../../document/index.js';
import { option } from '../../options/index.js';
import type { CliCommandResult } from '../types.js';
import { printText, reportDiagnostics, splitInput } from '../utils/display.js';

function convertOptions(): Config {
  return new Config({
    programName: 'tierconf convert <document>',
    configFile: false,
    output: printText,
  })
    .description('Convert a config document to json, toml, yaml or csv.')
    .add(
      option('to')
        .shortflag('t')
        .defaultValue('')
        .description('Output format; taken from the output extension when empty, else json')
    )
    .add(
      option('output')
        .shortflag('o')
        .defaultValue('')
        .description('Write the document to this file instead of stdout')
    );
}

/**
 * Picks the output format: an explicit name, the output file's extension, or JSON.
 *
 * @throws UnsupportedFormatError if the explicit name is not a known format.
 */
export function targetFormat(to: string, output: string): DocumentFormat {
  if (to !== '') {
    return parseFormatName(to);
  }
  if (output !== '') {
    return formatForPath(output);
  }
  return 'json';
}

/**
 * Handles `tierconf convert <document> [options]`.
 *
 * @param args - Arguments after the command name.
 */
export function handleConvertCommand(args: readonly string[]): CliCommandResult {
  const [input, rest] = splitInput(args);
  const config = convertOptions();

  const ok = config.parse(rest);
  reportDiagnostics(config);
  if (config.helpRequested) {
    return { exitCode: 0 };
  }
  if (!ok) {
    return { exitCode: 1 };
  }
  if (input === undefined) {
    console.error('Error: Missing input document');
    console.error('\nRun "tierconf convert --help" for usage information.');
    return { exitCode: 1 };
  }

  const output = config.get('output').getText();
  const format = targetFormat(config.get('to').getText(), output);
  const entries = readFlatEntries(input);

  if (output === '') {
    printText(serializeValues(entries, format));
  } else {
    writeDocumentFile(output, entries, format);
    console.log(`Wrote ${format} document to ${output}`);
  }
  return { exitCode: 0 };
}
