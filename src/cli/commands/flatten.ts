/**
 * Flatten command: prints a config document as flat dot-path entries.
 */

import { Config } from '../../config/index.js';
import { readFlatEntries, serializeValues, writeDocumentFile } from '../../document/index.js';
import { option } from '../../options/index.js';
import { renderValueTable } from '../../render/index.js';
import { ResolvedOptions } from '../../resolution/index.js';
import type { CliCommandResult } from '../types.js';
import { printText, reportDiagnostics, splitInput } from '../utils/display.js';

function flattenOptions(): Config {
  return new Config({
    programName: 'tierconf flatten <document>',
    configFile: false,
    output: printText,
  })
    .description('Print a config document as flat key,value lines.')
    .add(
      option('output')
        .shortflag('o')
        .defaultValue('')
        .description('Write the lines to this file instead of stdout')
    )
    .add(
      option('table')
        .shortflag('t')
        .defaultValue(false)
        .description('Print a table of keys, types and values instead')
    );
}

/**
 * Handles `tierconf flatten <document> [options]`.
 *
 * @param args - Arguments after the command name.
 */
export function handleFlattenCommand(args: readonly string[]): CliCommandResult {
  const [input, rest] = splitInput(args);
  const config = flattenOptions();

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
    console.error('\nRun "tierconf flatten --help" for usage information.');
    return { exitCode: 1 };
  }

  const entries = readFlatEntries(input);

  if (config.get('table').getBool()) {
    const values = new ResolvedOptions();
    for (const [key, value] of entries) {
      values.set(key, value, true, 'file');
    }
    printText(renderValueTable(values));
    return { exitCode: 0 };
  }

  const output = config.get('output').getText();
  if (output === '') {
    printText(serializeValues(entries, 'csv'));
  } else {
    writeDocumentFile(output, entries, 'csv');
    console.log(`Wrote ${String(entries.length)} entries to ${output}`);
  }
  return { exitCode: 0 };
}
