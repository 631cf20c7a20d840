/**
 * Plain-text usage rendering for an option registry.
 *
 * @packageDocumentation
 */

import { declaredType, type OptionRegistry, type OptionSpec } from '../options/index.js';
import { typeLabel } from '../value/index.js';

export interface UsageOptions {
  /** Name shown on the usage line. */
  readonly programName: string;
  /** Program description shown under the usage line. */
  readonly description?: string;
  /** Mention the positional config document on the usage line. */
  readonly configFile?: boolean;
}

/** Gap between the flag column and the description column. */
const COLUMN_GAP = 2;

function flagColumn(spec: OptionSpec): string {
  const short = spec.shortflag === '' ? '    ' : `-${spec.shortflag}, `;
  const type = declaredType(spec);
  if (type === 'bool') {
    return `${short}--${spec.key}`;
  }
  const placeholder = type === 'unknown' ? 'VALUE' : typeLabel(type);
  return `${short}--${spec.key} <${placeholder}>`;
}

function descriptionColumn(spec: OptionSpec): string {
  if (spec.required) {
    return spec.description === '' ? '(required)' : `${spec.description} (required)`;
  }
  const fallback = `(default: ${spec.defaultValue.print()})`;
  return spec.description === '' ? fallback : `${spec.description} ${fallback}`;
}

/**
 * Renders usage text listing every visible option in registry order.
 *
 * @example
 * ```typescript
 * renderUsage(registry, { programName: 'serve' });
 * // Usage: serve [options]
 * //
 * // Options:
 * //   -p, --port <INT>  Port to listen on (default: 8080)
 * ```
 */
export function renderUsage(registry: OptionRegistry, options: UsageOptions): string {
  const lines: string[] = [];
  const positional = options.configFile === true ? ' [config-file]' : '';
  lines.push(`Usage: ${options.programName} [options]${positional}`);

  if (options.description !== undefined && options.description !== '') {
    lines.push('', options.description);
  }

  const visible = registry.options().filter((spec) => !spec.hidden);
  if (visible.length > 0) {
    const rows = visible.map((spec) => [flagColumn(spec), descriptionColumn(spec)] as const);
    const width = Math.max(...rows.map(([flags]) => flags.length));
    lines.push('', 'Options:');
    for (const [flags, text] of rows) {
      lines.push(`  ${flags.padEnd(width + COLUMN_GAP)}${text}`);
    }
  }

  return lines.join('\n') + '\n';
}
