/**
 * Host-facing configuration facade.
 *
 * Collects option declarations, resolves them against command-line tokens
 * and a config document, and exposes the resolved values together with
 * rendering and serialization helpers.
 *
 * @packageDocumentation
 */

import {
  serializeValues,
  writeDocumentFile,
  type DocumentFormat,
  type DocumentReader,
} from '../document/index.js';
import { OptionRegistry, type OptionBuilder, type OptionSpec } from '../options/index.js';
import { renderUsage, renderValueTable, type TableOptions } from '../render/index.js';
import {
  ResolutionEngine,
  ResolvedOptions,
  type Diagnostic,
  type LogThreshold,
  type ResolutionResult,
} from '../resolution/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { Value } from '../value/index.js';

export interface ConfigOptions {
  /**
   * Program name shown in usage text.
   * @defaultValue 'program'
   */
  readonly programName?: string;

  /**
   * Accept `--help`/`-h` and print usage when given.
   * @defaultValue true
   */
  readonly help?: boolean;

  /**
   * Accept `--config`/`-c` and a sole positional config document.
   * @defaultValue true
   */
  readonly configFile?: boolean;

  /** Config document reader; defaults to the extension-dispatching file reader. */
  readonly readDocument?: DocumentReader;

  /** Logger receiving the diagnostic log from {@link Config.printLog}. */
  readonly logger?: Logger;

  /** Sink for usage text and value tables; defaults to stdout. */
  readonly output?: (text: string) => void;
}

export interface ParseOptions {
  /**
   * Minimum severity recorded in the log.
   * @defaultValue 'warning'
   */
  readonly logLevel?: LogThreshold;
}

/**
 * Declares options and resolves them for one program run.
 *
 * @example
 * ```typescript
 * const config = new Config({ programName: 'serve' })
 *   .description('Serve files over HTTP')
 *   .add(option('port').shortflag('p').defaultValue(8080).description('Port'));
 *
 * if (!config.parse()) {
 *   config.printLog();
 *   process.exit(1);
 * }
 * const port = config.get('port').getInt();
 * ```
 */
export class Config {
  private readonly registry = new OptionRegistry();
  private readonly programName: string;
  private readonly helpEnabled: boolean;
  private readonly configEnabled: boolean;
  private readonly readDocument: DocumentReader | undefined;
  private readonly logger: Logger;
  private readonly output: (text: string) => void;
  private programDescription = '';
  private result: ResolutionResult | undefined;

  constructor(options: ConfigOptions = {}) {
    this.programName = options.programName ?? 'program';
    this.helpEnabled = options.help ?? true;
    this.configEnabled = options.configFile ?? true;
    this.readDocument = options.readDocument;
    this.logger = options.logger ?? defaultLogger;
    this.output =
      options.output ??
      ((text: string): void => {
        process.stdout.write(text);
      });
  }

  /**
   * Sets the program description shown in usage text.
   */
  description(text: string): this {
    this.programDescription = text;
    return this;
  }

  /**
   * Declares an option, replacing any earlier declaration with the same key.
   */
  add(entry: OptionSpec | OptionBuilder): this {
    this.registry.add(entry);
    return this;
  }

  /**
   * A copy of the declared options.
   */
  options(): OptionRegistry {
    return this.registry.copy();
  }

  /**
   * Resolves the declared options.
   *
   * Prints usage through the output sink when help is requested.
   *
   * @param argv - Command-line tokens without the program name.
   * @param options - Parse options.
   * @returns Whether resolution succeeded.
   */
  parse(argv: readonly string[] = process.argv.slice(2), options: ParseOptions = {}): boolean {
    const engine = new ResolutionEngine(this.registry, {
      logLevel: options.logLevel ?? 'warning',
      help: this.helpEnabled,
      configFile: this.configEnabled,
      ...(this.readDocument !== undefined && { readDocument: this.readDocument }),
      onHelp: () => {
        this.output(this.usage());
      },
    });
    this.result = engine.resolve(argv);
    return this.result.ok;
  }

  /**
   * Returns a copy of the resolved value for a key, empty when absent or before parsing.
   */
  get(key: string): Value {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get values(): ResolvedOptions {
    return this.result?.values ?? new ResolvedOptions();
  }

  get log(): readonly Diagnostic[] {
    return this.result?.log ?? [];
  }

  get helpRequested(): boolean {
    return this.result?.helpRequested ?? false;
  }

  get configPath(): string | undefined {
    return this.result?.configPath;
  }

  usage(): string {
    return renderUsage(this.registry, {
      programName: this.programName,
      description: this.programDescription,
      configFile: this.configEnabled,
    });
  }

  /**
   * Writes each recorded diagnostic through the logger.
   */
  printLog(): void {
    for (const diagnostic of this.log) {
      this.logger.diagnostic(diagnostic);
    }
  }

  /**
   * Writes the resolved values as a table to the output sink.
   */
  print(options: TableOptions = {}): void {
    this.output(renderValueTable(this.values, options));
  }

  /**
   * Serializes the resolved values to text.
   */
  serialize(format: DocumentFormat): string {
    return serializeValues(this.values.entries(), format);
  }

  /**
   * Writes the resolved values to a file, choosing the format from the extension
   * unless one is given.
   */
  save(filePath: string, format?: DocumentFormat): void {
    if (format === undefined) {
      writeDocumentFile(filePath, this.values.entries());
    } else {
      writeDocumentFile(filePath, this.values.entries(), format);
    }
  }
}
