/**
 * Precedence-merging resolution engine.
 *
 * Resolves option values from three layers, later layers overwriting earlier ones:
 *
 * 1. registry defaults
 * 2. a config document named by `--config <path>` (or by a sole positional token)
 * 3. command-line tokens
 *
 * Resolution is synchronous and runs to completion in one call. Expected
 * problems (bad declarations, unparsable tokens, missing values) become
 * diagnostics; only programming errors throw.
 *
 * @packageDocumentation
 */

import { readDocumentFile, type DocumentReader } from '../document/formats.js';
import { flattenDocument } from '../document/tree.js';
import {
  CONFIG_KEY,
  HELP_KEY,
  declaredType,
  option,
  type OptionRegistry,
  type OptionSpec,
} from '../options/index.js';
import { Logger } from '../utils/logger.js';
import { Value, typeLabel, type DataType } from '../value/index.js';
import { DiagnosticLog, type Diagnostic, type LogThreshold, type Severity } from './diagnostics.js';
import { ResolvedOptions } from './resolved.js';
import { classifyToken, parseTokenAs, type ClassifiedToken } from './tokens.js';
import { checkFormat, validate } from './validator.js';

/**
 * Options controlling a {@link ResolutionEngine}.
 */
export interface EngineOptions {
  /**
   * Minimum severity recorded in the log. `none` also disables failing on errors.
   * @defaultValue 'warning'
   */
  readonly logLevel?: LogThreshold;

  /**
   * Inject the reserved hidden `help` option.
   * @defaultValue true
   */
  readonly help?: boolean;

  /**
   * Inject the reserved hidden `config` option and load config documents.
   * @defaultValue true
   */
  readonly configFile?: boolean;

  /**
   * Reads a config document. Defaults to the extension-dispatching file reader.
   */
  readonly readDocument?: DocumentReader;

  /**
   * Called when `help` resolves to true, with the registry resolution ran against.
   */
  readonly onHelp?: (registry: OptionRegistry) => void;

  /**
   * Logger for engine debug events.
   */
  readonly logger?: Logger;
}

/**
 * Outcome of one resolution.
 */
export interface ResolutionResult {
  /** False when an error was logged and the log level is not `none`. */
  readonly ok: boolean;
  /** Resolved values, without the reserved entries. */
  readonly values: ResolvedOptions;
  /** Diagnostics admitted by the log level, in order. */
  readonly log: readonly Diagnostic[];
  /** Worst severity seen, including filtered records. */
  readonly worstSeverity: Severity | undefined;
  /** Whether the reserved `help` option resolved to true. */
  readonly helpRequested: boolean;
  /** Path of the config document named by the tokens, if any. */
  readonly configPath: string | undefined;
}

/**
 * Option awaiting a value token.
 */
interface PendingOption {
  readonly spec: OptionSpec;
  readonly declared: boolean;
}

/**
 * Config document located in the token stream.
 */
interface ConfigLocation {
  readonly path: string;
  /** Index of the path token when it came from the sole-token fallback. */
  readonly positionalIndex: number | undefined;
}

const defaultLogger = new Logger({
  component: 'ResolutionEngine',
  debugMode: process.env.TIERCONF_DEBUG === '1',
});

/**
 * Coerces a document value to an option's declared type.
 *
 * @returns The coerced value, or undefined when the types are incompatible.
 */
function coerceToDeclared(value: Value, type: DataType): Value | undefined {
  if (type === 'unknown' || value.type() === type) {
    return value;
  }
  if (type === 'number' && value.type() === 'int') {
    return Value.number(value.getInt());
  }
  return undefined;
}

function describeCurrent(values: ResolvedOptions, key: string): string {
  const current = values.get(key);
  return current.isEmpty() ? 'no value' : current.print();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolves option values for a registry from a token stream.
 *
 * @example
 * ```typescript
 * const registry = OptionRegistry.of([
 *   option('port').shortflag('p').defaultValue(8080).description('Port'),
 * ]);
 * const result = new ResolutionEngine(registry).resolve(['-p', '9090']);
 * result.values.get('port').getInt(); // 9090
 * ```
 */
export class ResolutionEngine {
  private readonly registry: OptionRegistry;
  private readonly logLevel: LogThreshold;
  private readonly helpEnabled: boolean;
  private readonly configEnabled: boolean;
  private readonly readDocument: DocumentReader;
  private readonly onHelp: ((registry: OptionRegistry) => void) | undefined;
  private readonly logger: Logger;

  /**
   * Creates an engine for a registry.
   *
   * The registry is not modified; reserved options are injected into a copy
   * on every resolution.
   *
   * @param registry - Declared options.
   * @param options - Engine options.
   */
  constructor(registry: OptionRegistry, options: EngineOptions = {}) {
    this.registry = registry;
    this.logLevel = options.logLevel ?? 'warning';
    this.helpEnabled = options.help ?? true;
    this.configEnabled = options.configFile ?? true;
    this.readDocument = options.readDocument ?? readDocumentFile;
    this.onHelp = options.onHelp;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Resolves values from command-line tokens.
   *
   * @param tokens - Command-line tokens without the program name.
   * @returns The resolved values, the log and the overall outcome.
   */
  resolve(tokens: readonly string[]): ResolutionResult {
    const { registry, injected } = this.registry.withReserved({
      help: this.helpEnabled,
      configFile: this.configEnabled,
    });
    const log = new DiagnosticLog(this.logLevel);
    const values = new ResolvedOptions();

    this.logger.debug('resolution_started', { tokens: tokens.length, options: registry.size });

    log.appendAll(checkFormat(registry));
    if (log.hasFailure()) {
      this.logger.debug('resolution_aborted', { reason: 'format_errors' });
      return {
        ok: false,
        values,
        log: log.entries(),
        worstSeverity: log.worstSeverity(),
        helpRequested: false,
        configPath: undefined,
      };
    }

    for (const spec of registry.options()) {
      values.set(spec.key, spec.defaultValue, true, 'default');
    }

    // A host option named `config` is an ordinary option, not a document path.
    const location = injected.includes(CONFIG_KEY)
      ? this.locateConfig(registry, tokens)
      : undefined;
    if (location !== undefined) {
      this.mergeDocument(registry, values, log, location.path);
    }

    this.applyTokens(registry, values, log, tokens, location?.positionalIndex);

    const helpRequested =
      injected.includes(HELP_KEY) &&
      values.sourceOf(HELP_KEY) === 'cmdline' &&
      values.get(HELP_KEY).toScalar() === true;
    if (helpRequested) {
      this.onHelp?.(registry);
    }
    for (const key of injected) {
      values.delete(key);
    }

    log.appendAll(validate(registry, values));

    const ok = !log.hasFailure();
    this.logger.debug('resolution_finished', {
      ok,
      values: values.size,
      stray: values.strayKeys().length,
    });

    return {
      ok,
      values,
      log: log.entries(),
      worstSeverity: log.worstSeverity(),
      helpRequested,
      configPath: location?.path,
    };
  }

  private lookupFlag(registry: OptionRegistry, token: ClassifiedToken): OptionSpec | undefined {
    switch (token.kind) {
      case 'long-flag':
        return registry.get(token.key);
      case 'short-flag':
        return registry.findByShortflag(token.key);
      case 'value':
      case 'unknown':
        return undefined;
    }
  }

  /**
   * Finds the config document path: the first config flag followed by a value
   * token, or else a sole value token.
   */
  private locateConfig(
    registry: OptionRegistry,
    tokens: readonly string[]
  ): ConfigLocation | undefined {
    for (let index = 0; index + 1 < tokens.length; index++) {
      const flag = tokens[index];
      const next = tokens[index + 1];
      if (flag === undefined || next === undefined) {
        continue;
      }
      if (
        this.lookupFlag(registry, classifyToken(flag))?.key === CONFIG_KEY &&
        classifyToken(next).kind === 'value'
      ) {
        return { path: next, positionalIndex: undefined };
      }
    }

    const [sole] = tokens;
    if (tokens.length === 1 && sole !== undefined && classifyToken(sole).kind === 'value') {
      return { path: sole, positionalIndex: 0 };
    }
    return undefined;
  }

  private mergeDocument(
    registry: OptionRegistry,
    values: ResolvedOptions,
    log: DiagnosticLog,
    path: string
  ): void {
    let entries: Array<[string, Value]>;
    try {
      entries = flattenDocument(this.readDocument(path));
    } catch (error) {
      log.error(path, `Cannot load config document: ${errorMessage(error)}`);
      return;
    }

    log.info(path, `Loaded ${String(entries.length)} value(s) from config document`);

    for (const [key, value] of entries) {
      const spec = registry.get(key);
      if (spec === undefined) {
        values.set(key, value, false, 'file');
        log.info(key, `Stored undeclared value ${value.print()} from config document`);
        continue;
      }

      const type = declaredType(spec);
      const coerced = coerceToDeclared(value, type);
      if (coerced === undefined) {
        log.warning(
          key,
          `Expected ${typeLabel(type)} in config document, got ${value.printType()}; ` +
            `keeping ${describeCurrent(values, key)}`
        );
        continue;
      }
      values.set(key, coerced, true, 'file');
      log.info(key, `Set to ${coerced.print()} from config document`);
    }

    this.logger.debug('config_document_merged', { path, entries: entries.length });
  }

  private applyTokens(
    registry: OptionRegistry,
    values: ResolvedOptions,
    log: DiagnosticLog,
    tokens: readonly string[],
    positionalIndex: number | undefined
  ): void {
    let current: PendingOption | undefined;

    for (const [index, token] of tokens.entries()) {
      const classified = classifyToken(token);
      switch (classified.kind) {
        case 'long-flag':
        case 'short-flag':
          current = this.applyFlag(registry, values, log, classified);
          break;
        case 'value':
          if (current === undefined) {
            if (index !== positionalIndex) {
              log.warning(token, 'Ignoring value with no preceding option');
            }
            break;
          }
          this.applyValue(values, log, current, token);
          current = undefined;
          break;
        case 'unknown':
          log.error(token, `Malformed token '${token}'`);
          break;
      }
    }
  }

  private applyFlag(
    registry: OptionRegistry,
    values: ResolvedOptions,
    log: DiagnosticLog,
    token: Extract<ClassifiedToken, { kind: 'long-flag' | 'short-flag' }>
  ): PendingOption | undefined {
    const spec = this.lookupFlag(registry, token);

    if (spec === undefined) {
      if (token.kind === 'short-flag') {
        log.warning(token.token, `Unrecognized shortflag '-${token.key}'`);
        return undefined;
      }
      log.warning(token.token, `Unrecognized option '--${token.key}'; its value is kept as text`);
      return { spec: option(token.key).defaultValue(Value.text('')).build(), declared: false };
    }

    if (declaredType(spec) === 'bool') {
      values.set(spec.key, Value.bool(true), true, 'cmdline');
      log.info(spec.key, 'Set to true by flag');
    }
    return { spec, declared: true };
  }

  private applyValue(
    values: ResolvedOptions,
    log: DiagnosticLog,
    pending: PendingOption,
    token: string
  ): void {
    const { key } = pending.spec;
    const type = declaredType(pending.spec);
    const parsed = parseTokenAs(token, type);

    if (parsed.isEmpty()) {
      log.warning(
        key,
        `Cannot parse '${token}' as ${typeLabel(type)}; keeping ${describeCurrent(values, key)}`
      );
      return;
    }
    values.set(key, parsed, pending.declared, 'cmdline');
    log.info(key, `Set to ${parsed.print()} from command line`);
  }
}
