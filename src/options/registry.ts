/**
 * Ordered collection of option declarations.
 *
 * @packageDocumentation
 */

import { Value } from '../value/index.js';
import { OptionBuilder, option, type OptionSpec } from './option.js';

/** Key of the reserved option that requests usage text. */
export const HELP_KEY = 'help';

/** Key of the reserved option that names a config document. */
export const CONFIG_KEY = 'config';

/**
 * Which reserved options to inject before resolution.
 */
export interface ReservedOptions {
  /** Inject the hidden `help` boolean. */
  readonly help: boolean;
  /** Inject the hidden `config` text option. */
  readonly configFile: boolean;
}

/**
 * Registry with reserved options injected, plus the keys that were injected.
 */
export interface PreparedRegistry {
  readonly registry: OptionRegistry;
  readonly injected: readonly string[];
}

/**
 * Insertion-ordered mapping from canonical key to {@link OptionSpec}.
 *
 * Built by the host before resolution. Re-adding a key replaces its spec
 * in place without moving it.
 */
export class OptionRegistry {
  private readonly specs = new Map<string, OptionSpec>();

  /**
   * Creates a registry from a list of specs or builders.
   *
   * @param entries - Specs in declaration order.
   * @returns A new registry.
   */
  static of(entries: Iterable<OptionSpec | OptionBuilder>): OptionRegistry {
    const registry = new OptionRegistry();
    for (const entry of entries) {
      registry.add(entry);
    }
    return registry;
  }

  /**
   * Adds or replaces an option.
   *
   * @param entry - A built spec or a builder to build.
   * @returns This registry.
   */
  add(entry: OptionSpec | OptionBuilder): this {
    const spec = entry instanceof OptionBuilder ? entry.build() : entry;
    this.specs.set(spec.key, spec);
    return this;
  }

  get(key: string): OptionSpec | undefined {
    return this.specs.get(key);
  }

  has(key: string): boolean {
    return this.specs.has(key);
  }

  /**
   * Finds the option declaring the given shortflag.
   *
   * Linear in the registry size; registries hold tens of options.
   *
   * @param shortflag - The alias without its `-` prefix.
   * @returns The first matching spec, or undefined.
   */
  findByShortflag(shortflag: string): OptionSpec | undefined {
    if (shortflag === '') {
      return undefined;
    }
    for (const spec of this.specs.values()) {
      if (spec.shortflag === shortflag) {
        return spec;
      }
    }
    return undefined;
  }

  /**
   * Returns all specs in declaration order.
   */
  options(): readonly OptionSpec[] {
    return [...this.specs.values()];
  }

  get size(): number {
    return this.specs.size;
  }

  /**
   * Returns a shallow copy; specs are immutable and shared.
   */
  copy(): OptionRegistry {
    return OptionRegistry.of(this.specs.values());
  }

  /**
   * Returns a copy with the reserved options injected.
   *
   * A reserved option is skipped when the host already declares its key.
   * Its shortflag (`h` for help, `c` for config) is only assigned when no
   * declared option uses it.
   *
   * @param reserved - Which reserved options to inject.
   * @returns The prepared registry and the injected keys.
   */
  withReserved(reserved: ReservedOptions): PreparedRegistry {
    const registry = this.copy();
    const injected: string[] = [];

    const inject = (key: string, shortflag: string, defaultValue: Value, text: string): void => {
      if (registry.has(key)) {
        return;
      }
      const flag = registry.findByShortflag(shortflag) === undefined ? shortflag : '';
      registry.add(
        option(key)
          .shortflag(flag)
          .defaultValue(defaultValue)
          .description(text)
          .required(false)
          .hidden(true)
      );
      injected.push(key);
    };

    if (reserved.help) {
      inject(HELP_KEY, 'h', Value.bool(false), 'Show usage information');
    }
    if (reserved.configFile) {
      inject(CONFIG_KEY, 'c', Value.text(''), 'Load option values from a config document');
    }

    return { registry, injected };
  }
}
