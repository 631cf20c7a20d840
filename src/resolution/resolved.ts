/**
 * Flat map of resolved option values.
 *
 * @packageDocumentation
 */

import { Value } from '../value/index.js';

/**
 * Precedence layer that last wrote an entry.
 */
export type ValueSource = 'default' | 'file' | 'cmdline';

/**
 * One resolved entry.
 */
export interface ResolvedEntry {
  readonly value: Value;
  /** Whether the key is declared in the registry; false for stray entries. */
  readonly declared: boolean;
  readonly source: ValueSource;
}

/**
 * Canonical key to value mapping produced by resolution, in insertion order.
 *
 * Reading a missing key returns an empty value rather than failing.
 * Values are copied on the way in and on the way out.
 */
export class ResolvedOptions {
  private readonly values = new Map<string, ResolvedEntry>();

  /**
   * Stores a value, replacing any previous entry for the key.
   *
   * @param key - Canonical key.
   * @param value - Value to store; copied.
   * @param declared - Whether the key is declared in the registry.
   * @param source - Precedence layer writing the value.
   */
  set(key: string, value: Value, declared: boolean, source: ValueSource): void {
    this.values.set(key, { value: value.copy(), declared, source });
  }

  /**
   * Returns a copy of the value for a key, or an empty value when missing.
   */
  get(key: string): Value {
    return this.values.get(key)?.value.copy() ?? Value.unknown();
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  /**
   * Whether the key is declared in the registry. False for stray and missing keys.
   */
  isDeclared(key: string): boolean {
    return this.values.get(key)?.declared ?? false;
  }

  /**
   * The layer that last wrote the key, if present.
   */
  sourceOf(key: string): ValueSource | undefined {
    return this.values.get(key)?.source;
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  /**
   * Keys not declared in the registry.
   */
  strayKeys(): string[] {
    return [...this.values].filter(([, entry]) => !entry.declared).map(([key]) => key);
  }

  /**
   * Returns `[key, value]` pairs with copied values, for serializers.
   */
  entries(): Array<[string, Value]> {
    return [...this.values].map(([key, entry]) => [key, entry.value.copy()]);
  }

  /**
   * Returns `[key, entry]` pairs including declaration and source metadata.
   */
  detailedEntries(): Array<[string, ResolvedEntry]> {
    return [...this.values].map(([key, entry]) => [
      key,
      { ...entry, value: entry.value.copy() },
    ]);
  }

  get size(): number {
    return this.values.size;
  }
}
