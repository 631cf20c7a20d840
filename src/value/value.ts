/**
 * Tagged single-slot container for option values.
 *
 * A Value holds exactly one of: nothing (`unknown`), an integer, a floating-point
 * number, a boolean or a text string. The tag decides which accessor is legal.
 *
 * @packageDocumentation
 */

/**
 * Declared or carried type of a value.
 */
export type DataType = 'unknown' | 'int' | 'number' | 'bool' | 'text';

/**
 * Plain JavaScript scalar a Value can be built from.
 */
export type Scalar = number | boolean | string;

/**
 * Returns the upper-case label of a type, as shown in usage lines and diagnostics.
 */
export function typeLabel(type: DataType): string {
  return type.toUpperCase();
}

/**
 * Internal payload representation. One variant per tag.
 */
type Payload =
  | { readonly type: 'unknown' }
  | { readonly type: 'int'; readonly data: number }
  | { readonly type: 'number'; readonly data: number }
  | { readonly type: 'bool'; readonly data: boolean }
  | { readonly type: 'text'; readonly data: string };

const EMPTY: Payload = { type: 'unknown' };

/**
 * Error thrown when a Value is read through an accessor that does not match its tag.
 */
export class TypeMismatchError extends Error {
  /** The type the caller asked for. */
  public readonly expected: DataType;
  /** The type the value actually carries. */
  public readonly actual: DataType;

  /**
   * Creates a new TypeMismatchError.
   *
   * @param expected - The accessor's type.
   * @param actual - The value's tag.
   */
  constructor(expected: DataType, actual: DataType) {
    super(`Cannot read ${actual} value as ${expected}`);
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Dynamically-typed option value.
 *
 * @example
 * ```typescript
 * const port = Value.int(8080);
 * port.type();     // 'int'
 * port.getInt();   // 8080
 * port.getText();  // throws TypeMismatchError
 * ```
 */
export class Value {
  private payload: Payload;

  private constructor(payload: Payload) {
    this.payload = payload;
  }

  /**
   * Creates an empty value.
   */
  static unknown(): Value {
    return new Value(EMPTY);
  }

  /**
   * Creates an integer value.
   *
   * @param data - A safe integer.
   * @throws RangeError if `data` is not a safe integer.
   */
  static int(data: number): Value {
    if (!Number.isSafeInteger(data)) {
      throw new RangeError(`Expected a safe integer, got ${String(data)}`);
    }
    return new Value({ type: 'int', data });
  }

  /**
   * Creates a floating-point value.
   */
  static number(data: number): Value {
    return new Value({ type: 'number', data });
  }

  /**
   * Creates a boolean value.
   */
  static bool(data: boolean): Value {
    return new Value({ type: 'bool', data });
  }

  /**
   * Creates a text value.
   */
  static text(data: string): Value {
    return new Value({ type: 'text', data });
  }

  /**
   * Creates a value from a plain scalar, inferring the tag.
   *
   * Numbers that are safe integers become `int`; every other number becomes `number`.
   * Use {@link Value.number} directly for a float-typed value with an integral payload.
   *
   * @param scalar - The scalar to wrap.
   * @returns A new value.
   */
  static from(scalar: Scalar): Value {
    if (typeof scalar === 'boolean') {
      return Value.bool(scalar);
    }
    if (typeof scalar === 'string') {
      return Value.text(scalar);
    }
    return Number.isSafeInteger(scalar) ? Value.int(scalar) : Value.number(scalar);
  }

  /**
   * Returns an independent value with the same tag and payload.
   */
  copy(): Value {
    return new Value(this.payload);
  }

  /**
   * Transfers the payload to a new value and leaves this one empty.
   *
   * @returns The value now owning the payload.
   */
  move(): Value {
    const moved = new Value(this.payload);
    this.payload = EMPTY;
    return moved;
  }

  /**
   * Replaces this value's payload with a copy of another's.
   *
   * @param other - The value to copy from.
   * @returns This value.
   */
  assign(other: Value): this {
    this.payload = other.payload;
    return this;
  }

  type(): DataType {
    return this.payload.type;
  }

  /**
   * Whether the value carries no payload.
   */
  isEmpty(): boolean {
    return this.payload.type === 'unknown';
  }

  getInt(): number {
    if (this.payload.type !== 'int') {
      throw new TypeMismatchError('int', this.payload.type);
    }
    return this.payload.data;
  }

  getNumber(): number {
    if (this.payload.type !== 'number') {
      throw new TypeMismatchError('number', this.payload.type);
    }
    return this.payload.data;
  }

  getBool(): boolean {
    if (this.payload.type !== 'bool') {
      throw new TypeMismatchError('bool', this.payload.type);
    }
    return this.payload.data;
  }

  getText(): string {
    if (this.payload.type !== 'text') {
      throw new TypeMismatchError('text', this.payload.type);
    }
    return this.payload.data;
  }

  /**
   * Returns the payload as a plain scalar, or `undefined` when empty.
   */
  toScalar(): Scalar | undefined {
    return this.payload.type === 'unknown' ? undefined : this.payload.data;
  }

  /**
   * Renders the payload in canonical scalar form.
   *
   * Integers print as decimal, numbers as fixed-point with six decimals,
   * booleans as `true`/`false` and text as a double-quoted string.
   * An empty value prints as the empty string.
   *
   * @returns The rendered payload.
   */
  print(): string {
    switch (this.payload.type) {
      case 'unknown':
        return '';
      case 'int':
        return String(this.payload.data);
      case 'number':
        return this.payload.data.toFixed(6);
      case 'bool':
        return this.payload.data ? 'true' : 'false';
      case 'text':
        return JSON.stringify(this.payload.data);
    }
  }

  /**
   * Returns the upper-case tag label used in usage lines and diagnostics.
   */
  printType(): string {
    return typeLabel(this.payload.type);
  }
}
