import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { TypeMismatchError, Value } from './index.js';

describe('Value', () => {
  describe('construction', () => {
    it('should start empty when created as unknown', () => {
      const value = Value.unknown();
      expect(value.type()).toBe('unknown');
      expect(value.isEmpty()).toBe(true);
      expect(value.toScalar()).toBeUndefined();
    });

    it('should keep zero-like payloads distinct from unknown', () => {
      expect(Value.int(0).isEmpty()).toBe(false);
      expect(Value.number(0).isEmpty()).toBe(false);
      expect(Value.bool(false).isEmpty()).toBe(false);
      expect(Value.text('').isEmpty()).toBe(false);
    });

    it('should reject a non-integer int payload', () => {
      expect(() => Value.int(1.5)).toThrow(RangeError);
      expect(() => Value.int(Number.MAX_SAFE_INTEGER + 1)).toThrow(RangeError);
    });

    it('should infer the tag from a plain scalar', () => {
      expect(Value.from(3).type()).toBe('int');
      expect(Value.from(3.5).type()).toBe('number');
      expect(Value.from(true).type()).toBe('bool');
      expect(Value.from('x').type()).toBe('text');
    });
  });

  describe('accessors', () => {
    it('should throw TypeMismatchError when the tag disagrees', () => {
      const value = Value.int(7);
      expect(() => value.getText()).toThrow(TypeMismatchError);
      expect(() => value.getNumber()).toThrow('Cannot read int value as number');
      expect(() => Value.unknown().getBool()).toThrow(TypeMismatchError);
    });

    it('should carry expected and actual types on the error', () => {
      try {
        Value.text('a').getInt();
        expect.unreachable('getInt should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(TypeMismatchError);
        expect(error).toMatchObject({ expected: 'int', actual: 'text' });
      }
    });
  });

  describe('copy and move', () => {
    it('should copy tag and payload without touching the source', () => {
      const source = Value.text('hello');
      const copy = source.copy();
      expect(copy.getText()).toBe('hello');
      expect(source.getText()).toBe('hello');
    });

    it('should leave the source empty after a move', () => {
      const source = Value.number(2.5);
      const moved = source.move();
      expect(moved.type()).toBe('number');
      expect(moved.getNumber()).toBe(2.5);
      expect(source.isEmpty()).toBe(true);
    });

    it('should replace the previous payload on assign', () => {
      const target = Value.int(1);
      target.assign(Value.bool(true));
      expect(target.type()).toBe('bool');
      expect(target.getBool()).toBe(true);
    });

    it('should not share state between a copy and its source', () => {
      const source = Value.int(5);
      const copy = source.copy();
      source.assign(Value.text('changed'));
      expect(copy.getInt()).toBe(5);
    });
  });

  describe('print', () => {
    it('should render each tag canonically', () => {
      expect(Value.int(-42).print()).toBe('-42');
      expect(Value.number(3.14).print()).toBe('3.140000');
      expect(Value.number(1).print()).toBe('1.000000');
      expect(Value.bool(true).print()).toBe('true');
      expect(Value.bool(false).print()).toBe('false');
      expect(Value.text('a"b').print()).toBe('"a\\"b"');
      expect(Value.unknown().print()).toBe('');
    });

    it('should label types in upper case', () => {
      expect(Value.int(1).printType()).toBe('INT');
      expect(Value.number(1).printType()).toBe('NUMBER');
      expect(Value.bool(true).printType()).toBe('BOOL');
      expect(Value.text('').printType()).toBe('TEXT');
      expect(Value.unknown().printType()).toBe('UNKNOWN');
    });
  });

  describe('property-based tests', () => {
    it('should round-trip integers through int', () => {
      fc.assert(
        fc.property(fc.integer(), (n) => {
          const value = Value.int(n);
          return value.type() === 'int' && value.getInt() === n;
        })
      );
    });

    it('should round-trip doubles through number', () => {
      fc.assert(
        fc.property(fc.double({ noNaN: true }), (x) => {
          const value = Value.number(x);
          return value.type() === 'number' && Object.is(value.getNumber(), x);
        })
      );
    });

    it('should round-trip booleans and strings', () => {
      fc.assert(
        fc.property(fc.boolean(), fc.string(), (b, s) => {
          return Value.bool(b).getBool() === b && Value.text(s).getText() === s;
        })
      );
    });

    it('should preserve tag and payload across a move', () => {
      fc.assert(
        fc.property(fc.string(), (s) => {
          const source = Value.text(s);
          const moved = source.move();
          return moved.getText() === s && source.isEmpty();
        })
      );
    });
  });
});
