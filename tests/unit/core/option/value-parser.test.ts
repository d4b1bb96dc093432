/**
 * Tests for the built-in value parsers.
 */
import { describe, it, expect } from 'vitest';
import { parserFor, type ValueContext } from '../../../../src/core/option/value-parser.js';
import { ErrorCodes, MatchFailure } from '../../../../src/utils/errors.js';

const ctx: ValueContext = { uid: 0, name: '--opt', style: 'argument', disabled: false };

describe('parserFor', () => {
  describe('bool', () => {
    const parse = parserFor('bool');

    it('should read true and false', () => {
      expect(parse('true', ctx)).toBe(true);
      expect(parse('false', ctx)).toBe(false);
      expect(parse(undefined, ctx)).toBe(true);
    });

    it('should yield false when deactivated', () => {
      expect(parse('true', { ...ctx, disabled: true })).toBe(false);
    });

    it('should yield true for positional styles whatever the text', () => {
      expect(parse('build', { ...ctx, style: 'cmd' })).toBe(true);
    });

    it('should reject other text', () => {
      expect(() => parse('yes', ctx)).toThrow("Invalid value for option '--opt': 'yes' is not a boolean");
    });
  });

  describe('int and uint', () => {
    it('should parse signed integers', () => {
      expect(parserFor('int')('-42', ctx)).toBe(-42);
      expect(parserFor('int')('+7', ctx)).toBe(7);
    });

    it('should reject fractions and unsafe integers', () => {
      expect(() => parserFor('int')('1.5', ctx)).toThrow(MatchFailure);
      expect(() => parserFor('int')('9007199254740993', ctx)).toThrow("'9007199254740993' is out of range");
    });

    it('should reject negative unsigned integers', () => {
      expect(parserFor('uint')('12', ctx)).toBe(12);
      expect(() => parserFor('uint')('-1', ctx)).toThrow("'-1' is not an unsigned integer");
    });
  });

  describe('float', () => {
    it('should parse decimals and exponents', () => {
      expect(parserFor('float')('3.25', ctx)).toBe(3.25);
      expect(parserFor('float')('.5', ctx)).toBe(0.5);
      expect(parserFor('float')('1e3', ctx)).toBe(1000);
    });

    it('should reject non-numbers', () => {
      expect(() => parserFor('float')('abc', ctx)).toThrow("'abc' is not a number");
    });
  });

  describe('str and any', () => {
    it('should require a value for str', () => {
      expect(parserFor('str')('', ctx)).toBe('');
      try {
        parserFor('str')(undefined, ctx);
        expect.fail('expected a failure');
      } catch (error) {
        expect(error).toBeInstanceOf(MatchFailure);
        if (error instanceof MatchFailure) {
          expect(error.code).toBe(ErrorCodes.INVALID_VALUE);
          expect(error.uid).toBe(0);
        }
      }
    });

    it('should fall back to true for any', () => {
      expect(parserFor('any')('x', ctx)).toBe('x');
      expect(parserFor('any')(undefined, ctx)).toBe(true);
    });
  });
});
