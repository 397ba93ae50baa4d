import { describe, it, expect } from 'vitest';
import { constant } from '../../src/expression/Builder.js';
import { formatNumber } from '../../src/expression/Format.js';
import { x, y } from '../helpers.js';

describe('Formatting', () => {
  describe('Numbers', () => {
    it('should print integers without a decimal point', () => {
      expect(formatNumber(5)).toBe('5');
      expect(formatNumber(-3)).toBe('-3');
      expect(formatNumber(2.75)).toBe('2.75');
    });

    it('should print π and e by name', () => {
      expect(formatNumber(Math.PI)).toBe('π');
      expect(formatNumber(-Math.PI)).toBe('-π');
      expect(formatNumber(Math.E)).toBe('e');
    });

    it('should print negative zero as 0', () => {
      expect(formatNumber(-0)).toBe('0');
    });
  });

  describe('Functions', () => {
    it('should print function calls with their argument', () => {
      expect(constant(5).sin().toString()).toBe('sin(5)');
      expect(constant(5).plus(7).sin().toString()).toBe('sin(5 + 7)');
      expect(constant(5).plus(7).sin().multiply(2).ln().toString()).toBe('ln(sin(5 + 7) * 2)');
      expect(constant(Math.PI).divide(2).sin().toString()).toBe('sin(π / 2)');
    });

    it('should print logarithms and roots with their base or degree', () => {
      expect(x.log(2).toString()).toBe('log2(x)');
      expect(x.nthRoot(5).toString()).toBe('root5(x)');
    });

    it('should print angle conversions as their operand', () => {
      expect(x.toRadians().toString()).toBe('x');
      expect(x.plus(1).toDegrees().multiply(2).toString()).toBe('(x + 1) * 2');
    });
  });

  describe('Products', () => {
    it('should juxtapose coefficients and variables', () => {
      expect(constant(2).multiply(x).toString()).toBe('2x');
      expect(constant(2.75).multiply(x).toString()).toBe('2.75x');
      expect(x.multiply(y).toString()).toBe('xy');
      expect(constant(3).multiply(x.pow(2)).toString()).toBe('3x^2');
    });

    it('should print multiplication by -1 as a sign', () => {
      expect(constant(-1).multiply(x).toString()).toBe('-x');
      expect(constant(-1).multiply(x.sin()).toString()).toBe('-sin(x)');
    });

    it('should keep an explicit operator otherwise', () => {
      expect(x.multiply(5).toString()).toBe('x * 5');
      expect(x.multiply(x.sin()).toString()).toBe('x * sin(x)');
    });
  });

  describe('Parentheses', () => {
    it('should wrap a sum raised to a power', () => {
      expect(x.plus(1).pow(2).toString()).toBe('(x + 1)^2');
    });

    it('should wrap a sum on the right of a subtraction', () => {
      expect(x.minus(x.plus(1)).toString()).toBe('x - (x + 1)');
      expect(x.plus(1).minus(x).toString()).toBe('x + 1 - x');
    });

    it('should wrap a product in a denominator', () => {
      expect(x.divide(constant(2).multiply(x)).toString()).toBe('x / (2x)');
      expect(x.multiply(2).divide(y).toString()).toBe('x * 2 / y');
    });

    it('should wrap negative right operands', () => {
      expect(x.plus(-3).toString()).toBe('x + (-3)');
      expect(x.minus(-3).toString()).toBe('x - (-3)');
    });

    it('should wrap negative exponents', () => {
      expect(x.pow(-1).toString()).toBe('x^(-1)');
    });
  });
});
