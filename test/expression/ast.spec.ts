import { describe, it, expect } from 'vitest';
import {
  E,
  MINUS_ONE,
  ONE,
  PI,
  THREE,
  TWO,
  ZERO,
  childrenOf,
  constantValue,
  dependsOn,
  isConstant,
  isFunctionName,
  makeAdd,
  makeConstant,
  makeNegate,
  makeNthRoot,
  makeSin,
  makeVariable
} from '../../src/expression/AST.js';
import { ConstructionError, ExpressionError } from '../../src/expression/Errors.js';
import { constant } from '../../src/expression/Builder.js';
import { x, y } from '../helpers.js';

describe('Expression nodes', () => {
  describe('Constants', () => {
    it('should reuse canonical instances for well-known values', () => {
      expect(makeConstant(0)).toBe(ZERO);
      expect(makeConstant(1)).toBe(ONE);
      expect(makeConstant(2)).toBe(TWO);
      expect(makeConstant(3)).toBe(THREE);
      expect(makeConstant(-1)).toBe(MINUS_ONE);
      expect(makeConstant(Math.E)).toBe(E);
      expect(makeConstant(Math.PI)).toBe(PI);
    });

    it('should map negative zero to zero', () => {
      expect(makeConstant(-0)).toBe(ZERO);
    });

    it('should reject non-finite values', () => {
      expect(() => makeConstant(NaN)).toThrow(ConstructionError);
      expect(() => makeConstant(Infinity)).toThrow(ConstructionError);
      expect(() => makeConstant(-Infinity)).toThrow(ExpressionError);
    });

    it('should expose the value of constant nodes only', () => {
      expect(constantValue(makeConstant(4.5))).toBe(4.5);
      expect(constantValue(x.node)).toBeUndefined();
    });
  });

  describe('Construction', () => {
    it('should reject an empty variable symbol', () => {
      expect(() => makeVariable('')).toThrow('Cannot construct variable: variable symbol must not be empty');
    });

    it('should reject root degrees below 2', () => {
      expect(() => makeNthRoot(x.node, 1)).toThrow(ConstructionError);
      expect(() => makeNthRoot(x.node, 0)).toThrow(ConstructionError);
    });

    it('should reject fractional root degrees', () => {
      expect(() => makeNthRoot(x.node, 2.5)).toThrow(ConstructionError);
    });

    it('should build negation as a product with -1', () => {
      const negated = makeNegate(x.node);
      expect(negated.kind).toBe('multiply');
      expect(negated.left).toBe(MINUS_ONE);
      expect(negated.right).toBe(x.node);
    });

    it('should freeze nodes', () => {
      const sum = makeAdd(x.node, ONE);
      expect(Object.isFrozen(sum)).toBe(true);
      expect(Object.isFrozen(makeSin(x.node))).toBe(true);
    });

    it('should leave operands untouched when combining', () => {
      const base = x.plus(1);
      const squared = base.pow(2);
      expect(base.toString()).toBe('x + 1');
      expect(squared.toString()).toBe('(x + 1)^2');
    });
  });

  describe('Structure queries', () => {
    it('should list children left to right', () => {
      const quotient = x.divide(y).node;
      expect(childrenOf(quotient)).toEqual([x.node, y.node]);
      expect(childrenOf(x.node)).toEqual([]);
    });

    it('should report closed expressions as constant', () => {
      expect(isConstant(constant(2).plus(3).sin().node)).toBe(true);
      expect(isConstant(constant(2).plus(x).node)).toBe(false);
      expect(x.multiply(0).isConstant()).toBe(false);
    });

    it('should find symbols anywhere in the tree', () => {
      const f = x.pow(y.plus(1)).ln().node;
      expect(dependsOn(f, 'x')).toBe(true);
      expect(dependsOn(f, 'y')).toBe(true);
      expect(dependsOn(f, 'z')).toBe(false);
    });

    it('should recognize function kinds', () => {
      expect(isFunctionName('sin')).toBe(true);
      expect(isFunctionName('toDegrees')).toBe(true);
      expect(isFunctionName('power')).toBe(false);
      expect(isFunctionName('nthRoot')).toBe(false);
    });
  });
});
