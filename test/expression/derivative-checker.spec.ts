import { describe, it, expect } from 'vitest';
import { constant, variable, type Expr } from '../../src/expression/Builder.js';
import {
  formatDerivativeCheckResult,
  type DerivativeCheckResult
} from '../../src/expression/DerivativeChecker.js';
import { checkScalarDerivative, x } from '../helpers.js';

const POINTS = [0.5, 1.5, 3];

describe('Derivative checking', () => {
  describe('Elementary functions', () => {
    const cases: Array<[string, Expr, number[]]> = [
      ['sin', x.sin(), POINTS],
      ['cos', x.cos(), POINTS],
      ['tan', x.tan(), [0.2, 0.5, 1]],
      ['asin', x.asin(), [0.2, 0.5]],
      ['acos', x.acos(), [0.2, 0.5]],
      ['atan', x.atan(), POINTS],
      ['exp', x.exp(), POINTS],
      ['ln', x.ln(), POINTS],
      ['ld', x.ld(), POINTS],
      ['log3', x.log(3), POINTS],
      ['sqrt', x.sqrt(), POINTS],
      ['cbrt', x.cbrt(), POINTS],
      ['root5', x.nthRoot(5), POINTS],
      ['toDegrees', x.toDegrees(), POINTS],
      ['toRadians', x.toRadians(), POINTS]
    ];

    for (const [label, f, points] of cases) {
      it(`should verify d/dx ${label}`, () => {
        const result = checkScalarDerivative(f, points);
        expect(result.errors).toEqual([]);
        expect(result.passed).toBe(true);
        expect(result.totalChecks).toBe(points.length);
      });
    }
  });

  describe('Composite functions', () => {
    const cases: Array<[string, Expr]> = [
      ['product', x.multiply(x.sin())],
      ['quotient', x.sin().divide(x)],
      ['polynomial', x.pow(3).minus(x.pow(2).multiply(2)).plus(x.multiply(5)).minus(7)],
      ['x^x', x.pow(x)],
      ['exponential', constant(2).pow(x.multiply(x))],
      ['chain', x.pow(2).plus(1).ln().sqrt()],
      ['nested trig', x.cos().sin().multiply(x.exp())],
      ['logarithm of a square', x.pow(2).plus(1).log(10)]
    ];

    for (const [label, f] of cases) {
      it(`should verify the ${label} rule`, () => {
        const result = checkScalarDerivative(f, POINTS);
        expect(result.passed).toBe(true);
        expect(result.maxError).toBeLessThan(1e-4);
      });
    }
  });

  describe('Options', () => {
    it('should differentiate with respect to the given symbol', () => {
      const t = variable('t');
      const result = checkScalarDerivative(t.pow(2).sin(), POINTS, { symbol: 't' });
      expect(result.passed).toBe(true);
    });

    it('should report mean and max error over all points', () => {
      const result = checkScalarDerivative(x.multiply(3), [1, 2]);
      expect(result.maxError).toBeLessThan(1e-8);
      expect(result.meanError).toBeLessThanOrEqual(result.maxError);
    });
  });

  describe('Failures', () => {
    it('should fail where the function cannot be evaluated', () => {
      const result = checkScalarDerivative(x.ln(), [-1, 2]);
      expect(result.passed).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].point).toBe(-1);
      expect(result.errors[0].analytical).toBe(-1);
      expect(result.errors[0].numerical).toBeNaN();
    });

    it('should fail where the derivative divides by zero', () => {
      const result = checkScalarDerivative(constant(1).divide(x), [0]);
      expect(result.passed).toBe(false);
      expect(result.errors[0].analytical).toBeNaN();
      expect(result.maxError).toBe(0);
      expect(result.meanError).toBe(0);
    });
  });

  describe('formatDerivativeCheckResult', () => {
    it('should summarize a passing check', () => {
      const result: DerivativeCheckResult = {
        passed: true,
        errors: [],
        maxError: 1.234e-7,
        meanError: 5e-8,
        totalChecks: 3
      };
      expect(formatDerivativeCheckResult(result, 'sin')).toBe(
        '✓ sin: 3 derivatives verified (max error: 1.23e-7)'
      );
    });

    it('should list every failing point', () => {
      const result: DerivativeCheckResult = {
        passed: false,
        errors: [{ point: 2, analytical: 1, numerical: 1.5, error: 0.5, relativeError: 1 / 3 }],
        maxError: 0.5,
        meanError: 0.125,
        totalChecks: 4
      };
      expect(formatDerivativeCheckResult(result, 'f')).toBe(
        '✗ f: 1/4 derivatives FAILED\n' +
        '  at 2: analytical=1.000000, numerical=1.500000, error=5.00e-1'
      );
    });
  });
});
