/**
 * Test helper utilities shared by the expression test files
 */

import { Expr, variable } from '../src/expression/Builder.js';
import {
  checkDerivative,
  type DerivativeCheckResult,
  type DerivativeCheckOptions
} from '../src/expression/DerivativeChecker.js';

export const x = variable('x');
export const y = variable('y');
export const z = variable('z');

/**
 * Simplify and render in one step
 *
 * @example
 * expect(simplified(x.plus(0))).toBe('x');
 */
export function simplified(e: Expr): string {
  return e.simplify().toString();
}

/**
 * Differentiate with respect to x and render
 *
 * @example
 * expect(derivativeOf(x.pow(3))).toBe('3x^2');
 */
export function derivativeOf(e: Expr, wrt: string = 'x'): string {
  return e.differentiate(wrt).toString();
}

/**
 * Check the symbolic derivative of a scalar function against finite differences
 *
 * @example
 * const result = checkScalarDerivative(x.sin().multiply(x), [0.5, 1.5]);
 * expect(result.passed).toBe(true);
 */
export function checkScalarDerivative(
  e: Expr,
  points: readonly number[],
  options?: DerivativeCheckOptions
): DerivativeCheckResult {
  return checkDerivative(e.node, points, options);
}
