/**
 * Numeric evaluation of expression trees
 */

import { type Expression, makeConstant } from './AST.js';
import { DivisionByZeroError, EvaluationError, UnboundVariableError } from './Errors.js';
import { formatExpression } from './Format.js';
import { nthRoot } from './MathUtil.js';

/**
 * Symbol bindings. A bound expression is itself evaluated against the same
 * bindings, so bindings may substitute one expression for a variable.
 */
export type Bindings = Readonly<Record<string, Expression>>;

/**
 * Evaluate an expression to a double.
 *
 * @throws UnboundVariableError when a variable has no binding
 * @throws DivisionByZeroError when a divisor evaluates to exactly 0
 * @throws InvalidDomainError when an n-th root is taken of a non-positive value
 */
export function compute(expr: Expression, bindings: Bindings = {}): number {
  switch (expr.kind) {
    case 'constant':
      return expr.value;

    case 'variable': {
      if (!Object.prototype.hasOwnProperty.call(bindings, expr.name)) {
        throw new UnboundVariableError(expr.name);
      }
      return compute(bindings[expr.name], bindings);
    }

    case 'add':
      return compute(expr.left, bindings) + compute(expr.right, bindings);
    case 'subtract':
      return compute(expr.left, bindings) - compute(expr.right, bindings);
    case 'multiply':
      return compute(expr.left, bindings) * compute(expr.right, bindings);
    case 'divide': {
      const divisor = compute(expr.right, bindings);
      if (divisor === 0) {
        throw new DivisionByZeroError(formatExpression(expr.right));
      }
      return compute(expr.left, bindings) / divisor;
    }

    case 'power':
      return Math.pow(compute(expr.base, bindings), compute(expr.exponent, bindings));
    case 'log':
      return Math.log(compute(expr.value, bindings)) / Math.log(compute(expr.base, bindings));

    case 'nthRoot':
      return nthRoot(compute(expr.operand, bindings), expr.degree);

    case 'ln':
      return Math.log(compute(expr.operand, bindings));
    case 'ld':
      return Math.log2(compute(expr.operand, bindings));
    case 'exp':
      return Math.exp(compute(expr.operand, bindings));
    case 'sqrt':
      return Math.sqrt(compute(expr.operand, bindings));
    case 'cbrt':
      return Math.cbrt(compute(expr.operand, bindings));
    case 'sin':
      return Math.sin(compute(expr.operand, bindings));
    case 'asin':
      return Math.asin(compute(expr.operand, bindings));
    case 'cos':
      return Math.cos(compute(expr.operand, bindings));
    case 'acos':
      return Math.acos(compute(expr.operand, bindings));
    case 'tan':
      return Math.tan(compute(expr.operand, bindings));
    case 'atan':
      return Math.atan(compute(expr.operand, bindings));
    case 'toRadians':
      return compute(expr.operand, bindings) * Math.PI / 180;
    case 'toDegrees':
      return compute(expr.operand, bindings) * 180 / Math.PI;
  }
}

/**
 * Evaluate with a single symbol bound to a number or an expression
 */
export function computeAt(expr: Expression, x: number | Expression, symbol: string = 'x'): number {
  const bound = typeof x === 'number' ? makeConstant(x) : x;
  return compute(expr, { [symbol]: bound });
}

/**
 * Value of a closed expression, or undefined when evaluation fails or is not finite
 */
export function tryEvaluate(expr: Expression): number | undefined {
  let value: number;
  try {
    value = compute(expr);
  } catch (error) {
    if (error instanceof EvaluationError) {
      return undefined;
    }
    throw error;
  }
  return Number.isFinite(value) ? value : undefined;
}
