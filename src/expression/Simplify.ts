/**
 * Expression simplification.
 * Rewrites a tree toward a canonical reduced form: closed subtrees are folded
 * to numbers, then per-operator identities are applied bottom-up.
 */

import {
  type Constant,
  type Expression,
  type FunctionName,
  MINUS_ONE,
  ONE,
  TWO,
  ZERO,
  isConstant,
  isConstantValue,
  makeAdd,
  makeConstant,
  makeDivide,
  makeFunctionCall,
  makeLog,
  makeMultiply,
  makeNthRoot,
  makePower,
  makeSubtract
} from './AST.js';
import { expressionsEqual } from './Equality.js';
import { tryEvaluate } from './Evaluate.js';
import { formatExpression } from './Format.js';

/**
 * Options for simplification
 */
export interface SimplifyOptions {
  maxIterations?: number;    // Default: 10
  verbose?: boolean;         // Log each pass
}

/**
 * Simplify an expression.
 * Passes are repeated until one leaves the tree unchanged or the pass limit is hit.
 */
export function simplify(expr: Expression, options: SimplifyOptions = {}): Expression {
  const {
    maxIterations = 10,
    verbose = false
  } = options;

  let current = expr;
  let previous: Expression;
  let passes = 0;

  do {
    previous = current;
    current = simplifyNode(current);
    passes++;
    if (verbose) {
      console.log(`[simplify] Pass ${passes}: ${formatExpression(current)}`);
    }
  } while (passes < maxIterations && !expressionsEqual(current, previous));

  if (verbose) {
    const converged = expressionsEqual(current, previous);
    console.log(`[simplify] ${converged ? 'Fixed point' : 'Stopped'} after ${passes} passes`);
  }

  return current;
}

function simplifyNode(expr: Expression): Expression {
  const folded = fold(expr);
  if (folded) return folded;

  switch (expr.kind) {
    case 'constant':
    case 'variable':
      return expr;
    case 'add':
      return add(simplifyNode(expr.left), simplifyNode(expr.right));
    case 'subtract':
      return subtract(simplifyNode(expr.left), simplifyNode(expr.right));
    case 'multiply':
      return multiply(simplifyNode(expr.left), simplifyNode(expr.right));
    case 'divide':
      return divide(simplifyNode(expr.left), simplifyNode(expr.right));
    case 'power':
      return power(simplifyNode(expr.base), simplifyNode(expr.exponent));
    case 'log':
      return log(simplifyNode(expr.value), simplifyNode(expr.base));
    case 'nthRoot':
      return nthRoot(simplifyNode(expr.operand), expr.degree);
    default:
      return applyFunction(expr.kind, simplifyNode(expr.operand));
  }
}

// ---------------------------------------------------------------------------
// Constant folding
// ---------------------------------------------------------------------------

/**
 * Replace a closed expression by its value. Returns undefined when the tree
 * has a variable or its value cannot be represented (e.g. 1 / 0, ln(-1)).
 */
function fold(expr: Expression): Constant | undefined {
  if (expr.kind === 'constant' || !isConstant(expr)) return undefined;
  const value = exactValue(expr) ?? tryEvaluate(expr);
  return value === undefined ? undefined : makeConstant(value);
}

/**
 * Special values that floating point evaluation would miss or round
 */
function exactValue(expr: Expression): number | undefined {
  if (expr.kind === 'nthRoot') {
    const v = tryEvaluate(expr.operand);
    if (v === 0 || v === 1) return v;
    if (v === -1 && expr.degree % 2 === 1) return -1;
    return undefined;
  }

  if (expr.kind !== 'sin' && expr.kind !== 'cos' && expr.kind !== 'ln' && expr.kind !== 'exp') {
    return undefined;
  }

  const v = tryEvaluate(expr.operand);
  if (v === undefined) return undefined;

  switch (expr.kind) {
    case 'sin':
      if (v === 0 || v === Math.PI || v === -Math.PI) return 0;
      if (v === Math.PI / 2) return 1;
      if (v === -Math.PI / 2) return -1;
      return undefined;
    case 'cos':
      if (v === 0) return 1;
      if (v === Math.PI || v === -Math.PI) return -1;
      if (v === Math.PI / 2 || v === -Math.PI / 2) return 0;
      return undefined;
    case 'ln':
      if (v === 1) return 0;
      if (v === Math.E) return 1;
      return undefined;
    case 'exp':
      if (v === 0) return 1;
      if (v === 1) return Math.E;
      return undefined;
    default:
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const isZero = (expr: Expression) => isConstantValue(expr, 0);
const isOne = (expr: Expression) => isConstantValue(expr, 1);

/**
 * Split c * t into [c, t]; anything else is [1, expr]
 */
function coefficientOf(expr: Expression): [number, Expression] {
  if (expr.kind === 'multiply' && expr.left.kind === 'constant') {
    return [expr.left.value, expr.right];
  }
  return [1, expr];
}

/**
 * Split b^e into [b, e]; anything else is [expr, 1]
 */
function powerOf(expr: Expression): [Expression, Expression] {
  if (expr.kind === 'power') {
    return [expr.base, expr.exponent];
  }
  return [expr, ONE];
}

/**
 * Top-level factors of a product; a non-product is its own single factor
 */
function factorsOf(expr: Expression): Expression[] {
  return expr.kind === 'multiply' ? [expr.left, expr.right] : [expr];
}

function productOf(factors: Expression[]): Expression {
  if (factors.length === 0) return ONE;
  return factors.reduce((acc, factor) => multiply(acc, factor));
}

interface SharedFactor {
  factor: Expression;
  restLeft: Expression;
  restRight: Expression;
}

/**
 * Find a non-constant factor that appears at the top level of both products
 */
function sharedFactor(a: Expression, b: Expression): SharedFactor | undefined {
  const left = factorsOf(a);
  const right = factorsOf(b);
  if (left.length === 1 && right.length === 1) return undefined;

  for (let i = 0; i < left.length; i++) {
    if (isConstant(left[i])) continue;
    for (let j = 0; j < right.length; j++) {
      if (expressionsEqual(left[i], right[j])) {
        return {
          factor: left[i],
          restLeft: productOf(left.filter((_, k) => k !== i)),
          restRight: productOf(right.filter((_, k) => k !== j))
        };
      }
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Operators. Each takes simplified operands and returns a simplified node.
// ---------------------------------------------------------------------------

function add(a: Expression, b: Expression): Expression {
  const folded = fold(makeAdd(a, b));
  if (folded) return folded;

  // 0 + b = b, a + 0 = a
  if (isZero(a)) return b;
  if (isZero(b)) return a;

  // Constants to the front
  if (isConstant(b) && !isConstant(a)) return add(b, a);

  // c + (d + t) = (c + d) + t
  if (a.kind === 'constant' && b.kind === 'add' && b.left.kind === 'constant') {
    return add(makeConstant(a.value + b.left.value), b.right);
  }
  // (c + t) + b = c + (t + b)
  if (!isConstant(b) && a.kind === 'add' && a.left.kind === 'constant') {
    return add(a.left, add(a.right, b));
  }
  // a + (c + t) = c + (a + t)
  if (!isConstant(a) && b.kind === 'add' && b.left.kind === 'constant') {
    return add(b.left, add(a, b.right));
  }

  // Like terms: p*t + q*t = (p + q)*t, which also cancels t + (-1)*t
  const [ka, ta] = coefficientOf(a);
  const [kb, tb] = coefficientOf(b);
  if (!isConstant(ta) && expressionsEqual(ta, tb)) {
    return multiply(makeConstant(ka + kb), ta);
  }

  // f*p + f*q = f*(p + q)
  const shared = sharedFactor(a, b);
  if (shared) {
    return multiply(shared.factor, add(shared.restLeft, shared.restRight));
  }

  return makeAdd(a, b);
}

function subtract(a: Expression, b: Expression): Expression {
  const folded = fold(makeSubtract(a, b));
  if (folded) return folded;

  // a - a = 0
  if (expressionsEqual(a, b)) return ZERO;
  // a - 0 = a
  if (isZero(b)) return a;
  // 0 - b = -b
  if (isZero(a)) return multiply(MINUS_ONE, b);

  // a - (-c) = a + c
  if (b.kind === 'constant' && b.value < 0) {
    return add(a, makeConstant(-b.value));
  }
  // a - (-1)*t = a + t
  if (b.kind === 'multiply' && isConstantValue(b.left, -1)) {
    return add(a, b.right);
  }

  // p*t - q*t = (p - q)*t
  const [ka, ta] = coefficientOf(a);
  const [kb, tb] = coefficientOf(b);
  if (!isConstant(ta) && expressionsEqual(ta, tb)) {
    return multiply(makeConstant(ka - kb), ta);
  }

  // f*p - f*q = f*(p - q)
  const shared = sharedFactor(a, b);
  if (shared) {
    return multiply(shared.factor, subtract(shared.restLeft, shared.restRight));
  }

  return makeSubtract(a, b);
}

function multiply(a: Expression, b: Expression): Expression {
  const folded = fold(makeMultiply(a, b));
  if (folded) return folded;

  // 0 * b = 0, a * 0 = 0
  if (isZero(a) || isZero(b)) return ZERO;
  // 1 * b = b, a * 1 = a
  if (isOne(a)) return b;
  if (isOne(b)) return a;

  // Constants to the front
  if (isConstant(b) && !isConstant(a)) return multiply(b, a);

  if (a.kind === 'constant') {
    // c * (d * t) = (c * d) * t
    if (b.kind === 'multiply' && b.left.kind === 'constant') {
      return multiply(makeConstant(a.value * b.left.value), b.right);
    }
    // c * (d / t) = (c * d) / t
    if (b.kind === 'divide' && b.left.kind === 'constant') {
      return divide(makeConstant(a.value * b.left.value), b.right);
    }
    // c * (p + q) = c*p + c*q
    if (b.kind === 'add') {
      return add(multiply(a, b.left), multiply(a, b.right));
    }
    if (b.kind === 'subtract') {
      return subtract(multiply(a, b.left), multiply(a, b.right));
    }
    // (-1) * b stays as the canonical negation
    return makeMultiply(a, b);
  }

  // Pull coefficients out of nested products
  if (a.kind === 'multiply' && a.left.kind === 'constant') {
    return multiply(a.left, multiply(a.right, b));
  }
  if (b.kind === 'multiply' && b.left.kind === 'constant') {
    return multiply(b.left, multiply(a, b.right));
  }

  // a * a = a^2
  if (expressionsEqual(a, b)) return power(a, TWO);

  // x^p * x^q = x^(p + q)
  const [baseA, expA] = powerOf(a);
  const [baseB, expB] = powerOf(b);
  if (expressionsEqual(baseA, baseB)) {
    return power(baseA, add(expA, expB));
  }

  // a * (p / q) = (a * p) / q
  if (b.kind === 'divide') return divide(multiply(a, b.left), b.right);
  if (a.kind === 'divide') return divide(multiply(a.left, b), a.right);

  return makeMultiply(a, b);
}

function divide(a: Expression, b: Expression): Expression {
  const folded = fold(makeDivide(a, b));
  if (folded) return folded;

  const divisorIsZero = isZero(b);

  // 0 / b = 0
  if (isZero(a) && !divisorIsZero) return ZERO;
  // a / 1 = a
  if (isOne(b)) return a;
  // a / a = 1
  if (!divisorIsZero && expressionsEqual(a, b)) return ONE;
  // a / -1 = -a
  if (isConstantValue(b, -1)) return multiply(MINUS_ONE, a);

  // (p * q) / p = q
  if (a.kind === 'multiply') {
    if (expressionsEqual(a.left, b)) return a.right;
    if (expressionsEqual(a.right, b)) return a.left;
  }
  // p / (p * q) = 1 / q
  if (b.kind === 'multiply') {
    if (expressionsEqual(b.left, a)) return divide(ONE, b.right);
    if (expressionsEqual(b.right, a)) return divide(ONE, b.left);
  }

  // x^p / x^q = x^(p - q)
  const [baseA, expA] = powerOf(a);
  const [baseB, expB] = powerOf(b);
  if (!isConstant(baseA) && expressionsEqual(baseA, baseB)) {
    return power(baseA, subtract(expA, expB));
  }

  // (f * p) / (f * q) = p / q
  if (a.kind === 'multiply' && b.kind === 'multiply') {
    const shared = sharedFactor(a, b);
    if (shared) {
      return divide(shared.restLeft, shared.restRight);
    }
  }

  // a / c = (1 / c) * a
  if (b.kind === 'constant' && !divisorIsZero) {
    return multiply(makeConstant(1 / b.value), a);
  }

  // (c * t) / b = c * (t / b)
  if (a.kind === 'multiply' && a.left.kind === 'constant') {
    return multiply(a.left, divide(a.right, b));
  }

  return makeDivide(a, b);
}

function power(base: Expression, exponent: Expression): Expression {
  const folded = fold(makePower(base, exponent));
  if (folded) return folded;

  // x^0 = 1
  if (isZero(exponent)) return ONE;
  // x^1 = x
  if (isOne(exponent)) return base;
  // 1^x = 1
  if (isOne(base)) return ONE;
  // 0^c = 0 for c > 0
  if (isZero(base) && exponent.kind === 'constant' && exponent.value > 0) return ZERO;

  // (x^a)^b = x^(a * b)
  if (base.kind === 'power') {
    return power(base.base, multiply(base.exponent, exponent));
  }

  // e^ln(x) = x
  if (isConstantValue(base, Math.E) && exponent.kind === 'ln') {
    return exponent.operand;
  }

  return makePower(base, exponent);
}

function log(value: Expression, base: Expression): Expression {
  const folded = fold(makeLog(value, base));
  if (folded) return folded;

  // log_b(b) = 1
  if (expressionsEqual(value, base)) return ONE;
  // log_b(1) = 0
  if (isOne(value)) return ZERO;

  return makeLog(value, base);
}

function nthRoot(operand: Expression, degree: number): Expression {
  const folded = fold(makeNthRoot(operand, degree));
  if (folded) return folded;

  // root_n(x^n) = x
  if (operand.kind === 'power' && isConstantValue(operand.exponent, degree)) {
    return operand.base;
  }

  return makeNthRoot(operand, degree);
}

function applyFunction(kind: FunctionName, operand: Expression): Expression {
  const node = makeFunctionCall(kind, operand);
  const folded = fold(node);
  if (folded) return folded;

  switch (kind) {
    case 'ln':
      return ln(operand) ?? node;
    case 'exp':
      return exp(operand) ?? node;
    case 'sqrt':
      // sqrt(x^2) = x
      return operand.kind === 'power' && isConstantValue(operand.exponent, 2) ? operand.base : node;
    case 'cbrt':
      // cbrt(x^3) = x
      return operand.kind === 'power' && isConstantValue(operand.exponent, 3) ? operand.base : node;
    case 'sin':
      // sin(-v) = -sin(v)
      if (operand.kind === 'multiply' && isConstantValue(operand.left, -1)) {
        return multiply(MINUS_ONE, applyFunction('sin', operand.right));
      }
      return node;
    case 'cos':
      // cos(-v) = cos(v)
      if (operand.kind === 'multiply' && isConstantValue(operand.left, -1)) {
        return applyFunction('cos', operand.right);
      }
      return node;
    case 'toRadians':
      return operand.kind === 'toDegrees' ? operand.operand : node;
    case 'toDegrees':
      return operand.kind === 'toRadians' ? operand.operand : node;
    default:
      return node;
  }
}

function ln(operand: Expression): Expression | undefined {
  switch (operand.kind) {
    // ln(exp(v)) = v
    case 'exp':
      return operand.operand;
    // ln(x^a) = a * ln(x)
    case 'power':
      return multiply(operand.exponent, applyFunction('ln', operand.base));
    // ln(a * b) = ln(a) + ln(b)
    case 'multiply':
      return add(applyFunction('ln', operand.left), applyFunction('ln', operand.right));
    // ln(a / b) = ln(a) - ln(b)
    case 'divide':
      return subtract(applyFunction('ln', operand.left), applyFunction('ln', operand.right));
    default:
      return undefined;
  }
}

function exp(operand: Expression): Expression | undefined {
  // exp(ln(v)) = v
  if (operand.kind === 'ln') return operand.operand;

  // exp(a * ln(b)) = b^a
  if (operand.kind === 'multiply') {
    if (operand.right.kind === 'ln') return power(operand.right.operand, operand.left);
    if (operand.left.kind === 'ln') return power(operand.left.operand, operand.right);
  }
  return undefined;
}
