/**
 * Symbolic differentiation engine.
 * Applies calculus rules node by node and simplifies the resulting tree.
 */

import {
  type Expression,
  type FunctionCall,
  ONE,
  TWO,
  THREE,
  ZERO,
  makeAdd,
  makeConstant,
  makeCos,
  makeCbrt,
  makeDivide,
  makeFunctionCall,
  makeLn,
  makeMultiply,
  makeNegate,
  makeNthRoot,
  makePower,
  makeSin,
  makeSqrt,
  makeSubtract,
  dependsOn
} from './AST.js';
import { ln2 } from './MathUtil.js';
import { simplify, type SimplifyOptions } from './Simplify.js';

export interface DifferentiateOptions extends SimplifyOptions {
  simplify?: boolean;   // Default: true
}

/**
 * Differentiate an expression with respect to a symbol.
 * The result is simplified unless `simplify: false` is passed.
 */
export function differentiate(
  expr: Expression,
  wrt: string = 'x',
  options: DifferentiateOptions = {}
): Expression {
  const { simplify: shouldSimplify = true, ...simplifyOptions } = options;
  const derivative = derive(expr, wrt);
  return shouldSimplify ? simplify(derivative, simplifyOptions) : derivative;
}

function derive(expr: Expression, wrt: string): Expression {
  switch (expr.kind) {
    case 'constant':
      // d/dx(c) = 0
      return ZERO;

    case 'variable':
      // d/dx(x) = 1, d/dx(y) = 0
      return expr.name === wrt ? ONE : ZERO;

    case 'add':
      // d/dx(u + v) = du/dx + dv/dx
      return makeAdd(derive(expr.left, wrt), derive(expr.right, wrt));

    case 'subtract':
      // d/dx(u - v) = du/dx - dv/dx
      return makeSubtract(derive(expr.left, wrt), derive(expr.right, wrt));

    case 'multiply': {
      // d/dx(u * v) = du/dx * v + u * dv/dx  (product rule)
      const u = expr.left;
      const v = expr.right;
      return makeAdd(
        makeMultiply(derive(u, wrt), v),
        makeMultiply(u, derive(v, wrt))
      );
    }

    case 'divide': {
      // d/dx(u / v) = (du/dx * v - u * dv/dx) / v^2  (quotient rule)
      const u = expr.left;
      const v = expr.right;
      return makeDivide(
        makeSubtract(
          makeMultiply(derive(u, wrt), v),
          makeMultiply(u, derive(v, wrt))
        ),
        makePower(v, TWO)
      );
    }

    case 'power':
      return derivePower(expr.base, expr.exponent, wrt);

    case 'log':
      // d/dx(log_b(u)) = du/dx / (u * ln(b))
      return makeDivide(
        derive(expr.value, wrt),
        makeMultiply(expr.value, makeLn(expr.base))
      );

    case 'nthRoot': {
      // d/dx(root_n(u)) = du/dx / (n * root_n(u)^(n-1))
      const root = makeNthRoot(expr.operand, expr.degree);
      return makeDivide(
        derive(expr.operand, wrt),
        makeMultiply(
          makeConstant(expr.degree),
          makePower(root, makeConstant(expr.degree - 1))
        )
      );
    }

    default:
      return deriveFunction(expr, wrt);
  }
}

function derivePower(base: Expression, exponent: Expression, wrt: string): Expression {
  const baseVaries = dependsOn(base, wrt);
  const exponentVaries = dependsOn(exponent, wrt);

  if (!baseVaries && !exponentVaries) {
    return ZERO;
  }

  if (!exponentVaries) {
    // d/dx(u^c) = c * u^(c-1) * du/dx  (power rule)
    return makeMultiply(
      makeMultiply(exponent, makePower(base, makeSubtract(exponent, ONE))),
      derive(base, wrt)
    );
  }

  if (!baseVaries) {
    // d/dx(c^v) = c^v * ln(c) * dv/dx
    return makeMultiply(
      makeMultiply(makePower(base, exponent), makeLn(base)),
      derive(exponent, wrt)
    );
  }

  // d/dx(u^v) = u^v * (dv/dx * ln(u) + v * du/dx / u)  (logarithmic differentiation)
  return makeMultiply(
    makePower(base, exponent),
    makeAdd(
      makeMultiply(derive(exponent, wrt), makeLn(base)),
      makeMultiply(exponent, makeDivide(derive(base, wrt), base))
    )
  );
}

function deriveFunction(expr: FunctionCall, wrt: string): Expression {
  const u = expr.operand;
  const du = derive(u, wrt);

  switch (expr.kind) {
    case 'ln':
      // d/dx(ln(u)) = du/dx / u
      return makeDivide(du, u);

    case 'ld':
      // ld(u) = ln(u) / ln(2)
      return derive(makeDivide(makeLn(u), ln2()), wrt);

    case 'exp':
      // d/dx(exp(u)) = exp(u) * du/dx
      return makeMultiply(expr, du);

    case 'sqrt':
      // d/dx(sqrt(u)) = du/dx / (2 * sqrt(u))
      return makeDivide(du, makeMultiply(TWO, makeSqrt(u)));

    case 'cbrt':
      // d/dx(cbrt(u)) = du/dx / (3 * cbrt(u)^2)
      return makeDivide(du, makeMultiply(THREE, makePower(makeCbrt(u), TWO)));

    case 'sin':
      // d/dx(sin(u)) = cos(u) * du/dx
      return makeMultiply(makeCos(u), du);

    case 'cos':
      // d/dx(cos(u)) = -sin(u) * du/dx
      return makeMultiply(makeNegate(makeSin(u)), du);

    case 'tan':
      // d/dx(tan(u)) = du/dx / cos(u)^2
      return makeDivide(du, makePower(makeCos(u), TWO));

    case 'asin':
      // d/dx(asin(u)) = du/dx / sqrt(1 - u^2)
      return makeDivide(du, makeSqrt(makeSubtract(ONE, makePower(u, TWO))));

    case 'acos':
      // d/dx(acos(u)) = -du/dx / sqrt(1 - u^2)
      return makeDivide(makeNegate(du), makeSqrt(makeSubtract(ONE, makePower(u, TWO))));

    case 'atan':
      // d/dx(atan(u)) = du/dx / (1 + u^2)
      return makeDivide(du, makeAdd(ONE, makePower(u, TWO)));

    case 'toRadians':
    case 'toDegrees':
      // Unit conversion is a constant scale: d/dx(k * u) = k * du/dx
      return makeFunctionCall(expr.kind, du);
  }
}
