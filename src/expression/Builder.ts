/**
 * Fluent construction of expression trees.
 *
 * @example
 * const f = variable('x').pow(2).plus(variable('x').sin());
 * f.differentiate('x').toString(); // '2x + cos(x)'
 */

import {
  type Expression,
  type FunctionName,
  isConstant,
  makeAdd,
  makeConstant,
  makeDivide,
  makeFunctionCall,
  makeLog,
  makeMultiply,
  makeNthRoot,
  makePower,
  makeSubtract,
  makeVariable
} from './AST.js';
import { type Bindings, compute, computeAt } from './Evaluate.js';
import { differentiate, type DifferentiateOptions } from './Differentiation.js';
import { expressionsEqual } from './Equality.js';
import { formatExpression } from './Format.js';
import { simplify, type SimplifyOptions } from './Simplify.js';

/**
 * Anything accepted where an operand is expected
 */
export type Operand = Expr | Expression | number;

/**
 * Immutable wrapper around an expression tree with chainable operators
 */
export class Expr {
  constructor(public readonly node: Expression) {}

  plus(other: Operand): Expr {
    return new Expr(makeAdd(this.node, toNode(other)));
  }

  minus(other: Operand): Expr {
    return new Expr(makeSubtract(this.node, toNode(other)));
  }

  multiply(other: Operand): Expr {
    return new Expr(makeMultiply(this.node, toNode(other)));
  }

  divide(other: Operand): Expr {
    return new Expr(makeDivide(this.node, toNode(other)));
  }

  pow(exponent: Operand): Expr {
    return new Expr(makePower(this.node, toNode(exponent)));
  }

  log(base: Operand): Expr {
    return new Expr(makeLog(this.node, toNode(base)));
  }

  nthRoot(degree: number): Expr {
    return new Expr(makeNthRoot(this.node, degree));
  }

  ln(): Expr { return this.call('ln'); }
  ld(): Expr { return this.call('ld'); }
  exp(): Expr { return this.call('exp'); }
  sqrt(): Expr { return this.call('sqrt'); }
  cbrt(): Expr { return this.call('cbrt'); }
  sin(): Expr { return this.call('sin'); }
  asin(): Expr { return this.call('asin'); }
  cos(): Expr { return this.call('cos'); }
  acos(): Expr { return this.call('acos'); }
  tan(): Expr { return this.call('tan'); }
  atan(): Expr { return this.call('atan'); }
  toRadians(): Expr { return this.call('toRadians'); }
  toDegrees(): Expr { return this.call('toDegrees'); }

  /**
   * Evaluate with x bound to the given value, or with no bindings at all
   */
  compute(x?: number | Expr): number {
    if (x === undefined) {
      return compute(this.node);
    }
    return computeAt(this.node, typeof x === 'number' ? x : x.node);
  }

  /**
   * Evaluate against an explicit symbol table
   */
  evaluate(bindings: Readonly<Record<string, Operand>>): number {
    const resolved: Record<string, Expression> = {};
    for (const [symbol, value] of Object.entries(bindings)) {
      resolved[symbol] = toNode(value);
    }
    const table: Bindings = resolved;
    return compute(this.node, table);
  }

  differentiate(wrt: string = 'x', options?: DifferentiateOptions): Expr {
    return new Expr(differentiate(this.node, wrt, options));
  }

  simplify(options?: SimplifyOptions): Expr {
    return new Expr(simplify(this.node, options));
  }

  isConstant(): boolean {
    return isConstant(this.node);
  }

  equals(other: Operand): boolean {
    return expressionsEqual(this.node, toNode(other));
  }

  toString(): string {
    return formatExpression(this.node);
  }

  private call(name: FunctionName): Expr {
    return new Expr(makeFunctionCall(name, this.node));
  }
}

function toNode(operand: Operand): Expression {
  if (typeof operand === 'number') return makeConstant(operand);
  if (operand instanceof Expr) return operand.node;
  return operand;
}

export function constant(value: number): Expr {
  return new Expr(makeConstant(value));
}

export function variable(name: string = 'x'): Expr {
  return new Expr(makeVariable(name));
}

/**
 * Wrap an existing tree
 */
export function expr(node: Expression): Expr {
  return new Expr(node);
}
