/**
 * Expression tree node definitions.
 * Nodes are immutable; every rewrite builds new nodes.
 */

import { ConstructionError } from './Errors.js';

/**
 * Every expression variant
 */
export type Expression =
  | Constant
  | Variable
  | BinaryOp
  | Power
  | Log
  | FunctionCall
  | NthRoot;

export type BinaryOperator = 'add' | 'subtract' | 'multiply' | 'divide';

export type FunctionName =
  | 'ln'
  | 'ld'
  | 'exp'
  | 'sqrt'
  | 'cbrt'
  | 'sin'
  | 'asin'
  | 'cos'
  | 'acos'
  | 'tan'
  | 'atan'
  | 'toRadians'
  | 'toDegrees';

export type ExpressionKind = Expression['kind'];

/**
 * Numeric literal
 */
export interface Constant {
  readonly kind: 'constant';
  readonly value: number;
}

/**
 * Unbound input slot (e.g., x)
 */
export interface Variable {
  readonly kind: 'variable';
  readonly name: string;
}

/**
 * Binary arithmetic
 */
export interface BinaryOp {
  readonly kind: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface Power {
  readonly kind: 'power';
  readonly base: Expression;
  readonly exponent: Expression;
}

/**
 * Logarithm of value to an arbitrary base
 */
export interface Log {
  readonly kind: 'log';
  readonly value: Expression;
  readonly base: Expression;
}

/**
 * Single-argument function (ln, sin, sqrt, ...)
 */
export interface FunctionCall {
  readonly kind: FunctionName;
  readonly operand: Expression;
}

export interface NthRoot {
  readonly kind: 'nthRoot';
  readonly operand: Expression;
  readonly degree: number;
}

export const FUNCTION_NAMES: readonly FunctionName[] = [
  'ln', 'ld', 'exp', 'sqrt', 'cbrt',
  'sin', 'asin', 'cos', 'acos', 'tan', 'atan',
  'toRadians', 'toDegrees'
];

function freezeConstant(value: number): Constant {
  return Object.freeze({ kind: 'constant', value });
}

/**
 * Shared constant instances, reused so rewrite rules can short-circuit on identity
 */
export const ZERO = freezeConstant(0);
export const ONE = freezeConstant(1);
export const TWO = freezeConstant(2);
export const THREE = freezeConstant(3);
export const MINUS_ONE = freezeConstant(-1);
export const E = freezeConstant(Math.E);
export const PI = freezeConstant(Math.PI);

const CANONICAL_CONSTANTS: readonly Constant[] = [ZERO, ONE, TWO, THREE, MINUS_ONE, E, PI];

export function makeConstant(value: number): Constant {
  if (!Number.isFinite(value)) {
    throw new ConstructionError(`constant must be finite, got ${value}`, 'constant');
  }
  for (const canonical of CANONICAL_CONSTANTS) {
    if (canonical.value === value) {
      return canonical;
    }
  }
  return freezeConstant(value);
}

export function makeVariable(name: string): Variable {
  if (name.length === 0) {
    throw new ConstructionError('variable symbol must not be empty', 'variable');
  }
  return Object.freeze({ kind: 'variable', name });
}

export function makeBinaryOp(
  kind: BinaryOperator,
  left: Expression,
  right: Expression
): BinaryOp {
  return Object.freeze({ kind, left, right });
}

export function makeAdd(left: Expression, right: Expression): BinaryOp {
  return makeBinaryOp('add', left, right);
}

export function makeSubtract(left: Expression, right: Expression): BinaryOp {
  return makeBinaryOp('subtract', left, right);
}

export function makeMultiply(left: Expression, right: Expression): BinaryOp {
  return makeBinaryOp('multiply', left, right);
}

export function makeDivide(left: Expression, right: Expression): BinaryOp {
  return makeBinaryOp('divide', left, right);
}

/**
 * Canonical negation form: (-1) * operand
 */
export function makeNegate(operand: Expression): BinaryOp {
  return makeMultiply(MINUS_ONE, operand);
}

export function makePower(base: Expression, exponent: Expression): Power {
  return Object.freeze({ kind: 'power', base, exponent });
}

export function makeLog(value: Expression, base: Expression): Log {
  return Object.freeze({ kind: 'log', value, base });
}

export function makeFunctionCall(kind: FunctionName, operand: Expression): FunctionCall {
  return Object.freeze({ kind, operand });
}

export const makeLn = (operand: Expression) => makeFunctionCall('ln', operand);
export const makeLd = (operand: Expression) => makeFunctionCall('ld', operand);
export const makeExp = (operand: Expression) => makeFunctionCall('exp', operand);
export const makeSqrt = (operand: Expression) => makeFunctionCall('sqrt', operand);
export const makeCbrt = (operand: Expression) => makeFunctionCall('cbrt', operand);
export const makeSin = (operand: Expression) => makeFunctionCall('sin', operand);
export const makeAsin = (operand: Expression) => makeFunctionCall('asin', operand);
export const makeCos = (operand: Expression) => makeFunctionCall('cos', operand);
export const makeAcos = (operand: Expression) => makeFunctionCall('acos', operand);
export const makeTan = (operand: Expression) => makeFunctionCall('tan', operand);
export const makeAtan = (operand: Expression) => makeFunctionCall('atan', operand);
export const makeToRadians = (operand: Expression) => makeFunctionCall('toRadians', operand);
export const makeToDegrees = (operand: Expression) => makeFunctionCall('toDegrees', operand);

export function makeNthRoot(operand: Expression, degree: number): NthRoot {
  if (!Number.isInteger(degree) || degree < 2) {
    throw new ConstructionError(`root degree must be an integer >= 2, got ${degree}`, 'nthRoot');
  }
  return Object.freeze({ kind: 'nthRoot', operand, degree });
}

const FUNCTION_NAME_SET: ReadonlySet<string> = new Set(FUNCTION_NAMES);

export function isFunctionName(kind: ExpressionKind): kind is FunctionName {
  return FUNCTION_NAME_SET.has(kind);
}

/**
 * Direct sub-expressions of a node, left to right
 */
export function childrenOf(expr: Expression): readonly Expression[] {
  switch (expr.kind) {
    case 'constant':
    case 'variable':
      return [];
    case 'add':
    case 'subtract':
    case 'multiply':
    case 'divide':
      return [expr.left, expr.right];
    case 'power':
      return [expr.base, expr.exponent];
    case 'log':
      return [expr.value, expr.base];
    case 'nthRoot':
      return [expr.operand];
    default:
      return [expr.operand];
  }
}

/**
 * True iff no variable is reachable from this node
 */
export function isConstant(expr: Expression): boolean {
  if (expr.kind === 'constant') return true;
  if (expr.kind === 'variable') return false;
  return childrenOf(expr).every(isConstant);
}

/**
 * True iff the given symbol occurs somewhere in the tree
 */
export function dependsOn(expr: Expression, symbol: string): boolean {
  if (expr.kind === 'variable') return expr.name === symbol;
  return childrenOf(expr).some(child => dependsOn(child, symbol));
}

/**
 * Numeric value of a Constant node, undefined for anything else
 */
export function constantValue(expr: Expression): number | undefined {
  return expr.kind === 'constant' ? expr.value : undefined;
}

export function isConstantValue(expr: Expression, value: number): boolean {
  return expr.kind === 'constant' && expr.value === value;
}
