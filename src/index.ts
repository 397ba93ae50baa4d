/**
 * expression-calculus - Symbolic calculus on single-variable expression trees
 *
 * Build expressions from constants and a variable, then evaluate,
 * differentiate or simplify them.
 */

// Fluent API
export { Expr, constant, variable, expr, type Operand } from './expression/Builder.js';

// Core operations
export { compute, computeAt, tryEvaluate, type Bindings } from './expression/Evaluate.js';
export { differentiate, type DifferentiateOptions } from './expression/Differentiation.js';
export { simplify, type SimplifyOptions } from './expression/Simplify.js';
export { expressionsEqual } from './expression/Equality.js';
export { formatExpression, formatNumber } from './expression/Format.js';
export { nthRoot, ln2 } from './expression/MathUtil.js';

// Node constructors
export {
  ZERO,
  ONE,
  TWO,
  THREE,
  MINUS_ONE,
  E,
  PI,
  makeConstant,
  makeVariable,
  makeAdd,
  makeSubtract,
  makeMultiply,
  makeDivide,
  makeNegate,
  makePower,
  makeLog,
  makeLn,
  makeLd,
  makeExp,
  makeSqrt,
  makeCbrt,
  makeNthRoot,
  makeSin,
  makeAsin,
  makeCos,
  makeAcos,
  makeTan,
  makeAtan,
  makeToRadians,
  makeToDegrees,
  makeFunctionCall,
  isConstant,
  dependsOn,
  childrenOf
} from './expression/AST.js';

// AST types
export type {
  Expression,
  ExpressionKind,
  Constant,
  Variable,
  BinaryOp,
  BinaryOperator,
  Power,
  Log,
  FunctionCall,
  FunctionName,
  NthRoot
} from './expression/AST.js';

// Errors
export {
  ExpressionError,
  ConstructionError,
  EvaluationError,
  UnboundVariableError,
  DivisionByZeroError,
  InvalidDomainError
} from './expression/Errors.js';

// Derivative verification utilities
export {
  checkDerivative,
  formatDerivativeCheckResult,
  type DerivativeCheckResult,
  type DerivativeCheckError,
  type DerivativeCheckOptions
} from './expression/DerivativeChecker.js';
