/**
 * Base class for every error raised by the expression engine
 */
export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

/**
 * Raised when a node is built with a payload it cannot hold
 */
export class ConstructionError extends ExpressionError {
  constructor(
    message: string,
    public node: string
  ) {
    super(`Cannot construct ${node}: ${message}`);
    this.name = 'ConstructionError';
  }
}

/**
 * Base class for failures of numeric evaluation
 */
export class EvaluationError extends ExpressionError {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

export class UnboundVariableError extends EvaluationError {
  constructor(public symbol: string) {
    super(`Unbound variable '${symbol}'`);
    this.name = 'UnboundVariableError';
  }
}

export class DivisionByZeroError extends EvaluationError {
  constructor(public divisor: string) {
    super(`Division by zero: '${divisor}' evaluated to 0`);
    this.name = 'DivisionByZeroError';
  }
}

export class InvalidDomainError extends EvaluationError {
  constructor(
    public operation: string,
    public value: number,
    public reason: string
  ) {
    super(`Invalid domain for '${operation}' at ${value}: ${reason}`);
    this.name = 'InvalidDomainError';
  }
}
