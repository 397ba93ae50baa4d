/**
 * Numerical derivative checking.
 * Validates symbolic derivatives against central finite differences.
 */

import { type Expression } from './AST.js';
import { differentiate } from './Differentiation.js';
import { EvaluationError } from './Errors.js';
import { computeAt } from './Evaluate.js';

/**
 * Derivative checking result
 */
export interface DerivativeCheckResult {
  passed: boolean;
  errors: DerivativeCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface DerivativeCheckError {
  point: number;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

export interface DerivativeCheckOptions {
  symbol?: string;       // Default: 'x'
  epsilon?: number;      // Finite difference step, default: 1e-5
  tolerance?: number;    // Default: 1e-4
}

/**
 * Format derivative check results as a human-readable string
 */
export function formatDerivativeCheckResult(result: DerivativeCheckResult, label: string): string {
  if (result.passed) {
    return `✓ ${label}: ${result.totalChecks} derivatives verified (max error: ${result.maxError.toExponential(2)})`;
  }

  const lines: string[] = [
    `✗ ${label}: ${result.errors.length}/${result.totalChecks} derivatives FAILED`
  ];
  for (const e of result.errors) {
    lines.push(`  at ${e.point}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
  }
  return lines.join('\n');
}

/**
 * Compare d(expr)/d(symbol) with a central difference at every point
 */
export function checkDerivative(
  expr: Expression,
  points: readonly number[],
  options: DerivativeCheckOptions = {}
): DerivativeCheckResult {
  const {
    symbol = 'x',
    epsilon = 1e-5,
    tolerance = 1e-4
  } = options;

  const derivative = differentiate(expr, symbol);
  const errors: DerivativeCheckError[] = [];
  const measured: number[] = [];

  for (const point of points) {
    const analytical = evaluateOrNaN(derivative, point, symbol);
    const numerical = centralDifference(expr, point, symbol, epsilon);

    const error = Math.abs(analytical - numerical);
    const relativeError = Math.abs(error / (numerical + 1e-10));

    if (Number.isNaN(error)) {
      errors.push({ point, analytical, numerical, error, relativeError });
      continue;
    }

    measured.push(error);
    if (error > tolerance && relativeError > tolerance) {
      errors.push({ point, analytical, numerical, error, relativeError });
    }
  }

  const maxError = measured.length > 0 ? Math.max(...measured) : 0;
  const meanError = measured.length > 0
    ? measured.reduce((sum, e) => sum + e, 0) / measured.length
    : 0;

  return {
    passed: errors.length === 0,
    errors,
    maxError,
    meanError,
    totalChecks: points.length
  };
}

/**
 * Central difference: (f(x+h) - f(x-h)) / (2h)
 */
function centralDifference(expr: Expression, point: number, symbol: string, epsilon: number): number {
  const fPlus = evaluateOrNaN(expr, point + epsilon, symbol);
  const fMinus = evaluateOrNaN(expr, point - epsilon, symbol);
  return (fPlus - fMinus) / (2 * epsilon);
}

function evaluateOrNaN(expr: Expression, point: number, symbol: string): number {
  try {
    return computeAt(expr, point, symbol);
  } catch (error) {
    if (error instanceof EvaluationError) {
      return NaN;
    }
    throw error;
  }
}
