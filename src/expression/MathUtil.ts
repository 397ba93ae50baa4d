/**
 * Numeric helpers shared by evaluation and differentiation
 */

import { type Constant, makeConstant } from './AST.js';
import { InvalidDomainError } from './Errors.js';

/**
 * Real positive n-th root by Newton iteration.
 *
 * Iterates g <- ((n - 1) * g + value / g^(n - 1)) / n from g = value, stepping a
 * second sequence twice as fast and stopping once both meet, so the loop ends
 * even if rounding leaves the iterate cycling between neighbouring doubles.
 *
 * @param value - must be > 0
 * @param degree - must be an integer >= 2
 */
export function nthRoot(value: number, degree: number): number {
  if (!Number.isInteger(degree) || degree < 2) {
    throw new InvalidDomainError('nthRoot', value, `degree must be an integer >= 2, got ${degree}`);
  }
  if (!(value > 0)) {
    throw new InvalidDomainError('nthRoot', value, 'value must be positive');
  }

  const np = degree - 1;
  const step = (g: number): number => (np * g + value / Math.pow(g, np)) / degree;

  let slow = value;
  let fast = step(slow);
  while (slow !== fast) {
    slow = step(slow);
    fast = step(step(fast));
  }
  return slow;
}

let ln2Constant: Constant | undefined;

/**
 * ln(2) as a shared constant node, computed on first use
 */
export function ln2(): Constant {
  if (ln2Constant === undefined) {
    ln2Constant = makeConstant(Math.log(2));
  }
  return ln2Constant;
}
