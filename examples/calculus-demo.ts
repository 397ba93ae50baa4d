/**
 * Example: Differentiation and Simplification
 *
 * Builds a few expressions in x, prints their simplified derivatives and
 * checks each against a finite-difference estimate.
 */

import {
  checkDerivative,
  constant,
  formatDerivativeCheckResult,
  variable
} from '../src/index.js';

const x = variable('x');

// Example 1: Polynomial
console.log('=== Example 1: Polynomial ===\n');

const poly = x.pow(3).minus(x.pow(2).multiply(2)).plus(x.multiply(5));
console.log(`f(x)   = ${poly}`);
console.log(`f'(x)  = ${poly.differentiate()}`);
console.log(`f'(2)  = ${poly.differentiate().compute(2)}`);

// Example 2: Product and chain rules
console.log('\n=== Example 2: Product and Chain Rules ===\n');

const wave = x.multiply(x.pow(2).sin());
console.log(`f(x)   = ${wave}`);
console.log(`f'(x)  = ${wave.differentiate()}`);

// Example 3: Logarithmic differentiation
console.log('\n=== Example 3: x^x ===\n');

const tower = x.pow(x);
console.log(`f(x)   = ${tower}`);
console.log(`f'(x)  = ${tower.differentiate()}`);

// Example 4: Simplification on its own
console.log('\n=== Example 4: Simplification ===\n');

const messy = constant(2).multiply(x.plus(1)).plus(x.multiply(x)).minus(constant(0).multiply(x.sin()));
console.log(`before = ${messy}`);
console.log(`after  = ${messy.simplify({ verbose: true })}`);

// Verify every derivative numerically
console.log('\n=== Verification ===\n');

const checks = [
  ['polynomial', poly],
  ['x * sin(x^2)', wave],
  ['x^x', tower]
] as const;

for (const [label, f] of checks) {
  const result = checkDerivative(f.node, [0.5, 1, 2]);
  console.log(formatDerivativeCheckResult(result, label));
}
