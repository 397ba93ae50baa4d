import { describe, it, expect } from 'vitest';
import { constant, type Expr } from '../../src/expression/Builder.js';
import { simplify } from '../../src/expression/Simplify.js';
import { expressionsEqual } from '../../src/expression/Equality.js';
import { x } from '../helpers.js';

const POINTS = [0.5, 1.5, 3];

const EXPRESSIONS: Array<[string, Expr]> = [
  ['like terms times sine', x.plus(x).multiply(x.sin())],
  ['power quotient', x.pow(2).multiply(x.pow(3)).divide(x)],
  ['log of collected terms', x.multiply(2).plus(x.multiply(3)).ln()],
  ['distributed difference', constant(2).multiply(x.plus(1)).minus(x)],
  ['exp-log round trip', x.exp().ln().multiply(x.ln().exp())],
  ['nested quotient', x.multiply(x.cos()).divide(x.multiply(2))],
  ['reciprocal product', x.pow(2).multiply(constant(1).divide(x))],
  ['log of a quotient', x.pow(2).divide(x.plus(1)).ln()],
  ['power of a power', x.sqrt().pow(4).pow(0.5)],
  ['sum of negated terms', constant(0).minus(x).plus(x.multiply(3))]
];

function closeTo(actual: number, expected: number): boolean {
  return Math.abs(actual - expected) <= 1e-9 * Math.max(1, Math.abs(expected));
}

describe('Simplification properties', () => {
  for (const [label, f] of EXPRESSIONS) {
    describe(label, () => {
      it('should preserve the value at every sample point', () => {
        const simplified = f.simplify();
        for (const point of POINTS) {
          expect(closeTo(simplified.compute(point), f.compute(point))).toBe(true);
        }
      });

      it('should be idempotent', () => {
        const once = simplify(f.node);
        expect(expressionsEqual(simplify(once), once)).toBe(true);
      });

      it('should not change the derivative', () => {
        const raw = f.differentiate('x', { simplify: false });
        const simplified = f.differentiate();
        for (const point of POINTS) {
          expect(closeTo(simplified.compute(point), raw.compute(point))).toBe(true);
        }
      });
    });
  }
});
