/**
 * Structural equality used by the simplifier's pattern matching
 */

import { type Expression, childrenOf, isConstant } from './AST.js';
import { tryEvaluate } from './Evaluate.js';

/**
 * Two expressions are interchangeable when both are closed and evaluate to
 * the same number, or when they are the same variant with the same payload
 * and pairwise-equal children.
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  if (a === b) return true;

  const aConstant = isConstant(a);
  const bConstant = isConstant(b);
  if (aConstant !== bConstant) return false;

  if (aConstant) {
    const aValue = tryEvaluate(a);
    const bValue = tryEvaluate(b);
    if (aValue !== undefined && bValue !== undefined) {
      return aValue === bValue;
    }
  }

  if (!payloadEqual(a, b)) return false;

  const aChildren = childrenOf(a);
  const bChildren = childrenOf(b);
  return aChildren.length === bChildren.length &&
    aChildren.every((child, i) => expressionsEqual(child, bChildren[i]));
}

function payloadEqual(a: Expression, b: Expression): boolean {
  switch (a.kind) {
    case 'constant':
      return b.kind === 'constant' && a.value === b.value;
    case 'variable':
      return b.kind === 'variable' && a.name === b.name;
    case 'nthRoot':
      return b.kind === 'nthRoot' && a.degree === b.degree;
    default:
      return a.kind === b.kind;
  }
}
