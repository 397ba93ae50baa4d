/**
 * Human-readable algebraic notation for expression trees.
 * Parentheses are emitted only where operator precedence needs them.
 */

import { type Expression } from './AST.js';

enum Precedence {
  Sum = 1,
  Product = 2,
  Prefix = 3,
  Power = 4,
  Atom = 5
}

interface Rendered {
  text: string;
  precedence: Precedence;
}

/**
 * Format a number: integers without a decimal point, π and e by name
 */
export function formatNumber(value: number): string {
  if (value === Math.PI) return 'π';
  if (value === -Math.PI) return '-π';
  if (value === Math.E) return 'e';
  if (value === -Math.E) return '-e';
  if (Object.is(value, -0)) return '0';
  return String(value);
}

export function formatExpression(expr: Expression): string {
  return render(expr).text;
}

function render(expr: Expression): Rendered {
  switch (expr.kind) {
    case 'constant':
      return {
        text: formatNumber(expr.value),
        precedence: expr.value < 0 ? Precedence.Prefix : Precedence.Atom
      };

    case 'variable':
      return { text: expr.name, precedence: Precedence.Atom };

    case 'add':
      return {
        text: `${operand(expr.left, Precedence.Sum)} + ${rightOperand(expr.right, Precedence.Sum)}`,
        precedence: Precedence.Sum
      };

    case 'subtract':
      return {
        text: `${operand(expr.left, Precedence.Sum)} - ${rightOperand(expr.right, Precedence.Product)}`,
        precedence: Precedence.Sum
      };

    case 'multiply':
      return renderProduct(expr.left, expr.right);

    case 'divide':
      return {
        text: `${operand(expr.left, Precedence.Product)} / ${rightOperand(expr.right, Precedence.Prefix)}`,
        precedence: Precedence.Product
      };

    case 'power':
      return {
        text: `${operand(expr.base, Precedence.Atom)}^${operand(expr.exponent, Precedence.Atom)}`,
        precedence: Precedence.Power
      };

    case 'log':
      return {
        text: `log${operand(expr.base, Precedence.Atom)}(${formatExpression(expr.value)})`,
        precedence: Precedence.Atom
      };

    case 'nthRoot':
      return {
        text: `root${expr.degree}(${formatExpression(expr.operand)})`,
        precedence: Precedence.Atom
      };

    // Angle conversion is a unit change only, the operand prints as-is
    case 'toRadians':
    case 'toDegrees':
      return render(expr.operand);

    default:
      return {
        text: `${expr.kind}(${formatExpression(expr.operand)})`,
        precedence: Precedence.Atom
      };
  }
}

/**
 * Render a product. A constant coefficient or a variable followed by a
 * variable (or a power of one) is juxtaposed: 2x, 3x^2, xy.
 */
function renderProduct(left: Expression, right: Expression): Rendered {
  if (left.kind === 'constant' && left.value === -1) {
    return {
      text: `-${operand(right, Precedence.Product)}`,
      precedence: Precedence.Prefix
    };
  }

  const rightIsMonomial = right.kind === 'variable' ||
    (right.kind === 'power' && right.base.kind === 'variable');

  if ((left.kind === 'constant' || left.kind === 'variable') && rightIsMonomial) {
    return {
      text: `${render(left).text}${render(right).text}`,
      precedence: Precedence.Product
    };
  }

  return {
    text: `${operand(left, Precedence.Product)} * ${rightOperand(right, Precedence.Product)}`,
    precedence: Precedence.Product
  };
}

/**
 * Render a child, wrapped when it binds looser than `minimum`
 */
function operand(expr: Expression, minimum: Precedence): string {
  const rendered = render(expr);
  return rendered.precedence < minimum ? `(${rendered.text})` : rendered.text;
}

/**
 * Right-hand child of an infix operator; also wrapped when it begins with a sign
 */
function rightOperand(expr: Expression, minimum: Precedence): string {
  const rendered = render(expr);
  if (rendered.precedence < minimum || rendered.text.startsWith('-')) {
    return `(${rendered.text})`;
  }
  return rendered.text;
}
