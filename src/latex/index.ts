import { type BinaryOperator, type Expr } from '../utils/ast';

export const BINARY_OPS: Readonly<Record<BinaryOperator, string>> = {
  '+': '+',
  '-': '-',
  '*': '\\times',
  '/': '\\div',
};

export const PRECEDENCE: Readonly<Record<BinaryOperator, number>> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
};

// Operators where `a op (b op c)` differs from `a op b op c`.
const NON_ASSOCIATIVE: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['-', '/']);

/**
 * Render an expression tree as LaTeX inline math, e.g. `$( 5 + 3 ) \times 2$`.
 */
export function render(ast: Expr): string {
  return `$${renderNode(ast)}$`;
}

function renderNode(node: Expr): string {
  switch (node.type) {
    case 'NumberLiteral':
      return node.value;

    case 'BinaryOp': {
      const precedence = PRECEDENCE[node.operator];
      const left = renderChild(node.left, precedence, false);
      const right = renderChild(node.right, precedence, true);
      return `${left} ${BINARY_OPS[node.operator]} ${right}`;
    }
  }
}

function renderChild(child: Expr, parentPrecedence: number, isRight: boolean): string {
  const text = renderNode(child);
  return needsParens(child, parentPrecedence, isRight) ? `( ${text} )` : text;
}

export function needsParens(child: Expr, parentPrecedence: number, isRight: boolean): boolean {
  if (child.type === 'NumberLiteral') {
    return false;
  }

  const precedence = PRECEDENCE[child.operator];
  if (precedence < parentPrecedence) {
    return true;
  }

  return precedence === parentPrecedence && isRight && NON_ASSOCIATIVE.has(child.operator);
}
