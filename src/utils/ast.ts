import type { Position } from './types';

export type BinaryOperator = '+' | '-' | '*' | '/';

export interface NumberLiteral {
  readonly type: 'NumberLiteral';
  /** Numeral text exactly as written, sign and decimals included. */
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

export interface BinaryOp {
  readonly type: 'BinaryOp';
  readonly operator: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
  readonly line: number;
  readonly column: number;
}

export type Expr = NumberLiteral | BinaryOp;

export type ASTVisitor<T> = (node: Expr, parent?: BinaryOp) => T;

export function createNumber(value: string, position: Position): NumberLiteral {
  return { type: 'NumberLiteral', value, line: position.line, column: position.column };
}

export function createBinaryOp(
  operator: BinaryOperator,
  left: Expr,
  right: Expr,
  position: Position
): BinaryOp {
  return { type: 'BinaryOp', operator, left, right, line: position.line, column: position.column };
}

export function isBinaryOp(node: Expr): node is BinaryOp {
  return node.type === 'BinaryOp';
}

export function isBinaryOperator(value: string): value is BinaryOperator {
  return value === '+' || value === '-' || value === '*' || value === '/';
}

// Post-order traversal (visits children before node), the order an RPN reader meets them
export function traversePostOrder<T>(node: Expr, visit: ASTVisitor<T>, parent?: BinaryOp): T[] {
  const results: T[] = [];

  if (isBinaryOp(node)) {
    results.push(...traversePostOrder(node.left, visit, node));
    results.push(...traversePostOrder(node.right, visit, node));
  }

  results.push(visit(node, parent));
  return results;
}

/**
 * Rebuild the postfix source of a tree, one space between items.
 */
export function toRPN(node: Expr): string {
  return traversePostOrder(node, (n) => (isBinaryOp(n) ? n.operator : n.value)).join(' ');
}

export function serializeAST(node: Expr): string {
  return JSON.stringify(node, null, 2);
}

export function printAST(node: Expr, indent = 0): string {
  const pad = '  '.repeat(indent);
  const at = `@${node.line}:${node.column}`;

  if (!isBinaryOp(node)) {
    return `${pad}NumberLiteral ${node.value} ${at}`;
  }

  return [
    `${pad}BinaryOp ${node.operator} ${at}`,
    printAST(node.left, indent + 1),
    printAST(node.right, indent + 1),
  ].join('\n');
}

export interface ASTStats {
  nodeCount: number;
  numberCount: number;
  operatorCount: number;
  maxDepth: number;
}

export function getASTStats(node: Expr): ASTStats {
  const depthOf = (n: Expr): number =>
    isBinaryOp(n) ? 1 + Math.max(depthOf(n.left), depthOf(n.right)) : 1;

  const kinds = traversePostOrder(node, (n) => n.type);
  const operatorCount = kinds.filter((kind) => kind === 'BinaryOp').length;

  return {
    nodeCount: kinds.length,
    numberCount: kinds.length - operatorCount,
    operatorCount,
    maxDepth: depthOf(node),
  };
}
