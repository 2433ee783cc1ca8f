// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export { formatError, formatAnyError, formatLocation, describeError, getErrorContext } from './format';
export {
  createNumber,
  createBinaryOp,
  isBinaryOp,
  isBinaryOperator,
  traversePostOrder,
  toRPN,
  serializeAST,
  printAST,
  getASTStats,
} from './ast';
export { highlightSnippet } from './highlight';
export type { FormatOptions } from './format';
export type { SnippetOptions } from './highlight';
export type { Expr, NumberLiteral, BinaryOp, BinaryOperator, ASTVisitor, ASTStats } from './ast';
export type { Position, SourcePosition, SourceError } from './types';
