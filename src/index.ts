// src/index.ts
// ============================================
// 🌐 rpn2tex Main API Surface (Public Entry)
// ============================================

// 🔤 Lexer and Tokenization
export {
  type Token,
  type TokenKind,
  type OperatorKind,
  LexerError,
  tokenize,
  createRpnLexer,
  formatToken,
} from './lexer/index';

// 📥 Parsing
export { ParserError, OPERATOR_SYMBOLS, parse } from './parser/index';

// 🧮 LaTeX Rendering
export { BINARY_OPS, PRECEDENCE, needsParens, render } from './latex/index';

// 🔗 Pipeline
export {
  convert,
  isRpnError,
  type RpnError,
  type ConvertResult,
  type ConvertSuccess,
  type ConvertFailure,
} from './convert';

// ⚙️ Configuration
export { CONFIG_FILE, loadConfig, validateConfig, type Rpn2TexConfig } from './config';

// 💬 Interactive mode
export { runREPL, type REPLOptions } from './repl';

// 🧾 Utilities and AST Helpers
export {
  createNumber,
  createBinaryOp,
  isBinaryOp,
  traversePostOrder,
  toRPN,
  serializeAST,
  printAST,
  getASTStats,
  formatError,
  formatAnyError,
  formatLocation,
  describeError,
  highlightSnippet,
  type Expr,
  type NumberLiteral,
  type BinaryOp,
  type BinaryOperator,
  type Position,
  type SourceError,
  type FormatOptions,
} from './utils/index';
