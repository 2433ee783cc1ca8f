import { type OperatorKind, type Token, isOperatorKind } from '../lexer/index';
import { type BinaryOperator, type Expr, createBinaryOp, createNumber } from '../utils/ast';

export class ParserError extends Error {
  readonly kind = 'parser' as const;
  readonly token: Token;
  readonly line: number;
  readonly column: number;

  constructor(message: string, token: Token) {
    super(message);
    this.name = 'ParserError';
    this.token = token;
    this.line = token.line;
    this.column = token.column;
  }

  toString(): string {
    return `${this.name} at ${this.line}:${this.column}: ${this.message}`;
  }
}

export const OPERATOR_SYMBOLS: Readonly<Record<OperatorKind, BinaryOperator>> = {
  plus: '+',
  minus: '-',
  mult: '*',
  div: '/',
};

/**
 * Reduce a postfix token sequence to a single expression tree.
 *
 * Numbers are pushed onto an operand stack; each operator pops its right
 * operand, then its left, and pushes the combined node. At `eof` exactly one
 * tree must remain.
 */
export function parse(tokens: readonly Token[]): Expr {
  const stack: Expr[] = [];

  for (const token of tokens) {
    if (token.kind === 'eof') {
      return finish(stack, token);
    }

    if (!isOperatorKind(token.kind)) {
      stack.push(createNumber(token.text, token));
      continue;
    }

    const operator = OPERATOR_SYMBOLS[token.kind];
    if (stack.length < 2) {
      throw new ParserError(`Operator '${operator}' requires two operands`, token);
    }

    const [left, right] = stack.splice(stack.length - 2, 2);
    stack.push(createBinaryOp(operator, left, right, token));
  }

  return finish(stack, syntheticEof(tokens));
}

function finish(stack: Expr[], eof: Token): Expr {
  if (stack.length === 0) {
    throw new ParserError('Empty expression', eof);
  }
  if (stack.length > 1) {
    throw new ParserError(
      `Invalid RPN: ${stack.length} values remain on stack (missing operators?)`,
      eof
    );
  }
  return stack[0];
}

// Token lists built by hand may omit `eof`; place one just past the last token.
function syntheticEof(tokens: readonly Token[]): Token {
  const last = tokens.at(-1);
  if (!last) {
    return { kind: 'eof', text: '', line: 1, column: 1, offset: 0 };
  }
  return {
    kind: 'eof',
    text: '',
    line: last.line,
    column: last.column + last.text.length,
    offset: last.offset + last.text.length,
  };
}
