import * as moo from 'moo';

import type { SourcePosition } from '../utils/types';

export type TokenKind = 'number' | 'plus' | 'minus' | 'mult' | 'div' | 'eof';

export type OperatorKind = Exclude<TokenKind, 'number' | 'eof'>;

export interface Token {
  readonly kind: TokenKind;
  /** Exact text consumed; empty only for `eof`. */
  readonly text: string;
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export class LexerError extends Error {
  readonly kind = 'lexer' as const;
  readonly line: number;
  readonly column: number;
  readonly offset: number;

  constructor(message: string, loc: SourcePosition) {
    super(message);
    this.name = 'LexerError';
    this.line = loc.line;
    this.column = loc.column;
    this.offset = loc.offset;
  }

  toString(): string {
    return `${this.name} at ${this.line}:${this.column}: ${this.message}`;
  }
}

// Rule order matters: `number` sits before `minus`, so a `-` directly followed by
// a digit is read as a sign and a lone `-` falls through to the operator.
const RPN_RULES = {
  ws: { match: /[ \t\r\n]+/, lineBreaks: true },
  number: /-?[0-9]+(?:\.[0-9]+)?/,
  plus: '+',
  minus: '-',
  mult: '*',
  div: '/',
  invalid: moo.error,
} satisfies moo.Rules;

type RuleName = keyof typeof RPN_RULES;

export function createRpnLexer(): moo.Lexer {
  return moo.compile(RPN_RULES);
}

export function isOperatorKind(kind: TokenKind): kind is OperatorKind {
  return kind === 'plus' || kind === 'minus' || kind === 'mult' || kind === 'div';
}

function isRuleName(type: string | undefined): type is RuleName {
  return type !== undefined && Object.prototype.hasOwnProperty.call(RPN_RULES, type);
}

/**
 * Scan RPN source into tokens, always terminated by a single `eof` token.
 * Throws a {@link LexerError} at the first character outside the alphabet.
 */
export function tokenize(input: string): Token[] {
  const lexer = createRpnLexer().reset(input);
  const tokens: Token[] = [];

  for (const mooToken of lexer) {
    const type = mooToken.type;
    if (!isRuleName(type)) {
      throw new Error(`Unknown token type: ${String(type)}`);
    }

    switch (type) {
      case 'ws':
        continue;
      case 'invalid': {
        // The error token swallows the rest of the input; only its first character is at fault.
        const codePoint = mooToken.text.codePointAt(0) ?? 0;
        throw new LexerError(`Unexpected character '${String.fromCodePoint(codePoint)}'`, {
          line: mooToken.line,
          column: mooToken.col,
          offset: mooToken.offset,
        });
      }
      default:
        tokens.push({
          kind: type,
          text: mooToken.text,
          line: mooToken.line,
          column: mooToken.col,
          offset: mooToken.offset,
        });
    }
  }

  const end = lexer.save();
  tokens.push({ kind: 'eof', text: '', line: end.line, column: end.col, offset: input.length });
  return tokens;
}

export function formatToken(token: Token): string {
  return `${token.kind} '${token.text}' ${token.line}:${token.column}`;
}
