import { LexerError, type Token, tokenize } from './lexer/index';
import { ParserError, parse } from './parser/index';
import { render } from './latex/index';
import type { Expr } from './utils/ast';

export type RpnError = LexerError | ParserError;

export function isRpnError(err: unknown): err is RpnError {
  return err instanceof LexerError || err instanceof ParserError;
}

export interface ConvertSuccess {
  success: true;
  latex: string;
  ast: Expr;
  tokens: Token[];
}

export interface ConvertFailure {
  success: false;
  error: RpnError;
  input: string;
}

export type ConvertResult = ConvertSuccess | ConvertFailure;

/**
 * Run the whole pipeline: tokenize, parse, render.
 * Lexer and parser errors come back as a failure result; anything else is rethrown.
 */
export function convert(input: string): ConvertResult {
  try {
    const tokens = tokenize(input);
    const ast = parse(tokens);
    return { success: true, latex: render(ast), ast, tokens };
  } catch (error: unknown) {
    if (isRpnError(error)) {
      return { success: false, error, input };
    }
    throw error;
  }
}
