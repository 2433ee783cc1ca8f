import { LexerError, type Token, createRpnLexer, formatToken, tokenize } from '../src/lexer/index';

const summarize = (tokens: Token[]) => tokens.map((t) => [t.kind, t.text, t.line, t.column]);

function lexError(input: string): LexerError {
  try {
    tokenize(input);
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error(`expected tokenize to fail for ${JSON.stringify(input)}`);
}

describe('createRpnLexer', () => {
  test('emits whitespace and sign-bearing numbers as raw moo tokens', () => {
    const lexer = createRpnLexer().reset('-2 -');
    expect(Array.from(lexer, (t) => [t.type, t.text])).toEqual([
      ['number', '-2'],
      ['ws', ' '],
      ['minus', '-'],
    ]);
  });
});

describe('tokenize', () => {
  test('scans numbers and operators with positions', () => {
    expect(tokenize('5 3 +')).toEqual([
      { kind: 'number', text: '5', line: 1, column: 1, offset: 0 },
      { kind: 'number', text: '3', line: 1, column: 3, offset: 2 },
      { kind: 'plus', text: '+', line: 1, column: 5, offset: 4 },
      { kind: 'eof', text: '', line: 1, column: 6, offset: 5 },
    ]);
  });

  test('recognizes every operator', () => {
    expect(tokenize('+ - * /').map((t) => t.kind)).toEqual(['plus', 'minus', 'mult', 'div', 'eof']);
  });

  test('keeps decimal text verbatim', () => {
    expect(summarize(tokenize('3.14 0.5 10'))).toEqual([
      ['number', '3.14', 1, 1],
      ['number', '0.5', 1, 6],
      ['number', '10', 1, 10],
      ['eof', '', 1, 12],
    ]);
  });

  test('empty input yields a lone eof', () => {
    expect(tokenize('')).toEqual([{ kind: 'eof', text: '', line: 1, column: 1, offset: 0 }]);
  });

  test('tracks lines across newlines', () => {
    expect(summarize(tokenize('5\n3 +'))).toEqual([
      ['number', '5', 1, 1],
      ['number', '3', 2, 1],
      ['plus', '+', 2, 3],
      ['eof', '', 2, 4],
    ]);
  });

  test('a tab advances one column', () => {
    expect(summarize(tokenize('5\t\t3'))).toEqual([
      ['number', '5', 1, 1],
      ['number', '3', 1, 4],
      ['eof', '', 1, 5],
    ]);
  });

  test('eof sits after trailing whitespace', () => {
    const tokens = tokenize('5 3 +  \n ');
    expect(tokens.at(-1)).toEqual({ kind: 'eof', text: '', line: 2, column: 2, offset: 9 });
  });

  test('any whitespace run acts like a single space', () => {
    const loose = tokenize('5   3\t\n+').map((t) => [t.kind, t.text]);
    const tight = tokenize('5 3 +').map((t) => [t.kind, t.text]);
    expect(loose).toEqual(tight);
  });
});

describe('negative numbers and subtraction', () => {
  test.each(['0', '7', '42', '123456', '3.5'])('-%s is a single number', (digits) => {
    expect(summarize(tokenize(`-${digits}`))).toEqual([
      ['number', `-${digits}`, 1, 1],
      ['eof', '', 1, digits.length + 2],
    ]);
  });

  test.each(['0', '7', '42', '3.5'])('"5 - %s" is minus then a number', (digits) => {
    expect(tokenize(`5 - ${digits}`).map((t) => [t.kind, t.text])).toEqual([
      ['number', '5'],
      ['minus', '-'],
      ['number', digits],
      ['eof', ''],
    ]);
  });

  test('a dash touching a digit is a sign even after a number', () => {
    expect(summarize(tokenize('5 -3'))).toEqual([
      ['number', '5', 1, 1],
      ['number', '-3', 1, 3],
      ['eof', '', 1, 5],
    ]);
  });

  test('a dash before a newline is subtraction', () => {
    expect(tokenize('5 3 -\n').map((t) => t.kind)).toEqual(['number', 'number', 'minus', 'eof']);
  });

  test('double dash is minus followed by a negative number', () => {
    expect(summarize(tokenize('--3'))).toEqual([
      ['minus', '-', 1, 1],
      ['number', '-3', 1, 2],
      ['eof', '', 1, 4],
    ]);
  });
});

describe('lexer errors', () => {
  test('reports the caret operator at its column', () => {
    const err = lexError('2 3 ^');
    expect(err.message).toBe("Unexpected character '^'");
    expect([err.line, err.column, err.offset]).toEqual([1, 5, 4]);
    expect(err.kind).toBe('lexer');
  });

  test('only the first bad character is reported', () => {
    const err = lexError('2 3 ^ 4 ^ x');
    expect(err.message).toBe("Unexpected character '^'");
    expect(err.column).toBe(5);
  });

  test('a trailing dot is not part of a number', () => {
    const err = lexError('1.');
    expect(err.message).toBe("Unexpected character '.'");
    expect(err.column).toBe(2);
  });

  test('a leading dot is rejected', () => {
    const err = lexError('.5 2 +');
    expect(err.message).toBe("Unexpected character '.'");
    expect(err.column).toBe(1);
  });

  test('CRLF line endings are whitespace', () => {
    expect(summarize(tokenize('5 3 +\r\n')).slice(0, -1)).toEqual(summarize(tokenize('5 3 +')).slice(0, -1));
    expect(summarize(tokenize('5\r\n3\r\n+'))).toEqual([
      ['number', '5', 1, 1],
      ['number', '3', 2, 1],
      ['plus', '+', 3, 1],
      ['eof', '', 3, 2],
    ]);
  });

  test('positions on later lines', () => {
    const err = lexError('5\n  x');
    expect(err.message).toBe("Unexpected character 'x'");
    expect([err.line, err.column]).toEqual([2, 3]);
  });

  test('toString names the error and location', () => {
    expect(lexError('2 3 ^').toString()).toBe("LexerError at 1:5: Unexpected character '^'");
  });
});

test('formatToken renders a debug line', () => {
  expect(tokenize('-2.5').map(formatToken)).toEqual(["number '-2.5' 1:1", "eof '' 1:5"]);
});
