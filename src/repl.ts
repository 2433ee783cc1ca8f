import readline from 'node:readline';

import { convert } from './convert';
import { serializeAST } from './utils/ast';
import { formatError } from './utils/format';

export interface REPLOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  useColor?: boolean;
  contextLines?: number;
  showAst?: boolean;
  prompt?: string;
}

const HELP = `Commands:
  .ast   Toggle AST output
  .help  Show this help
  .exit  Leave the REPL
  <rpn>  Convert an expression, e.g. 5 3 + 2 *`;

/**
 * Convert one expression per line until `.exit` or end of input.
 * Resolves once the readline interface has closed.
 */
export function runREPL(options: REPLOptions = {}): Promise<void> {
  const {
    input = process.stdin,
    output = process.stdout,
    useColor = false,
    contextLines = 0,
    prompt = 'rpn2tex> ',
  } = options;
  let showAst = options.showAst ?? false;

  const print = (text: string) => output.write(`${text}\n`);

  const rl = readline.createInterface({ input, output, prompt });

  print('📘 rpn2tex REPL');
  print(`${HELP}\n`);

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    if (trimmed === '.exit') {
      rl.close();
      return;
    }

    if (trimmed === '.help') {
      print(HELP);
    } else if (trimmed === '.ast') {
      showAst = !showAst;
      print(`AST output ${showAst ? 'on' : 'off'}`);
    } else if (trimmed.length > 0) {
      const result = convert(line);
      if (result.success) {
        print(result.latex);
        if (showAst) print(serializeAST(result.ast));
      } else {
        print(formatError(result.error, line, { useColor, contextLines }));
      }
    }

    rl.prompt();
  });

  return new Promise((resolve) => {
    rl.on('close', () => {
      print('Goodbye!');
      resolve();
    });
  });
}
