#!/usr/bin/env node
import fs from 'node:fs/promises';
import path from 'node:path';
import { createColors } from 'colorette';

import { CONFIG_FILE, type Rpn2TexConfig, defaultConfig, loadConfig } from '../config';
import { convert } from '../convert';
import { formatToken } from '../lexer/index';
import { runREPL } from '../repl';
import { getASTStats, serializeAST } from '../utils/ast';
import { describeError, formatError } from '../utils/format';

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream & { isTTY?: boolean };
  env: NodeJS.ProcessEnv;
  cwd: string;
}

// Configuration interface
interface CLIConfig {
  inputPath?: string;
  outFile?: string;
  color?: boolean;
  contextLines?: number;
  ast: boolean;
  tokens: boolean;
  interactive: boolean;
  verbose: boolean;
  help: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type Log = Record<'info' | 'success' | 'error' | 'debug', (msg: string) => void>;

// Every log line goes to stderr; stdout carries only LaTeX.
function createLog(stream: NodeJS.WritableStream, useColor: boolean, verbose: boolean): Log {
  const colors = createColors({ useColor });
  const write = (line: string) => stream.write(`${line}\n`);
  return {
    info: (msg) => write(`${colors.blue('ℹ️')}  ${msg}`),
    success: (msg) => write(`${colors.green('✅')} ${msg}`),
    error: (msg) => write(`${colors.red('❌')} ${msg}`),
    debug: (msg) => {
      if (verbose) write(colors.dim(`🐛 ${msg}`));
    },
  };
}

function helpText(useColor: boolean): string {
  const { bold, green } = createColors({ useColor });
  return `
${bold('rpn2tex')} - Convert Reverse Polish Notation to LaTeX

${bold('USAGE:')}
  rpn2tex <input> [options]
  rpn2tex --interactive

${bold('ARGUMENTS:')}
  ${green('<input>')}                 Input file, or - to read stdin

${bold('OPTIONS:')}
  ${green('-o, --output <file>')}     Write LaTeX to a file instead of stdout
  ${green('--ast')}                   Print the parsed AST as JSON (stderr)
  ${green('--tokens')}                Print the token stream (stderr)
  ${green('--context <n>')}           Source lines shown around an error (default: 0)
  ${green('-i, --interactive')}       Convert expressions line by line
  ${green('--color, --no-color')}     Force or disable colored output
  ${green('--verbose, -v')}           Enable verbose output
  ${green('--help, -h')}              Show this help

${bold('EXAMPLES:')}
  echo "5 3 + 2 *" | rpn2tex -
  rpn2tex expr.rpn -o expr.tex
  rpn2tex expr.rpn --tokens --ast

Settings may also come from ${CONFIG_FILE} in the working directory.
`;
}

export function parseArgs(args: string[]): CLIConfig {
  const config: CLIConfig = {
    ast: false,
    tokens: false,
    interactive: false,
    verbose: false,
    help: false,
  };

  const requireValue = (flag: string, value: string | undefined): string => {
    if (value === undefined) throw new UsageError(`Missing value for ${flag}`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '-o':
      case '--output':
        config.outFile = requireValue(arg, nextArg);
        i++;
        break;
      case '--context': {
        const value = Number(requireValue(arg, nextArg));
        if (!Number.isInteger(value) || value < 0) {
          throw new UsageError(`Invalid context: ${nextArg}. Expected a non-negative integer`);
        }
        config.contextLines = value;
        i++;
        break;
      }
      case '--ast':
        config.ast = true;
        break;
      case '--tokens':
        config.tokens = true;
        break;
      case '--interactive':
      case '-i':
        config.interactive = true;
        break;
      case '--color':
        config.color = true;
        break;
      case '--no-color':
        config.color = false;
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        if (arg !== '-' && arg.startsWith('-')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (config.inputPath !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        config.inputPath = arg;
    }
  }

  return config;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk.toString('utf-8') : chunk);
  }
  return chunks.join('');
}

// Checked by shape: errors from another realm (Jest's sandbox, worker threads) fail `instanceof Error`.
function errorCode(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

function errorMessage(err: unknown): string {
  return typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string'
    ? err.message
    : String(err);
}

async function readInput(inputPath: string, io: CliIO): Promise<string> {
  if (inputPath === '-') {
    const text = await readStream(io.stdin);
    // `echo expr |` appends a newline that is not part of the expression
    return text.endsWith('\n') ? text.slice(0, -1) : text;
  }

  try {
    return await fs.readFile(path.resolve(io.cwd, inputPath), 'utf-8');
  } catch (err: unknown) {
    if (errorCode(err) === 'ENOENT') {
      throw new Error(`Input file not found: ${inputPath}`);
    }
    throw new Error(`Could not read input file ${inputPath}: ${errorMessage(err)}`);
  }
}

/**
 * Run the command line against the given streams and return the exit code.
 */
export async function run(args: string[], io: CliIO = processIO()): Promise<number> {
  const envColor = io.stderr.isTTY === true && !io.env.NO_COLOR;

  let flags: CLIConfig;
  try {
    flags = parseArgs(args);
  } catch (err: unknown) {
    const log = createLog(io.stderr, envColor, false);
    log.error(errorMessage(err));
    log.info('Run rpn2tex --help for usage.');
    return 1;
  }

  let fileConfig: Rpn2TexConfig | null;
  try {
    fileConfig = loadConfig(io.cwd);
  } catch (err: unknown) {
    createLog(io.stderr, flags.color ?? envColor, flags.verbose).error(
      errorMessage(err)
    );
    return 1;
  }

  const useColor = flags.color ?? fileConfig?.color ?? envColor;
  const contextLines = flags.contextLines ?? fileConfig?.contextLines ?? defaultConfig.contextLines;
  const outFile = flags.outFile ?? fileConfig?.output;
  const log = createLog(io.stderr, useColor, flags.verbose);

  if (flags.help) {
    io.stdout.write(helpText(useColor));
    return 0;
  }

  if (fileConfig) {
    log.debug(`Loaded ${CONFIG_FILE} from ${io.cwd}`);
  }

  if (flags.interactive) {
    await runREPL({ input: io.stdin, output: io.stdout, useColor, contextLines, showAst: flags.ast });
    return 0;
  }

  if (flags.inputPath === undefined) {
    io.stderr.write(helpText(useColor));
    log.error('Input file required (use - for stdin)');
    return 1;
  }

  let text: string;
  try {
    text = await readInput(flags.inputPath, io);
  } catch (err: unknown) {
    log.error(errorMessage(err));
    return 1;
  }

  log.debug(`Read ${text.length} characters from ${flags.inputPath === '-' ? 'stdin' : flags.inputPath}`);

  const result = convert(text);

  if (!result.success) {
    log.debug(describeError(result.error));
    io.stderr.write(`${formatError(result.error, text, { useColor, contextLines })}\n`);
    return 1;
  }

  if (flags.tokens) {
    io.stderr.write(`${result.tokens.map(formatToken).join('\n')}\n`);
  }
  if (flags.ast) {
    io.stderr.write(`${serializeAST(result.ast)}\n`);
  }

  const stats = getASTStats(result.ast);
  log.debug(`Parsed ${stats.operatorCount} operator(s), ${stats.numberCount} number(s), depth ${stats.maxDepth}`);

  if (outFile === undefined) {
    io.stdout.write(`${result.latex}\n`);
    return 0;
  }

  try {
    await fs.writeFile(path.resolve(io.cwd, outFile), `${result.latex}\n`, 'utf-8');
  } catch (err: unknown) {
    log.error(`Could not write output file ${outFile}: ${errorMessage(err)}`);
    return 1;
  }
  log.success(`Generated: ${outFile}`);
  return 0;
}

function processIO(): CliIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
  };
}

if (require.main === module) {
  // Last-resort handlers for anything run() did not catch
  process.on('uncaughtException', (err) => {
    process.stderr.write(`❌ Uncaught exception: ${err.message}\n`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    process.stderr.write(`❌ Unhandled rejection: ${String(reason)}\n`);
    process.exit(1);
  });

  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`❌ ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  );
}
