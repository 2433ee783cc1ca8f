import { createColors } from 'colorette';

import type { RpnError } from '../convert';
import { isRpnError } from '../convert';
import { highlightSnippet } from './highlight';
import type { SourceError } from './types';

export interface FormatOptions {
  useColor?: boolean;
  contextLines?: number;
}

const colors = createColors({ useColor: true });

export function formatLocation(line: number, column: number): string {
  return `Line ${line}, column ${column}`;
}

/**
 * Error header followed by the offending source line and a caret:
 *
 *     Error: Unexpected character '^'
 *
 *     1 | 2 3 ^
 *       |     ^
 */
export function formatError(error: SourceError, source: string, options: FormatOptions = {}): string {
  const { useColor = false, contextLines = 0 } = options;
  const header = useColor
    ? `${colors.red(colors.bold('Error:'))} ${error.message}`
    : `Error: ${error.message}`;

  const snippet = highlightSnippet(source, error, { useColor, contextLines });
  return snippet ? `${header}\n\n${snippet}` : header;
}

/**
 * Format whatever was thrown. Pipeline errors get a snippet; other errors just a header.
 */
export function formatAnyError(err: unknown, source: string, options: FormatOptions = {}): string {
  if (isRpnError(err)) {
    return formatError(err, source, options);
  }

  const message = err instanceof Error ? err.message : typeof err === 'string' ? err : 'Unknown error';
  return options.useColor ? `${colors.red(colors.bold('Error:'))} ${message}` : `Error: ${message}`;
}

/** One-line summary for logs, e.g. `LexerError at 1:5: Unexpected character '^'`. */
export function describeError(error: RpnError): string {
  return error.toString();
}

export function getErrorContext(error: RpnError): {
  kind: RpnError['kind'];
  message: string;
  location: string;
  line: number;
  column: number;
} {
  return {
    kind: error.kind,
    message: error.message,
    location: formatLocation(error.line, error.column),
    line: error.line,
    column: error.column,
  };
}
