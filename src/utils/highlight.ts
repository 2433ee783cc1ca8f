import chalk from 'chalk';

import type { Position } from './types';

export interface SnippetOptions {
  useColor?: boolean;
  /** Lines shown before and after the target line. */
  contextLines?: number;
}

// Forced level: the caller decides about color, not chalk's terminal sniffing.
const paint = new chalk.Instance({ level: 1 });

/**
 * Show the source line at `position` with a caret (^) under its column:
 *
 *     1 | 2 3 ^
 *       |     ^
 *
 * Returns an empty string when the line is outside the input.
 */
export function highlightSnippet(input: string, position: Position, options: SnippetOptions = {}): string {
  const { useColor = false, contextLines = 0 } = options;
  const lines = input.split('\n');
  const { line, column } = position;

  if (line < 1 || line > lines.length) return '';

  const firstLine = Math.max(1, line - Math.max(0, contextLines));
  const lastLine = Math.min(lines.length, line + Math.max(0, contextLines));
  const width = String(lastLine).length;

  const resultLines: string[] = [];
  for (let i = firstLine; i <= lastLine; i++) {
    const prefix = `${String(i).padStart(width)} | `;
    const text = lines[i - 1];

    if (i !== line) {
      resultLines.push(prefix + text);
      continue;
    }

    resultLines.push(useColor ? prefix + paint.redBright(text) : prefix + text);

    const pointer = `${' '.repeat(width)} | ${' '.repeat(Math.max(0, column - 1))}^`;
    resultLines.push(useColor ? paint.yellow(pointer) : pointer);
  }

  return resultLines.join('\n');
}
