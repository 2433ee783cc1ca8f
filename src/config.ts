import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

export const CONFIG_FILE = 'rpn2tex.config.json';

export interface Rpn2TexConfig {
  color?: boolean;
  contextLines?: number;
  output?: string;
}

export const defaultConfig: Required<Pick<Rpn2TexConfig, 'contextLines'>> = {
  contextLines: 0,
};

export function loadConfig(cwd = process.cwd()): Rpn2TexConfig | null {
  const configPath = path.join(cwd, CONFIG_FILE);
  if (!existsSync(configPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err: unknown) {
    throw new Error(`Could not read ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return validateConfig(raw);
}

export function validateConfig(raw: unknown): Rpn2TexConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid ${CONFIG_FILE}:\n  - expected a JSON object`);
  }

  const errors: string[] = [];
  const normalized: Rpn2TexConfig = {};

  if ('color' in raw && raw.color !== undefined) {
    if (typeof raw.color === 'boolean') normalized.color = raw.color;
    else errors.push('color must be a boolean');
  }
  if ('contextLines' in raw && raw.contextLines !== undefined) {
    if (typeof raw.contextLines === 'number' && Number.isInteger(raw.contextLines) && raw.contextLines >= 0) {
      normalized.contextLines = raw.contextLines;
    } else {
      errors.push('contextLines must be a non-negative integer');
    }
  }
  if ('output' in raw && raw.output !== undefined) {
    if (typeof raw.output === 'string' && raw.output.length > 0) normalized.output = raw.output;
    else errors.push('output must be a non-empty string');
  }

  if (errors.length > 0) {
    throw new Error(`Invalid ${CONFIG_FILE}:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }
  return normalized;
}
