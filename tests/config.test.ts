import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { CONFIG_FILE, loadConfig, validateConfig } from '../src/config';

describe('validateConfig', () => {
  test('accepts every known field', () => {
    expect(validateConfig({ color: true, contextLines: 2, output: 'out.tex' })).toEqual({
      color: true,
      contextLines: 2,
      output: 'out.tex',
    });
  });

  test('ignores unknown fields', () => {
    expect(validateConfig({ theme: 'dark' })).toEqual({});
  });

  test('reports every problem at once', () => {
    expect(() => validateConfig({ color: 'yes', contextLines: -1, output: '' })).toThrow(
      [
        `Invalid ${CONFIG_FILE}:`,
        '  - color must be a boolean',
        '  - contextLines must be a non-negative integer',
        '  - output must be a non-empty string',
      ].join('\n')
    );
  });

  test('rejects non-objects', () => {
    expect(() => validateConfig([1, 2])).toThrow(`Invalid ${CONFIG_FILE}:\n  - expected a JSON object`);
    expect(() => validateConfig(null)).toThrow('expected a JSON object');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpn2tex-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('returns null without a config file', () => {
    expect(loadConfig(dir)).toBeNull();
  });

  test('reads and validates the file', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), JSON.stringify({ contextLines: 1 }));
    expect(loadConfig(dir)).toEqual({ contextLines: 1 });
  });

  test('wraps JSON syntax errors', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), '{ not json');
    expect(() => loadConfig(dir)).toThrow(`Could not read ${CONFIG_FILE}:`);
  });
});
