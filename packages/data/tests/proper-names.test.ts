import { describe, test, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ProperNames } from '../src/dictionary/proper-names.js';
import { appendCustomWord } from '../src/dictionary/custom-dictionary.js';
import { CustomDictionaryError, DictionaryLoadError } from '../src/dictionary/errors.js';

let tmpDir: string | undefined;

function makeTmpDir(): string {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'corrector-names-'));
  return tmpDir;
}

afterEach(() => {
  if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = undefined;
});

describe('ProperNames', () => {
  const names = ProperNames.parse('# nombres\nMadrid\n  García \n\n');

  test('skips blank and comment lines', () => {
    expect(names.size).toBe(2);
    expect(names.has('García')).toBe(true);
    expect(names.has('garcía')).toBe(false);
    expect(names.hasIgnoreCase('garcía')).toBe(true);
  });

  test('a proper name must start with a capital letter', () => {
    expect(names.isProperName('Madrid')).toBe(true);
    expect(names.isProperName('MADRID')).toBe(true);
    expect(names.isProperName('madrid')).toBe(false);
    expect(names.isProperName('García')).toBe(true);
    expect(names.isProperName('Lopez')).toBe(false);
    expect(names.isProperName('')).toBe(false);
  });

  test('loadFile', () => {
    const dir = makeTmpDir();
    const filePath = path.join(dir, 'names.txt');
    fs.writeFileSync(filePath, 'Ana\nÁlvarez\n');
    const loaded = ProperNames.loadFile(filePath);
    expect(loaded.size).toBe(2);
    expect(loaded.isProperName('Álvarez')).toBe(true);
    expect(() => ProperNames.loadFile(path.join(dir, 'none.txt'))).toThrow(DictionaryLoadError);
  });
});

describe('appendCustomWord', () => {
  test('creates the directory and appends one word per line', () => {
    const filePath = path.join(makeTmpDir(), 'es', 'custom.txt');
    appendCustomWord(filePath, 'palabra');
    appendCustomWord(filePath, ' otra ');
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('palabra\notra\n');
  });

  test('rejects empty and multi-line words', () => {
    const filePath = path.join(makeTmpDir(), 'custom.txt');
    expect(() => appendCustomWord(filePath, '  ')).toThrow(CustomDictionaryError);
    expect(() => appendCustomWord(filePath, 'a\nb')).toThrow(CustomDictionaryError);
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
