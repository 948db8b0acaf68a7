/**
 * Dictionary file loading
 *
 * Line format: word|category|gender|number|extra|frequency
 *
 *   casa|sustantivo|f|s||1200   every field
 *   casa|sustantivo|f|s         category, gender and number only
 *   casa                        default entry
 *
 * Blank lines and lines starting with '#' are skipped.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import {
  PrefixTree,
  defaultWordEntry,
  dp,
  mergeTrees,
  parseCategory,
  parseGender,
  parseNumber,
  type WordEntry
} from '@corrector/core';
import { DictionaryLoadError } from './errors.js';

export const FIELD_DELIMITER = '|';

export interface DictionaryLine {
  word: string;
  entry: WordEntry;
}

function readRecords(content: string): string[][] {
  const parsed: unknown = parse(content, {
    delimiter: FIELD_DELIMITER,
    bom: true,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true
  });

  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isStringArray);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(field => typeof field === 'string');
}

function parseFrequency(raw: string | undefined): number {
  const trimmed = raw?.trim() ?? '';
  return /^\d+$/.test(trimmed) ? Number(trimmed) : 1;
}

/** Parse one record; undefined for blank words and comment lines. */
export function parseDictionaryFields(fields: readonly string[]): DictionaryLine | undefined {
  const word = (fields[0] ?? '').trim();
  if (word === '' || word.startsWith('#')) return undefined;

  if (fields.length >= 5) {
    return {
      word,
      entry: {
        category: parseCategory(fields[1]),
        gender: parseGender(fields[2]),
        number: parseNumber(fields[3]),
        extra: fields[4],
        frequency: parseFrequency(fields[5]),
      },
    };
  }

  if (fields.length >= 2) {
    return {
      word,
      entry: {
        ...defaultWordEntry(),
        category: parseCategory(fields[1]),
        gender: parseGender(fields[2] ?? ''),
        number: parseNumber(fields[3] ?? ''),
      },
    };
  }

  return { word, entry: defaultWordEntry() };
}

export function parseDictionaryLine(line: string): DictionaryLine | undefined {
  return parseDictionaryFields(line.trim().split(FIELD_DELIMITER));
}

/** Insert every line of `content` into `tree`; returns the number of inserted lines. */
export function appendDictionary(tree: PrefixTree, content: string): number {
  let count = 0;
  for (const record of readRecords(content)) {
    const parsed = parseDictionaryFields(record);
    if (!parsed) continue;
    tree.insert(parsed.word, parsed.entry);
    count++;
  }
  return count;
}

export function parseDictionary(content: string): PrefixTree {
  const tree = new PrefixTree();
  appendDictionary(tree, content);
  return tree;
}

function readFile(path: string): string {
  try {
    return fs.readFileSync(path, 'utf-8');
  } catch (error) {
    throw new DictionaryLoadError(path, error);
  }
}

export function loadDictionaryFile(path: string): PrefixTree {
  const tree = parseDictionary(readFile(path));
  dp(`loaded ${tree.size} words from ${path}`);
  return tree;
}

export function appendDictionaryFile(tree: PrefixTree, path: string): number {
  const count = appendDictionary(tree, readFile(path));
  dp(`appended ${count} lines from ${path}`);
  return count;
}

/** One word per line, every word with the default entry. */
export function loadWordList(path: string): PrefixTree {
  const tree = new PrefixTree();
  for (const line of readFile(path).split(/\r?\n/)) {
    const word = line.trim();
    if (word !== '' && !word.startsWith('#')) tree.insert(word);
  }
  return tree;
}

export { mergeTrees as mergeDictionaries };
