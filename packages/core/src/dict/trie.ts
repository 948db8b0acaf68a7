/**
 * In-memory prefix tree holding the dictionary.
 *
 * Keys are stored lowercased, one node per code point. Each terminal node
 * owns a WordEntry; duplicate inserts keep the entry with the higher frequency.
 * Fuzzy lookups walk the tree carrying one Levenshtein row per depth and
 * prune any branch whose best row value already exceeds the tolerance.
 */

import type { WordEntry } from '../types.js';
import { defaultWordEntry } from '../types.js';
import { initialRow, nextDistanceRow } from '../spelling/distance.js';
import { startTimer } from './profiling.js';

/**
 * Language policy for recognizing plurals that are not stored literally.
 * `candidates` returns possible singular forms, most likely first.
 */
export interface PluralRules {
  suffix: string;
  candidates(word: string): string[];
}

export interface FuzzyMatch {
  word: string;
  entry: WordEntry;
  distance: number;
}

class TrieNode {
  children: Map<string, TrieNode> = new Map();
  entry: WordEntry | null = null;
}

export class PrefixTree {
  private root = new TrieNode();
  private count = 0;
  private pluralRules: PluralRules | null = null;

  get size(): number {
    return this.count;
  }

  setPluralRules(rules: PluralRules | null): void {
    this.pluralRules = rules;
  }

  /**
   * Insert a word. An existing key is only overwritten when the new entry
   * has a strictly higher frequency. Empty keys are ignored.
   */
  insert(word: string, entry: WordEntry = defaultWordEntry()): void {
    const lower = word.toLowerCase();
    if (lower.length === 0) return;

    let node = this.root;
    for (const ch of lower) {
      let child = node.children.get(ch);
      if (!child) {
        child = new TrieNode();
        node.children.set(ch, child);
      }
      node = child;
    }

    if (node.entry === null) {
      node.entry = { ...entry };
      this.count++;
    } else if (entry.frequency > node.entry.frequency) {
      node.entry = { ...entry };
    }
  }

  /**
   * Replace the entry of an existing key regardless of frequency.
   * Returns false without inserting when the key is absent.
   */
  update(word: string, entry: WordEntry): boolean {
    const node = this.findNode(word.toLowerCase());
    if (!node || node.entry === null) return false;
    node.entry = { ...entry };
    return true;
  }

  has(word: string): boolean {
    return this.lookup(word) !== undefined;
  }

  lookup(word: string): WordEntry | undefined {
    const entry = this.findNode(word.toLowerCase())?.entry;
    return entry ? { ...entry } : undefined;
  }

  wordsWithPrefix(prefix: string): string[] {
    const lower = prefix.toLowerCase();
    const node = this.findNode(lower);
    if (!node) return [];

    const words: string[] = [];
    for (const [word] of walk(node, lower)) {
      words.push(word);
    }
    return words;
  }

  *entries(): IterableIterator<[string, WordEntry]> {
    yield* walk(this.root, '');
  }

  /**
   * Every key whose Levenshtein distance to `word` is at most `maxDistance`,
   * in depth-first order.
   */
  searchWithinDistance(word: string, maxDistance: number): FuzzyMatch[] {
    const stop = startTimer('searchWithinDistance');
    const target = Array.from(word.toLowerCase());
    const results: FuzzyMatch[] = [];
    const firstRow = initialRow(target.length);

    const visit = (node: TrieNode, prefix: string, previous: number[]) => {
      for (const [ch, child] of node.children) {
        const row = nextDistanceRow(previous, target, ch);
        const candidate = prefix + ch;

        if (child.entry !== null && row[target.length] <= maxDistance) {
          results.push({ word: candidate, entry: { ...child.entry }, distance: row[target.length] });
        }

        if (Math.min(...row) <= maxDistance) {
          visit(child, candidate, row);
        }
      }
    };

    visit(this.root, '', firstRow);
    stop();
    return results;
  }

  /**
   * Metadata for a plural that is not stored literally, taken from its
   * singular noun or adjective with the frequency halved.
   */
  derivePluralInfo(word: string): WordEntry | undefined {
    const rules = this.pluralRules;
    if (!rules) return undefined;

    const lower = word.toLowerCase();
    if (!lower.endsWith(rules.suffix) || this.has(lower)) return undefined;

    const stop = startTimer('derivePluralInfo');
    try {
      for (const singular of rules.candidates(lower)) {
        const entry = this.lookup(singular);
        if (!entry) continue;
        if (entry.category !== 'noun' && entry.category !== 'adjective') continue;
        if (entry.number === 'plural') continue;

        return {
          ...entry,
          number: 'plural',
          frequency: Math.max(1, Math.floor(entry.frequency / 2)),
        };
      }
      return undefined;
    } finally {
      stop();
    }
  }

  getOrDerive(word: string): WordEntry | undefined {
    return this.lookup(word) ?? this.derivePluralInfo(word);
  }

  private findNode(lower: string): TrieNode | undefined {
    let node: TrieNode | undefined = this.root;
    for (const ch of lower) {
      node = node.children.get(ch);
      if (!node) return undefined;
    }
    return node;
  }
}

function* walk(node: TrieNode, prefix: string): IterableIterator<[string, WordEntry]> {
  if (node.entry !== null) {
    yield [prefix, { ...node.entry }];
  }
  for (const [ch, child] of node.children) {
    yield* walk(child, prefix + ch);
  }
}

/** Merge several trees into a new one; duplicate keys follow insert's frequency rule. */
export function mergeTrees(trees: Iterable<PrefixTree>): PrefixTree {
  const merged = new PrefixTree();
  for (const tree of trees) {
    for (const [word, entry] of tree.entries()) {
      merged.insert(word, entry);
    }
  }
  return merged;
}
