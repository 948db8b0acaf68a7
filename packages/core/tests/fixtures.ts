// Small hand-built dictionaries shared by the core tests

import { PrefixTree } from '../src/dict/trie.js';
import { defaultWordEntry } from '../src/types.js';
import type { WordCategory, WordEntry } from '../src/types.js';

export function entry(category: WordCategory, frequency = 1, overrides: Partial<WordEntry> = {}): WordEntry {
  return { ...defaultWordEntry(), category, frequency, ...overrides };
}

export const SEED_VERBS = [
  'cantar', 'pensar', 'conocer', 'jugar', 'sentirse',
  'comer', 'vivir', 'contar', 'pedir', 'dormir',
  'organizar', 'llegar', 'buscar', 'almorzar',
  'valer', 'caber', 'decir', 'dar', 'hacer',
  'tejer', 'proteger', 'dijar',
];

export function buildSpanishTree(): PrefixTree {
  const tree = new PrefixTree();
  for (const verb of SEED_VERBS) {
    tree.insert(verb, entry('verb', 10));
  }
  tree.insert('casa', entry('noun', 100, { gender: 'feminine', number: 'singular' }));
  tree.insert('abuela', entry('noun', 40, { gender: 'feminine', number: 'singular' }));
  tree.insert('problema', entry('noun', 50, { gender: 'masculine', number: 'singular' }));
  tree.insert('canción', entry('noun', 30, { gender: 'feminine', number: 'singular' }));
  tree.insert('rojo', entry('adjective', 20, { gender: 'masculine', number: 'singular' }));
  tree.insert('protege', entry('verb', 5));
  tree.insert('un', entry('article', 500));
  tree.insert('el', entry('article', 900));
  return tree;
}
