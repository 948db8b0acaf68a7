import { describe, test, expect } from 'vitest';
import { PrefixTree, mergeTrees } from '../src/dict/trie.js';
import { levenshteinDistance } from '../src/spelling/distance.js';
import { spanishPlurals } from '../src/languages/spanish/plurals.js';
import { entry } from './fixtures.js';

// Deterministic generator for reproducible random dictionaries
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}

function randomWord(next: () => number, alphabet: string, maxLength: number): string {
  const length = 1 + Math.floor(next() * maxLength);
  let word = '';
  for (let i = 0; i < length; i++) {
    word += alphabet[Math.floor(next() * alphabet.length)];
  }
  return word;
}

describe('PrefixTree', () => {
  test('lookups ignore case', () => {
    const tree = new PrefixTree();
    tree.insert('Hola', entry('other', 3));

    expect(tree.has('hola')).toBe(true);
    expect(tree.has('HOLA')).toBe(true);
    expect(tree.has('HoLa')).toBe(true);
    expect(tree.lookup('hola')?.frequency).toBe(3);
    expect(tree.size).toBe(1);
  });

  test('empty keys are ignored', () => {
    const tree = new PrefixTree();
    tree.insert('');
    tree.insert('casa');

    expect(tree.size).toBe(1);
    expect(tree.has('')).toBe(false);
    expect(tree.searchWithinDistance('a', 1)).toEqual([]);
  });

  test('prefixes of stored words are not words', () => {
    const tree = new PrefixTree();
    tree.insert('casa');

    expect(tree.has('cas')).toBe(false);
    expect(tree.has('')).toBe(false);
    expect(tree.lookup('casas')).toBeUndefined();
  });

  test('a lower-frequency duplicate keeps the first entry', () => {
    const tree = new PrefixTree();
    tree.insert('banco', entry('noun', 50));
    tree.insert('banco', entry('verb', 10));

    expect(tree.lookup('banco')).toEqual(entry('noun', 50));
    expect(tree.size).toBe(1);
  });

  test('a higher-frequency duplicate replaces the entry', () => {
    const tree = new PrefixTree();
    tree.insert('banco', entry('noun', 10));
    tree.insert('banco', entry('verb', 50));

    expect(tree.lookup('banco')).toEqual(entry('verb', 50));
  });

  test('an equal-frequency duplicate keeps the first entry', () => {
    const tree = new PrefixTree();
    tree.insert('banco', entry('noun', 10));
    tree.insert('banco', entry('verb', 10));

    expect(tree.lookup('banco')?.category).toBe('noun');
  });

  test('update replaces unconditionally but never inserts', () => {
    const tree = new PrefixTree();
    tree.insert('comía', entry('noun', 80));

    expect(tree.update('comía', entry('verb', 2))).toBe(true);
    expect(tree.lookup('comía')).toEqual(entry('verb', 2));
    expect(tree.update('vivía', entry('verb', 2))).toBe(false);
    expect(tree.has('vivía')).toBe(false);
  });

  test('returned entries are copies', () => {
    const tree = new PrefixTree();
    tree.insert('casa', entry('noun', 5));

    const found = tree.lookup('casa');
    if (found) found.frequency = 999;

    expect(tree.lookup('casa')?.frequency).toBe(5);
  });

  test('wordsWithPrefix and entries list stored keys', () => {
    const tree = new PrefixTree();
    for (const word of ['casa', 'casas', 'caso', 'cosa']) tree.insert(word);

    expect(tree.wordsWithPrefix('cas').sort()).toEqual(['casa', 'casas', 'caso']);
    expect(tree.wordsWithPrefix('x')).toEqual([]);
    expect([...tree.entries()].map(([word]) => word).sort()).toEqual(['casa', 'casas', 'caso', 'cosa']);
  });

  test('mergeTrees applies frequency dominance', () => {
    const first = new PrefixTree();
    first.insert('casa', entry('noun', 5));
    const second = new PrefixTree();
    second.insert('casa', entry('verb', 9));
    second.insert('perro', entry('noun', 1));

    const merged = mergeTrees([first, second]);

    expect(merged.size).toBe(2);
    expect(merged.lookup('casa')?.category).toBe('verb');
  });
});

describe('searchWithinDistance', () => {
  test('finds neighbours with their distance', () => {
    const tree = new PrefixTree();
    for (const word of ['casa', 'caza', 'cosa', 'perro']) tree.insert(word);

    const results = tree.searchWithinDistance('casa', 1)
      .map(match => [match.word, match.distance])
      .sort();

    expect(results).toEqual([['casa', 0], ['caza', 1], ['cosa', 1]]);
  });

  test('is case-insensitive on the query', () => {
    const tree = new PrefixTree();
    tree.insert('problema');

    expect(tree.searchWithinDistance('PROBELMA', 2).map(m => m.word)).toEqual(['problema']);
  });

  test('returns exactly the words within the bound', () => {
    const next = lcg(42);
    const tree = new PrefixTree();
    const words = new Set<string>();
    for (let i = 0; i < 150; i++) {
      const word = randomWord(next, 'abcd', 6);
      words.add(word);
      tree.insert(word);
    }

    for (let q = 0; q < 30; q++) {
      const query = randomWord(next, 'abcde', 6);
      for (const maxDistance of [0, 1, 2]) {
        const expected = [...words]
          .filter(word => levenshteinDistance(query, word) <= maxDistance)
          .sort();
        const actual = tree.searchWithinDistance(query, maxDistance).map(m => m.word).sort();
        expect(actual).toEqual(expected);
      }
    }
  });
});

describe('plural derivation', () => {
  function pluralTree(): PrefixTree {
    const tree = new PrefixTree();
    tree.setPluralRules(spanishPlurals);
    tree.insert('abuela', entry('noun', 40, { gender: 'feminine', number: 'singular' }));
    tree.insert('come', entry('verb', 30));
    tree.insert('vez', entry('noun', 7, { gender: 'feminine', number: 'singular' }));
    tree.insert('gafas', entry('noun', 9, { number: 'plural' }));
    return tree;
  }

  test('derives plural metadata from the singular', () => {
    expect(pluralTree().derivePluralInfo('abuelas')).toEqual({
      category: 'noun',
      gender: 'feminine',
      number: 'plural',
      extra: '',
      frequency: 20,
    });
  });

  test('halved frequency never drops below one', () => {
    const tree = pluralTree();
    expect(tree.derivePluralInfo('veces')?.frequency).toBe(3);

    tree.insert('luz', entry('noun', 1));
    expect(tree.derivePluralInfo('luces')?.frequency).toBe(1);
  });

  test('does not derive from verbs', () => {
    expect(pluralTree().derivePluralInfo('comes')).toBeUndefined();
  });

  test('does not derive from an entry already marked plural', () => {
    expect(pluralTree().derivePluralInfo('gafass')).toBeUndefined();
  });

  test('stops once the plural is stored literally', () => {
    const tree = pluralTree();
    tree.insert('abuelas', entry('noun', 3));

    expect(tree.derivePluralInfo('abuelas')).toBeUndefined();
    expect(tree.getOrDerive('abuelas')?.frequency).toBe(3);
  });

  test('needs plural rules and a plural ending', () => {
    const tree = pluralTree();
    expect(tree.derivePluralInfo('abuela')).toBeUndefined();

    tree.setPluralRules(null);
    expect(tree.derivePluralInfo('abuelas')).toBeUndefined();
  });

  test('getOrDerive prefers the stored entry', () => {
    const tree = pluralTree();
    expect(tree.getOrDerive('abuela')?.frequency).toBe(40);
    expect(tree.getOrDerive('abuelas')?.number).toBe('plural');
    expect(tree.getOrDerive('perros')).toBeUndefined();
  });
});
