import { describe, test, expect } from 'vitest';
import { PrefixTree } from '../src/dict/trie.js';
import { SpellingCorrector, PREFERRED_FREQUENCY } from '../src/spelling/corrector.js';
import { VerbRecognizer } from '../src/verbs/recognizer.js';
import { spanish } from '../src/languages/spanish/index.js';
import { catalan } from '../src/languages/catalan/index.js';
import { configureDictionary } from '../src/languages/index.js';
import { createSpanishConjugation } from '../src/languages/spanish/conjugation.js';
import { buildSpanishTree, entry } from './fixtures.js';

function spanishCorrector(options: { maxSuggestions?: number } = {}) {
  const tree = buildSpanishTree();
  configureDictionary(spanish, tree);
  const verbRecognizer = VerbRecognizer.fromDictionary(tree, createSpanishConjugation());
  return new SpellingCorrector(tree, spanish, { ...options, verbRecognizer });
}

describe('SpellingCorrector.isCorrect', () => {
  const corrector = spanishCorrector();

  test('dictionary words in any case', () => {
    expect(corrector.isCorrect('casa')).toBe(true);
    expect(corrector.isCorrect('Casa')).toBe(true);
    expect(corrector.isCorrect('CASA')).toBe(true);
  });

  test('derived plurals', () => {
    expect(corrector.isCorrect('abuelas')).toBe(true);
    expect(corrector.isCorrect('canciones')).toBe(true);
    expect(corrector.isCorrect('rojos')).toBe(true);
  });

  test('verb forms', () => {
    expect(corrector.isCorrect('cantamos')).toBe(true);
    expect(corrector.isCorrect('pienso')).toBe(true);
    expect(corrector.isCorrect('dámelo')).toBe(true);
  });

  test('abbreviations', () => {
    expect(corrector.isCorrect('n.º')).toBe(true);
    expect(corrector.isCorrect('N.ª')).toBe(true);
  });

  test('unknown and empty words', () => {
    expect(corrector.isCorrect('probelma')).toBe(false);
    expect(corrector.isCorrect('')).toBe(false);
  });

  test('a j→g misspelling is rejected even though it parses as a verb', () => {
    const tree = new PrefixTree();
    tree.insert('tejer', entry('verb'));
    tree.insert('proteger', entry('verb'));
    tree.insert('protege', entry('verb'));
    const verbRecognizer = VerbRecognizer.fromDictionary(tree, createSpanishConjugation());
    const strict = new SpellingCorrector(tree, spanish, { verbRecognizer });

    expect(verbRecognizer.isValidVerbForm('proteje')).toBe(true);
    expect(strict.isCorrect('proteje')).toBe(false);
    expect(strict.isCorrect('teje')).toBe(true);
  });
});

describe('SpellingCorrector.getSuggestions', () => {
  test('exact hits have no suggestions', () => {
    expect(spanishCorrector().getSuggestions('casa')).toEqual([]);
    expect(spanishCorrector().getSuggestions('')).toEqual([]);
  });

  test('ranks by distance, then frequency', () => {
    const tree = new PrefixTree();
    tree.insert('casa', entry('noun', 100));
    tree.insert('caso', entry('noun', 10));
    tree.insert('cosa', entry('noun', 50));
    tree.insert('cata', entry('noun', 10));
    const corrector = new SpellingCorrector(tree, spanish);

    expect(corrector.getSuggestions('casx')).toEqual([
      { word: 'casa', distance: 1, frequency: 100 },
      { word: 'caso', distance: 1, frequency: 10 },
      { word: 'cosa', distance: 2, frequency: 50 },
      { word: 'cata', distance: 2, frequency: 10 },
    ]);
  });

  test('truncates after ordering equal candidates alphabetically', () => {
    const tree = new PrefixTree();
    for (const word of ['mesa', 'musa', 'masa', 'misa', 'mesas', 'meta', 'pesa']) {
      tree.insert(word, entry('noun', 1));
    }
    const corrector = new SpellingCorrector(tree, spanish, { maxSuggestions: 3 });

    const suggestions = corrector.getSuggestions('mosa');
    expect(suggestions).toHaveLength(3);
    expect(suggestions.map(s => s.word)).toEqual(['masa', 'mesa', 'misa']);
  });

  test('finds the transposed word', () => {
    expect(spanishCorrector().getSuggestions('probelma')[0]).toEqual({
      word: 'problema',
      distance: 2,
      frequency: 50,
    });
  });

  test('puts the j→g spelling first', () => {
    const tree = new PrefixTree();
    tree.insert('tejer', entry('verb'));
    tree.insert('proteger', entry('verb'));
    tree.insert('protege', entry('verb'));
    const corrector = new SpellingCorrector(tree, spanish, {
      verbRecognizer: VerbRecognizer.fromDictionary(tree, createSpanishConjugation()),
    });

    expect(corrector.getSuggestions('proteje')).toEqual([
      { word: 'protege', distance: 1, frequency: PREFERRED_FREQUENCY },
      { word: 'proteger', distance: 2, frequency: 1 },
    ]);
  });
});

describe('elision', () => {
  function catalanCorrector() {
    const tree = new PrefixTree();
    for (const word of ["l'", "d'", 'home', 'dona', 'col·legi']) tree.insert(word, entry('other', 5));
    return new SpellingCorrector(tree, catalan);
  }

  test('accepts a known head and a known rest', () => {
    const corrector = catalanCorrector();
    expect(corrector.isCorrect("l'home")).toBe(true);
    expect(corrector.isCorrect('l’home')).toBe(false);
    expect(corrector.isCorrect("d'home")).toBe(true);
    expect(corrector.isCorrect("x'home")).toBe(false);
    expect(corrector.isCorrect("l'")).toBe(true);
  });

  test('suggests only for the part after the apostrophe', () => {
    expect(catalanCorrector().getSuggestions("l'hom")).toEqual([
      { word: "l'home", distance: 1, frequency: 5 },
    ]);
  });

  test('drops candidates that are not plain words', () => {
    expect(catalanCorrector().getSuggestions("l'd")).toEqual([]);
  });

  test('keeps word-internal characters in suggestions', () => {
    expect(catalanCorrector().getSuggestions("l'col·legis").map(s => s.word)).toEqual(["l'col·legi"]);
  });

  test('spanish derived plurals count after an apostrophe', () => {
    const tree = buildSpanishTree();
    configureDictionary(spanish, tree);
    tree.insert("l'", entry('other'));
    expect(new SpellingCorrector(tree, spanish).isCorrect("l'abuelas")).toBe(true);
  });
});
