// corrector/languages/spanish - Spanish language descriptor

import type { PrefixTree } from '../../dict/trie.js';
import { dp } from '../../registry.js';
import type { WordEntry } from '../../types.js';
import type { LanguageDescriptor } from '../types.js';
import { getSpanishConjugation } from './conjugation.js';
import { spanishPlurals } from './plurals.js';

const ABBREVIATIONS = new Set(['n.º', 'n.ª']);

const FRONT_VOWELS = new Set(['e', 'i', 'é', 'í']);

/**
 * Every word obtained by writing "g" for one "j" that precedes a front vowel.
 * "proteje" → ["protege"]; words without such a "j" give [].
 */
export function jToGVariants(word: string): string[] {
  const chars = Array.from(word.toLowerCase());
  const variants: string[] = [];

  for (let i = 0; i + 1 < chars.length; i++) {
    if (chars[i] !== 'j' || !FRONT_VOWELS.has(chars[i + 1])) continue;
    const variant = [...chars.slice(0, i), 'g', ...chars.slice(i + 1)].join('');
    if (!variants.includes(variant)) variants.push(variant);
  }
  return variants;
}

function isDictionaryVerb(dictionary: PrefixTree, word: string): boolean {
  return dictionary.lookup(word)?.category === 'verb';
}

// Verb forms in -ía/-ío tagged as nouns with no lemma: "comía", "amplío", "beneficiaría"
function looksLikeMistaggedVerbForm(word: string, dictionary: PrefixTree): boolean {
  if (word.endsWith('ría')) {
    const stem = word.slice(0, -'ría'.length);
    if (isDictionaryVerb(dictionary, stem + 'r')) return true;
  }

  if (word.endsWith('ía')) {
    const stem = word.slice(0, -'ía'.length);
    return ['er', 'ir', 'ír', 'iar'].some(tail => isDictionaryVerb(dictionary, stem + tail));
  }

  if (word.endsWith('ío')) {
    const stem = word.slice(0, -'ío'.length);
    return isDictionaryVerb(dictionary, stem + 'iar');
  }

  return false;
}

/** Re-tag noun entries that are really verb forms. */
export function sanitizeSpanishDictionary(dictionary: PrefixTree): number {
  const updates: Array<[string, WordEntry]> = [];

  for (const [word, entry] of dictionary.entries()) {
    if (entry.category !== 'noun' || entry.extra.trim() !== '') continue;
    if (!word.endsWith('ía') && !word.endsWith('ío')) continue;
    if (!looksLikeMistaggedVerbForm(word, dictionary)) continue;
    updates.push([word, { ...entry, category: 'verb', gender: 'none', number: 'none' }]);
  }

  let changed = 0;
  for (const [word, entry] of updates) {
    if (dictionary.update(word, entry)) changed++;
  }
  dp(`spanish sanitation: ${changed} entries re-tagged as verbs`);
  return changed;
}

export const spanish: LanguageDescriptor = {
  code: 'es',
  name: 'Español',
  wordInternalChars: [],
  apostrophes: ["'", '’'],
  plurals: spanishPlurals,
  conjugation: getSpanishConjugation,
  isKnownAbbreviation: word => ABBREVIATIONS.has(word.toLowerCase()),
  preferredSpellings: jToGVariants,
  sanitizeDictionary: sanitizeSpanishDictionary,
};

export { depluralizeCandidates, spanishPlurals } from './plurals.js';
export { createSpanishConjugation, getSpanishConjugation } from './conjugation.js';
