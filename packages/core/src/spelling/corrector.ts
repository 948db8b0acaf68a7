/**
 * Spelling orchestrator: decides whether a word is acceptable and ranks
 * replacement candidates. Combines exact lookup, elision, abbreviations,
 * derived plurals and verb recognition.
 */

import type { FuzzyMatch, PrefixTree } from '../dict/trie.js';
import { startTimer } from '../dict/profiling.js';
import type { LanguageDescriptor } from '../languages/types.js';
import type { SpellingSuggestion } from '../types.js';
import type { VerbFormRecognizer } from '../verbs/types.js';

export const DEFAULT_MAX_DISTANCE = 2;
export const DEFAULT_MAX_SUGGESTIONS = 5;

/** Frequency given to a preferred-spelling suggestion so it outranks any dictionary word. */
export const PREFERRED_FREQUENCY = 0xffffffff;

export interface SpellingCorrectorOptions {
  maxDistance?: number;
  maxSuggestions?: number;
  verbRecognizer?: VerbFormRecognizer;
}

interface Elision {
  head: string;
  rest: string;
}

const LETTER = /^\p{L}$/u;

export function compareSuggestions(a: SpellingSuggestion, b: SpellingSuggestion): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.frequency !== b.frequency) return b.frequency - a.frequency;
  if (a.word === b.word) return 0;
  return a.word < b.word ? -1 : 1;
}

export class SpellingCorrector {
  readonly maxDistance: number;
  readonly maxSuggestions: number;
  private readonly verbRecognizer: VerbFormRecognizer | undefined;

  constructor(
    private readonly dictionary: PrefixTree,
    private readonly language: LanguageDescriptor,
    options: SpellingCorrectorOptions = {}
  ) {
    this.maxDistance = options.maxDistance ?? DEFAULT_MAX_DISTANCE;
    this.maxSuggestions = options.maxSuggestions ?? DEFAULT_MAX_SUGGESTIONS;
    this.verbRecognizer = options.verbRecognizer;
  }

  isCorrect(word: string): boolean {
    const stop = startTimer('isCorrect');
    try {
      return this.checkWord(word);
    } finally {
      stop();
    }
  }

  getSuggestions(word: string): SpellingSuggestion[] {
    const stop = startTimer('getSuggestions');
    try {
      return this.collectSuggestions(word);
    } finally {
      stop();
    }
  }

  private checkWord(word: string): boolean {
    const lower = word.toLowerCase();
    if (lower.length === 0) return false;

    if (this.dictionary.has(lower)) return true;

    const elision = this.splitElision(lower);
    if (elision && this.dictionary.has(elision.head)) {
      if (this.dictionary.has(elision.rest) || this.dictionary.derivePluralInfo(elision.rest)) {
        return true;
      }
    }

    if (this.language.isKnownAbbreviation(word)) return true;

    if (this.dictionary.derivePluralInfo(lower)) return true;

    if (this.verbRecognizer?.isValidVerbForm(lower)) {
      // "proteje" parses as pro + teje, but "protege" is what was meant
      return this.knownPreferredSpellings(lower).length === 0;
    }

    return false;
  }

  private collectSuggestions(word: string): SpellingSuggestion[] {
    const lower = word.toLowerCase();
    if (lower.length === 0 || this.dictionary.has(lower)) return [];

    const elision = this.splitElision(lower);
    if (elision && this.dictionary.has(elision.head)) {
      const matches = this.dictionary
        .searchWithinDistance(elision.rest, this.maxDistance)
        .filter(match => this.isPlainWord(match.word));
      const ranked = this.rank(matches).map(s => ({ ...s, word: elision.head + s.word }));
      const boosted = this.preferredSuggestions(elision.rest).map(s => ({ ...s, word: elision.head + s.word }));
      return this.mergeBoosted(boosted, ranked);
    }

    const ranked = this.rank(this.dictionary.searchWithinDistance(lower, this.maxDistance));
    return this.mergeBoosted(this.preferredSuggestions(lower), ranked);
  }

  private rank(matches: FuzzyMatch[]): SpellingSuggestion[] {
    return matches
      .map(match => ({ word: match.word, distance: match.distance, frequency: match.entry.frequency }))
      .sort(compareSuggestions)
      .slice(0, this.maxSuggestions);
  }

  private mergeBoosted(boosted: SpellingSuggestion[], ranked: SpellingSuggestion[]): SpellingSuggestion[] {
    if (boosted.length === 0) return ranked;
    const boostedWords = new Set(boosted.map(s => s.word));
    return [...boosted, ...ranked.filter(s => !boostedWords.has(s.word))].slice(0, this.maxSuggestions);
  }

  private preferredSuggestions(lower: string): SpellingSuggestion[] {
    return this.knownPreferredSpellings(lower).map(variant => ({
      word: variant,
      distance: 1,
      frequency: PREFERRED_FREQUENCY,
    }));
  }

  private knownPreferredSpellings(lower: string): string[] {
    const variants = this.language.preferredSpellings?.(lower) ?? [];
    return variants.filter(variant => variant !== lower && this.dictionary.has(variant));
  }

  // "l'home" → head "l'", rest "home"
  private splitElision(lower: string): Elision | undefined {
    for (const apostrophe of this.language.apostrophes) {
      const position = lower.indexOf(apostrophe);
      if (position === -1) continue;
      const rest = lower.slice(position + apostrophe.length);
      if (rest.length === 0) continue;
      return { head: lower.slice(0, position + apostrophe.length), rest };
    }
    return undefined;
  }

  private isPlainWord(word: string): boolean {
    for (const ch of word) {
      if (!LETTER.test(ch) && !this.language.wordInternalChars.includes(ch)) return false;
    }
    return true;
  }
}
