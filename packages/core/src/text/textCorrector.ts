// corrector/text/textCorrector - Mark misspelled words in running text

import { LRUCache } from 'lru-cache';
import type { PrefixTree } from '../dict/trie.js';
import { startTimer } from '../dict/profiling.js';
import type { LanguageDescriptor } from '../languages/types.js';
import { SpellingCorrector } from '../spelling/corrector.js';
import { defaultWordEntry } from '../types.js';
import type { SpellingSuggestion, WordEntry } from '../types.js';
import type { VerbFormRecognizer } from '../verbs/types.js';
import { tokenize } from './tokenizer.js';

export const DEFAULT_SEPARATOR = '|';
export const DEFAULT_CACHE_SIZE = 10000;

export interface TextCorrectorOptions {
  verbRecognizer?: VerbFormRecognizer;
  isProperName?: (word: string) => boolean;
  maxDistance?: number;
  maxSuggestions?: number;
  spellingSeparator?: string;
  cacheSize?: number;
}

/** Short all-caps codes such as "ONU", "UE" or "G20", at most six characters. */
export function isUppercaseCode(word: string): boolean {
  return /^\p{Lu}+\p{Nd}*$/u.test(word) && Array.from(word).length <= 6;
}

/**
 * Text-level corrector. Owns per-token caches; `addWord` is the only
 * mutation and clears them.
 *
 * @example
 * const corrector = new TextCorrector(tree, spanish, { verbRecognizer });
 * corrector.correct('tengo un probelma'); // 'tengo un probelma |problema|'
 */
export class TextCorrector {
  readonly spellingSeparator: string;
  private readonly spelling: SpellingCorrector;
  private readonly verbRecognizer: VerbFormRecognizer | undefined;
  private readonly isProperName: (word: string) => boolean;
  private readonly knownCache: LRUCache<string, boolean>;
  private readonly suggestionCache: LRUCache<string, SpellingSuggestion[]>;

  constructor(
    readonly dictionary: PrefixTree,
    readonly language: LanguageDescriptor,
    options: TextCorrectorOptions = {}
  ) {
    this.verbRecognizer = options.verbRecognizer;
    this.isProperName = options.isProperName ?? (() => false);
    this.spellingSeparator = options.spellingSeparator ?? DEFAULT_SEPARATOR;
    this.spelling = new SpellingCorrector(dictionary, language, {
      maxDistance: options.maxDistance,
      maxSuggestions: options.maxSuggestions,
      verbRecognizer: options.verbRecognizer,
    });

    const max = Math.max(1, Math.floor(options.cacheSize ?? DEFAULT_CACHE_SIZE));
    this.knownCache = new LRUCache({ max });
    this.suggestionCache = new LRUCache({ max });
  }

  get spellingCorrector(): SpellingCorrector {
    return this.spelling;
  }

  correct(text: string): string {
    const stop = startTimer('correctText');
    const sep = this.spellingSeparator;
    let output = '';

    for (const token of tokenize(text, { wordInternalChars: this.language.wordInternalChars })) {
      output += token.text;
      if (token.kind !== 'word' || this.isWordKnown(token.text)) continue;

      const suggestions = this.getSuggestions(token.text);
      output += ` ${sep}${suggestions.length > 0 ? suggestions.join(',') : '?'}${sep}`;
    }

    stop();
    return output;
  }

  isWordKnown(word: string): boolean {
    const cached = this.knownCache.get(word);
    if (cached !== undefined) return cached;

    const known = this.checkToken(word);
    this.knownCache.set(word, known);
    return known;
  }

  /** Suggested replacements, best first, never including the word itself. */
  getSuggestions(word: string): string[] {
    const lower = word.toLowerCase();
    return this.rankedSuggestions(word)
      .map(s => s.word)
      .filter(candidate => candidate !== lower);
  }

  rankedSuggestions(word: string): SpellingSuggestion[] {
    const cached = this.suggestionCache.get(word);
    if (cached !== undefined) return cached;

    const suggestions = this.spelling.getSuggestions(word);
    this.suggestionCache.set(word, suggestions);
    return suggestions;
  }

  getInfinitive(word: string): string | undefined {
    return this.verbRecognizer?.getInfinitive(word);
  }

  /** Insert a word into the live dictionary; cached verdicts are dropped. */
  addWord(word: string, entry: WordEntry = defaultWordEntry()): void {
    this.dictionary.insert(word, entry);
    this.knownCache.clear();
    this.suggestionCache.clear();
  }

  private checkToken(word: string): boolean {
    if (this.isProperName(word)) return true;
    if (isUppercaseCode(word)) return true;
    if (word.includes('-')) return this.spelling.isCorrect(word) || this.isValidCompound(word);
    return this.spelling.isCorrect(word);
  }

  // Madrid-Barcelona, franco-alemán: every part must stand on its own
  private isValidCompound(word: string): boolean {
    const parts = word.split('-');
    if (parts.length < 2) return false;
    return parts.every(part => part.length > 0 && (this.isProperName(part) || this.spelling.isCorrect(part)));
  }
}
