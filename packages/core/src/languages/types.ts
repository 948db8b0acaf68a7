// Per-language policy consumed by the dictionary, the verb recognizer and the orchestrator

import type { PluralRules, PrefixTree } from '../dict/trie.js';
import type { ConjugationTables } from '../verbs/types.js';

export interface LanguageDescriptor {
  code: string;
  name: string;
  /** Non-letter characters allowed inside a word, e.g. "·" in Catalan "col·legi". */
  wordInternalChars: readonly string[];
  /** Apostrophes that mark an elided head word (l'home). */
  apostrophes: readonly string[];
  plurals?: PluralRules;
  /** Conjugation tables; languages without verb recognition leave this out. */
  conjugation?: () => ConjugationTables;
  isKnownAbbreviation(word: string): boolean;
  /**
   * Spellings the writer most likely meant, for a phonetic confusion the
   * language treats as high-confidence (Spanish "proteje" → "protege").
   */
  preferredSpellings?(word: string): string[];
  /** Fix known tagging problems in a freshly loaded dictionary; returns the number of entries changed. */
  sanitizeDictionary?(dictionary: PrefixTree): number;
}
