/**
 * Corrector session: one language, one dictionary loaded from a data directory.
 *
 *   <dataDir>/<lang>/words.txt    main dictionary (warning when missing)
 *   <dataDir>/<lang>/custom.txt   user words, appended by addCustomWord
 *   <dataDir>/names.txt           proper names shared by every language
 */

import fs from 'fs';
import path from 'path';
import {
  PrefixTree,
  TextCorrector,
  buildVerbRecognizer,
  configureDictionary,
  dp,
  getLanguage,
  type LanguageDescriptor,
  type SpellingSuggestion,
  type VerbRecognizer
} from '@corrector/core';
import type { CorrectorConfig } from './dictionary/config.js';
import { resolveLanguage } from './dictionary/config.js';
import { appendCustomWord, CUSTOM_DICTIONARY_FILE } from './dictionary/custom-dictionary.js';
import { describeCause, UnsupportedLanguageError } from './dictionary/errors.js';
import { appendDictionaryFile, loadDictionaryFile } from './dictionary/load-dictionary.js';
import { ProperNames } from './dictionary/proper-names.js';

export const WORDS_FILE = 'words.txt';
export const NAMES_FILE = 'names.txt';

export interface CorrectorStats {
  language: string;
  words: number;
  infinitives: number;
  pronominalVerbs: number;
  irregularForms: number;
  properNames: number;
}

function loadMainDictionary(filePath: string): PrefixTree {
  if (!fs.existsSync(filePath)) {
    console.warn(`Warning: no dictionary found at '${filePath}', using an empty dictionary`);
    return new PrefixTree();
  }
  return loadDictionaryFile(filePath);
}

function loadProperNames(filePath: string): ProperNames {
  if (!fs.existsSync(filePath)) return new ProperNames();
  try {
    return ProperNames.loadFile(filePath);
  } catch (error) {
    console.warn(`Warning: could not load proper names: ${describeCause(error)}`);
    return new ProperNames();
  }
}

export class Corrector {
  readonly text: TextCorrector;

  private constructor(
    readonly config: CorrectorConfig,
    readonly language: LanguageDescriptor,
    readonly dictionary: PrefixTree,
    readonly properNames: ProperNames,
    readonly verbRecognizer: VerbRecognizer | undefined
  ) {
    this.text = new TextCorrector(dictionary, language, {
      verbRecognizer,
      isProperName: word => properNames.isProperName(word),
      maxDistance: config.maxDistance,
      maxSuggestions: config.maxSuggestions,
      spellingSeparator: config.spellingSeparator,
      cacheSize: config.cacheSize,
    });
  }

  static load(config: CorrectorConfig): Corrector {
    const code = resolveLanguage(config.language);
    const language = getLanguage(code);
    if (!language) throw new UnsupportedLanguageError(config.language);

    const languageDir = path.join(config.dataDir, language.code);
    const dictionary = loadMainDictionary(path.join(languageDir, WORDS_FILE));

    const customPath = path.join(languageDir, CUSTOM_DICTIONARY_FILE);
    if (fs.existsSync(customPath)) {
      try {
        appendDictionaryFile(dictionary, customPath);
      } catch (error) {
        console.warn(`Warning: could not load custom dictionary: ${describeCause(error)}`);
      }
    }

    if (config.customDict !== undefined) {
      appendDictionaryFile(dictionary, config.customDict);
    }

    const retagged = language.sanitizeDictionary?.(dictionary) ?? 0;
    const properNames = loadProperNames(path.join(config.dataDir, NAMES_FILE));

    configureDictionary(language, dictionary);
    const verbRecognizer = buildVerbRecognizer(language, dictionary);

    dp(`session ${language.code}: ${dictionary.size} words, ${retagged} re-tagged, ${properNames.size} names`);
    return new Corrector(config, language, dictionary, properNames, verbRecognizer);
  }

  get customDictionaryPath(): string {
    return path.join(this.config.dataDir, this.language.code, CUSTOM_DICTIONARY_FILE);
  }

  correct(text: string): string {
    return this.text.correct(text);
  }

  isWordKnown(word: string): boolean {
    return this.text.isWordKnown(word);
  }

  getSuggestions(word: string): string[] {
    return this.text.getSuggestions(word);
  }

  rankedSuggestions(word: string): SpellingSuggestion[] {
    return this.text.rankedSuggestions(word);
  }

  getInfinitive(word: string): string | undefined {
    return this.text.getInfinitive(word);
  }

  /** Persist a word to custom.txt and accept it from now on. */
  addCustomWord(word: string): void {
    appendCustomWord(this.customDictionaryPath, word);
    this.text.addWord(word.trim());
  }

  stats(): CorrectorStats {
    return {
      language: this.language.code,
      words: this.dictionary.size,
      infinitives: this.verbRecognizer?.infinitiveCount ?? 0,
      pronominalVerbs: this.verbRecognizer?.pronominalCount ?? 0,
      irregularForms: this.verbRecognizer?.irregularCount ?? 0,
      properNames: this.properNames.size,
    };
  }
}
