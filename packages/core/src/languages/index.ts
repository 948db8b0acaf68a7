// corrector/languages - Language registry

import type { PrefixTree } from '../dict/trie.js';
import { VerbRecognizer } from '../verbs/recognizer.js';
import { catalan } from './catalan/index.js';
import { spanish } from './spanish/index.js';
import type { LanguageDescriptor } from './types.js';

const LANGUAGES: Record<string, LanguageDescriptor> = {
  es: spanish,
  ca: catalan,
};

const LANGUAGE_ALIASES: Record<string, string> = {
  es: 'es', spanish: 'es', espanol: 'es', 'español': 'es',
  ca: 'ca', catalan: 'ca', catala: 'ca', 'català': 'ca',
};

/** Map a user-supplied language name to its code, or undefined when unsupported. */
export function canonicalLanguageCode(input: string): string | undefined {
  const key = input.trim().toLowerCase();
  return Object.hasOwn(LANGUAGE_ALIASES, key) ? LANGUAGE_ALIASES[key] : undefined;
}

export function getLanguage(input: string): LanguageDescriptor | undefined {
  const code = canonicalLanguageCode(input);
  return code === undefined ? undefined : LANGUAGES[code];
}

export function supportedLanguages(): string[] {
  return Object.keys(LANGUAGES);
}

/** Install the language's plural rules on a dictionary. */
export function configureDictionary(language: LanguageDescriptor, dictionary: PrefixTree): void {
  dictionary.setPluralRules(language.plurals ?? null);
}

export function buildVerbRecognizer(
  language: LanguageDescriptor,
  dictionary: PrefixTree
): VerbRecognizer | undefined {
  if (!language.conjugation) return undefined;
  return VerbRecognizer.fromDictionary(dictionary, language.conjugation());
}
