// Shared word metadata types

export type WordCategory =
  | 'noun'
  | 'verb'
  | 'adjective'
  | 'adverb'
  | 'article'
  | 'preposition'
  | 'conjunction'
  | 'pronoun'
  | 'determiner'
  | 'other';

export type Gender = 'masculine' | 'feminine' | 'none';

export type GrammaticalNumber = 'singular' | 'plural' | 'none';

/**
 * Metadata stored for every dictionary key.
 * `extra` carries free-form lemma or tag text from the source dictionary.
 */
export interface WordEntry {
  category: WordCategory;
  gender: Gender;
  number: GrammaticalNumber;
  extra: string;
  frequency: number;
}

export interface SpellingSuggestion {
  word: string;
  distance: number;
  frequency: number;
}

export function defaultWordEntry(): WordEntry {
  return {
    category: 'other',
    gender: 'none',
    number: 'none',
    extra: '',
    frequency: 1,
  };
}

const CATEGORY_ALIASES: Record<string, WordCategory> = {
  sustantivo: 'noun', noun: 'noun', n: 'noun',
  verbo: 'verb', verb: 'verb', v: 'verb',
  adjetivo: 'adjective', adjective: 'adjective', adj: 'adjective',
  adverbio: 'adverb', adverb: 'adverb', adv: 'adverb',
  articulo: 'article', 'artículo': 'article', article: 'article', art: 'article',
  preposicion: 'preposition', 'preposición': 'preposition', preposition: 'preposition', prep: 'preposition',
  conjuncion: 'conjunction', 'conjunción': 'conjunction', conjunction: 'conjunction', conj: 'conjunction',
  pronombre: 'pronoun', pronoun: 'pronoun', pron: 'pronoun',
  determinante: 'determiner', determiner: 'determiner', det: 'determiner',
};

const GENDER_ALIASES: Record<string, Gender> = {
  m: 'masculine', masc: 'masculine', masculine: 'masculine', masculino: 'masculine',
  f: 'feminine', fem: 'feminine', feminine: 'feminine', femenino: 'feminine',
};

const NUMBER_ALIASES: Record<string, GrammaticalNumber> = {
  s: 'singular', sing: 'singular', singular: 'singular',
  p: 'plural', pl: 'plural', plural: 'plural',
};

function lookupAlias<T>(aliases: Record<string, T>, raw: string): T | undefined {
  const key = raw.trim().toLowerCase();
  return Object.hasOwn(aliases, key) ? aliases[key] : undefined;
}

export function parseCategory(raw: string): WordCategory {
  return lookupAlias(CATEGORY_ALIASES, raw) ?? 'other';
}

export function parseGender(raw: string): Gender {
  return lookupAlias(GENDER_ALIASES, raw) ?? 'none';
}

export function parseNumber(raw: string): GrammaticalNumber {
  return lookupAlias(NUMBER_ALIASES, raw) ?? 'none';
}
