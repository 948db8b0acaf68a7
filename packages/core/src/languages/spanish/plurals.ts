// corrector/languages/spanish/plurals - Singular candidates for Spanish plurals

import type { PluralRules } from '../../dict/trie.js';

const VOWELS = 'aeiouáéíóúü';

// Ordered from most to least specific: veces → vez before veces → vece
const SUFFIX_RULES: ReadonlyArray<readonly [string, string]> = [
  ['ces', 'z'],
  ['iones', 'ión'],
  ['anes', 'án'],
  ['enes', 'én'],
  ['eses', 'és'],
  ['ines', 'ín'],
  ['ones', 'ón'],
  ['unes', 'ún'],
  ['íes', 'í'],
  ['úes', 'ú'],
];

function isVowel(ch: string | undefined): boolean {
  return ch !== undefined && VOWELS.includes(ch);
}

function lastChar(text: string): string | undefined {
  const chars = Array.from(text);
  return chars[chars.length - 1];
}

/**
 * Possible singular forms of a Spanish plural, most specific first, without
 * duplicates. The caller decides which one exists in the dictionary.
 *
 * @example
 * depluralizeCandidates('canciones'); // ['canción', 'cancion', 'cancione']
 */
export function depluralizeCandidates(word: string): string[] {
  const lower = word.toLowerCase();
  const candidates: string[] = [];
  const push = (candidate: string) => {
    if (!candidates.includes(candidate)) candidates.push(candidate);
  };

  for (const [plural, singular] of SUFFIX_RULES) {
    if (!lower.endsWith(plural)) continue;
    if (plural === 'ones' && lower.endsWith('iones')) continue;
    const stem = lower.slice(0, -plural.length);
    if (stem.length > 0) push(stem + singular);
  }

  if (lower.endsWith('es')) {
    const stem = lower.slice(0, -2);
    const last = lastChar(stem);
    if (last !== undefined && !isVowel(last)) push(stem);
  }

  if (lower.endsWith('s')) {
    const stem = lower.slice(0, -1);
    if (stem.length > 0) push(stem);
  }

  return candidates;
}

export const spanishPlurals: PluralRules = {
  suffix: 's',
  candidates: depluralizeCandidates,
};
