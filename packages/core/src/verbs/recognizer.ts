/**
 * Verb form recognition.
 *
 * Decides whether a word is a conjugated, non-finite or clitic-bearing form
 * of an infinitive present in the dictionary, and recovers that infinitive.
 * Strategies run in a fixed order and the first hit wins:
 *
 *   1. irregular table
 *   2. regular endings (plus future/conditional on the whole infinitive)
 *   3. stem alternations (pienso, cuento, pido, juego, conozco)
 *   4. orthographic alternations (organice, llegue, busque)
 *   5. derivational prefixes (deshago, compone)
 *   6. enclitic pronouns (dímelo, cantándola)
 */

import type { PrefixTree } from '../dict/trie.js';
import { startTimer } from '../dict/profiling.js';
import { dp } from '../registry.js';
import {
  couldBeImperative,
  encliticSplits,
  hasGerundShape,
  hasInfinitiveShape,
  removeAccents,
} from './enclitics.js';
import type { ConjugationTables, StemChangeKind, VerbClass, VerbFormRecognizer } from './types.js';
import { VERB_CLASSES, VOWEL_STEM_CHANGES } from './types.js';

const STEM_CHANGE_PAIRS: Record<StemChangeKind, readonly [string, string]> = {
  'e-ie': ['e', 'ie'],
  'o-ue': ['o', 'ue'],
  'e-i': ['e', 'i'],
  'u-ue': ['u', 'ue'],
  'c-zc': ['c', 'zc'],
};

/**
 * Undo a stem alternation on a conjugated stem: "piens" → "pens" for e-ie.
 * Vowel alternations replace the last occurrence of the changed vowel;
 * c-zc only applies to stems ending in "zc".
 */
export function reverseStemChange(kind: StemChangeKind, stem: string): string | undefined {
  const [original, changed] = STEM_CHANGE_PAIRS[kind];

  if (kind === 'c-zc') {
    return stem.endsWith(changed) ? stem.slice(0, -changed.length) + original : undefined;
  }

  const position = stem.lastIndexOf(changed);
  if (position === -1) return undefined;
  return stem.slice(0, position) + original + stem.slice(position + changed.length);
}

export type RecognitionStrategy =
  | 'irregular'
  | 'regular'
  | 'stem-change'
  | 'orthographic'
  | 'prefixed'
  | 'enclitic';

export interface Recognition {
  infinitive: string;
  strategy: RecognitionStrategy;
}

export class VerbRecognizer implements VerbFormRecognizer {
  private readonly infinitives: ReadonlySet<string>;
  private readonly pronominals: ReadonlyMap<string, string>;

  constructor(
    infinitives: Iterable<string>,
    private readonly tables: ConjugationTables
  ) {
    const set = new Set<string>();
    const pronominals = new Map<string, string>();
    const suffix = tables.pronominalSuffix;

    for (const infinitive of infinitives) {
      set.add(infinitive);
      const base = infinitive.slice(0, -suffix.length);
      if (infinitive.endsWith(suffix) && hasInfinitiveShape(base)) {
        set.add(base);
        pronominals.set(base, infinitive);
      }
    }

    this.infinitives = set;
    this.pronominals = pronominals;
  }

  /**
   * Collect every verb entry shaped like an infinitive (cantar, sentirse)
   * from the dictionary. Later dictionary changes are not seen.
   */
  static fromDictionary(dictionary: PrefixTree, tables: ConjugationTables): VerbRecognizer {
    const stop = startTimer('buildVerbRecognizer');
    const infinitives: string[] = [];
    const suffix = tables.pronominalSuffix;

    for (const [word, entry] of dictionary.entries()) {
      if (entry.category !== 'verb') continue;
      const isPronominal = word.endsWith(suffix) && hasInfinitiveShape(word.slice(0, -suffix.length));
      if (hasInfinitiveShape(word) || isPronominal) {
        infinitives.push(word);
      }
    }

    const recognizer = new VerbRecognizer(infinitives, tables);
    dp(`verb recognizer: ${recognizer.infinitiveCount} infinitives, ${recognizer.pronominalCount} pronominal`);
    stop();
    return recognizer;
  }

  get infinitiveCount(): number {
    return this.infinitives.size;
  }

  get irregularCount(): number {
    return this.tables.irregularForms.size;
  }

  get pronominalCount(): number {
    return this.pronominals.size;
  }

  isKnownInfinitive(word: string): boolean {
    return this.infinitives.has(word.toLowerCase());
  }

  isValidVerbForm(word: string): boolean {
    const stop = startTimer('isValidVerbForm');
    const found = this.recognize(word) !== undefined;
    stop();
    return found;
  }

  /** The infinitive behind `word`, in its pronominal form when the dictionary has one. */
  getInfinitive(word: string): string | undefined {
    const stop = startTimer('getInfinitive');
    const result = this.recognize(word);
    stop();
    return result ? this.canonical(result.infinitive) : undefined;
  }

  /** True only for gerunds of known verbs; "mando" or "blando" are not. */
  isGerund(word: string): boolean {
    const lower = word.toLowerCase();
    return hasGerundShape(lower) && this.gerundInfinitive(lower) !== undefined;
  }

  recognize(word: string): Recognition | undefined {
    const lower = word.toLowerCase();
    if (lower.length === 0) return undefined;

    const attempts: Array<[RecognitionStrategy, (w: string) => string | undefined]> = [
      ['irregular', w => this.tables.irregularForms.get(w)],
      ['regular', w => this.regularInfinitive(w)],
      ['stem-change', w => this.stemChangeInfinitive(w)],
      ['orthographic', w => this.orthographicInfinitive(w)],
      ['prefixed', w => this.prefixedInfinitive(w)],
      ['enclitic', w => this.encliticInfinitive(w)],
    ];

    for (const [strategy, attempt] of attempts) {
      const infinitive = attempt(lower);
      if (infinitive !== undefined) {
        dp(`verb ${lower}: ${strategy} → ${infinitive}`);
        return { infinitive, strategy };
      }
    }
    return undefined;
  }

  private canonical(infinitive: string): string {
    return this.pronominals.get(infinitive) ?? infinitive;
  }

  // ---------------------------------------------------------------------------
  // Regular endings
  // ---------------------------------------------------------------------------

  private regularInfinitive(word: string): string | undefined {
    for (const verbClass of VERB_CLASSES) {
      for (const ending of this.tables.regularEndings[verbClass]) {
        if (!word.endsWith(ending)) continue;
        const stem = word.slice(0, -ending.length);
        if (stem.length === 0) continue;
        const candidate = stem + verbClass;
        if (this.infinitives.has(candidate)) return candidate;
      }
    }
    return this.futureInfinitive(word);
  }

  // Future and conditional attach to the whole infinitive: cantaré, tendría
  private futureInfinitive(word: string): string | undefined {
    for (const ending of this.tables.infinitiveEndings) {
      if (!word.endsWith(ending)) continue;
      const base = word.slice(0, -ending.length);
      if (base.length === 0) continue;
      if (this.infinitives.has(base)) return base;

      const fromIrregularStem = this.irregularFutureInfinitive(base);
      if (fromIrregularStem !== undefined) return fromIrregularStem;
    }
    return undefined;
  }

  private irregularFutureInfinitive(stem: string): string | undefined {
    for (const { stemTail, infinitiveTails } of this.tables.irregularFutureStems) {
      if (!stem.endsWith(stemTail)) continue;
      const root = stem.slice(0, -stemTail.length);
      for (const tail of infinitiveTails) {
        const candidate = root + tail;
        if (this.infinitives.has(candidate)) return candidate;
      }
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Stem alternations
  // ---------------------------------------------------------------------------

  private stemChangeInfinitive(word: string): string | undefined {
    for (const verbClass of VERB_CLASSES) {
      const found = this.vowelChangeInfinitive(word, verbClass);
      if (found !== undefined) return found;
    }
    for (const verbClass of ['er', 'ir'] as const) {
      const found = this.velarInsertionInfinitive(word, verbClass);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  private vowelChangeInfinitive(word: string, verbClass: VerbClass): string | undefined {
    for (const ending of this.tables.stemChangeEndings[verbClass]) {
      if (!word.endsWith(ending)) continue;
      const changedStem = word.slice(0, -ending.length);
      if (changedStem.length === 0) continue;

      for (const kind of VOWEL_STEM_CHANGES) {
        const stem = reverseStemChange(kind, changedStem);
        if (stem === undefined) continue;
        const candidate = stem + verbClass;
        if (!this.infinitives.has(candidate)) continue;

        const registered = this.tables.stemChanges.get(candidate);
        if (registered === kind) return candidate;

        // sentir is e-ie but its 3rd person preterite and gerund raise e→i
        if (
          verbClass === 'ir' &&
          registered === 'e-ie' &&
          kind === 'e-i' &&
          this.tables.raisedVariantEndings.includes(ending)
        ) {
          return candidate;
        }
      }
    }
    return undefined;
  }

  private velarInsertionInfinitive(word: string, verbClass: VerbClass): string | undefined {
    for (const ending of this.tables.velarInsertionEndings) {
      if (!word.endsWith(ending)) continue;
      const stem = reverseStemChange('c-zc', word.slice(0, -ending.length));
      if (stem === undefined) continue;
      const candidate = stem + verbClass;
      if (this.infinitives.has(candidate) && this.tables.stemChanges.get(candidate) === 'c-zc') {
        return candidate;
      }
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Orthographic alternations
  // ---------------------------------------------------------------------------

  private orthographicInfinitive(word: string): string | undefined {
    for (const alternation of this.tables.orthographicAlternations) {
      for (const ending of alternation.endings) {
        if (!word.endsWith(ending)) continue;
        const stem = word.slice(0, -ending.length);
        if (!stem.endsWith(alternation.surface)) continue;
        const root = stem.slice(0, -alternation.surface.length);
        if (root.length === 0) continue;

        const candidate = root + alternation.infinitive + alternation.verbClass;
        if (this.infinitives.has(candidate)) return candidate;

        // almuerce → almorzar: the stem may also carry an o→ue diphthong
        if (root.includes('ue')) {
          const undiphthongized = root.replace('ue', 'o') + alternation.infinitive + alternation.verbClass;
          if (this.infinitives.has(undiphthongized)) return undiphthongized;
        }
      }
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Prefixes
  // ---------------------------------------------------------------------------

  private prefixedInfinitive(word: string): string | undefined {
    let fallback: string | undefined;

    for (const prefix of this.tables.prefixes) {
      if (!word.startsWith(prefix)) continue;
      const remainder = word.slice(prefix.length);
      if (Array.from(remainder).length < 2) continue;

      const baseInfinitive =
        this.baseInfinitive(remainder) ?? (this.infinitives.has(remainder) ? remainder : undefined);
      if (baseInfinitive === undefined) continue;

      const rebuilt = prefix + baseInfinitive;
      if (this.infinitives.has(rebuilt)) return rebuilt;
      fallback ??= rebuilt;
    }

    return fallback;
  }

  private baseInfinitive(word: string): string | undefined {
    return (
      this.tables.irregularForms.get(word) ??
      this.regularInfinitive(word) ??
      this.stemChangeInfinitive(word)
    );
  }

  // ---------------------------------------------------------------------------
  // Enclitics
  // ---------------------------------------------------------------------------

  private encliticInfinitive(word: string): string | undefined {
    const { clitics, monosyllabicImperatives } = this.tables;
    for (const { base } of encliticSplits(word, clitics, monosyllabicImperatives)) {
      const found = this.cliticHostInfinitive(base);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  private cliticHostInfinitive(base: string): string | undefined {
    if (hasInfinitiveShape(base) && this.infinitives.has(base)) {
      return base;
    }

    if (hasGerundShape(base)) {
      const found = this.tables.irregularForms.get(removeAccents(base)) ?? this.gerundInfinitive(base);
      if (found !== undefined) return found;
    }

    if (couldBeImperative(base, this.tables.monosyllabicImperatives)) {
      const found = this.tables.irregularForms.get(base) ?? this.imperativeInfinitive(base);
      if (found !== undefined) return found;
    }

    return undefined;
  }

  private gerundInfinitive(base: string): string | undefined {
    const rules: Array<[string, readonly string[]]> = [
      ['ando', ['ar']],
      ['iendo', ['er', 'ir']],
      ['yendo', ['er', 'ir']],
      ['ándo', ['ar']],
      ['iéndo', ['er', 'ir']],
    ];
    return this.firstKnown(base, rules);
  }

  private imperativeInfinitive(base: string): string | undefined {
    const plain = removeAccents(base);
    const found = this.firstKnown(plain, [
      ['ad', ['ar']],
      ['ed', ['er']],
      ['id', ['ir']],
    ]);
    if (found !== undefined) return found;

    // Singular imperative equals the 3rd person present: canta, come, vive
    return this.firstKnown(plain, [
      ['a', ['ar']],
      ['e', ['er', 'ir']],
    ], 1) ?? this.stemChangeInfinitive(plain); // piénsalo, cuéntame
  }

  private firstKnown(
    word: string,
    rules: ReadonlyArray<readonly [string, readonly string[]]>,
    minStem = 0
  ): string | undefined {
    for (const [tail, replacements] of rules) {
      if (!word.endsWith(tail)) continue;
      const stem = word.slice(0, -tail.length);
      if (stem.length < minStem) continue;
      for (const replacement of replacements) {
        const candidate = stem + replacement;
        if (this.infinitives.has(candidate)) return candidate;
      }
    }
    return undefined;
  }
}
