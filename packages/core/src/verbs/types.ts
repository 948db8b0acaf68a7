// Verb morphology types shared by the recognizer and the language tables

export type VerbClass = 'ar' | 'er' | 'ir';

export const VERB_CLASSES: readonly VerbClass[] = ['ar', 'er', 'ir'];

/**
 * Stem alternations named by the change they apply to the infinitive stem:
 * e→ie (pensar/piensa), o→ue (contar/cuenta), e→i (pedir/pide),
 * u→ue (jugar/juega), c→zc (conocer/conozco).
 */
export type StemChangeKind = 'e-ie' | 'o-ue' | 'e-i' | 'u-ue' | 'c-zc';

export const VOWEL_STEM_CHANGES: readonly StemChangeKind[] = ['e-ie', 'o-ue', 'e-i', 'u-ue'];

/** A spelling change that keeps a consonant's sound before a front vowel (organizar/organice). */
export interface OrthographicAlternation {
  /** Spelling found in the conjugated form, e.g. "c" in "organice". */
  surface: string;
  /** Spelling restored in the infinitive, e.g. "z" in "organizar". */
  infinitive: string;
  endings: readonly string[];
  verbClass: VerbClass;
}

export interface IrregularFutureStem {
  /** Tail of the future/conditional stem, e.g. "dr" in "tendr". */
  stemTail: string;
  /** Infinitive tails to try in its place, e.g. "er"/"ir" for tener/salir. */
  infinitiveTails: readonly string[];
}

/**
 * Everything the recognizer needs to know about one language's conjugation.
 * Built once per language and shared read-only.
 */
export interface ConjugationTables {
  /** Conjugated form → infinitive. */
  irregularForms: ReadonlyMap<string, string>;
  /** Infinitive → stem alternation it undergoes. */
  stemChanges: ReadonlyMap<string, StemChangeKind>;
  /** All regular endings per class, across every tense and non-finite form. */
  regularEndings: Readonly<Record<VerbClass, readonly string[]>>;
  /** Endings attached to the whole infinitive (future and conditional). */
  infinitiveEndings: readonly string[];
  irregularFutureStems: readonly IrregularFutureStem[];
  /** Endings after which a stressed stem shows its alternation. */
  stemChangeEndings: Readonly<Record<VerbClass, readonly string[]>>;
  /** Endings that take the c→zc alternation (conozco, conozca...). */
  velarInsertionEndings: readonly string[];
  /** Endings where -ir verbs of the e→ie class switch to e→i (sintió, sintiendo). */
  raisedVariantEndings: readonly string[];
  orthographicAlternations: readonly OrthographicAlternation[];
  /** Derivational prefixes, longest first. */
  prefixes: readonly string[];
  /** Pronouns that may attach to the end of infinitives, gerunds and imperatives. */
  clitics: readonly string[];
  /** Short irregular imperatives that can carry clitics (di, haz, pon...). */
  monosyllabicImperatives: readonly string[];
  /** Suffix marking a pronominal infinitive (sentirse). */
  pronominalSuffix: string;
}

export interface VerbFormRecognizer {
  isValidVerbForm(word: string): boolean;
  getInfinitive(word: string): string | undefined;
}
