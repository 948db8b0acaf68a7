// @corrector/core - Edit distance, dictionary tree, verb recognition and spelling correction

// Lazy tables and debug logging
export {
  defineTable,
  resetTable,
  resetAllTables,
  isTableLoaded,
  envFlag,
  isDebugEnabled,
  setDebug,
  dp
} from './registry.js';

// Profiling
export {
  PERF_COUNTERS,
  type PerfCounter,
  startTimer,
  resetPerfCounters,
  printPerfCountersAndReset,
  isProfilingEnabled,
  setProfiling
} from './dict/profiling.js';

// Word metadata
export {
  type WordCategory,
  type Gender,
  type GrammaticalNumber,
  type WordEntry,
  type SpellingSuggestion,
  defaultWordEntry,
  parseCategory,
  parseGender,
  parseNumber
} from './types.js';

// Dictionary tree
export {
  PrefixTree,
  mergeTrees,
  type PluralRules,
  type FuzzyMatch
} from './dict/trie.js';

// Edit distance
export {
  levenshteinDistance,
  damerauLevenshteinDistance
} from './spelling/distance.js';

// Spelling orchestrator
export {
  SpellingCorrector,
  compareSuggestions,
  DEFAULT_MAX_DISTANCE,
  DEFAULT_MAX_SUGGESTIONS,
  PREFERRED_FREQUENCY,
  type SpellingCorrectorOptions
} from './spelling/corrector.js';

// Verb recognition
export {
  VerbRecognizer,
  reverseStemChange,
  type Recognition,
  type RecognitionStrategy
} from './verbs/recognizer.js';
export {
  encliticSplits,
  removeAccents,
  type EncliticSplit
} from './verbs/enclitics.js';
export type {
  VerbClass,
  StemChangeKind,
  ConjugationTables,
  OrthographicAlternation,
  IrregularFutureStem,
  VerbFormRecognizer
} from './verbs/types.js';

// Languages
export type { LanguageDescriptor } from './languages/types.js';
export {
  getLanguage,
  canonicalLanguageCode,
  supportedLanguages,
  configureDictionary,
  buildVerbRecognizer
} from './languages/index.js';
export {
  spanish,
  jToGVariants,
  sanitizeSpanishDictionary,
  depluralizeCandidates,
  spanishPlurals,
  createSpanishConjugation,
  getSpanishConjugation
} from './languages/spanish/index.js';
export { catalan } from './languages/catalan/index.js';

// Text
export {
  tokenize,
  type Token,
  type TokenKind,
  type TokenizerOptions
} from './text/tokenizer.js';
export {
  TextCorrector,
  isUppercaseCode,
  DEFAULT_SEPARATOR,
  DEFAULT_CACHE_SIZE,
  type TextCorrectorOptions
} from './text/textCorrector.js';
