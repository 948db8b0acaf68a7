// @corrector/data - Dictionary files, configuration and corrector sessions

export {
  type CorrectorConfig,
  DEFAULT_CONFIG,
  configFromEnv,
  resolveLanguage,
  parsePositiveInteger
} from './dictionary/config.js';
export {
  DictionaryLoadError,
  UnsupportedLanguageError,
  CustomDictionaryError,
  describeCause
} from './dictionary/errors.js';
export {
  type DictionaryLine,
  FIELD_DELIMITER,
  parseDictionaryFields,
  parseDictionaryLine,
  parseDictionary,
  appendDictionary,
  loadDictionaryFile,
  appendDictionaryFile,
  loadWordList,
  mergeDictionaries
} from './dictionary/load-dictionary.js';
export { ProperNames } from './dictionary/proper-names.js';
export { appendCustomWord, CUSTOM_DICTIONARY_FILE } from './dictionary/custom-dictionary.js';
export { Corrector, type CorrectorStats, WORDS_FILE, NAMES_FILE } from './session.js';
