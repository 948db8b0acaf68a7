// corrector/data/config - Session configuration from defaults, environment and flags

import {
  canonicalLanguageCode,
  DEFAULT_CACHE_SIZE,
  DEFAULT_MAX_DISTANCE,
  DEFAULT_MAX_SUGGESTIONS,
  DEFAULT_SEPARATOR
} from '@corrector/core';
import { UnsupportedLanguageError } from './errors.js';

export interface CorrectorConfig {
  language: string;
  dataDir: string;
  /** Extra dictionary appended after the language's own files. */
  customDict?: string;
  spellingSeparator: string;
  maxDistance: number;
  maxSuggestions: number;
  /** Capacity of the per-token LRU caches. */
  cacheSize: number;
}

export const DEFAULT_CONFIG: Readonly<CorrectorConfig> = {
  language: 'es',
  dataDir: './data',
  spellingSeparator: DEFAULT_SEPARATOR,
  maxDistance: DEFAULT_MAX_DISTANCE,
  maxSuggestions: DEFAULT_MAX_SUGGESTIONS,
  cacheSize: DEFAULT_CACHE_SIZE,
};

function positiveInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return fallback;
  const value = Number(raw.trim());
  return value > 0 ? value : fallback;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw !== undefined && raw.trim() !== '' ? raw : undefined;
}

/**
 * Build a config from CORRECTOR_* variables. Unset or malformed values keep
 * their defaults; explicit overrides win over both.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CorrectorConfig> = {}
): CorrectorConfig {
  return {
    language: overrides.language ?? nonEmpty(env.CORRECTOR_LANG)?.trim() ?? DEFAULT_CONFIG.language,
    dataDir: overrides.dataDir ?? nonEmpty(env.CORRECTOR_DATA_DIR) ?? DEFAULT_CONFIG.dataDir,
    customDict: overrides.customDict ?? nonEmpty(env.CORRECTOR_CUSTOM_DICT),
    spellingSeparator:
      overrides.spellingSeparator ?? nonEmpty(env.CORRECTOR_SEPARATOR) ?? DEFAULT_CONFIG.spellingSeparator,
    maxDistance: overrides.maxDistance ?? positiveInteger(env.CORRECTOR_MAX_DISTANCE, DEFAULT_CONFIG.maxDistance),
    maxSuggestions:
      overrides.maxSuggestions ?? positiveInteger(env.CORRECTOR_MAX_SUGGESTIONS, DEFAULT_CONFIG.maxSuggestions),
    cacheSize: overrides.cacheSize ?? DEFAULT_CONFIG.cacheSize,
  };
}

/** Canonical language code for a config, or UnsupportedLanguageError. */
export function resolveLanguage(language: string): string {
  const code = canonicalLanguageCode(language);
  if (code === undefined) throw new UnsupportedLanguageError(language);
  return code;
}

/** Parse a numeric command-line flag, rejecting anything that is not a positive integer. */
export function parsePositiveInteger(raw: string, name: string): number {
  const value = positiveInteger(raw, Number.NaN);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}
