// corrector/data/errors - Errors raised while reading or writing user data

export class DictionaryLoadError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Could not load dictionary '${path}': ${describeCause(cause)}`, { cause });
    this.name = 'DictionaryLoadError';
  }
}

export class UnsupportedLanguageError extends Error {
  constructor(readonly language: string) {
    super(`Unsupported language: ${language}`);
    this.name = 'UnsupportedLanguageError';
  }
}

export class CustomDictionaryError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Could not update custom dictionary '${path}': ${describeCause(cause)}`, { cause });
    this.name = 'CustomDictionaryError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
