// corrector/languages/catalan - Catalan language descriptor
// Dictionary lookup, elision and suggestions only; no plural rules or verb tables yet.

import type { LanguageDescriptor } from '../types.js';

export const catalan: LanguageDescriptor = {
  code: 'ca',
  name: 'Català',
  wordInternalChars: ['·'],
  apostrophes: ["'", '’'],
  isKnownAbbreviation: () => false,
};
