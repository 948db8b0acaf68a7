import { describe, test, expect } from 'vitest';
import { depluralizeCandidates } from '../src/languages/spanish/plurals.js';

describe('depluralizeCandidates', () => {
  test('irregular plural endings come first', () => {
    expect(depluralizeCandidates('veces')[0]).toBe('vez');
    expect(depluralizeCandidates('canciones')).toEqual(['canción', 'cancion', 'cancione']);
    expect(depluralizeCandidates('alemanes')[0]).toBe('alemán');
    expect(depluralizeCandidates('almacenes')[0]).toBe('almacén');
    expect(depluralizeCandidates('ingleses')[0]).toBe('inglés');
    expect(depluralizeCandidates('jardines')[0]).toBe('jardín');
    expect(depluralizeCandidates('atunes')[0]).toBe('atún');
    expect(depluralizeCandidates('rubíes')[0]).toBe('rubí');
    expect(depluralizeCandidates('tabúes')[0]).toBe('tabú');
  });

  test('-ones is not read as -iones', () => {
    expect(depluralizeCandidates('leones')).toEqual(['león', 'leon', 'leone']);
  });

  test('plain -s and consonant + -es', () => {
    expect(depluralizeCandidates('casas')).toEqual(['casa']);
    expect(depluralizeCandidates('papeles')).toEqual(['papel', 'papele']);
  });

  test('returns nothing for words that cannot be plurals', () => {
    expect(depluralizeCandidates('s')).toEqual([]);
    expect(depluralizeCandidates('es')).toEqual(['e']);
  });

  test('lowercases its input', () => {
    expect(depluralizeCandidates('CASAS')).toEqual(['casa']);
  });
});
