import { describe, test, expect } from 'vitest';
import {
  encliticSplits,
  isValidVerbBase,
  restoreAccent,
  couldBeImperative,
} from '../src/verbs/enclitics.js';
import { CLITIC_PRONOUNS } from '../src/languages/spanish/conjugation.js';

const IMPERATIVES = ['da', 'dá', 'di', 'dí', 've', 'pon', 'sal', 'ten', 'ven', 'haz', 'se', 'sé'];

function firstSplit(word: string) {
  for (const split of encliticSplits(word, CLITIC_PRONOUNS, IMPERATIVES)) {
    return split;
  }
  return undefined;
}

describe('encliticSplits', () => {
  test('single pronoun on an infinitive', () => {
    expect(firstSplit('decirle')).toEqual({ base: 'decir', pronouns: ['le'] });
  });

  test('two pronouns with accent restoration', () => {
    expect(firstSplit('dármelo')).toEqual({ base: 'dar', pronouns: ['me', 'lo'] });
    expect(firstSplit('diciéndotelo')).toEqual({ base: 'diciendo', pronouns: ['te', 'lo'] });
  });

  test('monosyllabic imperatives', () => {
    expect(firstSplit('dámelo')).toEqual({ base: 'da', pronouns: ['me', 'lo'] });
    expect(firstSplit('dime')).toEqual({ base: 'di', pronouns: ['me'] });
    expect(firstSplit('ponlo')).toEqual({ base: 'pon', pronouns: ['lo'] });
  });

  test('a word without clitics only yields itself', () => {
    expect([...encliticSplits('cantando', CLITIC_PRONOUNS, IMPERATIVES)]).toEqual([
      { base: 'cantando', pronouns: [] },
    ]);
  });

  test('more pronouns are tried before fewer', () => {
    const splits = [...encliticSplits('cómelo', CLITIC_PRONOUNS, IMPERATIVES)];
    expect(splits[0]).toEqual({ base: 'cóme', pronouns: ['lo'] });
  });
});

describe('verb base shape', () => {
  test('accepts infinitives, gerunds and imperatives', () => {
    expect(isValidVerbBase('cantar', IMPERATIVES)).toBe(true);
    expect(isValidVerbBase('cantándo', IMPERATIVES)).toBe(true);
    expect(isValidVerbBase('canta', IMPERATIVES)).toBe(true);
    expect(isValidVerbBase('cantad', IMPERATIVES)).toBe(true);
    expect(isValidVerbBase('haz', IMPERATIVES)).toBe(true);
    expect(isValidVerbBase('cantemos', IMPERATIVES)).toBe(true);
  });

  test('rejects other shapes', () => {
    expect(isValidVerbBase('canto', IMPERATIVES)).toBe(false);
    expect(isValidVerbBase('cor', IMPERATIVES)).toBe(false);
    expect(isValidVerbBase('papel', IMPERATIVES)).toBe(false);
    expect(isValidVerbBase('od', IMPERATIVES)).toBe(false);
  });

  test('restoreAccent removes accents added by clitics', () => {
    expect(restoreAccent('cantár', IMPERATIVES)).toBe('cantar');
    expect(restoreAccent('comiéndo', IMPERATIVES)).toBe('comiendo');
    expect(restoreAccent('cantándo', IMPERATIVES)).toBe('cantando');
    expect(restoreAccent('digámos', IMPERATIVES)).toBe('digamos');
    expect(restoreAccent('dí', IMPERATIVES)).toBe('di');
    expect(restoreAccent('cánta', IMPERATIVES)).toBe('cánta');
  });

  test('couldBeImperative', () => {
    expect(couldBeImperative('pon', IMPERATIVES)).toBe(true);
    expect(couldBeImperative('comed', IMPERATIVES)).toBe(true);
    expect(couldBeImperative('vive', IMPERATIVES)).toBe(true);
    expect(couldBeImperative('comiendo', IMPERATIVES)).toBe(false);
  });
});
