// corrector/verbs/enclitics - Split attached object pronouns off verb forms
// dámelo → da + [me, lo], diciéndotelo → diciendo + [te, lo]

export interface EncliticSplit {
  base: string;
  pronouns: string[];
}

export const MAX_ENCLITICS = 3;

const ACCENTS: ReadonlyArray<readonly [string, string]> = [
  ['á', 'a'], ['é', 'e'], ['í', 'i'], ['ó', 'o'], ['ú', 'u'],
];

const VOWELS = 'aeiouáéíóúü';
const PLURAL_FIRST_PERSON = ['amos', 'emos', 'imos', 'ámos', 'émos', 'ímos'];
const GERUND_TAILS = ['ando', 'ándo', 'iendo', 'iéndo', 'yendo', 'yéndo'];

export function removeAccents(word: string): string {
  let result = word;
  for (const [accented, plain] of ACCENTS) {
    result = result.replaceAll(accented, plain);
  }
  return result;
}

function countVowels(word: string): number {
  let count = 0;
  for (const ch of word) {
    if (VOWELS.includes(ch)) count++;
  }
  return count;
}

function endsWithAny(word: string, tails: readonly string[]): boolean {
  return tails.some(tail => word.endsWith(tail));
}

function charAtFromEnd(chars: readonly string[], offset: number): string | undefined {
  return chars[chars.length - offset];
}

/**
 * Candidate splits of `word`, most pronouns first. Each strip must leave at
 * least two characters. The unsplit word comes last.
 */
export function* encliticSplits(
  word: string,
  clitics: readonly string[],
  monosyllabicImperatives: readonly string[]
): IterableIterator<EncliticSplit> {
  for (let count = MAX_ENCLITICS; count >= 1; count--) {
    yield* stripRecursive(word, count, [], clitics, monosyllabicImperatives);
  }
  if (isValidVerbBase(word, monosyllabicImperatives)) {
    yield { base: restoreAccent(word, monosyllabicImperatives), pronouns: [] };
  }
}

function* stripRecursive(
  current: string,
  remaining: number,
  pronouns: string[],
  clitics: readonly string[],
  imperatives: readonly string[]
): IterableIterator<EncliticSplit> {
  if (remaining === 0) {
    if (isValidVerbBase(current, imperatives)) {
      yield { base: restoreAccent(current, imperatives), pronouns };
    }
    return;
  }

  for (const clitic of clitics) {
    if (!current.endsWith(clitic) || current.length <= clitic.length) continue;
    const base = current.slice(0, -clitic.length);
    if (Array.from(base).length < 2) continue;
    yield* stripRecursive(base, remaining - 1, [clitic, ...pronouns], clitics, imperatives);
  }
}

/** Whether a stripped base has the shape of a form that accepts clitics. */
export function isValidVerbBase(base: string, imperatives: readonly string[]): boolean {
  const chars = Array.from(base);

  if (endsWithAny(base, PLURAL_FIRST_PERSON)) {
    return chars.length >= 4;
  }

  const last = charAtFromEnd(chars, 1);
  const secondLast = charAtFromEnd(chars, 2);
  switch (last) {
    case 'r':
      return secondLast !== undefined && 'aeiáéí'.includes(secondLast);
    case 'o':
      return endsWithAny(base, GERUND_TAILS);
    case 'a':
    case 'á':
    case 'e':
    case 'é':
      return chars.length >= 2;
    case 'i':
    case 'í':
    case 'n':
    case 'z':
    case 'l':
      return imperatives.includes(base) || imperatives.includes(removeAccents(base));
    case 'd':
      return secondLast !== undefined && 'aei'.includes(secondLast);
    default:
      return false;
  }
}

/** Drop the written accent that clitic attachment adds to the base. */
export function restoreAccent(base: string, imperatives: readonly string[]): string {
  for (const [accented, plain] of [['ámos', 'amos'], ['émos', 'emos'], ['ímos', 'imos']]) {
    if (base.endsWith(accented)) return base.slice(0, -accented.length) + plain;
  }

  if (base.endsWith('ár') || base.endsWith('ér') || base.endsWith('ír')) {
    return removeAccents(base);
  }

  if (countVowels(base) === 1) {
    const plain = removeAccents(base);
    if (imperatives.includes(plain)) return plain;
  }

  if (base.endsWith('ándo')) return base.slice(0, -'ándo'.length) + 'ando';
  if (base.endsWith('iéndo')) return base.slice(0, -'iéndo'.length) + 'iendo';

  return base;
}

export function hasInfinitiveShape(base: string): boolean {
  return base.endsWith('ar') || base.endsWith('er') || base.endsWith('ir');
}

export function hasGerundShape(base: string): boolean {
  return endsWithAny(base, GERUND_TAILS);
}

export function couldBeImperative(base: string, imperatives: readonly string[]): boolean {
  if (imperatives.includes(base)) return true;
  if (endsWithAny(base, PLURAL_FIRST_PERSON)) return true;
  if (base.endsWith('ad') || base.endsWith('ed') || base.endsWith('id')) return true;
  return base.endsWith('a') || base.endsWith('e');
}
