// corrector/text/tokenizer - Split running text into words, numbers, whitespace and punctuation

export type TokenKind = 'word' | 'number' | 'whitespace' | 'punctuation' | 'unknown';

export interface Token {
  text: string;
  kind: TokenKind;
  /** UTF-16 offsets into the source text, end exclusive. */
  start: number;
  end: number;
}

export interface TokenizerOptions {
  wordInternalChars?: readonly string[];
}

const LETTER = /^[\p{L}\p{M}]$/u;
const DIGIT = /^\p{Nd}$/u;
const SPACE = /^\s$/u;
const PUNCTUATION = /^[\p{P}\p{S}]$/u;

const JOINERS = new Set(["'", '’', '-']);
const ORDINAL_MARKS = new Set(['º', 'ª']);

const isLetter = (ch: string | undefined): ch is string => ch !== undefined && LETTER.test(ch);
const isDigit = (ch: string | undefined): ch is string => ch !== undefined && DIGIT.test(ch);
const isSpace = (ch: string | undefined): ch is string => ch !== undefined && SPACE.test(ch);

/**
 * @example
 * tokenize("l'home 100km").map(t => t.text); // ["l'home", " ", "100km"]
 */
export function tokenize(text: string, options: TokenizerOptions = {}): Token[] {
  const internal = new Set(options.wordInternalChars ?? []);
  const chars = Array.from(text);
  const tokens: Token[] = [];
  let offset = 0;
  let i = 0;

  const emit = (kind: TokenKind, from: number, to: number) => {
    const tokenText = chars.slice(from, to).join('');
    tokens.push({ text: tokenText, kind, start: offset, end: offset + tokenText.length });
    offset += tokenText.length;
  };

  while (i < chars.length) {
    const ch = chars[i];
    const start = i;

    if (isSpace(ch)) {
      while (isSpace(chars[i])) i++;
      emit('whitespace', start, i);
    } else if (isLetter(ch)) {
      i = scanWord(chars, i, internal);
      emit('word', start, i);
    } else if (isDigit(ch)) {
      i = scanNumber(chars, i);
      emit('number', start, i);
    } else {
      i++;
      emit(PUNCTUATION.test(ch) ? 'punctuation' : 'unknown', start, i);
    }
  }

  return tokens;
}

function scanWord(chars: readonly string[], from: number, internal: ReadonlySet<string>): number {
  let i = from;
  while (i < chars.length) {
    const ch = chars[i];
    if (isLetter(ch) || isDigit(ch)) {
      i++;
    } else if ((JOINERS.has(ch) || internal.has(ch)) && isLetter(chars[i + 1])) {
      i += 2;
    } else if (ch === '.' && ORDINAL_MARKS.has(chars[i + 1] ?? '')) {
      // n.º, n.ª
      i += 2;
    } else {
      break;
    }
  }
  return i;
}

// 1.000,5, ordinals such as 1.º and measurements such as 100km or 13.6kWh
function scanNumber(chars: readonly string[], from: number): number {
  let i = from;
  while (i < chars.length) {
    const ch = chars[i];
    if (isDigit(ch)) {
      i++;
    } else if ((ch === '.' || ch === ',') && isDigit(chars[i + 1])) {
      i += 2;
    } else if (ch === '.' && ORDINAL_MARKS.has(chars[i + 1] ?? '')) {
      i += 2;
    } else {
      break;
    }
  }
  while (isLetter(chars[i])) i++;
  return i;
}
