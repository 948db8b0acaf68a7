// corrector/spelling/distance - Edit distance between words
// Distances count Unicode code points, not UTF-16 units, so "ñ" or "á" is one edit.

function toChars(text: string): string[] {
  return Array.from(text);
}

/**
 * Classic Levenshtein distance (insertion, deletion, substitution).
 * Runs in O(|a|·|b|) with two rolling rows.
 */
export function levenshteinDistance(a: string, b: string): number {
  const source = toChars(a);
  const target = toChars(b);

  if (source.length === 0) return target.length;
  if (target.length === 0) return source.length;

  let previous = initialRow(target.length);
  for (const ch of source) {
    previous = nextDistanceRow(previous, target, ch);
  }
  return previous[target.length];
}

/**
 * Levenshtein distance that also counts swapping two adjacent characters
 * as a single edit (optimal string alignment variant).
 *
 * @example
 * damerauLevenshteinDistance('probelma', 'problema'); // 1
 * levenshteinDistance('probelma', 'problema');        // 2
 */
export function damerauLevenshteinDistance(a: string, b: string): number {
  const source = toChars(a);
  const target = toChars(b);
  const n = source.length;
  const m = target.length;

  if (n === 0) return m;
  if (m === 0) return n;

  const matrix: number[][] = [];
  for (let i = 0; i <= n; i++) {
    const row = new Array<number>(m + 1).fill(0);
    row[0] = i;
    matrix.push(row);
  }
  for (let j = 0; j <= m; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= n; i++) {
    for (let j = 1; j <= m; j++) {
      const cost = source[i - 1] === target[j - 1] ? 0 : 1;
      let best = Math.min(
        matrix[i - 1][j] + 1,
        matrix[i][j - 1] + 1,
        matrix[i - 1][j - 1] + cost
      );
      if (i > 1 && j > 1 && source[i - 1] === target[j - 2] && source[i - 2] === target[j - 1]) {
        best = Math.min(best, matrix[i - 2][j - 2] + cost);
      }
      matrix[i][j] = best;
    }
  }

  return matrix[n][m];
}

// =============================================================================
// ROW-WISE RECURRENCE (shared with the prefix tree search)
// =============================================================================

export function initialRow(length: number): number[] {
  return Array.from({ length: length + 1 }, (_, i) => i);
}

/**
 * Extend a Levenshtein row by one source character. `previous[j]` is the
 * distance between the consumed source prefix and the first j target chars.
 */
export function nextDistanceRow(previous: readonly number[], target: readonly string[], ch: string): number[] {
  const row = new Array<number>(previous.length);
  row[0] = previous[0] + 1;
  for (let j = 1; j < previous.length; j++) {
    const cost = target[j - 1] === ch ? 0 : 1;
    row[j] = Math.min(previous[j] + 1, row[j - 1] + 1, previous[j - 1] + cost);
  }
  return row;
}
