/**
 * Name Similarity Sub-Scores
 *
 * Three independent measures over two normalized names, each in [0, 1]:
 * - N-gram score: Jaccard index of the character bigram sets
 * - Prefix score: shared leading characters relative to the shorter name
 * - Edit score: Levenshtein distance relative to the longer name
 *
 * All three are symmetric. Two empty strings are identical and score 1.0
 * on every measure; exactly one empty string scores 0.0.
 *
 * Lengths are counted in code points, so a kanji outside the BMP (𠮷) is one
 * character like any other.
 */

import natural from 'natural';
import { NGRAM_SIZE } from './constants';

/**
 * Collects the distinct overlapping n-grams of a string.
 * A string shorter than n has no n-grams.
 *
 * @example
 * createNgrams("abab") // Returns: Set { "ab", "ba" }
 */
export function createNgrams(text: string, n: number = NGRAM_SIZE): Set<string> {
  const chars = [...text];
  const ngrams = new Set<string>();
  for (let i = 0; i + n <= chars.length; i++) {
    ngrams.add(chars.slice(i, i + n).join(''));
  }
  return ngrams;
}

/**
 * Rewrites both strings over a one-code-unit alphabet, one unit per distinct
 * character, so a UTF-16 based distance counts characters.
 */
function toSingleUnitAlphabet(a: string, b: string): [string, string] {
  const units = new Map<string, string>();
  const encode = (text: string): string =>
    [...text]
      .map((char) => {
        let unit = units.get(char);
        if (unit === undefined) {
          // Skip the surrogate range so every unit stands alone
          const index = units.size < 0xd800 ? units.size : units.size + 0x800;
          unit = String.fromCharCode(index);
          units.set(char, unit);
        }
        return unit;
      })
      .join('');

  return [encode(a), encode(b)];
}

/**
 * Jaccard similarity of the bigram sets of two strings.
 *
 * Two empty sets (both strings shorter than two characters) count as
 * identical. One empty set against a non-empty one scores 0, and so does an
 * empty string against a single character.
 *
 * @example
 * calculateNgramScore("abcd", "abce") // Returns: 0.5 ({ab, bc} of {ab, bc, cd, ce})
 */
export function calculateNgramScore(a: string, b: string): number {
  if ((a.length === 0) !== (b.length === 0)) {
    return 0;
  }

  const ngramsA = createNgrams(a);
  const ngramsB = createNgrams(b);

  if (ngramsA.size === 0 && ngramsB.size === 0) {
    return 1;
  }

  let intersection = 0;
  for (const gram of ngramsA) {
    if (ngramsB.has(gram)) {
      intersection++;
    }
  }
  const union = ngramsA.size + ngramsB.size - intersection;

  return intersection / union;
}

/**
 * Length of the literal common prefix divided by the shorter length.
 *
 * @example
 * calculatePrefixScore("abcd", "abxy") // Returns: 0.5
 * calculatePrefixScore("ab", "abcd") // Returns: 1
 */
export function calculatePrefixScore(a: string, b: string): number {
  const charsA = [...a];
  const charsB = [...b];
  if (charsA.length === 0 && charsB.length === 0) {
    return 1;
  }

  const shorter = Math.min(charsA.length, charsB.length);
  if (shorter === 0) {
    return 0;
  }

  let common = 0;
  while (common < shorter && charsA[common] === charsB[common]) {
    common++;
  }

  return common / shorter;
}

/**
 * One minus the Levenshtein distance divided by the longer length.
 *
 * @example
 * calculateEditScore("kitten", "sitting") // Returns: 1 - 3/7
 */
export function calculateEditScore(a: string, b: string): number {
  const [unitsA, unitsB] = toSingleUnitAlphabet(a, b);
  const longer = Math.max(unitsA.length, unitsB.length);
  if (longer === 0) {
    return 1;
  }

  // Exactly one empty string: the distance is the other length
  if (unitsA.length === 0 || unitsB.length === 0) {
    return 0;
  }

  const distance = natural.LevenshteinDistance(unitsA, unitsB);
  return 1 - distance / longer;
}
