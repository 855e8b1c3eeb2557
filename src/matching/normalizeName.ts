/**
 * Name Normalization for Organization / Department Matching
 *
 * Names typed into two different systems differ in width, script, case,
 * legal-entity suffixes and punctuation. This module reduces a raw name to a
 * canonical form so that those cosmetic differences disappear before scoring.
 *
 * Example transformations:
 * - "ＡＢＣ" → "abc"
 * - "サンプル商事株式会社" → "さんぷる商事"
 * - "ｻﾝﾌﾟﾙ㈱" → "さんぷる"
 * - "Acme Holdings Co., Ltd." → "acme"
 */

import { CORPORATE_DESIGNATORS, STRIPPED_SYMBOLS } from './constants';

const FULL_WIDTH_ASCII = /[\uFF01-\uFF5E]/g;
const FULL_WIDTH_OFFSET = 0xfee0;
const IDEOGRAPHIC_SPACE = /\u3000/g;

// ァ..ヶ plus the iteration marks ヽ ヾ
const KATAKANA = /[\u30A1-\u30F6\u30FD\u30FE]/g;
const KATAKANA_TO_HIRAGANA_OFFSET = 0x60;

const LATIN_OR_DIGIT = /[a-z0-9]/i;

/**
 * Collapses whitespace runs to a single space and trims both ends.
 */
function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Maps full-width ASCII characters (U+FF01–U+FF5E) and the ideographic space
 * to their half-width equivalents.
 *
 * @example
 * toHalfWidth("ＡＢＣ１２３") // Returns: "ABC123"
 */
export function toHalfWidth(input: string): string {
  return input
    .replace(FULL_WIDTH_ASCII, (ch) => String.fromCharCode(ch.charCodeAt(0) - FULL_WIDTH_OFFSET))
    .replace(IDEOGRAPHIC_SPACE, ' ');
}

/**
 * Maps katakana to the corresponding hiragana, character by character.
 * The prolonged sound mark "ー" has no hiragana form and is kept.
 *
 * @example
 * katakanaToHiragana("サンプル") // Returns: "さんぷる"
 */
export function katakanaToHiragana(input: string): string {
  return input.replace(KATAKANA, (ch) =>
    String.fromCharCode(ch.charCodeAt(0) - KATAKANA_TO_HIRAGANA_OFFSET)
  );
}

/**
 * Stages 1-4 of the pipeline: compatibility normalization, width, script
 * and case. Also applied to designator tokens before they are matched.
 */
function canonicalize(input: string): string {
  let normalized = input.normalize('NFKC');
  normalized = toHalfWidth(normalized);
  normalized = katakanaToHiragana(normalized);
  return normalized.toLowerCase();
}

/**
 * Builds the pattern for one designator. Edges that are Latin letters or
 * digits must sit on a word boundary.
 */
function designatorPattern(token: string): string {
  const head = LATIN_OR_DIGIT.test(token.charAt(0)) ? '(?<![a-z0-9])' : '';
  const tail = LATIN_OR_DIGIT.test(token.charAt(token.length - 1)) ? '(?![a-z0-9])' : '';
  return `${head}${escapeRegExp(token)}${tail}`;
}

/**
 * Removes legal-entity designators ("株式会社", "(株)", "LLC", ...) and
 * collapses the whitespace left behind.
 *
 * @param input - String to clean
 * @param designators - Tokens to remove, in any width or case
 * @returns String without designators
 *
 * @example
 * stripCorporateDesignators("さんぷる 株式会社") // Returns: "さんぷる"
 */
export function stripCorporateDesignators(
  input: string,
  designators: Iterable<string> = CORPORATE_DESIGNATORS
): string {
  const tokens = [...new Set([...designators].map(canonicalize))]
    .filter((token) => token.length > 0)
    // Longest first so "co., ltd." wins over "ltd."
    .sort((a, b) => b.length - a.length);

  if (tokens.length === 0) {
    return collapseWhitespace(input);
  }

  const pattern = new RegExp(tokens.map(designatorPattern).join('|'), 'gi');
  return collapseWhitespace(input.replace(pattern, ''));
}

/**
 * Deletes separator characters (×, ・, slashes, dashes, ...) without
 * inserting a space, then collapses whitespace.
 *
 * @example
 * stripSymbols("a/b・c×d") // Returns: "abcd"
 */
export function stripSymbols(input: string, symbols: Iterable<string> = STRIPPED_SYMBOLS): string {
  let stripped = input;
  for (const symbol of symbols) {
    if (symbol) {
      stripped = stripped.split(symbol).join('');
    }
  }
  return collapseWhitespace(stripped);
}

/**
 * One pass of the full pipeline.
 */
function runPipeline(input: string): string {
  // Steps 1-4: NFKC, full-width → half-width, katakana → hiragana, lowercase
  let normalized = canonicalize(input);

  // Step 5: legal-entity designators
  normalized = stripCorporateDesignators(normalized);

  // Step 6: separator symbols, then trim / collapse whitespace
  return stripSymbols(normalized);
}

/**
 * Normalizes a name for comparison by:
 * 1. Unicode NFKC normalization
 * 2. Converting full-width ASCII to half-width
 * 3. Converting katakana to hiragana
 * 4. Lowercasing
 * 5. Removing corporate-entity designators
 * 6. Removing separator symbols and collapsing whitespace
 *
 * Deleting a symbol can bring two halves of a designator together
 * ("株-式会社"), so the pipeline is repeated until the output is stable.
 * This keeps normalizeName idempotent.
 *
 * @param input - Raw name as found in the spreadsheet
 * @returns Normalized name; "" for empty or designator-only input
 *
 * @example
 * normalizeName("サンプル商事株式会社") // Returns: "さんぷる商事"
 * normalizeName("〇〇㈱") // Returns: "〇〇"
 * normalizeName("") // Returns: ""
 */
export function normalizeName(input: string): string {
  if (!input || typeof input !== 'string') {
    return '';
  }

  let previous: string;
  let current = input;
  do {
    previous = current;
    current = runPipeline(previous);
  } while (current !== previous);

  return current;
}

export default normalizeName;
