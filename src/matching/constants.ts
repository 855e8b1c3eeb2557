/**
 * Constants for the Name Matching Engine
 *
 * Lookup tables and default tuning values used by the normalizer and scorer.
 * The tables are plain mutable sets so new variants can be registered at
 * startup without touching the algorithm.
 */

// ============================================
// DEFAULT MATCHER CONFIGURATION
// ============================================

/**
 * Default weights of the composite score.
 *
 * composite = 0.5 × ngram + 0.3 × prefix + 0.2 × edit
 */
export const DEFAULT_WEIGHTS = {
  NGRAM: 0.5,
  PREFIX: 0.3,
  EDIT: 0.2,
} as const;

/** Number of ranked candidates returned per query. */
export const DEFAULT_TOP_N = 3;

/**
 * Score below which the best candidate is not considered viable.
 * Drives the green / yellow / red review colors of the reconciliation sheet.
 */
export const DEFAULT_MIN_SCORE_THRESHOLD = 0.8;

/** Size of the character n-grams compared by the n-gram sub-score. */
export const NGRAM_SIZE = 2;

// ============================================
// CORPORATE ENTITY DESIGNATORS
// ============================================

/**
 * Legal-entity tokens removed during normalization.
 *
 * Entries may be written in any width or case: they go through the same
 * width/script/case canonicalization as the input before being matched.
 * A token whose first or last character is a Latin letter or digit only
 * matches at a word boundary on that side ("inc" is kept inside "principal").
 *
 * Examples:
 * - "サンプル株式会社" → "さんぷる"
 * - "サンプル㈱" → "さんぷる"
 * - "Acme Holdings Co., Ltd." → "acme"
 */
export const CORPORATE_DESIGNATORS: Set<string> = new Set([
  // Japanese kabushiki kaisha
  '株式会社',
  '(株)',
  '㈱',

  // Japanese yugen kaisha
  '有限会社',
  '(有)',
  '㈲',

  // Other Japanese partnership forms
  '合名会社',
  '合資会社',
  '合同会社',

  // Latin-script designators
  'LLC',
  'Co.,Ltd.',
  'Co.,Ltd',
  'Co., Ltd.',
  'Co., Ltd',
  'Co.Ltd.',
  'Co.Ltd',
  'Co. Ltd.',
  'Co. Ltd',
  'Holdings',
  'Holding',
  'HD',
  'Corporation',
  'Corp.',
  'Corp',
  'Inc.',
  'Inc',
  'Limited',
  'Ltd.',
  'Ltd',
]);

// ============================================
// STRIPPED SYMBOLS
// ============================================

/**
 * Separator and noise characters deleted (not replaced by a space) in the
 * last normalization stage.
 *
 * The katakana prolonged sound mark "ー" is part of the word and is kept.
 */
export const STRIPPED_SYMBOLS: Set<string> = new Set([
  '×',
  '・',
  '/',
  '／',

  // Hyphen and dash variants
  '-',
  '‐', // hyphen
  '‑', // non-breaking hyphen
  '‒', // figure dash
  '–', // en dash
  '—', // em dash
  '―', // horizontal bar
  '−', // minus sign
  '﹣', // small hyphen-minus
  '－', // full-width hyphen-minus

  // Punctuation left over from entity names
  '.',
  ',',
  '(',
  ')',
  '（',
  '）',
]);
