/**
 * Name Matching Engine
 *
 * Pure, deterministic functions for reconciling organization and department
 * names between two sources:
 * - Normalization (width, script, case, legal-entity designators, symbols)
 * - Bigram / prefix / edit-distance similarity
 * - Weighted composite score and ranking
 *
 * Usage:
 * ```typescript
 * import { rankCandidates } from './matching';
 *
 * const ranked = rankCandidates('サンプル商事', partnerNames, { topN: 3 });
 * console.log(ranked[0].candidate, ranked[0].score);
 * ```
 */

// Main functions
export { normalizeName } from './normalizeName';
export { rankCandidates, rankCandidateSet, buildCandidateSet, isExactMatch } from './rankCandidates';
export { matchName, matchNameAgainstSet, determineMatchStatus } from './matchName';

// Individual stages and scores (for testing/debugging)
export {
  toHalfWidth,
  katakanaToHiragana,
  stripCorporateDesignators,
  stripSymbols,
} from './normalizeName';
export {
  createNgrams,
  calculateNgramScore,
  calculatePrefixScore,
  calculateEditScore,
} from './nameSimilarity';
export { calculateCompositeScore, scoreNormalizedPair } from './compositeScore';

// Configuration
export { DEFAULT_MATCHER_CONFIG, resolveMatcherConfig, validateMatcherConfig } from './matcherConfig';
export { ConfigurationError } from './errors';

// Constants
export {
  DEFAULT_WEIGHTS,
  DEFAULT_TOP_N,
  DEFAULT_MIN_SCORE_THRESHOLD,
  NGRAM_SIZE,
  CORPORATE_DESIGNATORS,
  STRIPPED_SYMBOLS,
} from './constants';

// Types
export type {
  MatcherConfig,
  MatchWeights,
  CandidateEntry,
  SubScores,
  ScoreBreakdown,
  RankedCandidate,
  MatchStatus,
  NameMatchResult,
} from './types';
