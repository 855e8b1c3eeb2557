/**
 * Type Definitions for the Name Matching Engine
 *
 * The engine is pure and deterministic: no I/O, no global state.
 * Configuration is always passed in explicitly.
 */

// ============================================
// CONFIGURATION
// ============================================

/**
 * Tunable parameters of the matcher.
 */
export interface MatcherConfig {
  /** Weight of the bigram Jaccard sub-score */
  ngramWeight: number;
  /** Weight of the common-prefix sub-score */
  prefixWeight: number;
  /** Weight of the edit-distance sub-score */
  editWeight: number;
  /** Number of ranked candidates to return */
  topN: number;
  /** Minimum composite score for a candidate to be considered viable (0-1) */
  minScoreThreshold: number;
}

/**
 * The three weights of the composite score.
 */
export type MatchWeights = Pick<MatcherConfig, 'ngramWeight' | 'prefixWeight' | 'editWeight'>;

// ============================================
// CANDIDATE SET
// ============================================

/**
 * One known legitimate name, kept alongside its normalized form.
 */
export interface CandidateEntry {
  raw: string;
  normalized: string;
}

// ============================================
// SCORES
// ============================================

/**
 * Independent similarity sub-scores, each in [0, 1].
 */
export interface SubScores {
  ngramScore: number;
  prefixScore: number;
  editScore: number;
}

/**
 * Sub-scores plus the weighted composite, for explainability.
 */
export interface ScoreBreakdown extends SubScores {
  compositeScore: number;
}

/**
 * One entry of a ranking result.
 */
export interface RankedCandidate {
  /** Candidate exactly as supplied by the caller */
  candidate: string;
  /** Candidate after normalization */
  normalizedCandidate: string;
  /** Composite score in [0, 1] */
  score: number;
  /** 1-based position in the ranking */
  rank: number;
  /** Position of the candidate in the input sequence */
  index: number;
  breakdown: ScoreBreakdown;
}

// ============================================
// CLASSIFICATION
// ============================================

/**
 * Outcome of matching one name against a candidate set.
 *
 * - EXACT_MATCH: some candidate has the same normalized form
 * - CANDIDATES_FOUND: the best candidate reaches the viability threshold
 * - NO_VIABLE_CANDIDATE: nothing reaches the threshold (or no candidates)
 */
export type MatchStatus = 'EXACT_MATCH' | 'CANDIDATES_FOUND' | 'NO_VIABLE_CANDIDATE';

/**
 * Complete result of matching one name.
 */
export interface NameMatchResult {
  query: string;
  normalizedQuery: string;
  status: MatchStatus;
  exactMatch: boolean;
  candidates: RankedCandidate[];
  explanation: string;
}
