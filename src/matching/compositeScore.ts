/**
 * Composite Score Calculator
 *
 * Combines the three sub-scores into one similarity value:
 *
 *   composite = (wN × ngram + wP × prefix + wE × edit) / (wN + wP + wE)
 *
 * With the default weights (0.5 / 0.3 / 0.2) the denominator is 1, so this
 * is exactly 0.5 × ngram + 0.3 × prefix + 0.2 × edit. Dividing by the total
 * keeps custom weights on the same [0, 1] scale.
 */

import { calculateNgramScore, calculatePrefixScore, calculateEditScore } from './nameSimilarity';
import type { MatchWeights, ScoreBreakdown, SubScores } from './types';

/**
 * Weighted combination of already computed sub-scores, clamped to [0, 1].
 *
 * @example
 * calculateCompositeScore(
 *   { ngramScore: 1, prefixScore: 0.5, editScore: 0 },
 *   { ngramWeight: 0.5, prefixWeight: 0.3, editWeight: 0.2 }
 * ) // Returns: 0.65
 */
export function calculateCompositeScore(subScores: SubScores, weights: MatchWeights): number {
  const totalWeight = weights.ngramWeight + weights.prefixWeight + weights.editWeight;

  const weighted =
    weights.ngramWeight * subScores.ngramScore +
    weights.prefixWeight * subScores.prefixScore +
    weights.editWeight * subScores.editScore;

  return Math.max(0, Math.min(1, weighted / totalWeight));
}

/**
 * Scores two normalized names.
 *
 * Identical names are a perfect match on every measure and skip the
 * computation.
 */
export function scoreNormalizedPair(
  normalizedA: string,
  normalizedB: string,
  weights: MatchWeights
): ScoreBreakdown {
  if (normalizedA === normalizedB) {
    return { ngramScore: 1, prefixScore: 1, editScore: 1, compositeScore: 1 };
  }

  const subScores: SubScores = {
    ngramScore: calculateNgramScore(normalizedA, normalizedB),
    prefixScore: calculatePrefixScore(normalizedA, normalizedB),
    editScore: calculateEditScore(normalizedA, normalizedB),
  };

  return {
    ...subScores,
    compositeScore: calculateCompositeScore(subScores, weights),
  };
}

export default calculateCompositeScore;
