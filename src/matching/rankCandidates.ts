/**
 * Candidate Ranking
 *
 * Scores a query against every name of a candidate set and returns the
 * best ones.
 *
 * Flow:
 * 1. Resolve and validate the matcher configuration
 * 2. Normalize the query (candidates are normalized once per set)
 * 3. Score every candidate
 * 4. Sort by score, ties keep the candidate set order
 * 5. Return the top N, whatever their score
 */

import { normalizeName } from './normalizeName';
import { scoreNormalizedPair } from './compositeScore';
import { resolveMatcherConfig } from './matcherConfig';
import type { CandidateEntry, MatcherConfig, RankedCandidate, ScoreBreakdown } from './types';

interface ScoredEntry {
  entry: CandidateEntry;
  index: number;
  breakdown: ScoreBreakdown;
}

/**
 * Pairs every raw candidate with its normalized form.
 * Build once per request and reuse it for every query.
 */
export function buildCandidateSet(candidates: readonly string[]): CandidateEntry[] {
  return candidates.map((raw) => ({ raw, normalized: normalizeName(raw) }));
}

/**
 * True if a candidate has exactly the given normalized form.
 */
export function hasExactMatch(
  normalizedQuery: string,
  candidateSet: readonly CandidateEntry[]
): boolean {
  return candidateSet.some((entry) => entry.normalized === normalizedQuery);
}

/**
 * True if the query and some candidate normalize to the same string.
 *
 * @example
 * isExactMatch("サンプル㈱", ["さんぷる株式会社"]) // Returns: true
 */
export function isExactMatch(query: string, candidates: readonly string[]): boolean {
  return hasExactMatch(normalizeName(query), buildCandidateSet(candidates));
}

/**
 * Ranks a prebuilt candidate set against a query.
 *
 * @param query - Raw query name
 * @param candidateSet - Candidates with their normalized forms
 * @param overrides - Matcher configuration overrides
 * @returns At most topN entries, best first
 * @throws ConfigurationError if the configuration is invalid
 */
export function rankCandidateSet(
  query: string,
  candidateSet: readonly CandidateEntry[],
  overrides: Partial<MatcherConfig> = {}
): RankedCandidate[] {
  const config = resolveMatcherConfig(overrides);
  const normalizedQuery = normalizeName(query);

  const scored: ScoredEntry[] = candidateSet.map((entry, index) => ({
    entry,
    index,
    breakdown: scoreNormalizedPair(normalizedQuery, entry.normalized, config),
  }));

  scored.sort(
    (a, b) => b.breakdown.compositeScore - a.breakdown.compositeScore || a.index - b.index
  );

  return scored.slice(0, config.topN).map(({ entry, index, breakdown }, position) => ({
    candidate: entry.raw,
    normalizedCandidate: entry.normalized,
    score: breakdown.compositeScore,
    rank: position + 1,
    index,
    breakdown,
  }));
}

/**
 * Ranks raw candidate names against a query.
 *
 * This function is pure and deterministic - given the same inputs,
 * it will always return the same output.
 *
 * @example
 * rankCandidates("サンプル商事", ["サンプル商事株式会社", "サンプル商事", "別会社"])
 * // Returns: [
 * //   { candidate: "サンプル商事株式会社", score: 1, rank: 1, ... },
 * //   { candidate: "サンプル商事", score: 1, rank: 2, ... },
 * //   { candidate: "別会社", score: 0, rank: 3, ... },
 * // ]
 */
export function rankCandidates(
  query: string,
  candidates: readonly string[],
  overrides: Partial<MatcherConfig> = {}
): RankedCandidate[] {
  return rankCandidateSet(query, buildCandidateSet(candidates), overrides);
}

export default rankCandidates;
