/**
 * Name Matching Entry Point
 *
 * Ranks the candidates for one name and classifies the outcome the way the
 * review sheet colors it:
 * - EXACT_MATCH (green): same normalized form as a known name
 * - CANDIDATES_FOUND (yellow): best candidate at or above the threshold
 * - NO_VIABLE_CANDIDATE (red): nothing close enough
 */

import { normalizeName } from './normalizeName';
import { buildCandidateSet, hasExactMatch, rankCandidateSet } from './rankCandidates';
import { resolveMatcherConfig } from './matcherConfig';
import type {
  CandidateEntry,
  MatcherConfig,
  MatchStatus,
  NameMatchResult,
  RankedCandidate,
} from './types';

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Determines the match status from the ranking.
 *
 * @param ranked - Ranked candidates, best first
 * @param exactMatch - Whether a candidate shares the normalized form
 * @param threshold - Minimum score for a viable candidate
 */
export function determineMatchStatus(
  ranked: readonly RankedCandidate[],
  exactMatch: boolean,
  threshold: number
): MatchStatus {
  if (exactMatch) {
    return 'EXACT_MATCH';
  }

  const best = ranked[0];
  if (best && best.score >= threshold) {
    return 'CANDIDATES_FOUND';
  }

  return 'NO_VIABLE_CANDIDATE';
}

/**
 * Generates a human-readable explanation of a match result.
 */
export function generateExplanation(
  normalizedQuery: string,
  ranked: readonly RankedCandidate[],
  status: MatchStatus
): string {
  const parts: string[] = [];

  parts.push(`Normalized query: "${normalizedQuery}"`);

  const best = ranked[0];
  if (best) {
    const { ngramScore, prefixScore, editScore } = best.breakdown;
    parts.push(
      `Best candidate: "${best.candidate}" (score ${round2(best.score)}: ` +
        `ngram ${round2(ngramScore)}, prefix ${round2(prefixScore)}, edit ${round2(editScore)})`
    );
  } else {
    parts.push('No candidates to compare against');
  }

  parts.push(`Status: ${status}`);

  return parts.join('. ');
}

/**
 * Matches one name against a prebuilt candidate set.
 *
 * @throws ConfigurationError if the configuration is invalid
 */
export function matchNameAgainstSet(
  query: string,
  candidateSet: readonly CandidateEntry[],
  overrides: Partial<MatcherConfig> = {}
): NameMatchResult {
  const config = resolveMatcherConfig(overrides);
  const normalizedQuery = normalizeName(query);

  const candidates = rankCandidateSet(query, candidateSet, config);
  const exactMatch = hasExactMatch(normalizedQuery, candidateSet);
  const status = determineMatchStatus(candidates, exactMatch, config.minScoreThreshold);

  return {
    query,
    normalizedQuery,
    status,
    exactMatch,
    candidates,
    explanation: generateExplanation(normalizedQuery, candidates, status),
  };
}

/**
 * Matches one name against raw candidate names.
 *
 * @example
 * matchName("サンプル㈱", ["サンプル株式会社", "テスト商事"]).status // Returns: "EXACT_MATCH"
 */
export function matchName(
  query: string,
  candidates: readonly string[],
  overrides: Partial<MatcherConfig> = {}
): NameMatchResult {
  return matchNameAgainstSet(query, buildCandidateSet(candidates), overrides);
}

export default matchName;
