/**
 * Matching Service
 *
 * Thin layer between the HTTP routes and the matching engine: applies the
 * environment's matcher defaults and logs what was done.
 */

import { matcherDefaults } from '../config';
import { normalizeName, matchName, resolveMatcherConfig } from '../matching';
import type { MatcherConfig, NameMatchResult } from '../matching';
import { Logging } from '../utils';

export interface NormalizedValue {
  value: string;
  normalized: string;
}

export class MatchingService {
  constructor(private readonly defaults: Readonly<MatcherConfig>) {}

  /**
   * Effective configuration for a request.
   *
   * @throws ConfigurationError if the merged configuration is invalid
   */
  resolveConfig(overrides: Partial<MatcherConfig> = {}): MatcherConfig {
    return resolveMatcherConfig(overrides, this.defaults);
  }

  normalizeMany(values: readonly string[]): NormalizedValue[] {
    return values.map((value) => ({ value, normalized: normalizeName(value) }));
  }

  /**
   * Ranks candidates for one query.
   */
  rank(
    query: string,
    candidates: readonly string[],
    overrides: Partial<MatcherConfig> = {}
  ): NameMatchResult {
    const config = this.resolveConfig(overrides);
    const result = matchName(query, candidates, config);

    Logging.debug(
      `🔎 "${query}" vs ${candidates.length} candidates → ${result.status}` +
        (result.candidates[0] ? ` (best "${result.candidates[0].candidate}")` : '')
    );

    return result;
  }
}

export const matchingService = new MatchingService(matcherDefaults);

export default matchingService;
