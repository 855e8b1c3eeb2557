/**
 * Matcher configuration: defaults, merging and validation.
 *
 * Configuration is a plain value handed to every scoring call. There is no
 * process-wide mutable setting, so concurrent callers can use different
 * weights safely.
 */

import {
  DEFAULT_WEIGHTS,
  DEFAULT_TOP_N,
  DEFAULT_MIN_SCORE_THRESHOLD,
} from './constants';
import { ConfigurationError } from './errors';
import type { MatcherConfig } from './types';

export const DEFAULT_MATCHER_CONFIG: Readonly<MatcherConfig> = Object.freeze({
  ngramWeight: DEFAULT_WEIGHTS.NGRAM,
  prefixWeight: DEFAULT_WEIGHTS.PREFIX,
  editWeight: DEFAULT_WEIGHTS.EDIT,
  topN: DEFAULT_TOP_N,
  minScoreThreshold: DEFAULT_MIN_SCORE_THRESHOLD,
});

/**
 * Throws ConfigurationError unless the weights are finite, sum to a positive
 * value and topN is at least 1. Invalid values are never corrected silently.
 */
export function validateMatcherConfig(config: MatcherConfig): void {
  const weights = `ngram=${config.ngramWeight}, prefix=${config.prefixWeight}, edit=${config.editWeight}`;

  if (![config.ngramWeight, config.prefixWeight, config.editWeight].every(Number.isFinite)) {
    throw new ConfigurationError(`Matcher weights must be finite numbers (${weights})`);
  }

  const totalWeight = config.ngramWeight + config.prefixWeight + config.editWeight;
  if (!(totalWeight > 0)) {
    throw new ConfigurationError(
      `Matcher weights must sum to a positive value (${weights})`
    );
  }

  if (!(config.topN >= 1)) {
    throw new ConfigurationError(`topN must be at least 1 (got ${config.topN})`);
  }
}

/**
 * Merges overrides onto a base configuration and validates the result.
 * Keys explicitly set to undefined fall back to the base value.
 *
 * @param overrides - Values to change
 * @param base - Starting point, the built-in defaults unless given
 *
 * @example
 * resolveMatcherConfig({ topN: 5 })
 * // Returns: { ngramWeight: 0.5, prefixWeight: 0.3, editWeight: 0.2, topN: 5, minScoreThreshold: 0.8 }
 */
export function resolveMatcherConfig(
  overrides: Partial<MatcherConfig> = {},
  base: Readonly<MatcherConfig> = DEFAULT_MATCHER_CONFIG
): MatcherConfig {
  const config: MatcherConfig = {
    ngramWeight: overrides.ngramWeight ?? base.ngramWeight,
    prefixWeight: overrides.prefixWeight ?? base.prefixWeight,
    editWeight: overrides.editWeight ?? base.editWeight,
    topN: overrides.topN ?? base.topN,
    minScoreThreshold: overrides.minScoreThreshold ?? base.minScoreThreshold,
  };

  validateMatcherConfig(config);

  return config;
}

export default resolveMatcherConfig;
