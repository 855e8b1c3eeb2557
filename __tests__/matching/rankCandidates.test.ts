/**
 * Tests for candidate ranking
 */

import {
  buildCandidateSet,
  isExactMatch,
  rankCandidates,
  rankCandidateSet,
} from '../../src/matching/rankCandidates';
import { ConfigurationError } from '../../src/matching/errors';

describe('buildCandidateSet', () => {
  it('should pair raw names with their normalized form', () => {
    expect(buildCandidateSet(['サンプル㈱', 'ＡＢＣ'])).toEqual([
      { raw: 'サンプル㈱', normalized: 'さんぷる' },
      { raw: 'ＡＢＣ', normalized: 'abc' },
    ]);
  });
});

describe('isExactMatch', () => {
  it('should match names that normalize identically', () => {
    expect(isExactMatch('サンプル㈱', ['さんぷる株式会社'])).toBe(true);
  });

  it('should not match different names', () => {
    expect(isExactMatch('テスト商事', ['テスト商会'])).toBe(false);
  });

  it('should be false without candidates', () => {
    expect(isExactMatch('テスト', [])).toBe(false);
  });
});

describe('rankCandidates', () => {
  it('should rank normalized duplicates first, keeping input order on ties', () => {
    const ranked = rankCandidates('サンプル商事', ['サンプル商事株式会社', 'サンプル商事', '別会社']);

    expect(ranked.map(({ candidate, score, rank, index }) => ({ candidate, score, rank, index }))).toEqual([
      { candidate: 'サンプル商事株式会社', score: 1, rank: 1, index: 0 },
      { candidate: 'サンプル商事', score: 1, rank: 2, index: 1 },
      { candidate: '別会社', score: 0, rank: 3, index: 2 },
    ]);
    expect(ranked[0]?.normalizedCandidate).toBe('さんぷる商事');
  });

  it('should sort by descending score', () => {
    // 商会: ngram 3/5, prefix 4/5, edit 4/5 → 0.7
    // テスト: ngram 2/4, prefix 3/3, edit 3/5 → 0.67
    const ranked = rankCandidates('テスト商事', ['テスト', 'テスト商会']);

    expect(ranked.map((entry) => entry.candidate)).toEqual(['テスト商会', 'テスト']);
    expect(ranked[0]?.score).toBeCloseTo(0.7, 10);
    expect(ranked[1]?.score).toBeCloseTo(0.67, 10);
    expect(ranked[1]?.breakdown).toEqual({
      ngramScore: 0.5,
      prefixScore: 1,
      editScore: expect.closeTo(0.6, 10),
      compositeScore: expect.closeTo(0.67, 10),
    });
  });

  it('should return at most topN candidates', () => {
    const ranked = rankCandidates('abc', ['abc', 'abd', 'xyz', 'abe'], { topN: 2 });

    expect(ranked).toHaveLength(2);
    expect(ranked.map((entry) => entry.rank)).toEqual([1, 2]);
  });

  it('should return every candidate when there are fewer than topN', () => {
    expect(rankCandidates('abc', ['xyz'])).toHaveLength(1);
  });

  it('should score every candidate 0 when the query normalizes to nothing', () => {
    const ranked = rankCandidates('株式会社', ['Ａ', 'ab']);

    expect(ranked.map(({ candidate, score }) => ({ candidate, score }))).toEqual([
      { candidate: 'Ａ', score: 0 },
      { candidate: 'ab', score: 0 },
    ]);
    expect(ranked[0]?.breakdown).toEqual({
      ngramScore: 0,
      prefixScore: 0,
      editScore: 0,
      compositeScore: 0,
    });
  });

  it('should return candidates below the threshold', () => {
    const ranked = rankCandidates('abc', ['xyz']);

    expect(ranked[0]?.score).toBe(0);
  });

  it('should return an empty list without candidates', () => {
    expect(rankCandidates('abc', [])).toEqual([]);
  });

  it('should score an empty query against an empty candidate as identical', () => {
    const ranked = rankCandidates('', ['']);

    expect(ranked[0]?.score).toBe(1);
  });

  it('should apply custom weights', () => {
    // prefix only: "abxy" shares 2 of 4 leading characters, "xbcd" none
    const ranked = rankCandidates('abcd', ['xbcd', 'abxy'], {
      ngramWeight: 0,
      prefixWeight: 1,
      editWeight: 0,
    });

    expect(ranked.map((entry) => [entry.candidate, entry.score])).toEqual([
      ['abxy', 0.5],
      ['xbcd', 0],
    ]);
  });

  it('should throw ConfigurationError for invalid configuration, even without candidates', () => {
    expect(() => rankCandidates('abc', [], { topN: 0 })).toThrow(ConfigurationError);
    expect(() =>
      rankCandidates('abc', ['abc'], { ngramWeight: 0, prefixWeight: 0, editWeight: 0 })
    ).toThrow(ConfigurationError);
  });

  it('should be deterministic', () => {
    const candidates = ['テスト商会', 'テスト', 'テスト商事㈱', '別会社'];

    expect(rankCandidates('テスト商事', candidates)).toEqual(rankCandidates('テスト商事', candidates));
  });
});

describe('rankCandidateSet', () => {
  it('should rank a prebuilt set the same way as raw names', () => {
    const names = ['テスト商会', 'テスト'];
    const set = buildCandidateSet(names);

    expect(rankCandidateSet('テスト商事', set)).toEqual(rankCandidates('テスト商事', names));
  });
});
