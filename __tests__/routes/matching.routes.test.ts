import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';

describe('Matching Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('POST /api/v1/matching/normalize', () => {
    it('should normalize every value', async () => {
      const response = await request(app)
        .post('/api/v1/matching/normalize')
        .send({ values: ['サンプル商事株式会社', 'ＡＢＣ', '株式会社'] });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.message).toBe('Normalized 3 values');
      expect(response.body.data.results).toEqual([
        { value: 'サンプル商事株式会社', normalized: 'さんぷる商事' },
        { value: 'ＡＢＣ', normalized: 'abc' },
        { value: '株式会社', normalized: '' },
      ]);
    });

    it('should reject an empty list', async () => {
      const response = await request(app).post('/api/v1/matching/normalize').send({ values: [] });

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.error).toMatch(/^Validation failed: /);
    });

    it('should reject non-string values', async () => {
      const response = await request(app).post('/api/v1/matching/normalize').send({ values: [1] });

      expect(response.status).toBe(400);
    });
  });

  describe('POST /api/v1/matching/rank', () => {
    it('should rank candidates and classify the result', async () => {
      const response = await request(app)
        .post('/api/v1/matching/rank')
        .send({ query: 'サンプル㈱', candidates: ['テスト商事', 'サンプル株式会社'] });

      expect(response.status).toBe(200);
      expect(response.body.data.status).toBe('EXACT_MATCH');
      expect(response.body.data.normalizedQuery).toBe('さんぷる');
      expect(response.body.data.candidates[0]).toMatchObject({
        candidate: 'サンプル株式会社',
        score: 1,
        rank: 1,
        index: 1,
      });
      expect(response.body.message).toBe(response.body.data.explanation);
    });

    it('should apply configuration overrides', async () => {
      const response = await request(app)
        .post('/api/v1/matching/rank')
        .send({ query: 'abc', candidates: ['abc', 'abd', 'xyz'], config: { topN: 1 } });

      expect(response.status).toBe(200);
      expect(response.body.data.candidates).toHaveLength(1);
    });

    it('should return 400 for an invalid matcher configuration', async () => {
      const response = await request(app)
        .post('/api/v1/matching/rank')
        .send({
          query: 'abc',
          candidates: ['abc'],
          config: { ngramWeight: 0, prefixWeight: 0, editWeight: 0 },
        });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe(
        'Matcher weights must sum to a positive value (ngram=0, prefix=0, edit=0)'
      );
    });

    it('should return 400 for a topN below 1', async () => {
      const response = await request(app)
        .post('/api/v1/matching/rank')
        .send({ query: 'abc', candidates: ['abc'], config: { topN: 0 } });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('topN must be at least 1 (got 0)');
    });

    it('should reject unknown configuration keys', async () => {
      const response = await request(app)
        .post('/api/v1/matching/rank')
        .send({ query: 'abc', candidates: [], config: { weights: 1 } });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Validation failed: /);
    });

    it('should answer an empty candidate list with NO_VIABLE_CANDIDATE', async () => {
      const response = await request(app)
        .post('/api/v1/matching/rank')
        .send({ query: 'abc', candidates: [] });

      expect(response.status).toBe(200);
      expect(response.body.data.status).toBe('NO_VIABLE_CANDIDATE');
      expect(response.body.data.candidates).toEqual([]);
    });
  });
});
