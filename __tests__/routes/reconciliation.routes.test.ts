import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../../src/app';

const IMPORT_CSV = [
  '伝票番号,借方補助科目,貸方補助科目,借方部門,貸方部門',
  '1,,テスト商事,営業部,',
  '1,,,,',
  '2,サンプル㈱,,,営業',
  '',
].join('\n');

const JOURNAL_CSV = [
  '借方取引先名,貸方取引先名,借方部門,貸方部門',
  'サンプル株式会社,テスト商事,営業部,管理部',
  '',
].join('\n');

const csv = (text: string): Buffer => Buffer.from(text, 'utf-8');

describe('Reconciliation Endpoints', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  describe('POST /api/v1/reconciliation/check', () => {
    it('should prepare the import rows and check their names', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('importFile', csv(IMPORT_CSV), 'import.csv')
        .attach('journalFiles', csv(JOURNAL_CSV), 'journal.csv');

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);

      const { data } = response.body;
      expect(data.importFile).toEqual({
        name: 'import.csv',
        encoding: 'utf-8',
        headers: ['伝票番号', '借方取引先', '貸方取引先', '借方部門', '貸方部門'],
      });
      expect(data.masterData).toEqual({ journalFiles: 1, partners: 2, departments: 2 });

      expect(data.rows).toHaveLength(3);
      expect(data.rows[0]['伝票番号']).toMatch(/^\d{8}001$/);
      expect(data.rows[1]['伝票番号']).toBe(data.rows[0]['伝票番号']);
      expect(data.rows[2]['伝票番号']).toMatch(/^\d{8}002$/);
      expect(data.rows[2]['借方取引先']).toBe('サンプル㈱');

      expect(data.checks[0].partner).toEqual({
        source: 'テスト商事',
        status: 'EXACT_MATCH',
        exactMatch: true,
        candidates: [],
      });
      expect(data.checks[1]).toEqual({ rowNumber: 2, partner: null, department: null });
      expect(data.checks[2].partner.status).toBe('EXACT_MATCH');
      expect(data.checks[2].department.status).toBe('NO_VIABLE_CANDIDATE');
      expect(data.checks[2].department.candidates[0].candidate).toBe('営業部');

      expect(data.summary).toEqual({
        totalRows: 3,
        partner: { checked: 2, exactMatches: 2, candidatesFound: 0, noViableCandidate: 0 },
        department: { checked: 2, exactMatches: 1, candidatesFound: 0, noViableCandidate: 1 },
      });
      expect(response.body.message).toBe('Checked 3 rows against 2 partners and 2 departments');
    });

    it('should merge several journal files', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('importFile', csv(IMPORT_CSV), 'import.csv')
        .attach('journalFiles', csv(JOURNAL_CSV), 'journal-2023.csv')
        .attach('journalFiles', csv('借方取引先名\n別会社\n'), 'journal-2024.csv');

      expect(response.status).toBe(200);
      expect(response.body.data.masterData).toEqual({ journalFiles: 2, partners: 3, departments: 2 });
    });

    it('should return 400 without a multipart body', async () => {
      const response = await request(app).post('/api/v1/reconciliation/check').send({});

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Expected multipart fields importFile and journalFiles');
    });

    it('should return 400 without journal files', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('importFile', csv(IMPORT_CSV), 'import.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('No journal files uploaded. Use field name "journalFiles"');
    });

    it('should return 400 without an import file', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('journalFiles', csv(JOURNAL_CSV), 'journal.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('No import file uploaded. Use field name "importFile"');
    });

    it('should return 422 when the import file lacks 伝票番号', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('importFile', csv('摘要\nmemo\n'), 'import.csv')
        .attach('journalFiles', csv(JOURNAL_CSV), 'journal.csv');

      expect(response.status).toBe(422);
      expect(response.body.error).toBe('Import file import.csv is missing required columns: 伝票番号');
    });

    it('should reject files that are not CSV', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('importFile', Buffer.from('{}'), 'data.json');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Only CSV files are allowed (got data.json)');
    });

    it('should return 413 for files over the upload limit', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/check')
        .attach('importFile', Buffer.alloc(8192, 0x61), 'import.csv');

      expect(response.status).toBe(413);
      expect(response.body.error).toBe('Upload rejected: File too large');
    });
  });

  describe('POST /api/v1/reconciliation/finalize', () => {
    it('should apply selections and unify names per voucher', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/finalize')
        .send({
          rows: [
            { 伝票番号: 'V1', 借方取引先: '', 貸方取引先: 'テスト商亊', 借方部門: '', 貸方部門: '' },
            { 伝票番号: 'V1', 借方取引先: '', 貸方取引先: '', 借方部門: '営業部', 貸方部門: '' },
          ],
          selections: [{ partner: 'テスト商事' }, null],
        });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Finalized 2 rows');
      expect(response.body.data.rows).toEqual([
        { 伝票番号: 'V1', 借方取引先: 'テスト商事', 貸方取引先: 'テスト商事', 借方部門: '営業部', 貸方部門: '営業部' },
        { 伝票番号: 'V1', 借方取引先: 'テスト商事', 貸方取引先: 'テスト商事', 借方部門: '営業部', 貸方部門: '営業部' },
      ]);
    });

    it('should default to no selections', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/finalize')
        .send({ rows: [{ 伝票番号: '1', 貸方取引先: 'A社' }] });

      expect(response.status).toBe(200);
      expect(response.body.data.rows).toEqual([{ 伝票番号: '1', 貸方取引先: 'A社', 借方取引先: 'A社' }]);
    });

    it('should reject non-string cells', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliation/finalize')
        .send({ rows: [{ 伝票番号: 1 }] });

      expect(response.status).toBe(400);
      expect(response.body.error).toMatch(/^Validation failed: /);
    });
  });
});
