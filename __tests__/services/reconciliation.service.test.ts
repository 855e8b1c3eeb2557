import { ReconciliationService } from '../../src/services/reconciliation.service';
import { DEFAULT_MATCHER_CONFIG } from '../../src/matching/matcherConfig';
import { AppError } from '../../src/utils/AppError';

const file = (originalname: string, lines: string[]) => ({
  originalname,
  buffer: Buffer.from(`${lines.join('\n')}\n`, 'utf-8'),
});

const IMPORT_FILE = file('import.csv', [
  '伝票番号,借方補助科目,貸方補助科目,借方部門,貸方部門',
  '10,,テスト商会,営業部,',
  '11,,,,',
]);

const JOURNAL_FILE = file('journal.csv', [
  '借方取引先名,貸方取引先名,借方部門,貸方部門',
  'テスト商事,,営業部,',
]);

const NOW = new Date(2024, 0, 2, 3, 4);

describe('ReconciliationService', () => {
  const service = new ReconciliationService(DEFAULT_MATCHER_CONFIG);

  describe('checkNames', () => {
    it('should renumber vouchers and check names against the journal', () => {
      const result = service.checkNames(IMPORT_FILE, [JOURNAL_FILE], NOW);

      expect(result.rows).toEqual([
        { 伝票番号: '01020304001', 借方取引先: '', 貸方取引先: 'テスト商会', 借方部門: '営業部', 貸方部門: '' },
        { 伝票番号: '01020304002', 借方取引先: '', 貸方取引先: '', 借方部門: '', 貸方部門: '' },
      ]);
      expect(result.masterData).toEqual({ journalFiles: 1, partners: 1, departments: 1 });

      // てすと商会 vs てすと商事: ngram 3/5, prefix 4/5, edit 4/5
      const partner = result.checks[0]?.partner;
      expect(partner?.status).toBe('NO_VIABLE_CANDIDATE');
      expect(partner?.candidates[0]?.candidate).toBe('テスト商事');
      expect(partner?.candidates[0]?.score).toBeCloseTo(0.7, 10);

      expect(result.summary.partner).toEqual({
        checked: 1,
        exactMatches: 0,
        candidatesFound: 0,
        noViableCandidate: 1,
      });
    });

    it('should report renamed headers for an import file without data rows', () => {
      const headerOnly = file('empty.csv', ['伝票番号,借方補助科目,貸方補助科目,借方部門,貸方部門']);

      const result = service.checkNames(headerOnly, [JOURNAL_FILE], NOW);

      expect(result.rows).toEqual([]);
      expect(result.importFile.headers).toEqual(['伝票番号', '借方取引先', '貸方取引先', '借方部門', '貸方部門']);
      expect(result.summary.totalRows).toBe(0);
    });

    it('should use the configured threshold', () => {
      const lenient = new ReconciliationService({ ...DEFAULT_MATCHER_CONFIG, minScoreThreshold: 0.6 });
      const result = lenient.checkNames(IMPORT_FILE, [JOURNAL_FILE], NOW);

      expect(result.checks[0]?.partner?.status).toBe('CANDIDATES_FOUND');
    });

    it('should require at least one journal file', () => {
      expect(() => service.checkNames(IMPORT_FILE, [], NOW)).toThrow(
        'At least one journal file is required'
      );
    });

    it('should reject an import file without 伝票番号', () => {
      const bad = file('bad.csv', ['摘要', 'memo']);

      try {
        service.checkNames(bad, [JOURNAL_FILE], NOW);
        throw new Error('expected an AppError');
      } catch (error) {
        expect(error).toBeInstanceOf(AppError);
        if (error instanceof AppError) {
          expect(error.statusCode).toBe(422);
          expect(error.message).toBe('Import file bad.csv is missing required columns: 伝票番号');
        }
      }
    });
  });

  describe('finalize', () => {
    it('should apply the selections', () => {
      expect(
        service.finalize([{ 伝票番号: '1', 借方取引先: '', 貸方取引先: 'テスト商会' }], [{ partner: 'テスト商事' }])
      ).toEqual([{ 伝票番号: '1', 借方取引先: 'テスト商事', 貸方取引先: 'テスト商事' }]);
    });
  });
});
