export { healthService, HealthService } from './health.service';
export { matchingService, MatchingService } from './matching.service';
export type { NormalizedValue } from './matching.service';
export { reconciliationService, ReconciliationService } from './reconciliation.service';
export type { UploadedCsv, ReconciliationCheckResult } from './reconciliation.service';
