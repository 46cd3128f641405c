/**
 * Combined status of one processed document
 * - COMPLETED: both summaries persisted
 * - PARTIAL: exactly one summary persisted
 * - FAILED: neither summary persisted
 */
export enum ProcessingStatus {
  COMPLETED = 'completed',
  PARTIAL = 'partial',
  FAILED = 'failed',
}
