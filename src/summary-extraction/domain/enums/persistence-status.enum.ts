export enum PersistenceStatus {
  PERSISTED = 'persisted',
  FAILED = 'failed',
}

/**
 * Why an aggregate did not reach its store.
 * ASSEMBLY_FAILURE means no write was attempted.
 */
export enum AggregateFailureType {
  ASSEMBLY_FAILURE = 'assembly_failure',
  PERSISTENCE_FAILURE = 'persistence_failure',
  CANCELLED = 'cancelled',
}
