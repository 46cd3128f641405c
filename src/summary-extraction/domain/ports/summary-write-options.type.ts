export interface SummaryWriteOptions {
  /** Aborting rolls back a write that has not committed yet */
  signal?: AbortSignal;
}
