export enum ExtractionStatus {
  SUCCESS = 'success',
  FAILED = 'failed', // extractor threw, returned invalid data, or was cancelled
  TIMED_OUT = 'timed_out',
}
