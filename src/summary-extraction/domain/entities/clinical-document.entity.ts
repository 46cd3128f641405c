/**
 * A submitted clinical note. Extractors receive it read-only.
 */
export interface ClinicalDocument {
  readonly patientId: string;
  readonly text: string;
  // Caller-supplied correlation id, reused verbatim for idempotent re-runs
  readonly hospitalizationId?: string;
}
