import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { ProcessingStatus } from '../enums/processing-status.enum';
import { SummaryGroup } from '../enums/summary-group.enum';
import { PersistenceOutcome } from './persistence-outcome.entity';

export interface EntityExtractionReport {
  kind: EntityKind;
  group: SummaryGroup;
  status: ExtractionStatus;
  durationMs: number;
  error?: string;
}

/**
 * Combined result of one processed document
 */
export interface SummaryExtractionResult {
  hospitalizationId: string;
  patientId: string;
  status: ProcessingStatus;
  // e.g. "clinical summary saved, hospital summary failed: missing diagnosis"
  message: string;
  clinical: PersistenceOutcome;
  hospital: PersistenceOutcome;
  extractions: EntityExtractionReport[];
  durationMs: number;
}
