import { ClinicalDocument } from '../entities/clinical-document.entity';
import { EntityKind } from '../enums/entity-kind.enum';

export interface ExtractionContext {
  hospitalizationId: string;
  // Aborted on timeout or when the caller cancels the document
  signal: AbortSignal;
}

/**
 * Entity Extractor Port
 *
 * One instance per entity kind. Given the document text, resolve with the
 * raw entity payload or reject. The result is validated against the kind's
 * schema by the orchestrator, so implementations return unknown.
 */
export interface EntityExtractorPort {
  readonly kind: EntityKind;
  extract(
    document: ClinicalDocument,
    context: ExtractionContext,
  ): Promise<unknown>;
}
