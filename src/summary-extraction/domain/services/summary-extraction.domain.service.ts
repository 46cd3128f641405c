import { Injectable, Logger } from '@nestjs/common';
import {
  AuditService,
  ExtractionEventType,
} from '../../../audit/audit.service';
import { ClinicalDocument } from '../entities/clinical-document.entity';
import { EntityOutcomeSet } from '../entities/entity-outcome.entity';
import {
  EntityExtractionReport,
  SummaryExtractionResult,
} from '../entities/extraction-result.entity';
import { ALL_ENTITY_KINDS } from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { PersistenceStatus } from '../enums/persistence-status.enum';
import { ProcessingStatus } from '../enums/processing-status.enum';
import { ExtractionCancelledError } from '../errors/extraction.errors';
import { groupOf } from '../registry/extraction.registry';
import {
  describeProcessingResult,
  resolveProcessingStatus,
} from '../utils/processing-status.util';
import { AggregateAssemblerDomainService } from './aggregate-assembler.domain.service';
import { CorrelationIdAllocatorDomainService } from './correlation-id-allocator.domain.service';
import { ExtractionOrchestratorDomainService } from './extraction-orchestrator.domain.service';
import { PersistenceCoordinatorDomainService } from './persistence-coordinator.domain.service';

const AUDIT_EVENT_BY_STATUS: Record<ProcessingStatus, ExtractionEventType> = {
  [ProcessingStatus.COMPLETED]:
    ExtractionEventType.SUMMARY_EXTRACTION_COMPLETED,
  [ProcessingStatus.PARTIAL]: ExtractionEventType.SUMMARY_EXTRACTION_PARTIAL,
  [ProcessingStatus.FAILED]: ExtractionEventType.SUMMARY_EXTRACTION_FAILED,
};

/**
 * SummaryExtractionDomainService
 *
 * document -> hospitalization id -> fan-out/fan-in over all extractors
 * -> clinical + hospital aggregates -> concurrent upserts -> combined result.
 *
 * Processing one document holds no process-wide state, so documents are
 * fully isolated from each other, cancellation included.
 */
@Injectable()
export class SummaryExtractionDomainService {
  private readonly logger = new Logger(SummaryExtractionDomainService.name);

  constructor(
    private readonly allocator: CorrelationIdAllocatorDomainService,
    private readonly orchestrator: ExtractionOrchestratorDomainService,
    private readonly assembler: AggregateAssemblerDomainService,
    private readonly coordinator: PersistenceCoordinatorDomainService,
    private readonly auditService: AuditService,
  ) {}

  /**
   * @throws ExtractionCancelledError when `signal` aborts before the writes
   * are issued. Every other failure is reported in the result.
   */
  async process(
    document: ClinicalDocument,
    signal?: AbortSignal,
  ): Promise<SummaryExtractionResult> {
    const startedAt = Date.now();
    const hospitalizationId = this.allocator.allocate(document);
    const { patientId } = document;

    this.auditService.logExtractionEvent({
      event: ExtractionEventType.SUMMARY_EXTRACTION_STARTED,
      hospitalizationId,
      patientId,
      success: true,
      metadata: { textLength: document.text.length },
    });

    const outcomes = await this.orchestrator.run(
      document,
      hospitalizationId,
      signal,
    );
    this.throwIfCancelled(hospitalizationId, patientId, startedAt, signal);

    const { clinical, hospital } = this.assembler.assemble(
      outcomes,
      hospitalizationId,
      patientId,
    );

    const persisted = await this.coordinator.persist(
      clinical,
      hospital,
      hospitalizationId,
      signal,
    );

    const status = resolveProcessingStatus(
      persisted.clinical,
      persisted.hospital,
    );
    const message = describeProcessingResult(
      persisted.clinical,
      persisted.hospital,
    );
    const extractions = this.reportExtractions(outcomes);
    const durationMs = Date.now() - startedAt;

    this.auditService.logExtractionEvent({
      event: AUDIT_EVENT_BY_STATUS[status],
      hospitalizationId,
      patientId,
      success: status !== ProcessingStatus.FAILED,
      clinicalRecordId:
        persisted.clinical.status === PersistenceStatus.PERSISTED
          ? persisted.clinical.recordId
          : undefined,
      hospitalRecordId:
        persisted.hospital.status === PersistenceStatus.PERSISTED
          ? persisted.hospital.recordId
          : undefined,
      durationMs,
      errorMessage: status === ProcessingStatus.COMPLETED ? undefined : message,
      metadata: {
        succeededKinds: extractions.filter(
          (report) => report.status === ExtractionStatus.SUCCESS,
        ).length,
        failedKinds: extractions
          .filter((report) => report.status !== ExtractionStatus.SUCCESS)
          .map((report) => report.kind),
      },
    });

    this.logger.log(
      `[PIPELINE] ${hospitalizationId}: ${status} in ${durationMs}ms (${message})`,
    );

    return {
      hospitalizationId,
      patientId,
      status,
      message,
      clinical: persisted.clinical,
      hospital: persisted.hospital,
      extractions,
      durationMs,
    };
  }

  private throwIfCancelled(
    hospitalizationId: string,
    patientId: string,
    startedAt: number,
    signal?: AbortSignal,
  ): void {
    if (!signal?.aborted) {
      return;
    }

    this.auditService.logExtractionEvent({
      event: ExtractionEventType.SUMMARY_EXTRACTION_CANCELLED,
      hospitalizationId,
      patientId,
      success: false,
      durationMs: Date.now() - startedAt,
    });
    this.logger.warn(`[PIPELINE] ${hospitalizationId}: cancelled by caller`);
    throw new ExtractionCancelledError(hospitalizationId);
  }

  private reportExtractions(
    outcomes: EntityOutcomeSet,
  ): EntityExtractionReport[] {
    return ALL_ENTITY_KINDS.map((kind) => {
      const outcome = outcomes[kind];
      return {
        kind,
        group: groupOf(kind),
        status: outcome.status,
        durationMs: outcome.durationMs,
        ...(outcome.status === ExtractionStatus.SUCCESS
          ? {}
          : { error: outcome.error }),
      };
    });
  }
}
