import { Inject, Injectable, Logger } from '@nestjs/common';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';
import { ClinicalSummary } from '../entities/clinical-summary.entity';
import { HospitalSummary } from '../entities/hospital-summary.entity';
import {
  AssembledAggregate,
  PersistenceOutcome,
} from '../entities/persistence-outcome.entity';
import {
  AggregateFailureType,
  PersistenceStatus,
} from '../enums/persistence-status.enum';
import { SummaryGroup } from '../enums/summary-group.enum';
import { PersistenceFailureError } from '../errors/extraction.errors';
import { ClinicalSummaryRepositoryPort } from '../ports/clinical-summary.repository.port';
import { HospitalSummaryRepositoryPort } from '../ports/hospital-summary.repository.port';

export interface PersistedSummaries {
  clinical: PersistenceOutcome;
  hospital: PersistenceOutcome;
}

/**
 * PersistenceCoordinatorDomainService
 *
 * Writes both aggregates concurrently. The writes share no transaction and
 * no lock: one failing never rolls back or blocks the other. Stores upsert
 * by hospitalization id, so a retried document updates its rows in place.
 *
 * An aggregate that failed assembly is reported as-is with zero attempts.
 * The caller's signal reaches the stores, which roll back an aborted write.
 */
@Injectable()
export class PersistenceCoordinatorDomainService {
  private readonly logger = new Logger(
    PersistenceCoordinatorDomainService.name,
  );

  constructor(
    @Inject('ClinicalSummaryRepositoryPort')
    private readonly clinicalSummaryRepository: ClinicalSummaryRepositoryPort,
    @Inject('HospitalSummaryRepositoryPort')
    private readonly hospitalSummaryRepository: HospitalSummaryRepositoryPort,
  ) {}

  async persist(
    clinical: AssembledAggregate<ClinicalSummary>,
    hospital: AssembledAggregate<HospitalSummary>,
    hospitalizationId: string,
    signal?: AbortSignal,
  ): Promise<PersistedSummaries> {
    const [clinicalOutcome, hospitalOutcome] = await Promise.all([
      this.persistAggregate(
        SummaryGroup.CLINICAL,
        clinical,
        hospitalizationId,
        (summary) =>
          this.clinicalSummaryRepository.upsert(summary, { signal }),
        signal,
      ),
      this.persistAggregate(
        SummaryGroup.HOSPITAL,
        hospital,
        hospitalizationId,
        (summary) =>
          this.hospitalSummaryRepository.upsert(summary, { signal }),
        signal,
      ),
    ]);

    return { clinical: clinicalOutcome, hospital: hospitalOutcome };
  }

  /**
   * Never rejects
   */
  private async persistAggregate<T extends { hospitalizationId: string }>(
    group: SummaryGroup,
    assembled: AssembledAggregate<T>,
    hospitalizationId: string,
    write: (aggregate: T) => Promise<{ id?: string }>,
    signal?: AbortSignal,
  ): Promise<PersistenceOutcome> {
    if (!assembled.assembled) {
      return {
        status: PersistenceStatus.FAILED,
        attempts: 0,
        failure: {
          type: AggregateFailureType.ASSEMBLY_FAILURE,
          message: assembled.failure.message,
          entityKinds: assembled.failure.kinds,
        },
      };
    }

    if (assembled.aggregate.hospitalizationId !== hospitalizationId) {
      return {
        status: PersistenceStatus.FAILED,
        attempts: 0,
        failure: {
          type: AggregateFailureType.PERSISTENCE_FAILURE,
          message: `${group} summary carries a different hospitalization id`,
          entityKinds: [],
        },
      };
    }

    if (signal?.aborted) {
      return {
        status: PersistenceStatus.FAILED,
        attempts: 0,
        failure: {
          type: AggregateFailureType.CANCELLED,
          message: 'cancelled before write',
          entityKinds: [],
        },
      };
    }

    try {
      const saved = await write(assembled.aggregate);
      if (!saved.id) {
        throw new PersistenceFailureError(
          `${group} store returned no record id`,
        );
      }

      this.logger.log(
        `[PERSISTENCE] ${hospitalizationId}: ${group} summary upserted as ${saved.id}`,
      );
      return {
        status: PersistenceStatus.PERSISTED,
        recordId: saved.id,
        attempts: 1,
      };
    } catch (error) {
      // The store rolled back the write it was given
      if (signal?.aborted) {
        this.logger.warn(
          `[PERSISTENCE] ${hospitalizationId}: ${group} summary write cancelled`,
        );
        return {
          status: PersistenceStatus.FAILED,
          attempts: 1,
          failure: {
            type: AggregateFailureType.CANCELLED,
            message: 'cancelled during write',
            entityKinds: [],
          },
        };
      }

      const message = sanitizeErrorMessage(
        error instanceof Error ? error.message : String(error),
      );
      this.logger.error(
        `[PERSISTENCE] ${hospitalizationId}: ${group} summary write failed: ${message}`,
      );
      return {
        status: PersistenceStatus.FAILED,
        attempts: 1,
        failure: {
          type: AggregateFailureType.PERSISTENCE_FAILURE,
          message: message || `${group} summary write failed`,
          entityKinds: [],
        },
      };
    }
  }
}
