import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ClinicalSummary } from '../../../../domain/entities/clinical-summary.entity';
import { PersistenceFailureError } from '../../../../domain/errors/extraction.errors';
import { ClinicalSummaryRepositoryPort } from '../../../../domain/ports/clinical-summary.repository.port';
import { SummaryWriteOptions } from '../../../../domain/ports/summary-write-options.type';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { ClinicalSummaryEntity } from '../entities/clinical-summary.entity';
import { ClinicalSummaryMapper } from '../mappers/clinical-summary.mapper';

const DEFAULT_LIST_LIMIT = 10;

@Injectable()
export class ClinicalSummaryRepositoryAdapter
  implements ClinicalSummaryRepositoryPort
{
  private readonly logger = new Logger(ClinicalSummaryRepositoryAdapter.name);

  constructor(
    @InjectRepository(ClinicalSummaryEntity)
    private readonly clinicalSummaryRepository: Repository<
      ClinicalSummaryEntity
    >,
  ) {}

  async upsert(
    summary: ClinicalSummary,
    options: SummaryWriteOptions = {},
  ): Promise<ClinicalSummary> {
    const entity = ClinicalSummaryMapper.toPersistence(summary);

    // Upsert and read-back commit together; an abort in between rolls back
    const saved = await this.clinicalSummaryRepository.manager.transaction(
      async (manager) => {
        await manager.upsert(ClinicalSummaryEntity, entity, {
          conflictPaths: ['hospitalizationId'],
        });
        options.signal?.throwIfAborted();
        return manager.findOne(ClinicalSummaryEntity, {
          where: { hospitalizationId: summary.hospitalizationId },
        });
      },
    );
    if (!saved) {
      throw new PersistenceFailureError(
        `Clinical summary for ${summary.hospitalizationId} not found after upsert`,
      );
    }

    this.logger.debug(
      `[REPOSITORY] Upserted clinical summary ${saved.id} for ${saved.hospitalizationId}`,
    );
    return ClinicalSummaryMapper.toDomain(saved);
  }

  async findById(id: string): Promise<NullableType<ClinicalSummary>> {
    const entity = await this.clinicalSummaryRepository.findOne({
      where: { id },
    });
    return entity ? ClinicalSummaryMapper.toDomain(entity) : null;
  }

  async findByHospitalizationId(
    hospitalizationId: string,
  ): Promise<NullableType<ClinicalSummary>> {
    const entity = await this.clinicalSummaryRepository.findOne({
      where: { hospitalizationId },
    });
    return entity ? ClinicalSummaryMapper.toDomain(entity) : null;
  }

  async findByPatientId(
    patientId: string,
    options?: { limit?: number },
  ): Promise<ClinicalSummary[]> {
    const entities = await this.clinicalSummaryRepository.find({
      where: { patientId },
      order: { createdAt: 'DESC' },
      take: options?.limit ?? DEFAULT_LIST_LIMIT,
    });
    return entities.map((entity) => ClinicalSummaryMapper.toDomain(entity));
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.clinicalSummaryRepository.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}
