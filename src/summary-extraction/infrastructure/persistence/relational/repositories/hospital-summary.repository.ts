import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { HospitalSummary } from '../../../../domain/entities/hospital-summary.entity';
import { PersistenceFailureError } from '../../../../domain/errors/extraction.errors';
import { HospitalSummaryRepositoryPort } from '../../../../domain/ports/hospital-summary.repository.port';
import { SummaryWriteOptions } from '../../../../domain/ports/summary-write-options.type';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { HospitalSummaryEntity } from '../entities/hospital-summary.entity';
import { HospitalSummaryMapper } from '../mappers/hospital-summary.mapper';

const DEFAULT_LIST_LIMIT = 10;

@Injectable()
export class HospitalSummaryRepositoryAdapter
  implements HospitalSummaryRepositoryPort
{
  private readonly logger = new Logger(HospitalSummaryRepositoryAdapter.name);

  constructor(
    @InjectRepository(HospitalSummaryEntity)
    private readonly hospitalSummaryRepository: Repository<
      HospitalSummaryEntity
    >,
  ) {}

  async upsert(
    summary: HospitalSummary,
    options: SummaryWriteOptions = {},
  ): Promise<HospitalSummary> {
    const entity = HospitalSummaryMapper.toPersistence(summary);

    // Upsert and read-back commit together; an abort in between rolls back
    const saved = await this.hospitalSummaryRepository.manager.transaction(
      async (manager) => {
        await manager.upsert(HospitalSummaryEntity, entity, {
          conflictPaths: ['hospitalizationId'],
        });
        options.signal?.throwIfAborted();
        return manager.findOne(HospitalSummaryEntity, {
          where: { hospitalizationId: summary.hospitalizationId },
        });
      },
    );
    if (!saved) {
      throw new PersistenceFailureError(
        `Hospital summary for ${summary.hospitalizationId} not found after upsert`,
      );
    }

    this.logger.debug(
      `[REPOSITORY] Upserted hospital summary ${saved.id} for ${saved.hospitalizationId}`,
    );
    return HospitalSummaryMapper.toDomain(saved);
  }

  async findById(id: string): Promise<NullableType<HospitalSummary>> {
    const entity = await this.hospitalSummaryRepository.findOne({
      where: { id },
    });
    return entity ? HospitalSummaryMapper.toDomain(entity) : null;
  }

  async findByHospitalizationId(
    hospitalizationId: string,
  ): Promise<NullableType<HospitalSummary>> {
    const entity = await this.hospitalSummaryRepository.findOne({
      where: { hospitalizationId },
    });
    return entity ? HospitalSummaryMapper.toDomain(entity) : null;
  }

  async findByPatientId(
    patientId: string,
    options?: { limit?: number },
  ): Promise<HospitalSummary[]> {
    const entities = await this.hospitalSummaryRepository.find({
      where: { patientId },
      order: { createdAt: 'DESC' },
      take: options?.limit ?? DEFAULT_LIST_LIMIT,
    });
    return entities.map((entity) => HospitalSummaryMapper.toDomain(entity));
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.hospitalSummaryRepository.delete({ id });
    return (result.affected ?? 0) > 0;
  }
}
