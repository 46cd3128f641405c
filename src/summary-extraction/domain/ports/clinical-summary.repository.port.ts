import { ClinicalSummary } from '../entities/clinical-summary.entity';
import { NullableType } from '../../../utils/types/nullable.type';
import { SummaryWriteOptions } from './summary-write-options.type';

export interface ClinicalSummaryRepositoryPort {
  // Insert or update in place, keyed by hospitalizationId
  upsert(
    summary: ClinicalSummary,
    options?: SummaryWriteOptions,
  ): Promise<ClinicalSummary>;

  findById(id: string): Promise<NullableType<ClinicalSummary>>;
  findByHospitalizationId(
    hospitalizationId: string,
  ): Promise<NullableType<ClinicalSummary>>;
  findByPatientId(
    patientId: string,
    options?: { limit?: number },
  ): Promise<ClinicalSummary[]>; // Newest first

  // False when no record had this id
  delete(id: string): Promise<boolean>;
}
