import { HospitalSummary } from '../entities/hospital-summary.entity';
import { NullableType } from '../../../utils/types/nullable.type';
import { SummaryWriteOptions } from './summary-write-options.type';

export interface HospitalSummaryRepositoryPort {
  // Insert or update in place, keyed by hospitalizationId
  upsert(
    summary: HospitalSummary,
    options?: SummaryWriteOptions,
  ): Promise<HospitalSummary>;

  findById(id: string): Promise<NullableType<HospitalSummary>>;
  findByHospitalizationId(
    hospitalizationId: string,
  ): Promise<NullableType<HospitalSummary>>;
  findByPatientId(
    patientId: string,
    options?: { limit?: number },
  ): Promise<HospitalSummary[]>; // Newest first

  // False when no record had this id
  delete(id: string): Promise<boolean>;
}
