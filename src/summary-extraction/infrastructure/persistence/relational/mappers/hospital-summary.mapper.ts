import { HospitalSummary } from '../../../../domain/entities/hospital-summary.entity';
import { HospitalSummaryEntity } from '../entities/hospital-summary.entity';

export class HospitalSummaryMapper {
  static toDomain(entity: HospitalSummaryEntity): HospitalSummary {
    return {
      id: entity.id,
      hospitalizationId: entity.hospitalizationId,
      patientId: entity.patientId,
      facility: entity.facility,
      timing: entity.timing,
      diagnosis: entity.diagnosis,
      medicationRiskAssessment: entity.medicationRiskAssessment,
      lengthOfStayDays: entity.lengthOfStayDays,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(domain: HospitalSummary): HospitalSummaryEntity {
    const entity = new HospitalSummaryEntity();
    if (domain.id) entity.id = domain.id;
    entity.hospitalizationId = domain.hospitalizationId;
    entity.patientId = domain.patientId;
    entity.facility = domain.facility;
    entity.timing = domain.timing;
    entity.diagnosis = domain.diagnosis;
    entity.medicationRiskAssessment = domain.medicationRiskAssessment;
    entity.lengthOfStayDays = domain.lengthOfStayDays;
    return entity;
  }
}
