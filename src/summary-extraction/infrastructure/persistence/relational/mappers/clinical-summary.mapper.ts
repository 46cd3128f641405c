import { ClinicalSummary } from '../../../../domain/entities/clinical-summary.entity';
import { ClinicalSummaryEntity } from '../entities/clinical-summary.entity';

export class ClinicalSummaryMapper {
  static toDomain(entity: ClinicalSummaryEntity): ClinicalSummary {
    return {
      id: entity.id,
      hospitalizationId: entity.hospitalizationId,
      patientId: entity.patientId,
      patientPresentation: entity.patientPresentation,
      relevantHistory: entity.relevantHistory,
      clinicalFindings: entity.clinicalFindings,
      clinicalAssessment: entity.clinicalAssessment,
      hospitalCourse: entity.hospitalCourse,
      followUpPlan: entity.followUpPlan,
      treatmentsProcedures: entity.treatmentsProcedures,
      labResults: entity.labResults,
      labSummary: entity.labSummary,
      parsingModelVersion: entity.parsingModelVersion,
      parsedAt: entity.parsedAt,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(domain: ClinicalSummary): ClinicalSummaryEntity {
    const entity = new ClinicalSummaryEntity();
    if (domain.id) entity.id = domain.id;
    entity.hospitalizationId = domain.hospitalizationId;
    entity.patientId = domain.patientId;
    entity.patientPresentation = domain.patientPresentation;
    entity.relevantHistory = domain.relevantHistory;
    entity.clinicalFindings = domain.clinicalFindings;
    entity.clinicalAssessment = domain.clinicalAssessment;
    entity.hospitalCourse = domain.hospitalCourse;
    entity.followUpPlan = domain.followUpPlan;
    entity.treatmentsProcedures = domain.treatmentsProcedures;
    entity.labResults = domain.labResults;
    entity.labSummary = domain.labSummary;
    entity.parsingModelVersion = domain.parsingModelVersion;
    entity.parsedAt = domain.parsedAt;
    return entity;
  }
}
