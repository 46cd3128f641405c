import {
  AssessmentDataSchema,
  CourseDataSchema,
  FindingsDataSchema,
  FollowUpDataSchema,
  HistoryDataSchema,
  LabSummarySchema,
  LabTestSchema,
  PresentationDataSchema,
  TreatmentSchema,
} from '../../schemas';

/**
 * Clinical Summary aggregate
 *
 * Every section key is always present; a section is null when its
 * extractor failed. Assembly never fails on a missing clinical section.
 */
export interface ClinicalSummary {
  id?: string;
  hospitalizationId: string;
  patientId: string;

  patientPresentation: PresentationDataSchema | null;
  relevantHistory: HistoryDataSchema | null;
  clinicalFindings: FindingsDataSchema | null;
  clinicalAssessment: AssessmentDataSchema | null;
  hospitalCourse: CourseDataSchema | null;
  followUpPlan: FollowUpDataSchema | null;
  treatmentsProcedures: TreatmentSchema[] | null;
  labResults: LabTestSchema[] | null;
  labSummary: LabSummarySchema | null; // Null exactly when labResults is null

  parsingModelVersion: string | null;
  parsedAt: Date;

  createdAt?: Date;
  updatedAt?: Date;
}
