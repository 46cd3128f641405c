import {
  DiagnosisDataSchema,
  FacilityDataSchema,
  RiskAssessmentSchema,
  TimingDataSchema,
} from '../../schemas';

/**
 * Hospital Admission Summary aggregate
 *
 * All sections are mandatory. lengthOfStayDays is derived from the timing
 * dates at assembly and is never taken from extractor output.
 */
export interface HospitalSummary {
  id?: string;
  hospitalizationId: string;
  patientId: string;

  facility: FacilityDataSchema;
  timing: TimingDataSchema;
  diagnosis: DiagnosisDataSchema;
  medicationRiskAssessment: RiskAssessmentSchema;

  lengthOfStayDays: number; // >= 0

  createdAt?: Date;
  updatedAt?: Date;
}
