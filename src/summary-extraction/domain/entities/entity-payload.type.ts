import { EntityKind } from '../enums/entity-kind.enum';
import {
  AssessmentPayloadSchema,
  CoursePayloadSchema,
  DiagnosisPayloadSchema,
  FacilityTimingPayloadSchema,
  FindingsPayloadSchema,
  FollowUpPayloadSchema,
  HistoryPayloadSchema,
  LabsPayloadSchema,
  MedicationRiskPayloadSchema,
  PresentationPayloadSchema,
  TreatmentsPayloadSchema,
} from '../../schemas';

/**
 * Validated payload shape produced by each entity kind
 */
export type EntityPayloadMap = {
  [EntityKind.PRESENTATION]: PresentationPayloadSchema;
  [EntityKind.HISTORY]: HistoryPayloadSchema;
  [EntityKind.FINDINGS]: FindingsPayloadSchema;
  [EntityKind.ASSESSMENT]: AssessmentPayloadSchema;
  [EntityKind.COURSE]: CoursePayloadSchema;
  [EntityKind.FOLLOW_UP]: FollowUpPayloadSchema;
  [EntityKind.TREATMENTS]: TreatmentsPayloadSchema;
  [EntityKind.LABS]: LabsPayloadSchema;
  [EntityKind.FACILITY_TIMING]: FacilityTimingPayloadSchema;
  [EntityKind.DIAGNOSIS]: DiagnosisPayloadSchema;
  [EntityKind.MEDICATION_RISK]: MedicationRiskPayloadSchema;
};

export type EntityPayload<K extends EntityKind> = EntityPayloadMap[K];
