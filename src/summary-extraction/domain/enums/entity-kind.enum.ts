/**
 * Categories of structured fact extracted from a clinical note.
 * Each kind has exactly one extractor and belongs to exactly one summary group.
 */
export enum EntityKind {
  // Clinical summary sections
  PRESENTATION = 'presentation',
  HISTORY = 'history',
  FINDINGS = 'findings',
  ASSESSMENT = 'assessment',
  COURSE = 'course',
  FOLLOW_UP = 'follow_up',
  TREATMENTS = 'treatments',
  LABS = 'labs',

  // Hospital summary sections
  FACILITY_TIMING = 'facility_timing', // yields both facility and timing
  DIAGNOSIS = 'diagnosis',
  MEDICATION_RISK = 'medication_risk',
}

export type ClinicalEntityKind =
  | EntityKind.PRESENTATION
  | EntityKind.HISTORY
  | EntityKind.FINDINGS
  | EntityKind.ASSESSMENT
  | EntityKind.COURSE
  | EntityKind.FOLLOW_UP
  | EntityKind.TREATMENTS
  | EntityKind.LABS;

export type HospitalEntityKind =
  | EntityKind.FACILITY_TIMING
  | EntityKind.DIAGNOSIS
  | EntityKind.MEDICATION_RISK;

export const CLINICAL_ENTITY_KINDS: readonly ClinicalEntityKind[] = [
  EntityKind.PRESENTATION,
  EntityKind.HISTORY,
  EntityKind.FINDINGS,
  EntityKind.ASSESSMENT,
  EntityKind.COURSE,
  EntityKind.FOLLOW_UP,
  EntityKind.TREATMENTS,
  EntityKind.LABS,
];

export const HOSPITAL_ENTITY_KINDS: readonly HospitalEntityKind[] = [
  EntityKind.FACILITY_TIMING,
  EntityKind.DIAGNOSIS,
  EntityKind.MEDICATION_RISK,
];

export const ALL_ENTITY_KINDS: readonly EntityKind[] = [
  ...CLINICAL_ENTITY_KINDS,
  ...HOSPITAL_ENTITY_KINDS,
];
