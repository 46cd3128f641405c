import * as fs from 'fs';
import * as path from 'path';
import {
  EntityOutcome,
  EntityOutcomeSet,
} from '../../src/summary-extraction/domain/entities/entity-outcome.entity';
import { ClinicalDocument } from '../../src/summary-extraction/domain/entities/clinical-document.entity';
import { ClinicalSummary } from '../../src/summary-extraction/domain/entities/clinical-summary.entity';
import { EntityPayload } from '../../src/summary-extraction/domain/entities/entity-payload.type';
import { HospitalSummary } from '../../src/summary-extraction/domain/entities/hospital-summary.entity';
import { EntityKind } from '../../src/summary-extraction/domain/enums/entity-kind.enum';
import { ExtractionStatus } from '../../src/summary-extraction/domain/enums/extraction-status.enum';
import {
  EntityExtractorPort,
  ExtractionContext,
} from '../../src/summary-extraction/domain/ports/entity-extractor.port';
import { ENTITY_DEFINITIONS } from '../../src/summary-extraction/domain/registry/extraction.registry';
import { validateEntityPayload } from '../../src/summary-extraction/domain/utils/payload-validation.util';

const FIXTURES_PATH = path.resolve(
  __dirname,
  '../fixtures/extraction-payloads.json',
);

export const TEST_PATIENT_ID = 'patient-0001';
export const TEST_NOTE_TEXT =
  'Admitted via the emergency department with productive cough and fever. Chest x-ray showed right lower lobe consolidation.';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fresh copy of the raw extractor result for one kind
 */
export function payloadFixture(kind: EntityKind): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(FIXTURES_PATH, 'utf8'));
  const fixture = isRecord(parsed) ? parsed[kind] : undefined;
  if (!isRecord(fixture)) {
    throw new Error(`Missing payload fixture for '${kind}'`);
  }
  return fixture;
}

export function testDocument(
  overrides: Partial<ClinicalDocument> = {},
): ClinicalDocument {
  return {
    patientId: TEST_PATIENT_ID,
    text: TEST_NOTE_TEXT,
    ...overrides,
  };
}

/**
 * Validated payload for one kind, built from the fixture
 */
export function validPayload<K extends EntityKind>(
  kind: K,
  raw: unknown = payloadFixture(kind),
): EntityPayload<K> {
  return validateEntityPayload(ENTITY_DEFINITIONS[kind], raw);
}

export function successOutcome<K extends EntityKind>(
  kind: K,
  payload: EntityPayload<K> = validPayload(kind),
): EntityOutcome<K> {
  return { kind, status: ExtractionStatus.SUCCESS, payload, durationMs: 5 };
}

export function failedOutcome<K extends EntityKind>(
  kind: K,
  error = 'extractor failed',
  status:
    | ExtractionStatus.FAILED
    | ExtractionStatus.TIMED_OUT = ExtractionStatus.FAILED,
): EntityOutcome<K> {
  return { kind, status, error, durationMs: 5 };
}

/**
 * Every kind successful unless overridden
 */
export function buildOutcomeSet(
  overrides: Partial<EntityOutcomeSet> = {},
): EntityOutcomeSet {
  return {
    [EntityKind.PRESENTATION]:
      overrides[EntityKind.PRESENTATION] ??
      successOutcome(EntityKind.PRESENTATION),
    [EntityKind.HISTORY]:
      overrides[EntityKind.HISTORY] ?? successOutcome(EntityKind.HISTORY),
    [EntityKind.FINDINGS]:
      overrides[EntityKind.FINDINGS] ?? successOutcome(EntityKind.FINDINGS),
    [EntityKind.ASSESSMENT]:
      overrides[EntityKind.ASSESSMENT] ??
      successOutcome(EntityKind.ASSESSMENT),
    [EntityKind.COURSE]:
      overrides[EntityKind.COURSE] ?? successOutcome(EntityKind.COURSE),
    [EntityKind.FOLLOW_UP]:
      overrides[EntityKind.FOLLOW_UP] ?? successOutcome(EntityKind.FOLLOW_UP),
    [EntityKind.TREATMENTS]:
      overrides[EntityKind.TREATMENTS] ??
      successOutcome(EntityKind.TREATMENTS),
    [EntityKind.LABS]:
      overrides[EntityKind.LABS] ?? successOutcome(EntityKind.LABS),
    [EntityKind.FACILITY_TIMING]:
      overrides[EntityKind.FACILITY_TIMING] ??
      successOutcome(EntityKind.FACILITY_TIMING),
    [EntityKind.DIAGNOSIS]:
      overrides[EntityKind.DIAGNOSIS] ?? successOutcome(EntityKind.DIAGNOSIS),
    [EntityKind.MEDICATION_RISK]:
      overrides[EntityKind.MEDICATION_RISK] ??
      successOutcome(EntityKind.MEDICATION_RISK),
  };
}

export function sampleHospitalSummary(
  hospitalizationId: string,
  patientId: string = TEST_PATIENT_ID,
): HospitalSummary {
  const { facility, timing } = validPayload(EntityKind.FACILITY_TIMING);
  return {
    hospitalizationId,
    patientId,
    facility,
    timing,
    diagnosis: validPayload(EntityKind.DIAGNOSIS).diagnosis,
    medicationRiskAssessment: validPayload(EntityKind.MEDICATION_RISK)
      .medication_risk_assessment,
    lengthOfStayDays: 4,
  };
}

export function sampleClinicalSummary(
  hospitalizationId: string,
  patientId: string = TEST_PATIENT_ID,
): ClinicalSummary {
  const labs = validPayload(EntityKind.LABS);
  return {
    hospitalizationId,
    patientId,
    patientPresentation: validPayload(EntityKind.PRESENTATION)
      .patient_presentation,
    relevantHistory: validPayload(EntityKind.HISTORY).relevant_history,
    clinicalFindings: validPayload(EntityKind.FINDINGS).clinical_findings,
    clinicalAssessment: validPayload(EntityKind.ASSESSMENT)
      .clinical_assessment,
    hospitalCourse: validPayload(EntityKind.COURSE).hospital_course,
    followUpPlan: validPayload(EntityKind.FOLLOW_UP).follow_up_plan,
    treatmentsProcedures: validPayload(EntityKind.TREATMENTS)
      .treatments_procedures,
    labResults: labs.lab_results,
    labSummary: null,
    parsingModelVersion: 'test-model',
    parsedAt: new Date('2025-01-06T12:00:00.000Z'),
  };
}

export type ExtractorBehavior = (
  document: ClinicalDocument,
  context: ExtractionContext,
) => Promise<unknown>;

/**
 * Extractor stand-in: records its calls and delegates to a behavior
 */
export class FakeExtractor implements EntityExtractorPort {
  readonly calls: ExtractionContext[] = [];

  constructor(
    readonly kind: EntityKind,
    public behavior: ExtractorBehavior,
  ) {}

  extract(
    document: ClinicalDocument,
    context: ExtractionContext,
  ): Promise<unknown> {
    this.calls.push(context);
    return this.behavior(document, context);
  }
}

export type FakeExtractorSet = {
  [K in EntityKind]: FakeExtractor;
};

export const resolveFixture =
  (kind: EntityKind): ExtractorBehavior =>
  async () =>
    payloadFixture(kind);

/**
 * Never settles on its own; rejects once the extractor's signal aborts
 */
export const hangUntilAborted: ExtractorBehavior = (_document, context) =>
  new Promise((_resolve, reject) => {
    context.signal.addEventListener(
      'abort',
      () => reject(new Error('aborted')),
      { once: true },
    );
  });

export function createFakeExtractors(
  behaviors: Partial<Record<EntityKind, ExtractorBehavior>> = {},
): FakeExtractorSet {
  const fake = (kind: EntityKind): FakeExtractor =>
    new FakeExtractor(kind, behaviors[kind] ?? resolveFixture(kind));

  return {
    [EntityKind.PRESENTATION]: fake(EntityKind.PRESENTATION),
    [EntityKind.HISTORY]: fake(EntityKind.HISTORY),
    [EntityKind.FINDINGS]: fake(EntityKind.FINDINGS),
    [EntityKind.ASSESSMENT]: fake(EntityKind.ASSESSMENT),
    [EntityKind.COURSE]: fake(EntityKind.COURSE),
    [EntityKind.FOLLOW_UP]: fake(EntityKind.FOLLOW_UP),
    [EntityKind.TREATMENTS]: fake(EntityKind.TREATMENTS),
    [EntityKind.LABS]: fake(EntityKind.LABS),
    [EntityKind.FACILITY_TIMING]: fake(EntityKind.FACILITY_TIMING),
    [EntityKind.DIAGNOSIS]: fake(EntityKind.DIAGNOSIS),
    [EntityKind.MEDICATION_RISK]: fake(EntityKind.MEDICATION_RISK),
  };
}
