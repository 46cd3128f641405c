import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  buildOutcomeSet,
  failedOutcome,
  payloadFixture,
  successOutcome,
  TEST_PATIENT_ID,
  validPayload,
} from '../../../../test/utils/extraction-fixtures';
import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { AssemblyFailureError } from '../errors/extraction.errors';
import { FacilityType } from '../../schemas';
import { AggregateAssemblerDomainService } from './aggregate-assembler.domain.service';

describe('AggregateAssemblerDomainService', () => {
  let assembler: AggregateAssemblerDomainService;
  const now = new Date('2025-01-06T12:00:00.000Z');

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AggregateAssemblerDomainService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) =>
              key === 'summaryExtraction.llm.model' ? 'gpt-4o-mini' : undefined,
            ),
          },
        },
      ],
    }).compile();

    assembler = module.get(AggregateAssemblerDomainService);
  });

  describe('clinical summary', () => {
    it('should fill every section from successful outcomes', () => {
      const summary = assembler.assembleClinical(
        buildOutcomeSet(),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(summary.hospitalizationId).toBe('hosp-1');
      expect(summary.patientId).toBe(TEST_PATIENT_ID);
      expect(summary.patientPresentation?.symptoms).toEqual([
        'productive cough',
        'fever',
        'shortness of breath',
      ]);
      expect(summary.clinicalAssessment?.primary_diagnosis).toBe(
        'community-acquired pneumonia',
      );
      expect(summary.treatmentsProcedures).toHaveLength(1);
      expect(summary.labResults).toHaveLength(3);
      expect(summary.parsingModelVersion).toBe('gpt-4o-mini');
      expect(summary.parsedAt).toBe(now);
    });

    it('should compute the lab summary from the results', () => {
      const summary = assembler.assembleClinical(
        buildOutcomeSet(),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(summary.labSummary).toEqual({
        total_tests: 3,
        critical_count: 1,
        abnormal_count: 1,
        normal_count: 1,
      });
    });

    it('should leave a failed section null and keep the rest', () => {
      const summary = assembler.assembleClinical(
        buildOutcomeSet({
          [EntityKind.PRESENTATION]: failedOutcome(EntityKind.PRESENTATION),
          [EntityKind.COURSE]: failedOutcome(
            EntityKind.COURSE,
            "Extractor 'course' timed out after 50ms",
            ExtractionStatus.TIMED_OUT,
          ),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(summary.patientPresentation).toBeNull();
      expect(summary.hospitalCourse).toBeNull();
      expect(summary.relevantHistory).not.toBeNull();
      expect(summary.followUpPlan).not.toBeNull();
    });

    it('should null both lab fields when labs failed', () => {
      const summary = assembler.assembleClinical(
        buildOutcomeSet({ [EntityKind.LABS]: failedOutcome(EntityKind.LABS) }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(summary.labResults).toBeNull();
      expect(summary.labSummary).toBeNull();
    });

    it('should still assemble when every clinical kind failed', () => {
      const { clinical } = assembler.assemble(
        buildOutcomeSet({
          [EntityKind.PRESENTATION]: failedOutcome(EntityKind.PRESENTATION),
          [EntityKind.HISTORY]: failedOutcome(EntityKind.HISTORY),
          [EntityKind.FINDINGS]: failedOutcome(EntityKind.FINDINGS),
          [EntityKind.ASSESSMENT]: failedOutcome(EntityKind.ASSESSMENT),
          [EntityKind.COURSE]: failedOutcome(EntityKind.COURSE),
          [EntityKind.FOLLOW_UP]: failedOutcome(EntityKind.FOLLOW_UP),
          [EntityKind.TREATMENTS]: failedOutcome(EntityKind.TREATMENTS),
          [EntityKind.LABS]: failedOutcome(EntityKind.LABS),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(clinical.assembled).toBe(true);
    });
  });

  describe('hospital summary', () => {
    it('should assemble with a computed length of stay', () => {
      const hospital = assembler.assembleHospital(
        buildOutcomeSet(),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      if (!hospital.assembled) {
        throw hospital.failure;
      }
      expect(hospital.aggregate.lengthOfStayDays).toBe(4);
      expect(hospital.aggregate.hospitalizationId).toBe('hosp-1');
      expect(hospital.aggregate.facility.facility_name).toBe(
        'Riverside Community Hospital',
      );
      expect(hospital.aggregate.facility.facility_type).toBe(
        FacilityType.ACUTE_CARE,
      );
      expect(hospital.aggregate.diagnosis.primary_diagnosis_icd10).toBe(
        'J18.9',
      );
    });

    it('should stamp a missing assessed_at with the assembly time', () => {
      const hospital = assembler.assembleHospital(
        buildOutcomeSet(),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital).toMatchObject({
        assembled: true,
        aggregate: {
          medicationRiskAssessment: {
            assessed_at: '2025-01-06T12:00:00.000Z',
            risk_level: 'low',
          },
        },
      });
    });

    it('should keep an extracted assessed_at', () => {
      const payload = validPayload(EntityKind.MEDICATION_RISK);
      payload.medication_risk_assessment.assessed_at =
        '2025-01-05T09:00:00.000Z';

      const hospital = assembler.assembleHospital(
        buildOutcomeSet({
          [EntityKind.MEDICATION_RISK]: successOutcome(
            EntityKind.MEDICATION_RISK,
            payload,
          ),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital).toMatchObject({
        assembled: true,
        aggregate: {
          medicationRiskAssessment: { assessed_at: '2025-01-05T09:00:00.000Z' },
        },
      });
    });

    it('should fail naming the missing mandatory kind', () => {
      const hospital = assembler.assembleHospital(
        buildOutcomeSet({
          [EntityKind.DIAGNOSIS]: failedOutcome(EntityKind.DIAGNOSIS),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital.assembled).toBe(false);
      if (hospital.assembled) {
        return;
      }
      expect(hospital.failure).toBeInstanceOf(AssemblyFailureError);
      expect(hospital.failure.kinds).toEqual([EntityKind.DIAGNOSIS]);
      expect(hospital.failure.message).toBe('missing diagnosis');
    });

    it('should list every missing kind in order', () => {
      const hospital = assembler.assembleHospital(
        buildOutcomeSet({
          [EntityKind.FACILITY_TIMING]: failedOutcome(
            EntityKind.FACILITY_TIMING,
            "Extractor 'facility_timing' timed out after 50ms",
            ExtractionStatus.TIMED_OUT,
          ),
          [EntityKind.MEDICATION_RISK]: failedOutcome(
            EntityKind.MEDICATION_RISK,
          ),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital).toMatchObject({
        assembled: false,
        failure: {
          kinds: [EntityKind.FACILITY_TIMING, EntityKind.MEDICATION_RISK],
          message: 'missing facility_timing, medication_risk',
        },
      });
    });

    it('should fail when discharge precedes admission', () => {
      const payload = validPayload(EntityKind.FACILITY_TIMING);
      payload.timing.admission_date = '2025-01-05';
      payload.timing.discharge_date = '2025-01-01';

      const hospital = assembler.assembleHospital(
        buildOutcomeSet({
          [EntityKind.FACILITY_TIMING]: successOutcome(
            EntityKind.FACILITY_TIMING,
            payload,
          ),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital).toMatchObject({
        assembled: false,
        failure: {
          kinds: [EntityKind.FACILITY_TIMING],
          message: 'invalid timing: discharge_date precedes admission_date',
        },
      });
    });

    it('should fail on an unparseable admission date', () => {
      const raw = payloadFixture(EntityKind.FACILITY_TIMING);
      raw.timing = {
        admission_date: 'last Tuesday',
        discharge_date: '2025-01-05',
      };

      const hospital = assembler.assembleHospital(
        buildOutcomeSet({
          [EntityKind.FACILITY_TIMING]: successOutcome(
            EntityKind.FACILITY_TIMING,
            validPayload(EntityKind.FACILITY_TIMING, raw),
          ),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital).toMatchObject({
        assembled: false,
        failure: { message: 'invalid timing: malformed admission_date' },
      });
    });

    it('should assemble a same-day discharge with zero days', () => {
      const payload = validPayload(EntityKind.FACILITY_TIMING);
      payload.timing.discharge_date = payload.timing.admission_date;

      const hospital = assembler.assembleHospital(
        buildOutcomeSet({
          [EntityKind.FACILITY_TIMING]: successOutcome(
            EntityKind.FACILITY_TIMING,
            payload,
          ),
        }),
        'hosp-1',
        TEST_PATIENT_ID,
        now,
      );

      expect(hospital).toMatchObject({
        assembled: true,
        aggregate: { lengthOfStayDays: 0 },
      });
    });
  });

  it('should keep the clinical summary when the hospital summary fails', () => {
    const { clinical, hospital } = assembler.assemble(
      buildOutcomeSet({
        [EntityKind.FACILITY_TIMING]: failedOutcome(EntityKind.FACILITY_TIMING),
      }),
      'hosp-1',
      TEST_PATIENT_ID,
      now,
    );

    expect(clinical.assembled).toBe(true);
    expect(hospital.assembled).toBe(false);
  });
});
