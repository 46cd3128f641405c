import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ClinicalSummary } from '../entities/clinical-summary.entity';
import { EntityPayload } from '../entities/entity-payload.type';
import {
  EntityOutcome,
  EntityOutcomeSet,
  isSuccessfulOutcome,
} from '../entities/entity-outcome.entity';
import { HospitalSummary } from '../entities/hospital-summary.entity';
import { AssembledAggregate } from '../entities/persistence-outcome.entity';
import {
  CLINICAL_ENTITY_KINDS,
  EntityKind,
} from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { AssemblyFailureError } from '../errors/extraction.errors';
import { ensureLabSummary } from '../utils/lab-summary.util';
import { calculateLengthOfStay } from '../utils/length-of-stay.util';

export interface AssembledSummaries {
  clinical: AssembledAggregate<ClinicalSummary>;
  hospital: AssembledAggregate<HospitalSummary>;
}

function payloadOf<K extends EntityKind>(
  outcome: EntityOutcome<K>,
): EntityPayload<K> | null {
  return isSuccessfulOutcome(outcome) ? outcome.payload : null;
}

/**
 * AggregateAssemblerDomainService
 *
 * Groups entity outcomes into the two aggregates.
 *
 * Clinical: every section optional, a failed kind leaves its section null.
 * Hospital: facility_timing, diagnosis and medication_risk are mandatory;
 * any of them missing, or unusable timing dates, fails the whole aggregate.
 */
@Injectable()
export class AggregateAssemblerDomainService {
  private readonly logger = new Logger(AggregateAssemblerDomainService.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  assemble(
    outcomes: EntityOutcomeSet,
    hospitalizationId: string,
    patientId: string,
    now: Date = new Date(),
  ): AssembledSummaries {
    const clinical = this.assembleClinical(
      outcomes,
      hospitalizationId,
      patientId,
      now,
    );
    const hospital = this.assembleHospital(
      outcomes,
      hospitalizationId,
      patientId,
      now,
    );

    if (hospital.assembled) {
      this.logger.log(
        `[ASSEMBLER] ${hospitalizationId}: hospital summary assembled (length of stay ${hospital.aggregate.lengthOfStayDays}d)`,
      );
    } else {
      this.logger.warn(
        `[ASSEMBLER] ${hospitalizationId}: hospital summary not assembled, kinds: ${hospital.failure.kinds.join(', ')}`,
      );
    }

    return { clinical: { assembled: true, aggregate: clinical }, hospital };
  }

  assembleClinical(
    outcomes: EntityOutcomeSet,
    hospitalizationId: string,
    patientId: string,
    now: Date = new Date(),
  ): ClinicalSummary {
    const labs = payloadOf(outcomes[EntityKind.LABS]);

    const summary: ClinicalSummary = {
      hospitalizationId,
      patientId,
      patientPresentation:
        payloadOf(outcomes[EntityKind.PRESENTATION])?.patient_presentation ??
        null,
      relevantHistory:
        payloadOf(outcomes[EntityKind.HISTORY])?.relevant_history ?? null,
      clinicalFindings:
        payloadOf(outcomes[EntityKind.FINDINGS])?.clinical_findings ?? null,
      clinicalAssessment:
        payloadOf(outcomes[EntityKind.ASSESSMENT])?.clinical_assessment ??
        null,
      hospitalCourse:
        payloadOf(outcomes[EntityKind.COURSE])?.hospital_course ?? null,
      followUpPlan:
        payloadOf(outcomes[EntityKind.FOLLOW_UP])?.follow_up_plan ?? null,
      treatmentsProcedures:
        payloadOf(outcomes[EntityKind.TREATMENTS])?.treatments_procedures ??
        null,
      labResults: labs ? labs.lab_results : null,
      labSummary: labs
        ? ensureLabSummary(labs.lab_results, labs.lab_summary)
        : null,
      parsingModelVersion:
        this.configService.get('summaryExtraction.llm.model', {
          infer: true,
        }) ?? null,
      parsedAt: now,
    };

    const missing = CLINICAL_ENTITY_KINDS.filter(
      (kind) => outcomes[kind].status !== ExtractionStatus.SUCCESS,
    );
    if (missing.length > 0) {
      this.logger.warn(
        `[ASSEMBLER] ${hospitalizationId}: clinical summary degraded, null sections for: ${missing.join(', ')}`,
      );
    }

    return summary;
  }

  assembleHospital(
    outcomes: EntityOutcomeSet,
    hospitalizationId: string,
    patientId: string,
    now: Date = new Date(),
  ): AssembledAggregate<HospitalSummary> {
    const facilityTiming = outcomes[EntityKind.FACILITY_TIMING];
    const diagnosis = outcomes[EntityKind.DIAGNOSIS];
    const medicationRisk = outcomes[EntityKind.MEDICATION_RISK];

    if (
      !isSuccessfulOutcome(facilityTiming) ||
      !isSuccessfulOutcome(diagnosis) ||
      !isSuccessfulOutcome(medicationRisk)
    ) {
      const kinds = [facilityTiming, diagnosis, medicationRisk]
        .filter((outcome) => outcome.status !== ExtractionStatus.SUCCESS)
        .map((outcome) => outcome.kind);
      return {
        assembled: false,
        failure: new AssemblyFailureError(kinds, `missing ${kinds.join(', ')}`),
      };
    }

    const { facility, timing } = facilityTiming.payload;
    const lengthOfStay = calculateLengthOfStay(
      timing.admission_date,
      timing.discharge_date,
    );
    if (!lengthOfStay.valid) {
      return {
        assembled: false,
        failure: new AssemblyFailureError(
          [EntityKind.FACILITY_TIMING],
          `invalid timing: ${lengthOfStay.reason}`,
        ),
      };
    }

    const riskAssessment = medicationRisk.payload.medication_risk_assessment;

    return {
      assembled: true,
      aggregate: {
        hospitalizationId,
        patientId,
        facility,
        timing,
        diagnosis: diagnosis.payload.diagnosis,
        medicationRiskAssessment: {
          ...riskAssessment,
          assessed_at: riskAssessment.assessed_at || now.toISOString(),
        },
        lengthOfStayDays: lengthOfStay.days,
      },
    };
  }
}
