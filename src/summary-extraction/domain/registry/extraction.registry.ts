import { Type } from '@nestjs/common';
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
import { EntityPayload } from '../entities/entity-payload.type';
import { EntityKind } from '../enums/entity-kind.enum';
import { SummaryGroup } from '../enums/summary-group.enum';
import { EntityExtractorPort } from '../ports/entity-extractor.port';

/**
 * Static definition of one entity kind
 */
export interface EntityDefinition<K extends EntityKind> {
  kind: K;
  /** Aggregate the kind contributes to */
  group: SummaryGroup;
  /** Schema the raw extractor result must satisfy */
  schema: Type<EntityPayload<K>>;
  /** Overrides the configured per-extractor timeout */
  timeoutMs?: number;
  /** Aggregate sections this kind fills */
  sections: string[];
}

export type EntityDefinitions = {
  [K in EntityKind]: EntityDefinition<K>;
};

/**
 * Entity kind definitions
 *
 * Closed table, one row per kind. facility_timing is a single extractor
 * filling two hospital sections, so one failure nulls both.
 */
export const ENTITY_DEFINITIONS: EntityDefinitions = {
  [EntityKind.PRESENTATION]: {
    kind: EntityKind.PRESENTATION,
    group: SummaryGroup.CLINICAL,
    schema: PresentationPayloadSchema,
    sections: ['patient_presentation'],
  },
  [EntityKind.HISTORY]: {
    kind: EntityKind.HISTORY,
    group: SummaryGroup.CLINICAL,
    schema: HistoryPayloadSchema,
    sections: ['relevant_history'],
  },
  [EntityKind.FINDINGS]: {
    kind: EntityKind.FINDINGS,
    group: SummaryGroup.CLINICAL,
    schema: FindingsPayloadSchema,
    sections: ['clinical_findings'],
  },
  [EntityKind.ASSESSMENT]: {
    kind: EntityKind.ASSESSMENT,
    group: SummaryGroup.CLINICAL,
    schema: AssessmentPayloadSchema,
    sections: ['clinical_assessment'],
  },
  [EntityKind.COURSE]: {
    kind: EntityKind.COURSE,
    group: SummaryGroup.CLINICAL,
    schema: CoursePayloadSchema,
    sections: ['hospital_course'],
  },
  [EntityKind.FOLLOW_UP]: {
    kind: EntityKind.FOLLOW_UP,
    group: SummaryGroup.CLINICAL,
    schema: FollowUpPayloadSchema,
    sections: ['follow_up_plan'],
  },
  [EntityKind.TREATMENTS]: {
    kind: EntityKind.TREATMENTS,
    group: SummaryGroup.CLINICAL,
    schema: TreatmentsPayloadSchema,
    sections: ['treatments_procedures'],
  },
  [EntityKind.LABS]: {
    kind: EntityKind.LABS,
    group: SummaryGroup.CLINICAL,
    schema: LabsPayloadSchema,
    sections: ['lab_results', 'lab_summary'],
  },
  [EntityKind.FACILITY_TIMING]: {
    kind: EntityKind.FACILITY_TIMING,
    group: SummaryGroup.HOSPITAL,
    schema: FacilityTimingPayloadSchema,
    sections: ['facility', 'timing'],
  },
  [EntityKind.DIAGNOSIS]: {
    kind: EntityKind.DIAGNOSIS,
    group: SummaryGroup.HOSPITAL,
    schema: DiagnosisPayloadSchema,
    sections: ['diagnosis'],
  },
  [EntityKind.MEDICATION_RISK]: {
    kind: EntityKind.MEDICATION_RISK,
    group: SummaryGroup.HOSPITAL,
    schema: MedicationRiskPayloadSchema,
    sections: ['medication_risk_assessment'],
  },
};

export interface RegisteredExtractor<K extends EntityKind> {
  definition: EntityDefinition<K>;
  extractor: EntityExtractorPort;
}

/**
 * Kind -> (definition, extractor instance). Built once at module init.
 */
export type ExtractionRegistry = {
  [K in EntityKind]: RegisteredExtractor<K>;
};

export type ExtractorSet = {
  [K in EntityKind]: EntityExtractorPort;
};

export const EXTRACTION_REGISTRY = 'ExtractionRegistry';

export function createExtractionRegistry(
  extractors: ExtractorSet,
  definitions: EntityDefinitions = ENTITY_DEFINITIONS,
): ExtractionRegistry {
  const register = <K extends EntityKind>(kind: K): RegisteredExtractor<K> => {
    const extractor = extractors[kind];
    if (extractor.kind !== kind) {
      throw new Error(
        `Extractor registered for '${kind}' reports kind '${extractor.kind}'`,
      );
    }
    return { definition: definitions[kind], extractor };
  };

  return {
    [EntityKind.PRESENTATION]: register(EntityKind.PRESENTATION),
    [EntityKind.HISTORY]: register(EntityKind.HISTORY),
    [EntityKind.FINDINGS]: register(EntityKind.FINDINGS),
    [EntityKind.ASSESSMENT]: register(EntityKind.ASSESSMENT),
    [EntityKind.COURSE]: register(EntityKind.COURSE),
    [EntityKind.FOLLOW_UP]: register(EntityKind.FOLLOW_UP),
    [EntityKind.TREATMENTS]: register(EntityKind.TREATMENTS),
    [EntityKind.LABS]: register(EntityKind.LABS),
    [EntityKind.FACILITY_TIMING]: register(EntityKind.FACILITY_TIMING),
    [EntityKind.DIAGNOSIS]: register(EntityKind.DIAGNOSIS),
    [EntityKind.MEDICATION_RISK]: register(EntityKind.MEDICATION_RISK),
  };
}

export function groupOf(kind: EntityKind): SummaryGroup {
  return ENTITY_DEFINITIONS[kind].group;
}
