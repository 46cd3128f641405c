import {
  IsArray,
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export enum MedicationRelationshipConfidence {
  DEFINITE = 'definite',
  PROBABLE = 'probable',
  POSSIBLE = 'possible',
}

export enum CauseDeterminationConfidence {
  DEFINITE = 'definite',
  PROBABLE = 'probable',
  POSSIBLE = 'possible',
  UNCERTAIN = 'uncertain',
}

export enum FallRiskLevel {
  LOW = 'low',
  MODERATE = 'moderate',
  HIGH = 'high',
}

export class MedicationRelationshipSchema {
  @IsArray()
  @IsString({ each: true })
  implicated_medications: string[] = [];

  @IsOptional()
  @IsString()
  mechanism?: string | null;

  @IsOptional()
  @IsString()
  mechanism_evidence?: string | null;

  @IsEnum(MedicationRelationshipConfidence)
  confidence!: MedicationRelationshipConfidence;

  @IsOptional()
  @IsString()
  confidence_rationale?: string | null;

  @IsOptional()
  @IsString()
  temporal_relationship?: string | null;

  @IsArray()
  @IsString({ each: true })
  additional_factors: string[] = [];
}

export class CauseDeterminationSchema {
  @IsString()
  cause!: string;

  @IsArray()
  @IsString({ each: true })
  supporting_evidence: string[] = [];

  @IsOptional()
  @IsString()
  evidence_source?: string | null;

  @IsEnum(CauseDeterminationConfidence)
  confidence!: CauseDeterminationConfidence;
}

export class FallRiskAssessmentSchema {
  @IsEnum(FallRiskLevel)
  risk_level!: FallRiskLevel;

  @IsArray()
  @IsString({ each: true })
  contributing_factors: string[] = [];
}

export class AssessmentDataSchema {
  @IsString()
  @IsNotEmpty()
  primary_diagnosis!: string;

  @IsOptional()
  @IsString()
  primary_diagnosis_source?: string | null;

  @IsArray()
  @IsString({ each: true })
  secondary_diagnoses: string[] = [];

  @IsArray()
  @IsString({ each: true })
  clinical_reasoning: string[] = [];

  @IsOptional()
  @ValidateNested()
  @Type(() => MedicationRelationshipSchema)
  medication_relationship?: MedicationRelationshipSchema | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => CauseDeterminationSchema)
  cause_determination?: CauseDeterminationSchema | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => FallRiskAssessmentSchema)
  fall_risk_assessment?: FallRiskAssessmentSchema | null;
}

export class AssessmentPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => AssessmentDataSchema)
  clinical_assessment!: AssessmentDataSchema;
}
