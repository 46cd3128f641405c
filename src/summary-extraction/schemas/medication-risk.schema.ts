import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export enum RiskSeverity {
  CRITICAL = 'critical',
  MAJOR = 'major',
  MODERATE = 'moderate',
  MINOR = 'minor',
}

export enum RiskLevel {
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
}

export enum AssessmentMethod {
  AI_ANALYSIS = 'ai_analysis',
  PHARMACIST_DETERMINATION = 'pharmacist_determination',
  COMBINED = 'combined',
}

/**
 * A: medication-related presentation
 * B: medication present but unrelated
 * C: medication management needed but not causative
 */
export enum PresentationType {
  A = 'A',
  B = 'B',
  C = 'C',
}

export class RiskMetadataSchema {
  @IsString()
  note_type!: string;

  @IsArray()
  @IsString({ each: true })
  sections_reviewed: string[] = [];

  @IsArray()
  @IsString({ each: true })
  missing_information: string[] = [];

  @IsArray()
  @IsString({ each: true })
  model_uncertainty_notes: string[] = [];
}

export class ClinicalContextSchema {
  @IsEnum(PresentationType)
  presentation_type!: PresentationType;

  @IsString()
  presentation_type_rationale!: string;

  @IsString()
  primary_reason_for_presentation!: string;

  @IsBoolean()
  is_medication_related!: boolean;

  @IsString()
  medication_relationship_explanation!: string;

  @IsString()
  patient_clinical_status!: string;

  @IsArray()
  @IsString({ each: true })
  organ_dysfunction: string[] = [];
}

export class RiskScoringSchema {
  @IsInt()
  @Min(0)
  positive_evidence_points!: number;

  @IsInt()
  @Min(0)
  negative_evidence_points!: number;

  @IsInt()
  net_score!: number;

  @IsString()
  score_breakdown!: string;
}

export class LikelihoodPercentageSchema {
  @ApiProperty({ minimum: 0, maximum: 100, example: 65 })
  @IsInt()
  @Min(0)
  @Max(100)
  percentage!: number;

  @ApiProperty()
  @IsString()
  evidence!: string;

  @ApiProperty({ default: 'evidence_scoring_system' })
  @IsString()
  calculation_method: string = 'evidence_scoring_system';
}

export class RiskFactorSchema {
  @IsString()
  factor!: string;

  @IsString()
  evidence!: string;

  @IsEnum(RiskSeverity)
  severity!: RiskSeverity;

  @IsString()
  severity_rationale!: string;

  @IsArray()
  @IsString({ each: true })
  implicated_medications: string[] = [];

  @IsString()
  mechanism!: string;

  @IsString()
  temporal_relationship!: string;
}

export class AlternativeExplanationSchema {
  @IsString()
  explanation!: string;

  @IsString()
  likelihood!: string;

  @IsString()
  supporting_evidence!: string;

  @IsString()
  impact_on_medication_assessment!: string;
}

export class RiskAssessmentSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => RiskMetadataSchema)
  metadata!: RiskMetadataSchema;

  @IsObject()
  @ValidateNested()
  @Type(() => ClinicalContextSchema)
  clinical_context!: ClinicalContextSchema;

  @IsObject()
  @ValidateNested()
  @Type(() => RiskScoringSchema)
  risk_scoring!: RiskScoringSchema;

  @ApiProperty({ type: LikelihoodPercentageSchema })
  @IsObject()
  @ValidateNested()
  @Type(() => LikelihoodPercentageSchema)
  likelihood_percentage!: LikelihoodPercentageSchema;

  @ApiProperty({ enum: RiskLevel })
  @IsEnum(RiskLevel)
  risk_level!: RiskLevel;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RiskFactorSchema)
  risk_factors: RiskFactorSchema[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AlternativeExplanationSchema)
  alternative_explanations: AlternativeExplanationSchema[] = [];

  @IsArray()
  @IsString({ each: true })
  negative_findings: string[] = [];

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.8 })
  @IsNumber()
  @Min(0)
  @Max(1)
  confidence_score!: number;

  @ApiProperty()
  @IsString()
  confidence_rationale!: string;

  @ApiProperty({
    enum: AssessmentMethod,
    default: AssessmentMethod.AI_ANALYSIS,
  })
  @IsEnum(AssessmentMethod)
  assessment_method: AssessmentMethod = AssessmentMethod.AI_ANALYSIS;

  // Stamped at assembly time when the extractor leaves it out
  @ApiPropertyOptional({ example: '2025-01-05T12:00:00.000Z' })
  @IsOptional()
  @IsString()
  assessed_at?: string | null;
}

export class MedicationRiskPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => RiskAssessmentSchema)
  medication_risk_assessment!: RiskAssessmentSchema;
}
