import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
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
} from '../schemas';

/**
 * Section fields are null when their extractor failed
 */
export class ClinicalSummaryResponseDto {
  @ApiProperty({ required: false })
  @Expose()
  id?: string;

  @ApiProperty()
  @Expose()
  hospitalizationId!: string;

  @ApiProperty()
  @Expose()
  patientId!: string;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  patientPresentation!: PresentationDataSchema | null;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  relevantHistory!: HistoryDataSchema | null;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  clinicalFindings!: FindingsDataSchema | null;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  clinicalAssessment!: AssessmentDataSchema | null;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  hospitalCourse!: CourseDataSchema | null;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  followUpPlan!: FollowUpDataSchema | null;

  @ApiProperty({ type: Object, isArray: true, nullable: true })
  @Expose()
  treatmentsProcedures!: TreatmentSchema[] | null;

  @ApiProperty({ type: Object, isArray: true, nullable: true })
  @Expose()
  labResults!: LabTestSchema[] | null;

  @ApiProperty({ type: Object, nullable: true })
  @Expose()
  labSummary!: LabSummarySchema | null;

  @ApiProperty({ nullable: true, example: 'gpt-4o-mini' })
  @Expose()
  parsingModelVersion!: string | null;

  @ApiProperty()
  @Expose()
  parsedAt!: Date;

  @ApiProperty({ required: false })
  @Expose()
  createdAt?: Date;

  @ApiProperty({ required: false })
  @Expose()
  updatedAt?: Date;
}
