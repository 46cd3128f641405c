import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import {
  DiagnosisDataSchema,
  FacilityDataSchema,
  RiskAssessmentSchema,
  TimingDataSchema,
} from '../schemas';

export class HospitalSummaryResponseDto {
  @ApiProperty({ required: false })
  @Expose()
  id?: string;

  @ApiProperty()
  @Expose()
  hospitalizationId!: string;

  @ApiProperty()
  @Expose()
  patientId!: string;

  @ApiProperty({ type: Object })
  @Expose()
  facility!: FacilityDataSchema;

  @ApiProperty({ type: Object })
  @Expose()
  timing!: TimingDataSchema;

  @ApiProperty({ type: Object })
  @Expose()
  diagnosis!: DiagnosisDataSchema;

  @ApiProperty({ type: Object })
  @Expose()
  medicationRiskAssessment!: RiskAssessmentSchema;

  @ApiProperty({ description: 'Whole days between admission and discharge' })
  @Expose()
  lengthOfStayDays!: number;

  @ApiProperty({ required: false })
  @Expose()
  createdAt?: Date;

  @ApiProperty({ required: false })
  @Expose()
  updatedAt?: Date;
}
