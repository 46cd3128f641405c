import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { ClinicalSummaryResponseDto } from './clinical-summary-response.dto';
import { HospitalSummaryResponseDto } from './hospital-summary-response.dto';

export class HospitalizationSummariesResponseDto {
  @ApiProperty()
  @Expose()
  hospitalizationId!: string;

  @ApiProperty({ type: HospitalSummaryResponseDto, nullable: true })
  @Expose()
  hospital!: HospitalSummaryResponseDto | null;

  @ApiProperty({ type: ClinicalSummaryResponseDto, nullable: true })
  @Expose()
  clinical!: ClinicalSummaryResponseDto | null;
}

export class PatientSummariesResponseDto {
  @ApiProperty()
  @Expose()
  patientId!: string;

  @ApiProperty({ type: HospitalSummaryResponseDto, isArray: true })
  @Expose()
  hospital!: HospitalSummaryResponseDto[];

  @ApiProperty({ type: ClinicalSummaryResponseDto, isArray: true })
  @Expose()
  clinical!: ClinicalSummaryResponseDto[];
}
