import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class ExtractSummaryDto {
  @ApiProperty({
    description: 'Patient the note belongs to',
    example: 'patient-0001',
    maxLength: 100,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  patientId!: string;

  // Blank notes still run every extractor and report their failures
  @ApiProperty({
    description:
      'Full clinical note text (discharge summary, H&P, progress note)',
  })
  @IsString()
  text!: string;

  @ApiPropertyOptional({
    description:
      'Correlation id shared by both summaries. Reusing one re-runs the document and updates its records in place. Generated when omitted.',
    example: 'hosp-2024-0001',
    maxLength: 100,
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  hospitalizationId?: string;
}
