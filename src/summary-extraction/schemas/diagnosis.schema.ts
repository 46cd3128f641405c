import {
  IsArray,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SecondaryDiagnosisSchema {
  @ApiProperty({ example: 'Type 2 diabetes mellitus' })
  @IsString()
  diagnosis!: string;

  @ApiPropertyOptional({ example: 'E11.9', nullable: true })
  @IsOptional()
  @IsString()
  icd10_code?: string | null;

  @ApiProperty({ description: 'Section name and quote where it was found' })
  @IsString()
  evidence!: string;

  @ApiPropertyOptional({ example: 'pre-existing condition', nullable: true })
  @IsOptional()
  @IsString()
  relationship_to_primary?: string | null;
}

export class DiagnosisDataSchema {
  @ApiProperty({ example: 'Community-acquired pneumonia' })
  @IsString()
  @IsNotEmpty()
  primary_diagnosis!: string;

  @ApiPropertyOptional({ example: 'J18.9', nullable: true })
  @IsOptional()
  @IsString()
  primary_diagnosis_icd10?: string | null;

  @ApiProperty()
  @IsString()
  primary_diagnosis_evidence!: string;

  @ApiProperty({ example: 'respiratory' })
  @IsString()
  diagnosis_category!: string;

  @ApiProperty({ type: [SecondaryDiagnosisSchema] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SecondaryDiagnosisSchema)
  secondary_diagnoses: SecondaryDiagnosisSchema[] = [];
}

export class DiagnosisPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => DiagnosisDataSchema)
  diagnosis!: DiagnosisDataSchema;
}
