import {
  IsArray,
  IsEnum,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export enum MedicalConditionStatus {
  ACTIVE = 'active',
  RESOLVED = 'resolved',
  HISTORICAL = 'historical',
}

export class MedicalConditionSchema {
  @IsString()
  condition_name!: string;

  @IsOptional()
  @IsString()
  icd10_code?: string | null;

  @IsOptional()
  @IsString()
  icd10_source?: string | null;

  // Stage, grade or class, e.g. "NYHA Class II"
  @IsOptional()
  @IsString()
  severity?: string | null;

  @IsEnum(MedicalConditionStatus)
  status!: MedicalConditionStatus;

  @IsString()
  status_rationale!: string;

  @IsOptional()
  @IsString()
  location?: string | null;

  @IsOptional()
  @IsString()
  notes?: string | null;

  @IsString()
  documented_in_section!: string;
}

export class HistoryDataSchema {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => MedicalConditionSchema)
  conditions: MedicalConditionSchema[] = [];
}

export class HistoryPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => HistoryDataSchema)
  relevant_history!: HistoryDataSchema;
}
