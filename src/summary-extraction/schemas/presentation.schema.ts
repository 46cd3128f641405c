import {
  IsArray,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class PresentationDataSchema {
  @IsArray()
  @IsString({ each: true })
  symptoms: string[] = [];

  @IsOptional()
  @IsString()
  symptom_source?: string | null;

  // emergency_department, scheduled_admission, direct_admission,
  // transfer, ambulance
  @IsOptional()
  @IsString()
  presentation_method?: string | null;

  @IsOptional()
  @IsString()
  presentation_details?: string | null;

  @IsOptional()
  @IsString()
  presentation_timeline?: string | null;

  @IsArray()
  @IsString({ each: true })
  severity_indicators: string[] = [];
}

export class PresentationPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => PresentationDataSchema)
  patient_presentation!: PresentationDataSchema;
}
