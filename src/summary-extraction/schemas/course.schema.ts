import {
  IsArray,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class CourseEventSchema {
  @IsString()
  event!: string;

  @IsOptional()
  @IsString()
  time?: string | null;

  @IsOptional()
  @IsString()
  details?: string | null;
}

export class CourseDataSchema {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CourseEventSchema)
  timeline: CourseEventSchema[] = [];

  @IsOptional()
  @IsString()
  narrative_summary?: string | null;

  // discharged_home, discharged_home_with_services, admitted_observation,
  // admitted_inpatient, transferred, left_AMA, deceased
  @IsOptional()
  @IsString()
  disposition?: string | null;

  // Free text as documented; the hospital summary computes its own value
  @IsOptional()
  @IsString()
  length_of_stay?: string | null;

  @IsOptional()
  @IsString()
  patient_response?: string | null;

  @IsOptional()
  @IsString()
  admission_date?: string | null;

  @IsOptional()
  @IsString()
  discharge_date?: string | null;

  @IsArray()
  @IsString({ each: true })
  follow_up_plans: string[] = [];
}

export class CoursePayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => CourseDataSchema)
  hospital_course!: CourseDataSchema;
}
