import {
  IsArray,
  IsEnum,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export enum AppointmentUrgency {
  URGENT = 'urgent', // < 1 week
  ROUTINE = 'routine', // 1-4 weeks
  AS_NEEDED = 'as_needed',
}

export class FollowUpAppointmentSchema {
  @IsString()
  specialty!: string;

  @IsEnum(AppointmentUrgency)
  urgency!: AppointmentUrgency;

  @IsOptional()
  @IsString()
  timeframe?: string | null;

  @IsOptional()
  @IsString()
  provider?: string | null;

  @IsOptional()
  @IsString()
  location?: string | null;

  @IsOptional()
  @IsString()
  notes?: string | null;
}

export class CareCoordinationSchema {
  @IsArray()
  @IsString({ each: true })
  services: string[] = [];

  @IsOptional()
  @IsString()
  responsible_team?: string | null;

  @IsOptional()
  @IsString()
  instructions?: string | null;
}

export class FollowUpDataSchema {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FollowUpAppointmentSchema)
  appointments: FollowUpAppointmentSchema[] = [];

  @IsArray()
  @IsString({ each: true })
  discharge_instructions: string[] = [];

  @IsArray()
  @IsString({ each: true })
  recommendations: string[] = [];

  @IsArray()
  @IsString({ each: true })
  patient_education: string[] = [];

  @IsArray()
  @IsString({ each: true })
  care_transitions: string[] = [];

  @IsOptional()
  @ValidateNested()
  @Type(() => CareCoordinationSchema)
  care_coordination?: CareCoordinationSchema | null;
}

export class FollowUpPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => FollowUpDataSchema)
  follow_up_plan!: FollowUpDataSchema;
}
