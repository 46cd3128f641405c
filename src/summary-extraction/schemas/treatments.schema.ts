import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export enum InterventionType {
  MEDICATION = 'medication',
  PROCEDURE = 'procedure',
  MONITORING = 'monitoring',
  SUPPORTIVE_CARE = 'supportive_care',
  THERAPEUTIC_INTERVENTION = 'therapeutic_intervention',
  DIAGNOSTIC_TEST = 'diagnostic_test',
}

export enum InterventionCategory {
  CARDIOVASCULAR = 'cardiovascular',
  RESPIRATORY = 'respiratory',
  RENAL = 'renal',
  METABOLIC = 'metabolic',
  INFECTIOUS_DISEASE = 'infectious_disease',
  PAIN_MANAGEMENT = 'pain_management',
  NUTRITIONAL = 'nutritional',
  PSYCHIATRIC = 'psychiatric',
  OTHER = 'other',
}

export enum MedicationAction {
  STARTED = 'started',
  DISCONTINUED = 'discontinued',
  DOSE_ADJUSTED = 'dose_adjusted',
  CONTINUED = 'continued',
  SWITCHED = 'switched',
}

export enum MedicationRoute {
  IV = 'IV',
  ORAL = 'oral',
  SUBCUTANEOUS = 'subcutaneous',
  INTRAMUSCULAR = 'intramuscular',
  TOPICAL = 'topical',
  INHALATION = 'inhalation',
}

export class MedicationTreatmentSchema {
  @IsString()
  medication_name!: string;

  @IsEnum(MedicationRoute)
  route!: MedicationRoute;

  @IsOptional()
  @IsString()
  dose?: string | null;

  @IsOptional()
  @IsString()
  frequency?: string | null;

  @IsEnum(MedicationAction)
  action!: MedicationAction;

  @IsOptional()
  @IsString()
  reason_for_action?: string | null;

  @IsBoolean()
  related_to_admission_reason = false;
}

export class ProcedureDetailsSchema {
  @IsString()
  procedure_name!: string;

  @IsOptional()
  @IsString()
  procedure_code?: string | null;

  @IsOptional()
  @IsString()
  performed_by?: string | null;

  @IsOptional()
  @IsString()
  approach?: string | null;

  @IsOptional()
  @IsString()
  findings?: string | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  specimens_collected?: string[] | null;
}

export class TreatmentSchema {
  @IsString()
  id!: string;

  @IsEnum(InterventionType)
  treatment_type!: InterventionType;

  @IsEnum(InterventionCategory)
  category: InterventionCategory = InterventionCategory.OTHER;

  @IsString()
  description!: string;

  @IsOptional()
  @IsString()
  clinical_indication?: string | null;

  @IsOptional()
  @IsString()
  started_at?: string | null;

  @IsOptional()
  @IsString()
  ended_at?: string | null;

  @IsOptional()
  @IsString()
  duration?: string | null;

  @IsOptional()
  @IsString()
  timing_qualifier?: string | null;

  @IsOptional()
  @IsString()
  location?: string | null;

  @IsOptional()
  @IsString()
  outcome?: string | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  complications?: string[] | null;

  @IsOptional()
  @IsString()
  documented_in_section?: string | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => MedicationTreatmentSchema)
  medication_details?: MedicationTreatmentSchema | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => ProcedureDetailsSchema)
  procedure_details?: ProcedureDetailsSchema | null;
}

export class TreatmentsPayloadSchema {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TreatmentSchema)
  treatments_procedures: TreatmentSchema[] = [];
}
