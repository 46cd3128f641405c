import {
  IsDefined,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

export enum LabStatus {
  CRITICAL = 'critical',
  ABNORMAL_HIGH = 'abnormal_high',
  ABNORMAL_LOW = 'abnormal_low',
  NORMAL = 'normal',
}

export enum LabCategory {
  CHEMISTRY = 'chemistry',
  HEMATOLOGY = 'hematology',
  COAGULATION = 'coagulation',
  ARTERIAL_BLOOD_GAS = 'arterial_blood_gas',
  URINALYSIS = 'urinalysis',
  METABOLIC = 'metabolic',
  CARDIAC = 'cardiac',
  HEPATIC = 'hepatic',
  RENAL = 'renal',
  ELECTROLYTES = 'electrolytes',
  ENDOCRINE = 'endocrine',
  TOXICOLOGY = 'toxicology',
}

export class LabTestSchema {
  @IsString()
  id!: string;

  @IsString()
  test_name!: string;

  @IsOptional()
  @IsEnum(LabCategory)
  test_category?: LabCategory | null;

  // Numeric or textual ("positive", "<0.01")
  @IsDefined()
  value!: string | number;

  @IsOptional()
  @IsString()
  unit?: string | null;

  @IsEnum(LabStatus)
  status!: LabStatus;

  @IsOptional()
  @IsString()
  reference_range?: string | null;

  @IsOptional()
  @IsNumber()
  reference_range_min?: number | null;

  @IsOptional()
  @IsNumber()
  reference_range_max?: number | null;

  @IsOptional()
  baseline_value?: string | number | null;

  @IsOptional()
  @IsString()
  clinical_significance?: string | null;

  @IsOptional()
  @IsString()
  documented_in_section?: string | null;
}

export class LabSummarySchema {
  @IsInt()
  @Min(0)
  total_tests = 0;

  @IsInt()
  @Min(0)
  critical_count = 0;

  @IsInt()
  @Min(0)
  abnormal_count = 0;

  @IsInt()
  @Min(0)
  normal_count = 0;
}
