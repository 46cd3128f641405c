import {
  IsArray,
  IsDefined,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  ValidateBy,
  ValidateNested,
  ValidationOptions,
} from 'class-validator';
import { Type } from 'class-transformer';
import { LabTestSchema } from './lab.schema';

// Flat key -> text map, e.g. { ekg: 'sinus rhythm' }
function IsStringRecord(validationOptions?: ValidationOptions) {
  return ValidateBy(
    {
      name: 'isStringRecord',
      validator: {
        validate: (value: unknown) =>
          typeof value === 'object' &&
          value !== null &&
          !Array.isArray(value) &&
          Object.values(value).every((entry) => typeof entry === 'string'),
        defaultMessage: () => '$property must map names to text',
      },
    },
    validationOptions,
  );
}

export class VitalSignMeasurementSchema {
  @IsString()
  measurement!: string;

  @IsDefined()
  value!: string | number;

  @IsOptional()
  @IsString()
  unit?: string | null;

  @IsOptional()
  @IsString()
  status?: string | null;

  @IsOptional()
  @IsString()
  clinical_significance?: string | null;
}

export class PhysicalExamFindingSchema {
  @IsString()
  system!: string;

  @IsString()
  finding!: string;

  @IsOptional()
  @IsString()
  status?: string | null;
}

export class ImagingStudySchema {
  @IsString()
  study!: string;

  @IsOptional()
  @IsString()
  date?: string | null;

  @IsArray()
  @IsString({ each: true })
  findings: string[] = [];

  @IsOptional()
  @IsString()
  impression?: string | null;
}

export class AnthropometricMeasurementSchema {
  @IsNumber()
  value!: number;

  @IsString()
  unit!: string;

  @IsOptional()
  @IsString()
  notes?: string | null;
}

export class AnthropometricDataSchema {
  @IsOptional()
  @ValidateNested()
  @Type(() => AnthropometricMeasurementSchema)
  height?: AnthropometricMeasurementSchema | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => AnthropometricMeasurementSchema)
  weight?: AnthropometricMeasurementSchema | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => AnthropometricMeasurementSchema)
  bmi?: AnthropometricMeasurementSchema | null;
}

export class FindingsDataSchema {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LabTestSchema)
  lab_results: LabTestSchema[] = [];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => VitalSignMeasurementSchema)
  vital_signs?: VitalSignMeasurementSchema[] | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PhysicalExamFindingSchema)
  physical_exam_findings?: PhysicalExamFindingSchema[] | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ImagingStudySchema)
  imaging_findings?: ImagingStudySchema[] | null;

  @IsOptional()
  @ValidateNested()
  @Type(() => AnthropometricDataSchema)
  anthropometrics?: AnthropometricDataSchema | null;

  @IsOptional()
  @IsStringRecord()
  diagnostic_notes?: Record<string, string> | null;
}

export class FindingsPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => FindingsDataSchema)
  clinical_findings!: FindingsDataSchema;
}
