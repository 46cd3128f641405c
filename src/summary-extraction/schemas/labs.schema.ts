import { IsArray, IsOptional, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { LabSummarySchema, LabTestSchema } from './lab.schema';

export class LabsPayloadSchema {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LabTestSchema)
  lab_results: LabTestSchema[] = [];

  @IsOptional()
  @ValidateNested()
  @Type(() => LabSummarySchema)
  lab_summary?: LabSummarySchema | null;
}
