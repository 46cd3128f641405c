import {
  IsEnum,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Facility & Timing Schemas
 *
 * Shape returned by the facility_timing extractor. One extractor yields two
 * hospital summary sections (facility, timing); both are stored as JSONB.
 */

export enum FacilityType {
  ACUTE_CARE = 'acute_care',
  PSYCHIATRIC = 'psychiatric',
  REHABILITATION = 'rehabilitation',
  LTAC = 'ltac',
}

export enum AdmissionSource {
  EMERGENCY_DEPT = 'emergency_dept',
  DIRECT_ADMISSION = 'direct_admission',
  TRANSFER = 'transfer',
  SCHEDULED = 'scheduled',
}

export enum DischargeDisposition {
  HOME = 'home',
  SNF = 'snf',
  HOME_HEALTH = 'home_health',
  REHAB = 'rehab',
  TRANSFER = 'transfer',
  EXPIRED = 'expired',
}

export class AddressSchema {
  @ApiPropertyOptional({ example: '100 Main St', nullable: true })
  @IsOptional()
  @IsString()
  street?: string | null;

  @ApiProperty({ example: 'Springfield' })
  @IsString()
  city!: string;

  @ApiProperty({ example: 'IL' })
  @IsString()
  state!: string;

  @ApiPropertyOptional({ example: '62701', nullable: true })
  @IsOptional()
  @IsString()
  zip?: string | null;
}

export class FacilityDataSchema {
  @ApiProperty({ example: 'Springfield General Hospital' })
  @IsString()
  @IsNotEmpty()
  facility_name!: string;

  @ApiPropertyOptional({ nullable: true })
  @IsOptional()
  @IsString()
  facility_id?: string | null;

  @ApiProperty({ enum: FacilityType, default: FacilityType.ACUTE_CARE })
  @IsEnum(FacilityType)
  facility_type: FacilityType = FacilityType.ACUTE_CARE;

  @ApiPropertyOptional({ type: AddressSchema, nullable: true })
  @IsOptional()
  @ValidateNested()
  @Type(() => AddressSchema)
  address?: AddressSchema | null;
}

export class TimingDataSchema {
  // Dates stay plain strings here; they are parsed when the hospital summary
  // is assembled so a malformed date fails assembly, not extraction.
  @ApiProperty({ example: '2025-01-01' })
  @IsString()
  @IsNotEmpty()
  admission_date!: string;

  @ApiPropertyOptional({ example: '14:30', nullable: true })
  @IsOptional()
  @IsString()
  admission_time?: string | null;

  @ApiProperty({ example: '2025-01-05' })
  @IsString()
  @IsNotEmpty()
  discharge_date!: string;

  @ApiPropertyOptional({ example: '11:00', nullable: true })
  @IsOptional()
  @IsString()
  discharge_time?: string | null;

  @ApiPropertyOptional({ enum: AdmissionSource, nullable: true })
  @IsOptional()
  @IsEnum(AdmissionSource)
  admission_source?: AdmissionSource | null;

  @ApiPropertyOptional({ enum: DischargeDisposition, nullable: true })
  @IsOptional()
  @IsEnum(DischargeDisposition)
  discharge_disposition?: DischargeDisposition | null;
}

export class FacilityTimingPayloadSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => FacilityDataSchema)
  facility!: FacilityDataSchema;

  @IsObject()
  @ValidateNested()
  @Type(() => TimingDataSchema)
  timing!: TimingDataSchema;
}
