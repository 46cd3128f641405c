import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { EntityKind } from '../domain/enums/entity-kind.enum';
import { ExtractionStatus } from '../domain/enums/extraction-status.enum';
import {
  AggregateFailureType,
  PersistenceStatus,
} from '../domain/enums/persistence-status.enum';
import { ProcessingStatus } from '../domain/enums/processing-status.enum';
import { SummaryGroup } from '../domain/enums/summary-group.enum';

export class AggregateFailureResponseDto {
  @ApiProperty({ enum: AggregateFailureType })
  @Expose()
  type!: AggregateFailureType;

  @ApiProperty({ example: 'missing diagnosis' })
  @Expose()
  message!: string;

  @ApiProperty({ enum: EntityKind, isArray: true })
  @Expose()
  entityKinds!: EntityKind[];
}

export class PersistenceOutcomeResponseDto {
  @ApiProperty({ enum: PersistenceStatus })
  @Expose()
  status!: PersistenceStatus;

  @ApiPropertyOptional({ description: 'Present when persisted' })
  @Expose()
  recordId?: string;

  @ApiProperty({ description: 'Write attempts, 0 when no write was issued' })
  @Expose()
  attempts!: number;

  @ApiPropertyOptional({ type: AggregateFailureResponseDto })
  @Expose()
  failure?: AggregateFailureResponseDto;
}

export class EntityExtractionResponseDto {
  @ApiProperty({ enum: EntityKind })
  @Expose()
  kind!: EntityKind;

  @ApiProperty({ enum: SummaryGroup })
  @Expose()
  group!: SummaryGroup;

  @ApiProperty({ enum: ExtractionStatus })
  @Expose()
  status!: ExtractionStatus;

  @ApiProperty()
  @Expose()
  durationMs!: number;

  @ApiPropertyOptional({ description: 'Sanitized failure reason' })
  @Expose()
  error?: string;
}

export class SummaryExtractionResponseDto {
  @ApiProperty()
  @Expose()
  hospitalizationId!: string;

  @ApiProperty()
  @Expose()
  patientId!: string;

  @ApiProperty({ enum: ProcessingStatus })
  @Expose()
  status!: ProcessingStatus;

  @ApiProperty({
    example:
      'clinical summary saved, hospital summary failed: missing diagnosis',
  })
  @Expose()
  message!: string;

  @ApiProperty({ type: PersistenceOutcomeResponseDto })
  @Expose()
  clinical!: PersistenceOutcomeResponseDto;

  @ApiProperty({ type: PersistenceOutcomeResponseDto })
  @Expose()
  hospital!: PersistenceOutcomeResponseDto;

  @ApiProperty({ type: EntityExtractionResponseDto, isArray: true })
  @Expose()
  extractions!: EntityExtractionResponseDto[];

  @ApiProperty()
  @Expose()
  durationMs!: number;
}
