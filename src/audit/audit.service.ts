import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { sanitizeErrorMessage, sanitizeMetadata } from './utils/phi-sanitizer.util';

export enum ExtractionEventType {
  SUMMARY_EXTRACTION_STARTED = 'SUMMARY_EXTRACTION_STARTED',
  SUMMARY_EXTRACTION_COMPLETED = 'SUMMARY_EXTRACTION_COMPLETED',
  SUMMARY_EXTRACTION_PARTIAL = 'SUMMARY_EXTRACTION_PARTIAL',
  SUMMARY_EXTRACTION_FAILED = 'SUMMARY_EXTRACTION_FAILED',
  SUMMARY_EXTRACTION_CANCELLED = 'SUMMARY_EXTRACTION_CANCELLED',
}

export interface ExtractionEventData {
  event: ExtractionEventType;
  hospitalizationId: string;
  patientId: string;
  success: boolean;
  clinicalRecordId?: string;
  hospitalRecordId?: string;
  durationMs?: number;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Counts, kinds, statuses only
}

/**
 * Audit Service
 *
 * One structured JSON line per extraction lifecycle event. Entries carry
 * identifiers and outcomes only: no note text, no extracted values.
 */
@Injectable()
export class AuditService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  logExtractionEvent(data: ExtractionEventData): void {
    const metadata = sanitizeMetadata(data.metadata);

    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'summary-extraction',
      event: data.event,
      hospitalizationId: data.hospitalizationId,
      patientId: data.patientId,
      success: data.success,
      clinicalRecordId: data.clinicalRecordId,
      hospitalRecordId: data.hospitalRecordId,
      durationMs: data.durationMs,
      errorType: data.errorMessage
        ? sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(Object.keys(metadata).length > 0 ? { metadata } : {}),
    };

    // Structured JSON for log collectors
    console.info(JSON.stringify(logEntry));
  }
}
