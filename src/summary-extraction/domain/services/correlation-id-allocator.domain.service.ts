import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { ClinicalDocument } from '../entities/clinical-document.entity';

/**
 * Issues the hospitalization id shared by both aggregates of a document.
 * A caller-supplied id is reused verbatim so re-runs upsert in place.
 */
@Injectable()
export class CorrelationIdAllocatorDomainService {
  allocate(document: ClinicalDocument): string {
    return document.hospitalizationId
      ? document.hospitalizationId
      : randomUUID();
  }
}
