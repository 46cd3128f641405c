import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { sanitizeErrorMessage } from '../../../audit/utils/phi-sanitizer.util';
import { DEFAULT_EXTRACTOR_TIMEOUT_MS } from '../../config/summary-extraction.config';
import { ClinicalDocument } from '../entities/clinical-document.entity';
import {
  EntityOutcome,
  EntityOutcomeSet,
} from '../entities/entity-outcome.entity';
import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { ExtractorTimeoutError } from '../errors/extraction.errors';
import {
  EXTRACTION_REGISTRY,
  ExtractionRegistry,
  RegisteredExtractor,
} from '../registry/extraction.registry';
import { validateEntityPayload } from '../utils/payload-validation.util';

export const CANCELLED_OUTCOME_ERROR = 'cancelled';

class ExtractionInterruptedError extends Error {
  constructor() {
    super(CANCELLED_OUTCOME_ERROR);
    this.name = 'ExtractionInterruptedError';
    Object.setPrototypeOf(this, ExtractionInterruptedError.prototype);
  }
}

/**
 * ExtractionOrchestratorDomainService
 *
 * Fans one document out to every registered extractor and waits for all of
 * them (barrier, never first-success or first-failure).
 *
 * Per invocation:
 * - bounded by the kind's timeout (configured default otherwise)
 * - own AbortController, aborted on timeout or when the caller's signal fires
 * - any throw, rejection or schema mismatch becomes a failed outcome
 *
 * Nothing thrown by an extractor reaches the caller.
 */
@Injectable()
export class ExtractionOrchestratorDomainService {
  private readonly logger = new Logger(
    ExtractionOrchestratorDomainService.name,
  );
  private readonly defaultTimeoutMs: number;

  constructor(
    @Inject(EXTRACTION_REGISTRY)
    private readonly registry: ExtractionRegistry,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.defaultTimeoutMs =
      this.configService.get('summaryExtraction.extractorTimeoutMs', {
        infer: true,
      }) ?? DEFAULT_EXTRACTOR_TIMEOUT_MS;
  }

  async run(
    document: ClinicalDocument,
    hospitalizationId: string,
    signal?: AbortSignal,
  ): Promise<EntityOutcomeSet> {
    const startedAt = Date.now();
    const invoke = <K extends EntityKind>(kind: K) =>
      this.invoke(this.registry[kind], document, hospitalizationId, signal);

    const [
      presentation,
      history,
      findings,
      assessment,
      course,
      followUp,
      treatments,
      labs,
      facilityTiming,
      diagnosis,
      medicationRisk,
    ] = await Promise.all([
      invoke(EntityKind.PRESENTATION),
      invoke(EntityKind.HISTORY),
      invoke(EntityKind.FINDINGS),
      invoke(EntityKind.ASSESSMENT),
      invoke(EntityKind.COURSE),
      invoke(EntityKind.FOLLOW_UP),
      invoke(EntityKind.TREATMENTS),
      invoke(EntityKind.LABS),
      invoke(EntityKind.FACILITY_TIMING),
      invoke(EntityKind.DIAGNOSIS),
      invoke(EntityKind.MEDICATION_RISK),
    ]);

    const outcomes: EntityOutcomeSet = {
      [EntityKind.PRESENTATION]: presentation,
      [EntityKind.HISTORY]: history,
      [EntityKind.FINDINGS]: findings,
      [EntityKind.ASSESSMENT]: assessment,
      [EntityKind.COURSE]: course,
      [EntityKind.FOLLOW_UP]: followUp,
      [EntityKind.TREATMENTS]: treatments,
      [EntityKind.LABS]: labs,
      [EntityKind.FACILITY_TIMING]: facilityTiming,
      [EntityKind.DIAGNOSIS]: diagnosis,
      [EntityKind.MEDICATION_RISK]: medicationRisk,
    };

    const succeeded = Object.values(outcomes).filter(
      (outcome) => outcome.status === ExtractionStatus.SUCCESS,
    ).length;
    this.logger.log(
      `[ORCHESTRATOR] ${hospitalizationId}: ${succeeded}/${Object.keys(outcomes).length} extractors succeeded in ${Date.now() - startedAt}ms`,
    );

    return outcomes;
  }

  /**
   * Run one extractor. Never rejects.
   */
  private async invoke<K extends EntityKind>(
    registered: RegisteredExtractor<K>,
    document: ClinicalDocument,
    hospitalizationId: string,
    parentSignal?: AbortSignal,
  ): Promise<EntityOutcome<K>> {
    const { definition, extractor } = registered;
    const kind = definition.kind;
    const timeoutMs = definition.timeoutMs ?? this.defaultTimeoutMs;
    const startedAt = Date.now();

    if (parentSignal?.aborted) {
      return {
        kind,
        status: ExtractionStatus.FAILED,
        error: CANCELLED_OUTCOME_ERROR,
        durationMs: 0,
      };
    }

    const controller = new AbortController();
    const abortFromParent = () => controller.abort();
    parentSignal?.addEventListener('abort', abortFromParent, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const interruption = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ExtractorTimeoutError(kind, timeoutMs));
        controller.abort();
      }, timeoutMs);
      controller.signal.addEventListener(
        'abort',
        () => reject(new ExtractionInterruptedError()),
        { once: true },
      );
    });

    try {
      const raw = await Promise.race([
        extractor.extract(document, {
          hospitalizationId,
          signal: controller.signal,
        }),
        interruption,
      ]);
      const payload = validateEntityPayload(definition, raw);

      return {
        kind,
        status: ExtractionStatus.SUCCESS,
        payload,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt;

      if (error instanceof ExtractorTimeoutError) {
        this.logger.warn(
          `[ORCHESTRATOR] ${hospitalizationId}: '${kind}' timed out after ${timeoutMs}ms`,
        );
        return {
          kind,
          status: ExtractionStatus.TIMED_OUT,
          error: error.message,
          durationMs,
        };
      }

      if (error instanceof ExtractionInterruptedError) {
        return {
          kind,
          status: ExtractionStatus.FAILED,
          error: CANCELLED_OUTCOME_ERROR,
          durationMs,
        };
      }

      const message = sanitizeErrorMessage(
        error instanceof Error ? error.message : String(error),
      );
      this.logger.warn(
        `[ORCHESTRATOR] ${hospitalizationId}: '${kind}' failed: ${message}`,
      );
      return {
        kind,
        status: ExtractionStatus.FAILED,
        error: message || 'Extractor failed',
        durationMs,
      };
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', abortFromParent);
    }
  }
}
