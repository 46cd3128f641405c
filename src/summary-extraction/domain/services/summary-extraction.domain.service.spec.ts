import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  AuditService,
  ExtractionEventData,
  ExtractionEventType,
} from '../../../audit/audit.service';
import {
  createFakeExtractors,
  ExtractorBehavior,
  hangUntilAborted,
  TEST_PATIENT_ID,
  testDocument,
} from '../../../../test/utils/extraction-fixtures';
import {
  InMemoryClinicalSummaryRepository,
  InMemoryHospitalSummaryRepository,
} from '../../../../test/utils/in-memory-summary.repositories';
import { EntityKind } from '../enums/entity-kind.enum';
import { ExtractionStatus } from '../enums/extraction-status.enum';
import { PersistenceStatus } from '../enums/persistence-status.enum';
import { ProcessingStatus } from '../enums/processing-status.enum';
import { SummaryGroup } from '../enums/summary-group.enum';
import { ExtractionCancelledError } from '../errors/extraction.errors';
import {
  createExtractionRegistry,
  EXTRACTION_REGISTRY,
} from '../registry/extraction.registry';
import { AggregateAssemblerDomainService } from './aggregate-assembler.domain.service';
import { CorrelationIdAllocatorDomainService } from './correlation-id-allocator.domain.service';
import { ExtractionOrchestratorDomainService } from './extraction-orchestrator.domain.service';
import { PersistenceCoordinatorDomainService } from './persistence-coordinator.domain.service';
import { SummaryExtractionDomainService } from './summary-extraction.domain.service';

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const failing: ExtractorBehavior = async () => {
  throw new Error('model refused');
};

describe('SummaryExtractionDomainService', () => {
  let service: SummaryExtractionDomainService;
  let clinicalRepository: InMemoryClinicalSummaryRepository;
  let hospitalRepository: InMemoryHospitalSummaryRepository;
  let logExtractionEvent: jest.Mock<void, [ExtractionEventData]>;

  const compile = async (
    behaviors: Partial<Record<EntityKind, ExtractorBehavior>> = {},
  ) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SummaryExtractionDomainService,
        CorrelationIdAllocatorDomainService,
        ExtractionOrchestratorDomainService,
        AggregateAssemblerDomainService,
        PersistenceCoordinatorDomainService,
        {
          provide: EXTRACTION_REGISTRY,
          useValue: createExtractionRegistry(createFakeExtractors(behaviors)),
        },
        {
          provide: 'ClinicalSummaryRepositoryPort',
          useValue: clinicalRepository,
        },
        {
          provide: 'HospitalSummaryRepositoryPort',
          useValue: hospitalRepository,
        },
        { provide: AuditService, useValue: { logExtractionEvent } },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) =>
              key === 'summaryExtraction.llm.model' ? 'gpt-4o-mini' : undefined,
            ),
          },
        },
      ],
    }).compile();

    service = module.get(SummaryExtractionDomainService);
  };

  const auditedEvents = (): ExtractionEventType[] =>
    logExtractionEvent.mock.calls.map(([data]) => data.event);

  beforeEach(async () => {
    clinicalRepository = new InMemoryClinicalSummaryRepository();
    hospitalRepository = new InMemoryHospitalSummaryRepository();
    logExtractionEvent = jest.fn<void, [ExtractionEventData]>();
    await compile();
  });

  it('should persist both summaries under one hospitalization id', async () => {
    const result = await service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
    );

    const clinicalRow =
      await clinicalRepository.findByHospitalizationId('hosp-1');
    const hospitalRow =
      await hospitalRepository.findByHospitalizationId('hosp-1');
    expect(result.hospitalizationId).toBe('hosp-1');
    expect(result.patientId).toBe(TEST_PATIENT_ID);
    expect(result.status).toBe(ProcessingStatus.COMPLETED);
    expect(result.message).toBe(
      'clinical summary saved, hospital summary saved',
    );
    expect(result.clinical).toEqual({
      status: PersistenceStatus.PERSISTED,
      recordId: clinicalRow?.id,
      attempts: 1,
    });
    expect(result.hospital).toEqual({
      status: PersistenceStatus.PERSISTED,
      recordId: hospitalRow?.id,
      attempts: 1,
    });
    expect(hospitalRow?.lengthOfStayDays).toBe(4);
    expect(clinicalRow?.labSummary).toEqual({
      total_tests: 3,
      critical_count: 1,
      abnormal_count: 1,
      normal_count: 1,
    });
  });

  it('should report every kind in registry order', async () => {
    const result = await service.process(testDocument());

    expect(result.extractions.map((report) => report.kind)).toEqual([
      EntityKind.PRESENTATION,
      EntityKind.HISTORY,
      EntityKind.FINDINGS,
      EntityKind.ASSESSMENT,
      EntityKind.COURSE,
      EntityKind.FOLLOW_UP,
      EntityKind.TREATMENTS,
      EntityKind.LABS,
      EntityKind.FACILITY_TIMING,
      EntityKind.DIAGNOSIS,
      EntityKind.MEDICATION_RISK,
    ]);
    expect(
      result.extractions.find((report) => report.kind === EntityKind.LABS)
        ?.group,
    ).toBe(SummaryGroup.CLINICAL);
    expect(
      result.extractions.every(
        (report) => report.status === ExtractionStatus.SUCCESS,
      ),
    ).toBe(true);
  });

  it('should allocate a new hospitalization id when none is supplied', async () => {
    const result = await service.process(testDocument());

    expect(result.hospitalizationId).toMatch(UUID_PATTERN);
    const hospitalRow = await hospitalRepository.findByHospitalizationId(
      result.hospitalizationId,
    );
    expect(hospitalRow).not.toBeNull();
  });

  it('should audit the start and the completion without note text', async () => {
    await service.process(testDocument({ hospitalizationId: 'hosp-1' }));

    expect(logExtractionEvent).toHaveBeenCalledTimes(2);
    expect(logExtractionEvent.mock.calls[0][0]).toEqual({
      event: ExtractionEventType.SUMMARY_EXTRACTION_STARTED,
      hospitalizationId: 'hosp-1',
      patientId: TEST_PATIENT_ID,
      success: true,
      metadata: { textLength: testDocument().text.length },
    });
    expect(logExtractionEvent.mock.calls[1][0]).toMatchObject({
      event: ExtractionEventType.SUMMARY_EXTRACTION_COMPLETED,
      success: true,
      errorMessage: undefined,
      metadata: { succeededKinds: 11, failedKinds: [] },
    });
  });

  it('should save the clinical summary when a hospital section is missing', async () => {
    await compile({ [EntityKind.DIAGNOSIS]: failing });

    const result = await service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
    );

    expect(result.status).toBe(ProcessingStatus.PARTIAL);
    expect(result.message).toBe(
      'clinical summary saved, hospital summary failed: missing diagnosis',
    );
    expect(clinicalRepository.size).toBe(1);
    expect(hospitalRepository.upsertCalls).toBe(0);
    expect(
      result.extractions.find((report) => report.kind === EntityKind.DIAGNOSIS),
    ).toEqual({
      kind: EntityKind.DIAGNOSIS,
      group: SummaryGroup.HOSPITAL,
      status: ExtractionStatus.FAILED,
      durationMs: expect.any(Number),
      error: 'model refused',
    });
    expect(auditedEvents()).toEqual([
      ExtractionEventType.SUMMARY_EXTRACTION_STARTED,
      ExtractionEventType.SUMMARY_EXTRACTION_PARTIAL,
    ]);
  });

  it('should null a failed clinical section and still persist', async () => {
    await compile({ [EntityKind.HISTORY]: failing });

    const result = await service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
    );

    const clinicalRow =
      await clinicalRepository.findByHospitalizationId('hosp-1');
    expect(result.status).toBe(ProcessingStatus.COMPLETED);
    expect(clinicalRow?.relevantHistory).toBeNull();
    expect(logExtractionEvent.mock.calls[1][0]).toMatchObject({
      metadata: { succeededKinds: 10, failedKinds: [EntityKind.HISTORY] },
    });
  });

  it('should fail when neither summary is saved', async () => {
    await compile({ [EntityKind.DIAGNOSIS]: failing });
    clinicalRepository.failNextUpsert(new Error('disk full'));

    const result = await service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
    );

    expect(result.status).toBe(ProcessingStatus.FAILED);
    expect(result.message).toBe(
      'clinical summary failed: disk full, hospital summary failed: missing diagnosis',
    );
    expect(logExtractionEvent.mock.calls[1][0]).toMatchObject({
      event: ExtractionEventType.SUMMARY_EXTRACTION_FAILED,
      success: false,
      errorMessage:
        'clinical summary failed: disk full, hospital summary failed: missing diagnosis',
    });
  });

  it('should update the same rows when a document is reprocessed', async () => {
    const first = await service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
    );
    const second = await service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
    );

    expect(second.clinical).toEqual(first.clinical);
    expect(second.hospital).toEqual(first.hospital);
    expect(clinicalRepository.size).toBe(1);
    expect(hospitalRepository.size).toBe(1);
  });

  it('should persist nothing when the caller cancels', async () => {
    await compile({ [EntityKind.COURSE]: hangUntilAborted });
    const controller = new AbortController();

    const pending = service.process(
      testDocument({ hospitalizationId: 'hosp-1' }),
      controller.signal,
    );
    controller.abort();

    await expect(pending).rejects.toThrow(ExtractionCancelledError);
    expect(clinicalRepository.upsertCalls).toBe(0);
    expect(hospitalRepository.upsertCalls).toBe(0);
    expect(auditedEvents()).toEqual([
      ExtractionEventType.SUMMARY_EXTRACTION_STARTED,
      ExtractionEventType.SUMMARY_EXTRACTION_CANCELLED,
    ]);
  });

  it('should keep concurrent documents independent', async () => {
    const [first, second] = await Promise.all([
      service.process(testDocument({ hospitalizationId: 'hosp-1' })),
      service.process(
        testDocument({
          hospitalizationId: 'hosp-2',
          patientId: 'patient-0002',
        }),
      ),
    ]);

    expect(first.status).toBe(ProcessingStatus.COMPLETED);
    expect(second.status).toBe(ProcessingStatus.COMPLETED);
    expect(
      (await hospitalRepository.findByHospitalizationId('hosp-2'))?.patientId,
    ).toBe('patient-0002');
    expect(hospitalRepository.size).toBe(2);
  });
});
