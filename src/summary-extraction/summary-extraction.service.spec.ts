import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  sampleClinicalSummary,
  sampleHospitalSummary,
  TEST_NOTE_TEXT,
  TEST_PATIENT_ID,
} from '../../test/utils/extraction-fixtures';
import {
  InMemoryClinicalSummaryRepository,
  InMemoryHospitalSummaryRepository,
} from '../../test/utils/in-memory-summary.repositories';
import { SummaryExtractionResult } from './domain/entities/extraction-result.entity';
import { EntityKind } from './domain/enums/entity-kind.enum';
import { ExtractionStatus } from './domain/enums/extraction-status.enum';
import {
  AggregateFailureType,
  PersistenceStatus,
} from './domain/enums/persistence-status.enum';
import { ProcessingStatus } from './domain/enums/processing-status.enum';
import { SummaryGroup } from './domain/enums/summary-group.enum';
import { SummaryExtractionDomainService } from './domain/services/summary-extraction.domain.service';
import { SummaryExtractionService } from './summary-extraction.service';

describe('SummaryExtractionService', () => {
  let service: SummaryExtractionService;
  let processDocument: jest.Mock<
    Promise<SummaryExtractionResult>,
    Parameters<SummaryExtractionDomainService['process']>
  >;
  let clinicalRepository: InMemoryClinicalSummaryRepository;
  let hospitalRepository: InMemoryHospitalSummaryRepository;

  const partialResult: SummaryExtractionResult = {
    hospitalizationId: 'hosp-1',
    patientId: TEST_PATIENT_ID,
    status: ProcessingStatus.PARTIAL,
    message:
      'clinical summary saved, hospital summary failed: missing diagnosis',
    clinical: {
      status: PersistenceStatus.PERSISTED,
      recordId: 'clinical-1',
      attempts: 1,
    },
    hospital: {
      status: PersistenceStatus.FAILED,
      attempts: 0,
      failure: {
        type: AggregateFailureType.ASSEMBLY_FAILURE,
        message: 'missing diagnosis',
        entityKinds: [EntityKind.DIAGNOSIS],
      },
    },
    extractions: [
      {
        kind: EntityKind.DIAGNOSIS,
        group: SummaryGroup.HOSPITAL,
        status: ExtractionStatus.TIMED_OUT,
        durationMs: 180000,
        error: "Extractor 'diagnosis' timed out after 180000ms",
      },
    ],
    durationMs: 180012,
  };

  beforeEach(async () => {
    processDocument = jest.fn();
    clinicalRepository = new InMemoryClinicalSummaryRepository();
    hospitalRepository = new InMemoryHospitalSummaryRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SummaryExtractionService,
        {
          provide: SummaryExtractionDomainService,
          useValue: { process: processDocument },
        },
        {
          provide: 'HospitalSummaryRepositoryPort',
          useValue: hospitalRepository,
        },
        {
          provide: 'ClinicalSummaryRepositoryPort',
          useValue: clinicalRepository,
        },
      ],
    }).compile();

    service = module.get(SummaryExtractionService);
  });

  describe('extract', () => {
    it('should hand the document and signal to the pipeline', async () => {
      processDocument.mockResolvedValue(partialResult);
      const signal = new AbortController().signal;

      await service.extract(
        {
          patientId: TEST_PATIENT_ID,
          text: TEST_NOTE_TEXT,
          hospitalizationId: 'hosp-1',
        },
        signal,
      );

      expect(processDocument).toHaveBeenCalledWith(
        {
          patientId: TEST_PATIENT_ID,
          text: TEST_NOTE_TEXT,
          hospitalizationId: 'hosp-1',
        },
        signal,
      );
    });

    it('should map the combined result', async () => {
      processDocument.mockResolvedValue(partialResult);

      const response = await service.extract({
        patientId: TEST_PATIENT_ID,
        text: TEST_NOTE_TEXT,
      });

      expect(response).toEqual({
        hospitalizationId: 'hosp-1',
        patientId: TEST_PATIENT_ID,
        status: ProcessingStatus.PARTIAL,
        message:
          'clinical summary saved, hospital summary failed: missing diagnosis',
        clinical: {
          status: PersistenceStatus.PERSISTED,
          recordId: 'clinical-1',
          attempts: 1,
        },
        hospital: {
          status: PersistenceStatus.FAILED,
          attempts: 0,
          failure: {
            type: AggregateFailureType.ASSEMBLY_FAILURE,
            message: 'missing diagnosis',
            entityKinds: [EntityKind.DIAGNOSIS],
          },
        },
        extractions: [
          {
            kind: EntityKind.DIAGNOSIS,
            group: SummaryGroup.HOSPITAL,
            status: ExtractionStatus.TIMED_OUT,
            durationMs: 180000,
            error: "Extractor 'diagnosis' timed out after 180000ms",
          },
        ],
        durationMs: 180012,
      });
    });
  });

  describe('getHospitalSummary', () => {
    it('should return the stored summary', async () => {
      const saved = await hospitalRepository.upsert(
        sampleHospitalSummary('hosp-1'),
      );

      const response = await service.getHospitalSummary(saved.id ?? '');

      expect(response.id).toBe(saved.id);
      expect(response.hospitalizationId).toBe('hosp-1');
      expect(response.lengthOfStayDays).toBe(4);
      expect(response.facility.facility_name).toBe(
        'Riverside Community Hospital',
      );
    });

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(
        service.getHospitalSummary('8f14e45f-ceea-4a7b-9f3c-2b1d4c5e6f70'),
      ).rejects.toThrow(new NotFoundException('Hospital summary not found'));
    });
  });

  describe('getClinicalSummary', () => {
    it('should return the stored summary', async () => {
      const saved = await clinicalRepository.upsert(
        sampleClinicalSummary('hosp-1'),
      );

      const response = await service.getClinicalSummary(saved.id ?? '');

      expect(response.id).toBe(saved.id);
      expect(response.parsingModelVersion).toBe('test-model');
      expect(response.labResults).toHaveLength(3);
    });

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(
        service.getClinicalSummary('8f14e45f-ceea-4a7b-9f3c-2b1d4c5e6f70'),
      ).rejects.toThrow('Clinical summary not found');
    });
  });

  describe('deleteHospitalSummary', () => {
    it('should remove the record and leave the clinical one', async () => {
      const saved = await hospitalRepository.upsert(
        sampleHospitalSummary('hosp-1'),
      );
      await clinicalRepository.upsert(sampleClinicalSummary('hosp-1'));

      await service.deleteHospitalSummary(saved.id ?? '');

      expect(hospitalRepository.size).toBe(0);
      expect(clinicalRepository.size).toBe(1);
    });

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(
        service.deleteHospitalSummary('8f14e45f-ceea-4a7b-9f3c-2b1d4c5e6f70'),
      ).rejects.toThrow('Hospital summary not found');
    });
  });

  describe('deleteClinicalSummary', () => {
    it('should throw NotFoundException once the record is gone', async () => {
      const saved = await clinicalRepository.upsert(
        sampleClinicalSummary('hosp-1'),
      );

      await service.deleteClinicalSummary(saved.id ?? '');

      await expect(
        service.deleteClinicalSummary(saved.id ?? ''),
      ).rejects.toThrow(new NotFoundException('Clinical summary not found'));
    });
  });

  describe('getByHospitalization', () => {
    it('should return null for the summary that was not saved', async () => {
      await clinicalRepository.upsert(sampleClinicalSummary('hosp-1'));

      const response = await service.getByHospitalization('hosp-1');

      expect(response.hospitalizationId).toBe('hosp-1');
      expect(response.hospital).toBeNull();
      expect(response.clinical?.hospitalizationId).toBe('hosp-1');
    });

    it('should throw NotFoundException when neither summary exists', async () => {
      await expect(service.getByHospitalization('hosp-404')).rejects.toThrow(
        'No summaries for this hospitalization',
      );
    });
  });

  describe('listByPatient', () => {
    beforeEach(async () => {
      for (const hospitalizationId of ['hosp-1', 'hosp-2', 'hosp-3']) {
        await hospitalRepository.upsert(
          sampleHospitalSummary(hospitalizationId),
        );
        await clinicalRepository.upsert(
          sampleClinicalSummary(hospitalizationId),
        );
      }
      await hospitalRepository.upsert(
        sampleHospitalSummary('hosp-other', 'patient-0002'),
      );
    });

    it('should list the newest summaries first', async () => {
      const response = await service.listByPatient(TEST_PATIENT_ID);

      expect(response.patientId).toBe(TEST_PATIENT_ID);
      expect(
        response.hospital.map((summary) => summary.hospitalizationId),
      ).toEqual(['hosp-3', 'hosp-2', 'hosp-1']);
      expect(response.clinical).toHaveLength(3);
    });

    it('should apply the limit to both lists', async () => {
      const response = await service.listByPatient(TEST_PATIENT_ID, 2);

      expect(
        response.hospital.map((summary) => summary.hospitalizationId),
      ).toEqual(['hosp-3', 'hosp-2']);
      expect(response.clinical).toHaveLength(2);
    });

    it('should return empty lists for an unknown patient', async () => {
      const response = await service.listByPatient('patient-9999');

      expect(response).toEqual({
        patientId: 'patient-9999',
        hospital: [],
        clinical: [],
      });
    });
  });
});
