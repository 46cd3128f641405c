import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { ClinicalSummary } from './domain/entities/clinical-summary.entity';
import { HospitalSummary } from './domain/entities/hospital-summary.entity';
import { SummaryExtractionResult } from './domain/entities/extraction-result.entity';
import { PersistenceOutcome } from './domain/entities/persistence-outcome.entity';
import { PersistenceStatus } from './domain/enums/persistence-status.enum';
import { ClinicalSummaryRepositoryPort } from './domain/ports/clinical-summary.repository.port';
import { HospitalSummaryRepositoryPort } from './domain/ports/hospital-summary.repository.port';
import { SummaryExtractionDomainService } from './domain/services/summary-extraction.domain.service';
import { ClinicalSummaryResponseDto } from './dto/clinical-summary-response.dto';
import { ExtractSummaryDto } from './dto/extract-summary.dto';
import { HospitalSummaryResponseDto } from './dto/hospital-summary-response.dto';
import {
  HospitalizationSummariesResponseDto,
  PatientSummariesResponseDto,
} from './dto/hospitalization-summaries-response.dto';
import {
  PersistenceOutcomeResponseDto,
  SummaryExtractionResponseDto,
} from './dto/summary-extraction-response.dto';

const DEFAULT_PATIENT_LIMIT = 10;

/**
 * Summary Extraction Application Service
 *
 * Thin layer between the controller and the domain: maps DTOs in and out,
 * turns absent records into 404s.
 */
@Injectable()
export class SummaryExtractionService {
  constructor(
    private readonly summaryExtractionDomainService:
      SummaryExtractionDomainService,
    @Inject('HospitalSummaryRepositoryPort')
    private readonly hospitalSummaryRepository: HospitalSummaryRepositoryPort,
    @Inject('ClinicalSummaryRepositoryPort')
    private readonly clinicalSummaryRepository: ClinicalSummaryRepositoryPort,
  ) {}

  async extract(
    dto: ExtractSummaryDto,
    signal?: AbortSignal,
  ): Promise<SummaryExtractionResponseDto> {
    const result = await this.summaryExtractionDomainService.process(
      {
        patientId: dto.patientId,
        text: dto.text,
        hospitalizationId: dto.hospitalizationId,
      },
      signal,
    );
    return this.toExtractionResponseDto(result);
  }

  async getHospitalSummary(id: string): Promise<HospitalSummaryResponseDto> {
    const summary = await this.hospitalSummaryRepository.findById(id);
    if (!summary) {
      throw new NotFoundException('Hospital summary not found');
    }
    return this.toHospitalResponseDto(summary);
  }

  async getClinicalSummary(id: string): Promise<ClinicalSummaryResponseDto> {
    const summary = await this.clinicalSummaryRepository.findById(id);
    if (!summary) {
      throw new NotFoundException('Clinical summary not found');
    }
    return this.toClinicalResponseDto(summary);
  }

  async deleteHospitalSummary(id: string): Promise<void> {
    const deleted = await this.hospitalSummaryRepository.delete(id);
    if (!deleted) {
      throw new NotFoundException('Hospital summary not found');
    }
  }

  async deleteClinicalSummary(id: string): Promise<void> {
    const deleted = await this.clinicalSummaryRepository.delete(id);
    if (!deleted) {
      throw new NotFoundException('Clinical summary not found');
    }
  }

  /**
   * Either record may be missing when its aggregate failed; 404 only when
   * neither exists.
   */
  async getByHospitalization(
    hospitalizationId: string,
  ): Promise<HospitalizationSummariesResponseDto> {
    const [hospital, clinical] = await Promise.all([
      this.hospitalSummaryRepository.findByHospitalizationId(hospitalizationId),
      this.clinicalSummaryRepository.findByHospitalizationId(hospitalizationId),
    ]);

    if (!hospital && !clinical) {
      throw new NotFoundException('No summaries for this hospitalization');
    }

    return {
      hospitalizationId,
      hospital: hospital ? this.toHospitalResponseDto(hospital) : null,
      clinical: clinical ? this.toClinicalResponseDto(clinical) : null,
    };
  }

  async listByPatient(
    patientId: string,
    limit: number = DEFAULT_PATIENT_LIMIT,
  ): Promise<PatientSummariesResponseDto> {
    const [hospital, clinical] = await Promise.all([
      this.hospitalSummaryRepository.findByPatientId(patientId, { limit }),
      this.clinicalSummaryRepository.findByPatientId(patientId, { limit }),
    ]);

    return {
      patientId,
      hospital: hospital.map((summary) => this.toHospitalResponseDto(summary)),
      clinical: clinical.map((summary) => this.toClinicalResponseDto(summary)),
    };
  }

  toExtractionResponseDto(
    result: SummaryExtractionResult,
  ): SummaryExtractionResponseDto {
    return {
      hospitalizationId: result.hospitalizationId,
      patientId: result.patientId,
      status: result.status,
      message: result.message,
      clinical: this.toOutcomeResponseDto(result.clinical),
      hospital: this.toOutcomeResponseDto(result.hospital),
      extractions: result.extractions.map((report) => ({ ...report })),
      durationMs: result.durationMs,
    };
  }

  private toOutcomeResponseDto(
    outcome: PersistenceOutcome,
  ): PersistenceOutcomeResponseDto {
    if (outcome.status === PersistenceStatus.PERSISTED) {
      return {
        status: outcome.status,
        recordId: outcome.recordId,
        attempts: outcome.attempts,
      };
    }
    return {
      status: outcome.status,
      attempts: outcome.attempts,
      failure: {
        type: outcome.failure.type,
        message: outcome.failure.message,
        entityKinds: [...outcome.failure.entityKinds],
      },
    };
  }

  private toHospitalResponseDto(
    summary: HospitalSummary,
  ): HospitalSummaryResponseDto {
    return {
      id: summary.id,
      hospitalizationId: summary.hospitalizationId,
      patientId: summary.patientId,
      facility: summary.facility,
      timing: summary.timing,
      diagnosis: summary.diagnosis,
      medicationRiskAssessment: summary.medicationRiskAssessment,
      lengthOfStayDays: summary.lengthOfStayDays,
      createdAt: summary.createdAt,
      updatedAt: summary.updatedAt,
    };
  }

  private toClinicalResponseDto(
    summary: ClinicalSummary,
  ): ClinicalSummaryResponseDto {
    return {
      id: summary.id,
      hospitalizationId: summary.hospitalizationId,
      patientId: summary.patientId,
      patientPresentation: summary.patientPresentation,
      relevantHistory: summary.relevantHistory,
      clinicalFindings: summary.clinicalFindings,
      clinicalAssessment: summary.clinicalAssessment,
      hospitalCourse: summary.hospitalCourse,
      followUpPlan: summary.followUpPlan,
      treatmentsProcedures: summary.treatmentsProcedures,
      labResults: summary.labResults,
      labSummary: summary.labSummary,
      parsingModelVersion: summary.parsingModelVersion,
      parsedAt: summary.parsedAt,
      createdAt: summary.createdAt,
      updatedAt: summary.updatedAt,
    };
  }
}
