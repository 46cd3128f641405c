import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Response } from 'express';
import { ServiceApiKeyGuard } from '../auth/guards/service-api-key.guard';
import { ExtractionCancelledError } from './domain/errors/extraction.errors';
import { ClinicalSummaryResponseDto } from './dto/clinical-summary-response.dto';
import { ExtractSummaryDto } from './dto/extract-summary.dto';
import { HospitalSummaryResponseDto } from './dto/hospital-summary-response.dto';
import {
  HospitalizationSummariesResponseDto,
  PatientSummariesResponseDto,
} from './dto/hospitalization-summaries-response.dto';
import { PatientSummariesQueryDto } from './dto/patient-summaries-query.dto';
import { SummaryExtractionResponseDto } from './dto/summary-extraction-response.dto';
import { SummaryExtractionService } from './summary-extraction.service';

// nginx convention for a request the client abandoned
const CLIENT_CLOSED_REQUEST = 499;

/**
 * Summary Extraction Controller
 *
 * Service-to-service only (bearer service API key). Responses carry
 * identifiers, statuses and structured sections; the submitted note text is
 * never echoed back.
 */
@ApiTags('Summaries')
@Controller({ path: 'summaries', version: '1' })
@UseGuards(ServiceApiKeyGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Missing or invalid service API key' })
export class SummaryExtractionController {
  private readonly logger = new Logger(SummaryExtractionController.name);

  constructor(
    private readonly summaryExtractionService: SummaryExtractionService,
  ) {}

  @Post('extract')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Extract hospital and clinical summaries from a clinical note',
    description:
      'Runs every entity extractor concurrently and persists both summaries independently. Answers 201 with a combined status even when an aggregate fails.',
  })
  @ApiCreatedResponse({ type: SummaryExtractionResponseDto })
  async extract(
    @Body() dto: ExtractSummaryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<SummaryExtractionResponseDto> {
    // A client that disconnects before the answer is written
    // cancels the document
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      return await this.summaryExtractionService.extract(
        dto,
        controller.signal,
      );
    } catch (error) {
      if (error instanceof ExtractionCancelledError) {
        this.logger.warn(
          `[EXTRACT] ${error.hospitalizationId}: client disconnected, nothing persisted`,
        );
        throw new HttpException('Client closed request', CLIENT_CLOSED_REQUEST);
      }
      throw error;
    } finally {
      res.off('close', onClose);
    }
  }

  @Get('hospital/:id')
  @ApiOperation({ summary: 'Get a hospital admission summary by record id' })
  @ApiParam({ name: 'id', type: String, format: 'uuid' })
  @ApiOkResponse({ type: HospitalSummaryResponseDto })
  @ApiNotFoundResponse({ description: 'Hospital summary not found' })
  async getHospitalSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<HospitalSummaryResponseDto> {
    return this.summaryExtractionService.getHospitalSummary(id);
  }

  @Get('clinical/:id')
  @ApiOperation({ summary: 'Get a clinical summary by record id' })
  @ApiParam({ name: 'id', type: String, format: 'uuid' })
  @ApiOkResponse({ type: ClinicalSummaryResponseDto })
  @ApiNotFoundResponse({ description: 'Clinical summary not found' })
  async getClinicalSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ClinicalSummaryResponseDto> {
    return this.summaryExtractionService.getClinicalSummary(id);
  }

  @Delete('hospital/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a hospital admission summary' })
  @ApiParam({ name: 'id', type: String, format: 'uuid' })
  @ApiNoContentResponse({ description: 'Hospital summary deleted' })
  @ApiNotFoundResponse({ description: 'Hospital summary not found' })
  async deleteHospitalSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    await this.summaryExtractionService.deleteHospitalSummary(id);
  }

  @Delete('clinical/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a clinical summary' })
  @ApiParam({ name: 'id', type: String, format: 'uuid' })
  @ApiNoContentResponse({ description: 'Clinical summary deleted' })
  @ApiNotFoundResponse({ description: 'Clinical summary not found' })
  async deleteClinicalSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    await this.summaryExtractionService.deleteClinicalSummary(id);
  }

  @Get('hospitalizations/:hospitalizationId')
  @ApiOperation({
    summary: 'Get both summaries produced for one hospitalization id',
  })
  @ApiOkResponse({ type: HospitalizationSummariesResponseDto })
  @ApiNotFoundResponse({ description: 'No summaries for this hospitalization' })
  async getByHospitalization(
    @Param('hospitalizationId') hospitalizationId: string,
  ): Promise<HospitalizationSummariesResponseDto> {
    return this.summaryExtractionService.getByHospitalization(
      hospitalizationId,
    );
  }

  @Get('patients/:patientId')
  @ApiOperation({ summary: "List a patient's most recent summaries" })
  @ApiOkResponse({ type: PatientSummariesResponseDto })
  async listByPatient(
    @Param('patientId') patientId: string,
    @Query() query: PatientSummariesQueryDto,
  ): Promise<PatientSummariesResponseDto> {
    return this.summaryExtractionService.listByPatient(
      patientId,
      query.limit,
    );
  }
}
