import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { EntityKind } from '../../domain/enums/entity-kind.enum';
import {
  createExtractionRegistry,
  ExtractionRegistry,
  ExtractorSet,
} from '../../domain/registry/extraction.registry';
import { LlmChatClient } from './llm-chat.client';
import { LlmEntityExtractor } from './llm-entity-extractor';
import { PromptTemplateService } from './prompt-template.service';

/**
 * One LLM extractor per entity kind, sharing the chat client and templates.
 * Retry settings are read once here and handed to each instance.
 */
export function createLlmExtractionRegistry(
  chatClient: LlmChatClient,
  promptTemplateService: PromptTemplateService,
  configService: ConfigService<AllConfigType>,
): ExtractionRegistry {
  const llm = configService.getOrThrow('summaryExtraction.llm', {
    infer: true,
  });
  const options = {
    maxRetries: llm.maxRetries,
    retryDelayMs: llm.retryDelayMs,
  };
  const extractorFor = (kind: EntityKind): LlmEntityExtractor =>
    new LlmEntityExtractor(kind, chatClient, promptTemplateService, options);

  const extractors: ExtractorSet = {
    [EntityKind.PRESENTATION]: extractorFor(EntityKind.PRESENTATION),
    [EntityKind.HISTORY]: extractorFor(EntityKind.HISTORY),
    [EntityKind.FINDINGS]: extractorFor(EntityKind.FINDINGS),
    [EntityKind.ASSESSMENT]: extractorFor(EntityKind.ASSESSMENT),
    [EntityKind.COURSE]: extractorFor(EntityKind.COURSE),
    [EntityKind.FOLLOW_UP]: extractorFor(EntityKind.FOLLOW_UP),
    [EntityKind.TREATMENTS]: extractorFor(EntityKind.TREATMENTS),
    [EntityKind.LABS]: extractorFor(EntityKind.LABS),
    [EntityKind.FACILITY_TIMING]: extractorFor(EntityKind.FACILITY_TIMING),
    [EntityKind.DIAGNOSIS]: extractorFor(EntityKind.DIAGNOSIS),
    [EntityKind.MEDICATION_RISK]: extractorFor(EntityKind.MEDICATION_RISK),
  };

  return createExtractionRegistry(extractors);
}
