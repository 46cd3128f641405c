import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AuditModule } from '../audit/audit.module';
import { AllConfigType } from '../config/config.type';
import summaryExtractionConfig from './config/summary-extraction.config';
import { EXTRACTION_REGISTRY } from './domain/registry/extraction.registry';
import { AggregateAssemblerDomainService } from './domain/services/aggregate-assembler.domain.service';
import { CorrelationIdAllocatorDomainService } from './domain/services/correlation-id-allocator.domain.service';
import { ExtractionOrchestratorDomainService } from './domain/services/extraction-orchestrator.domain.service';
import { PersistenceCoordinatorDomainService } from './domain/services/persistence-coordinator.domain.service';
import { SummaryExtractionDomainService } from './domain/services/summary-extraction.domain.service';
import { LlmChatClient } from './infrastructure/llm/llm-chat.client';
import { createLlmExtractionRegistry } from './infrastructure/llm/llm-extraction-registry.factory';
import { PromptTemplateService } from './infrastructure/llm/prompt-template.service';
import { RelationalSummaryPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { SummaryExtractionController } from './summary-extraction.controller';
import { SummaryExtractionService } from './summary-extraction.service';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(summaryExtractionConfig),

    // Database ports for both summary groups
    RelationalSummaryPersistenceModule,

    // Audit logging
    AuditModule,
  ],
  controllers: [SummaryExtractionController],
  providers: [
    // Application layer
    SummaryExtractionService,

    // Domain layer
    CorrelationIdAllocatorDomainService,
    ExtractionOrchestratorDomainService,
    AggregateAssemblerDomainService,
    PersistenceCoordinatorDomainService,
    SummaryExtractionDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    LlmChatClient,
    PromptTemplateService,
    {
      provide: EXTRACTION_REGISTRY,
      useFactory: (
        chatClient: LlmChatClient,
        promptTemplateService: PromptTemplateService,
        configService: ConfigService<AllConfigType>,
      ) =>
        createLlmExtractionRegistry(
          chatClient,
          promptTemplateService,
          configService,
        ),
      inject: [LlmChatClient, PromptTemplateService, ConfigService],
    },
  ],
  exports: [SummaryExtractionService],
})
export class SummaryExtractionModule {}
