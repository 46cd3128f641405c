import { Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import { ClinicalDocument } from '../../domain/entities/clinical-document.entity';
import { EntityKind } from '../../domain/enums/entity-kind.enum';
import { ExtractorFailureError } from '../../domain/errors/extraction.errors';
import {
  EntityExtractorPort,
  ExtractionContext,
} from '../../domain/ports/entity-extractor.port';
import { LlmChatClient } from './llm-chat.client';
import { LlmUpstreamError } from './llm-upstream-error';
import { PromptTemplateService } from './prompt-template.service';

export interface LlmEntityExtractorOptions {
  maxRetries: number;
  retryDelayMs: number;
}

class UnparseableCompletionError extends Error {
  constructor(kind: EntityKind) {
    super(`Completion for '${kind}' is not a JSON object`);
    this.name = 'UnparseableCompletionError';
    Object.setPrototypeOf(this, UnparseableCompletionError.prototype);
  }
}

/**
 * LLM-backed extractor for one entity kind.
 *
 * Retries rate limits, provider errors and unparseable completions with
 * exponential backoff. Returns the parsed JSON object unvalidated.
 */
export class LlmEntityExtractor implements EntityExtractorPort {
  private readonly logger = new Logger(LlmEntityExtractor.name);

  constructor(
    readonly kind: EntityKind,
    private readonly chatClient: LlmChatClient,
    private readonly promptTemplateService: PromptTemplateService,
    private readonly options: LlmEntityExtractorOptions,
  ) {}

  async extract(
    document: ClinicalDocument,
    context: ExtractionContext,
  ): Promise<unknown> {
    const messages = await this.promptTemplateService.render(this.kind, {
      text: document.text,
    });
    const attempts = this.options.maxRetries + 1;
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const completion = await this.chatClient.completeJson(messages, {
          signal: context.signal,
        });
        return this.parseCompletion(completion.content);
      } catch (error) {
        if (context.signal.aborted || !this.isRetryable(error)) {
          throw error;
        }
        lastError = error instanceof Error ? error.message : String(error);
        if (attempt < attempts) {
          const delayMs = this.options.retryDelayMs * 2 ** (attempt - 1);
          this.logger.warn(
            `[LLM] ${context.hospitalizationId}: '${this.kind}' attempt ${attempt}/${attempts} failed, retrying in ${delayMs}ms`,
          );
          await sleep(delayMs, undefined, { signal: context.signal });
        }
      }
    }

    throw new ExtractorFailureError(
      this.kind,
      `'${this.kind}' extraction failed after ${attempts} attempts: ${lastError}`,
    );
  }

  private parseCompletion(content: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new UnparseableCompletionError(this.kind);
    }
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      Array.isArray(parsed)
    ) {
      throw new UnparseableCompletionError(this.kind);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof LlmUpstreamError) {
      return error.retryable;
    }
    return error instanceof UnparseableCompletionError;
  }
}
