import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'node:fs/promises';
import * as path from 'path';
import Handlebars from 'handlebars';
import { AllConfigType } from '../../../config/config.type';
import { EntityKind } from '../../domain/enums/entity-kind.enum';
import { ChatMessage } from './llm-chat.client';

export interface PromptContext {
  text: string;
}

type CompiledTemplate = Handlebars.TemplateDelegate<PromptContext>;

/**
 * Renders extraction prompts from Handlebars templates
 *
 * `system.hbs` is shared by every kind, `<kind>.hbs` carries the kind's
 * instructions and output shape. Templates are compiled once and cached.
 */
@Injectable()
export class PromptTemplateService {
  private readonly logger = new Logger(PromptTemplateService.name);
  private readonly cache = new Map<string, Promise<CompiledTemplate>>();

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async render(
    kind: EntityKind,
    context: PromptContext,
  ): Promise<ChatMessage[]> {
    const [system, user] = await Promise.all([
      this.load('system'),
      this.load(kind),
    ]);

    return [
      { role: 'system', content: system(context) },
      { role: 'user', content: user(context) },
    ];
  }

  private load(name: string): Promise<CompiledTemplate> {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const directory = this.configService.getOrThrow(
      'summaryExtraction.promptsDirectory',
      { infer: true },
    );
    const templatePath = path.join(directory, `${name}.hbs`);

    const compiled = fs
      .readFile(templatePath, 'utf-8')
      .then((template) =>
        // Note text is passed through verbatim, not HTML-escaped
        Handlebars.compile<PromptContext>(template, {
          strict: true,
          noEscape: true,
        }),
      )
      .catch((error: unknown) => {
        this.cache.delete(name);
        this.logger.error(
          `[LLM] Failed to load prompt template '${name}': ${error instanceof Error ? error.message : String(error)}`,
        );
        throw error;
      });

    this.cache.set(name, compiled);
    return compiled;
  }
}
