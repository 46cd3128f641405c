import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { LlmUpstreamError } from './llm-upstream-error';
import { ChatCompletionResponseSchema } from './schemas/chat-completion.schema';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionResult {
  content: string;
  requestId: string;
  model: string;
}

const CHAT_COMPLETIONS_PATH = '/chat/completions';

/**
 * HTTP client for an OpenAI-compatible chat-completions endpoint
 *
 * Requests JSON-mode completions. Prompt and completion text are PHI and
 * are never logged; only method, path, status, duration and request id.
 */
@Injectable()
export class LlmChatClient {
  private readonly logger = new Logger(LlmChatClient.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  /**
   * @throws LlmUpstreamError on non-2xx responses, network failures and
   * malformed completions. An abort rejects with the signal's reason.
   */
  async completeJson(
    messages: ChatMessage[],
    options: { signal?: AbortSignal } = {},
  ): Promise<ChatCompletionResult> {
    const llmConfig = this.configService.getOrThrow('summaryExtraction.llm', {
      infer: true,
    });
    const requestId = randomUUID();
    const startTime = Date.now();
    const body = {
      model: llmConfig.model,
      temperature: llmConfig.temperature,
      response_format: { type: 'json_object' },
      messages,
    };

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Request-Id': requestId,
    };
    if (llmConfig.apiKey) {
      headers.Authorization = `Bearer ${llmConfig.apiKey}`;
    }

    this.logger.debug(
      `[LLM Request] POST ${CHAT_COMPLETIONS_PATH} | Model: ${llmConfig.model} | RequestId: ${requestId}`,
    );

    let response: Response;
    try {
      response = await fetch(`${llmConfig.baseUrl}${CHAT_COMPLETIONS_PATH}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const upstreamError = LlmUpstreamError.fromNetworkError(
        error instanceof Error ? error : new Error(String(error)),
        requestId,
        CHAT_COMPLETIONS_PATH,
        body,
      );
      this.logger.error(
        `[LLM Error] POST ${CHAT_COMPLETIONS_PATH} | Duration: ${Date.now() - startTime}ms | RequestId: ${requestId} | Error: ${upstreamError.message}`,
      );
      throw upstreamError;
    }

    const duration = Date.now() - startTime;

    if (!response.ok) {
      const upstreamError = await LlmUpstreamError.fromResponse(
        response,
        requestId,
        CHAT_COMPLETIONS_PATH,
        body,
      );
      this.logger.error(
        `[LLM Response] POST ${CHAT_COMPLETIONS_PATH} | Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
      );
      throw upstreamError;
    }

    const completion = plainToInstance(
      ChatCompletionResponseSchema,
      await this.readJson(response),
    );
    const errors = validateSync(completion);
    if (errors.length > 0) {
      throw new LlmUpstreamError({
        status: 502,
        message: 'Malformed chat completion response',
        requestId,
        upstreamPath: CHAT_COMPLETIONS_PATH,
        upstreamBody: body,
      });
    }

    this.logger.debug(
      `[LLM Response] POST ${CHAT_COMPLETIONS_PATH} | Status: ${response.status} | Duration: ${duration}ms | RequestId: ${requestId}`,
    );

    return {
      content: completion.choices[0].message.content,
      requestId,
      model: completion.model ?? llmConfig.model,
    };
  }

  private async readJson(response: Response): Promise<object> {
    try {
      const json: unknown = await response.json();
      if (typeof json === 'object' && json !== null && !Array.isArray(json)) {
        return json;
      }
    } catch {
      // Falls through to the empty object, which fails validation
    }
    return {};
  }
}
