import { registerAs } from '@nestjs/config';
import * as path from 'path';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { SummaryExtractionConfig } from './summary-extraction-config.type';

export const DEFAULT_EXTRACTOR_TIMEOUT_MS = 180_000;
export const DEFAULT_PROMPTS_DIRECTORY = path.join(
  'src',
  'summary-extraction',
  'infrastructure',
  'llm',
  'prompts',
);

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1000)
  @IsOptional()
  SUMMARY_EXTRACTOR_TIMEOUT_MS?: number;

  @IsString()
  @IsOptional()
  SUMMARY_PROMPTS_DIRECTORY?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  LLM_BASE_URL?: string;

  @IsString()
  @IsOptional()
  LLM_API_KEY?: string;

  @IsString()
  @IsOptional()
  LLM_MODEL?: string;

  @IsNumber()
  @Min(0)
  @Max(2)
  @IsOptional()
  LLM_TEMPERATURE?: number;

  @IsInt()
  @Min(0)
  @Max(5)
  @IsOptional()
  LLM_MAX_RETRIES?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  LLM_RETRY_DELAY_MS?: number;
}

export default registerAs<SummaryExtractionConfig>('summaryExtraction', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  const workingDirectory = process.env.PWD || process.cwd();

  return {
    extractorTimeoutMs: process.env.SUMMARY_EXTRACTOR_TIMEOUT_MS
      ? parseInt(process.env.SUMMARY_EXTRACTOR_TIMEOUT_MS, 10)
      : DEFAULT_EXTRACTOR_TIMEOUT_MS,
    promptsDirectory: path.resolve(
      workingDirectory,
      process.env.SUMMARY_PROMPTS_DIRECTORY || DEFAULT_PROMPTS_DIRECTORY,
    ),
    llm: {
      baseUrl: (process.env.LLM_BASE_URL || 'https://api.openai.com/v1').replace(
        /\/+$/,
        '',
      ),
      apiKey: process.env.LLM_API_KEY,
      model: process.env.LLM_MODEL || 'gpt-4o-mini',
      temperature: process.env.LLM_TEMPERATURE
        ? parseFloat(process.env.LLM_TEMPERATURE)
        : 0,
      maxRetries: process.env.LLM_MAX_RETRIES
        ? parseInt(process.env.LLM_MAX_RETRIES, 10)
        : 2,
      retryDelayMs: process.env.LLM_RETRY_DELAY_MS
        ? parseInt(process.env.LLM_RETRY_DELAY_MS, 10)
        : 1000,
    },
  };
});
