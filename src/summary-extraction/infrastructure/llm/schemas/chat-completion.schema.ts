import {
  ArrayMinSize,
  IsArray,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class ChatCompletionMessageSchema {
  @IsString()
  role!: string;

  @IsString()
  content!: string;
}

export class ChatCompletionChoiceSchema {
  @IsObject()
  @ValidateNested()
  @Type(() => ChatCompletionMessageSchema)
  message!: ChatCompletionMessageSchema;

  @IsOptional()
  @IsString()
  finish_reason?: string | null;
}

/**
 * Subset of an OpenAI-compatible /chat/completions response the client reads
 */
export class ChatCompletionResponseSchema {
  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @IsString()
  model?: string;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => ChatCompletionChoiceSchema)
  choices!: ChatCompletionChoiceSchema[];
}
