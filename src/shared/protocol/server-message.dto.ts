import { IsBoolean, IsIn, IsNumber, IsOptional, IsString } from 'class-validator';
import { IsBase64 } from '../decorators/is-base64.decorator';
import type { ErrorReason } from '../errors/chat.errors';

const ERROR_REASONS: ErrorReason[] = [
  'validation_failed',
  'completion_failed',
  'synthesis_failed',
];

export class SystemMessageDto {
  @IsString()
  client_id!: string;

  @IsString()
  message!: string;

  @IsOptional()
  @IsString()
  timestamp?: string;
}

export class AssistantReplyDto {
  @IsString()
  message!: string;

  @IsString()
  correlation_id!: string;

  @IsOptional()
  @IsNumber()
  response_time_ms?: number;

  @IsOptional()
  @IsBoolean()
  voice_pending?: boolean;

  @IsOptional()
  @IsString()
  timestamp?: string;
}

export class VoiceResponseDto {
  @IsString()
  @IsBase64({ message: 'Audio data must be valid Base64 encoded' })
  audio_data!: string;

  @IsString()
  text!: string;

  @IsString()
  voice!: string;

  @IsString()
  correlation_id!: string;

  @IsOptional()
  @IsString()
  timestamp?: string;
}

export class ErrorMessageDto {
  @IsString()
  message!: string;

  @IsString()
  code!: string;

  @IsIn(ERROR_REASONS)
  reason!: ErrorReason;

  @IsOptional()
  @IsString()
  correlation_id?: string;

  @IsOptional()
  @IsString()
  timestamp?: string;
}
