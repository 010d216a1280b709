import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ValidationError } from '../errors/chat.errors';
import {
  ClientMessage,
  MSG,
  ServerMessage,
} from './chat-protocol';
import {
  UserTextMessageDto,
  VoiceRequestDto,
  VoiceSettingsDto,
} from './client-message.dto';
import {
  AssistantReplyDto,
  ErrorMessageDto,
  SystemMessageDto,
  VoiceResponseDto,
} from './server-message.dto';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeObject(raw: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError('INVALID_JSON');
  }
  if (!isJsonObject(parsed)) {
    throw new ValidationError('INVALID_PAYLOAD', [
      'payload must be a JSON object',
    ]);
  }
  return parsed;
}

function toDto<T extends object>(
  cls: ClassConstructor<T>,
  payload: JsonObject,
): T {
  const dto = plainToInstance(cls, payload);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const details = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new ValidationError('INVALID_PAYLOAD', details);
  }
  return dto;
}

/**
 * Decode one inbound frame. A missing `type` means a plain chat message;
 * unknown fields are ignored.
 * @throws ValidationError on malformed JSON, unknown types or bad field types
 */
export function parseClientMessage(raw: string): ClientMessage {
  const payload = decodeObject(raw);
  const type = payload.type ?? MSG.MESSAGE;

  if (typeof type !== 'string') {
    throw new ValidationError('UNKNOWN_MESSAGE_TYPE');
  }

  switch (type) {
    case MSG.MESSAGE:
    case MSG.VOICE_MESSAGE: {
      const dto = toDto(UserTextMessageDto, payload);
      return {
        type,
        message: dto.message,
        correlation_id: dto.correlation_id,
        client_agent: dto.client_agent,
      };
    }
    case MSG.VOICE_REQUEST: {
      const dto = toDto(VoiceRequestDto, payload);
      return {
        type,
        text: dto.text,
        voice: dto.voice,
        correlation_id: dto.correlation_id,
        client_agent: dto.client_agent,
      };
    }
    case MSG.VOICE_SETTINGS: {
      const dto = toDto(VoiceSettingsDto, payload);
      return { type, enabled: dto.enabled, voice: dto.voice };
    }
    default:
      throw new ValidationError('UNKNOWN_MESSAGE_TYPE', [type]);
  }
}

/**
 * Decode one frame received from the server.
 * Returns null for message types this client does not know.
 */
export function parseServerMessage(raw: string): ServerMessage | null {
  const payload = decodeObject(raw);
  const type = payload.type;
  if (typeof type !== 'string') {
    return null;
  }
  const now = new Date().toISOString();

  switch (type) {
    case MSG.SYSTEM: {
      const dto = toDto(SystemMessageDto, payload);
      return {
        type,
        client_id: dto.client_id,
        message: dto.message,
        timestamp: dto.timestamp ?? now,
      };
    }
    case MSG.ASSISTANT:
    case MSG.VOICE_MESSAGE_RESPONSE: {
      const dto = toDto(AssistantReplyDto, payload);
      return {
        type,
        message: dto.message,
        correlation_id: dto.correlation_id,
        response_time_ms: dto.response_time_ms ?? 0,
        voice_pending: dto.voice_pending ?? false,
        timestamp: dto.timestamp ?? now,
      };
    }
    case MSG.VOICE_RESPONSE: {
      const dto = toDto(VoiceResponseDto, payload);
      return {
        type,
        audio_data: dto.audio_data,
        text: dto.text,
        voice: dto.voice,
        correlation_id: dto.correlation_id,
        timestamp: dto.timestamp ?? now,
      };
    }
    case MSG.ERROR: {
      const dto = toDto(ErrorMessageDto, payload);
      return {
        type,
        message: dto.message,
        code: dto.code,
        reason: dto.reason,
        correlation_id: dto.correlation_id,
        timestamp: dto.timestamp ?? now,
      };
    }
    default:
      return null;
  }
}

export function encodeMessage(message: ClientMessage | ServerMessage): string {
  return JSON.stringify(message);
}
