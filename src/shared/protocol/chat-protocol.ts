// Wire protocol shared by the server gateway (src/modules/chat) and the
// client session (src/client). Field names match the JSON on the wire.

import type { ErrorReason } from '../errors/chat.errors';

/** WebSocket message type strings. */
export const MSG = {
  // Client -> server
  MESSAGE: 'message',
  VOICE_MESSAGE: 'voice_message',
  VOICE_REQUEST: 'voice_request',
  VOICE_SETTINGS: 'voice_settings',

  // Server -> client
  SYSTEM: 'system',
  ASSISTANT: 'assistant',
  VOICE_MESSAGE_RESPONSE: 'voice_message_response',
  VOICE_RESPONSE: 'voice_response',
  ERROR: 'error',
} as const;

// ── Client -> Server ─────────────────────────────────────────────

/** Typed (`message`) or transcribed (`voice_message`) user text. */
export interface UserTextMessage {
  type: 'message' | 'voice_message';
  message: string;
  correlation_id?: string;
  client_agent?: string;
}

/** Explicit synthesis request for text already shown to the user. */
export interface VoiceRequestMessage {
  type: 'voice_request';
  text: string;
  voice?: string;
  correlation_id?: string;
  client_agent?: string;
}

/** Voice output toggle and voice selection. */
export interface VoiceSettingsMessage {
  type: 'voice_settings';
  enabled: boolean;
  voice?: string;
}

export type ClientMessage =
  | UserTextMessage
  | VoiceRequestMessage
  | VoiceSettingsMessage;

// ── Server -> Client ─────────────────────────────────────────────

/** Session established; `client_id` is the session id. */
export interface SystemMessage {
  type: 'system';
  client_id: string;
  message: string;
  timestamp: string;
}

/** Completion result for a typed or spoken turn. */
export interface AssistantReplyMessage {
  type: 'assistant' | 'voice_message_response';
  message: string;
  response_time_ms: number;
  correlation_id: string;
  /** True when the server has already started synthesizing this reply. */
  voice_pending: boolean;
  timestamp: string;
}

/** Synthesized audio (base64 WAV) for a prior message. */
export interface VoiceResponseMessage {
  type: 'voice_response';
  audio_data: string;
  text: string;
  voice: string;
  correlation_id: string;
  timestamp: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  code: string;
  reason: ErrorReason;
  correlation_id?: string;
  timestamp: string;
}

export type ServerMessage =
  | SystemMessage
  | AssistantReplyMessage
  | VoiceResponseMessage
  | ErrorMessage;

export function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}
