/**
 * Error codes surfaced to chat clients, mapped to the text shown in the transcript.
 */
export const CHAT_ERROR_MESSAGES: Record<string, string> = {
  // Upstream (completion / synthesis backends)
  COMPLETION_FAILED:
    'I encountered an error while processing your request. Please try again.',
  COMPLETION_TIMEOUT: 'The AI service took too long to respond.',
  EMPTY_COMPLETION: 'The AI service returned an empty response.',
  SYNTHESIS_FAILED: 'Failed to generate voice',
  SYNTHESIS_TIMEOUT: 'Voice generation took too long.',
  NO_AUDIO_IN_RESPONSE: 'No audio data found in the voice response.',
  GEMINI_NOT_CONFIGURED: 'The AI service is not configured.',

  // Validation
  INVALID_JSON: 'Invalid JSON format',
  INVALID_PAYLOAD: 'Message payload is invalid',
  UNKNOWN_MESSAGE_TYPE: 'Unknown message type',
  EMPTY_MESSAGE: 'Message must not be empty',
  EMPTY_VOICE_TEXT: 'No text provided for voice generation',

  // Transport
  CONNECTION_LOST: 'Disconnected. Retrying shortly...',
  NOT_CONNECTED: 'Connection not open. Please wait.',

  // Playback
  PLAYBACK_FAILED: 'Audio playback error.',
  PLAYER_UNAVAILABLE: 'No audio player available.',
};

/**
 * Category of a failure as reported on the wire (`error.reason`).
 */
export type ErrorReason =
  | 'validation_failed'
  | 'completion_failed'
  | 'synthesis_failed';

export abstract class ChatError extends Error {
  constructor(
    readonly code: string,
    message: string = CHAT_ERROR_MESSAGES[code] ?? code,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Completion or synthesis backend unavailable, rate-limited, timed out or malformed. */
export class UpstreamError extends ChatError {}

/** Empty or malformed client input; never reaches a collaborator. */
export class ValidationError extends ChatError {
  constructor(
    code: string,
    readonly details: string[] = [],
  ) {
    super(code);
  }
}

/** Connection dropped or not yet open. */
export class TransportError extends ChatError {}

/** Local decode/play failure; swallowed by the playback queue. */
export class PlaybackError extends ChatError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
