import type { ChatLogEntry } from './chat-log.interface';

export type MessageRole = 'user' | 'assistant' | 'system';
export type MessageOrigin = 'typed' | 'spoken';

/**
 * One entry of a session transcript. Never mutated after it is appended.
 */
export interface TranscriptMessage {
  readonly role: MessageRole;
  readonly text: string;
  readonly origin: MessageOrigin;
  readonly correlationId: string;
  readonly responseTimeMs?: number;
  readonly timestamp: string; // ISO 8601
}

/** A completed exchange, used as model context for later turns. */
export interface ConversationTurn {
  user: string;
  assistant: string;
}

export interface CompletionInput {
  message: string;
  history: ConversationTurn[];
}

/**
 * Per-correlation progress of a turn or voice request.
 * Several correlations can be in flight at the same time.
 */
export type TurnPhase = 'idle' | 'awaiting_completion' | 'awaiting_synthesis';

export const CHAT_COMPLETION_CLIENT = Symbol('CHAT_COMPLETION_CLIENT');
export const SPEECH_SYNTHESIS_CLIENT = Symbol('SPEECH_SYNTHESIS_CLIENT');

export interface ChatCompletionClient {
  /** @throws UpstreamError */
  complete(input: CompletionInput): Promise<string>;
}

export interface SpeechSynthesisClient {
  /**
   * Returns encoded audio (WAV) for `text` spoken with `voiceId`.
   * @throws UpstreamError
   */
  synthesize(text: string, voiceId: string): Promise<Buffer>;
}

/** Persistent chat log sink. Implementations must not throw. */
export interface ChatLogWriter {
  record(entry: ChatLogEntry): Promise<void>;
}

/** Request metadata captured on connect, used for chat log rows. */
export interface ClientInfo {
  remoteAddress: string;
}
