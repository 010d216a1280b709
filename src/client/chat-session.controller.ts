import { Logger, LoggerService } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  CHAT_ERROR_MESSAGES,
  TransportError,
} from '../shared/errors/chat.errors';
import {
  AssistantReplyMessage,
  ClientMessage,
  ErrorMessage,
  MSG,
  ServerMessage,
  VoiceResponseMessage,
  assertNever,
} from '../shared/protocol/chat-protocol';
import type { AudioPlaybackQueue } from './audio-playback.queue';
import type { ChatChannel } from './chat-connection';

export type TranscriptRole = 'user' | 'assistant' | 'system' | 'error';

export interface TranscriptEntry {
  readonly role: TranscriptRole;
  readonly text: string;
  readonly origin?: 'typed' | 'spoken';
  readonly correlationId?: string;
  readonly responseTimeMs?: number;
  readonly code?: string;
  readonly timestamp: string;
}

export interface StoredAudio {
  audio: Buffer;
  voice: string;
  mimeType: string;
}

export type ConnectionStatus = 'connected' | 'disconnected';

export interface ChatSessionCallbacks {
  onTranscript: (entry: TranscriptEntry) => void;
  onStatus?: (status: ConnectionStatus, sessionId: string | null) => void;
  onVoiceEnabledChange?: (enabled: boolean) => void;
  onAudio?: (correlationId: string, audio: StoredAudio) => void;
}

export interface ChatSessionOptions {
  defaultVoice?: string;
  clientAgent?: string;
  createId?: () => string;
  logger?: LoggerService;
}

type PendingState = 'awaiting_reply' | 'awaiting_audio';

const WAV_MIME_TYPE = 'audio/wav';

/**
 * Client-side session state: voice flag, selected voice, transcript and the
 * correlations still waiting for a reply or audio.
 *
 * Audio is requested at most once per correlation. Replies the server is
 * already voicing (`voice_pending`) are never requested again.
 */
export class ChatSessionController {
  private readonly logger: LoggerService;
  private readonly createId: () => string;

  private voiceEnabled = false;
  private selectedVoiceId: string;
  private sessionId: string | null = null;
  private resyncSettings = false;

  private readonly transcript: TranscriptEntry[] = [];
  private readonly pending = new Map<string, PendingState>();
  private readonly explicitRequests = new Set<string>();
  private readonly replies = new Map<string, string>();
  private readonly audio = new Map<string, StoredAudio>();

  constructor(
    private readonly channel: ChatChannel,
    private readonly queue: AudioPlaybackQueue,
    private readonly callbacks: ChatSessionCallbacks,
    private readonly options: ChatSessionOptions = {},
  ) {
    this.selectedVoiceId = options.defaultVoice ?? 'Kore';
    this.createId = options.createId ?? randomUUID;
    this.logger = options.logger ?? new Logger(ChatSessionController.name);
  }

  isVoiceEnabled(): boolean {
    return this.voiceEnabled;
  }

  getSelectedVoice(): string {
    return this.selectedVoiceId;
  }

  getSessionId(): string | null {
    return this.sessionId;
  }

  getTranscript(): readonly TranscriptEntry[] {
    return this.transcript;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  /** Stored audio for replay or download. */
  getAudio(correlationId: string): StoredAudio | undefined {
    return this.audio.get(correlationId);
  }

  /** @returns false when the text is blank or could not be sent */
  submitText(text: string): boolean {
    return this.sendTurn(text, 'typed');
  }

  /** A new capture interrupts whatever is being spoken. */
  handleCaptureStarted(): void {
    this.queue.clear();
  }

  /** Spoken input also switches voice output on. */
  handleFinalTranscript(transcript: string): boolean {
    if (!transcript.trim()) {
      return false;
    }
    this.updateVoiceEnabled(true);
    return this.sendTurn(transcript, 'spoken');
  }

  setVoiceEnabled(enabled: boolean): void {
    if (enabled === this.voiceEnabled) {
      return;
    }
    this.updateVoiceEnabled(enabled);
    if (!enabled) {
      this.queue.clear();
    }
    this.sendSettings();
  }

  selectVoice(voiceId: string): void {
    if (voiceId === this.selectedVoiceId) {
      return;
    }
    this.selectedVoiceId = voiceId;
    this.sendSettings();
  }

  /**
   * Play a reply: stored audio is replayed, otherwise the audio is requested.
   * @returns false when there is no such reply or the request could not be sent
   */
  speak(correlationId: string): boolean {
    const stored = this.audio.get(correlationId);
    if (stored) {
      this.enqueue(correlationId, stored);
      return true;
    }

    const text = this.replies.get(correlationId);
    if (text === undefined) {
      return false;
    }

    this.explicitRequests.add(correlationId);
    if (this.pending.get(correlationId) === 'awaiting_audio') {
      // Already on its way
      return true;
    }
    return this.requestVoice(correlationId, text);
  }

  handleServerMessage(message: ServerMessage): void {
    switch (message.type) {
      case MSG.SYSTEM:
        this.handleSystem(message.client_id, message.message, message.timestamp);
        return;
      case MSG.ASSISTANT:
      case MSG.VOICE_MESSAGE_RESPONSE:
        this.handleReply(message);
        return;
      case MSG.VOICE_RESPONSE:
        this.handleVoiceResponse(message);
        return;
      case MSG.ERROR:
        this.handleError(message);
        return;
      default:
        assertNever(message);
    }
  }

  /**
   * Pending correlations are dropped; the transcript and stored audio stay.
   * Settings are re-sent once the next session starts.
   */
  handleDisconnect(error: TransportError): void {
    this.pending.clear();
    this.explicitRequests.clear();
    this.resyncSettings = true;
    this.appendError(error.code, error.message);
    this.callbacks.onStatus?.('disconnected', this.sessionId);
  }

  private sendTurn(text: string, origin: 'typed' | 'spoken'): boolean {
    const trimmed = text.trim();
    if (!trimmed) {
      return false;
    }

    const correlationId = this.createId();
    const sent = this.send({
      type: origin === 'spoken' ? MSG.VOICE_MESSAGE : MSG.MESSAGE,
      message: trimmed,
      correlation_id: correlationId,
      client_agent: this.options.clientAgent,
    });
    if (!sent) {
      return false;
    }

    this.pending.set(correlationId, 'awaiting_reply');
    this.append({
      role: 'user',
      text: trimmed,
      origin,
      correlationId,
      timestamp: new Date().toISOString(),
    });
    return true;
  }

  private handleSystem(clientId: string, text: string, timestamp: string): void {
    this.sessionId = clientId;
    this.append({ role: 'system', text, timestamp });
    this.callbacks.onStatus?.('connected', clientId);

    if (this.resyncSettings) {
      this.resyncSettings = false;
      this.sendSettings();
    }
  }

  private handleReply(message: AssistantReplyMessage): void {
    const correlationId = message.correlation_id;
    this.pending.delete(correlationId);
    this.replies.set(correlationId, message.message);
    this.append({
      role: 'assistant',
      text: message.message,
      origin: message.type === MSG.VOICE_MESSAGE_RESPONSE ? 'spoken' : 'typed',
      correlationId,
      responseTimeMs: message.response_time_ms,
      timestamp: message.timestamp,
    });

    if (!this.voiceEnabled) {
      return;
    }
    const stored = this.audio.get(correlationId);
    if (stored) {
      this.enqueue(correlationId, stored);
      return;
    }
    if (message.voice_pending) {
      this.pending.set(correlationId, 'awaiting_audio');
      return;
    }
    this.requestVoice(correlationId, message.message);
  }

  private handleVoiceResponse(message: VoiceResponseMessage): void {
    const correlationId = message.correlation_id;
    const stored: StoredAudio = {
      audio: Buffer.from(message.audio_data, 'base64'),
      voice: message.voice,
      mimeType: WAV_MIME_TYPE,
    };
    this.audio.set(correlationId, stored);
    this.callbacks.onAudio?.(correlationId, stored);

    const awaited = this.pending.get(correlationId) === 'awaiting_audio';
    const explicit = this.explicitRequests.delete(correlationId);
    this.pending.delete(correlationId);

    if ((awaited && this.voiceEnabled) || explicit) {
      this.enqueue(correlationId, stored);
    }
  }

  private handleError(message: ErrorMessage): void {
    if (message.correlation_id) {
      this.pending.delete(message.correlation_id);
      this.explicitRequests.delete(message.correlation_id);
    }
    this.appendError(message.code, message.message, message.correlation_id);
  }

  private requestVoice(correlationId: string, text: string): boolean {
    const sent = this.send({
      type: MSG.VOICE_REQUEST,
      text,
      voice: this.selectedVoiceId,
      correlation_id: correlationId,
      client_agent: this.options.clientAgent,
    });
    if (sent) {
      this.pending.set(correlationId, 'awaiting_audio');
    } else {
      this.explicitRequests.delete(correlationId);
    }
    return sent;
  }

  private sendSettings(): void {
    this.send({
      type: MSG.VOICE_SETTINGS,
      enabled: this.voiceEnabled,
      voice: this.selectedVoiceId,
    });
  }

  private send(message: ClientMessage): boolean {
    const sent = this.channel.send(message);
    if (!sent) {
      this.appendError('NOT_CONNECTED', CHAT_ERROR_MESSAGES.NOT_CONNECTED);
    }
    return sent;
  }

  private enqueue(correlationId: string, stored: StoredAudio): void {
    this.queue.enqueue({
      correlationId,
      audio: stored.audio,
      mimeType: stored.mimeType,
    });
  }

  private updateVoiceEnabled(enabled: boolean): void {
    if (enabled === this.voiceEnabled) {
      return;
    }
    this.voiceEnabled = enabled;
    this.logger.log(`Voice output ${enabled ? 'enabled' : 'disabled'}`);
    this.callbacks.onVoiceEnabledChange?.(enabled);
  }

  private appendError(code: string, text: string, correlationId?: string): void {
    this.append({
      role: 'error',
      text,
      code,
      correlationId,
      timestamp: new Date().toISOString(),
    });
  }

  private append(entry: TranscriptEntry): void {
    this.transcript.push(entry);
    this.callbacks.onTranscript(entry);
  }
}
