import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  ErrorReason,
  UpstreamError,
  ValidationError,
  describeError,
} from '../../../shared/errors/chat.errors';
import {
  ClientMessage,
  MSG,
  ServerMessage,
  UserTextMessage,
  VoiceRequestMessage,
  VoiceSettingsMessage,
  assertNever,
} from '../../../shared/protocol/chat-protocol';
import { parseClientMessage } from '../../../shared/protocol/message-codec';
import { withTimeout } from '../../../shared/utils/with-timeout';
import { ChatLogEntry, ChatLogMessageType } from '../interfaces/chat-log.interface';
import {
  ChatCompletionClient,
  ChatLogWriter,
  ClientInfo,
  ConversationTurn,
  SpeechSynthesisClient,
  TranscriptMessage,
  TurnPhase,
} from '../interfaces/session.interface';
import { VoiceCache } from './voice-cache';

export interface SessionProtocolOptions {
  completionTimeoutMs: number;
  synthesisTimeoutMs: number;
  defaultVoice: string;
  historyTurns: number;
}

export interface SessionProtocolDeps {
  sessionId: string;
  completion: ChatCompletionClient;
  synthesis: SpeechSynthesisClient;
  cache: VoiceCache;
  chatLog: ChatLogWriter;
  /** Delivers one event to the connected client. */
  send: (message: ServerMessage) => void;
  options: SessionProtocolOptions;
  clientInfo?: ClientInfo;
  createId?: () => string;
}

interface SynthesisOutcome {
  generated: boolean;
  error?: string;
}

/**
 * Message router for one connection.
 *
 * Every `message` / `voice_message` ends in exactly one terminal event for its
 * correlation id: the assistant reply or an error. Audio for a turn is only
 * sent after the turn's text. Independent turns may finish in any order.
 */
export class SessionProtocol {
  private readonly logger = new Logger(SessionProtocol.name);
  private readonly createId: () => string;

  private voiceEnabled = false;
  private voiceId: string;
  private readonly history: ConversationTurn[] = [];
  private readonly transcript: TranscriptMessage[] = [];
  private readonly pending = new Map<string, TurnPhase>();
  private closed = false;

  constructor(private readonly deps: SessionProtocolDeps) {
    this.voiceId = deps.options.defaultVoice;
    this.createId = deps.createId ?? randomUUID;
  }

  get sessionId(): string {
    return this.deps.sessionId;
  }

  isVoiceEnabled(): boolean {
    return this.voiceEnabled;
  }

  getVoiceId(): string {
    return this.voiceId;
  }

  getTranscript(): readonly TranscriptMessage[] {
    return this.transcript;
  }

  /** Completed turns still kept as model context. */
  getHistory(): readonly ConversationTurn[] {
    return this.history;
  }

  getPhase(correlationId: string): TurnPhase {
    return this.pending.get(correlationId) ?? 'idle';
  }

  /**
   * Decode and dispatch one raw frame. Malformed frames are answered with a
   * validation error and never reach a collaborator.
   */
  async handleRaw(raw: string): Promise<void> {
    let message: ClientMessage;
    try {
      message = parseClientMessage(raw);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(
          `Rejected frame from ${this.sessionId}: ${error.code} ${error.details.join('; ')}`,
        );
        this.sendError(error.code, error.message, 'validation_failed');
        return;
      }
      throw error;
    }
    await this.handle(message);
  }

  async handle(message: ClientMessage): Promise<void> {
    switch (message.type) {
      case MSG.MESSAGE:
      case MSG.VOICE_MESSAGE:
        return this.handleTurn(message);
      case MSG.VOICE_REQUEST:
        return this.handleVoiceRequest(message);
      case MSG.VOICE_SETTINGS:
        return this.handleVoiceSettings(message);
      default:
        return assertNever(message);
    }
  }

  /** Stop delivering events; collaborator results that arrive later are dropped. */
  close(): void {
    this.closed = true;
    this.pending.clear();
  }

  private async handleTurn(message: UserTextMessage): Promise<void> {
    const correlationId = message.correlation_id ?? this.createId();
    const text = message.message.trim();
    const spoken = message.type === MSG.VOICE_MESSAGE;

    if (!text) {
      const error = new ValidationError('EMPTY_MESSAGE');
      this.sendError(error.code, error.message, 'validation_failed', correlationId);
      return;
    }

    // Speaking to the assistant means the user wants to hear it back
    if (spoken) {
      this.voiceEnabled = true;
    }

    this.transcript.push({
      role: 'user',
      text,
      origin: spoken ? 'spoken' : 'typed',
      correlationId,
      timestamp: new Date().toISOString(),
    });
    this.pending.set(correlationId, 'awaiting_completion');

    const messageType: ChatLogMessageType = spoken ? 'voice_message' : 'chat';
    const logBase = {
      messageType,
      userMessage: text,
      messageLength: text.length,
      clientAgent: message.client_agent ?? '',
    };

    const startedAt = Date.now();
    let reply: string;
    try {
      reply = await withTimeout(
        this.deps.completion.complete({
          message: text,
          history: [...this.history],
        }),
        this.deps.options.completionTimeoutMs,
        'COMPLETION_TIMEOUT',
      );
    } catch (error) {
      const failure =
        error instanceof UpstreamError ? error : new UpstreamError('COMPLETION_FAILED');
      this.logger.error(
        `Completion failed for session ${this.sessionId}: ${describeError(error)}`,
      );
      this.pending.delete(correlationId);
      this.sendError(failure.code, failure.message, 'completion_failed', correlationId);
      await this.record({
        ...logBase,
        assistantResponse: '',
        responseTimeMs: Date.now() - startedAt,
        voiceGenerated: false,
        voiceName: '',
        errorMessage: describeError(error),
        processingStatus: 'error',
      });
      return;
    }

    const responseTimeMs = Date.now() - startedAt;

    // Nobody is listening anymore; log the turn but start no new upstream work
    if (this.closed) {
      await this.record({
        ...logBase,
        assistantResponse: reply,
        responseTimeMs,
        voiceGenerated: false,
        voiceName: '',
        errorMessage: '',
        processingStatus: 'success',
      });
      return;
    }

    this.rememberTurn({ user: text, assistant: reply });
    this.transcript.push({
      role: 'assistant',
      text: reply,
      origin: spoken ? 'spoken' : 'typed',
      correlationId,
      responseTimeMs,
      timestamp: new Date().toISOString(),
    });

    // Read once: a voice toggle arriving mid-turn must not change what was promised
    const voicePending = this.voiceEnabled;
    const voiceId = this.voiceId;

    this.emit({
      type: spoken ? MSG.VOICE_MESSAGE_RESPONSE : MSG.ASSISTANT,
      message: reply,
      response_time_ms: responseTimeMs,
      correlation_id: correlationId,
      voice_pending: voicePending,
      timestamp: new Date().toISOString(),
    });

    let outcome: SynthesisOutcome = { generated: false };
    if (voicePending) {
      this.pending.set(correlationId, 'awaiting_synthesis');
      outcome = await this.synthesizeAndSend(reply, voiceId, correlationId);
    }
    this.pending.delete(correlationId);

    await this.record({
      ...logBase,
      assistantResponse: reply,
      responseTimeMs,
      voiceGenerated: outcome.generated,
      voiceName: outcome.generated ? voiceId : '',
      errorMessage: outcome.error ?? '',
      processingStatus: 'success',
    });
  }

  private async handleVoiceRequest(message: VoiceRequestMessage): Promise<void> {
    const correlationId = message.correlation_id ?? this.createId();

    if (!message.text.trim()) {
      const error = new ValidationError('EMPTY_VOICE_TEXT');
      this.sendError(error.code, error.message, 'validation_failed', correlationId);
      return;
    }

    const voiceId = message.voice ?? this.voiceId;
    const startedAt = Date.now();
    this.pending.set(correlationId, 'awaiting_synthesis');
    const outcome = await this.synthesizeAndSend(message.text, voiceId, correlationId);
    this.pending.delete(correlationId);

    await this.record({
      messageType: 'voice_request',
      userMessage: message.text,
      assistantResponse: '',
      responseTimeMs: Date.now() - startedAt,
      messageLength: message.text.length,
      voiceGenerated: outcome.generated,
      voiceName: voiceId,
      errorMessage: outcome.error ?? '',
      clientAgent: message.client_agent ?? '',
      processingStatus: outcome.generated ? 'success' : 'error',
    });
  }

  private async handleVoiceSettings(message: VoiceSettingsMessage): Promise<void> {
    this.voiceEnabled = message.enabled;
    if (message.voice) {
      this.voiceId = message.voice;
    }
    this.logger.debug(
      `Session ${this.sessionId} voice ${this.voiceEnabled ? 'on' : 'off'} (${this.voiceId})`,
    );
  }

  /**
   * Cache first, synthesis on miss. Failure is reported to the client and
   * never retracts text already delivered.
   */
  private async synthesizeAndSend(
    text: string,
    voiceId: string,
    correlationId: string,
  ): Promise<SynthesisOutcome> {
    const { synthesis, cache, options } = this.deps;
    try {
      const audio = await cache.getOrSynthesize(text, voiceId, (t, v) =>
        withTimeout(synthesis.synthesize(t, v), options.synthesisTimeoutMs, 'SYNTHESIS_TIMEOUT'),
      );
      this.emit({
        type: MSG.VOICE_RESPONSE,
        audio_data: audio.toString('base64'),
        text,
        voice: voiceId,
        correlation_id: correlationId,
        timestamp: new Date().toISOString(),
      });
      return { generated: true };
    } catch (error) {
      const failure =
        error instanceof UpstreamError ? error : new UpstreamError('SYNTHESIS_FAILED');
      this.logger.error(
        `Voice generation failed for session ${this.sessionId}: ${describeError(error)}`,
      );
      this.sendError(failure.code, failure.message, 'synthesis_failed', correlationId);
      return { generated: false, error: describeError(error) };
    }
  }

  /** Keeps only the turns the next completion will see. */
  private rememberTurn(turn: ConversationTurn): void {
    this.history.push(turn);
    const excess = this.history.length - this.deps.options.historyTurns;
    if (excess > 0) {
      this.history.splice(0, excess);
    }
  }

  private sendError(
    code: string,
    message: string,
    reason: ErrorReason,
    correlationId?: string,
  ): void {
    this.emit({
      type: MSG.ERROR,
      message,
      code,
      reason,
      correlation_id: correlationId,
      timestamp: new Date().toISOString(),
    });
  }

  private emit(message: ServerMessage): void {
    if (this.closed) {
      this.logger.debug(`Dropping ${message.type} for closed session ${this.sessionId}`);
      return;
    }
    this.deps.send(message);
  }

  private record(
    entry: Omit<ChatLogEntry, 'sessionId' | 'userIp'>,
  ): Promise<void> {
    return this.deps.chatLog.record({
      ...entry,
      sessionId: this.sessionId,
      userIp: this.deps.clientInfo?.remoteAddress ?? 'unknown',
    });
  }
}
