import {
  WebSocketGateway,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { IncomingMessage } from 'http';
import { WebSocket, RawData } from 'ws';
import { ChatConfigService } from '../../config/chat-config.service';
import { describeError } from '../../shared/errors/chat.errors';
import { MSG, ServerMessage } from '../../shared/protocol/chat-protocol';
import { encodeMessage } from '../../shared/protocol/message-codec';
import { rawDataToString } from '../../shared/utils/raw-data';
import {
  CHAT_COMPLETION_CLIENT,
  ChatCompletionClient,
  SPEECH_SYNTHESIS_CLIENT,
  SpeechSynthesisClient,
} from './interfaces/session.interface';
import { SessionProtocol } from './protocol/session-protocol';
import { VoiceCache } from './protocol/voice-cache';
import { ChatLogService } from './services/chat-log.service';

export const WELCOME_MESSAGE =
  "Welcome to AI Voice Bot! I'm powered by Google's Gemini AI. How can I help you today?";

/** The part of a `ws` socket the gateway relies on. */
export interface ChatClientSocket {
  readonly readyState: number;
  send(data: string): void;
  on(
    event: 'message',
    listener: (data: RawData, isBinary: boolean) => void,
  ): unknown;
}

interface ChatSession {
  protocol: SessionProtocol;
  cache: VoiceCache;
  connectedAt: Date;
}

/**
 * Plain JSON WebSocket endpoint at /ws. Frames carry a `type` field rather
 * than the adapter's `event` envelope, so messages are routed here instead of
 * through @SubscribeMessage handlers.
 */
@WebSocketGateway({ path: '/ws' })
@Injectable()
export class ChatGateway
  implements OnGatewayConnection, OnGatewayDisconnect, OnModuleDestroy
{
  private readonly logger = new Logger(ChatGateway.name);

  // Map<socket, ChatSession>; one independent session per connection
  private readonly sessions = new Map<ChatClientSocket, ChatSession>();

  constructor(
    private readonly config: ChatConfigService,
    @Inject(CHAT_COMPLETION_CLIENT)
    private readonly completion: ChatCompletionClient,
    @Inject(SPEECH_SYNTHESIS_CLIENT)
    private readonly synthesis: SpeechSynthesisClient,
    private readonly chatLog: ChatLogService,
  ) {}

  handleConnection(client: ChatClientSocket, request?: IncomingMessage): void {
    const sessionId = randomUUID();
    const remoteAddress = request?.socket.remoteAddress ?? 'unknown';

    const cache = new VoiceCache({
      capacity: this.config.voiceCacheSize,
      ttlSeconds: this.config.voiceCacheTtlSeconds,
    });

    const protocol = new SessionProtocol({
      sessionId,
      completion: this.completion,
      synthesis: this.synthesis,
      cache,
      chatLog: this.chatLog,
      send: (message) => this.send(client, message),
      options: {
        completionTimeoutMs: this.config.completionTimeoutMs,
        synthesisTimeoutMs: this.config.synthesisTimeoutMs,
        defaultVoice: this.config.defaultVoice,
        historyTurns: this.config.historyTurns,
      },
      clientInfo: { remoteAddress },
    });

    this.sessions.set(client, { protocol, cache, connectedAt: new Date() });

    client.on('message', (data) => {
      const session = this.sessions.get(client);
      if (!session) {
        return;
      }
      void session.protocol
        .handleRaw(rawDataToString(data))
        .catch((error: unknown) => {
          this.logger.error(
            `Unhandled error in session ${sessionId}: ${describeError(error)}`,
            error instanceof Error ? error.stack : undefined,
          );
        });
    });

    this.logger.log(`Client connected: ${sessionId} from ${remoteAddress}`);

    this.send(client, {
      type: MSG.SYSTEM,
      client_id: sessionId,
      message: WELCOME_MESSAGE,
      timestamp: new Date().toISOString(),
    });
  }

  handleDisconnect(client: ChatClientSocket): void {
    const session = this.sessions.get(client);
    if (!session) {
      return;
    }
    this.closeSession(session);
    this.sessions.delete(client);
    const seconds = Math.round((Date.now() - session.connectedAt.getTime()) / 1000);
    this.logger.log(
      `Client disconnected: ${session.protocol.sessionId} after ${seconds}s`,
    );
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  onModuleDestroy(): void {
    this.logger.log(`Closing ${this.sessions.size} active chat sessions`);
    for (const session of this.sessions.values()) {
      this.closeSession(session);
    }
    this.sessions.clear();
  }

  private closeSession(session: ChatSession): void {
    session.protocol.close();
    session.cache.close();
  }

  private send(client: ChatClientSocket, message: ServerMessage): void {
    if (client.readyState !== WebSocket.OPEN) {
      this.logger.debug(`Socket not open, dropping ${message.type}`);
      return;
    }
    client.send(encodeMessage(message));
  }
}
