import { LoggerService } from '@nestjs/common';
import { AudioPlaybackQueue, AudioSink } from './audio-playback.queue';
import { ChatConnection, SocketFactory } from './chat-connection';
import {
  ChatSessionCallbacks,
  ChatSessionController,
} from './chat-session.controller';
import { FfplayAudioSink } from './ffplay-audio.sink';
import {
  SpeechCaptureAdapter,
  SpeechRecognizer,
} from './speech-capture.adapter';

export interface VoiceChatClientConfig {
  /** e.g. ws://localhost:8000/ws */
  url: string;
  callbacks: ChatSessionCallbacks;
  /** Defaults to ffplay */
  sink?: AudioSink;
  /** Without a recognizer the client is text-only */
  recognizer?: SpeechRecognizer;
  /** Called with interim transcripts while the user is speaking */
  onInterimTranscript?: (text: string) => void;
  defaultVoice?: string;
  clientAgent?: string;
  reconnectDelayMs?: number;
  socketFactory?: SocketFactory;
  logger?: LoggerService;
}

/**
 * Wires connection, session controller, playback queue and optional speech
 * capture into one client.
 */
export class VoiceChatClient {
  readonly queue: AudioPlaybackQueue;
  readonly connection: ChatConnection;
  readonly controller: ChatSessionController;
  readonly capture: SpeechCaptureAdapter | null;

  constructor(config: VoiceChatClientConfig) {
    this.queue = new AudioPlaybackQueue(
      config.sink ?? new FfplayAudioSink(),
      config.logger,
    );

    this.connection = new ChatConnection(
      {
        url: config.url,
        reconnectDelayMs: config.reconnectDelayMs,
        socketFactory: config.socketFactory,
        logger: config.logger,
      },
      {
        onMessage: (message) => this.controller.handleServerMessage(message),
        onDisconnect: (error) => this.controller.handleDisconnect(error),
      },
    );

    this.controller = new ChatSessionController(
      this.connection,
      this.queue,
      config.callbacks,
      {
        defaultVoice: config.defaultVoice,
        clientAgent: config.clientAgent,
        logger: config.logger,
      },
    );

    this.capture = config.recognizer
      ? new SpeechCaptureAdapter(
          config.recognizer,
          {
            onFinal: (text) => this.controller.handleFinalTranscript(text),
            onInterim: config.onInterimTranscript,
            onStateChange: (listening) => {
              if (listening) {
                this.controller.handleCaptureStarted();
              }
            },
          },
          {},
          config.logger,
        )
      : null;
  }

  start(): void {
    this.connection.connect();
  }

  stop(): void {
    this.capture?.stop();
    this.queue.clear();
    this.connection.close();
  }
}
