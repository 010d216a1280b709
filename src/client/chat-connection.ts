import { Logger, LoggerService } from '@nestjs/common';
import { WebSocket } from 'ws';
import {
  TransportError,
  ValidationError,
  describeError,
} from '../shared/errors/chat.errors';
import { ClientMessage, ServerMessage } from '../shared/protocol/chat-protocol';
import {
  encodeMessage,
  parseServerMessage,
} from '../shared/protocol/message-codec';
import { rawDataToString } from '../shared/utils/raw-data';

export const DEFAULT_RECONNECT_DELAY_MS = 5000;

export interface SocketHandlers {
  onOpen: () => void;
  onMessage: (raw: string) => void;
  onClose: () => void;
  onError: (error: Error) => void;
}

/** An open or opening connection, reduced to what ChatConnection needs. */
export interface ConnectionSocket {
  readonly isOpen: boolean;
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (
  url: string,
  handlers: SocketHandlers,
) => ConnectionSocket;

export const createWsSocket: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.on('open', () => handlers.onOpen());
  socket.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  socket.on('close', () => handlers.onClose());
  socket.on('error', (error) => handlers.onError(error));

  return {
    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    send: (data) => socket.send(data),
    close: () => socket.close(),
  };
};

/** Outbound side of the protocol as seen by the session controller. */
export interface ChatChannel {
  /** @returns false when the message could not be sent */
  send(message: ClientMessage): boolean;
}

export interface ChatConnectionCallbacks {
  onMessage: (message: ServerMessage) => void;
  onOpen?: () => void;
  onDisconnect?: (error: TransportError) => void;
}

export interface ChatConnectionOptions {
  url: string;
  reconnectDelayMs?: number;
  socketFactory?: SocketFactory;
  logger?: LoggerService;
}

/**
 * Client end of the /ws protocol. Reconnects after a fixed delay until
 * close() is called.
 */
export class ChatConnection implements ChatChannel {
  private readonly reconnectDelayMs: number;
  private readonly socketFactory: SocketFactory;
  private readonly logger: LoggerService;

  private socket: ConnectionSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closedByUser = true;

  constructor(
    private readonly options: ChatConnectionOptions,
    private readonly callbacks: ChatConnectionCallbacks,
  ) {
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.socketFactory = options.socketFactory ?? createWsSocket;
    this.logger = options.logger ?? new Logger(ChatConnection.name);
  }

  isConnected(): boolean {
    return this.socket?.isOpen ?? false;
  }

  connect(): void {
    this.closedByUser = false;
    if (this.socket || this.reconnectTimer) {
      return;
    }
    this.open();
  }

  send(message: ClientMessage): boolean {
    if (!this.socket?.isOpen) {
      const error = new TransportError('NOT_CONNECTED');
      this.logger.warn(`Cannot send ${message.type}: ${error.message}`);
      return false;
    }
    this.socket.send(encodeMessage(message));
    return true;
  }

  /** Close for good; no reconnect follows. */
  close(): void {
    this.closedByUser = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }

  private open(): void {
    this.logger.log(`Connecting to ${this.options.url}`);
    let socket: ConnectionSocket;
    let opened = false;
    try {
      socket = this.socketFactory(this.options.url, {
        onOpen: () => {
          opened = true;
          this.logger.log('Connected');
          this.callbacks.onOpen?.();
        },
        onMessage: (raw) => this.handleFrame(raw),
        onClose: () => this.handleClose(socket, opened),
        onError: (error) => {
          this.logger.error(`WebSocket error: ${error.message}`);
        },
      });
    } catch (error) {
      this.logger.error(`Failed to open WebSocket: ${describeError(error)}`);
      this.scheduleReconnect();
      return;
    }
    this.socket = socket;
  }

  private handleFrame(raw: string): void {
    let message: ServerMessage | null;
    try {
      message = parseServerMessage(raw);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Ignoring malformed frame: ${error.code} ${error.details.join('; ')}`);
        return;
      }
      throw error;
    }
    if (!message) {
      this.logger.debug?.('Ignoring frame of unknown type');
      return;
    }
    this.callbacks.onMessage(message);
  }

  private handleClose(socket: ConnectionSocket, opened: boolean): void {
    // Stale close from a socket replaced or closed by close()
    if (this.socket !== socket) {
      return;
    }
    this.socket = null;

    // A failed attempt; the loss was already reported when the last open socket closed
    if (!opened) {
      this.logger.debug?.(`Could not reach ${this.options.url}, retrying`);
      this.scheduleReconnect();
      return;
    }

    const error = new TransportError('CONNECTION_LOST');
    this.logger.warn(`Connection closed: ${error.message}`);
    this.callbacks.onDisconnect?.(error);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.closedByUser || this.reconnectTimer) {
      return;
    }
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.closedByUser) {
        this.open();
      }
    }, this.reconnectDelayMs);
  }
}
