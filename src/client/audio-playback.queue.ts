import { Logger, LoggerService } from '@nestjs/common';
import { PlaybackError, describeError } from '../shared/errors/chat.errors';

export interface PlaybackItem {
  correlationId: string;
  audio: Buffer;
  mimeType: string;
}

/**
 * Renders one item. Resolves when playback finishes; must stop promptly once
 * `signal` is aborted.
 */
export interface AudioSink {
  play(item: PlaybackItem, signal: AbortSignal): Promise<void>;
}

interface ActivePlayback {
  item: PlaybackItem;
  controller: AbortController;
}

/**
 * Strict FIFO of synthesized replies, at most one audible at a time.
 * A failed item is logged and counts as finished.
 */
export class AudioPlaybackQueue {
  private readonly items: PlaybackItem[] = [];
  private current: ActivePlayback | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly sink: AudioSink,
    private readonly logger: LoggerService = new Logger(AudioPlaybackQueue.name),
  ) {}

  get size(): number {
    return this.items.length;
  }

  get currentItem(): PlaybackItem | null {
    return this.current?.item ?? null;
  }

  isPlaying(): boolean {
    return this.current !== null;
  }

  enqueue(item: PlaybackItem): void {
    this.items.push(item);
    if (!this.current) {
      this.playNext();
    }
  }

  /** Drop everything pending and stop the current item now. */
  clear(): void {
    const active = this.current;
    this.items.length = 0;
    this.current = null;
    if (active) {
      active.controller.abort();
      this.logger.debug?.(`Playback stopped for ${active.item.correlationId}`);
    }
    this.notifyIdle();
  }

  /** Resolves once nothing is playing or queued. */
  whenIdle(): Promise<void> {
    if (!this.current && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private playNext(): void {
    const item = this.items.shift();
    if (!item) {
      this.current = null;
      this.notifyIdle();
      return;
    }

    const active: ActivePlayback = { item, controller: new AbortController() };
    this.current = active;

    let playback: Promise<void>;
    try {
      playback = this.sink.play(item, active.controller.signal);
    } catch (error) {
      playback = Promise.reject(error);
    }

    void playback
      .catch((error: unknown) => {
        if (active.controller.signal.aborted) {
          return;
        }
        const failure =
          error instanceof PlaybackError ? error : new PlaybackError('PLAYBACK_FAILED');
        this.logger.warn(
          `${failure.code} for ${item.correlationId}: ${describeError(error)}`,
        );
      })
      .finally(() => {
        // A clear() in the meantime already moved on
        if (this.current === active) {
          this.playNext();
        }
      });
  }

  private notifyIdle(): void {
    if (this.current || this.items.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
