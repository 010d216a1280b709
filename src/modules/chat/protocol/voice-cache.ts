import { Logger, LoggerService } from '@nestjs/common';
import NodeCache from 'node-cache';

export interface VoiceCacheOptions {
  /** Maximum number of stored entries; oldest are evicted first. */
  capacity: number;
  /** Entry lifetime in seconds; 0 keeps entries until evicted. */
  ttlSeconds: number;
}

export interface VoiceCacheStats {
  size: number;
  capacity: number;
  inFlight: number;
  hits: number;
  misses: number;
}

interface CacheEntry {
  audio: Buffer;
  createdAt: Date;
}

export type SynthesizeFn = (text: string, voiceId: string) => Promise<Buffer>;

/**
 * Content-addressed store of synthesized audio keyed by exact (text, voice).
 * Concurrent misses for one key share a single synthesis call.
 * One instance per session.
 */
export class VoiceCache {
  private readonly store: NodeCache;
  private readonly inFlight = new Map<string, Promise<Buffer>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly options: VoiceCacheOptions,
    private readonly logger: LoggerService = new Logger(VoiceCache.name),
  ) {
    this.store = new NodeCache({
      stdTTL: options.ttlSeconds,
      checkperiod: 0, // expire lazily on read, no background timer
      useClones: false,
    });
  }

  /**
   * JSON array encoding keeps text and voice apart, so ("a_b", "c") and
   * ("a", "b_c") never collide.
   */
  static keyFor(text: string, voiceId: string): string {
    return JSON.stringify([text, voiceId]);
  }

  get(text: string, voiceId: string): Buffer | undefined {
    return this.store.get<CacheEntry>(VoiceCache.keyFor(text, voiceId))?.audio;
  }

  has(text: string, voiceId: string): boolean {
    return this.store.has(VoiceCache.keyFor(text, voiceId));
  }

  isInFlight(text: string, voiceId: string): boolean {
    return this.inFlight.has(VoiceCache.keyFor(text, voiceId));
  }

  /**
   * Return cached audio, join an in-flight synthesis for the same key, or
   * start one. A failed synthesis rejects every waiter and caches nothing.
   */
  async getOrSynthesize(
    text: string,
    voiceId: string,
    synthesize: SynthesizeFn,
  ): Promise<Buffer> {
    const key = VoiceCache.keyFor(text, voiceId);

    const cached = this.store.get<CacheEntry>(key);
    if (cached) {
      this.hits++;
      this.logger.debug?.(`Audio cache hit for: ${text.slice(0, 30)}...`);
      return cached.audio;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits++;
      this.logger.debug?.(
        `Joining in-flight synthesis for: ${text.slice(0, 30)}...`,
      );
      return pending;
    }

    this.misses++;
    // Registered before the first await so callers arriving in the same tick coalesce
    const request = Promise.resolve()
      .then(() => synthesize(text, voiceId))
      .then((audio) => {
        this.insert(key, audio);
        return audio;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, request);

    return request;
  }

  /**
   * Drop oldest entries until the cache fits its capacity.
   * Keys with a synthesis in flight are skipped.
   * @returns number of entries removed
   */
  evict(): number {
    const keys = this.store.keys();
    let excess = keys.length - this.options.capacity;
    let removed = 0;

    for (const key of keys) {
      if (excess <= 0) {
        break;
      }
      if (this.inFlight.has(key)) {
        continue;
      }
      removed += this.store.del(key);
      excess--;
    }

    if (removed > 0) {
      this.logger.debug?.(`Evicted ${removed} voice cache entries`);
    }
    return removed;
  }

  clear(): void {
    this.store.flushAll();
    this.logger.log('Audio cache cleared');
  }

  stats(): VoiceCacheStats {
    return {
      size: this.store.keys().length,
      capacity: this.options.capacity,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
    };
  }

  close(): void {
    this.store.flushAll();
    this.store.close();
  }

  private insert(key: string, audio: Buffer): void {
    const entry: CacheEntry = { audio, createdAt: new Date() };
    this.store.set(key, entry);
    if (this.store.keys().length > this.options.capacity) {
      this.evict();
    }
  }
}
