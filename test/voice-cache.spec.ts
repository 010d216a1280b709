import { VoiceCache } from '../src/modules/chat/protocol/voice-cache';
import { UpstreamError } from '../src/shared/errors/chat.errors';
import { createDeferred, createSilentLogger, flushPromises } from './fixtures/deferred';

describe('VoiceCache', () => {
  const audioFor = (text: string, voice: string) => Buffer.from(`${voice}:${text}`);

  let synthesize: jest.Mock<Promise<Buffer>, [string, string]>;

  const createCache = (capacity = 50, ttlSeconds = 0) =>
    new VoiceCache({ capacity, ttlSeconds }, createSilentLogger());

  beforeEach(() => {
    synthesize = jest.fn((text: string, voice: string) => Promise.resolve(audioFor(text, voice)));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getOrSynthesize', () => {
    it('should synthesize on a miss and serve the second call from cache', async () => {
      const cache = createCache();

      const first = await cache.getOrSynthesize('Hello', 'Kore', synthesize);
      const second = await cache.getOrSynthesize('Hello', 'Kore', synthesize);

      expect(first).toEqual(Buffer.from('Kore:Hello'));
      expect(second).toBe(first);
      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(cache.get('Hello', 'Kore')).toBe(first);
      expect(cache.stats()).toMatchObject({ size: 1, hits: 1, misses: 1, inFlight: 0 });
    });

    it('should share one synthesis between concurrent callers for the same key', async () => {
      const cache = createCache();
      const pending = createDeferred<Buffer>();
      synthesize.mockReturnValueOnce(pending.promise);

      const a = cache.getOrSynthesize('Hi', 'Kore', synthesize);
      const b = cache.getOrSynthesize('Hi', 'Kore', synthesize);
      expect(cache.isInFlight('Hi', 'Kore')).toBe(true);

      pending.resolve(Buffer.from('shared'));
      const [audioA, audioB] = await Promise.all([a, b]);

      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(audioA).toBe(audioB);
      expect(cache.isInFlight('Hi', 'Kore')).toBe(false);
    });

    it('should reject every waiter and cache nothing when synthesis fails', async () => {
      const cache = createCache();
      const pending = createDeferred<Buffer>();
      synthesize.mockReturnValueOnce(pending.promise);

      const a = cache.getOrSynthesize('Hi', 'Kore', synthesize);
      const b = cache.getOrSynthesize('Hi', 'Kore', synthesize);
      pending.reject(new UpstreamError('SYNTHESIS_FAILED'));

      await expect(a).rejects.toThrow('Failed to generate voice');
      await expect(b).rejects.toThrow('Failed to generate voice');
      expect(cache.has('Hi', 'Kore')).toBe(false);
      expect(cache.isInFlight('Hi', 'Kore')).toBe(false);

      await cache.getOrSynthesize('Hi', 'Kore', synthesize);
      expect(synthesize).toHaveBeenCalledTimes(2);
    });

    it('should treat keys as exact strings', async () => {
      const cache = createCache();

      await cache.getOrSynthesize('Hello', 'Kore', synthesize);
      await cache.getOrSynthesize('hello', 'Kore', synthesize);
      await cache.getOrSynthesize('Hello!', 'Kore', synthesize);
      await cache.getOrSynthesize('Hello', 'Puck', synthesize);

      expect(synthesize).toHaveBeenCalledTimes(4);
      expect(cache.stats().size).toBe(4);
    });

    it('should not confuse text and voice boundaries', async () => {
      const cache = createCache();

      await cache.getOrSynthesize('a_b', 'c', synthesize);
      await cache.getOrSynthesize('a', 'b_c', synthesize);

      expect(synthesize).toHaveBeenCalledTimes(2);
      expect(VoiceCache.keyFor('a_b', 'c')).not.toBe(VoiceCache.keyFor('a', 'b_c'));
    });
  });

  describe('evict', () => {
    it('should remove the oldest entries first when over capacity', async () => {
      const cache = createCache(2);

      await cache.getOrSynthesize('one', 'Kore', synthesize);
      await cache.getOrSynthesize('two', 'Kore', synthesize);
      await cache.getOrSynthesize('three', 'Kore', synthesize);

      expect(cache.has('one', 'Kore')).toBe(false);
      expect(cache.has('two', 'Kore')).toBe(true);
      expect(cache.has('three', 'Kore')).toBe(true);
      expect(cache.stats().size).toBe(2);
    });

    it('should not evict an entry while its own synthesis is settling', async () => {
      const cache = createCache(0);

      const audio = await cache.getOrSynthesize('one', 'Kore', synthesize);

      expect(audio).toEqual(Buffer.from('Kore:one'));
      expect(cache.has('one', 'Kore')).toBe(true);
      expect(cache.evict()).toBe(1);
      expect(cache.has('one', 'Kore')).toBe(false);
    });

    it('should do nothing when within capacity', async () => {
      const cache = createCache(5);
      await cache.getOrSynthesize('one', 'Kore', synthesize);
      expect(cache.evict()).toBe(0);
    });
  });

  describe('expiry', () => {
    it('should treat entries older than the TTL as misses', async () => {
      const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
      const cache = createCache(50, 60);

      await cache.getOrSynthesize('Hello', 'Kore', synthesize);
      now.mockReturnValue(1_000_000 + 61_000);

      expect(cache.get('Hello', 'Kore')).toBeUndefined();
      await cache.getOrSynthesize('Hello', 'Kore', synthesize);
      expect(synthesize).toHaveBeenCalledTimes(2);
    });
  });

  describe('clear and close', () => {
    it('should empty the store', async () => {
      const cache = createCache();
      await cache.getOrSynthesize('Hello', 'Kore', synthesize);

      cache.clear();

      expect(cache.get('Hello', 'Kore')).toBeUndefined();
      expect(cache.stats().size).toBe(0);
      cache.close();
    });

    it('should let an in-flight synthesis finish after close', async () => {
      const cache = createCache();
      const pending = createDeferred<Buffer>();
      synthesize.mockReturnValueOnce(pending.promise);

      const request = cache.getOrSynthesize('Hi', 'Kore', synthesize);
      cache.close();
      pending.resolve(Buffer.from('late'));
      await flushPromises();

      await expect(request).resolves.toEqual(Buffer.from('late'));
    });
  });
});
