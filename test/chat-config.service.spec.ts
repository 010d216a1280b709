import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ChatConfigService } from '../src/config/chat-config.service';

async function createConfig(env: Record<string, string>): Promise<ChatConfigService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      ChatConfigService,
      {
        provide: ConfigService,
        useValue: {
          get: (key: string, fallback?: unknown) => env[key] ?? fallback,
        },
      },
    ],
  }).compile();

  return module.get<ChatConfigService>(ChatConfigService);
}

describe('ChatConfigService', () => {
  it('should use the defaults when nothing is set', async () => {
    const config = await createConfig({});

    expect(config.completionTimeoutMs).toBe(30000);
    expect(config.synthesisTimeoutMs).toBe(30000);
    expect(config.voiceCacheSize).toBe(50);
    expect(config.voiceCacheTtlSeconds).toBe(3600);
  });

  it('should read numeric overrides', async () => {
    const config = await createConfig({
      COMPLETION_TIMEOUT_MS: '5000',
      VOICE_CACHE_SIZE: '10',
    });

    expect(config.completionTimeoutMs).toBe(5000);
    expect(config.voiceCacheSize).toBe(10);
  });

  it('should fall back when a value is malformed', async () => {
    const config = await createConfig({ SYNTHESIS_TIMEOUT_MS: 'soon' });

    expect(config.synthesisTimeoutMs).toBe(30000);
  });

  it('should not accept zero for timeouts or the cache size', async () => {
    const config = await createConfig({
      COMPLETION_TIMEOUT_MS: '0',
      SYNTHESIS_TIMEOUT_MS: '0',
      VOICE_CACHE_SIZE: '0',
      MAX_OUTPUT_TOKENS: '0',
    });

    expect(config.completionTimeoutMs).toBe(30000);
    expect(config.synthesisTimeoutMs).toBe(30000);
    expect(config.voiceCacheSize).toBe(50);
    expect(config.maxOutputTokens).toBe(1000);
  });

  it('should still allow a TTL of zero', async () => {
    const config = await createConfig({ VOICE_CACHE_TTL_SECONDS: '0' });

    expect(config.voiceCacheTtlSeconds).toBe(0);
  });
});
