import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Typed view over the environment.
 * Unset or malformed numeric values fall back to their defaults.
 */
@Injectable()
export class ChatConfigService {
  constructor(private readonly config: ConfigService) {}

  get port(): number {
    return this.getNumber('PORT', 8000);
  }

  get corsOrigins(): string[] {
    const raw = this.config.get<string>(
      'CORS_ORIGINS',
      'http://localhost:3000,http://localhost:5173',
    );
    return raw
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean);
  }

  get geminiApiKey(): string | undefined {
    return this.config.get<string>('GEMINI_API_KEY') || undefined;
  }

  get chatModel(): string {
    return this.config.get<string>('CHAT_MODEL', 'gemini-2.0-flash');
  }

  get ttsModel(): string {
    return this.config.get<string>(
      'TTS_MODEL',
      'gemini-2.5-flash-preview-tts',
    );
  }

  get maxOutputTokens(): number {
    return this.getPositiveNumber('MAX_OUTPUT_TOKENS', 1000);
  }

  get temperature(): number {
    return this.getNumber('TEMPERATURE', 0.7);
  }

  get defaultVoice(): string {
    return this.config.get<string>('DEFAULT_VOICE', 'Kore');
  }

  /** Completed turns passed back to the model as context. */
  get historyTurns(): number {
    return this.getNumber('HISTORY_TURNS', 5);
  }

  get completionTimeoutMs(): number {
    return this.getPositiveNumber('COMPLETION_TIMEOUT_MS', 30000);
  }

  get synthesisTimeoutMs(): number {
    return this.getPositiveNumber('SYNTHESIS_TIMEOUT_MS', 30000);
  }

  get voiceCacheSize(): number {
    return this.getPositiveNumber('VOICE_CACHE_SIZE', 50);
  }

  /** 0 disables age-based expiry. */
  get voiceCacheTtlSeconds(): number {
    return this.getNumber('VOICE_CACHE_TTL_SECONDS', 3600);
  }

  get supabaseUrl(): string | undefined {
    return this.config.get<string>('SUPABASE_URL') || undefined;
  }

  get supabaseServiceKey(): string | undefined {
    return this.config.get<string>('SUPABASE_SERVICE_KEY') || undefined;
  }

  private getNumber(key: string, fallback: number): number {
    const raw = this.config.get<string | number>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }
    const value = Number(raw);
    return Number.isFinite(value) && value >= 0 ? value : fallback;
  }

  /** For values where 0 would disable the feature outright. */
  private getPositiveNumber(key: string, fallback: number): number {
    const value = this.getNumber(key, fallback);
    return value > 0 ? value : fallback;
  }
}
