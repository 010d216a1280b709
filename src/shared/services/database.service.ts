import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { ChatConfigService } from '../../config/chat-config.service';

export const CHAT_LOGS_TABLE = 'chat_logs';

/**
 * Optional Supabase connection. When SUPABASE_URL or SUPABASE_SERVICE_KEY is
 * missing the app still runs and persistence is skipped.
 */
@Injectable()
export class DatabaseService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly supabase: SupabaseClient | null;

  constructor(config: ChatConfigService) {
    const url = config.supabaseUrl;
    const key = config.supabaseServiceKey;
    this.supabase = url && key ? createClient(url, key) : null;
  }

  async onModuleInit(): Promise<void> {
    if (!this.supabase) {
      this.logger.warn('Supabase not configured; chat logging is disabled');
      return;
    }

    try {
      const { error } = await this.supabase
        .from(CHAT_LOGS_TABLE)
        .select('session_id')
        .limit(1);

      if (error) {
        this.logger.error(`Supabase connection failed: ${error.message}`);
      } else {
        this.logger.log('Supabase connected successfully');
      }
    } catch (err) {
      this.logger.error(
        `Database connection error: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  /** @returns null when Supabase is not configured */
  getClient(): SupabaseClient | null {
    return this.supabase;
  }
}
