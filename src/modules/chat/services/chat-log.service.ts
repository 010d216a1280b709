import {
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import {
  CHAT_LOGS_TABLE,
  DatabaseService,
} from '../../../shared/services/database.service';
import { describeError } from '../../../shared/errors/chat.errors';
import {
  ChatLogEntry,
  ChatLogRecord,
  ChatLogSummary,
} from '../interfaces/chat-log.interface';
import { ChatLogWriter } from '../interfaces/session.interface';

export const CHAT_LOG_COLUMNS: ReadonlyArray<keyof ChatLogRecord> = [
  'timestamp',
  'session_id',
  'message_type',
  'user_message',
  'assistant_response',
  'response_time_ms',
  'user_ip',
  'message_length',
  'voice_generated',
  'voice_name',
  'error_message',
  'client_agent',
  'processing_status',
];

export const EXPORT_ROW_LIMIT = 10000;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarizeLogs(rows: ChatLogRecord[]): ChatLogSummary {
  const total = rows.length;
  if (total === 0) {
    return {
      total_messages: 0,
      unique_sessions: 0,
      average_response_time_ms: 0,
      voice_requests: 0,
      errors: 0,
      success_rate: 0,
    };
  }

  const totalResponseTime = rows.reduce(
    (sum, row) => sum + (Number(row.response_time_ms) || 0),
    0,
  );
  const errors = rows.filter((row) => row.processing_status === 'error').length;

  return {
    total_messages: total,
    unique_sessions: new Set(rows.map((row) => row.session_id)).size,
    average_response_time_ms: round2(totalResponseTime / total),
    voice_requests: rows.filter((row) => row.voice_generated).length,
    errors,
    success_rate: round2(((total - errors) / total) * 100),
  };
}

function escapeCsv(value: string | number | boolean | null | undefined): string {
  const text = value === null || value === undefined ? '' : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: ChatLogRecord[]): string {
  const lines = [CHAT_LOG_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(CHAT_LOG_COLUMNS.map((column) => escapeCsv(row[column])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

/**
 * Request log persisted to the `chat_logs` table.
 * Writes are best-effort; reads fail with a 500 when the query fails.
 */
@Injectable()
export class ChatLogService implements ChatLogWriter {
  private readonly logger = new Logger(ChatLogService.name);

  constructor(private readonly db: DatabaseService) {}

  async record(entry: ChatLogEntry): Promise<void> {
    const client = this.db.getClient();
    if (!client) {
      return;
    }

    const row: ChatLogRecord = {
      timestamp: new Date().toISOString(),
      session_id: entry.sessionId,
      message_type: entry.messageType,
      user_message: entry.userMessage,
      assistant_response: entry.assistantResponse,
      response_time_ms: Math.round(entry.responseTimeMs),
      user_ip: entry.userIp,
      message_length: entry.messageLength,
      voice_generated: entry.voiceGenerated,
      voice_name: entry.voiceName,
      error_message: entry.errorMessage,
      client_agent: entry.clientAgent,
      processing_status: entry.processingStatus,
    };

    try {
      const { error } = await client.from(CHAT_LOGS_TABLE).insert(row);
      if (error) {
        this.logger.error(`Failed to write chat log: ${error.message}`);
      }
    } catch (error) {
      this.logger.error(`Failed to write chat log: ${describeError(error)}`);
    }
  }

  /** Newest first. */
  async getRecent(limit: number): Promise<ChatLogRecord[]> {
    const client = this.db.getClient();
    if (!client) {
      return [];
    }

    const { data, error } = await client
      .from(CHAT_LOGS_TABLE)
      .select('*')
      .order('timestamp', { ascending: false })
      .limit(limit);

    if (error) {
      this.logger.error(`Failed to read chat logs: ${error.message}`);
      throw new InternalServerErrorException('CHAT_LOG_QUERY_FAILED');
    }
    const rows: ChatLogRecord[] = data ?? [];
    return rows;
  }

  async getSummary(): Promise<ChatLogSummary> {
    return summarizeLogs(await this.getRecent(EXPORT_ROW_LIMIT));
  }

  async exportCsv(): Promise<string> {
    return toCsv(await this.getRecent(EXPORT_ROW_LIMIT));
  }

  async clear(): Promise<void> {
    const client = this.db.getClient();
    if (!client) {
      return;
    }

    // Supabase refuses an unfiltered delete
    const { error } = await client
      .from(CHAT_LOGS_TABLE)
      .delete()
      .gte('timestamp', '1970-01-01T00:00:00.000Z');

    if (error) {
      this.logger.error(`Failed to clear chat logs: ${error.message}`);
      throw new InternalServerErrorException('CHAT_LOG_CLEAR_FAILED');
    }
    this.logger.log('Logs cleared successfully');
  }
}
