import { Controller, Get, Header, HttpCode, Post, Query } from '@nestjs/common';
import { ChatLogService } from './services/chat-log.service';
import type {
  ChatLogRecord,
  ChatLogSummary,
} from './interfaces/chat-log.interface';

export const DEFAULT_LOG_LIMIT = 50;
export const MAX_LOG_LIMIT = 1000;

/**
 * Read and maintain the persisted chat log.
 * GET /logs/recent, GET /logs/summary, GET /logs/export, POST /logs/clear
 */
@Controller('logs')
export class ChatLogsController {
  constructor(private readonly chatLogService: ChatLogService) {}

  /**
   * Query: limit (default 50, capped at 1000).
   */
  @Get('recent')
  getRecent(@Query('limit') limitStr?: string): Promise<ChatLogRecord[]> {
    const parsed = limitStr ? parseInt(limitStr, 10) : DEFAULT_LOG_LIMIT;
    const limit = Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_LOG_LIMIT;
    return this.chatLogService.getRecent(Math.min(limit, MAX_LOG_LIMIT));
  }

  @Get('summary')
  getSummary(): Promise<ChatLogSummary> {
    return this.chatLogService.getSummary();
  }

  @Get('export')
  @Header('Content-Type', 'text/csv')
  @Header('Content-Disposition', 'attachment; filename="voice_chat_logs.csv"')
  exportCsv(): Promise<string> {
    return this.chatLogService.exportCsv();
  }

  @Post('clear')
  @HttpCode(200)
  async clear(): Promise<{ status: 'success'; message: string }> {
    await this.chatLogService.clear();
    return { status: 'success', message: 'Logs cleared successfully' };
  }
}
