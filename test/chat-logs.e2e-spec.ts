import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, InternalServerErrorException } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { ChatLogsController } from '../src/modules/chat/chat-logs.controller';
import { HealthController } from '../src/modules/chat/health.controller';
import { ChatLogService } from '../src/modules/chat/services/chat-log.service';
import { GeminiService } from '../src/modules/chat/services/gemini.service';
import { ChatGateway } from '../src/modules/chat/chat.gateway';
import { ApiExceptionFilter } from '../src/shared/filters/api-exception.filter';
import { makeLogRow } from './fixtures/chat-log.fixtures';

describe('ChatLogsController (e2e)', () => {
  let app: INestApplication<App>;

  const chatLogService = {
    getRecent: jest.fn(),
    getSummary: jest.fn(),
    exportCsv: jest.fn(),
    clear: jest.fn(),
  };

  const geminiService = {
    isReady: jest.fn().mockReturnValue(true),
  };

  const chatGateway = {
    getActiveSessionCount: jest.fn().mockReturnValue(3),
  };

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [ChatLogsController, HealthController],
      providers: [
        { provide: ChatLogService, useValue: chatLogService },
        { provide: GeminiService, useValue: geminiService },
        { provide: ChatGateway, useValue: chatGateway },
      ],
    }).compile();

    app = moduleFixture.createNestApplication();
    app.useGlobalFilters(new ApiExceptionFilter());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('GET /health', () => {
    it('should report readiness and active sessions', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body).toEqual({
        status: 'healthy',
        service: 'voice-chat-gateway',
        completion_ready: true,
        active_sessions: 3,
      });
    });
  });

  describe('GET /logs/recent', () => {
    it('should default to 50 rows', async () => {
      chatLogService.getRecent.mockResolvedValue([makeLogRow()]);

      const response = await request(app.getHttpServer()).get('/logs/recent').expect(200);

      expect(chatLogService.getRecent).toHaveBeenCalledWith(50);
      expect(response.body).toEqual([makeLogRow()]);
    });

    it('should cap the limit at 1000', async () => {
      chatLogService.getRecent.mockResolvedValue([]);

      await request(app.getHttpServer()).get('/logs/recent?limit=5000').expect(200);

      expect(chatLogService.getRecent).toHaveBeenCalledWith(1000);
    });

    it('should fall back to the default for a bad limit', async () => {
      chatLogService.getRecent.mockResolvedValue([]);

      await request(app.getHttpServer()).get('/logs/recent?limit=abc').expect(200);

      expect(chatLogService.getRecent).toHaveBeenCalledWith(50);
    });

    it('should shape query failures as { error, message }', async () => {
      chatLogService.getRecent.mockRejectedValue(
        new InternalServerErrorException('CHAT_LOG_QUERY_FAILED'),
      );

      const response = await request(app.getHttpServer()).get('/logs/recent').expect(500);

      expect(response.body).toEqual({
        error: 'CHAT_LOG_QUERY_FAILED',
        message: 'Could not read chat logs.',
      });
    });

    it('should hide unexpected errors', async () => {
      chatLogService.getRecent.mockRejectedValue(new Error('driver exploded'));

      const response = await request(app.getHttpServer()).get('/logs/recent').expect(500);

      expect(response.body).toEqual({
        error: 'INTERNAL_SERVER_ERROR',
        message: 'Unexpected error',
      });
    });
  });

  describe('GET /logs/summary', () => {
    it('should return the summary', async () => {
      const summary = {
        total_messages: 2,
        unique_sessions: 1,
        average_response_time_ms: 150,
        voice_requests: 1,
        errors: 0,
        success_rate: 100,
      };
      chatLogService.getSummary.mockResolvedValue(summary);

      const response = await request(app.getHttpServer()).get('/logs/summary').expect(200);

      expect(response.body).toEqual(summary);
    });
  });

  describe('GET /logs/export', () => {
    it('should send the CSV as an attachment', async () => {
      chatLogService.exportCsv.mockResolvedValue('timestamp,session_id\r\n');

      const response = await request(app.getHttpServer()).get('/logs/export').expect(200);

      expect(response.headers['content-type']).toContain('text/csv');
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="voice_chat_logs.csv"',
      );
      expect(response.text).toBe('timestamp,session_id\r\n');
    });
  });

  describe('POST /logs/clear', () => {
    it('should clear the log', async () => {
      chatLogService.clear.mockResolvedValue(undefined);

      const response = await request(app.getHttpServer()).post('/logs/clear').expect(200);

      expect(chatLogService.clear).toHaveBeenCalled();
      expect(response.body).toEqual({
        status: 'success',
        message: 'Logs cleared successfully',
      });
    });
  });
});
