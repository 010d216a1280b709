import { Module } from '@nestjs/common';
import { ChatConfigService } from '../../config/chat-config.service';
import { DatabaseService } from '../../shared/services/database.service';
import { ChatGateway } from './chat.gateway';
import { ChatLogsController } from './chat-logs.controller';
import { HealthController } from './health.controller';
import {
  CHAT_COMPLETION_CLIENT,
  SPEECH_SYNTHESIS_CLIENT,
} from './interfaces/session.interface';
import { ChatLogService } from './services/chat-log.service';
import { GeminiService } from './services/gemini.service';

/**
 * Chat Module
 * WebSocket chat sessions with Gemini completion and cached speech synthesis
 *
 * Features:
 * - /ws gateway, one SessionProtocol and VoiceCache per connection
 * - Chat log persistence and export over REST
 * - Health endpoint
 */
@Module({
  controllers: [ChatLogsController, HealthController],
  providers: [
    ChatConfigService,
    DatabaseService,
    GeminiService,
    { provide: CHAT_COMPLETION_CLIENT, useExisting: GeminiService },
    { provide: SPEECH_SYNTHESIS_CLIENT, useExisting: GeminiService },
    ChatLogService,
    ChatGateway,
  ],
  exports: [GeminiService, ChatLogService],
})
export class ChatModule {}
