import { Controller, Get } from '@nestjs/common';
import { ChatGateway } from './chat.gateway';
import { GeminiService } from './services/gemini.service';

export interface HealthResponse {
  status: 'healthy';
  service: string;
  completion_ready: boolean;
  active_sessions: number;
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly geminiService: GeminiService,
    private readonly chatGateway: ChatGateway,
  ) {}

  @Get()
  getHealth(): HealthResponse {
    return {
      status: 'healthy',
      service: 'voice-chat-gateway',
      completion_ready: this.geminiService.isReady(),
      active_sessions: this.chatGateway.getActiveSessionCount(),
    };
  }
}
