export type ChatLogMessageType = 'chat' | 'voice_message' | 'voice_request';

/**
 * One handled request, as written to the `chat_logs` table.
 */
export interface ChatLogEntry {
  sessionId: string;
  messageType: ChatLogMessageType;
  userMessage: string;
  assistantResponse: string;
  responseTimeMs: number;
  userIp: string;
  messageLength: number;
  voiceGenerated: boolean;
  voiceName: string;
  errorMessage: string;
  clientAgent: string;
  processingStatus: 'success' | 'error';
}

/** Row shape of `chat_logs`. */
export interface ChatLogRecord {
  timestamp: string;
  session_id: string;
  message_type: ChatLogMessageType;
  user_message: string;
  assistant_response: string;
  response_time_ms: number;
  user_ip: string;
  message_length: number;
  voice_generated: boolean;
  voice_name: string;
  error_message: string;
  client_agent: string;
  processing_status: 'success' | 'error';
}

export interface ChatLogSummary {
  total_messages: number;
  unique_sessions: number;
  average_response_time_ms: number;
  voice_requests: number;
  errors: number;
  success_rate: number;
}
