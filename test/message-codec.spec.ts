import {
  encodeMessage,
  parseClientMessage,
  parseServerMessage,
} from '../src/shared/protocol/message-codec';
import { ValidationError } from '../src/shared/errors/chat.errors';

function captureValidationError(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('message codec', () => {
  describe('parseClientMessage', () => {
    it('should parse a typed chat message', () => {
      const message = parseClientMessage(
        JSON.stringify({ type: 'message', message: 'Hello', correlation_id: 'c-1' }),
      );
      expect(message).toEqual({
        type: 'message',
        message: 'Hello',
        correlation_id: 'c-1',
        client_agent: undefined,
      });
    });

    it('should treat a frame without type as a chat message', () => {
      const message = parseClientMessage(JSON.stringify({ message: 'Hi there' }));
      expect(message.type).toBe('message');
    });

    it('should ignore unknown fields', () => {
      const message = parseClientMessage(
        JSON.stringify({ type: 'voice_message', message: 'Hi', extra: { nested: true } }),
      );
      expect(message).toEqual({
        type: 'voice_message',
        message: 'Hi',
        correlation_id: undefined,
        client_agent: undefined,
      });
    });

    it('should parse a voice request with an explicit voice', () => {
      const message = parseClientMessage(
        JSON.stringify({ type: 'voice_request', text: 'Read this', voice: 'Puck' }),
      );
      expect(message).toMatchObject({ type: 'voice_request', text: 'Read this', voice: 'Puck' });
    });

    it('should parse voice settings', () => {
      const message = parseClientMessage(
        JSON.stringify({ type: 'voice_settings', enabled: true }),
      );
      expect(message).toEqual({ type: 'voice_settings', enabled: true, voice: undefined });
    });

    it('should reject malformed JSON', () => {
      const error = captureValidationError(() => parseClientMessage('{not json'));
      expect(error.code).toBe('INVALID_JSON');
      expect(error.message).toBe('Invalid JSON format');
    });

    it('should reject payloads that are not objects', () => {
      expect(captureValidationError(() => parseClientMessage('[1,2]')).code).toBe(
        'INVALID_PAYLOAD',
      );
      expect(captureValidationError(() => parseClientMessage('"text"')).code).toBe(
        'INVALID_PAYLOAD',
      );
    });

    it('should reject unknown message types', () => {
      const error = captureValidationError(() =>
        parseClientMessage(JSON.stringify({ type: 'dance', message: 'x' })),
      );
      expect(error.code).toBe('UNKNOWN_MESSAGE_TYPE');
      expect(error.details).toEqual(['dance']);
    });

    it('should reject a non-string type', () => {
      const error = captureValidationError(() =>
        parseClientMessage(JSON.stringify({ type: 42, message: 'x' })),
      );
      expect(error.code).toBe('UNKNOWN_MESSAGE_TYPE');
    });

    it('should reject fields of the wrong type', () => {
      const error = captureValidationError(() =>
        parseClientMessage(JSON.stringify({ type: 'message', message: 42 })),
      );
      expect(error.code).toBe('INVALID_PAYLOAD');
      expect(error.details).toContain('message must be a string');
    });

    it('should reject voice settings without a boolean flag', () => {
      const error = captureValidationError(() =>
        parseClientMessage(JSON.stringify({ type: 'voice_settings', enabled: 'yes' })),
      );
      expect(error.code).toBe('INVALID_PAYLOAD');
      expect(error.details).toContain('enabled must be a boolean value');
    });
  });

  describe('parseServerMessage', () => {
    it('should parse an assistant reply and default missing fields', () => {
      const message = parseServerMessage(
        JSON.stringify({ type: 'assistant', message: 'Hi!', correlation_id: 'c-1' }),
      );
      expect(message).toMatchObject({
        type: 'assistant',
        message: 'Hi!',
        correlation_id: 'c-1',
        response_time_ms: 0,
        voice_pending: false,
      });
      expect(typeof message?.timestamp).toBe('string');
    });

    it('should parse a voice response with Base64 audio', () => {
      const audio = Buffer.from('RIFF....WAVE').toString('base64');
      const message = parseServerMessage(
        JSON.stringify({
          type: 'voice_response',
          audio_data: audio,
          text: 'Hi!',
          voice: 'Kore',
          correlation_id: 'c-1',
          timestamp: '2024-01-01T00:00:00.000Z',
        }),
      );
      expect(message).toEqual({
        type: 'voice_response',
        audio_data: audio,
        text: 'Hi!',
        voice: 'Kore',
        correlation_id: 'c-1',
        timestamp: '2024-01-01T00:00:00.000Z',
      });
    });

    it('should reject audio that is not Base64', () => {
      const error = captureValidationError(() =>
        parseServerMessage(
          JSON.stringify({
            type: 'voice_response',
            audio_data: 'not base64!',
            text: 'Hi!',
            voice: 'Kore',
            correlation_id: 'c-1',
          }),
        ),
      );
      expect(error.details).toContain('Audio data must be valid Base64 encoded');
    });

    it('should parse an error event', () => {
      const message = parseServerMessage(
        JSON.stringify({
          type: 'error',
          message: 'Failed to generate voice',
          code: 'SYNTHESIS_FAILED',
          reason: 'synthesis_failed',
          correlation_id: 'c-1',
          timestamp: '2024-01-01T00:00:00.000Z',
        }),
      );
      expect(message).toEqual({
        type: 'error',
        message: 'Failed to generate voice',
        code: 'SYNTHESIS_FAILED',
        reason: 'synthesis_failed',
        correlation_id: 'c-1',
        timestamp: '2024-01-01T00:00:00.000Z',
      });
    });

    it('should return null for unknown or missing types', () => {
      expect(parseServerMessage(JSON.stringify({ type: 'typing' }))).toBeNull();
      expect(parseServerMessage(JSON.stringify({ message: 'x' }))).toBeNull();
    });
  });

  describe('encodeMessage', () => {
    it('should serialize to the JSON read back by the parser', () => {
      const raw = encodeMessage({ type: 'voice_settings', enabled: false, voice: 'Puck' });
      expect(JSON.parse(raw)).toEqual({ type: 'voice_settings', enabled: false, voice: 'Puck' });
      expect(parseClientMessage(raw)).toEqual({
        type: 'voice_settings',
        enabled: false,
        voice: 'Puck',
      });
    });
  });
});
