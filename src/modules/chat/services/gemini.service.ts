import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { GoogleGenAI, Modality } from '@google/genai';
import type { Content, GenerateContentResponse } from '@google/genai';
import { ChatConfigService } from '../../../config/chat-config.service';
import {
  UpstreamError,
  describeError,
} from '../../../shared/errors/chat.errors';
import {
  ChatCompletionClient,
  CompletionInput,
  SpeechSynthesisClient,
} from '../interfaces/session.interface';
import { encodeWav } from '../utils/wav-encoder';

const SYSTEM_INSTRUCTION =
  'You are a helpful AI assistant. Be concise, friendly, and helpful in your responses.';

/**
 * Gemini-backed completion and speech synthesis.
 * Without an API key the service still starts; every call then fails with GEMINI_NOT_CONFIGURED.
 */
@Injectable()
export class GeminiService
  implements ChatCompletionClient, SpeechSynthesisClient, OnModuleInit
{
  private readonly logger = new Logger(GeminiService.name);
  private ai: GoogleGenAI | null = null;

  constructor(private readonly config: ChatConfigService) {}

  onModuleInit(): void {
    const apiKey = this.config.geminiApiKey;
    if (!apiKey) {
      this.logger.error(
        'GEMINI_API_KEY not configured; chat and voice requests will fail',
      );
      return;
    }
    this.ai = new GoogleGenAI({ apiKey });
    this.logger.log(
      `Gemini Service initialized (chat: ${this.config.chatModel}, tts: ${this.config.ttsModel})`,
    );
  }

  isReady(): boolean {
    return this.ai !== null;
  }

  async complete(input: CompletionInput): Promise<string> {
    const ai = this.requireClient();

    const contents: Content[] = [];
    for (const turn of input.history) {
      contents.push({ role: 'user', parts: [{ text: turn.user }] });
      contents.push({ role: 'model', parts: [{ text: turn.assistant }] });
    }
    contents.push({ role: 'user', parts: [{ text: input.message }] });

    let response: GenerateContentResponse;
    try {
      response = await ai.models.generateContent({
        model: this.config.chatModel,
        contents,
        config: {
          systemInstruction: SYSTEM_INSTRUCTION,
          maxOutputTokens: this.config.maxOutputTokens,
          temperature: this.config.temperature,
        },
      });
    } catch (error) {
      this.logger.error(
        `Gemini text generation failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new UpstreamError('COMPLETION_FAILED');
    }

    const text = response.text?.trim();
    if (!text) {
      throw new UpstreamError('EMPTY_COMPLETION');
    }
    return text;
  }

  /**
   * @returns WAV bytes (24 kHz mono 16-bit)
   */
  async synthesize(text: string, voiceId: string): Promise<Buffer> {
    const ai = this.requireClient();

    let response: GenerateContentResponse;
    try {
      response = await ai.models.generateContent({
        model: this.config.ttsModel,
        contents: [{ role: 'user', parts: [{ text }] }],
        config: {
          responseModalities: [Modality.AUDIO],
          speechConfig: {
            voiceConfig: {
              prebuiltVoiceConfig: { voiceName: voiceId },
            },
          },
        },
      });
    } catch (error) {
      this.logger.error(
        `Gemini voice generation failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new UpstreamError('SYNTHESIS_FAILED');
    }

    const audioData = this.extractAudio(response);
    if (!audioData) {
      this.logger.warn(`No audio data in TTS response for voice ${voiceId}`);
      throw new UpstreamError('NO_AUDIO_IN_RESPONSE');
    }

    return encodeWav(Buffer.from(audioData, 'base64'));
  }

  private extractAudio(response: GenerateContentResponse): string | undefined {
    const parts = response.candidates?.[0]?.content?.parts ?? [];
    for (const part of parts) {
      if (part.inlineData?.data) {
        return part.inlineData.data;
      }
    }
    return undefined;
  }

  private requireClient(): GoogleGenAI {
    if (!this.ai) {
      throw new UpstreamError('GEMINI_NOT_CONFIGURED');
    }
    return this.ai;
  }
}
