import { Logger, LoggerService } from '@nestjs/common';

// Structural subset of the Web Speech API recognizer (SpeechRecognition).

export interface SpeechRecognitionAlternativeLike {
  readonly transcript: string;
}

export interface SpeechRecognitionResultLike {
  readonly isFinal: boolean;
  readonly length: number;
  readonly [index: number]: SpeechRecognitionAlternativeLike;
}

export interface SpeechRecognitionResultListLike {
  readonly length: number;
  readonly [index: number]: SpeechRecognitionResultLike;
}

export interface SpeechRecognitionEventLike {
  readonly resultIndex: number;
  readonly results: SpeechRecognitionResultListLike;
}

export interface SpeechRecognitionErrorEventLike {
  readonly error: string;
  readonly message?: string;
}

export interface SpeechRecognizer {
  continuous: boolean;
  interimResults: boolean;
  lang: string;
  onresult: ((event: SpeechRecognitionEventLike) => void) | null;
  onerror: ((event: SpeechRecognitionErrorEventLike) => void) | null;
  onend: (() => void) | null;
  start(): void;
  stop(): void;
}

export interface SpeechCaptureCallbacks {
  onFinal: (transcript: string) => void;
  onInterim?: (transcript: string) => void;
  onError?: (error: string) => void;
  onStateChange?: (listening: boolean) => void;
}

export interface SpeechCaptureOptions {
  lang?: string;
  continuous?: boolean;
}

/**
 * Turns recognizer events into interim text for display and final
 * transcripts for sending. Only non-blank finals are reported.
 */
export class SpeechCaptureAdapter {
  private listening = false;

  constructor(
    private readonly recognizer: SpeechRecognizer,
    private readonly callbacks: SpeechCaptureCallbacks,
    options: SpeechCaptureOptions = {},
    private readonly logger: LoggerService = new Logger(SpeechCaptureAdapter.name),
  ) {
    recognizer.lang = options.lang ?? 'en-US';
    recognizer.continuous = options.continuous ?? false;
    recognizer.interimResults = true;
    recognizer.onresult = (event) => this.handleResult(event);
    recognizer.onerror = (event) => this.handleError(event);
    recognizer.onend = () => this.setListening(false);
  }

  isListening(): boolean {
    return this.listening;
  }

  /** @returns false when already listening or the recognizer refused to start */
  start(): boolean {
    if (this.listening) {
      return false;
    }
    try {
      this.recognizer.start();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Speech recognition failed to start: ${message}`);
      this.callbacks.onError?.(message);
      return false;
    }
    this.setListening(true);
    return true;
  }

  stop(): void {
    if (!this.listening) {
      return;
    }
    this.recognizer.stop();
  }

  private handleResult(event: SpeechRecognitionEventLike): void {
    let finalText = '';
    let interimText = '';

    for (let i = event.resultIndex; i < event.results.length; i++) {
      const result = event.results[i];
      const transcript = result.length > 0 ? result[0].transcript : '';
      if (result.isFinal) {
        finalText += transcript;
      } else {
        interimText += transcript;
      }
    }

    if (interimText) {
      this.callbacks.onInterim?.(interimText);
    }
    const trimmed = finalText.trim();
    if (trimmed) {
      this.callbacks.onFinal(trimmed);
    }
  }

  private handleError(event: SpeechRecognitionErrorEventLike): void {
    this.logger.warn(`Speech recognition error: ${event.error}`);
    this.callbacks.onError?.(event.message || event.error);
    this.setListening(false);
  }

  private setListening(listening: boolean): void {
    if (this.listening === listening) {
      return;
    }
    this.listening = listening;
    this.callbacks.onStateChange?.(listening);
  }
}
