import { Logger, LoggerService } from '@nestjs/common';
import { spawn } from 'child_process';
import { PlaybackError, describeError } from '../shared/errors/chat.errors';
import { AudioSink, PlaybackItem } from './audio-playback.queue';

export const FFPLAY_ARGS = ['-nodisp', '-autoexit', '-loglevel', 'quiet', '-'];

/** A started player process, reduced to what the sink needs. */
export interface PlayerProcess {
  /** Feed the whole clip on stdin and close it. */
  write(audio: Buffer): void;
  kill(): void;
  /** Exit code, or null when killed by a signal. Rejects if the player cannot start. */
  readonly exited: Promise<number | null>;
}

export type SpawnPlayer = (command: string, args: string[]) => PlayerProcess;

export function spawnPlayerProcess(
  logger: LoggerService,
): SpawnPlayer {
  return (command, args) => {
    const child = spawn(command, args, { stdio: ['pipe', 'ignore', 'ignore'] });
    const exited = new Promise<number | null>((resolve, reject) => {
      child.once('error', reject);
      child.once('close', (code) => resolve(code));
    });
    // EPIPE when the player exits or is killed before reading everything
    child.stdin.on('error', (error) => {
      logger.debug?.(`Player stdin closed: ${error.message}`);
    });

    return {
      exited,
      write: (audio) => {
        child.stdin.end(audio);
      },
      kill: () => {
        child.kill('SIGTERM');
      },
    };
  };
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Plays WAV bytes through `ffplay` (part of ffmpeg). Aborting kills the player.
 */
export class FfplayAudioSink implements AudioSink {
  private readonly spawnPlayer: SpawnPlayer;

  constructor(
    private readonly command = 'ffplay',
    spawnPlayer?: SpawnPlayer,
    private readonly logger: LoggerService = new Logger(FfplayAudioSink.name),
  ) {
    this.spawnPlayer = spawnPlayer ?? spawnPlayerProcess(logger);
  }

  async play(item: PlaybackItem, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return;
    }

    let player: PlayerProcess;
    try {
      player = this.spawnPlayer(this.command, FFPLAY_ARGS);
    } catch (error) {
      throw this.toPlaybackError(error);
    }

    const onAbort = () => player.kill();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      player.write(item.audio);
      const code = await player.exited;
      if (code !== 0 && !signal.aborted) {
        throw new PlaybackError('PLAYBACK_FAILED', `${this.command} exited with code ${code}`);
      }
      this.logger.debug?.(`Played audio for ${item.correlationId}`);
    } catch (error) {
      throw this.toPlaybackError(error);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private toPlaybackError(error: unknown): PlaybackError {
    if (error instanceof PlaybackError) {
      return error;
    }
    if (isMissingBinary(error)) {
      this.logger.error(`${this.command} not found. Install ffmpeg to play audio.`);
      return new PlaybackError('PLAYER_UNAVAILABLE');
    }
    return new PlaybackError('PLAYBACK_FAILED', describeError(error));
  }
}
