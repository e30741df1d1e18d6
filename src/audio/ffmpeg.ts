import { copyFile, rename, rm } from 'node:fs/promises';
import { extname } from 'node:path';
import { EncodeError } from '../errors';
import { type CommandRunner, SPAWN_FAILED } from '../utils/command';
import { type AudioFormat, ENCODE_PARAMS, ffmpegArgs } from './formats';

export interface Transcoder {
  convert(sourcePath: string, destinationPath: string, format: AudioFormat): Promise<void>;
}

export class FFmpeg implements Transcoder {
  constructor(
    private readonly runner: CommandRunner,
    private readonly ffmpegPath: string = 'ffmpeg',
  ) {}

  async convert(sourcePath: string, destinationPath: string, format: AudioFormat): Promise<void> {
    if (extname(sourcePath).toLowerCase() === format) {
      await moveFile(sourcePath, destinationPath);
      return;
    }

    const args = ['-y', '-i', sourcePath, ...ffmpegArgs(ENCODE_PARAMS[format]), destinationPath];
    const result = await this.runner.execute(this.ffmpegPath, args);

    if (!result.success) {
      await rm(destinationPath, { force: true });

      if (result.exitCode === SPAWN_FAILED) {
        throw new EncodeError(`ffmpeg not found at "${this.ffmpegPath}". Install ffmpeg or set FFMPEG_PATH.`);
      }
      throw new EncodeError(`Failed to convert to ${format}: ${lastLine(result.stderr)}`);
    }
  }
}

export async function moveFile(sourcePath: string, destinationPath: string): Promise<void> {
  try {
    await rename(sourcePath, destinationPath);
  } catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }

    // Temp dir and output dir live on different filesystems
    try {
      await copyFile(sourcePath, destinationPath);
    } catch (copyError) {
      await rm(destinationPath, { force: true });
      throw copyError;
    }
    await rm(sourcePath, { force: true });
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

// ffmpeg prints its banner and stream info first; the reason for a failure is at the end
function lastLine(stderr: string): string {
  const lines = stderr.trim().split('\n');
  return lines[lines.length - 1]?.trim() || 'unknown error';
}
