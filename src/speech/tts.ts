import type { AudioFormat } from '../audio/formats';
import type { CommandRunner } from '../utils/command';
import { PiperTTS } from './tts/piper';
import { SayTTS } from './tts/say';
import type { SpeechOptions } from './types';

/** A speech engine that renders text into an audio file in its native format. */
export interface TTS {
  readonly nativeFormat: AudioFormat;
  read(text: string, outputPath: string): Promise<void>;
}

export function buildTTS(options: SpeechOptions, runner: CommandRunner): TTS {
  switch (options.engine) {
    case 'say':
      return new SayTTS(runner);
    case 'piper':
      return new PiperTTS(runner, options);
  }
}
