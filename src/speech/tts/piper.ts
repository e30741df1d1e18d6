import type { AudioFormat } from '../../audio/formats';
import { SynthesisError } from '../../errors';
import { type CommandRunner, SPAWN_FAILED } from '../../utils/command';
import type { TTS } from '../tts';
import type { PiperSpeechOptions } from '../types';

export class PiperTTS implements TTS {
  readonly nativeFormat: AudioFormat = '.wav';

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: PiperSpeechOptions,
  ) {}

  async read(text: string, outputPath: string): Promise<void> {
    const piperArgs = [
      '--model',
      this.options.model,
      '--sentence-silence',
      String(this.options.sentenceSilence),
      '--output-file',
      outputPath,
    ];

    const result = await this.runner.execute('piper', piperArgs, {
      stdin: text,
    });

    if (result.exitCode === SPAWN_FAILED) {
      throw new SynthesisError(`piper is not installed or not on PATH: ${result.stderr}`);
    }
    if (!result.success) {
      throw new SynthesisError(`Piper failed: ${result.stderr.trim()}`);
    }
  }
}
