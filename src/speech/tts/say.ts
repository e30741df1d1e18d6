import type { AudioFormat } from '../../audio/formats';
import { SynthesisError } from '../../errors';
import { type CommandRunner, SPAWN_FAILED } from '../../utils/command';
import type { TTS } from '../tts';

/** The speech synthesizer that ships with macOS. */
export class SayTTS implements TTS {
  readonly nativeFormat: AudioFormat = '.aiff';

  constructor(private readonly runner: CommandRunner) {}

  async read(text: string, outputPath: string): Promise<void> {
    // `-f -` takes the text from stdin
    const result = await this.runner.execute('say', ['-o', outputPath, '-f', '-'], { stdin: text });

    if (result.exitCode === SPAWN_FAILED) {
      throw new SynthesisError(`say is not available on this system (macOS only): ${result.stderr}`);
    }
    if (!result.success) {
      throw new SynthesisError(`say failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }
}
