export interface SaySpeechOptions {
  engine: 'say';
}

export interface PiperSpeechOptions {
  engine: 'piper';
  model: string;
  sentenceSilence: number;
}

export type SpeechOptions = SaySpeechOptions | PiperSpeechOptions;

export type SpeechEngine = SpeechOptions['engine'];

export const SPEECH_ENGINES: readonly SpeechEngine[] = ['say', 'piper'];
