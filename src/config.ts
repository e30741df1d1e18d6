import { SPEECH_ENGINES, type SpeechEngine } from './speech/types';

export interface Config {
  engine: SpeechEngine;
  piperModel: string;
  piperSentenceSilence: number;
  ffmpegPath: string;
  concurrency: number;
  logDir: string | undefined;
}

export const DEFAULT_CONFIG: Config = {
  engine: 'say',
  piperModel: 'en_US-ljspeech-high',
  piperSentenceSilence: 0.5,
  ffmpegPath: 'ffmpeg',
  concurrency: 1,
  logDir: undefined,
};

type Env = Record<string, string | undefined>;
type Warn = (message: string) => void;

/** Reads configuration from the environment; `.env` is loaded by the CLI before this runs. */
export function loadConfig(env: Env = process.env, warn: Warn = console.warn): Config {
  return {
    engine: parseEngine(env.EPUB_NARRATOR_ENGINE, warn),
    piperModel: env.PIPER_MODEL || DEFAULT_CONFIG.piperModel,
    piperSentenceSilence: parseSentenceSilence(env.PIPER_SENTENCE_SILENCE, warn),
    ffmpegPath: env.FFMPEG_PATH || DEFAULT_CONFIG.ffmpegPath,
    concurrency: parseConcurrency(env.EPUB_NARRATOR_CONCURRENCY, warn),
    logDir: env.EPUB_NARRATOR_LOG_DIR || DEFAULT_CONFIG.logDir,
  };
}

export function isSpeechEngine(value: string): value is SpeechEngine {
  return SPEECH_ENGINES.some((engine) => engine === value);
}

function parseEngine(envValue: string | undefined, warn: Warn): SpeechEngine {
  if (!envValue) {
    return DEFAULT_CONFIG.engine;
  }

  if (!isSpeechEngine(envValue)) {
    warn(`Invalid EPUB_NARRATOR_ENGINE value "${envValue}". Using "${DEFAULT_CONFIG.engine}".`);
    return DEFAULT_CONFIG.engine;
  }

  return envValue;
}

export function parseConcurrency(envValue: string | undefined, warn: Warn): number {
  if (!envValue) {
    return DEFAULT_CONFIG.concurrency;
  }

  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    warn(`Invalid EPUB_NARRATOR_CONCURRENCY value "${envValue}". Using minimum value of 1.`);
    return 1;
  }

  return parsed;
}

function parseSentenceSilence(envValue: string | undefined, warn: Warn): number {
  if (!envValue) {
    return DEFAULT_CONFIG.piperSentenceSilence;
  }

  const parsed = Number.parseFloat(envValue);
  if (Number.isNaN(parsed) || parsed < 0) {
    warn(`Invalid PIPER_SENTENCE_SILENCE value "${envValue}". Using ${DEFAULT_CONFIG.piperSentenceSilence}.`);
    return DEFAULT_CONFIG.piperSentenceSilence;
  }

  return parsed;
}
