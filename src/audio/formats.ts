export type AudioFormat = '.m4a' | '.mp3' | '.wav' | '.aiff';

export type EncodeParams =
  | { kind: 'vbr'; codec: 'libmp3lame'; channels: number; quality: number }
  | { kind: 'cbr'; codec: 'aac'; bitrate: string }
  | { kind: 'pcm'; codec: 'pcm_s16le' | 'pcm_s16be'; sampleRate: number };

// mp3 is tuned for speech: mono and a mid VBR quality (~64-80 kbps)
export const ENCODE_PARAMS: Record<AudioFormat, EncodeParams> = {
  '.mp3': { kind: 'vbr', codec: 'libmp3lame', channels: 1, quality: 5 },
  '.m4a': { kind: 'cbr', codec: 'aac', bitrate: '128k' },
  '.wav': { kind: 'pcm', codec: 'pcm_s16le', sampleRate: 44100 },
  '.aiff': { kind: 'pcm', codec: 'pcm_s16be', sampleRate: 44100 },
};

export const AUDIO_FORMATS: readonly AudioFormat[] = ['.m4a', '.mp3', '.wav', '.aiff'];

export const DEFAULT_FORMAT: AudioFormat = '.m4a';

/** Accepted spellings of the format flag: every format with and without its dot. */
export const FORMAT_CHOICES: string[] = AUDIO_FORMATS.flatMap((format) => [format, format.slice(1)]);

export function isAudioFormat(value: string): value is AudioFormat {
  return Object.hasOwn(ENCODE_PARAMS, value);
}

export function parseFormat(value: string): AudioFormat {
  const withDot = value.startsWith('.') ? value : `.${value}`;
  if (!isAudioFormat(withDot)) {
    throw new Error(`Unsupported audio format "${value}". Expected one of: ${FORMAT_CHOICES.join(', ')}`);
  }
  return withDot;
}

export function ffmpegArgs(params: EncodeParams): string[] {
  switch (params.kind) {
    case 'vbr':
      return ['-ac', String(params.channels), '-c:a', params.codec, '-q:a', String(params.quality)];
    case 'cbr':
      return ['-c:a', params.codec, '-b:a', params.bitrate];
    case 'pcm':
      return ['-c:a', params.codec, '-ar', String(params.sampleRate)];
  }
}
