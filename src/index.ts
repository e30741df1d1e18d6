export * from './errors';
export type { Book, BookIdentity, BookMetadata, Chapter, ContentItem, ContentItemType, IdentityOverrides } from './ebook/types';
export { extractChapters, open } from './ebook/mod';
export { buildParser, type Parser } from './ebook/parser';
export { EpubParser } from './ebook/parser/epub';
export { isChapterText, MIN_CHAPTER_LENGTH, normalizeText } from './ebook/text';
export { resolveIdentity, sanitizeForFilename } from './ebook/metadata';
export { compileTemplate, DEFAULT_FILENAME_TEMPLATE, renderFileName, type FilenameTemplate } from './naming/template';
export { AUDIO_FORMATS, ENCODE_PARAMS, parseFormat, type AudioFormat, type EncodeParams } from './audio/formats';
export { FFmpeg, type Transcoder } from './audio/ffmpeg';
export { buildTTS, type TTS } from './speech/tts';
export type { SpeechOptions } from './speech/types';
export { CommandExecutor, type CommandRunner } from './utils/command';
export { Logger } from './logger/logger';
export { ConsoleProgressListener, ProgressEmitter, type ProgressEvent } from './events/mod';
export { loadConfig, type Config } from './config';
export { convertBook, convertBooks, type BookResult, type PipelineContext, type RunSummary } from './pipeline/mod';
