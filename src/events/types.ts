import type { AudioFormat } from '../audio/formats';
import type { BookIdentity } from '../ebook/types';

export interface BookStartEvent {
  type: 'book:start';
  inputFile: string;
}

export interface BookIdentifiedEvent {
  type: 'book:identified';
  inputFile: string;
  identity: BookIdentity;
  totalChapters: number;
}

export interface BookWarningEvent {
  type: 'book:warning';
  inputFile: string;
  message: string;
}

export type BookFailureReason = 'not-found' | 'unreadable' | 'unexpected';

export interface BookFailedEvent {
  type: 'book:failed';
  inputFile: string;
  reason: BookFailureReason;
  error: string;
}

export interface BookCompleteEvent {
  type: 'book:complete';
  inputFile: string;
  converted: number;
  failed: number;
}

export interface ChapterStartEvent {
  type: 'chapter:start';
  chapterNumber: number;
  outputFile: string;
}

export interface AudioConvertEvent {
  type: 'audio:convert';
  chapterNumber: number;
  sourceFile: string;
  outputFile: string;
  format: AudioFormat;
}

export interface ChapterCompleteEvent {
  type: 'chapter:complete';
  chapterNumber: number;
  outputFile: string;
}

export interface ChapterFailedEvent {
  type: 'chapter:failed';
  chapterNumber: number;
  error: string;
}

export type ProgressEvent =
  | BookStartEvent
  | BookIdentifiedEvent
  | BookWarningEvent
  | BookFailedEvent
  | BookCompleteEvent
  | ChapterStartEvent
  | AudioConvertEvent
  | ChapterCompleteEvent
  | ChapterFailedEvent;

export type EventListener = (event: ProgressEvent) => void;
