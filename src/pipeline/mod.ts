import { mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, join } from 'node:path';
import PQueue from 'p-queue';
import tempy from 'tempy';
import type { AudioFormat } from '../audio/formats';
import type { Transcoder } from '../audio/ffmpeg';
import { extractChapters, open, type ParserFactory } from '../ebook/mod';
import { resolveIdentity } from '../ebook/metadata';
import type { Book, BookIdentity, Chapter, IdentityOverrides } from '../ebook/types';
import { DocumentParseError, errorMessage, InputNotFoundError } from '../errors';
import type { ProgressEmitter } from '../events/emitter';
import type { BookFailureReason } from '../events/types';
import type { Logger } from '../logger/logger';
import { type FilenameTemplate, renderFileName } from '../naming/template';
import type { TTS } from '../speech/tts';

export interface OutputSettings {
  format: AudioFormat;
  template: FilenameTemplate;
}

export interface PipelineContext {
  output: OutputSettings;
  overrides: IdentityOverrides;
  /** Rendered filenames that are not absolute resolve against this directory. */
  outputDir: string;
  /** Chapters of one book synthesized at the same time. */
  concurrency: number;
  tts: TTS;
  transcoder: Transcoder;
  events: ProgressEmitter;
  logger: Logger;
  parserFor?: ParserFactory;
}

export interface ChapterResult {
  chapterNumber: number;
  outputFile: string;
  error?: string;
}

export interface BookResult {
  inputFile: string;
  status: 'complete' | 'partial' | 'failed';
  identity?: BookIdentity;
  chapters: ChapterResult[];
  error?: string;
}

export interface RunSummary {
  books: BookResult[];
  writtenChapters: number;
  failedChapters: number;
  failedBooks: number;
  success: boolean;
}

export async function convertBooks(inputFiles: string[], context: PipelineContext): Promise<RunSummary> {
  const books: BookResult[] = [];
  for (const inputFile of inputFiles) {
    books.push(await convertBook(inputFile, context));
  }

  const chapters = books.flatMap((book) => book.chapters);
  const failedChapters = chapters.filter((chapter) => chapter.error !== undefined).length;
  const failedBooks = books.filter((book) => book.status === 'failed').length;

  return {
    books,
    writtenChapters: chapters.length - failedChapters,
    failedChapters,
    failedBooks,
    success: failedChapters === 0 && failedBooks === 0,
  };
}

/**
 * Narrates one document into numbered chapter files. A missing or unreadable
 * document, or any unexpected error, ends this document only; a failing chapter
 * ends that chapter only.
 */
export async function convertBook(inputFile: string, context: PipelineContext): Promise<BookResult> {
  const { events } = context;
  events.emit({ type: 'book:start', inputFile });

  let book: Book;
  try {
    book = await open(inputFile, context.parserFor, (message) => events.emit({ type: 'book:warning', inputFile, message }));
  } catch (error) {
    return failBook(inputFile, error, context);
  }

  try {
    return await narrateBook(inputFile, book, context);
  } catch (error) {
    return failBook(inputFile, error, context);
  }
}

async function narrateBook(inputFile: string, book: Book, context: PipelineContext): Promise<BookResult> {
  const { events } = context;

  const identity = resolveIdentity(book.metadata, context.overrides);
  const chapters = extractChapters(book);

  events.emit({ type: 'book:identified', inputFile, identity, totalChapters: chapters.length });
  context.logger.info(`Narrating ${inputFile}`, { author: identity.author, title: identity.title, chapters: chapters.length });

  if (chapters.length === 0) {
    events.emit({ type: 'book:warning', inputFile, message: 'No chapter with enough text to narrate was found' });
  }

  // Each chapter renders its own numbered filename, so completion order does not matter
  const queue = new PQueue({ concurrency: context.concurrency });
  const results = await Promise.all(
    chapters.map((chapter) => queue.add(() => narrateChapter(chapter, identity, context))),
  );

  const failed = results.filter((result) => result.error !== undefined).length;
  events.emit({ type: 'book:complete', inputFile, converted: results.length - failed, failed });

  return {
    inputFile,
    status: failed === 0 ? 'complete' : 'partial',
    identity,
    chapters: results,
  };
}

async function narrateChapter(chapter: Chapter, identity: BookIdentity, context: PipelineContext): Promise<ChapterResult> {
  const { events, output, tts, transcoder } = context;

  const fileName = renderFileName(output.template, chapter.index, identity, output.format);
  const outputFile = isAbsolute(fileName) ? fileName : join(context.outputDir, fileName);

  events.emit({ type: 'chapter:start', chapterNumber: chapter.index, outputFile });

  try {
    await mkdir(dirname(outputFile), { recursive: true });

    // The raw synthesis output is deleted when the task settles, whatever the outcome
    await tempy.file.task(
      async (tempFile) => {
        await tts.read(chapter.text, tempFile);
        events.emit({
          type: 'audio:convert',
          chapterNumber: chapter.index,
          sourceFile: tempFile,
          outputFile,
          format: output.format,
        });
        await transcoder.convert(tempFile, outputFile, output.format);
      },
      { extension: tts.nativeFormat.slice(1) },
    );
  } catch (error) {
    const message = errorMessage(error);
    context.logger.error(`Chapter ${chapter.index} failed`, error, { outputFile });
    events.emit({ type: 'chapter:failed', chapterNumber: chapter.index, error: message });
    return { chapterNumber: chapter.index, outputFile, error: message };
  }

  events.emit({ type: 'chapter:complete', chapterNumber: chapter.index, outputFile });
  return { chapterNumber: chapter.index, outputFile };
}

function failBook(inputFile: string, error: unknown, context: PipelineContext): BookResult {
  const reason = failureReason(error);
  const message = errorMessage(error);

  context.logger.error(`Skipping ${inputFile}`, error, { reason });
  context.events.emit({ type: 'book:failed', inputFile, reason, error: message });

  return { inputFile, status: 'failed', chapters: [], error: message };
}

function failureReason(error: unknown): BookFailureReason {
  if (error instanceof InputNotFoundError) {
    return 'not-found';
  }
  if (error instanceof DocumentParseError) {
    return 'unreadable';
  }
  return 'unexpected';
}
