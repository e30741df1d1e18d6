import { access, copyFile, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import tempy from 'tempy';
import { FFmpeg } from '../audio/ffmpeg';
import type { AudioFormat } from '../audio/formats';
import type { Book, ContentItem } from '../ebook/types';
import { SynthesisError } from '../errors';
import { ProgressEmitter } from '../events/emitter';
import type { ProgressEvent } from '../events/types';
import { Logger } from '../logger/logger';
import { compileTemplate, DEFAULT_FILENAME_TEMPLATE } from '../naming/template';
import type { TTS } from '../speech/tts';
import type { CommandResult, CommandRunner } from '../utils/command';
import { convertBook, convertBooks, type PipelineContext } from './mod';

const FILLER = 'lorem ipsum '.repeat(10);

function chapterItem(id: string, text: string): ContentItem {
  return {
    id,
    href: `${id}.xhtml`,
    mediaType: 'application/xhtml+xml',
    type: 'document',
    content: Buffer.from(`<html><body><p>${text} ${FILLER}</p></body></html>`),
  };
}

function makeBook(...texts: string[]): Book {
  return {
    metadata: { titles: ['Dune'], creators: ['Jane Doe'] },
    items: texts.map((text, i) => chapterItem(`ch${i + 1}`, text)),
  };
}

/** Writes the text it is given, fails on chapters mentioning FAIL. */
class FakeTTS implements TTS {
  readonly nativeFormat: AudioFormat = '.aiff';
  readonly outputPaths: string[] = [];

  async read(text: string, outputPath: string): Promise<void> {
    this.outputPaths.push(outputPath);
    if (text.includes('FAIL')) {
      throw new SynthesisError('engine crashed');
    }
    await writeFile(outputPath, text);
  }
}

/** Stands in for ffmpeg by copying its input to its output. */
class CopyingRunner implements CommandRunner {
  constructor(private readonly succeed = true) {}

  async execute(_command: string, args: string[] = []): Promise<CommandResult> {
    const input = args[2];
    const output = args[args.length - 1];
    if (this.succeed && input && output) {
      await copyFile(input, output);
      return { success: true, stdout: '', stderr: '', exitCode: 0, duration: 0 };
    }
    return { success: false, stdout: '', stderr: 'Error: encoder crashed', exitCode: 1, duration: 0 };
  }
}

async function listFiles(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('convertBook', () => {
  let inputDir: string;
  let outputDir: string;
  let inputFile: string;
  let books: Map<string, Book>;
  let tts: FakeTTS;
  let events: ProgressEvent[];

  function context(overrides: Partial<PipelineContext> = {}): PipelineContext {
    const emitter = new ProgressEmitter();
    emitter.subscribe((event) => events.push(event));

    return {
      output: { format: '.aiff', template: compileTemplate(DEFAULT_FILENAME_TEMPLATE) },
      overrides: {},
      outputDir,
      concurrency: 1,
      tts,
      transcoder: new FFmpeg(new CopyingRunner()),
      events: emitter,
      logger: Logger.disabled(),
      parserFor: () => ({
        parse: async (path: string) => {
          const book = books.get(path);
          if (!book) {
            throw new Error('corrupt archive');
          }
          return book;
        },
      }),
      ...overrides,
    };
  }

  beforeEach(async () => {
    inputDir = tempy.directory();
    outputDir = tempy.directory();
    inputFile = join(inputDir, 'dune.epub');
    await writeFile(inputFile, 'placeholder');
    books = new Map();
    tts = new FakeTTS();
    events = [];
  });

  it('writes one numbered file per chapter', async () => {
    books.set(inputFile, makeBook('One', 'Two', 'Three'));

    const result = await convertBook(inputFile, context());

    expect(result.status).toBe('complete');
    expect(await listFiles(outputDir)).toEqual([
      'Jane Doe-Dune - Chapter 01.aiff',
      'Jane Doe-Dune - Chapter 02.aiff',
      'Jane Doe-Dune - Chapter 03.aiff',
    ]);
    expect(await readFile(join(outputDir, 'Jane Doe-Dune - Chapter 02.aiff'), 'utf-8')).toBe(`Two ${FILLER.trim()}`);
  });

  it('skips short and non-document items without consuming a number', async () => {
    const book = makeBook('One', 'Two');
    book.items.splice(1, 0, {
      id: 'notice',
      href: 'notice.xhtml',
      mediaType: 'application/xhtml+xml',
      type: 'document',
      content: Buffer.from('<p>Copyright</p>'),
    });
    book.items.unshift({ id: 'cover', href: 'cover.jpg', mediaType: 'image/jpeg', type: 'image', content: Buffer.from(FILLER) });
    books.set(inputFile, book);

    await convertBook(inputFile, context());

    expect(await readFile(join(outputDir, 'Jane Doe-Dune - Chapter 02.aiff'), 'utf-8')).toBe(`Two ${FILLER.trim()}`);
    expect(await listFiles(outputDir)).toHaveLength(2);
  });

  it('keeps going after a chapter fails', async () => {
    books.set(inputFile, makeBook('One', 'Two FAIL', 'Three', 'Four', 'Five'));

    const result = await convertBook(inputFile, context({ concurrency: 3 }));

    expect(result.status).toBe('partial');
    expect(result.chapters.map((chapter) => [chapter.chapterNumber, chapter.error])).toEqual([
      [1, undefined],
      [2, 'engine crashed'],
      [3, undefined],
      [4, undefined],
      [5, undefined],
    ]);
    expect(await listFiles(outputDir)).toEqual([
      'Jane Doe-Dune - Chapter 01.aiff',
      'Jane Doe-Dune - Chapter 03.aiff',
      'Jane Doe-Dune - Chapter 04.aiff',
      'Jane Doe-Dune - Chapter 05.aiff',
    ]);
    expect(events).toContainEqual({ type: 'chapter:failed', chapterNumber: 2, error: 'engine crashed' });
    expect(events).toContainEqual({ type: 'book:complete', inputFile, converted: 4, failed: 1 });
  });

  it('removes intermediate audio whatever the outcome', async () => {
    books.set(inputFile, makeBook('One', 'Two FAIL'));

    await convertBook(inputFile, context({ output: { format: '.mp3', template: compileTemplate('%d') } }));

    expect(tts.outputPaths).toHaveLength(2);
    for (const path of tts.outputPaths) {
      expect(path.endsWith('.aiff')).toBe(true);
      expect(await exists(path)).toBe(false);
    }
    expect(await listFiles(outputDir)).toEqual(['1.mp3']);
  });

  it('leaves no output when encoding fails', async () => {
    books.set(inputFile, makeBook('One'));

    const result = await convertBook(
      inputFile,
      context({
        output: { format: '.m4a', template: compileTemplate('%d') },
        transcoder: new FFmpeg(new CopyingRunner(false)),
      }),
    );

    expect(result.chapters[0]?.error).toBe('Failed to convert to .m4a: Error: encoder crashed');
    expect(await listFiles(outputDir)).toEqual([]);
  });

  it('applies author and title overrides to filenames', async () => {
    books.set(inputFile, makeBook('One'));

    await convertBook(inputFile, context({ overrides: { author: 'AC/DC' } }));

    expect(await listFiles(outputDir)).toEqual(['ACDC-Dune - Chapter 01.aiff']);
  });

  it('creates directories named by the template', async () => {
    books.set(inputFile, makeBook('One'));

    await convertBook(inputFile, context({ output: { format: '.aiff', template: compileTemplate('${Title}/%03d') } }));

    expect(await exists(join(outputDir, 'Dune', '001.aiff'))).toBe(true);
  });

  it('reports an unreadable document', async () => {
    const result = await convertBook(inputFile, context());

    expect(result).toEqual({
      inputFile,
      status: 'failed',
      chapters: [],
      error: `Could not read EPUB ${inputFile}: corrupt archive`,
    });
    expect(events).toContainEqual({ type: 'book:failed', inputFile, reason: 'unreadable', error: result.error });
  });

  it('warns when a document has nothing to narrate', async () => {
    books.set(inputFile, { metadata: { titles: [], creators: [] }, items: [] });

    const result = await convertBook(inputFile, context());

    expect(result.status).toBe('complete');
    expect(events).toContainEqual({
      type: 'book:warning',
      inputFile,
      message: 'No chapter with enough text to narrate was found',
    });
  });
});

describe('convertBooks', () => {
  it('reports a missing document and numbers the next one from 1', async () => {
    const inputDir = tempy.directory();
    const outputDir = tempy.directory();
    const missing = join(inputDir, 'missing.epub');
    const present = join(inputDir, 'present.epub');
    await writeFile(present, 'placeholder');
    const events: ProgressEvent[] = [];
    const emitter = new ProgressEmitter();
    emitter.subscribe((event) => events.push(event));

    const summary = await convertBooks([missing, present], {
      output: { format: '.aiff', template: compileTemplate('${Title} %d') },
      overrides: {},
      outputDir,
      concurrency: 1,
      tts: new FakeTTS(),
      transcoder: new FFmpeg(new CopyingRunner()),
      events: emitter,
      logger: Logger.disabled(),
      parserFor: () => ({ parse: async () => makeBook('One', 'Two') }),
    });

    expect(summary.books.map((book) => book.status)).toEqual(['failed', 'complete']);
    expect(summary.books[0]?.error).toBe(`File not found: ${missing}`);
    expect(events).toContainEqual({
      type: 'book:failed',
      inputFile: missing,
      reason: 'not-found',
      error: `File not found: ${missing}`,
    });
    expect(await listFiles(outputDir)).toEqual(['Dune 1.aiff', 'Dune 2.aiff']);
    expect(summary).toMatchObject({ writtenChapters: 2, failedChapters: 0, failedBooks: 1, success: false });
  });
});
