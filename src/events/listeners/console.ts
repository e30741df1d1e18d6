import type { ProgressEvent } from '../types';

export interface ConsoleOutput {
  out(line: string): void;
  err(line: string): void;
}

const defaultOutput: ConsoleOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Renders progress as `[INFO]` lines on stdout, shown only when verbose, and
 * `[WARN]`/`[ERROR]` lines on stderr, always shown.
 */
export class ConsoleProgressListener {
  constructor(
    private readonly verbose = false,
    private readonly output: ConsoleOutput = defaultOutput,
  ) {}

  listen(event: ProgressEvent): void {
    switch (event.type) {
      case 'book:start':
        this.info(`Starting processing for: ${event.inputFile}`);
        break;

      case 'book:identified':
        this.info(`Identified Author: ${event.identity.author}`);
        this.info(`Identified Title: ${event.identity.title}`);
        this.info(`Chapters found: ${event.totalChapters}`);
        break;

      case 'book:warning':
        this.output.err(`[WARN] ${event.inputFile}: ${event.message}`);
        break;

      case 'book:failed':
        if (event.reason === 'unexpected') {
          this.error(`Unexpected failure while processing ${event.inputFile}: ${event.error}`);
        } else {
          this.error(event.error);
        }
        break;

      case 'chapter:start':
        this.info(`Processing Chapter ${event.chapterNumber}...`);
        break;

      case 'audio:convert':
        this.info(`Converting ${event.sourceFile} to ${event.outputFile} (${event.format})`);
        break;

      case 'chapter:complete':
        this.info(`Wrote ${event.outputFile}`);
        break;

      case 'chapter:failed':
        this.error(`TTS or Conversion failed for chapter ${event.chapterNumber}: ${event.error}`);
        break;

      case 'book:complete':
        this.info(`Finished ${event.inputFile}: ${event.converted} chapter(s) written, ${event.failed} failed`);
        break;
    }
  }

  private info(message: string): void {
    if (this.verbose) {
      this.output.out(`[INFO] ${message}`);
    }
  }

  private error(message: string): void {
    this.output.err(`[ERROR] ${message}`);
  }
}
