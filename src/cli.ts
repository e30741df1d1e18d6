#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { FFmpeg } from './audio/ffmpeg';
import { DEFAULT_FORMAT, FORMAT_CHOICES, parseFormat } from './audio/formats';
import { type Config, loadConfig } from './config';
import type { IdentityOverrides } from './ebook/types';
import { errorMessage } from './errors';
import { type ConsoleOutput, ConsoleProgressListener, ProgressEmitter } from './events/mod';
import { Logger } from './logger/logger';
import { compileTemplate, DEFAULT_FILENAME_TEMPLATE } from './naming/template';
import { convertBooks, type OutputSettings } from './pipeline/mod';
import { buildTTS } from './speech/tts';
import { SPEECH_ENGINES, type SpeechEngine, type SpeechOptions } from './speech/types';
import { CommandExecutor } from './utils/command';

type CliOptions = {
  author?: string;
  title?: string;
  format: string;
  filenameFormat: string;
  outputDir: string;
  engine: SpeechEngine;
  concurrency: number;
  verbose: boolean;
};

export interface RunOptions {
  files: string[];
  overrides: IdentityOverrides;
  output: OutputSettings;
  outputDir: string;
  engine: SpeechEngine;
  concurrency: number;
  verbose: boolean;
}

const consoleOutput: ConsoleOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function buildProgram(config: Config, io: ConsoleOutput = consoleOutput): Command {
  return new Command()
    .name('epub-narrator')
    .description('Convert EPUB books into one narrated audio file per chapter')
    .version('0.1.0')
    .argument('<files...>', 'One or more .epub files to process')
    .option('-a, --author <author>', 'Override the author name')
    .option('-t, --title <title>', 'Override the book title')
    .addOption(
      new Option('-f, --format <format>', 'Audio format').choices(FORMAT_CHOICES).default(DEFAULT_FORMAT),
    )
    .option(
      '-F, --filename-format <template>',
      'Output filename format. Use ${Author}, ${Title}, ${ext} and one chapter number directive such as %02d',
      DEFAULT_FILENAME_TEMPLATE,
    )
    .option('-o, --output-dir <dir>', 'Directory the chapter files are written to', '.')
    .addOption(new Option('-e, --engine <engine>', 'Speech engine').choices(SPEECH_ENGINES).default(config.engine))
    .option('-c, --concurrency <num>', 'Number of chapters synthesized at once', parsePositiveInt, config.concurrency)
    .option('-v, --verbose', 'Show progress details', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });
}

/**
 * Parses and validates the command line. Format and filename template are
 * checked here so a bad template fails the run before any book is touched.
 */
export function parseArguments(
  argv: string[],
  config: Config,
  io: ConsoleOutput = consoleOutput,
  from: 'node' | 'user' = 'node',
): RunOptions {
  const program = buildProgram(config, io);
  program.parse(argv, { from });
  const options = program.opts<CliOptions>();

  return {
    files: program.args,
    overrides: { author: options.author, title: options.title },
    output: {
      format: parseFormat(options.format),
      template: compileTemplate(options.filenameFormat),
    },
    outputDir: options.outputDir,
    engine: options.engine,
    concurrency: options.concurrency,
    verbose: options.verbose,
  };
}

function speechOptions(engine: SpeechEngine, config: Config): SpeechOptions {
  switch (engine) {
    case 'say':
      return { engine: 'say' };
    case 'piper':
      return { engine: 'piper', model: config.piperModel, sentenceSilence: config.piperSentenceSilence };
  }
}

/** Runs the command line and resolves with the process exit code. */
export async function run(argv: string[] = process.argv, io: ConsoleOutput = consoleOutput): Promise<number> {
  const config = loadConfig(process.env, (message) => io.err(`[WARN] ${message}`));

  let options: RunOptions;
  try {
    options = parseArguments(argv, config, io);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.err(`[ERROR] ${errorMessage(error)}`);
    return 1;
  }

  if (options.engine === 'say' && process.platform !== 'darwin') {
    io.err('[WARN] The say engine is only available on macOS. Use --engine piper elsewhere.');
  }

  const logger = await Logger.create(config.logDir);
  const runner = new CommandExecutor(logger);
  const events = new ProgressEmitter((error, event) => logger.error(`Progress listener failed on ${event.type}`, error));
  const listener = new ConsoleProgressListener(options.verbose, io);
  const subscriptions = [
    events.subscribe((event) => listener.listen(event)),
    events.on('book:warning', (event) => logger.info(`Warning for ${event.inputFile}: ${event.message}`)),
  ];

  try {
    const summary = await convertBooks(options.files, {
      output: options.output,
      overrides: options.overrides,
      outputDir: options.outputDir,
      concurrency: options.concurrency,
      tts: buildTTS(speechOptions(options.engine, config), runner),
      transcoder: new FFmpeg(runner, config.ffmpegPath),
      events,
      logger,
    });

    if (options.verbose) {
      io.out(
        `[INFO] Done: ${summary.writtenChapters} chapter(s) written, ${summary.failedChapters} failed, ` +
          `${summary.failedBooks} book(s) skipped`,
      );
    }

    return summary.success ? 0 : 1;
  } finally {
    subscriptions.forEach((unsubscribe) => unsubscribe());
    await logger.flush();
  }
}

if (require.main === module) {
  loadDotenv();
  run().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      console.error(`[ERROR] ${errorMessage(error)}`);
      process.exitCode = 1;
    },
  );
}
