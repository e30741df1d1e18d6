import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export interface CommandLogEntry {
  command: string;
  args: string[];
  workingDir: string;
  startTime: Date;
  endTime?: Date;
  duration?: number;
  success: boolean;
  stdout?: string | undefined;
  stderr?: string | undefined;
  exitCode?: number | undefined;
}

const OUTPUT_PREVIEW_LENGTH = 1000;

/**
 * Appends timestamped lines to `epub-narrator.log` (errors) and `commands.log`
 * (every external command) under a log directory. Created without a directory,
 * it records nothing.
 */
export class Logger {
  private pending: Promise<void> = Promise.resolve();

  private constructor(
    private readonly logFile?: string,
    private readonly commandLogFile?: string,
  ) {}

  static async create(logDir?: string): Promise<Logger> {
    if (!logDir) {
      return Logger.disabled();
    }

    await mkdir(logDir, { recursive: true });
    return new Logger(join(logDir, 'epub-narrator.log'), join(logDir, 'commands.log'));
  }

  static disabled(): Logger {
    return new Logger();
  }

  /** Resolves once every line written so far has reached the disk. */
  flush(): Promise<void> {
    return this.pending;
  }

  // Appends are chained so lines land in the order they were logged
  private writeToFile(file: string | undefined, ...messages: string[]): Promise<void> {
    if (!file) {
      return Promise.resolve();
    }

    const timestamp = new Date().toISOString();
    const lines = messages.map((message) => `${timestamp} | ${message}\n`).join('');
    const write = this.pending.then(() => appendFile(file, lines));
    // a failed append is reported by the caller and must not stall later lines
    this.pending = write.catch(() => undefined);
    return write;
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const logMessage = meta ? `INFO: ${message} ${JSON.stringify(meta)}` : `INFO: ${message}`;
    this.writeToFile(this.logFile, logMessage).catch(console.error);
  }

  error(message: string, error?: Error | unknown, meta?: Record<string, unknown>): void {
    const errorInfo = error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };

    const logMessage = `ERROR: ${message} ${JSON.stringify({ ...errorInfo, ...meta })}`;
    this.writeToFile(this.logFile, logMessage).catch(console.error);
  }

  logCommandStart(command: string, args: string[], workingDir: string): CommandLogEntry {
    const entry: CommandLogEntry = {
      command,
      args,
      workingDir,
      startTime: new Date(),
      success: false,
    };

    this.writeToFile(this.commandLogFile, `COMMAND_START: ${command} ${args.join(' ')} (cwd: ${workingDir})`).catch(
      console.error,
    );

    return entry;
  }

  logCommandEnd(
    entry: CommandLogEntry,
    success: boolean,
    stdout?: string | undefined,
    stderr?: string | undefined,
    exitCode?: number | undefined,
  ): void {
    entry.endTime = new Date();
    entry.duration = entry.endTime.getTime() - entry.startTime.getTime();
    entry.success = success;
    entry.stdout = stdout;
    entry.stderr = stderr;
    entry.exitCode = exitCode;

    const status = success ? 'SUCCESS' : 'FAILED';
    const lines = [`COMMAND_END: ${entry.command} - ${status} (${entry.duration}ms)`];

    if (stdout && stdout.length > 0) {
      lines.push(`STDOUT: ${preview(stdout)}`);
    }
    if (stderr && stderr.length > 0) {
      lines.push(`STDERR: ${preview(stderr)}`);
    }
    if (exitCode !== undefined) {
      lines.push(`EXIT_CODE: ${exitCode}`);
    }

    this.writeToFile(this.commandLogFile, ...lines).catch(console.error);
  }
}

function preview(output: string): string {
  return `${output.slice(0, OUTPUT_PREVIEW_LENGTH)}${output.length > OUTPUT_PREVIEW_LENGTH ? '...' : ''}`;
}
