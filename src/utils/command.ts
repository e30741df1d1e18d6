import { spawn } from 'node:child_process';
import type { Logger } from '../logger/logger';

export interface CommandOptions {
  /** Piped to the process; without it the process reads an empty stdin. */
  stdin?: string;
}

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  duration: number;
}

export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
}

/** Exit code reported when the process could not be started at all, e.g. a missing binary. */
export const SPAWN_FAILED = -1;

export class CommandExecutor implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  execute(command: string, args: string[] = [], options: CommandOptions = {}): Promise<CommandResult> {
    const logEntry = this.logger.logCommandStart(command, args, process.cwd());

    return new Promise<CommandResult>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const finish = (success: boolean, exitCode: number, spawnError?: unknown) => {
        if (settled) return;
        settled = true;

        const stdoutText = Buffer.concat(stdout).toString('utf-8');
        const stderrText = spawnError === undefined ? Buffer.concat(stderr).toString('utf-8') : String(spawnError);

        this.logger.logCommandEnd(logEntry, success, stdoutText, stderrText, exitCode);
        if (spawnError !== undefined) {
          this.logger.error(`Command execution failed: ${command}`, spawnError);
        }

        resolve({
          success,
          stdout: stdoutText,
          stderr: stderrText,
          exitCode,
          duration: logEntry.duration || 0,
        });
      };

      const child = spawn(command, args, {
        stdio: [options.stdin !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
      });

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => finish(false, SPAWN_FAILED, error));
      child.on('close', (code, signal) => {
        if (signal) {
          stderr.push(Buffer.from(`\nTerminated by ${signal}`));
        }
        finish(code === 0, code ?? SPAWN_FAILED);
      });

      if (options.stdin !== undefined && child.stdin) {
        // A process that exits before reading all of its input surfaces through 'close'
        child.stdin.on('error', (error) => stderr.push(Buffer.from(`\nstdin: ${String(error)}`)));
        child.stdin.end(options.stdin);
      }
    });
  }
}
