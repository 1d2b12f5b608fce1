import { execFile } from 'node:child_process';
import type { Credentials } from './credentials.js';
import { CommandError, TimeoutError } from './errors.js';
import { logger } from './logger.js';

/**
 * Runs one external command and hands back its stdout as lines.
 *
 * Rejects with TimeoutError or CommandError; never retries.
 */
export interface CommandRunner {
  run(args: readonly string[], credentials: Credentials, timeoutMs: number): Promise<string[]>;
}

export function splitLines(output: string): string[] {
  const lines = output.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * CommandRunner backed by child_process.execFile.
 *
 * A command that outlives its timeout is killed with SIGKILL before the
 * promise rejects, so no stray ciao-cli process survives the case.
 */
export class ProcessCommandRunner implements CommandRunner {
  public async run(args: readonly string[], credentials: Credentials, timeoutMs: number): Promise<string[]> {
    const [command, ...rest] = args;
    if (command === undefined) {
      throw new CommandError(args, null, 'empty argument vector');
    }

    logger.debug({ args, role: credentials.role, timeoutMs }, 'Running command');

    const stdout = await new Promise<string>((resolve, reject) => {
      const child = execFile(
        command,
        rest,
        {
          env: { ...credentials.env },
          timeout: timeoutMs,
          killSignal: 'SIGKILL',
          maxBuffer: 10 * 1024 * 1024,
          encoding: 'utf8'
        },
        (error, so, se) => {
          if (error) {
            const captured = se || so;
            if (error.killed === true) {
              reject(new TimeoutError(args, timeoutMs, captured, { cause: error }));
              return;
            }
            const exitCode = typeof error.code === 'number' ? error.code : null;
            reject(new CommandError(args, exitCode, captured || error.message, { cause: error }));
            return;
          }

          resolve(so);
        }
      );

      child.stdin?.end();
    });

    return splitLines(stdout);
  }
}
