/**
 * Base class for every failure the harness knows how to report.
 *
 * `diagnostic()` is the text attached to a failed case in the TAP report.
 */
export abstract class BatError extends Error {
  public abstract readonly kind: 'config' | 'timeout' | 'command' | 'parse';

  public diagnostic(): string {
    return this.message;
  }
}

/**
 * Missing environment, bad options or unknown case names. Fatal before any case runs.
 */
export class ConfigError extends BatError {
  public readonly kind = 'config' as const;

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class TimeoutError extends BatError {
  public readonly kind = 'timeout' as const;

  public constructor(
    public readonly args: readonly string[],
    public readonly timeoutMs: number,
    public readonly capturedOutput: string,
    options?: ErrorOptions
  ) {
    super(`Command timed out after ${String(timeoutMs)}ms: ${args.join(' ')}`, options);
    this.name = 'TimeoutError';
  }

  public override diagnostic(): string {
    return this.capturedOutput ? `${this.message}\n${this.capturedOutput}` : this.message;
  }
}

/**
 * Non-zero exit. `capturedOutput` is for the operator only and is never parsed.
 */
export class CommandError extends BatError {
  public readonly kind = 'command' as const;

  public constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly capturedOutput: string,
    options?: ErrorOptions
  ) {
    super(
      `Command failed (exit ${exitCode === null ? 'unknown' : String(exitCode)}): ${args.join(' ')}`,
      options
    );
    this.name = 'CommandError';
  }

  public override diagnostic(): string {
    return this.capturedOutput ? `${this.message}\n${this.capturedOutput}` : this.message;
  }
}

export class ParseError extends BatError {
  public readonly kind = 'parse' as const;

  public constructor(message: string, public readonly text: string) {
    super(message);
    this.name = 'ParseError';
  }

  public override diagnostic(): string {
    return this.text ? `${this.message}\n${this.text}` : this.message;
  }
}

export function isBatError(error: unknown): error is BatError {
  return error instanceof BatError;
}
