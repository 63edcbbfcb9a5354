export type ErrorKind =
  | 'connectivity'
  | 'model'
  | 'denied'
  | 'safe-mode'
  | 'timeout'
  | 'execution'
  | 'config'
  | 'input';

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The model server could not be reached, or did not answer in time. */
export class ConnectivityError extends AppError {
  readonly kind = 'connectivity';

  constructor(
    message: string,
    public readonly timedOut = false
  ) {
    super(message);
  }
}

export class ModelError extends AppError {
  readonly kind = 'model';

  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
  }
}

export class DenyFilterRejection extends AppError {
  readonly kind = 'denied';

  constructor(
    public readonly command: string,
    public readonly reason: string,
    public readonly patternId: string
  ) {
    super(`Command blocked for safety: ${reason}`);
  }
}

export class SafeModeRejection extends AppError {
  readonly kind = 'safe-mode';

  constructor(
    public readonly command: string,
    public readonly reason: string
  ) {
    super(`Command blocked by safe mode: ${reason}`);
  }
}

export class ExecutionTimeout extends AppError {
  readonly kind = 'timeout';

  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
    public readonly output = ''
  ) {
    super(`Command timed out after ${Math.round(timeoutMs / 1000)} seconds`);
  }
}

export class ExecutionFailure extends AppError {
  readonly kind = 'execution';

  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly output = ''
  ) {
    super(
      exitCode === null
        ? 'Command could not be started'
        : `Command exited with code ${exitCode}`
    );
  }
}

export class ConfigError extends AppError {
  readonly kind = 'config';
}

/** Missing or malformed user input, e.g. an empty prompt. */
export class InputError extends AppError {
  readonly kind = 'input';
}

export function describeError(err: unknown): string {
  if (err instanceof AppError) {
    return err.message;
  }
  if (err instanceof Error) {
    return `Unexpected error: ${err.message}`;
  }
  return `Unexpected error: ${String(err)}`;
}
