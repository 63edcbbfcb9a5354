export type LogLevel = 'info' | 'debug';

export interface LogChannel {
  appendLine(line: string): void;
}

export class StreamChannel implements LogChannel {
  constructor(private stream: NodeJS.WritableStream = process.stderr) {}

  appendLine(line: string): void {
    this.stream.write(`${line}\n`);
  }
}

export class Logger {
  private level: LogLevel;

  constructor(
    private channel: LogChannel,
    level: LogLevel = 'info'
  ) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  info(message: string): void {
    this.channel.appendLine(`[info] ${message}`);
  }

  warn(message: string): void {
    this.channel.appendLine(`[warn] ${message}`);
  }

  debug(message: string): void {
    if (this.level === 'debug') {
      this.channel.appendLine(`[debug] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    const suffix = error instanceof Error ? ` ${error.message}` : error ? ` ${String(error)}` : '';
    this.channel.appendLine(`[error] ${message}${suffix}`);
  }

  /** Execution and denial records. Written at every level. */
  audit(message: string): void {
    this.channel.appendLine(`[audit] ${message}`);
  }
}
