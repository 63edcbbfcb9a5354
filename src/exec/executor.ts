import execa from 'execa';
import * as os from 'os';

import { ExecutionResult } from '../agent/commandHistory';
import { ApprovedCommand, estimateRisk } from '../security/denyList';
import { Logger } from '../util/logger';
import { formatDuration } from '../util/time';

const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_BUFFER_BYTES = 4 * 1024 * 1024;

export interface ShellRunOptions {
  cwd: string;
  timeoutMs: number;
}

export interface ShellRunResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  spawnError?: string;
}

/** Runs a command line through the system shell. */
export interface ShellRunner {
  run(command: string, options: ShellRunOptions): Promise<ShellRunResult>;
}

export class ExecaShellRunner implements ShellRunner {
  async run(command: string, options: ShellRunOptions): Promise<ShellRunResult> {
    const result = await execa(command, {
      shell: true,
      cwd: options.cwd,
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
      reject: false,
      stripFinalNewline: false,
      maxBuffer: MAX_BUFFER_BYTES,
      all: false,
    });
    const spawned = typeof result.exitCode === 'number' || result.timedOut || !!result.signal;
    const shortMessage =
      'shortMessage' in result && typeof result.shortMessage === 'string'
        ? result.shortMessage
        : 'Command could not be started';
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
      timedOut: result.timedOut,
      spawnError: spawned ? undefined : shortMessage,
    };
  }
}

export interface ExecuteOptions {
  dryRun: boolean;
  timeoutMs?: number;
  cwd?: string;
}

export interface DryRunDetails {
  cwd: string;
  shell: string;
  user: string;
  risk: 'high' | 'low';
}

export type ExecutionOutcome =
  | { kind: 'dry-run'; command: string; preview: string; details: DryRunDetails }
  | { kind: 'succeeded'; command: string; result: ExecutionResult }
  | { kind: 'failed'; command: string; result: ExecutionResult; spawnError?: string }
  | { kind: 'timed-out'; command: string; result: ExecutionResult; timeoutMs: number };

export class CommandExecutor {
  constructor(
    private runner: ShellRunner,
    private logger: Logger
  ) {}

  async execute(approved: ApprovedCommand, options: ExecuteOptions): Promise<ExecutionOutcome> {
    const command = approved.command;
    const cwd = options.cwd ?? process.cwd();
    if (options.dryRun) {
      this.logger.audit(`dry-run: ${command}`);
      return {
        kind: 'dry-run',
        command,
        preview: `would execute: ${command}`,
        details: {
          cwd,
          shell: process.env.SHELL ?? (process.platform === 'win32' ? 'cmd.exe' : '/bin/sh'),
          user: currentUser(),
          risk: estimateRisk(command),
        },
      };
    }

    const timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_MS;
    this.logger.audit(`exec: ${command} (cwd ${cwd}, timeout ${formatDuration(timeoutMs)})`);
    const started = Date.now();
    const run = await this.runner.run(command, { cwd, timeoutMs });
    const result: ExecutionResult = {
      stdout: run.stdout,
      stderr: run.stderr,
      exitCode: run.exitCode,
      durationMs: Date.now() - started,
    };

    if (run.timedOut) {
      this.logger.audit(`timeout: ${command} after ${formatDuration(result.durationMs)}`);
      return { kind: 'timed-out', command, result, timeoutMs };
    }
    if (run.exitCode === 0) {
      this.logger.audit(`exit 0: ${command} in ${formatDuration(result.durationMs)}`);
      return { kind: 'succeeded', command, result };
    }
    this.logger.audit(
      `exit ${run.exitCode ?? 'n/a'}: ${command} in ${formatDuration(result.durationMs)}`
    );
    return { kind: 'failed', command, result, spawnError: run.spawnError };
  }
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return 'current user';
  }
}
