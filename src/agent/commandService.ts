import { GenerateOptions, Generation } from '../api/ollama';
import { AppConfig } from '../config/config';
import {
  DenyFilterRejection,
  ExecutionFailure,
  ExecutionTimeout,
  InputError,
  SafeModeRejection,
} from '../errors';
import { ExecuteOptions, ExecutionOutcome } from '../exec/executor';
import { ApprovedCommand, approveCommand, estimateRisk, evaluateCommand, FilterVerdict } from '../security/denyList';
import { checkSafeMode, SafeModeVerdict } from '../security/safeMode';
import { Logger } from '../util/logger';

import { CommandHistory, EntryStatus, HistoryEntry } from './commandHistory';
import { buildPrompt } from './promptBuilder';

export interface CommandGenerator {
  generate(prompt: string, options: GenerateOptions): Promise<Generation>;
}

export interface Executor {
  execute(approved: ApprovedCommand, options: ExecuteOptions): Promise<ExecutionOutcome>;
}

export interface RunModes {
  dryRun: boolean;
  safeMode: boolean;
}

export interface Suggestion {
  prompt: string;
  command: string;
  verdict: FilterVerdict;
  safeMode: SafeModeVerdict | null;
  risk: 'high' | 'low';
}

export interface RunRequest {
  command: string;
  prompt?: string;
  suggested?: string;
}

export interface RunReport {
  outcome: ExecutionOutcome;
  output: string;
  note?: string;
  status: EntryStatus;
  entry: HistoryEntry;
}

const MANUAL_PROMPT = 'Manual execution';

/**
 * Sequential pipeline for one UI action: prompt → model → filter → executor → history.
 * Failures are thrown as typed errors after the attempt is recorded.
 */
export class CommandService {
  constructor(
    private generator: CommandGenerator,
    private executor: Executor,
    private history: CommandHistory,
    private logger: Logger,
    private configProvider: () => AppConfig,
    private modes: RunModes = { dryRun: false, safeMode: false },
    private environment: { platform: string; shell?: string; cwd: () => string } = {
      platform: process.platform,
      shell: process.env.SHELL,
      cwd: () => process.cwd(),
    }
  ) {}

  getModes(): RunModes {
    return { ...this.modes };
  }

  setDryRun(enabled: boolean): void {
    this.modes.dryRun = enabled;
    this.logger.info(`dry-run mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  setSafeMode(enabled: boolean): void {
    this.modes.safeMode = enabled;
    this.logger.info(`safe mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  getHistory(): HistoryEntry[] {
    return this.history.list();
  }

  clearHistory(): void {
    this.history.clear();
  }

  async suggest(prompt: string): Promise<Suggestion> {
    const config = this.configProvider();
    const built = buildPrompt({
      userMessage: prompt,
      platform: this.environment.platform,
      shell: this.environment.shell,
      cwd: this.environment.cwd(),
      safeMode: this.modes.safeMode,
    });
    const generation = await this.generator.generate(built.prompt, {
      model: config.model,
      timeoutMs: config.timeoutSeconds * 1000,
    });
    const verdict = evaluateCommand(generation.command);
    if (verdict.verdict === 'deny') {
      this.logger.audit(`model suggested a denied command (${verdict.patternId}): ${generation.command}`);
    }
    return {
      prompt: built.summary.request,
      command: generation.command,
      verdict,
      safeMode: this.modes.safeMode ? checkSafeMode(generation.command) : null,
      risk: estimateRisk(generation.command),
    };
  }

  async run(request: RunRequest): Promise<RunReport> {
    const command = request.command.trim();
    if (!command) {
      throw new InputError('No command to execute');
    }
    const prompt = request.prompt?.trim() || MANUAL_PROMPT;
    const generatedCommand = request.suggested?.trim() || command;

    const approval = approveCommand(command);
    if (approval.approved === null) {
      this.logger.audit(`denied (${approval.patternId}): ${command}`);
      this.record(prompt, generatedCommand, command, 'warning', `Command blocked for safety: ${approval.reason}`);
      throw new DenyFilterRejection(command, approval.reason, approval.patternId);
    }
    if (this.modes.safeMode) {
      const safe = checkSafeMode(command);
      if (!safe.allowed) {
        this.logger.audit(`safe mode refused: ${command}`);
        this.record(prompt, generatedCommand, command, 'warning', `Command blocked by safe mode: ${safe.reason}`);
        throw new SafeModeRejection(command, safe.reason);
      }
    }

    const config = this.configProvider();
    const outcome = await this.executor.execute(approval.approved, {
      dryRun: this.modes.dryRun,
      timeoutMs: config.timeoutSeconds * 1000,
    });

    switch (outcome.kind) {
      case 'dry-run': {
        const output = outcome.preview;
        const entry = this.record(prompt, generatedCommand, command, 'success', output);
        return { outcome, output, note: describeDryRun(outcome), status: 'success', entry };
      }
      case 'succeeded': {
        const { stdout, stderr } = outcome.result;
        const status: EntryStatus = stderr.trim() ? 'warning' : 'success';
        const output = stderr.trim()
          ? `Warnings:\n${stderr}\n\nOutput:\n${stdout}`
          : stdout || 'Command executed successfully (no output)';
        const entry = this.record(prompt, generatedCommand, command, status, output, outcome);
        return { outcome, output, status, entry };
      }
      case 'timed-out': {
        const output = joinOutput(outcome.result.stdout, outcome.result.stderr);
        this.record(
          prompt,
          generatedCommand,
          command,
          'error',
          `Command timed out after ${Math.round(outcome.timeoutMs / 1000)} seconds`,
          outcome
        );
        throw new ExecutionTimeout(command, outcome.timeoutMs, output);
      }
      case 'failed': {
        const { stdout, stderr, exitCode } = outcome.result;
        const output = outcome.spawnError
          ? `Execution failed: ${outcome.spawnError}`
          : `Error:\n${stderr}\n\nOutput:\n${stdout}`;
        this.record(prompt, generatedCommand, command, 'error', output, outcome);
        throw new ExecutionFailure(command, exitCode, stderr, output);
      }
    }
  }

  async suggestAndRun(prompt: string): Promise<{ suggestion: Suggestion; report: RunReport }> {
    const suggestion = await this.suggest(prompt);
    const report = await this.run({
      command: suggestion.command,
      prompt: suggestion.prompt,
      suggested: suggestion.command,
    });
    return { suggestion, report };
  }

  private record(
    prompt: string,
    generatedCommand: string,
    command: string,
    status: EntryStatus,
    output: string,
    outcome?: ExecutionOutcome
  ): HistoryEntry {
    const result = outcome && outcome.kind !== 'dry-run' ? outcome.result : undefined;
    return this.history.add({ prompt, generatedCommand, command, status, output, result });
  }
}

function describeDryRun(outcome: Extract<ExecutionOutcome, { kind: 'dry-run' }>): string {
  return [
    'Dry run: command NOT executed.',
    `Working directory: ${outcome.details.cwd}`,
    `User: ${outcome.details.user}`,
    `Shell: ${outcome.details.shell}`,
    `Estimated risk: ${outcome.details.risk.toUpperCase()}`,
  ].join('\n');
}

function joinOutput(stdout: string, stderr: string): string {
  return [stdout, stderr].filter((part) => part.trim()).join('\n');
}
