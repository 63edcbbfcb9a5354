import { z } from 'zod';

import { HistoryEntry } from '../agent/commandHistory';
import { CommandService, RunModes } from '../agent/commandService';
import { ModelStatus } from '../api/ollama';
import { AppConfig, ConfigFileInfo, ConfigLoadResult } from '../config/config';
import { Settings } from '../config/settings';
import {
  AppError,
  describeError,
  ExecutionFailure,
  ExecutionTimeout,
} from '../errors';
import { Logger } from '../util/logger';

const inboundSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('generate'), prompt: z.string() }),
  z.object({ type: z.literal('generateAndExecute'), prompt: z.string() }),
  z.object({
    type: z.literal('execute'),
    command: z.string(),
    prompt: z.string().optional(),
    suggested: z.string().optional(),
  }),
  z.object({ type: z.literal('clear') }),
  z.object({ type: z.literal('refreshStatus') }),
  z.object({ type: z.literal('setDryRun'), enabled: z.boolean() }),
  z.object({ type: z.literal('setSafeMode'), enabled: z.boolean() }),
  z.object({ type: z.literal('refreshModels') }),
  z.object({
    type: z.literal('updateConfig'),
    config: z.object({
      endpoint: z.string().optional(),
      model: z.string().optional(),
      timeoutSeconds: z.number().optional(),
    }),
  }),
  z.object({ type: z.literal('saveConfig') }),
  z.object({ type: z.literal('resetConfig') }),
  z.object({ type: z.literal('clearHistory') }),
]);

export type InboundMessage = z.infer<typeof inboundSchema>;

export type StatusLevel = 'info' | 'success' | 'warning' | 'error';

export interface HistoryView {
  id: number;
  time: string;
  prompt: string;
  command: string;
  status: HistoryEntry['status'];
  output: string;
  exitCode: number | null;
  durationMs: number | null;
  edit: string | null;
}

export type OutboundMessage =
  | { type: 'status'; level: StatusLevel; message: string }
  | { type: 'command'; command: string; risk: 'high' | 'low'; warning: string | null }
  | { type: 'output'; output: string; note: string | null }
  | { type: 'history'; entries: HistoryView[] }
  | { type: 'modes'; dryRun: boolean; safeMode: boolean }
  | { type: 'systemStatus'; text: string }
  | { type: 'models'; models: string[]; selected: string }
  | { type: 'config'; config: AppConfig }
  | { type: 'reset' };

export interface ModelDirectory {
  listModels(): Promise<string[]>;
  checkStatus(model: string): Promise<ModelStatus>;
}

export interface ConfigPersistence {
  save(config: AppConfig): Promise<string>;
  reset(): Promise<AppConfig>;
  load(): Promise<ConfigLoadResult>;
  info(): Promise<ConfigFileInfo>;
}

export interface UiState {
  modes: RunModes;
  config: AppConfig;
  history: HistoryView[];
  systemStatus: string;
  platform: string;
}

export function toHistoryView(entry: HistoryEntry): HistoryView {
  return {
    id: entry.id,
    time: entry.time,
    prompt: entry.request.prompt,
    command: entry.command,
    status: entry.status,
    output: entry.output,
    exitCode: entry.result ? entry.result.exitCode : null,
    durationMs: entry.result ? entry.result.durationMs : null,
    edit: entry.edit ?? null,
  };
}

/**
 * Routes page messages to the pipeline. Every failure ends here and becomes a
 * status message; nothing thrown below escapes to the server.
 */
export class CommandPresenter {
  private systemStatus = 'Checking model server...';

  constructor(
    private service: CommandService,
    private models: ModelDirectory,
    private settings: Settings,
    private configStore: ConfigPersistence,
    private logger: Logger,
    private platform: string = process.platform
  ) {}

  snapshot(): UiState {
    return {
      modes: this.service.getModes(),
      config: this.settings.get(),
      history: this.historyView(),
      systemStatus: this.systemStatus,
      platform: this.platform,
    };
  }

  async handleMessage(raw: unknown): Promise<OutboundMessage[]> {
    const parsed = inboundSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.debug(`rejected message: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
      return [status('error', 'Invalid request')];
    }
    const message = parsed.data;
    try {
      return await this.dispatch(message);
    } catch (err) {
      return this.renderError(message, err);
    }
  }

  private async dispatch(message: InboundMessage): Promise<OutboundMessage[]> {
    switch (message.type) {
      case 'generate':
        return this.generate(message.prompt);
      case 'generateAndExecute':
        return this.generateAndExecute(message.prompt);
      case 'execute':
        return this.execute(message.command, message.prompt, message.suggested);
      case 'clear':
        return [{ type: 'reset' }, status('info', 'Ready for new command')];
      case 'refreshStatus':
        return [await this.refreshStatus()];
      case 'setDryRun':
        this.service.setDryRun(message.enabled);
        return [this.modesMessage(), await this.refreshStatus()];
      case 'setSafeMode':
        this.service.setSafeMode(message.enabled);
        return [this.modesMessage(), await this.refreshStatus()];
      case 'refreshModels':
        return this.refreshModels();
      case 'updateConfig':
        return this.updateConfig(message.config);
      case 'saveConfig': {
        const savedPath = await this.configStore.save(this.settings.get());
        return [status('success', `Configuration saved to ${savedPath}`)];
      }
      case 'resetConfig': {
        const defaults = await this.configStore.reset();
        const config = this.settings.replace(defaults);
        return [
          { type: 'config', config },
          await this.refreshStatus(),
          status('success', 'Configuration reset to defaults'),
        ];
      }
      case 'clearHistory':
        this.service.clearHistory();
        return [this.historyMessage(), status('info', 'History cleared')];
    }
  }

  private async generate(prompt: string): Promise<OutboundMessage[]> {
    const suggestion = await this.service.suggest(prompt);
    const warning =
      suggestion.verdict.verdict === 'deny'
        ? `This command will be blocked: ${suggestion.verdict.reason}`
        : suggestion.safeMode && !suggestion.safeMode.allowed
          ? `Safe mode will refuse this command: ${suggestion.safeMode.reason}`
          : null;
    return [
      { type: 'command', command: suggestion.command, risk: suggestion.risk, warning },
      status(warning ? 'warning' : 'success', warning ?? 'Command generated'),
    ];
  }

  private async generateAndExecute(prompt: string): Promise<OutboundMessage[]> {
    const suggestion = await this.service.suggest(prompt);
    const commandMessage: OutboundMessage = {
      type: 'command',
      command: suggestion.command,
      risk: suggestion.risk,
      warning: null,
    };
    try {
      const report = await this.service.run({
        command: suggestion.command,
        prompt: suggestion.prompt,
        suggested: suggestion.command,
      });
      return [
        commandMessage,
        { type: 'output', output: report.output, note: report.note ?? null },
        this.historyMessage(),
        status(report.status === 'warning' ? 'warning' : 'success', this.executedMessage()),
      ];
    } catch (err) {
      return [commandMessage, ...this.renderError({ type: 'generateAndExecute', prompt }, err)];
    }
  }

  private async execute(command: string, prompt?: string, suggested?: string): Promise<OutboundMessage[]> {
    const report = await this.service.run({ command, prompt, suggested });
    return [
      { type: 'output', output: report.output, note: report.note ?? null },
      this.historyMessage(),
      status(report.status === 'warning' ? 'warning' : 'success', this.executedMessage()),
    ];
  }

  private async refreshStatus(): Promise<OutboundMessage> {
    const config = this.settings.get();
    let modelStatus: ModelStatus;
    try {
      modelStatus = await this.models.checkStatus(config.model);
    } catch (err) {
      this.logger.error('status check failed', err);
      modelStatus = { ok: false, message: 'Ollama status unknown' };
    }
    const modes = this.service.getModes();
    const active: string[] = [];
    if (modes.dryRun) {
      active.push('DRY RUN MODE ACTIVE');
    }
    if (modes.safeMode) {
      active.push('SAFE MODE ACTIVE');
    }
    if (!active.length) {
      active.push('Live execution mode');
    }
    this.systemStatus = `${modelStatus.message}\nReady (${this.platform})\n${active.join(' | ')}`;
    return { type: 'systemStatus', text: this.systemStatus };
  }

  private async refreshModels(): Promise<OutboundMessage[]> {
    const models = await this.models.listModels();
    const selected = this.settings.get().model;
    if (!models.length) {
      return [
        { type: 'models', models, selected },
        status('warning', 'No models found. Pull one with: ollama pull <model>'),
      ];
    }
    return [
      { type: 'models', models, selected },
      status('success', `Found ${models.length} model${models.length === 1 ? '' : 's'}`),
    ];
  }

  private async updateConfig(patch: Partial<Pick<AppConfig, 'endpoint' | 'model' | 'timeoutSeconds'>>): Promise<OutboundMessage[]> {
    const config = this.settings.update(patch);
    const messages: OutboundMessage[] = [{ type: 'config', config }];
    if (patch.endpoint !== undefined || patch.model !== undefined) {
      messages.push(await this.refreshStatus());
    }
    messages.push(status('success', 'Configuration updated (not saved yet)'));
    return messages;
  }

  private renderError(message: InboundMessage, err: unknown): OutboundMessage[] {
    const text = describeError(err);
    if (err instanceof AppError) {
      this.logger.info(`${message.type} failed (${err.kind}): ${err.message}`);
    } else {
      this.logger.error(`${message.type} failed`, err);
    }
    const messages: OutboundMessage[] = [];
    if (err instanceof ExecutionFailure || err instanceof ExecutionTimeout) {
      messages.push({ type: 'output', output: err.output || err.message, note: null });
    }
    if (message.type === 'execute' || message.type === 'generateAndExecute') {
      messages.push(this.historyMessage());
    }
    const level: StatusLevel =
      err instanceof AppError && (err.kind === 'denied' || err.kind === 'safe-mode' || err.kind === 'input')
        ? 'warning'
        : 'error';
    messages.push(status(level, text));
    return messages;
  }

  private executedMessage(): string {
    return this.service.getModes().dryRun ? 'Dry run complete (command not executed)' : 'Command executed';
  }

  private modesMessage(): OutboundMessage {
    const modes = this.service.getModes();
    return { type: 'modes', dryRun: modes.dryRun, safeMode: modes.safeMode };
  }

  private historyMessage(): OutboundMessage {
    return { type: 'history', entries: this.historyView() };
  }

  private historyView(): HistoryView[] {
    return this.service.getHistory().map(toHistoryView);
  }
}

function status(level: StatusLevel, message: string): OutboundMessage {
  return { type: 'status', level, message };
}
