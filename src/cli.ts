#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';

import { CommandHistory } from './agent/commandHistory';
import { CommandService } from './agent/commandService';
import { OllamaClient } from './api/ollama';
import { ConfigStore } from './config/config';
import { Settings } from './config/settings';
import { describeError } from './errors';
import { CommandExecutor, ExecaShellRunner } from './exec/executor';
import { startServer } from './server';
import { CommandPresenter } from './ui/presenter';
import { openBrowser } from './util/browser';
import { Logger, StreamChannel } from './util/logger';

export const DEFAULT_PORT = 7860;
export const DEFAULT_HOST = '127.0.0.1';

export interface LaunchOptions {
  dryRun: boolean;
  safeMode: boolean;
  port: number;
  host: string;
  browser: boolean;
  verbose: boolean;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function buildProgram(onLaunch: (options: LaunchOptions) => Promise<void>): Command {
  const program = new Command();
  program
    .name('shellwright')
    .version('0.1.0')
    .description('Turn plain-language requests into shell commands with a local Ollama model.')
    .option('--dry-run', 'show commands without executing them', false)
    .option('--safe-mode', 'only allow read-only commands', false)
    .option('-p, --port <port>', 'port for the web UI', parsePort, DEFAULT_PORT)
    .option('--host <host>', 'address to bind the web UI to', DEFAULT_HOST)
    .option('--no-browser', 'do not open a browser window')
    .option('-v, --verbose', 'log debug output', false)
    .action(async () => {
      const opts = program.opts<LaunchOptions>();
      await onLaunch({
        dryRun: !!opts.dryRun,
        safeMode: !!opts.safeMode,
        port: opts.port,
        host: opts.host,
        browser: opts.browser !== false,
        verbose: !!opts.verbose,
      });
    });
  return program;
}

export async function launch(options: LaunchOptions): Promise<void> {
  const logger = new Logger(new StreamChannel(), options.verbose ? 'debug' : 'info');
  const store = new ConfigStore();
  const loaded = await store.load();
  if (loaded.status === 'invalid') {
    logger.warn(`ignoring invalid config at ${store.getPath()}: ${loaded.detail ?? 'unknown problem'}`);
  } else if (loaded.status === 'loaded') {
    logger.info(`loaded config from ${store.getPath()}`);
  }

  const settings = new Settings(loaded.config);
  const config = settings.get();
  const ollama = new OllamaClient(config.endpoint, logger);
  const history = new CommandHistory(config.historyLimit);
  settings.onDidChange((next) => {
    ollama.setEndpoint(next.endpoint);
    history.setLimit(next.historyLimit);
    logger.debug(`config changed: ${next.endpoint} ${next.model} ${next.timeoutSeconds}s`);
  });

  const service = new CommandService(
    ollama,
    new CommandExecutor(new ExecaShellRunner(), logger),
    history,
    logger,
    () => settings.get(),
    { dryRun: options.dryRun, safeMode: options.safeMode }
  );
  const presenter = new CommandPresenter(service, ollama, settings, store, logger);

  logger.info(`working directory: ${process.cwd()}`);
  logger.info(`model: ${config.model} at ${config.endpoint}`);
  if (options.dryRun) {
    logger.info('dry-run mode: commands will not be executed');
  }
  if (options.safeMode) {
    logger.info('safe mode: only read-only commands are allowed');
  }

  const status = await presenter.handleMessage({ type: 'refreshStatus' });
  for (const message of status) {
    if (message.type === 'systemStatus' && !message.text.startsWith('Ollama ready')) {
      logger.warn(`model server: ${message.text.split('\n')[0]}`);
    }
  }

  const server = await startServer({ host: options.host, port: options.port, presenter, logger });

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) {
      return;
    }
    closing = true;
    logger.info(`received ${signal}, shutting down`);
    server.cleanup().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown failed', err);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  if (options.browser) {
    const failure = await openBrowser(server.url);
    if (failure) {
      logger.warn(`could not open a browser (${failure}); visit ${server.url}`);
    }
  }
}

if (require.main === module) {
  buildProgram(launch)
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      process.stderr.write(`${describeError(err)}\n`);
      process.exit(1);
    });
}
