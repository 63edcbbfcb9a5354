import { describe, expect, it } from 'vitest';

import { CommandHistory } from '../src/agent/commandHistory';
import { CommandService, RunModes } from '../src/agent/commandService';
import {
  DenyFilterRejection,
  ExecutionFailure,
  ExecutionTimeout,
  InputError,
  SafeModeRejection,
} from '../src/errors';
import { CommandExecutor } from '../src/exec/executor';

import { FakeGenerator, FakeRunner, TEST_CONFIG } from './support/fakes';
import { memoryLogger } from './support/logger';

function setup(reply = 'ls -la', modes: RunModes = { dryRun: false, safeMode: false }) {
  const { logger, channel } = memoryLogger();
  const generator = new FakeGenerator(reply);
  const runner = new FakeRunner();
  const history = new CommandHistory();
  const service = new CommandService(
    generator,
    new CommandExecutor(runner, logger),
    history,
    logger,
    () => TEST_CONFIG,
    modes,
    { platform: 'linux', shell: '/bin/bash', cwd: () => '/work' }
  );
  return { service, generator, runner, history, channel };
}

describe('CommandService.suggest', () => {
  it('asks the model and evaluates the suggestion', async () => {
    const { service, generator } = setup('ls -la');
    const suggestion = await service.suggest('list files');
    expect(suggestion).toEqual({
      prompt: 'list files',
      command: 'ls -la',
      verdict: { verdict: 'allow' },
      safeMode: null,
      risk: 'low',
    });
    expect(generator.prompts[0].options).toEqual({ model: 'gemma3:4b', timeoutMs: 30_000 });
    expect(generator.prompts[0].prompt).toContain('User request: list files\nOperating system: linux\nShell: /bin/bash');
  });

  it('flags a denied suggestion without throwing', async () => {
    const { service, channel } = setup('rm -rf /');
    const suggestion = await service.suggest('clean everything');
    expect(suggestion.verdict).toEqual({ verdict: 'deny', reason: 'system-wide deletion', patternId: 'rm-root' });
    expect(suggestion.risk).toBe('high');
    expect(channel.lines).toContain('[audit] model suggested a denied command (rm-root): rm -rf /');
  });

  it('includes the safe-mode verdict when safe mode is on', async () => {
    const { service, generator } = setup('rm notes.txt', { dryRun: false, safeMode: true });
    const suggestion = await service.suggest('delete notes');
    expect(suggestion.safeMode).toEqual({ allowed: false, reason: "'rm' is not in the read-only allow-list" });
    expect(generator.prompts[0].prompt).toContain('Only read-only commands are permitted');
  });

  it('rejects an empty prompt before calling the model', async () => {
    const { service, generator } = setup();
    await expect(service.suggest('  ')).rejects.toBeInstanceOf(InputError);
    expect(generator.prompts).toHaveLength(0);
  });
});

describe('CommandService.run', () => {
  it('previews instead of executing in dry-run mode', async () => {
    const { service, runner, history } = setup('ls -la', { dryRun: true, safeMode: false });
    const report = await service.run({ command: 'ls -la', prompt: 'list files' });
    expect(runner.calls).toHaveLength(0);
    expect(report.output).toBe('would execute: ls -la');
    expect(report.status).toBe('success');
    expect(report.note?.split('\n')[0]).toBe('Dry run: command NOT executed.');
    expect(history.list()[0]).toMatchObject({ command: 'ls -la', status: 'success', output: 'would execute: ls -la' });
  });

  it('executes and records successful commands', async () => {
    const { service, runner, history } = setup();
    const report = await service.run({ command: 'ls -la', prompt: 'list files' });
    expect(runner.calls[0].command).toBe('ls -la');
    expect(runner.calls[0].options.timeoutMs).toBe(30_000);
    expect(report.output).toBe('ok\n');
    expect(report.status).toBe('success');
    expect(history.list()[0].result?.exitCode).toBe(0);
    expect(history.list()[0].request.prompt).toBe('list files');
  });

  it('reports stderr from a successful command as a warning', async () => {
    const { service, runner } = setup();
    runner.result = { stdout: 'out', stderr: 'careful', exitCode: 0, timedOut: false };
    const report = await service.run({ command: 'ls' });
    expect(report.output).toBe('Warnings:\ncareful\n\nOutput:\nout');
    expect(report.status).toBe('warning');
  });

  it('describes a command without output', async () => {
    const { service, runner } = setup();
    runner.result = { stdout: '', stderr: '', exitCode: 0, timedOut: false };
    const report = await service.run({ command: 'true' });
    expect(report.output).toBe('Command executed successfully (no output)');
  });

  it('blocks denied commands and records the attempt', async () => {
    const { service, runner, history } = setup();
    const error = await service.run({ command: 'rm -rf /' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DenyFilterRejection);
    expect(error).toMatchObject({ message: 'Command blocked for safety: system-wide deletion', patternId: 'rm-root' });
    expect(runner.calls).toHaveLength(0);
    expect(history.list()[0]).toMatchObject({
      command: 'rm -rf /',
      status: 'warning',
      output: 'Command blocked for safety: system-wide deletion',
      request: { prompt: 'Manual execution' },
    });
  });

  it('checks the deny list before safe mode', async () => {
    const { service } = setup('ls', { dryRun: false, safeMode: true });
    await expect(service.run({ command: 'rm -rf /' })).rejects.toBeInstanceOf(DenyFilterRejection);
  });

  it('refuses non read-only commands in safe mode', async () => {
    const { service, runner, history } = setup();
    service.setSafeMode(true);
    await expect(service.run({ command: 'touch x' })).rejects.toThrow(
      new SafeModeRejection('touch x', "'touch' is not in the read-only allow-list")
    );
    expect(runner.calls).toHaveLength(0);
    expect(history.list()[0].output).toBe("Command blocked by safe mode: 'touch' is not in the read-only allow-list");
  });

  it('still blocks denied commands in dry-run mode', async () => {
    const { service, history } = setup('ls', { dryRun: true, safeMode: false });
    await expect(service.run({ command: 'mkfs.ext4 /dev/sdb1' })).rejects.toBeInstanceOf(DenyFilterRejection);
    expect(history.list()[0].status).toBe('warning');
  });

  it('raises a timeout after recording it', async () => {
    const { service, runner, history } = setup();
    runner.result = { stdout: '', stderr: '', exitCode: null, timedOut: true };
    await expect(service.run({ command: 'sleep 100' })).rejects.toThrow(
      new ExecutionTimeout('sleep 100', 30_000)
    );
    expect(history.list()[0]).toMatchObject({ status: 'error', output: 'Command timed out after 30 seconds' });
  });

  it('raises a failure with the command output', async () => {
    const { service, runner, history } = setup();
    runner.result = { stdout: '', stderr: 'boom', exitCode: 1, timedOut: false };
    const error = await service.run({ command: 'cat missing' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ExecutionFailure);
    expect(error).toMatchObject({ message: 'Command exited with code 1', output: 'Error:\nboom\n\nOutput:\n' });
    expect(history.list()[0].status).toBe('error');
  });

  it('records edits to the suggestion', async () => {
    const { service, history } = setup();
    await service.run({ command: 'pwd', prompt: 'where am I', suggested: 'ls' });
    const entry = history.list()[0];
    expect(entry.request.generatedCommand).toBe('ls');
    expect(entry.command).toBe('pwd');
    expect(entry.edit).toBe('[-ls-]{+pwd+}');
  });

  it('rejects an empty command', async () => {
    const { service, history } = setup();
    await expect(service.run({ command: '   ' })).rejects.toThrow(new InputError('No command to execute'));
    expect(history.size()).toBe(0);
  });
});

describe('CommandService modes and history', () => {
  it('toggles modes and clears history', async () => {
    const { service } = setup();
    service.setDryRun(true);
    expect(service.getModes()).toEqual({ dryRun: true, safeMode: false });
    await service.run({ command: 'ls' });
    expect(service.getHistory()).toHaveLength(1);
    service.clearHistory();
    expect(service.getHistory()).toHaveLength(0);
  });

  it('suggests and runs in one step', async () => {
    const { service, runner } = setup('df -h');
    const { suggestion, report } = await service.suggestAndRun('disk space');
    expect(suggestion.command).toBe('df -h');
    expect(runner.calls[0].command).toBe('df -h');
    expect(report.entry.edit).toBeUndefined();
  });
});
