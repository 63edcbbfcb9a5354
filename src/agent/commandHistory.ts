import { diffWords } from 'diff';

import { formatClock } from '../util/time';

const MAX_OUTPUT_LENGTH = 500;
const DEFAULT_LIMIT = 10;

export type EntryStatus = 'success' | 'error' | 'warning';

export interface CommandRequest {
  readonly prompt: string;
  readonly generatedCommand: string;
  readonly timestamp: string;
}

export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly durationMs: number;
}

export interface HistoryEntry {
  readonly id: number;
  readonly request: CommandRequest;
  readonly command: string;
  readonly status: EntryStatus;
  readonly output: string;
  readonly time: string;
  readonly result?: ExecutionResult;
  readonly edit?: string;
}

export interface HistoryRecord {
  prompt: string;
  generatedCommand: string;
  command?: string;
  status: EntryStatus;
  output: string;
  result?: ExecutionResult;
  at?: Date;
}

export function createCommandRequest(
  prompt: string,
  generatedCommand: string,
  at: Date = new Date()
): CommandRequest {
  return Object.freeze({ prompt, generatedCommand, timestamp: at.toISOString() });
}

/**
 * Word-level description of how the executed command differs from the
 * suggestion, e.g. `ls [-la-]{+-lh+}`. Empty when they are identical.
 */
export function describeEdit(suggested: string, executed: string): string {
  if (suggested.trim() === executed.trim()) {
    return '';
  }
  return diffWords(suggested.trim(), executed.trim())
    .map((part) => {
      if (part.added) {
        return `{+${part.value}+}`;
      }
      if (part.removed) {
        return `[-${part.value}-]`;
      }
      return part.value;
    })
    .join('');
}

export class CommandHistory {
  private entries: HistoryEntry[] = [];
  private nextId = 1;

  constructor(private limit = DEFAULT_LIMIT) {
    this.limit = Math.max(1, Math.floor(limit));
  }

  add(record: HistoryRecord): HistoryEntry {
    const at = record.at ?? new Date();
    const command = record.command ?? record.generatedCommand;
    const edit =
      record.generatedCommand && command !== record.generatedCommand
        ? describeEdit(record.generatedCommand, command)
        : '';
    const entry: HistoryEntry = Object.freeze({
      id: this.nextId++,
      request: createCommandRequest(record.prompt, record.generatedCommand, at),
      command,
      status: record.status,
      output: truncateOutput(record.output),
      time: formatClock(at),
      result: record.result ? Object.freeze({ ...record.result }) : undefined,
      edit: edit || undefined,
    });
    this.entries.unshift(entry);
    if (this.entries.length > this.limit) {
      this.entries = this.entries.slice(0, this.limit);
    }
    return entry;
  }

  setLimit(limit: number): void {
    this.limit = Math.max(1, Math.floor(limit));
    if (this.entries.length > this.limit) {
      this.entries = this.entries.slice(0, this.limit);
    }
  }

  getLimit(): number {
    return this.limit;
  }

  clear(): void {
    this.entries = [];
  }

  /** Newest first. */
  list(): HistoryEntry[] {
    return [...this.entries];
  }

  size(): number {
    return this.entries.length;
  }
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }
  return `${output.slice(0, MAX_OUTPUT_LENGTH)}...`;
}
