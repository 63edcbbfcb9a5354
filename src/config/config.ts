import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

import { ConfigError } from '../errors';

export const CONFIG_FILE_NAME = '.shellwright.json';
export const MIN_TIMEOUT_SECONDS = 5;
export const MAX_TIMEOUT_SECONDS = 300;

const DEFAULT_ENDPOINT = 'http://localhost:11434';
const DEFAULT_MODEL = 'gemma3:4b';
const DEFAULT_TIMEOUT_SECONDS = 30;
const DEFAULT_HISTORY_LIMIT = 10;

export const configSchema = z.object({
  endpoint: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'Endpoint must be an http(s) URL')
    .transform(normalizeEndpoint),
  model: z.string().trim().min(1, 'Model name is required'),
  timeoutSeconds: z.number().int().min(MIN_TIMEOUT_SECONDS).max(MAX_TIMEOUT_SECONDS),
  historyLimit: z.number().int().min(1).max(100),
});

export type AppConfig = z.infer<typeof configSchema>;

// Stored files may omit keys; missing ones fall back to the defaults.
const storedConfigSchema = configSchema.partial();

export type ConfigLoadStatus = 'loaded' | 'default' | 'invalid';

export interface ConfigLoadResult {
  config: AppConfig;
  status: ConfigLoadStatus;
  detail?: string;
}

export interface ConfigFileInfo {
  path: string;
  exists: boolean;
  size: number;
  modified: string | null;
}

/** Strips a trailing slash and a legacy `/api/generate` suffix. */
export function normalizeEndpoint(url: string): string {
  return url.replace(/\/+$/, '').replace(/\/api\/generate$/, '');
}

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaults: AppConfig = {
    endpoint: DEFAULT_ENDPOINT,
    model: DEFAULT_MODEL,
    timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
    historyLimit: DEFAULT_HISTORY_LIMIT,
  };
  const fromEnv: Partial<Record<keyof AppConfig, unknown>> = {};
  if (env.OLLAMA_URL) {
    fromEnv.endpoint = env.OLLAMA_URL;
  }
  if (env.OLLAMA_MODEL) {
    fromEnv.model = env.OLLAMA_MODEL;
  }
  if (env.COMMAND_TIMEOUT) {
    fromEnv.timeoutSeconds = Number(env.COMMAND_TIMEOUT);
  }
  const parsed = storedConfigSchema.safeParse(fromEnv);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment configuration: ${formatIssues(parsed.error)}`);
  }
  return { ...defaults, ...parsed.data };
}

export function validateConfig(candidate: unknown): AppConfig {
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function defaultConfigPath(): string {
  return path.join(os.homedir(), CONFIG_FILE_NAME);
}

export class ConfigStore {
  constructor(
    private filePath: string = defaultConfigPath(),
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  getPath(): string {
    return this.filePath;
  }

  defaults(): AppConfig {
    return defaultConfig(this.env);
  }

  async load(): Promise<ConfigLoadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return { config: this.defaults(), status: 'default' };
      }
      throw err;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return { config: this.defaults(), status: 'invalid', detail: 'File is not valid JSON' };
    }
    const parsed = storedConfigSchema.safeParse(json);
    if (!parsed.success) {
      return {
        config: this.defaults(),
        status: 'invalid',
        detail: formatIssues(parsed.error),
      };
    }
    return {
      config: { ...this.defaults(), ...parsed.data },
      status: 'loaded',
    };
  }

  async save(config: AppConfig): Promise<string> {
    const valid = validateConfig(config);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp-${Date.now()}-${Math.random().toString(16).slice(2)}`;
    await fs.writeFile(tempPath, JSON.stringify(valid, null, 2), 'utf-8');
    await fs.rename(tempPath, this.filePath);
    return this.filePath;
  }

  async reset(): Promise<AppConfig> {
    await fs.rm(this.filePath, { force: true });
    return this.defaults();
  }

  async info(): Promise<ConfigFileInfo> {
    try {
      const stat = await fs.stat(this.filePath);
      return {
        path: this.filePath,
        exists: true,
        size: stat.size,
        modified: stat.mtime.toISOString(),
      };
    } catch (err) {
      if (isNotFound(err)) {
        return { path: this.filePath, exists: false, size: 0, modified: null };
      }
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
