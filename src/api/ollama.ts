import { z } from 'zod';

import { extractCommand } from '../agent/commandExtractor';
import { ConnectivityError, ModelError } from '../errors';
import { Logger } from '../util/logger';

import { FetchLike, HttpClient, HttpError, NetworkError } from './client';

const STATUS_TIMEOUT_MS = 2_000;
const MODELS_TIMEOUT_MS = 5_000;
const DEFAULT_NUM_PREDICT = 100;
const DEFAULT_TEMPERATURE = 0.7;

const generateResponseSchema = z.object({
  response: z.string(),
  model: z.string().optional(),
  done: z.boolean().optional(),
});

const tagsResponseSchema = z.object({
  models: z
    .array(z.object({ name: z.string().optional() }).passthrough())
    .default([]),
});

export interface GenerateOptions {
  model: string;
  timeoutMs?: number;
  numPredict?: number;
  temperature?: number;
}

export interface Generation {
  command: string;
  raw: string;
  model: string;
}

export interface ModelStatus {
  ok: boolean;
  message: string;
}

export class OllamaClient {
  private http: HttpClient;

  constructor(
    endpoint: string,
    private logger: Logger,
    options?: { fetchImpl?: FetchLike; requestTimeoutMs?: number }
  ) {
    this.http = new HttpClient(endpoint, logger, {
      fetchImpl: options?.fetchImpl,
      requestTimeoutMs: options?.requestTimeoutMs,
      maxRetries: 1,
    });
  }

  setEndpoint(endpoint: string): void {
    this.http.setBaseUrl(endpoint);
  }

  getEndpoint(): string {
    return this.http.getBaseUrl();
  }

  async generate(prompt: string, options: GenerateOptions): Promise<Generation> {
    let body: unknown;
    try {
      body = await this.http.requestJson('/api/generate', {
        method: 'POST',
        body: JSON.stringify({
          model: options.model,
          prompt,
          stream: false,
          options: {
            num_predict: options.numPredict ?? DEFAULT_NUM_PREDICT,
            temperature: options.temperature ?? DEFAULT_TEMPERATURE,
          },
        }),
        timeoutMs: options.timeoutMs,
      });
    } catch (err) {
      throw this.toDomainError(err);
    }
    const parsed = generateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelError('Model response did not contain any text');
    }
    const command = extractCommand(parsed.data.response);
    if (!command) {
      throw new ModelError('Model returned no command');
    }
    this.logger.debug(`model ${options.model} suggested: ${command}`);
    return { command, raw: parsed.data.response, model: parsed.data.model ?? options.model };
  }

  async listModels(): Promise<string[]> {
    let body: unknown;
    try {
      body = await this.http.requestJson('/api/tags', { timeoutMs: MODELS_TIMEOUT_MS });
    } catch (err) {
      throw this.toDomainError(err);
    }
    const parsed = tagsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelError('Unexpected model list response');
    }
    return parsed.data.models
      .map((m) => m.name ?? '')
      .filter((name) => name.length > 0);
  }

  async checkStatus(model: string): Promise<ModelStatus> {
    let body: unknown;
    try {
      body = await this.http.requestJson('/api/tags', { timeoutMs: STATUS_TIMEOUT_MS, retry: 0 });
    } catch (err) {
      if (err instanceof HttpError) {
        return { ok: false, message: 'Ollama not responding' };
      }
      if (err instanceof NetworkError) {
        return { ok: false, message: 'Ollama offline' };
      }
      throw err;
    }
    const parsed = tagsResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, message: 'Ollama not responding' };
    }
    const names = parsed.data.models.map((m) => m.name);
    if (names.includes(model)) {
      return { ok: true, message: `Ollama ready (${model})` };
    }
    return { ok: false, message: `Model ${model} not found` };
  }

  private toDomainError(err: unknown): Error {
    if (err instanceof NetworkError) {
      if (err.timedOut) {
        return new ConnectivityError('Request timed out. Try a simpler prompt.', true);
      }
      return new ConnectivityError('Cannot connect to Ollama. Please run: ollama serve');
    }
    if (err instanceof HttpError) {
      return new ModelError(`Model server error (${err.status}): ${err.message}`, err.status);
    }
    return err instanceof Error ? err : new Error(String(err));
  }
}
