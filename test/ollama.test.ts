import { describe, expect, it } from 'vitest';

import { OllamaClient } from '../src/api/ollama';
import { ConnectivityError, ModelError } from '../src/errors';

import { jsonResponse, scriptedFetch } from './support/fetch';
import { memoryLogger } from './support/logger';

function client(...replies: Parameters<typeof scriptedFetch>) {
  const { fetchImpl, calls } = scriptedFetch(...replies);
  return { ollama: new OllamaClient('http://localhost:11434', memoryLogger().logger, { fetchImpl }), calls };
}

describe('OllamaClient.generate', () => {
  it('posts a non-streaming request and extracts the command', async () => {
    const { ollama, calls } = client(
      jsonResponse({ model: 'gemma3:4b', response: '```bash\nls -la\n```', done: true })
    );
    const generation = await ollama.generate('list files', { model: 'gemma3:4b', timeoutMs: 30_000 });
    expect(generation).toEqual({ command: 'ls -la', raw: '```bash\nls -la\n```', model: 'gemma3:4b' });
    expect(calls[0].url).toBe('http://localhost:11434/api/generate');
    expect(calls[0].init?.method).toBe('POST');
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      model: 'gemma3:4b',
      prompt: 'list files',
      stream: false,
      options: { num_predict: 100, temperature: 0.7 },
    });
  });

  it('fails when the model returns no command', async () => {
    const { ollama } = client(jsonResponse({ response: '   ' }));
    await expect(ollama.generate('x', { model: 'm' })).rejects.toThrow(new ModelError('Model returned no command'));
  });

  it('fails when the response has no text field', async () => {
    const { ollama } = client(jsonResponse({ done: true }));
    await expect(ollama.generate('x', { model: 'm' })).rejects.toThrow('Model response did not contain any text');
  });

  it('reports an unreachable server as a connectivity error', async () => {
    const { ollama, calls } = client(new TypeError('fetch failed'));
    const error = await ollama.generate('x', { model: 'm' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error).toMatchObject({ message: 'Cannot connect to Ollama. Please run: ollama serve', timedOut: false });
    expect(calls).toHaveLength(1);
  });

  it('reports server errors with their status', async () => {
    const { ollama } = client(jsonResponse({ error: "model 'm' not found" }, 404));
    const error = await ollama.generate('x', { model: 'm' }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ModelError);
    expect(error).toMatchObject({ message: "Model server error (404): model 'm' not found", status: 404 });
  });
});

describe('OllamaClient models and status', () => {
  it('lists installed model names', async () => {
    const { ollama, calls } = client(jsonResponse({ models: [{ name: 'gemma3:4b' }, { name: 'llama3.2' }, {}] }));
    await expect(ollama.listModels()).resolves.toEqual(['gemma3:4b', 'llama3.2']);
    expect(calls[0].url).toBe('http://localhost:11434/api/tags');
  });

  it('reports ready when the model is installed', async () => {
    const { ollama } = client(jsonResponse({ models: [{ name: 'gemma3:4b' }] }));
    await expect(ollama.checkStatus('gemma3:4b')).resolves.toEqual({ ok: true, message: 'Ollama ready (gemma3:4b)' });
  });

  it('reports a missing model', async () => {
    const { ollama } = client(jsonResponse({ models: [{ name: 'llama3.2' }] }));
    await expect(ollama.checkStatus('gemma3:4b')).resolves.toEqual({ ok: false, message: 'Model gemma3:4b not found' });
  });

  it('reports the server offline without retrying', async () => {
    const { ollama, calls } = client(new TypeError('fetch failed'));
    await expect(ollama.checkStatus('gemma3:4b')).resolves.toEqual({ ok: false, message: 'Ollama offline' });
    expect(calls).toHaveLength(1);
  });

  it('reports a failing server as not responding', async () => {
    const { ollama } = client(jsonResponse({ error: 'boom' }, 500));
    await expect(ollama.checkStatus('gemma3:4b')).resolves.toEqual({ ok: false, message: 'Ollama not responding' });
  });

  it('switches endpoints', async () => {
    const { ollama, calls } = client(jsonResponse({ models: [] }));
    ollama.setEndpoint('http://10.0.0.5:11434');
    await ollama.listModels();
    expect(ollama.getEndpoint()).toBe('http://10.0.0.5:11434');
    expect(calls[0].url).toBe('http://10.0.0.5:11434/api/tags');
  });
});
