export interface BackoffOptions {
  baseMs?: number;
  capMs?: number;
  rand?: () => number;
}

export function computeBackoff(attempt: number, options: BackoffOptions = {}): number {
  const baseMs = options.baseMs ?? 250;
  const capMs = options.capMs ?? 4000;
  const rand = options.rand ?? Math.random;
  const exp = Math.min(capMs, baseMs * 2 ** attempt);
  const jitter = 0.5 + rand() * 0.5;
  return Math.floor(exp * jitter);
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
