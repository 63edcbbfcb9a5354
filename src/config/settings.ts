import { EventEmitter } from 'events';

import { AppConfig, validateConfig } from './config';

/** In-memory current configuration; persisted only on an explicit save. */
export class Settings {
  private current: AppConfig;
  private changeEmitter = new EventEmitter();

  constructor(initial: AppConfig) {
    this.current = validateConfig(initial);
  }

  get(): AppConfig {
    return { ...this.current };
  }

  update(patch: Partial<AppConfig>): AppConfig {
    const next = validateConfig({ ...this.current, ...patch });
    this.current = next;
    this.changeEmitter.emit('change', this.get());
    return this.get();
  }

  replace(config: AppConfig): AppConfig {
    this.current = validateConfig(config);
    this.changeEmitter.emit('change', this.get());
    return this.get();
  }

  onDidChange(listener: (config: AppConfig) => void): () => void {
    this.changeEmitter.on('change', listener);
    return () => this.changeEmitter.off('change', listener);
  }
}
