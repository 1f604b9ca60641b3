import path from 'path';
import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      INVENTORY_FILE: 'lab/inventory.csv',
      OLLAMA_URL: 'http://generator:11434',
      OLLAMA_MODEL: 'llama3',
      GENERATION_TIMEOUT_MS: '5000',
      SSH_PORT: '2222',
      PORT: '8080',
    });

    expect(config.inventoryFile).toBe(path.resolve('lab/inventory.csv'));
    expect(config.ollamaUrl).toBe('http://generator:11434');
    expect(config.ollamaModel).toBe('llama3');
    expect(config.generationTimeoutMs).toBe(5000);
    expect(config.sshPort).toBe(2222);
    expect(config.port).toBe(8080);
    expect(config.sshReadyTimeoutMs).toBe(DEFAULT_CONFIG.sshReadyTimeoutMs);
  });

  it('picks the log level from LOG_LEVEL or the environment', () => {
    expect(loadConfig({ LOG_LEVEL: 'Warn' }).logLevel).toBe('warn');
    expect(loadConfig({ NODE_ENV: 'production' }).logLevel).toBe('info');
    expect(loadConfig({ LOG_LEVEL: 'loud' }).logLevel).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: 'loud', NODE_ENV: 'production' }).logLevel).toBe('info');
  });

  it('ignores invalid numbers', () => {
    const config = loadConfig({ SSH_PORT: 'twenty-two', PORT: '-1', SSH_COMMAND_TIMEOUT_MS: '1.5' });

    expect(config.sshPort).toBe(22);
    expect(config.port).toBe(4000);
    expect(config.sshCommandTimeoutMs).toBe(15000);
  });
});
