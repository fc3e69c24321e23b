import { join } from 'path';
import { homedir } from 'os';
import { describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('defaults to the XDG data directory', () => {
    expect(loadConfig({ XDG_DATA_HOME: '/tmp/xdg' })).toEqual({
      dataDir: join('/tmp/xdg', 'battrack'),
      logLevel: 'info',
    });
  });

  it('falls back to ~/.local/share', () => {
    expect(loadConfig({}).dataDir).toBe(join(homedir(), '.local', 'share', 'battrack'));
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({ BATTRACK_DATA_DIR: '/srv/battery', BATTRACK_LOG_LEVEL: 'debug' });
    expect(config).toEqual({ dataDir: '/srv/battery', logLevel: 'debug' });
  });

  it('rejects an unknown log level', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => loadConfig({ BATTRACK_LOG_LEVEL: 'verbose' })).toThrow('INVALID_CONFIG');
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});
