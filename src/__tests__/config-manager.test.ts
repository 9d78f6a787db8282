import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigManager } from '../configManager';
import { makeTempDir } from './fixtures/fakeModel';

function writeConfig(contents: unknown): string {
  const file = path.join(makeTempDir(), 'config.json');
  fs.writeFileSync(file, JSON.stringify(contents));
  return file;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('ConfigManager', () => {
  it('writes a default config when none exists', () => {
    const file = path.join(makeTempDir(), 'nested', 'config.json');
    const manager = new ConfigManager(file);

    expect(fs.existsSync(file)).toBe(true);
    expect(manager.getConfig()).toMatchObject({ dataDir: 'data', port: 3001, flushIntervalMs: 500, pendingDirectiveLimit: 64 });
    expect(manager.getDataDir()).toBe(path.join(path.dirname(file), 'data'));
    expect(manager.getModelPath()).toBeUndefined();
  });

  it('fills defaults, coerces types and resolves paths against the config file', () => {
    const file = writeConfig({ dataDir: 'store', port: '4000', modelPath: 'models/hiyori.model3.json' });
    const manager = new ConfigManager(file);

    expect(manager.getConfig().port).toBe(4000);
    expect(manager.getConfig().pendingDirectiveLimit).toBe(64);
    expect(manager.getDataDir()).toBe(path.join(path.dirname(file), 'store'));
    expect(manager.getModelPath()).toBe(path.join(path.dirname(file), 'models', 'hiyori.model3.json'));
  });

  it('falls back to defaults when the file does not validate', () => {
    const manager = new ConfigManager(writeConfig({ port: 70000 }));
    expect(manager.getConfig().port).toBe(3001);
  });

  it('lets PORT override the configured port', () => {
    const manager = new ConfigManager(writeConfig({ port: 4000 }));
    vi.stubEnv('PORT', '4100');
    expect(manager.getPort()).toBe(4100);
    vi.stubEnv('PORT', 'not-a-port');
    expect(manager.getPort()).toBe(4000);
  });

  it('persists debug settings and picks up edits on reload', () => {
    const file = writeConfig({});
    const manager = new ConfigManager(file);
    manager.updateDebugSettings({ enabledNamespaces: 'avatar:*' });
    expect(new ConfigManager(file).getConfig().debug).toEqual({ enabledNamespaces: 'avatar:*' });

    fs.writeFileSync(file, JSON.stringify({ port: 5000 }));
    manager.reload();
    expect(manager.getConfig().port).toBe(5000);
  });
});
