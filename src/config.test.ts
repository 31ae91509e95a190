import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_FILE, ConfigError, loadConfig, removeConfig, resolveConfigPath, saveConfig } from './config';

describe('config', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'huecast-config-'));
    file = path.join(dir, CONFIG_FILE);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('resolves the file in the working directory unless overridden', () => {
    expect(resolveConfigPath({}, '/work')).toBe(path.resolve('/work', '.huecast.json'));
    expect(resolveConfigPath({ HUECAST_CONFIG: 'hub.json' }, '/work')).toBe(path.resolve('/work', 'hub.json'));
    expect(resolveConfigPath({ HUECAST_CONFIG: '/etc/hub.json' }, '/work')).toBe(path.resolve('/etc/hub.json'));
  });

  it('returns null without a file or environment', async () => {
    expect(await loadConfig(file, {})).toBeNull();
  });

  it('reads back what it saved', async () => {
    await saveConfig(file, { host: '192.168.1.20', appKey: 'test-app-key' });

    expect(await loadConfig(file, {})).toEqual({
      config: { host: '192.168.1.20', appKey: 'test-app-key' },
      source: file,
    });
    expect(await fs.readFile(file, 'utf8')).toBe('{\n  "host": "192.168.1.20",\n  "appKey": "test-app-key"\n}\n');
  });

  it('trims values when saving', async () => {
    expect(await saveConfig(file, { host: ' hub.local ', appKey: 'key ' })).toEqual({ host: 'hub.local', appKey: 'key' });
  });

  it('prefers the environment when both variables are set', async () => {
    await saveConfig(file, { host: '192.168.1.20', appKey: 'file-key' });

    expect(await loadConfig(file, { HUE_BRIDGE_IP: '10.0.0.2', HUE_APP_KEY: 'env-key' })).toEqual({
      config: { host: '10.0.0.2', appKey: 'env-key' },
      source: null,
    });
    expect((await loadConfig(file, { HUE_BRIDGE_IP: '10.0.0.2' }))?.config.host).toBe('192.168.1.20');
  });

  it('rejects blank environment values', async () => {
    await expect(loadConfig(file, { HUE_BRIDGE_IP: '10.0.0.2', HUE_APP_KEY: '   ' })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a file that is not JSON', async () => {
    await fs.writeFile(file, 'host=1.2.3.4');

    await expect(loadConfig(file, {})).rejects.toThrow(`${file} is not valid JSON`);
  });

  it('names the invalid fields', async () => {
    await fs.writeFile(file, JSON.stringify({ host: '1.2.3.4' }));

    await expect(loadConfig(file, {})).rejects.toThrow(`${file} is missing or has invalid fields: appKey`);
  });

  it('reports unreadable files as ConfigError', async () => {
    await expect(loadConfig(dir, {})).rejects.toBeInstanceOf(ConfigError);
  });

  it('removes the file once', async () => {
    await saveConfig(file, { host: 'hub', appKey: 'key' });

    expect(await removeConfig(file)).toBe(true);
    expect(await removeConfig(file)).toBe(false);
    expect(await loadConfig(file, {})).toBeNull();
  });
});
