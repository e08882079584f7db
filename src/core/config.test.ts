import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'full-update-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when no file exists', () => {
    const config = loadConfig(join(dir, 'missing.json'));
    expect(config).toEqual(defaultConfig());
    expect(config.refreshIntervalMs).toBe(1000);
    expect(config.layout).toEqual({ minWidth: 45, minHeight: 11, logMinCharacters: 300 });
  });

  it('merges file values over the defaults', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ logDir: '/var/log/full-update', layout: { minHeight: 14 } }));
    const config = loadConfig(path);
    expect(config.logDir).toBe('/var/log/full-update');
    expect(config.refreshIntervalMs).toBe(1000);
    expect(config.layout).toEqual({ minWidth: 45, minHeight: 14, logMinCharacters: 300 });
  });

  it('reports malformed JSON as a config error', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, '{ "logDir": ');
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });

  it('rejects wrongly typed fields', () => {
    expect(() => parseConfig({ refreshIntervalMs: 0 }, 'cfg.json')).toThrow(
      'Invalid config at cfg.json: "refreshIntervalMs" must be a positive integer',
    );
    expect(() => parseConfig({ logDir: '' }, 'cfg.json')).toThrow('"logDir" must be a non-empty string');
    expect(() => parseConfig({ layout: [] }, 'cfg.json')).toThrow('"layout" must be an object');
    expect(() => parseConfig('fast', 'cfg.json')).toThrow('expected a JSON object');
  });
});
