import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigManager } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let root: string;
  let globalDir: string;
  let projectDir: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'clustersched-config-'));
    globalDir = join(root, 'global');
    projectDir = join(root, 'project');
    mkdirSync(globalDir);
    mkdirSync(projectDir);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('returns defaults when no sources exist', () => {
    const config = new ConfigManager({ globalDir, projectDir, env: {} }).load();
    expect(config).toEqual({
      scheduler: { timeoutMultiplier: 1.2, timeoutClock: 'elapsed' },
      autoScale: { idPrefix: 'W', cpu: 2, memory: 4, speed: 10 },
      logging: { level: 'info', verbose: false },
    });
  });

  it('layers global, project, env and overrides in that order', () => {
    writeFileSync(
      join(globalDir, 'config.yaml'),
      'autoScale:\n  cpu: 8\n  memory: 16\nlogging:\n  level: warn\n',
    );
    writeFileSync(join(projectDir, '.clustersched.yaml'), 'autoScale:\n  cpu: 4\n');

    const config = new ConfigManager({
      globalDir,
      projectDir,
      env: { CLUSTERSCHED_TIMEOUT_MULTIPLIER: '1.5', CLUSTERSCHED_LOG_LEVEL: 'debug' },
    }).load({ autoScale: { speed: 20 } });

    expect(config.autoScale).toEqual({ idPrefix: 'W', cpu: 4, memory: 16, speed: 20 });
    expect(config.scheduler.timeoutMultiplier).toBe(1.5);
    expect(config.logging.level).toBe('debug');
  });

  it('reads the timeout clock from the environment', () => {
    const config = new ConfigManager({
      globalDir,
      projectDir,
      env: { CLUSTERSCHED_TIMEOUT_CLOCK: 'scheduler' },
    }).load();
    expect(config.scheduler.timeoutClock).toBe('scheduler');
  });

  it('rejects values that fail validation', () => {
    writeFileSync(join(projectDir, '.clustersched.yaml'), 'autoScale:\n  cpu: -2\n');
    const manager = new ConfigManager({ globalDir, projectDir, env: {} });
    expect(() => manager.load()).toThrow(ConfigError);
    expect(() => manager.load()).toThrow(/autoScale\.cpu/);
  });

  it('wraps YAML syntax errors', () => {
    writeFileSync(join(projectDir, '.clustersched.yaml'), 'autoScale: [unclosed\n');
    expect(() => new ConfigManager({ globalDir, projectDir, env: {} }).load()).toThrow(
      /Failed to parse project config/,
    );
  });

  it('caches the loaded configuration', () => {
    const manager = new ConfigManager({ globalDir, projectDir, env: {} });
    expect(manager.get()).toBe(manager.get());
    expect(manager.getProjectDir()).toBe(projectDir);
    expect(manager.getGlobalDir()).toBe(globalDir);
  });
});
