import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { SchedulerConfigSchema, type SchedulerConfig, type SchedulerConfigInput } from './types.js';
import { ConfigError } from './errors.js';

export interface ConfigManagerOptions {
  projectDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: SchedulerConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.clustersched');
    this.projectDir = options.projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: SchedulerConfigInput): SchedulerConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.clustersched.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = SchedulerConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): SchedulerConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, err instanceof Error ? err : undefined);
    }

    return asRecord(parsed);
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const scheduler = { ...asRecord(raw.scheduler) };
    const logging = { ...asRecord(raw.logging) };

    if (this.env.CLUSTERSCHED_TIMEOUT_MULTIPLIER) {
      scheduler.timeoutMultiplier = Number(this.env.CLUSTERSCHED_TIMEOUT_MULTIPLIER);
    }
    if (this.env.CLUSTERSCHED_TIMEOUT_CLOCK) {
      scheduler.timeoutClock = this.env.CLUSTERSCHED_TIMEOUT_CLOCK;
    }
    if (this.env.CLUSTERSCHED_LOG_LEVEL) {
      logging.level = this.env.CLUSTERSCHED_LOG_LEVEL;
    }

    return { ...raw, scheduler, logging };
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      if (isRecord(source[key]) && isRecord(target[key])) {
        result[key] = this.deepMerge(asRecord(target[key]), asRecord(source[key]));
      } else {
        result[key] = source[key];
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}
