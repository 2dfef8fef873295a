import * as fs from 'fs';
import { ConfigurationError } from './errors';
import { createLogger, Logger } from './logger';

export interface UpdaterConfig {
  /** Seconds between reconciliation cycles */
  checkInterval: number;
  forcePullPolicy: boolean;
  /** Seconds allowed for one manifest request */
  registryTimeout: number;
  /** Empty watches every namespace */
  namespace: string;
  insecureRegistries: string[];
  registryAuthFile?: string;
  /** 0 disables the health endpoint */
  healthPort: number;
}

export type ConfigOverrides = Partial<UpdaterConfig>;

const defaultConfig: UpdaterConfig = {
  checkInterval: 300,
  forcePullPolicy: false,
  registryTimeout: 10,
  namespace: '',
  insecureRegistries: [],
  healthPort: 8080,
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isFileConfig(obj: unknown): obj is ConfigOverrides {
  if (!obj || typeof obj !== 'object' || Array.isArray(obj)) {
    return false;
  }
  const cfg = new Map<string, unknown>(Object.entries(obj));
  const optional = (key: string, check: (v: unknown) => boolean) => cfg.get(key) === undefined || check(cfg.get(key));
  return (
    optional('checkInterval', (v) => typeof v === 'number') &&
    optional('forcePullPolicy', (v) => typeof v === 'boolean') &&
    optional('registryTimeout', (v) => typeof v === 'number') &&
    optional('namespace', (v) => typeof v === 'string') &&
    optional('insecureRegistries', isStringArray) &&
    optional('registryAuthFile', (v) => typeof v === 'string') &&
    optional('healthPort', (v) => typeof v === 'number')
  );
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Resolves UpdaterConfig from defaults, an optional JSON file, the
 * environment and command line overrides, in that order.
 */
export class ConfigManager {
  private logger: Logger;

  constructor(private env: NodeJS.ProcessEnv = process.env, logger?: Logger) {
    this.logger = logger ?? createLogger('config');
  }

  load(overrides: ConfigOverrides = {}): UpdaterConfig {
    const config: UpdaterConfig = {
      ...defaultConfig,
      ...this.loadFile(),
      ...this.loadEnv(),
      ...stripUndefined(overrides),
    };
    validate(config);
    return config;
  }

  private loadFile(): ConfigOverrides {
    const file = this.env.IMAGE_UPDATER_CONFIG;
    if (!file) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      if (isFileConfig(parsed)) {
        return parsed;
      }
      this.logger.warn({ file }, 'Invalid config format, ignoring file');
    } catch (error) {
      this.logger.warn({ file, err: error }, 'Failed to load config file');
    }
    return {};
  }

  private loadEnv(): ConfigOverrides {
    const env = this.env;
    const config: ConfigOverrides = {};
    if (env.CHECK_INTERVAL !== undefined) {
      config.checkInterval = parseNumber('CHECK_INTERVAL', env.CHECK_INTERVAL);
    }
    if (env.AUTOMATICALLY_SET_IMAGE_PULL_POLICY_TO_ALWAYS !== undefined) {
      config.forcePullPolicy = env.AUTOMATICALLY_SET_IMAGE_PULL_POLICY_TO_ALWAYS.trim().toLowerCase() === 'true';
    }
    if (env.REGISTRY_TIMEOUT !== undefined) {
      config.registryTimeout = parseNumber('REGISTRY_TIMEOUT', env.REGISTRY_TIMEOUT);
    }
    if (env.WATCH_NAMESPACE !== undefined) {
      config.namespace = env.WATCH_NAMESPACE.trim();
    }
    if (env.INSECURE_REGISTRIES !== undefined) {
      config.insecureRegistries = parseList(env.INSECURE_REGISTRIES);
    }
    if (env.REGISTRY_AUTH_FILE) {
      config.registryAuthFile = env.REGISTRY_AUTH_FILE;
    }
    if (env.HEALTH_PORT !== undefined) {
      config.healthPort = parseNumber('HEALTH_PORT', env.HEALTH_PORT);
    }
    return config;
  }
}

function stripUndefined(overrides: ConfigOverrides): ConfigOverrides {
  const result: ConfigOverrides = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

function validate(config: UpdaterConfig): void {
  if (!Number.isFinite(config.checkInterval) || config.checkInterval <= 0) {
    throw new ConfigurationError(`checkInterval must be a positive number of seconds, got ${config.checkInterval}`);
  }
  if (!Number.isFinite(config.registryTimeout) || config.registryTimeout <= 0) {
    throw new ConfigurationError(
      `registryTimeout must be a positive number of seconds, got ${config.registryTimeout}`
    );
  }
  if (!Number.isInteger(config.healthPort) || config.healthPort < 0 || config.healthPort > 65535) {
    throw new ConfigurationError(`healthPort must be an integer between 0 and 65535, got ${config.healthPort}`);
  }
}

export const configManager = new ConfigManager();
