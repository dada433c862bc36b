/**
 * Configuration Management
 *
 * Library settings from defaults, an optional JSON file and the environment.
 */

import { readFile } from 'node:fs/promises';

export interface ConfigOptions {
  env?: string;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  decorators?: {
    /** Class-name suffix used to pair sources with decorators */
    suffix?: string;
    /** Warn when a decorator is re-applied deeper in a chain */
    warnOnRedecoration?: boolean;
  };
  tracing?: {
    enabled?: boolean;
    serviceName?: string;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  logLevel: 'info',
  decorators: {
    suffix: 'Decorator',
    warnOnRedecoration: true,
  },
  tracing: {
    enabled: false,
    serviceName: 'mantle',
  },
};

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigOptions;

  constructor(options: ConfigOptions = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get<T>(key: string, defaultValue?: T): T {
    const value = this.getNestedValue(this.config, key);
    return (value ?? defaultValue) as T;
  }

  /**
   * Set a configuration value by dotted path
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  all(): ConfigOptions {
    return { ...this.config };
  }

  private mergeConfig(base: ConfigOptions, override: ConfigOptions): ConfigOptions {
    const result: ConfigOptions = {};

    // Copy nested sections so `set` never writes into the defaults
    for (const [key, value] of Object.entries(base)) {
      result[key] = isPlainObject(value) ? this.mergeConfig(value, {}) : value;
    }

    for (const [key, value] of Object.entries(override)) {
      if (value === undefined) continue;

      if (isPlainObject(value)) {
        const current = result[key];
        result[key] = this.mergeConfig(isPlainObject(current) ? current : {}, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    return path.split('.').reduce<unknown>((current, key) => {
      return isPlainObject(current) ? current[key] : undefined;
    }, obj);
  }

  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop();
    if (last === undefined) return;

    let current = obj;
    for (const part of parts) {
      const next = current[part];
      if (isPlainObject(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load configuration from a JSON file and the environment.
 *
 * A missing file leaves the defaults in place; a file that exists but does
 * not parse is an error.
 */
export async function loadConfig(
  configPath = './mantle.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: ConfigOptions = {};

  try {
    const content = await readFile(configPath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    if (!isPlainObject(parsed)) {
      throw new Error(`Configuration file ${configPath} must contain a JSON object`);
    }
    fileConfig = parsed;
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  const config = new Config(fileConfig);

  const overrides: Record<string, unknown> = {
    env: env.MANTLE_ENV ?? env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    'decorators.suffix': env.MANTLE_DECORATOR_SUFFIX,
    'tracing.enabled': env.OTEL_ENABLED === undefined ? undefined : env.OTEL_ENABLED === 'true',
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}

let defaultConfig: Config | null = null;

/**
 * Get the default config instance
 */
export function getConfig(): Config {
  if (!defaultConfig) {
    defaultConfig = new Config();
  }
  return defaultConfig;
}

/**
 * Replace the default config instance. Passing null restores the defaults.
 */
export function setConfig(config: Config | null): void {
  defaultConfig = config;
}
