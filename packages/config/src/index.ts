import * as fs from 'fs/promises';
import * as path from 'path';
import * as dotenv from 'dotenv';
import _ from 'lodash';
import { EventEmitter } from 'events';
import { Logger } from '@tickwise/utils';
import { TradingError, TradingErrorCode } from '@tickwise/types';
import { DEFAULT_CONFIG } from './defaults';
import { tradingConfigSchema } from './schema';
import { TradingConfig } from './types';

export * from './types';
export { DEFAULT_CONFIG } from './defaults';
export { tradingConfigSchema } from './schema';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends (infer U)[]
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

export const ENV_PREFIX = 'TICKWISE';

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge where arrays replace instead of merging index by index
 */
function mergeConfig(...sources: unknown[]): ConfigRecord {
  return _.mergeWith({}, ...sources, (_target: unknown, source: unknown) =>
    Array.isArray(source) ? [...source] : undefined
  );
}

function validate(candidate: unknown): TradingConfig {
  const { error, value } = tradingConfigSchema.validate(candidate, { abortEarly: false });
  if (error) {
    throw new TradingError(
      TradingErrorCode.CONFIGURATION_ERROR,
      `Configuration validation failed: ${error.message}`
    );
  }
  return value;
}

/**
 * Build a validated configuration from the defaults plus in-code overrides
 */
export function createTradingConfig(overrides: DeepPartial<TradingConfig> = {}): TradingConfig {
  return validate(mergeConfig(DEFAULT_CONFIG, overrides));
}

/**
 * `indicators.emaShort` -> `TICKWISE_INDICATORS_EMA_SHORT`
 */
export function envVarName(configPath: string): string {
  const segments = configPath
    .split('.')
    .map(segment => segment.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase());
  return [ENV_PREFIX, ...segments].join('_');
}

function coerceEnvValue(raw: string, template: unknown, envVar: string): unknown {
  const fail = (): never => {
    throw new TradingError(
      TradingErrorCode.CONFIGURATION_ERROR,
      `Invalid value for ${envVar}: ${raw}`
    );
  };

  if (typeof template === 'number') {
    const parsed = Number(raw);
    return Number.isFinite(parsed) && raw.trim() !== '' ? parsed : fail();
  }
  if (typeof template === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    return fail();
  }
  if (Array.isArray(template)) {
    const items = raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
    if (typeof template[0] === 'number') {
      return items.map(item => {
        const parsed = Number(item);
        return Number.isFinite(parsed) ? parsed : fail();
      });
    }
    return items;
  }
  return raw;
}

/**
 * Collect overrides for every configuration leaf from `TICKWISE_*` variables
 */
export function collectEnvOverrides(env: NodeJS.ProcessEnv): ConfigRecord {
  const overrides: ConfigRecord = {};

  const walk = (node: unknown, prefix: string[]): void => {
    if (!isRecord(node)) return;

    for (const [key, template] of Object.entries(node)) {
      const configPath = [...prefix, key];
      if (isRecord(template)) {
        walk(template, configPath);
        continue;
      }

      const envVar = envVarName(configPath.join('.'));
      const raw = env[envVar];
      if (raw !== undefined) {
        _.set(overrides, configPath, coerceEnvValue(raw, template, envVar));
      }
    }
  };

  walk(DEFAULT_CONFIG, []);
  return overrides;
}

export interface ConfigServiceOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  loadDotenv?: boolean;
}

export class ConfigService extends EventEmitter {
  private config: TradingConfig | null = null;
  private logger: Logger;
  private configPath: string;
  private environment: string;
  private env: NodeJS.ProcessEnv;
  private loadDotenv: boolean;

  constructor(logger: Logger, options: ConfigServiceOptions = {}) {
    super();
    this.logger = logger;
    this.configPath = options.configPath ?? './config';
    this.env = options.env ?? process.env;
    // dotenv populates process.env, so it only applies when reading from it
    this.loadDotenv = (options.loadDotenv ?? true) && this.env === process.env;
    this.environment = this.env.NODE_ENV || 'development';
  }

  /**
   * Load configuration from defaults, files and environment
   */
  async load(environment?: string): Promise<TradingConfig> {
    if (environment) {
      this.environment = environment;
    }

    this.logger.info('Loading configuration', { environment: this.environment });

    try {
      if (this.loadDotenv) {
        this.loadEnvironmentFiles();
      }

      const baseConfig = await this.loadConfigFile('default.json');
      const envConfig = await this.loadConfigFile(`${this.environment}.json`);

      const merged = mergeConfig(
        DEFAULT_CONFIG,
        baseConfig,
        envConfig,
        collectEnvOverrides(this.env),
        { environment: this.environment }
      );

      this.config = validate(merged);

      this.logger.info('Configuration loaded successfully', {
        symbols: this.config.symbols,
        checkInterval: this.config.checkInterval
      });

      this.emit('config:loaded', this.config);
      return this.getTradingConfig();
    } catch (error) {
      this.logger.error('Failed to load configuration', error);
      throw error;
    }
  }

  /**
   * Get configuration value by path
   */
  get(configPath: string): unknown {
    const config = this.requireConfig();
    const value: unknown = _.get(config, configPath);

    if (value === undefined) {
      throw new TradingError(
        TradingErrorCode.CONFIGURATION_ERROR,
        `Configuration value not found: ${configPath}`
      );
    }

    return _.cloneDeep(value);
  }

  /**
   * Set configuration value (runtime only, not persisted).
   * The updated configuration is revalidated before it replaces the current one.
   */
  set(configPath: string, value: unknown): void {
    const current = this.requireConfig();
    const oldValue: unknown = _.get(current, configPath);
    const candidate = _.cloneDeep(current);
    _.set(candidate, configPath, value);

    this.config = validate(candidate);

    this.emit('config:changed', { path: configPath, oldValue, newValue: value });
    this.logger.debug('Configuration value updated', { path: configPath });
  }

  /**
   * Get entire configuration object
   */
  getTradingConfig(): TradingConfig {
    return _.cloneDeep(this.requireConfig());
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  private requireConfig(): TradingConfig {
    if (!this.config) {
      throw new TradingError(TradingErrorCode.CONFIGURATION_ERROR, 'Configuration not loaded');
    }
    return this.config;
  }

  private async loadConfigFile(filename: string): Promise<ConfigRecord> {
    const filePath = path.join(this.configPath, filename);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn(`Configuration file not found: ${filename}`);
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new TradingError(
        TradingErrorCode.CONFIGURATION_ERROR,
        `Configuration file ${filename} must contain a JSON object`
      );
    }
    return parsed;
  }

  private loadEnvironmentFiles(): void {
    // Environment-specific file first so its values win over the shared .env
    dotenv.config({ path: `.env.${this.environment}` });
    dotenv.config();
  }
}
