import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { ConfigurationError } from '../core/errors';
import { ClientConfigSchema, type ClientConfig, type ClientConfigInput } from './schemas/config.schema';

const logger = createLogger('ConfigLoader');

export const CONFIG_FILE_NAME = 'tsdb.yaml';
export const DEFAULT_PORT = '6041';

type ConfigObject = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively copy `source` onto `target`; nested objects are merged, everything else replaced
 */
function mergeInto(target: ConfigObject, source: ConfigObject): ConfigObject {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = target[key];
    target[key] = isRecord(value) && isRecord(existing) ? mergeInto({ ...existing }, value) : value;
  }
  return target;
}

/**
 * ConfigLoader resolves client settings from an optional YAML file,
 * environment variables and explicit overrides, in that order.
 */
export class ConfigLoader {
  private configFolder: string;

  constructor(configFolder: string) {
    this.configFolder = configFolder;
  }

  /**
   * Load and validate configuration
   * @param overrides - Settings that win over the file and the environment
   * @throws ConfigurationError if the file cannot be parsed or a setting is invalid
   */
  load(overrides: ClientConfigInput = {}): ClientConfig {
    let rawConfig = this.readFile();

    rawConfig = this.applyEnvOverrides(rawConfig);
    rawConfig = mergeInto(rawConfig, { ...overrides });

    const result = ClientConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new ConfigurationError(`Configuration validation failed:\n${errors}`);
    }

    this.logConfigSummary(result.data);

    return result.data;
  }

  private readFile(): ConfigObject {
    const yamlPath = path.join(this.configFolder, CONFIG_FILE_NAME);

    if (!fs.existsSync(yamlPath)) {
      logger.debug(`No configuration file at ${yamlPath}, using defaults`);
      return {};
    }

    logger.info(`Loading configuration from: ${yamlPath}`);
    const fileContent = fs.readFileSync(yamlPath, 'utf-8');
    let parsed: unknown;

    try {
      parsed = yaml.parse(fileContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new ConfigurationError(`Failed to parse YAML configuration: ${message}`);
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError('Failed to parse YAML configuration: expected a mapping at the top level');
    }
    return parsed;
  }

  // Mapping of lowercase env var keys to camelCase config keys
  private static readonly KEY_MAPPINGS: Record<string, string> = {
    convertnumber: 'convertNumber',
    defaultnumbervalue: 'defaultNumberValue',
    useragent: 'userAgent',
    insecureskipverify: 'insecureSkipVerify',
    writeencoding: 'writeEncoding',
  };

  /**
   * Apply environment overrides.
   * TSDB_HOST, TSDB_PORT, TSDB_USER, TSDB_PASS, TSDB_PREC and TSDB_DB set the
   * connection; TSDB_CLIENT_PATH_TO_KEY sets any other key
   * (e.g. TSDB_CLIENT_HTTP_WRITEENCODING).
   */
  private applyEnvOverrides(config: ConfigObject): ConfigObject {
    const env = process.env;

    const host = env.TSDB_HOST;
    if (host) {
      config.address = `http://${host}:${env.TSDB_PORT || DEFAULT_PORT}`;
      logger.debug('Applied env override: TSDB_HOST');
    }

    const direct: Array<[string, string]> = [
      ['TSDB_USER', 'username'],
      ['TSDB_PASS', 'password'],
      ['TSDB_PREC', 'precision'],
      ['TSDB_DB', 'database'],
    ];
    for (const [name, key] of direct) {
      const value = env[name];
      if (!value) continue;
      config[key] = value;
      logger.debug(`Applied env override: ${name}`);
    }

    const envVars = Object.entries(env).filter(([key]) => key.startsWith('TSDB_CLIENT_'));

    for (const [key, value] of envVars) {
      if (!value) continue;

      const pathParts = key
        .substring('TSDB_CLIENT_'.length)
        .toLowerCase()
        .split('_')
        .filter((part) => part.length > 0)
        .map((part) => ConfigLoader.KEY_MAPPINGS[part] || part);

      if (pathParts.length === 0) continue;

      this.setNestedValue(config, pathParts, this.parseEnvValue(value));
      logger.debug(`Applied env override: ${key}`);
    }

    return config;
  }

  /**
   * Set a nested value in an object using path parts
   */
  private setNestedValue(obj: ConfigObject, pathParts: string[], value: unknown): void {
    let current = obj;

    for (const part of pathParts.slice(0, -1)) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: ConfigObject = {};
        current[part] = created;
        current = created;
      }
    }

    current[pathParts[pathParts.length - 1]] = value;
  }

  /**
   * Parse environment variable value to appropriate type
   */
  private parseEnvValue(value: string): unknown {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    return value;
  }

  /**
   * Log configuration summary (without sensitive data)
   */
  private logConfigSummary(config: ClientConfig): void {
    logger.info(
      `Client configured: ${config.address} database=${config.database} user=${config.username} precision=${config.precision}`
    );
  }
}
