import { promises as fs } from 'fs';
import { resolve } from 'path';
import AjvModule, { type ErrorObject, type JSONSchemaType } from 'ajv';
import { IANAZone } from 'luxon';
import { AppConfig, ConfigValidationError, DataConfig, ServerConfig } from '../types/config.js';
import { DEFAULT_CACHE_CONFIG } from './CalendarCache.js';
import { DEFAULT_TIMETABLE_CONFIG } from '../adapters/OpenDataTimetableSource.js';
import { describeError } from '../utils/errors.js';

const Ajv = AjvModule.default;

export const CONFIG_PATH_ENV = 'LECTURE_CALENDAR_CONFIG';

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 8080,
  host: '0.0.0.0'
};

export const DEFAULT_DATA_CONFIG: DataConfig = {
  coursesPath: 'data/courses.json'
};

const configSchema: JSONSchemaType<AppConfig> = {
  type: 'object',
  properties: {
    server: {
      type: 'object',
      default: { ...DEFAULT_SERVER_CONFIG },
      properties: {
        port: { type: 'integer', minimum: 0, maximum: 65535, default: DEFAULT_SERVER_CONFIG.port },
        host: { type: 'string', minLength: 1, default: DEFAULT_SERVER_CONFIG.host }
      },
      required: ['port', 'host']
    },
    cache: {
      type: 'object',
      default: { ...DEFAULT_CACHE_CONFIG },
      properties: {
        ttl: { type: 'number', minimum: 0, default: DEFAULT_CACHE_CONFIG.ttl },
        idleTimeout: { type: 'number', minimum: 0, default: DEFAULT_CACHE_CONFIG.idleTimeout },
        cleanupInterval: { type: 'number', minimum: 0, default: DEFAULT_CACHE_CONFIG.cleanupInterval },
        maxEntries: { type: 'integer', minimum: 1, default: DEFAULT_CACHE_CONFIG.maxEntries }
      },
      required: ['ttl', 'idleTimeout', 'cleanupInterval', 'maxEntries']
    },
    timetable: {
      type: 'object',
      default: { ...DEFAULT_TIMETABLE_CONFIG },
      properties: {
        path: { type: 'string', pattern: '^/', default: DEFAULT_TIMETABLE_CONFIG.path },
        timezone: { type: 'string', minLength: 1, default: DEFAULT_TIMETABLE_CONFIG.timezone },
        requestTimeout: { type: 'number', exclusiveMinimum: 0, default: DEFAULT_TIMETABLE_CONFIG.requestTimeout },
        maxRetries: { type: 'integer', minimum: 1, default: DEFAULT_TIMETABLE_CONFIG.maxRetries },
        retryDelay: { type: 'number', minimum: 0, default: DEFAULT_TIMETABLE_CONFIG.retryDelay }
      },
      required: ['path', 'timezone', 'requestTimeout', 'maxRetries', 'retryDelay']
    },
    data: {
      type: 'object',
      default: { ...DEFAULT_DATA_CONFIG },
      properties: {
        coursesPath: { type: 'string', minLength: 1, default: DEFAULT_DATA_CONFIG.coursesPath }
      },
      required: ['coursesPath']
    }
  },
  required: ['server', 'cache', 'timetable', 'data']
};

// useDefaults fills every missing field while validating
const ajv = new Ajv({ allErrors: true, useDefaults: true, verbose: true });
const validateAppConfig = ajv.compile(configSchema);

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private configPath: string;
  private env: NodeJS.ProcessEnv;
  private config: AppConfig | null = null;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.configPath = resolve(configPath ?? env[CONFIG_PATH_ENV] ?? 'config.json');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from disk, falling back to defaults when the file is
   * missing. PORT and HOST from the environment take precedence.
   */
  async loadConfig(): Promise<AppConfig> {
    const raw = await this.readConfigFile();
    this.applyEnvironment(raw);

    const validationErrors = this.validateConfig(raw);
    if (validationErrors.length > 0 || !validateAppConfig(raw)) {
      throw new Error(`Configuration validation failed: ${validationErrors.map(e => e.message).join(', ')}`);
    }

    this.config = raw;
    return this.config;
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return { ...this.config }; // Return a copy to prevent external mutations
  }

  /**
   * Validate a configuration object. Missing fields are filled with their
   * defaults as a side effect.
   */
  validateConfig(config: unknown): ConfigValidationError[] {
    if (!isObject(config)) {
      return [{ field: 'root', message: 'Configuration must be an object' }];
    }

    if (!validateAppConfig(config)) {
      return (validateAppConfig.errors ?? []).map(toValidationError);
    }

    if (!IANAZone.isValidZone(config.timetable.timezone)) {
      return [{
        field: 'timetable.timezone',
        message: 'timetable.timezone must be an IANA time zone',
        value: config.timetable.timezone
      }];
    }

    return [];
  }

  private async readConfigFile(): Promise<JsonObject> {
    let configData: string;
    try {
      configData = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isObject(error) && error.code === 'ENOENT') {
        console.warn(`No configuration file at ${this.configPath}, using defaults`);
        return {};
      }
      throw new Error(`Failed to load configuration: ${describeError(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(configData);
    } catch (error) {
      throw new Error(`Failed to load configuration: ${describeError(error)}`);
    }

    if (!isObject(parsed)) {
      throw new Error('Failed to load configuration: Configuration must be an object');
    }
    return parsed;
  }

  private applyEnvironment(raw: JsonObject): void {
    const { PORT, HOST } = this.env;
    if (!PORT && !HOST) {
      return;
    }

    const server: JsonObject = isObject(raw.server) ? { ...raw.server } : {};
    if (PORT) {
      server.port = Number(PORT);
    }
    if (HOST) {
      server.host = HOST;
    }
    raw.server = server;
  }
}

function toValidationError(error: ErrorObject): ConfigValidationError {
  const field = error.instancePath.replace(/^\//, '').replace(/\//g, '.') || 'root';
  return {
    field,
    message: `${field} ${error.message ?? 'is invalid'}`,
    value: error.data
  };
}
