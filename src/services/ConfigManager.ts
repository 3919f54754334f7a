import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { AppConfig, ConfigValidationError, StorageFileKey } from '../types/config.js';
import { DEFAULT_PRODUCT_ID } from '../codec/encoder.js';
import { DEFAULT_EVENTS_FILE } from '../adapters/ICalFileStorage.js';
import { DEFAULT_CATEGORIES_FILE } from './CategoryStore.js';
import { DEFAULT_SIMILAR_WORDS_FILE } from './SimilarWordsStore.js';
import { DEFAULT_TIME_ZONE, isValidTimeZone } from '../utils/timezone.js';
import { errorMessage, isErrnoException } from '../utils/errors.js';

export const APP_DIR_NAME = '.pocket-calendar';

const nonEmptyString = { type: 'string', minLength: 1 };

const CONFIG_SCHEMA = {
  type: 'object',
  properties: {
    storage: {
      type: 'object',
      properties: {
        dataDir: nonEmptyString,
        eventsFile: nonEmptyString,
        categoriesFile: nonEmptyString,
        similarWordsFile: nonEmptyString
      },
      required: ['dataDir', 'eventsFile', 'categoriesFile', 'similarWordsFile']
    },
    calendar: {
      type: 'object',
      properties: {
        timeZone: nonEmptyString,
        productId: nonEmptyString,
        includeUid: { type: 'boolean' }
      },
      required: ['timeZone', 'productId', 'includeUid']
    },
    server: {
      type: 'object',
      properties: {
        name: nonEmptyString,
        version: nonEmptyString
      },
      required: ['name', 'version']
    }
  },
  required: ['storage', 'calendar', 'server']
};

export class ConfigManager {
  private configPath: string;
  private appDir: string;
  private config: AppConfig | null = null;
  private isAppConfig: ValidateFunction<AppConfig>;

  constructor(configPath?: string) {
    this.appDir = join(homedir(), APP_DIR_NAME);
    this.configPath = configPath ?? join(this.appDir, 'config.json');
    this.isAppConfig = new Ajv({ allErrors: true }).compile<AppConfig>(CONFIG_SCHEMA);
  }

  /**
   * Load configuration from disk, writing the defaults when there is no file yet
   */
  async loadConfig(): Promise<AppConfig> {
    try {
      await this.ensureConfigDirectory();

      let configData: string;
      try {
        configData = await fs.readFile(this.configPath, 'utf-8');
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          const defaults = this.getDefaultConfig();
          await this.saveConfig(defaults);
          this.config = defaults;
          return this.getConfig();
        }
        throw error;
      }

      const parsedConfig: unknown = JSON.parse(configData);
      this.config = this.assertValidConfig(parsedConfig);
      return this.getConfig();
    } catch (error) {
      throw new Error(`Failed to load configuration: ${errorMessage(error)}`);
    }
  }

  /**
   * Validate and write a configuration. The in-memory copy is not touched.
   */
  async saveConfig(config: AppConfig): Promise<void> {
    try {
      this.assertValidConfig(config);
      await this.ensureConfigDirectory();

      const configData = JSON.stringify(config, null, 2);
      await fs.writeFile(this.configPath, configData, 'utf-8');
    } catch (error) {
      throw new Error(`Failed to save configuration: ${errorMessage(error)}`);
    }
  }

  /**
   * Get current configuration
   */
  getConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return structuredClone(this.config);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Absolute path of one of the data files
   */
  resolveStoragePath(file: StorageFileKey): string {
    const { storage } = this.requireConfig();
    return join(storage.dataDir, storage[file]);
  }

  /**
   * Validate configuration object
   */
  validateConfig(config: unknown): ConfigValidationError[] {
    if (!this.isAppConfig(config)) {
      return (this.isAppConfig.errors ?? []).map(toValidationError);
    }

    const errors: ConfigValidationError[] = [];
    if (!isValidTimeZone(config.calendar.timeZone)) {
      errors.push({
        field: 'calendar.timeZone',
        message: 'timeZone must be a valid IANA time zone',
        value: config.calendar.timeZone
      });
    }
    return errors;
  }

  private assertValidConfig(config: unknown): AppConfig {
    const validationErrors = this.validateConfig(config);
    if (validationErrors.length > 0 || !this.isAppConfig(config)) {
      throw new Error(`Configuration validation failed: ${validationErrors.map(e => `${e.field} ${e.message}`).join(', ')}`);
    }
    return config;
  }

  private requireConfig(): AppConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  /**
   * Get default configuration
   */
  private getDefaultConfig(): AppConfig {
    return {
      storage: {
        dataDir: this.appDir,
        eventsFile: DEFAULT_EVENTS_FILE,
        categoriesFile: DEFAULT_CATEGORIES_FILE,
        similarWordsFile: DEFAULT_SIMILAR_WORDS_FILE
      },
      calendar: {
        timeZone: DEFAULT_TIME_ZONE,
        productId: DEFAULT_PRODUCT_ID,
        includeUid: true
      },
      server: {
        name: 'pocket-calendar',
        version: '1.0.0'
      }
    };
  }

  /**
   * Ensure configuration directory exists
   */
  private async ensureConfigDirectory(): Promise<void> {
    await fs.mkdir(dirname(this.configPath), { recursive: true });
  }
}

function toValidationError(error: ErrorObject): ConfigValidationError {
  const segments = error.instancePath.split('/').filter(Boolean);
  const missing = error.params.missingProperty;
  if (error.keyword === 'required' && typeof missing === 'string') {
    segments.push(missing);
  }
  return {
    field: segments.length > 0 ? segments.join('.') : 'root',
    message: error.message ?? 'is invalid'
  };
}
