/**
 * Configuration Loader
 * Loads and validates configuration from environment variables
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigOptions, ConfigSchema, ConfigValue, ValidationError } from './types';
import { validateConfig } from './validators/schema-validator';

export class ConfigLoader {
  private options: Required<Omit<ConfigOptions, 'env'>>;
  private env: NodeJS.ProcessEnv;
  private config: Record<string, ConfigValue | undefined> = {};
  private loaded = false;

  constructor(options: ConfigOptions) {
    this.options = {
      schema: options.schema,
      envFilePath: options.envFilePath || '.env',
      loadEnvFile: options.loadEnvFile ?? true,
      envPrefix: options.envPrefix || '',
    };
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration
   */
  load(): Record<string, ConfigValue | undefined> {
    if (this.loaded) {
      return this.config;
    }

    if (this.options.loadEnvFile) {
      this.loadEnvFile();
    }

    this.loadFromEnvironment();

    const validation = validateConfig(this.config, this.options.schema);

    if (!validation.valid) {
      const errorMessage = this.formatValidationErrors(validation.errors);

      throw new Error(`Configuration validation failed:\n${errorMessage}`);
    }

    this.loaded = true;
    return this.config;
  }

  /**
   * Get configuration value
   */
  get(key: string): ConfigValue | undefined {
    if (!this.loaded) {
      throw new Error('Configuration not loaded. Call load() first.');
    }

    return this.config[key];
  }

  getString(key: string): string | undefined {
    const value = this.get(key);
    return value === undefined ? undefined : String(value);
  }

  getBoolean(key: string): boolean | undefined {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : undefined;
  }

  /**
   * Load .env file into the variables being read. A missing file is fine:
   * variables can be set externally.
   */
  private loadEnvFile(): void {
    const envPath = path.resolve(process.cwd(), this.options.envFilePath);
    if (!fs.existsSync(envPath)) {
      return;
    }

    const parsed = dotenv.parse(fs.readFileSync(envPath));
    for (const [name, value] of Object.entries(parsed)) {
      // Variables already set win over the file
      if (this.env[name] === undefined) {
        this.env[name] = value;
      }
    }
  }

  private loadFromEnvironment(): void {
    const schema: ConfigSchema = this.options.schema;

    for (const [key, field] of Object.entries(schema)) {
      const envVar = field.env || this.options.envPrefix + key.toUpperCase();
      const raw = this.env[envVar];

      let value: ConfigValue | undefined;
      if (raw !== undefined) {
        value = this.autoTransform(raw, field.type);
      } else if (field.default !== undefined) {
        value = field.default;
      }

      this.config[key] = value;
    }
  }

  /**
   * Auto-transform value based on type
   */
  private autoTransform(value: string, type?: string): ConfigValue {
    switch (type) {
      case 'number': {
        const num = Number(value);
        return isNaN(num) ? value : num;
      }

      case 'boolean':
        return value === 'true' || value === '1' || value === 'yes';

      default:
        return value;
    }
  }

  private formatValidationErrors(errors: ValidationError[]): string {
    return errors
      .map((err) => `  - ${err.field}: ${err.message}`)
      .join('\n');
  }
}

