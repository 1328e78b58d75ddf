/**
 * Configuration system
 *
 * Manages the config file at ~/.iesna/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/index.js';

export interface IesnaConfig {
  rescale: {
    /** Target cone in degrees, 0–180. Default: 90 */
    coneAngle: number;
    preserveIntensity: boolean;
  };
  output: {
    /** Appended to the input file's stem when no output path is given. Default: _rescaled */
    suffix: string;
    /** Write generated outputs here instead of next to the input. */
    directory?: string;
  };
  serializer: {
    /** Decimal places written before trimming. Default: 2 */
    precision: number;
  };
  batch: {
    /** Files processed at once. Default: 4 */
    concurrency: number;
  };
  cli: {
    spinner: boolean;
  };
}

type ValueKind = 'number' | 'boolean' | 'string';

/** Settable keys and the type their raw string value is coerced to. */
export const CONFIG_KEYS: Readonly<Record<string, ValueKind>> = {
  'rescale.coneAngle': 'number',
  'rescale.preserveIntensity': 'boolean',
  'output.suffix': 'string',
  'output.directory': 'string',
  'serializer.precision': 'number',
  'batch.concurrency': 'number',
  'cli.spinner': 'boolean',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(raw: string, key: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${key} must be true or false, got "${raw}"`, { key });
}

function parseNumber(raw: string, key: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, { key });
  }
  return value;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.iesna', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): IesnaConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`, {
        path: this.configPath,
      });
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Failed to read config at ${this.configPath}: expected a JSON object`, {
        path: this.configPath,
      });
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: IesnaConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. An empty errors array means valid.
   */
  validate(config: IesnaConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const { coneAngle } = config.rescale;
    if (!Number.isFinite(coneAngle) || coneAngle < 0 || coneAngle > 180) {
      errors.push(`rescale.coneAngle must be between 0 and 180, got: ${coneAngle}`);
    }
    if (!config.output.suffix && !config.output.directory) {
      errors.push('output.suffix must be non-empty unless output.directory is set');
    }
    const { precision } = config.serializer;
    if (!Number.isInteger(precision) || precision < 0 || precision > 20) {
      errors.push(`serializer.precision must be an integer between 0 and 20, got: ${precision}`);
    }
    const { concurrency } = config.batch;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      errors.push(`batch.concurrency must be a positive integer, got: ${concurrency}`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   IESNA_CONE_ANGLE, IESNA_PRESERVE_INTENSITY, IESNA_OUTPUT_SUFFIX,
   *   IESNA_OUTPUT_DIR, IESNA_PRECISION, IESNA_BATCH_CONCURRENCY, IESNA_SPINNER
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): IesnaConfig {
    const config = this.load();

    if (env.IESNA_CONE_ANGLE) config.rescale.coneAngle = parseNumber(env.IESNA_CONE_ANGLE, 'IESNA_CONE_ANGLE');
    if (env.IESNA_PRESERVE_INTENSITY) {
      config.rescale.preserveIntensity = parseBoolean(env.IESNA_PRESERVE_INTENSITY, 'IESNA_PRESERVE_INTENSITY');
    }
    if (env.IESNA_OUTPUT_SUFFIX) config.output.suffix = env.IESNA_OUTPUT_SUFFIX;
    if (env.IESNA_OUTPUT_DIR) config.output.directory = env.IESNA_OUTPUT_DIR;
    if (env.IESNA_PRECISION) config.serializer.precision = parseNumber(env.IESNA_PRECISION, 'IESNA_PRECISION');
    if (env.IESNA_BATCH_CONCURRENCY) config.batch.concurrency = parseNumber(env.IESNA_BATCH_CONCURRENCY, 'IESNA_BATCH_CONCURRENCY');
    if (env.IESNA_SPINNER) config.cli.spinner = parseBoolean(env.IESNA_SPINNER, 'IESNA_SPINNER');

    return config;
  }

  /**
   * Read a value by dotted key ("rescale.coneAngle"). Undefined when absent.
   */
  static getValue(config: IesnaConfig, key: string): unknown {
    let value: unknown = config;
    for (const part of key.split('.')) {
      if (!isRecord(value)) return undefined;
      value = value[part];
    }
    return value;
  }

  /**
   * Return a copy of `config` with `key` set from its raw string form.
   */
  static setValue(config: IesnaConfig, key: string, raw: string): IesnaConfig {
    const next = ConfigManager.copy(config);
    switch (key) {
      case 'rescale.coneAngle':
        next.rescale.coneAngle = parseNumber(raw, key);
        break;
      case 'rescale.preserveIntensity':
        next.rescale.preserveIntensity = parseBoolean(raw, key);
        break;
      case 'output.suffix':
        next.output.suffix = raw;
        break;
      case 'output.directory':
        next.output.directory = raw || undefined;
        break;
      case 'serializer.precision':
        next.serializer.precision = parseNumber(raw, key);
        break;
      case 'batch.concurrency':
        next.batch.concurrency = parseNumber(raw, key);
        break;
      case 'cli.spinner':
        next.cli.spinner = parseBoolean(raw, key);
        break;
      default:
        throw new ConfigurationError(`Unknown config key: ${key}`, { key, known: Object.keys(CONFIG_KEYS) });
    }
    return next;
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): IesnaConfig {
    return {
      rescale: {
        coneAngle: 90,
        preserveIntensity: false,
      },
      output: {
        suffix: '_rescaled',
      },
      serializer: {
        precision: 2,
      },
      batch: {
        concurrency: 4,
      },
      cli: {
        spinner: true,
      },
    };
  }

  private static copy(config: IesnaConfig): IesnaConfig {
    return {
      rescale: { ...config.rescale },
      output: { ...config.output },
      serializer: { ...config.serializer },
      batch: { ...config.batch },
      cli: { ...config.cli },
    };
  }

  /** Merge known keys of `source` over `target`, ignoring values of the wrong type. */
  private merge(target: IesnaConfig, source: Record<string, unknown>): IesnaConfig {
    const result = ConfigManager.copy(target);
    const { rescale, output, serializer, batch, cli } = source;
    if (isRecord(rescale)) {
      if (typeof rescale.coneAngle === 'number') result.rescale.coneAngle = rescale.coneAngle;
      if (typeof rescale.preserveIntensity === 'boolean') result.rescale.preserveIntensity = rescale.preserveIntensity;
    }
    if (isRecord(output)) {
      if (typeof output.suffix === 'string') result.output.suffix = output.suffix;
      if (typeof output.directory === 'string') result.output.directory = output.directory;
    }
    if (isRecord(serializer) && typeof serializer.precision === 'number') {
      result.serializer.precision = serializer.precision;
    }
    if (isRecord(batch) && typeof batch.concurrency === 'number') {
      result.batch.concurrency = batch.concurrency;
    }
    if (isRecord(cli) && typeof cli.spinner === 'boolean') {
      result.cli.spinner = cli.spinner;
    }
    return result;
  }
}
