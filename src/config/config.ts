/**
 * Configuration system.
 *
 * Manages config file at ~/.tesspipe/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import {
  DEFAULT_DPI,
  DEFAULT_ENCODING,
  DEFAULT_LANGUAGE,
  DEFAULT_OEM,
  DEFAULT_PSM,
  DEFAULT_TIMEOUT_MS,
  MAX_OEM,
  MAX_PSM,
  TESSERACT_CMD,
} from '../engine/constants.js';
import type { RecognizeOptions } from '../engine/options.js';
import { ConfigurationError } from '../errors/index.js';
import { createLogger } from '../logging/logger.js';
import type { TesseractOptions } from '../tesseract/tesseract.js';

export type OutputStyle = 'plain' | 'json';

export interface TesspipeConfig {
  tesseract: {
    /** Default: 'tesseract' */
    cmd: string;
    tessdataDir?: string;
  };
  defaults: {
    /** Default: 'eng' */
    language: string;
    /** Default: 300 */
    dpi: number;
    /** Default: 3 */
    psm: number;
    /** Default: 3 */
    oem: number;
    /** Default: 30000 */
    timeoutMs: number;
    /** Default: 'utf-8' */
    encoding: string;
  };
  output: {
    /** How the CLI prints structured results. Default: 'plain' */
    format: OutputStyle;
  };
}

function isBufferEncoding(value: string): value is BufferEncoding {
  return Buffer.isEncoding(value);
}

function isOutputStyle(value: string): value is OutputStyle {
  return value === 'plain' || value === 'json';
}

function parseIntEnv(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`${name} must be an integer, got: ${value}`, { variable: name });
  }
  return n;
}

const log = createLogger('Config');

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.tesspipe', 'config.json');
  }

  getPath(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): TesspipeConfig {
    if (!fs.existsSync(this.configPath)) {
      log.debug(`no config at ${this.configPath}, using defaults`);
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`Config at ${this.configPath} must be a JSON object`, {
        path: this.configPath,
      });
    }
    log.debug(`loaded ${this.configPath}`);
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: TesspipeConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. An empty errors array means valid.
   */
  validate(config: TesspipeConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { tesseract, defaults, output } = config;

    if (typeof tesseract.cmd !== 'string' || !tesseract.cmd.trim()) {
      errors.push('tesseract.cmd must not be empty');
    }
    if (typeof defaults.language !== 'string' || !defaults.language.trim()) {
      errors.push('defaults.language must not be empty');
    }
    if (!Number.isInteger(defaults.dpi) || defaults.dpi <= 0) {
      errors.push(`defaults.dpi must be a positive integer, got: ${defaults.dpi}`);
    }
    if (!Number.isInteger(defaults.psm) || defaults.psm < 0 || defaults.psm > MAX_PSM) {
      errors.push(`defaults.psm must be 0-${MAX_PSM}, got: ${defaults.psm}`);
    }
    if (!Number.isInteger(defaults.oem) || defaults.oem < 0 || defaults.oem > MAX_OEM) {
      errors.push(`defaults.oem must be 0-${MAX_OEM}, got: ${defaults.oem}`);
    }
    if (!(typeof defaults.timeoutMs === 'number' && defaults.timeoutMs > 0)) {
      errors.push(`defaults.timeoutMs must be positive, got: ${defaults.timeoutMs}`);
    }
    if (typeof defaults.encoding !== 'string' || !isBufferEncoding(defaults.encoding)) {
      errors.push(`defaults.encoding is not a supported encoding: ${defaults.encoding}`);
    }
    if (!isOutputStyle(output.format)) {
      errors.push(`output.format must be plain | json, got: ${output.format}`);
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   TESSPIPE_CMD, TESSPIPE_TESSDATA_DIR, TESSPIPE_LANG, TESSPIPE_DPI,
   *   TESSPIPE_PSM, TESSPIPE_OEM, TESSPIPE_TIMEOUT_MS, TESSPIPE_ENCODING,
   *   TESSPIPE_OUTPUT_FORMAT
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): TesspipeConfig {
    const config = this.load();

    if (env.TESSPIPE_CMD) config.tesseract.cmd = env.TESSPIPE_CMD;
    if (env.TESSPIPE_TESSDATA_DIR) config.tesseract.tessdataDir = env.TESSPIPE_TESSDATA_DIR;

    if (env.TESSPIPE_LANG) config.defaults.language = env.TESSPIPE_LANG;
    if (env.TESSPIPE_DPI) config.defaults.dpi = parseIntEnv('TESSPIPE_DPI', env.TESSPIPE_DPI);
    if (env.TESSPIPE_PSM) config.defaults.psm = parseIntEnv('TESSPIPE_PSM', env.TESSPIPE_PSM);
    if (env.TESSPIPE_OEM) config.defaults.oem = parseIntEnv('TESSPIPE_OEM', env.TESSPIPE_OEM);
    if (env.TESSPIPE_TIMEOUT_MS) {
      config.defaults.timeoutMs = parseIntEnv('TESSPIPE_TIMEOUT_MS', env.TESSPIPE_TIMEOUT_MS);
    }
    if (env.TESSPIPE_ENCODING) config.defaults.encoding = env.TESSPIPE_ENCODING;

    const format = env.TESSPIPE_OUTPUT_FORMAT;
    if (format) {
      if (!isOutputStyle(format)) {
        throw new ConfigurationError(`TESSPIPE_OUTPUT_FORMAT must be plain | json, got: ${format}`);
      }
      config.output.format = format;
    }

    return config;
  }

  /**
   * Return a default configuration with safe fallback values.
   */
  static defaults(): TesspipeConfig {
    return {
      tesseract: {
        cmd: TESSERACT_CMD,
      },
      defaults: {
        language: DEFAULT_LANGUAGE,
        dpi: DEFAULT_DPI,
        psm: DEFAULT_PSM,
        oem: DEFAULT_OEM,
        timeoutMs: DEFAULT_TIMEOUT_MS,
        encoding: DEFAULT_ENCODING,
      },
      output: {
        format: 'plain',
      },
    };
  }

  /**
   * Turn a validated config into constructor options for `Tesseract`.
   * Throws `ConfigurationError` listing every problem when invalid.
   */
  toTesseractOptions(config: TesspipeConfig): TesseractOptions {
    const { valid, errors } = this.validate(config);
    const { encoding } = config.defaults;
    if (!valid || !isBufferEncoding(encoding)) {
      throw new ConfigurationError(`Invalid configuration:\n  - ${errors.join('\n  - ')}`, { errors });
    }
    const defaults: Partial<RecognizeOptions> = {
      language: config.defaults.language,
      dpi: config.defaults.dpi,
      psm: config.defaults.psm,
      oem: config.defaults.oem,
      timeoutMs: config.defaults.timeoutMs,
      encoding,
      tessdataDir: config.tesseract.tessdataDir,
    };
    return { cmd: config.tesseract.cmd, defaults };
  }

  /** Deep-merge a parsed JSON object into the defaults (non-destructive). */
  private merge(target: TesspipeConfig, source: object): TesspipeConfig {
    const section = (key: string): Record<string, unknown> => {
      const value: unknown = Object.getOwnPropertyDescriptor(source, key)?.value;
      return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
    };
    return {
      tesseract: { ...target.tesseract, ...pick(section('tesseract'), target.tesseract, ['tessdataDir']) },
      defaults: { ...target.defaults, ...pick(section('defaults'), target.defaults) },
      output: { ...target.output, ...pick(section('output'), target.output) },
    };
  }
}

/**
 * Copy the keys of `shape` (plus `optional`) from `source` whose values have
 * the same primitive type as in `shape`. Unknown keys and mistyped values
 * are dropped and left to the defaults.
 */
function pick<T extends object>(
  source: Record<string, unknown>,
  shape: T,
  optional: string[] = []
): Partial<T> {
  const result: Partial<T> = {};
  const keys = [...Object.keys(shape), ...optional];
  for (const key of keys) {
    const value = source[key];
    const expected = key in shape ? typeof Object.getOwnPropertyDescriptor(shape, key)?.value : 'string';
    if (value !== undefined && typeof value === expected) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
