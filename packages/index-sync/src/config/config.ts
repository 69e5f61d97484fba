/**
 * Configuration loader.
 *
 * Reads INI files with a [default] section:
 *
 *   [default]
 *   s3.bucket=my-bucket
 *   s3.prefix=simple/
 *   upload=true
 *
 * Files are read in order (system file, then the user's file) and later
 * files override earlier keys. The result is validated and frozen.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import ini from 'ini';
import { ConfigurationError } from '../errors.js';
import { CANNED_ACLS } from '../store/types.js';
import type { IndexConfig, IndexConfigOverrides } from './types.js';
import {
  CONFIG_KEYS,
  DEFAULT_INDEX_CONFIG,
  DEFAULT_SECTION,
  SYSTEM_CONFIG_PATH,
} from './types.js';

const TRUE_VALUES = new Set(['true', 'yes', 'on', '1']);
const FALSE_VALUES = new Set(['false', 'no', 'off', '0']);

export interface LoadConfigOptions {
  /** Configuration file named by the user; it is an error for it to be missing */
  configPath?: string;
  /** System-wide file read first when present (default: /etc/s3pi/config) */
  systemPath?: string;
  /** Values applied after every file */
  overrides?: IndexConfigOverrides;
}

type RawSettings = Record<string, string>;

/** Default per-user configuration file: ~/.s3pi/config */
export function defaultUserConfigPath(): string {
  return path.join(os.homedir(), '.s3pi', 'config');
}

/**
 * Normalize an S3 key prefix: no leading slash, runs of slashes collapsed,
 * exactly one trailing slash. Empty input (or just slashes) means the
 * bucket root and yields ''.
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\/+/g, '/').replace(/^\//, '').replace(/\/$/, '');
  return trimmed === '' ? '' : `${trimmed}/`;
}

/**
 * Parse a boolean-like setting (true/false, yes/no, on/off, 1/0; any case).
 * Returns undefined for anything else.
 */
export function parseBoolean(value: string): boolean | undefined {
  const lowered = value.trim().toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toScalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return undefined;
}

function scalars(section: Record<string, unknown>): RawSettings {
  const out: RawSettings = {};
  for (const [key, value] of Object.entries(section)) {
    const scalar = toScalar(value);
    if (scalar !== undefined) {
      out[key] = scalar;
    }
  }
  return out;
}

/**
 * Extract the settings section from INI text.
 *
 * Uses [default] when present, otherwise the first section in the file,
 * otherwise any keys written before the first section header.
 */
export function readConfigSection(content: string): RawSettings {
  const parsed: Record<string, unknown> = ini.parse(content);

  const preferred = parsed[DEFAULT_SECTION];
  if (isRecord(preferred)) {
    return scalars(preferred);
  }

  const firstSection = Object.values(parsed).find(isRecord);
  if (firstSection) {
    return scalars(firstSection);
  }

  return scalars(parsed);
}

function readConfigFile(filePath: string, required: boolean): RawSettings {
  if (!fs.existsSync(filePath)) {
    if (required) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    return {};
  }

  try {
    return readConfigSection(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`, {
      cause: err,
    });
  }
}

/**
 * Validate a configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateIndexConfig(config: IndexConfig): string[] {
  const errors: string[] = [];

  if (!config.bucket) {
    errors.push(`${CONFIG_KEYS.bucket} is required`);
  } else if (/[\s/]/.test(config.bucket)) {
    // Naming rules vary by region and age of the bucket; S3 reports the rest
    errors.push(`${CONFIG_KEYS.bucket} must not contain "/" or whitespace`);
  }

  if (!config.region) {
    errors.push(`${CONFIG_KEYS.region} must not be empty`);
  }

  if (config.acl !== undefined && !CANNED_ACLS.includes(config.acl)) {
    errors.push(`${CONFIG_KEYS.acl} must be one of: ${CANNED_ACLS.join(', ')}`);
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push(`${CONFIG_KEYS.concurrency} must be an integer of at least 1`);
  } else if (config.concurrency > 32) {
    errors.push(`${CONFIG_KEYS.concurrency} must not exceed 32`);
  }

  return errors;
}

/**
 * Build an IndexConfig from raw settings, applying defaults and overrides.
 *
 * @throws ConfigurationError if a value cannot be parsed or the result is invalid
 */
export function buildIndexConfig(
  settings: RawSettings,
  overrides?: IndexConfigOverrides
): IndexConfig {
  let upload = DEFAULT_INDEX_CONFIG.upload;
  const rawUpload = settings[CONFIG_KEYS.upload];
  if (rawUpload !== undefined && rawUpload.trim() !== '') {
    const parsed = parseBoolean(rawUpload);
    if (parsed === undefined) {
      throw new ConfigurationError(
        `${CONFIG_KEYS.upload} must be a boolean (true/false), got "${rawUpload}"`
      );
    }
    upload = parsed;
  }

  let concurrency = DEFAULT_INDEX_CONFIG.concurrency;
  const rawConcurrency = settings[CONFIG_KEYS.concurrency];
  if (rawConcurrency !== undefined && rawConcurrency.trim() !== '') {
    concurrency = /^\d+$/.test(rawConcurrency.trim()) ? parseInt(rawConcurrency, 10) : NaN;
  }

  const rawPrefix = settings[CONFIG_KEYS.prefix];
  const acl = settings[CONFIG_KEYS.acl]?.trim();

  const config: IndexConfig = {
    bucket: (settings[CONFIG_KEYS.bucket] ?? '').trim(),
    prefix: normalizePrefix(rawPrefix ?? DEFAULT_INDEX_CONFIG.prefix),
    upload: overrides?.upload ?? upload,
    region: overrides?.region ?? settings[CONFIG_KEYS.region]?.trim() ?? DEFAULT_INDEX_CONFIG.region,
    concurrency,
    ...(acl ? { acl } : {}),
  };

  const errors = validateIndexConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`);
  }

  return Object.freeze(config);
}

/**
 * Load the configuration for a run.
 *
 * Reads the system file (if present) and then the user's file. When
 * options.configPath is set that file must exist; otherwise
 * ~/.s3pi/config is read if it exists.
 */
export function loadConfig(options: LoadConfigOptions = {}): IndexConfig {
  const systemSettings = readConfigFile(options.systemPath ?? SYSTEM_CONFIG_PATH, false);
  const userSettings = options.configPath
    ? readConfigFile(options.configPath, true)
    : readConfigFile(defaultUserConfigPath(), false);

  return buildIndexConfig({ ...systemSettings, ...userSettings }, options.overrides);
}
