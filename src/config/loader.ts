/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (DISKSCHED_*)
 * 3. Project config file (./disksched.config.json)
 * 4. User config file (~/.disksched/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure; every field is optional. */
export interface ExternalConfig {
  disk?: {
    /** Number of cylinders; requests are expected in [0, size). */
    size?: number;
    /** Starting head position when none is given. */
    head?: number;
  };
  random?: {
    /** How many requests `random` and `--random` draw. */
    count?: number;
    /** Fixed seed for reproducible random request sets. */
    seed?: number;
  };
  report?: {
    outputDir?: string;
  };
  server?: {
    port?: number;
  };
}

/** Fully resolved configuration. */
export interface ResolvedConfig {
  disk: { size: number; head: number };
  random: { count: number; seed?: number };
  report: { outputDir: string };
  server: { port: number };
}

/** Default config values. */
export const EXTERNAL_DEFAULTS: ResolvedConfig = {
  disk: {
    size: 200,
    head: 50,
  },
  random: {
    count: 8,
  },
  report: {
    outputDir: './disksched-report',
  },
  server: {
    port: 3333,
  },
};

/**
 * Expand a leading `~` to the user's home directory.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(section: unknown, key: string): number | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'number' ? value : undefined;
}

function stringField(section: unknown, key: string): string | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Pick the known fields out of parsed JSON. Unknown keys and mistyped
 * values are dropped.
 */
export function coerceExternalConfig(raw: unknown): ExternalConfig {
  if (!isRecord(raw)) return {};
  return {
    disk: { size: numberField(raw.disk, 'size'), head: numberField(raw.disk, 'head') },
    random: { count: numberField(raw.random, 'count'), seed: numberField(raw.random, 'seed') },
    report: { outputDir: stringField(raw.report, 'outputDir') },
    server: { port: numberField(raw.server, 'port') },
  };
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return coerceExternalConfig(JSON.parse(content));
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Load config from environment variables.
 * Examples:
 *   DISKSCHED_DISK_SIZE=500
 *   DISKSCHED_RANDOM_SEED=7
 *   DISKSCHED_REPORT_OUTPUT_DIR=./out
 */
function loadEnvConfig(): ExternalConfig {
  return {
    disk: { size: envInt('DISKSCHED_DISK_SIZE'), head: envInt('DISKSCHED_DISK_HEAD') },
    random: { count: envInt('DISKSCHED_RANDOM_COUNT'), seed: envInt('DISKSCHED_RANDOM_SEED') },
    report: { outputDir: process.env.DISKSCHED_REPORT_OUTPUT_DIR || undefined },
    server: { port: envInt('DISKSCHED_SERVER_PORT') },
  };
}

/**
 * Merge two configs, with defined source fields overriding the target.
 */
function mergeConfig(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    disk: {
      size: source.disk?.size ?? target.disk.size,
      head: source.disk?.head ?? target.disk.head,
    },
    random: {
      count: source.random?.count ?? target.random.count,
      seed: source.random?.seed ?? target.random.seed,
    },
    report: {
      outputDir: source.report?.outputDir ?? target.report.outputDir,
    },
    server: {
      port: source.server?.port ?? target.server.port,
    },
  };
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Validate a config. Returns one message per problem.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  if (config.disk?.size !== undefined) {
    if (!Number.isInteger(config.disk.size) || config.disk.size < 1) {
      errors.push('disk.size must be a positive integer');
    }
  }
  if (config.disk?.head !== undefined) {
    if (!isNonNegativeInteger(config.disk.head)) {
      errors.push('disk.head must be a non-negative integer');
    }
  }

  if (config.random?.count !== undefined) {
    if (!isNonNegativeInteger(config.random.count)) {
      errors.push('random.count must be a non-negative integer');
    } else if (config.disk?.size !== undefined && config.random.count > config.disk.size) {
      errors.push('random.count cannot exceed disk.size');
    }
  }
  if (config.random?.seed !== undefined) {
    if (!Number.isInteger(config.random.seed)) {
      errors.push('random.seed must be an integer');
    }
  }

  if (config.report?.outputDir !== undefined && config.report.outputDir.trim() === '') {
    errors.push('report.outputDir must not be empty');
  }

  if (config.server?.port !== undefined) {
    if (!isNonNegativeInteger(config.server.port) || config.server.port > 65535) {
      errors.push('server.port must be between 0 and 65535');
    }
  }

  return errors;
}

/**
 * Throw if the config has problems. The message lists them all.
 *
 * @throws ConfigError with code `CONFIG_INVALID`
 */
export function assertValidConfig(config: ExternalConfig): void {
  const errors = validateExternalConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  let config: ResolvedConfig = EXTERNAL_DEFAULTS;

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.disksched/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'disksched.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = mergeConfig(config, options.cliOverrides);
  }

  return config;
}
