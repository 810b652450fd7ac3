/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (PGVECTOR_WIRE_*)
 * 3. Project config file (./pgvector-wire.config.json)
 * 4. User config file (~/.pgvector-wire/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { VECTOR_TYPE_NAMES, isVectorTypeName, type VectorTypeName } from '../codec/types.js';
import { createLogger, isLogLevel, type LogLevel } from '../utils/logger.js';

const log = createLogger('config-loader');

/** Name of the project config file */
export const PROJECT_CONFIG_FILE = 'pgvector-wire.config.json';

/** Location of the user config file */
export const USER_CONFIG_PATH = '~/.pgvector-wire/config.json';

/** External config file structure */
export interface ExternalConfig {
  registration?: {
    /** Schema the vector extension is installed in. Default: 'public' */
    schema?: string;
    /** Types to bind when registering with a client. Default: all */
    types?: VectorTypeName[];
  };
  logging?: {
    level?: LogLevel;
    /** Emit JSON lines instead of text. Default: false */
    json?: boolean;
  };
}

/** Fully resolved config */
export interface ResolvedConfig {
  registration: Required<NonNullable<ExternalConfig['registration']>>;
  logging: Required<NonNullable<ExternalConfig['logging']>>;
}

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedConfig = {
  registration: {
    schema: 'public',
    types: [...VECTOR_TYPE_NAMES],
  },
  logging: {
    level: 'info',
    json: false,
  },
};

/**
 * Expand a leading `~` to the home directory.
 */
export function resolvePath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the recognised, well-typed fields of a parsed config file.
 * Range checks are left to validateExternalConfig().
 */
function toExternalConfig(raw: unknown): ExternalConfig {
  const config: ExternalConfig = {};
  if (!isRecord(raw)) {
    return config;
  }

  const registration = raw.registration;
  if (isRecord(registration)) {
    config.registration = {};
    if (typeof registration.schema === 'string') {
      config.registration.schema = registration.schema;
    }
    if (Array.isArray(registration.types)) {
      config.registration.types = registration.types.filter(
        (t): t is VectorTypeName => typeof t === 'string' && isVectorTypeName(t),
      );
      if (config.registration.types.length !== registration.types.length) {
        log.warn('Ignoring unknown entries in registration.types', {
          types: registration.types,
        });
      }
    }
  }

  const logging = raw.logging;
  if (isRecord(logging)) {
    config.logging = {};
    if (typeof logging.level === 'string' && isLogLevel(logging.level)) {
      config.logging.level = logging.level;
    }
    if (typeof logging.json === 'boolean') {
      config.logging.json = logging.json;
    }
  }

  return config;
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
    return toExternalConfig(JSON.parse(content));
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Variables are prefixed with PGVECTOR_WIRE_ and use underscores for nesting.
 * Examples:
 *   PGVECTOR_WIRE_REGISTRATION_SCHEMA=extensions
 *   PGVECTOR_WIRE_REGISTRATION_TYPES=vector,halfvec
 *   PGVECTOR_WIRE_LOG_LEVEL=debug
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  // Registration
  if (process.env.PGVECTOR_WIRE_REGISTRATION_SCHEMA) {
    config.registration = config.registration ?? {};
    config.registration.schema = process.env.PGVECTOR_WIRE_REGISTRATION_SCHEMA;
  }
  if (process.env.PGVECTOR_WIRE_REGISTRATION_TYPES) {
    const names = process.env.PGVECTOR_WIRE_REGISTRATION_TYPES.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
    config.registration = config.registration ?? {};
    config.registration.types = names.filter(isVectorTypeName);
    if (config.registration.types.length !== names.length) {
      log.warn('Ignoring unknown entries in PGVECTOR_WIRE_REGISTRATION_TYPES', { types: names });
    }
  }

  // Logging
  const level = process.env.PGVECTOR_WIRE_LOG_LEVEL;
  if (level) {
    if (isLogLevel(level)) {
      config.logging = config.logging ?? {};
      config.logging.level = level;
    } else {
      log.warn(`Ignoring unknown PGVECTOR_WIRE_LOG_LEVEL ${level}`);
    }
  }
  if (process.env.PGVECTOR_WIRE_LOG_JSON) {
    config.logging = config.logging ?? {};
    config.logging.json = process.env.PGVECTOR_WIRE_LOG_JSON === 'true';
  }

  return config;
}

/**
 * Merge two config objects section by section, with source overriding target.
 */
function mergeConfig(target: ResolvedConfig, source: ExternalConfig): ResolvedConfig {
  return {
    registration: { ...target.registration, ...withoutUndefined(source.registration) },
    logging: { ...target.logging, ...withoutUndefined(source.logging) },
  };
}

function withoutUndefined<T extends object>(section: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!section) return result;
  for (const key of Object.keys(section) as (keyof T)[]) {
    if (section[key] !== undefined) {
      result[key] = section[key];
    }
  }
  return result;
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  if (config.registration?.schema !== undefined) {
    if (config.registration.schema.trim().length === 0) {
      errors.push('registration.schema must be a non-empty schema name');
    }
  }
  if (config.registration?.types !== undefined) {
    if (config.registration.types.length === 0) {
      errors.push('registration.types must name at least one of: vector, halfvec, sparsevec');
    }
    const unknown = config.registration.types.filter((t) => !isVectorTypeName(t));
    if (unknown.length > 0) {
      errors.push(`registration.types contains unknown types: ${unknown.join(', ')}`);
    }
    if (new Set(config.registration.types).size !== config.registration.types.length) {
      errors.push('registration.types must not repeat a type');
    }
  }

  if (config.logging?.level !== undefined && !isLogLevel(config.logging.level)) {
    errors.push('logging.level must be one of: debug, info, warn, error, silent');
  }

  return errors;
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
  let config = mergeConfig(EXTERNAL_DEFAULTS, {});

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? USER_CONFIG_PATH);
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(
      options.projectConfigPath ?? join(process.cwd(), PROJECT_CONFIG_FILE),
    );
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

export { EXTERNAL_DEFAULTS };
