/**
 * Config Manager - Configuration schema, loading, validation, and semantic accessors
 *
 * Handles:
 * - Configuration schema definition (single source of truth)
 * - Config file loading and merging with defaults
 * - Config validation against schema
 * - CLI config overrides
 *
 * MANAGER: Has config access. Libs receive plain values from here.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { LOG_LEVELS, type LogLevel } from '../lib/logger.js';
import type {
  RevloopConfig,
  ConfigSchemaEntry,
  ConfigDisplayItem,
  ConfigSchema,
  ConfigValue
} from '../lib/types/config.js';

export const CONFIG_ENV = 'REVLOOP_CONFIG';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

/**
 * Configuration Schema - Single source of truth for all config variables.
 * Each variable declares: type, default, description, and valid values (for enums).
 */
export const CONFIG_SCHEMA: ConfigSchema = {
  'workspace.dir': {
    type: 'string',
    default: '~/.local/share/revloop',
    description: 'Workspace root holding repo/ and worktree/'
  },
  'sync.interval': {
    type: 'number',
    default: 900,
    description: 'Seconds between two sync ticks'
  },
  'sync.auto_apply': {
    type: 'boolean',
    default: true,
    description: 'Run the apply command on worktrees waiting only for tasks'
  },
  'sync.apply_requirement': {
    type: 'string',
    default: 'tasks',
    description: 'Artifact that must be the sole remaining requirement before apply'
  },
  'sync.apply_command': {
    type: 'string',
    default: 'opsx-apply',
    description: 'Agent command run by the apply step'
  },
  'forge.api_url': {
    type: 'string',
    default: 'https://api.github.com',
    description: 'REST API base URL'
  },
  'forge.host': {
    type: 'string',
    default: 'github.com',
    description: 'Host used for SSH clone URLs'
  },
  'forge.token_env': {
    type: 'string',
    default: 'GITHUB_TOKEN',
    description: 'Environment variable holding the API token'
  },
  'forge.rate_limit': {
    type: 'number',
    default: 5,
    description: 'Maximum API requests per second'
  },
  'forge.timeout': {
    type: 'number',
    default: 30,
    description: 'API request timeout in seconds'
  },
  'tools.git': {
    type: 'string',
    default: 'git',
    description: 'Version-control binary'
  },
  'tools.change_tracker': {
    type: 'string',
    default: 'openspec',
    description: 'Change-tracking tool binary'
  },
  'tools.change_tracker_label': {
    type: 'string',
    default: 'OpenSpec',
    description: 'Change-tracking tool name shown in status labels'
  },
  'tools.agent': {
    type: 'string',
    default: 'opencode',
    description: 'Execution agent binary'
  },
  'agent.model': {
    type: 'optional-string',
    default: '',
    description: 'Default agent model (empty = agent default)'
  },
  'logging.level': {
    type: 'enum',
    default: 'info',
    values: LOG_LEVELS,
    description: 'Minimum log level'
  },
  'logging.file': {
    type: 'optional-string',
    default: '',
    description: 'Append logs to this file instead of stderr'
  }
};

// ============================================================================
// CONFIG STATE
// ============================================================================

let _config: RevloopConfig | null = null;
let _values: Map<string, ConfigValue> | null = null;
let _configOverrides: Record<string, ConfigValue> = {};
let _configPath: string | null = null;

// ============================================================================
// CONFIG OVERRIDES
// ============================================================================

/**
 * Set config overrides from CLI flag
 * Called in revloop.ts before any config is loaded
 */
export function setConfigOverrides(overrides: Record<string, ConfigValue>): void {
  _configOverrides = { ..._configOverrides, ...overrides };
  clearConfigCache();
}

export function clearConfigOverrides(): void {
  _configOverrides = {};
  clearConfigCache();
}

/**
 * Parse a config override string: "key=value"
 * Handles type coercion based on schema
 */
export function parseConfigOverride(override: string): { key: string; value: ConfigValue } | null {
  const match = override.match(/^([^=]+)=(.*)$/);
  if (!match) {
    console.error(`Invalid config override format: ${override}`);
    console.error('Expected: key=value (e.g., sync.interval=60)');
    return null;
  }

  const [, key, rawValue] = match;
  const schema = CONFIG_SCHEMA[key];

  if (!schema) {
    console.error(`Unknown config key: ${key}`);
    console.error(`Available keys: ${Object.keys(CONFIG_SCHEMA).join(', ')}`);
    return null;
  }

  switch (schema.type) {
    case 'boolean':
      return { key, value: rawValue.toLowerCase() === 'true' || rawValue === '1' };
    case 'number': {
      const value = Number(rawValue);
      if (rawValue.trim() === '' || isNaN(value)) {
        console.error(`Invalid number for ${key}: ${rawValue}`);
        return null;
      }
      return { key, value };
    }
    case 'enum':
      if (schema.values && !schema.values.includes(rawValue)) {
        console.error(`Invalid value for ${key}: ${rawValue}`);
        console.error(`Valid values: ${schema.values.join(', ')}`);
        return null;
      }
      return { key, value: rawValue };
    default:
      return { key, value: rawValue };
  }
}

// ============================================================================
// CONFIG NESTED ACCESS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten a parsed YAML document into dot-notation keys
 */
export function flattenConfig(source: unknown, prefix = ''): Map<string, unknown> {
  const flat = new Map<string, unknown>();
  if (!isRecord(source)) return flat;

  for (const [name, value] of Object.entries(source)) {
    const key = prefix ? `${prefix}.${name}` : name;
    if (isRecord(value)) {
      for (const [nestedKey, nestedValue] of flattenConfig(value, key)) {
        flat.set(nestedKey, nestedValue);
      }
    } else {
      flat.set(key, value);
    }
  }
  return flat;
}

// ============================================================================
// CONFIG LOADING & VALIDATION
// ============================================================================

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return value;
}

/**
 * Use this config file instead of the environment or default location
 */
export function setConfigPath(configPath: string | null): void {
  _configPath = configPath;
  clearConfigCache();
}

/**
 * Get config file path
 */
export function getConfigPath(): string {
  const configured = _configPath || process.env[CONFIG_ENV];
  if (configured) return path.resolve(expandHome(configured));
  return path.join(os.homedir(), '.config', 'revloop', 'config.yaml');
}

/**
 * Check a value against its schema entry, falling back to the default
 */
export function validateValue(key: string, schema: ConfigSchemaEntry, value: unknown): ConfigValue {
  switch (schema.type) {
    case 'boolean':
      if (typeof value === 'boolean') return value;
      console.error(`Warning: ${key} should be boolean, got ${typeof value}`);
      return schema.default;
    case 'number':
      if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
      console.error(`Warning: ${key} should be positive number, got ${String(value)}`);
      return schema.default;
    case 'string':
      if (typeof value === 'string' && value.trim() !== '') return value;
      console.error(`Warning: ${key} should be non-empty string, got ${typeof value}`);
      return schema.default;
    case 'optional-string':
      if (value === null) return '';
      if (typeof value === 'string') return value;
      console.error(`Warning: ${key} should be string, got ${typeof value}`);
      return schema.default;
    case 'enum':
      if (typeof value === 'string' && schema.values?.includes(value)) return value;
      console.error(`Warning: Invalid ${key} '${String(value)}'. Valid: ${(schema.values ?? []).join(', ')}`);
      return schema.default;
  }
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) return {};
  try {
    const content = fs.readFileSync(configPath, 'utf8');
    return yaml.load(content) ?? {};
  } catch (e) {
    console.error(`Warning: Could not parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
}

/**
 * Effective value of every schema key: CLI override, then file, then default
 */
export function loadConfigValues(): Map<string, ConfigValue> {
  if (_values) return _values;

  const fromFile = flattenConfig(readConfigFile(getConfigPath()));
  for (const key of fromFile.keys()) {
    if (!CONFIG_SCHEMA[key]) {
      console.error(`Warning: Unknown config key ${key} (ignored)`);
    }
  }

  const values = new Map<string, ConfigValue>();
  for (const [key, schema] of Object.entries(CONFIG_SCHEMA)) {
    const raw = key in _configOverrides ? _configOverrides[key] : fromFile.get(key);
    values.set(key, raw === undefined ? schema.default : validateValue(key, schema, raw));
  }

  _values = values;
  return values;
}

function stringValue(values: Map<string, ConfigValue>, key: string): string {
  const value = values.get(key);
  return typeof value === 'string' ? value : String(CONFIG_SCHEMA[key].default);
}

function numberValue(values: Map<string, ConfigValue>, key: string): number {
  const value = values.get(key);
  return typeof value === 'number' ? value : Number(CONFIG_SCHEMA[key].default);
}

function booleanValue(values: Map<string, ConfigValue>, key: string): boolean {
  const value = values.get(key);
  return typeof value === 'boolean' ? value : Boolean(CONFIG_SCHEMA[key].default);
}

function logLevelValue(values: Map<string, ConfigValue>, key: string): LogLevel {
  const value = values.get(key);
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

/**
 * Load configuration from file
 * Merges with defaults, validates values, applies CLI overrides
 */
export function loadConfig(): RevloopConfig {
  if (_config) return _config;
  const values = loadConfigValues();

  _config = {
    workspace: {
      dir: expandHome(stringValue(values, 'workspace.dir'))
    },
    sync: {
      interval: numberValue(values, 'sync.interval'),
      auto_apply: booleanValue(values, 'sync.auto_apply'),
      apply_requirement: stringValue(values, 'sync.apply_requirement'),
      apply_command: stringValue(values, 'sync.apply_command')
    },
    forge: {
      api_url: stringValue(values, 'forge.api_url'),
      host: stringValue(values, 'forge.host'),
      token_env: stringValue(values, 'forge.token_env'),
      rate_limit: numberValue(values, 'forge.rate_limit'),
      timeout: numberValue(values, 'forge.timeout')
    },
    tools: {
      git: stringValue(values, 'tools.git'),
      change_tracker: stringValue(values, 'tools.change_tracker'),
      change_tracker_label: stringValue(values, 'tools.change_tracker_label'),
      agent: stringValue(values, 'tools.agent')
    },
    agent: {
      model: stringValue(values, 'agent.model')
    },
    logging: {
      level: logLevelValue(values, 'logging.level'),
      file: expandHome(stringValue(values, 'logging.file'))
    }
  };
  return _config;
}

/**
 * Clear config cache (for testing or after config changes)
 */
export function clearConfigCache(): void {
  _config = null;
  _values = null;
}

/**
 * Check if config file exists
 */
export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

/**
 * Get a specific config value by dot-notation key
 */
export function getConfigValue(key: string): ConfigValue | undefined {
  return loadConfigValues().get(key);
}

/**
 * Get all config values with schema info for display
 */
export function getConfigDisplay(): ConfigDisplayItem[] {
  const values = loadConfigValues();
  const result: ConfigDisplayItem[] = [];

  for (const [key, schema] of Object.entries(CONFIG_SCHEMA)) {
    const value = values.get(key) ?? schema.default;
    result.push({
      key,
      value,
      default: schema.default,
      description: schema.description,
      type: schema.type,
      values: schema.values,
      isDefault: value === schema.default
    });
  }

  return result;
}
