/**
 * Shared config-related types
 */
import type { LogLevel } from '../logger.js';

export type ConfigValueType = 'string' | 'optional-string' | 'number' | 'boolean' | 'enum';

export type ConfigValue = string | number | boolean;

export interface ConfigSchemaEntry {
  type: ConfigValueType;
  default: ConfigValue;
  description: string;
  values?: readonly string[];
}

export type ConfigSchema = Record<string, ConfigSchemaEntry>;

export interface ConfigDisplayItem {
  key: string;
  value: ConfigValue;
  default: ConfigValue;
  description: string;
  type: ConfigValueType;
  values?: readonly string[];
  isDefault: boolean;
}

export interface RevloopConfig {
  workspace: {
    dir: string;
  };
  sync: {
    interval: number;
    auto_apply: boolean;
    apply_requirement: string;
    apply_command: string;
  };
  forge: {
    api_url: string;
    host: string;
    token_env: string;
    rate_limit: number;
    timeout: number;
  };
  tools: {
    git: string;
    change_tracker: string;
    change_tracker_label: string;
    agent: string;
  };
  agent: {
    model: string;
  };
  logging: {
    level: LogLevel;
    file: string;
  };
}
