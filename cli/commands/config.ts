/**
 * Config commands - Configuration management
 */
import fs from 'fs';
import path from 'path';
import type { Command } from 'commander';
import {
  CONFIG_SCHEMA,
  configExists,
  getConfigDisplay,
  getConfigPath
} from '../managers/config-manager.js';
import type { ConfigDisplayItem, ConfigSchemaEntry } from '../lib/types/config.js';
import { fail, jsonOut, type JsonOptions } from './helpers.js';

interface InitOptions {
  force?: boolean;
}

function groupBySection<T extends { key: string }>(items: readonly T[]): Record<string, T[]> {
  const sections: Record<string, T[]> = {};
  for (const item of items) {
    const [section] = item.key.split('.');
    if (!sections[section]) sections[section] = [];
    sections[section].push(item);
  }
  return sections;
}

/**
 * Default config file content generated from the schema
 */
export function renderConfigTemplate(): string {
  const lines = ['# revloop configuration', '# Generated from schema - edit as needed', ''];
  const entries: Array<ConfigSchemaEntry & { key: string }> = Object.entries(CONFIG_SCHEMA)
    .map(([key, entry]) => ({ key, ...entry }));

  for (const [section, items] of Object.entries(groupBySection(entries))) {
    lines.push(`${section}:`);
    for (const item of items) {
      lines.push(`  # ${item.description}`);
      if (item.values) {
        lines.push(`  # Valid: ${item.values.join(', ')}`);
      }
      const value = typeof item.default === 'string' ? JSON.stringify(item.default) : String(item.default);
      lines.push(`  ${item.key.split('.').slice(1).join('.')}: ${value}`);
      lines.push('');
    }
  }
  return lines.join('\n');
}

/**
 * Register config commands
 */
export function registerConfigCommands(program: Command): void {
  const config = program.command('config').description('Configuration management (show, init)');

  // config:show
  config.command('show')
    .description('Show effective configuration')
    .option('--json', 'JSON output')
    .action((options: JsonOptions) => {
      try {
        const display = getConfigDisplay();

        if (options.json) {
          jsonOut({ configFile: getConfigPath(), configExists: configExists(), settings: display });
          return;
        }

        console.log('# revloop configuration\n');
        console.log(`# config_file: ${getConfigPath()} ${configExists() ? '✓' : '(using defaults)'}`);

        const sections: Record<string, ConfigDisplayItem[]> = groupBySection(display);
        for (const [section, items] of Object.entries(sections)) {
          console.log(`\n${section}:`);
          for (const item of items) {
            const keyName = item.key.split('.').slice(1).join('.');
            const marker = item.isDefault ? '' : '  # (custom)';
            const valuesHint = item.values ? ` [${item.values.join('|')}]` : '';
            console.log(`  # ${item.description}${valuesHint}`);
            console.log(`  ${keyName}: ${String(item.value)}${marker}`);
          }
        }
      } catch (error) {
        fail(error, options.json);
      }
    });

  // config:init
  config.command('init')
    .description('Generate config.yaml from schema with defaults')
    .option('--force', 'Overwrite existing config.yaml')
    .action((options: InitOptions) => {
      const configPath = getConfigPath();

      if (fs.existsSync(configPath) && !options.force) {
        console.error(`config.yaml already exists: ${configPath}`);
        console.error('Use --force to overwrite');
        process.exit(1);
      }

      try {
        fs.mkdirSync(path.dirname(configPath), { recursive: true });
        fs.writeFileSync(configPath, renderConfigTemplate());
        console.log(`Created: ${configPath}`);
      } catch (error) {
        fail(error);
      }
    });
}
