#!/usr/bin/env node
/**
 * revloop CLI - Review and change synchronization across repository worktrees
 *
 * Command syntax:
 *   revloop <group>:<command> [options]   # Colon notation (preferred)
 *   revloop <group> <command> [options]   # Space notation (also works)
 *
 * Config file:
 *   1. --config <path> flag (highest priority)
 *   2. REVLOOP_CONFIG environment variable
 *   3. ~/.config/revloop/config.yaml
 *
 * Config overrides:
 *   --with-config key=value              # Override any config value (repeatable)
 *
 * Examples:
 *   revloop project:list
 *   revloop worktree:add acme/widgets feature-x --model github-copilot/gpt-4.1
 *   revloop review:github https://github.com/acme/widgets/pull/12
 *   revloop --with-config sync.interval=60 sync:start --now
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { program } from 'commander';
import { expandColonSyntax, extractGlobalArgs, type GlobalArgs } from './lib/argv.js';
import { parseConfigOverride, setConfigOverrides, setConfigPath } from './managers/config-manager.js';
import type { ConfigValue } from './lib/types/config.js';
import { registerProjectCommands } from './commands/project.js';
import { registerWorktreeCommands } from './commands/worktree.js';
import { registerReviewCommands } from './commands/review.js';
import { registerSyncCommands } from './commands/sync.js';
import { registerConfigCommands } from './commands/config.js';
import { fail } from './commands/helpers.js';

function getCliVersion(): string {
  const packageFile = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(packageFile, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (e) {
    console.error(`Warning: Could not read ${packageFile}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return '0.0.0';
}

function readGlobalArgs(): GlobalArgs {
  try {
    return extractGlobalArgs(process.argv.slice(2));
  } catch (error) {
    return fail(error);
  }
}

const globals = readGlobalArgs();

if (globals.configPath) {
  setConfigPath(globals.configPath);
}

const configOverrides: Record<string, ConfigValue> = {};
for (const override of globals.overrides) {
  const parsed = parseConfigOverride(override);
  if (!parsed) process.exit(1);
  configOverrides[parsed.key] = parsed.value;
}

if (Object.keys(configOverrides).length > 0) {
  console.error('Config overrides applied:');
  for (const [key, value] of Object.entries(configOverrides)) {
    console.error(`   ${key}=${String(value)}`);
  }
  console.error('');
  setConfigOverrides(configOverrides);
}

const expandedArgs = expandColonSyntax(globals.args);

// Setup program
program
  .name('revloop')
  .description('Review and change synchronization across repository worktrees\n\nSyntax: revloop <group>:<command> or revloop <group> <command>')
  .version(getCliVersion())
  .configureHelp({
    subcommandTerm: (cmd) => cmd.name()
  })
  .addHelpText('after', `
Global Options (before command):
  --config <path>            Config file (overrides REVLOOP_CONFIG)
  --with-config <key=value>  Override config value (repeatable)
`);

// Register command groups
registerProjectCommands(program);
registerWorktreeCommands(program);
registerReviewCommands(program);
registerSyncCommands(program);
registerConfigCommands(program);

if (expandedArgs.length === 0) {
  program.help();
}

program.parseAsync(['node', 'revloop', ...expandedArgs]).catch((error: unknown) => fail(error));
