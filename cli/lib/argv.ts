/**
 * Command-line preprocessing
 *
 * Global flags are pulled out before commander sees the arguments, and the
 * colon syntax is expanded: worktree:list → worktree list
 */
import { UsageError } from './errors.js';

export interface GlobalArgs {
  args: string[];
  configPath: string | null;
  /** Raw `key=value` strings, in order */
  overrides: string[];
}

/**
 * Remove every `<flag> <value>` pair from args, returning the values
 */
function takeFlag(args: string[], flag: string): string[] {
  const values: string[] = [];
  let idx = args.indexOf(flag);
  while (idx !== -1) {
    const value = args[idx + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} requires a value`);
    }
    values.push(value);
    args.splice(idx, 2);
    idx = args.indexOf(flag);
  }
  return values;
}

export function extractGlobalArgs(argv: readonly string[]): GlobalArgs {
  const args = [...argv];
  const configPaths = takeFlag(args, '--config');
  const overrides = takeFlag(args, '--with-config');
  return { args, configPath: configPaths.at(-1) ?? null, overrides };
}

/**
 * Expand the first `group:command` argument into two arguments
 */
export function expandColonSyntax(args: readonly string[]): string[] {
  let commandExpanded = false;
  return args.flatMap(arg => {
    if (!commandExpanded && arg.includes(':') && !arg.startsWith('-') && !arg.includes('=')) {
      const parts = arg.split(':');
      // Only group:command with command-like names; URLs and paths pass through
      if (parts.length === 2 && /^[a-z-]+$/.test(parts[0]) && /^[a-z-]+$/.test(parts[1])) {
        commandExpanded = true;
        return parts;
      }
    }
    return [arg];
  });
}
