/**
 * Command helpers
 *
 * Output and error handling shared by every command group.
 */
import { errorMessage, UsageError } from '../lib/errors.js';
import type { RepoIdentity } from '../lib/origin.js';
import type { ListItem } from '../lib/types/workspace.js';

export interface JsonOptions {
  json?: boolean;
}

export function jsonOut(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Report a command failure and exit 1
 */
export function fail(error: unknown, json = false): never {
  const message = errorMessage(error);
  if (json) {
    console.log(JSON.stringify({ error: message }));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}

/**
 * Two aligned columns: title and description
 */
export function formatList(items: readonly ListItem[]): string[] {
  const width = Math.max(0, ...items.map(item => item.title().length));
  return items.map(item => `  ${item.title().padEnd(width)}  ${item.description()}`);
}

/**
 * Split `owner/repo`
 */
export function parseProjectName(name: string): RepoIdentity {
  const parts = name.split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new UsageError(`Expected <owner>/<repo>, got '${name}'`);
  }
  return { owner: parts[0], repo: parts[1] };
}
