/**
 * Change-Status Reader
 *
 * Talks to the external change-tracking tool (openspec by default) inside a
 * worktree and normalizes its JSON into a Status.
 *
 * PURE LIB: No config access, no manager imports.
 * Tool binary and display label are constructor parameters.
 */
import { z } from 'zod';
import { runJson, type CommandRunner } from './exec.js';
import type { Logger } from './logger.js';
import type { Status } from './types/status.js';
import { errorMessage } from './errors.js';

const stringList = z.array(z.string()).nullish().transform(list => list ?? []);

const changeListSchema = z.object({
  changes: z.array(z.object({ name: z.string() })).nullish().transform(list => list ?? [])
});

const statusSchema = z.object({
  changeName: z.string(),
  isComplete: z.boolean(),
  applyRequires: stringList,
  artifacts: z.array(z.object({
    id: z.string(),
    outputPath: z.string().nullish().transform(value => value ?? ''),
    status: z.string(),
    missingDeps: stringList
  })).nullish().transform(list => list ?? [])
});

/**
 * Status reported when the tool lists no incomplete change
 */
export function noActiveChange(): Status {
  return { changeName: '', isComplete: false, applyRequires: [], artifacts: [] };
}

/**
 * Run `fn`, turning any failure into null.
 * Keeps "never aborts a refresh" visible where it is used.
 */
export async function attempt<T>(fn: () => Promise<T>, onError: (error: unknown) => void): Promise<T | null> {
  try {
    return await fn();
  } catch (error) {
    onError(error);
    return null;
  }
}

export class ChangeTracker {
  constructor(
    private readonly run: CommandRunner,
    private readonly logger: Logger,
    readonly bin = 'openspec',
    readonly label = 'OpenSpec'
  ) {}

  /**
   * Names of all changes known in a worktree, in listing order
   */
  async listChanges(worktreePath: string): Promise<string[]> {
    const list = await runJson(this.run, this.bin, ['list', '--json'], worktreePath, changeListSchema);
    return list.changes.map(change => change.name);
  }

  async showChange(worktreePath: string, changeName: string): Promise<Status> {
    return runJson(this.run, this.bin, ['status', '--change', changeName, '--json'], worktreePath, statusSchema);
  }

  /**
   * First incomplete change of a worktree, or null when the tool fails
   */
  async deriveStatus(worktreePath: string): Promise<Status | null> {
    return attempt(
      async () => {
        const changes = await this.listChanges(worktreePath);
        for (const change of changes) {
          const status = await this.showChange(worktreePath, change);
          if (!status.isComplete) return status;
        }
        return noActiveChange();
      },
      error => this.logger.debug('Status derivation failed', { worktree: worktreePath, error: errorMessage(error) })
    );
  }

  /**
   * Bootstrap an empty tracking session for the given agent tool
   */
  async init(worktreePath: string, agentTool: string): Promise<void> {
    await this.run(this.bin, ['init', '--tools', agentTool, '--force'], worktreePath);
  }
}

/**
 * Human label for a status, first matching rule wins
 */
export function describeStatus(status: Status | null, trackerLabel = 'OpenSpec'): string {
  if (!status) return `No ${trackerLabel} setup`;
  if (!status.changeName) return 'Ready For Change';
  if (status.isComplete) return 'Ready For Review';
  if (status.applyRequires.length === 0) return 'Ready For Apply';
  return `Pending – ${status.applyRequires.join(', ')}`;
}
