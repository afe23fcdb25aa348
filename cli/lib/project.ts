/**
 * Project model
 *
 * A repository checkout plus the worktrees living under its worktree
 * directory. Worktrees are kept sorted by name; lookups use binary search.
 */
import fs from 'fs';
import path from 'path';
import { Worktree } from './worktree.js';
import { errorMessage, UsageError } from './errors.js';
import { parseOrigin } from './origin.js';
import type { EngineTools, ListItem } from './types/workspace.js';

interface SearchResult {
  found: boolean;
  index: number;
}

/**
 * Position of `name` in a name-sorted list, or where it would be inserted
 */
export function searchByName(list: readonly { name: string }[], name: string): SearchResult {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const current = list[mid].name;
    if (current === name) return { found: true, index: mid };
    if (current < name) low = mid + 1;
    else high = mid;
  }
  return { found: false, index: low };
}

export function validateWorktreeName(name: string): void {
  if (!name.trim()) {
    throw new UsageError('Worktree name must not be empty');
  }
  if (name === '.' || name === '..' || name.includes('/') || name.includes(path.sep)) {
    throw new UsageError(`Invalid worktree name '${name}'`);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class Project implements ListItem {
  private list: Worktree[] = [];

  constructor(
    readonly owner: string,
    readonly repo: string,
    readonly repoPath: string,
    readonly worktreePath: string,
    private readonly tools: EngineTools
  ) {}

  /**
   * Build a project from a checkout, reading its identity from the origin remote
   */
  static async fromCheckout(repoPath: string, worktreePath: string, tools: EngineTools): Promise<Project> {
    const origin = await tools.git.remoteOrigin(repoPath);
    const { owner, repo } = parseOrigin(origin);
    return new Project(owner, repo, repoPath, worktreePath, tools);
  }

  get worktrees(): readonly Worktree[] {
    return this.list;
  }

  title(): string {
    return `${this.owner}/${this.repo}`;
  }

  description(): string {
    return this.repoPath;
  }

  filterKey(): string {
    return this.title();
  }

  findWorktree(name: string): Worktree | undefined {
    const { found, index } = searchByName(this.list, name);
    return found ? this.list[index] : undefined;
  }

  /**
   * Re-scan the worktree directory. The new set replaces the old one only
   * once every worktree has been rebuilt.
   */
  async refresh(): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.worktreePath, { withFileTypes: true });
    } catch (error) {
      if (!isMissing(error)) throw error;
      entries = [];
    }

    const next: Worktree[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const model = this.findWorktree(entry.name)?.model ?? '';
      const worktree = this.createWorktree(entry.name, model);
      await worktree.refresh();
      next.push(worktree);
    }
    next.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    this.list = next;
  }

  async addWorktree(name: string, model = ''): Promise<Worktree> {
    validateWorktreeName(name);
    const { git, tracker, agent, logger } = this.tools;
    const worktreePath = path.join(this.worktreePath, name);

    await fs.promises.mkdir(this.worktreePath, { recursive: true });
    await git.addWorktree(this.repoPath, worktreePath);

    try {
      await tracker.init(worktreePath, agent.bin);
    } catch (error) {
      logger.warn('Change tracker init failed', { worktree: worktreePath, error: errorMessage(error) });
    }

    const worktree = this.createWorktree(name, model);
    await worktree.refresh();

    const { found, index } = searchByName(this.list, name);
    this.list.splice(index, found ? 1 : 0, worktree);
    logger.info('Worktree added', { project: this.title(), worktree: name });
    return worktree;
  }

  async deleteWorktree(name: string): Promise<Worktree> {
    const { found, index } = searchByName(this.list, name);
    if (!found) {
      throw new UsageError(`Worktree '${name}' not found in ${this.title()}`);
    }
    const worktree = this.list[index];

    await this.tools.git.removeWorktree(this.repoPath, worktree.path);

    // the list may have been swapped by a refresh while git ran
    const current = searchByName(this.list, name);
    if (current.found) {
      this.list.splice(current.index, 1);
    }
    this.tools.logger.info('Worktree removed', { project: this.title(), worktree: name });
    return worktree;
  }

  async pull(): Promise<void> {
    await this.tools.git.pull(this.repoPath);
  }

  private createWorktree(name: string, model: string): Worktree {
    return new Worktree(name, path.join(this.worktreePath, name), this.owner, this.repo, this.tools, model);
  }
}
