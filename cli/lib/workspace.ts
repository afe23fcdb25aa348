/**
 * Workspace
 *
 * Layout:
 *   <root>/repo/<dir>             checkouts
 *   <root>/worktree/<dir>/<name>  worktrees of each checkout
 *
 * Nothing is persisted: every load re-scans the directories.
 */
import fs from 'fs';
import path from 'path';
import { Project } from './project.js';
import { errorMessage, UsageError } from './errors.js';
import { sshCloneUrl } from './origin.js';
import type { ReviewCache } from './review-cache.js';
import type { EngineTools } from './types/workspace.js';

export const DEFAULT_FORGE_HOST = 'github.com';

export class Workspace {
  readonly repoDir: string;
  readonly worktreeDir: string;

  constructor(
    readonly root: string,
    private readonly tools: EngineTools,
    private readonly cache: ReviewCache,
    private readonly forgeHost = DEFAULT_FORGE_HOST
  ) {
    this.repoDir = path.join(root, 'repo');
    this.worktreeDir = path.join(root, 'worktree');
  }

  async bootstrap(): Promise<void> {
    await fs.promises.mkdir(this.repoDir, { recursive: true });
    await fs.promises.mkdir(this.worktreeDir, { recursive: true });
  }

  /**
   * Every checkout whose origin parses, with its worktrees refreshed
   */
  async loadProjects(): Promise<Project[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.repoDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    const projects: Project[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const project = await this.loadProject(entry.name);
      if (project) projects.push(project);
    }
    return projects;
  }

  private async loadProject(dir: string): Promise<Project | null> {
    const repoPath = path.join(this.repoDir, dir);
    try {
      const project = await Project.fromCheckout(repoPath, path.join(this.worktreeDir, dir), this.tools);
      await project.refresh();
      return project;
    } catch (error) {
      this.tools.logger.warn('Skipping checkout', { path: repoPath, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Look a project up by `owner/repo`
   */
  async findProject(name: string): Promise<Project> {
    const projects = await this.loadProjects();
    const project = projects.find(candidate => candidate.filterKey() === name);
    if (!project) {
      throw new UsageError(`Project '${name}' not found in ${this.repoDir}`);
    }
    return project;
  }

  async clone(owner: string, repo: string): Promise<Project> {
    await this.bootstrap();
    const repoPath = path.join(this.repoDir, repo);
    if (fs.existsSync(repoPath)) {
      throw new UsageError(`Checkout already exists: ${repoPath}`);
    }

    await this.tools.git.clone(this.repoDir, sshCloneUrl(this.forgeHost, owner, repo));
    this.tools.logger.info('Project cloned', { project: `${owner}/${repo}`, path: repoPath });

    const project = await Project.fromCheckout(repoPath, path.join(this.worktreeDir, repo), this.tools);
    await project.refresh();
    return project;
  }

  /**
   * Remove a checkout and all of its worktrees from disk
   */
  async deleteProject(project: Project): Promise<void> {
    for (const worktree of project.worktrees) {
      this.cache.removeWorktree(worktree.path);
    }
    await fs.promises.rm(project.worktreePath, { recursive: true, force: true });
    await fs.promises.rm(project.repoPath, { recursive: true, force: true });
    this.tools.logger.info('Project deleted', { project: project.title() });
  }

  async removeWorktree(project: Project, name: string): Promise<void> {
    const worktree = await project.deleteWorktree(name);
    this.cache.removeWorktree(worktree.path);
  }
}
