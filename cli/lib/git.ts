/**
 * Git Operations
 *
 * Centralized git operations for the engine.
 * Every call goes through a CommandRunner, so failures surface as
 * ToolInvocationError with the command line, exit code and stderr.
 *
 * PURE LIB: No config access, no manager imports.
 */
import { runCommand, type CommandRunner } from './exec.js';

export class Git {
  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly bin = 'git'
  ) {}

  private exec(args: readonly string[], cwd: string): Promise<string> {
    return this.run(this.bin, args, cwd);
  }

  /**
   * URL of the origin remote of a checkout
   */
  async remoteOrigin(repoPath: string): Promise<string> {
    const output = await this.exec(['remote', 'get-url', 'origin'], repoPath);
    return output.trim();
  }

  /**
   * Create a worktree at `worktreePath` (branch named after its last segment)
   */
  async addWorktree(repoPath: string, worktreePath: string): Promise<void> {
    await this.exec(['worktree', 'add', worktreePath], repoPath);
  }

  async removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
    await this.exec(['worktree', 'remove', worktreePath, '--force'], repoPath);
  }

  async stageAll(cwd: string): Promise<void> {
    await this.exec(['add', '.'], cwd);
  }

  async amend(cwd: string): Promise<void> {
    await this.exec(['commit', '--amend', '--no-edit'], cwd);
  }

  async forcePush(cwd: string): Promise<void> {
    await this.exec(['push', '-f'], cwd);
  }

  async pull(cwd: string): Promise<void> {
    await this.exec(['pull'], cwd);
  }

  /**
   * Clone into `parentDir`, git picks the directory name
   */
  async clone(parentDir: string, url: string): Promise<void> {
    await this.exec(['clone', url], parentDir);
  }
}
