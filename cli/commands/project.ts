/**
 * Project commands for revloop CLI
 */
import type { Command } from 'commander';
import { getLogger, getWorkspace } from '../managers/engine-manager.js';
import { fail, formatList, jsonOut, parseProjectName, type JsonOptions } from './helpers.js';

/**
 * Register project commands
 */
export function registerProjectCommands(program: Command): void {
  const project = program.command('project').description('Repository checkouts in the workspace');

  // project:list
  project.command('list')
    .description('List projects with their checkout path')
    .option('--json', 'JSON output')
    .action(async (options: JsonOptions) => {
      try {
        const projects = await getWorkspace().loadProjects();

        if (options.json) {
          jsonOut(projects.map(p => ({
            owner: p.owner,
            repo: p.repo,
            repoPath: p.repoPath,
            worktreePath: p.worktreePath,
            worktrees: p.worktrees.map(w => w.name)
          })));
          return;
        }

        if (projects.length === 0) {
          console.log(`No projects in ${getWorkspace().repoDir}`);
          return;
        }
        console.log('Projects:\n');
        for (const line of formatList(projects)) console.log(line);
      } catch (error) {
        fail(error, options.json);
      }
    });

  // project:clone
  project.command('clone <owner> <repo>')
    .description('Clone a repository into the workspace over SSH')
    .action(async (owner: string, repo: string) => {
      try {
        const created = await getWorkspace().clone(owner, repo);
        console.log(`Cloned ${created.title()} into ${created.repoPath}`);
      } catch (error) {
        fail(error);
      }
    });

  // project:delete
  project.command('delete <project>')
    .description('Delete a checkout and all of its worktrees (owner/repo)')
    .action(async (name: string) => {
      try {
        parseProjectName(name);
        const workspace = getWorkspace();
        const target = await workspace.findProject(name);
        await workspace.deleteProject(target);
        getLogger().debug('Project removed from disk', { repoPath: target.repoPath });
        console.log(`Deleted ${target.title()}`);
      } catch (error) {
        fail(error);
      }
    });
}
