/**
 * Worktree commands for revloop CLI
 * One worktree per branch, reviewed and applied by the execution agent
 */
import type { Command } from 'commander';
import { getReviewCache, getReviewClient, getWorkspace } from '../managers/engine-manager.js';
import { loadConfig } from '../managers/config-manager.js';
import { UsageError } from '../lib/errors.js';
import type { Project } from '../lib/project.js';
import type { Worktree } from '../lib/worktree.js';
import { fail, formatList, jsonOut, type JsonOptions } from './helpers.js';

interface AddOptions {
  model?: string;
}

async function resolveWorktree(projectName: string, name: string): Promise<{ project: Project; worktree: Worktree }> {
  const project = await getWorkspace().findProject(projectName);
  const worktree = project.findWorktree(name);
  if (!worktree) {
    throw new UsageError(`Worktree '${name}' not found in ${project.title()}`);
  }
  return { project, worktree };
}

/**
 * Register worktree commands
 */
export function registerWorktreeCommands(program: Command): void {
  const worktree = program.command('worktree').description('Worktrees of a project');

  // worktree:list
  worktree.command('list <project>')
    .description('List worktrees with their change status')
    .option('--json', 'JSON output')
    .action(async (projectName: string, options: JsonOptions) => {
      try {
        const project = await getWorkspace().findProject(projectName);

        if (options.json) {
          jsonOut(project.worktrees.map(w => ({
            name: w.name,
            path: w.path,
            label: w.description(),
            status: w.status
          })));
          return;
        }

        if (project.worktrees.length === 0) {
          console.log(`No worktrees in ${project.worktreePath}`);
          return;
        }
        console.log(`${project.title()}:\n`);
        for (const line of formatList(project.worktrees)) console.log(line);
      } catch (error) {
        fail(error, options.json);
      }
    });

  // worktree:add
  worktree.command('add <project> <name>')
    .description('Create a worktree for branch <name> and initialize change tracking')
    .option('--model <model>', 'Agent model for this worktree')
    .action(async (projectName: string, name: string, options: AddOptions) => {
      try {
        const project = await getWorkspace().findProject(projectName);
        const created = await project.addWorktree(name, options.model ?? loadConfig().agent.model);
        console.log(`Created ${created.path} (${created.description()})`);
      } catch (error) {
        fail(error);
      }
    });

  // worktree:remove
  worktree.command('remove <project> <name>')
    .description('Force-remove a worktree and drop its cached reviews')
    .action(async (projectName: string, name: string) => {
      try {
        const workspace = getWorkspace();
        const project = await workspace.findProject(projectName);
        await workspace.removeWorktree(project, name);
        console.log(`Removed ${name} from ${project.title()}`);
      } catch (error) {
        fail(error);
      }
    });

  // worktree:review
  worktree.command('review <project> <name>')
    .description('Hand the open pull request review to the agent, amend and force-push')
    .action(async (projectName: string, name: string) => {
      try {
        const { worktree: target } = await resolveWorktree(projectName, name);
        const outcome = await target.review(getReviewClient(), getReviewCache());
        if (outcome.kind === 'none') {
          console.log('Nothing to review');
          return;
        }
        console.log(`Addressed ${outcome.commentCount} comment(s) on #${outcome.unitNumber}`);
      } catch (error) {
        fail(error);
      }
    });
}
