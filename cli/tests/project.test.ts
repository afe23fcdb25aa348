import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Project, searchByName, validateWorktreeName } from '../lib/project.js';
import { InvalidOriginError, UsageError } from '../lib/errors.js';
import { makeTools, scriptedRunner, silentLogger, toolFailure, type RecordedCall } from './helpers.js';

let root: string;
let repoPath: string;
let worktreePath: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'revloop-project-'));
  repoPath = path.join(root, 'repo', 'widgets');
  worktreePath = path.join(root, 'worktree', 'widgets');
  fs.mkdirSync(repoPath, { recursive: true });
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

/**
 * git creates worktree directories, the tracker reports no active change
 */
function fakeTools(overrides: (call: RecordedCall) => string | undefined = () => undefined) {
  const logger = silentLogger();
  const runner = scriptedRunner(call => {
    const answer = overrides(call);
    if (answer !== undefined) return answer;
    if (call.file === 'git' && call.args[0] === 'worktree' && call.args[1] === 'add') {
      fs.mkdirSync(call.args[2], { recursive: true });
    }
    if (call.file === 'git' && call.args[0] === 'remote') return 'git@github.com:acme/widgets.git\n';
    if (call.file === 'openspec' && call.args[0] === 'list') return '{"changes":[]}';
    return '';
  });
  return { runner, logger, tools: makeTools(runner.run, logger) };
}

function newProject(tools: ReturnType<typeof fakeTools>['tools']): Project {
  return new Project('acme', 'widgets', repoPath, worktreePath, tools);
}

describe('searchByName', () => {
  const list = ['alpha', 'delta', 'kappa'].map(name => ({ name }));

  it('finds present names', () => {
    expect(searchByName(list, 'delta')).toEqual({ found: true, index: 1 });
  });

  it('reports insertion points', () => {
    expect(searchByName(list, 'aaa')).toEqual({ found: false, index: 0 });
    expect(searchByName(list, 'beta')).toEqual({ found: false, index: 1 });
    expect(searchByName(list, 'zeta')).toEqual({ found: false, index: 3 });
    expect(searchByName([], 'x')).toEqual({ found: false, index: 0 });
  });
});

describe('validateWorktreeName', () => {
  it.each(['', '  ', '.', '..', 'a/b'])('rejects %j', (name) => {
    expect(() => validateWorktreeName(name)).toThrow(UsageError);
  });

  it('accepts branch-like names', () => {
    expect(() => validateWorktreeName('feature-login_2')).not.toThrow();
  });
});

describe('Project', () => {
  it('reads its identity from the origin remote', async () => {
    const { tools, runner } = fakeTools();
    const project = await Project.fromCheckout(repoPath, worktreePath, tools);

    expect(project.title()).toBe('acme/widgets');
    expect(project.filterKey()).toBe('acme/widgets');
    expect(project.description()).toBe(repoPath);
    expect(runner.lines()).toEqual([`${repoPath}$ git remote get-url origin`]);
  });

  it('rejects a checkout with a local origin', async () => {
    const { tools } = fakeTools(call => (call.args[0] === 'remote' ? '/srv/git/widgets\n' : undefined));
    await expect(Project.fromCheckout(repoPath, worktreePath, tools)).rejects.toThrow(InvalidOriginError);
  });

  it('has no worktrees when the worktree directory is missing', async () => {
    const project = newProject(fakeTools().tools);
    await project.refresh();
    expect(project.worktrees).toEqual([]);
  });

  it('rebuilds worktrees from disk in name order', async () => {
    for (const name of ['zeta', 'alpha', 'Mid']) {
      fs.mkdirSync(path.join(worktreePath, name), { recursive: true });
    }
    fs.writeFileSync(path.join(worktreePath, 'notes.txt'), 'not a worktree');

    const project = newProject(fakeTools().tools);
    await project.refresh();

    expect(project.worktrees.map(w => w.name)).toEqual(['Mid', 'alpha', 'zeta']);
    expect(project.worktrees.map(w => w.description())).toEqual(['Ready For Change', 'Ready For Change', 'Ready For Change']);
    expect(project.findWorktree('alpha')?.path).toBe(path.join(worktreePath, 'alpha'));
    expect(project.findWorktree('beta')).toBeUndefined();
  });

  it('keeps the previous set when the scan fails', async () => {
    fs.mkdirSync(path.join(worktreePath, 'alpha'), { recursive: true });
    const project = newProject(fakeTools().tools);
    await project.refresh();

    fs.rmSync(worktreePath, { recursive: true });
    fs.writeFileSync(worktreePath, 'not a directory');

    await expect(project.refresh()).rejects.toThrow(/ENOTDIR/);
    expect(project.worktrees.map(w => w.name)).toEqual(['alpha']);
  });

  it('adds a worktree, initializes tracking and keeps the order', async () => {
    const { tools, runner, logger } = fakeTools();
    const project = newProject(tools);
    await project.addWorktree('zeta');
    const added = await project.addWorktree('beta', 'test/model-x');

    expect(project.worktrees.map(w => w.name)).toEqual(['beta', 'zeta']);
    expect(added.model).toBe('test/model-x');
    expect(added.description()).toBe('Ready For Change');

    const betaPath = path.join(worktreePath, 'beta');
    expect(runner.lines().slice(-3)).toEqual([
      `${repoPath}$ git worktree add ${betaPath}`,
      `${betaPath}$ openspec init --tools opencode --force`,
      `${betaPath}$ openspec list --json`
    ]);
    expect(logger.info).toHaveBeenCalledWith('Worktree added', { project: 'acme/widgets', worktree: 'beta' });
  });

  it('adds nothing when git fails', async () => {
    const { tools, runner } = fakeTools(call => {
      if (call.args[0] === 'worktree') throw toolFailure(call, "fatal: 'feature' is already checked out");
      return undefined;
    });
    const project = newProject(tools);

    await expect(project.addWorktree('feature')).rejects.toThrow("fatal: 'feature' is already checked out");
    expect(project.worktrees).toEqual([]);
    expect(runner.calls.some(call => call.file === 'openspec')).toBe(false);
  });

  it('keeps a worktree whose tracker init fails', async () => {
    const { tools, logger } = fakeTools(call => {
      if (call.file === 'openspec') throw toolFailure(call, 'openspec: command not found');
      return undefined;
    });
    const project = newProject(tools);

    const added = await project.addWorktree('feature');
    expect(project.worktrees).toHaveLength(1);
    expect(added.description()).toBe('No OpenSpec setup');
    expect(logger.warn).toHaveBeenCalledWith('Change tracker init failed', {
      worktree: path.join(worktreePath, 'feature'),
      error: 'Command exited with code 1: openspec init --tools opencode --force\nopenspec: command not found'
    });
  });

  it('validates the name before touching git', async () => {
    const { tools, runner } = fakeTools();
    await expect(newProject(tools).addWorktree('../escape')).rejects.toThrow(UsageError);
    expect(runner.calls).toEqual([]);
  });

  it('deletes a worktree by name', async () => {
    const { tools, runner } = fakeTools();
    const project = newProject(tools);
    await project.addWorktree('alpha');
    await project.addWorktree('beta');

    const removed = await project.deleteWorktree('alpha');
    expect(removed.name).toBe('alpha');
    expect(project.worktrees.map(w => w.name)).toEqual(['beta']);
    expect(runner.lines().at(-1)).toBe(`${repoPath}$ git worktree remove ${path.join(worktreePath, 'alpha')} --force`);
  });

  it('refuses to delete an unknown worktree', async () => {
    const { tools, runner } = fakeTools();
    await expect(newProject(tools).deleteWorktree('ghost')).rejects.toThrow("Worktree 'ghost' not found in acme/widgets");
    expect(runner.calls).toEqual([]);
  });

  it('keeps the worktree when git cannot remove it', async () => {
    const { tools } = fakeTools(call => {
      if (call.args[1] === 'remove') throw toolFailure(call);
      return undefined;
    });
    const project = newProject(tools);
    await project.addWorktree('alpha');

    await expect(project.deleteWorktree('alpha')).rejects.toThrow('git worktree remove');
    expect(project.worktrees.map(w => w.name)).toEqual(['alpha']);
  });

  it('remembers a worktree model across refreshes', async () => {
    const project = newProject(fakeTools().tools);
    await project.addWorktree('alpha', 'test/model-x');
    await project.refresh();
    expect(project.findWorktree('alpha')?.model).toBe('test/model-x');
  });

  it('pulls in the checkout', async () => {
    const { tools, runner } = fakeTools();
    await newProject(tools).pull();
    expect(runner.lines()).toEqual([`${repoPath}$ git pull`]);
  });
});
