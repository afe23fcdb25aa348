/**
 * Shared workspace model types
 */
import type { ExecutionAgent } from '../agent.js';
import type { ChangeTracker } from '../change-status.js';
import type { Git } from '../git.js';
import type { Logger } from '../logger.js';

/**
 * Anything a list view can render: projects and worktrees alike
 */
export interface ListItem {
  title(): string;
  description(): string;
  filterKey(): string;
}

export type ReviewOutcome =
  | { kind: 'none' }
  | { kind: 'applied'; unitNumber: number; commentCount: number };

/**
 * Tool wrappers shared by every project and worktree of a workspace
 */
export interface EngineTools {
  git: Git;
  tracker: ChangeTracker;
  agent: ExecutionAgent;
  logger: Logger;
}
