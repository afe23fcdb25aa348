/**
 * Worktree model
 *
 * One branch checked out under a project's worktree directory. Holds the
 * derived change status and drives the review and apply flows.
 */
import { describeStatus } from './change-status.js';
import { renderReview } from './review-format.js';
import type { ReviewCache } from './review-cache.js';
import type { ReviewSource } from './review-client.js';
import type { Status } from './types/status.js';
import type { EngineTools, ListItem, ReviewOutcome } from './types/workspace.js';

export const DEFAULT_APPLY_REQUIREMENT = 'tasks';
export const DEFAULT_APPLY_COMMAND = 'opsx-apply';

export class Worktree implements ListItem {
  status: Status | null = null;

  constructor(
    readonly name: string,
    readonly path: string,
    readonly owner: string,
    readonly repo: string,
    private readonly tools: EngineTools,
    /** Agent model, empty for the agent's default */
    public model = ''
  ) {}

  title(): string {
    return this.name;
  }

  description(): string {
    return describeStatus(this.status, this.tools.tracker.label);
  }

  filterKey(): string {
    return this.name;
  }

  async refresh(): Promise<void> {
    this.status = await this.tools.tracker.deriveStatus(this.path);
  }

  /**
   * Fetch the review of the branch's open unit and let the agent address it.
   * The rendered text stays cached until the amended commit is pushed.
   */
  async review(source: ReviewSource, cache: ReviewCache, signal?: AbortSignal): Promise<ReviewOutcome> {
    const units = await source.listAllOpenUnitsForBranch(this.owner, this.repo, this.name, signal);
    const [unit] = units;
    if (!unit) return { kind: 'none' };

    const review = await source.fetchComments(this.owner, this.repo, unit.number, signal);
    if (review.comments.length === 0) return { kind: 'none' };

    const text = renderReview(review);
    cache.set(this.path, unit.number, text);

    const { agent, git, logger } = this.tools;
    logger.debug('Sending review to agent', { worktree: this.path, unit: unit.number, comments: review.comments.length });
    await agent.prompt(this.path, this.model, text);
    await git.stageAll(this.path);
    await git.amend(this.path);
    await git.forcePush(this.path);

    cache.remove(this.path, unit.number);
    return { kind: 'applied', unitNumber: unit.number, commentCount: review.comments.length };
  }

  /**
   * True when the only thing left before apply is the given artifact
   */
  needsApply(requirement = DEFAULT_APPLY_REQUIREMENT): boolean {
    const status = this.status;
    if (!status || status.isComplete) return false;
    return status.applyRequires.length === 1 && status.applyRequires[0] === requirement;
  }

  async apply(command = DEFAULT_APPLY_COMMAND): Promise<void> {
    await this.tools.agent.command(this.path, this.model, command);
    await this.tools.git.forcePush(this.path);
  }
}
