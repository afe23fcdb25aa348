/**
 * Sync Control Loop
 *
 * Periodic pass over the whole workspace: re-scan, pull every checkout,
 * address open reviews, then run the apply step where a change is ready.
 *
 * A failing project is logged and left out of the remaining steps of the
 * tick; other projects carry on. Ticks never overlap.
 */
import { errorMessage } from './errors.js';
import { DEFAULT_APPLY_COMMAND, DEFAULT_APPLY_REQUIREMENT } from './worktree.js';
import type { Logger } from './logger.js';
import type { Project } from './project.js';
import type { ReviewCache } from './review-cache.js';
import type { ReviewSource } from './review-client.js';

export type SyncPhase = 'idle' | 'pulling' | 'reviewing' | 'applying';

export type SyncStep = 'scan' | 'pull' | 'review' | 'apply';

export interface TickFailure {
  step: SyncStep;
  /** owner/repo, empty for a failed scan */
  project: string;
  worktree?: string;
  error: string;
}

export interface TickReport {
  projects: number;
  pulled: number;
  reviewed: number;
  applied: number;
  cancelled: boolean;
  failures: TickFailure[];
}

export interface ProjectSource {
  loadProjects(): Promise<Project[]>;
}

export interface SyncLoopOptions {
  intervalMs: number;
  autoApply?: boolean;
  applyRequirement?: string;
  applyCommand?: string;
  /** Run the first tick right away instead of after one interval */
  runImmediately?: boolean;
}

export class SyncLoop {
  private currentPhase: SyncPhase = 'idle';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private stopped = true;

  constructor(
    private readonly workspace: ProjectSource,
    private readonly client: ReviewSource,
    private readonly cache: ReviewCache,
    private readonly logger: Logger,
    private readonly options: SyncLoopOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Sync interval must be a positive number of milliseconds, got ${options.intervalMs}`);
    }
  }

  get phase(): SyncPhase {
    return this.currentPhase;
  }

  get active(): boolean {
    return !this.stopped;
  }

  private setPhase(phase: SyncPhase): void {
    if (phase === this.currentPhase) return;
    this.currentPhase = phase;
    this.logger.debug('Sync phase', { phase });
  }

  // ============================================================================
  // Tick
  // ============================================================================

  async tick(signal?: AbortSignal): Promise<TickReport> {
    const report: TickReport = { projects: 0, pulled: 0, reviewed: 0, applied: 0, cancelled: false, failures: [] };
    const fail = (failure: TickFailure) => {
      report.failures.push(failure);
      this.logger.error(`Sync ${failure.step} failed`, { ...failure });
    };
    const cancelled = () => {
      if (!signal?.aborted) return false;
      if (!report.cancelled) {
        report.cancelled = true;
        this.logger.warn('Sync tick cut short', { phase: this.currentPhase });
      }
      return true;
    };

    try {
      let projects: Project[];
      try {
        projects = await this.workspace.loadProjects();
      } catch (error) {
        fail({ step: 'scan', project: '', error: errorMessage(error) });
        return report;
      }
      report.projects = projects.length;

      this.setPhase('pulling');
      const pulled: Project[] = [];
      for (const project of projects) {
        if (cancelled()) return report;
        try {
          await project.pull();
          pulled.push(project);
          report.pulled++;
        } catch (error) {
          fail({ step: 'pull', project: project.title(), error: errorMessage(error) });
        }
      }

      this.setPhase('reviewing');
      const reviewed: Project[] = [];
      for (const project of pulled) {
        if (await this.reviewProject(project, report, fail, cancelled, signal)) {
          reviewed.push(project);
        }
        if (cancelled()) return report;
      }

      if (this.options.autoApply ?? true) {
        this.setPhase('applying');
        for (const project of reviewed) {
          await this.applyProject(project, report, fail, cancelled);
          if (cancelled()) return report;
        }
      }

      return report;
    } finally {
      this.setPhase('idle');
      this.logger.info('Sync tick done', {
        projects: report.projects,
        pulled: report.pulled,
        reviewed: report.reviewed,
        applied: report.applied,
        failures: report.failures.length
      });
    }
  }

  /**
   * Review every worktree of a project; false once one of them fails
   */
  private async reviewProject(
    project: Project,
    report: TickReport,
    fail: (failure: TickFailure) => void,
    cancelled: () => boolean,
    signal?: AbortSignal
  ): Promise<boolean> {
    for (const worktree of project.worktrees) {
      if (cancelled()) return false;
      try {
        const outcome = await worktree.review(this.client, this.cache, signal);
        if (outcome.kind === 'applied') {
          report.reviewed++;
          this.logger.info('Review addressed', {
            project: project.title(),
            worktree: worktree.name,
            unit: outcome.unitNumber,
            comments: outcome.commentCount
          });
        }
      } catch (error) {
        fail({ step: 'review', project: project.title(), worktree: worktree.name, error: errorMessage(error) });
        for (const [unit, review] of this.cache.getAllForWorktree(worktree.path)) {
          this.logger.warn('Review left pending', { project: project.title(), worktree: worktree.name, unit, review });
        }
        return false;
      }
    }
    return true;
  }

  private async applyProject(
    project: Project,
    report: TickReport,
    fail: (failure: TickFailure) => void,
    cancelled: () => boolean
  ): Promise<void> {
    const requirement = this.options.applyRequirement ?? DEFAULT_APPLY_REQUIREMENT;
    for (const worktree of project.worktrees) {
      if (cancelled()) return;
      if (!worktree.needsApply(requirement)) continue;
      try {
        await worktree.apply(this.options.applyCommand ?? DEFAULT_APPLY_COMMAND);
        report.applied++;
        this.logger.info('Change applied', { project: project.title(), worktree: worktree.name });
      } catch (error) {
        fail({ step: 'apply', project: project.title(), worktree: worktree.name, error: errorMessage(error) });
        return;
      }
    }
  }

  // ============================================================================
  // Scheduling
  // ============================================================================

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.logger.info('Sync loop started', { intervalMs: this.options.intervalMs });
    this.schedule(this.options.runImmediately ? 0 : this.options.intervalMs);
  }

  /**
   * Cancel the pending tick, cut the running one short and wait for it
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort(new Error('Sync loop stopped'));
    if (this.running) {
      await this.running;
    }
    this.logger.info('Sync loop stopped');
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runScheduledTick();
    }, delayMs);
  }

  private runScheduledTick(): void {
    const startedAt = Date.now();
    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(new Error('Sync tick exceeded its interval')), this.options.intervalMs);
    this.controller = controller;

    this.running = this.tick(controller.signal)
      .then(
        () => undefined,
        error => this.logger.error('Sync tick crashed', { error: errorMessage(error) })
      )
      .finally(() => {
        clearTimeout(deadline);
        this.controller = null;
        this.running = null;
        if (!this.stopped) {
          this.schedule(Math.max(0, this.options.intervalMs - (Date.now() - startedAt)));
        }
      });
  }
}
