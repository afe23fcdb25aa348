/**
 * Engine Manager
 *
 * Process-wide engine objects built from config. The rate limiter, review
 * client and review cache must be shared by every caller in the process,
 * so they are created once and handed out by reference.
 *
 * MANAGER: Has config access, lazily builds pure lib instances.
 */
import { ExecutionAgent } from '../lib/agent.js';
import { ChangeTracker } from '../lib/change-status.js';
import { runCommand } from '../lib/exec.js';
import { Git } from '../lib/git.js';
import { createLogger, type Logger } from '../lib/logger.js';
import { RateLimiter } from '../lib/rate-limiter.js';
import { ReviewCache } from '../lib/review-cache.js';
import { ReviewClient } from '../lib/review-client.js';
import { SyncLoop } from '../lib/sync-loop.js';
import { Workspace } from '../lib/workspace.js';
import type { EngineTools } from '../lib/types/workspace.js';
import { loadConfig } from './config-manager.js';

// ============================================================================
// Instances (lazy-initialized)
// ============================================================================

let _logger: Logger | null = null;
let _cache: ReviewCache | null = null;
let _rateLimiter: RateLimiter | null = null;
let _client: ReviewClient | null = null;
let _tools: EngineTools | null = null;
let _workspace: Workspace | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    const { logging } = loadConfig();
    _logger = createLogger({ level: logging.level, file: logging.file || null });
  }
  return _logger;
}

export function getReviewCache(): ReviewCache {
  if (!_cache) {
    _cache = new ReviewCache();
  }
  return _cache;
}

export function getRateLimiter(): RateLimiter {
  if (!_rateLimiter) {
    _rateLimiter = new RateLimiter(loadConfig().forge.rate_limit);
  }
  return _rateLimiter;
}

export function getReviewClient(): ReviewClient {
  if (!_client) {
    const { forge } = loadConfig();
    _client = new ReviewClient({
      baseUrl: forge.api_url,
      tokenEnv: forge.token_env,
      timeoutMs: forge.timeout * 1000,
      rateLimiter: getRateLimiter()
    });
  }
  return _client;
}

export function getEngineTools(): EngineTools {
  if (!_tools) {
    const { tools, agent } = loadConfig();
    const logger = getLogger();
    _tools = {
      git: new Git(runCommand, tools.git),
      tracker: new ChangeTracker(runCommand, logger, tools.change_tracker, tools.change_tracker_label),
      agent: new ExecutionAgent(runCommand, tools.agent, agent.model || undefined),
      logger
    };
  }
  return _tools;
}

export function getWorkspace(): Workspace {
  if (!_workspace) {
    const config = loadConfig();
    _workspace = new Workspace(config.workspace.dir, getEngineTools(), getReviewCache(), config.forge.host);
  }
  return _workspace;
}

/**
 * New control loop over the shared workspace, client and cache
 */
export function createSyncLoop(options: { intervalSeconds?: number; runImmediately?: boolean } = {}): SyncLoop {
  const { sync } = loadConfig();
  return new SyncLoop(getWorkspace(), getReviewClient(), getReviewCache(), getLogger(), {
    intervalMs: (options.intervalSeconds ?? sync.interval) * 1000,
    autoApply: sync.auto_apply,
    applyRequirement: sync.apply_requirement,
    applyCommand: sync.apply_command,
    runImmediately: options.runImmediately
  });
}

/**
 * Drop every instance (for testing or when config changes)
 */
export function resetEngine(): void {
  _logger = null;
  _cache = null;
  _rateLimiter = null;
  _client = null;
  _tools = null;
  _workspace = null;
}
