/**
 * Test doubles shared across suites
 */
import { vi } from 'vitest';
import { ExecutionAgent } from '../lib/agent.js';
import { ChangeTracker } from '../lib/change-status.js';
import { ToolInvocationError } from '../lib/errors.js';
import { formatCommand, type CommandRunner } from '../lib/exec.js';
import { Git } from '../lib/git.js';
import type { Logger } from '../lib/logger.js';
import type { EngineTools } from '../lib/types/workspace.js';

export interface RecordedCall {
  file: string;
  args: string[];
  cwd: string;
}

export type ScriptHandler = (call: RecordedCall) => string | Promise<string>;

export interface ScriptedRunner {
  run: CommandRunner;
  calls: RecordedCall[];
  /** Calls rendered as `cwd$ file args...` */
  lines(): string[];
}

/**
 * CommandRunner answering from a handler and recording every call
 */
export function scriptedRunner(handler: ScriptHandler = () => ''): ScriptedRunner {
  const calls: RecordedCall[] = [];
  return {
    calls,
    run: async (file, args, cwd) => {
      const call = { file, args: [...args], cwd };
      calls.push(call);
      return handler(call);
    },
    lines: () => calls.map(call => `${call.cwd}$ ${formatCommand(call.file, call.args)}`)
  };
}

/**
 * Error thrown by a failing tool
 */
export function toolFailure(call: RecordedCall, stderr = 'failed'): ToolInvocationError {
  return new ToolInvocationError(formatCommand(call.file, call.args), 1, stderr);
}

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

export function makeTools(run: CommandRunner, logger: Logger = silentLogger()): EngineTools {
  return {
    git: new Git(run, 'git'),
    tracker: new ChangeTracker(run, logger, 'openspec', 'OpenSpec'),
    agent: new ExecutionAgent(run, 'opencode', 'test-model'),
    logger
  };
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } });
}
