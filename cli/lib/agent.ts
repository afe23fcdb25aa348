/**
 * Execution agent
 *
 * Hands instructions to the coding agent CLI inside a worktree:
 *   <agent> run -m <model> <prompt>
 *   <agent> run -m <model> --command <name>
 */
import { runCommand, type CommandRunner } from './exec.js';

export const DEFAULT_AGENT_MODEL = 'github-copilot/claude-sonnet-4.5';

export class ExecutionAgent {
  constructor(
    private readonly run: CommandRunner = runCommand,
    readonly bin = 'opencode',
    readonly defaultModel = DEFAULT_AGENT_MODEL
  ) {}

  private model(model: string | undefined): string {
    return model || this.defaultModel;
  }

  async prompt(cwd: string, model: string | undefined, text: string): Promise<string> {
    return this.run(this.bin, ['run', '-m', this.model(model), text], cwd);
  }

  async command(cwd: string, model: string | undefined, name: string): Promise<string> {
    return this.run(this.bin, ['run', '-m', this.model(model), '--command', name], cwd);
  }
}
