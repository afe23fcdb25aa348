/**
 * Subprocess execution
 *
 * Every external tool (git, the change tracker, the execution agent) is called
 * as a request/response: arguments in, stdout out, ToolInvocationError on
 * failure. JSON payloads are located by the first '{' after trimming.
 *
 * PURE LIB: No config access, no manager imports.
 */
import { execa } from 'execa';
import type { z } from 'zod';
import { MalformedOutputError, ToolInvocationError } from './errors.js';

/**
 * Run `file args...` in `cwd` and resolve with its stdout.
 * Rejects with ToolInvocationError when the process cannot start or exits non-zero.
 */
export type CommandRunner = (file: string, args: readonly string[], cwd: string) => Promise<string>;

/**
 * Format a command line for messages
 */
export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].join(' ');
}

/**
 * Default runner backed by execa
 */
export const runCommand: CommandRunner = async (file, args, cwd) => {
  try {
    const result = await execa(file, [...args], { cwd, stdin: 'ignore' });
    return String(result.stdout);
  } catch (error) {
    throw toInvocationError(file, args, error);
  }
};

function toInvocationError(file: string, args: readonly string[], error: unknown): ToolInvocationError {
  let exitCode: number | null = null;
  let stderr = '';
  if (error instanceof Error) {
    if ('exitCode' in error && typeof error.exitCode === 'number') {
      exitCode = error.exitCode;
    }
    if ('stderr' in error && typeof error.stderr === 'string') {
      stderr = error.stderr.trimEnd();
    }
    if (exitCode === null && !stderr) {
      stderr = error.message;
    }
  }
  return new ToolInvocationError(formatCommand(file, args), exitCode, stderr, { cause: error });
}

// ============================================================================
// JSON output
// ============================================================================

/**
 * Strip anything printed before the JSON object (banners, progress lines)
 */
export function extractJsonObject(output: string): string {
  const trimmed = output.trimEnd();
  const start = trimmed.indexOf('{');
  if (start === -1) {
    throw new MalformedOutputError(`No JSON object found in output: ${JSON.stringify(trimmed)}`);
  }
  return trimmed.slice(start);
}

/**
 * Validate an already parsed value against a schema
 */
export function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedOutputError(`Unexpected ${what} shape: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Locate, parse and validate the JSON object in a tool's stdout
 */
export function parseToolJson<T>(
  output: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string
): T {
  const payload = extractJsonObject(output);
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch (error) {
    throw new MalformedOutputError(`Invalid JSON in ${what}`, { cause: error });
  }
  return decodeWith(schema, value, what);
}

/**
 * Run a tool and decode its JSON stdout
 */
export async function runJson<T>(
  run: CommandRunner,
  file: string,
  args: readonly string[],
  cwd: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const output = await run(file, args, cwd);
  return parseToolJson(output, schema, `output of '${formatCommand(file, args)}'`);
}
