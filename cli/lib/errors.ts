/**
 * Engine error taxonomy
 *
 * Every failure the engine reports is an EngineError subclass with a stable
 * `code`, so callers can branch on the kind without parsing messages.
 *
 * PURE LIB: No config access, no manager imports.
 */

export type EngineErrorCode =
  | 'TOOL_INVOCATION'
  | 'MALFORMED_OUTPUT'
  | 'DECODE'
  | 'NETWORK'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'RATE_LIMITED'
  | 'UPSTREAM'
  | 'NO_OPEN_UNITS'
  | 'INVALID_ORIGIN'
  | 'USAGE';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ============================================================================
// Subprocess / output errors
// ============================================================================

/**
 * An external tool could not be started or exited non-zero
 */
export class ToolInvocationError extends EngineError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string, options?: { cause?: unknown }) {
    const status = exitCode === null ? 'could not be started' : `exited with code ${exitCode}`;
    const detail = stderr ? `\n${stderr}` : '';
    super('TOOL_INVOCATION', `Command ${status}: ${command}${detail}`, options);
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Tool or API output that is not the JSON we expect
 */
export class MalformedOutputError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }, code: EngineErrorCode = 'MALFORMED_OUTPUT') {
    super(code, message, options);
  }
}

/**
 * A 200 response from the forge whose body does not decode
 */
export class DecodeError extends MalformedOutputError {
  readonly url: string;

  constructor(url: string, detail: string, options?: { cause?: unknown }) {
    super(`Failed to parse forge response from ${url}: ${detail}`, options, 'DECODE');
    this.url = url;
  }
}

// ============================================================================
// Forge API errors
// ============================================================================

export class NetworkError extends EngineError {
  readonly url: string;

  constructor(url: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('NETWORK', `Network error requesting ${url}${reason}. Please check your internet connection`, options);
    this.url = url;
  }
}

export class NotFoundError extends EngineError {
  readonly url: string;

  constructor(method: string, url: string) {
    super('NOT_FOUND', `${method} ${url} returns 404`);
    this.url = url;
  }
}

export class ForbiddenError extends EngineError {
  constructor(tokenEnv: string) {
    super('FORBIDDEN', `Access forbidden. This may be a private repository. Set the ${tokenEnv} environment variable`);
  }
}

export class RateLimitedError extends EngineError {
  /** null when the reset header was not a Unix timestamp */
  readonly resetAt: Date | null;

  constructor(resetAt: Date | null, tokenEnv: string) {
    super(
      'RATE_LIMITED',
      `Forge API rate limit exceeded. Reset at: ${resetAt ? resetAt.toISOString() : 'unknown'}. Consider setting ${tokenEnv}`
    );
    this.resetAt = resetAt;
  }
}

export class UpstreamError extends EngineError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super('UPSTREAM', `Forge API error (status ${status}): ${body}`);
    this.status = status;
    this.body = body;
  }
}

export class NoOpenUnitsError extends EngineError {
  constructor(owner: string, repo: string) {
    super('NO_OPEN_UNITS', `No open pull requests found for ${owner}/${repo}`);
  }
}

// ============================================================================
// Input errors
// ============================================================================

export class InvalidOriginError extends EngineError {
  readonly origin: string;

  constructor(origin: string, reason: string) {
    super('INVALID_ORIGIN', `Cannot parse origin URL '${origin}': ${reason}`);
    this.origin = origin;
  }
}

export class UsageError extends EngineError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
