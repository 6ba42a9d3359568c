/**
 * Error taxonomy for the agent backend.
 *
 * Every error the core raises on purpose is a PalaverError carrying a stable
 * `code`, the HTTP status the API answers with, and whether a caller may retry.
 */
import type { ToolTraceEntry } from './types.js';

export type ErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'SESSION_BUSY'
  | 'UNKNOWN_TOOL'
  | 'DUPLICATE_TOOL_NAME'
  | 'INVALID_TOOL_ARGUMENTS'
  | 'TOOL_EXECUTION_FAILED'
  | 'UNKNOWN_MODEL'
  | 'ITERATION_BUDGET_EXCEEDED'
  | 'REASONING_ENGINE_UNAVAILABLE'
  | 'EXCHANGE_CANCELLED';

export interface PalaverErrorOptions {
  cause?: unknown;
  retryable?: boolean;
  context?: Record<string, unknown>;
}

export class PalaverError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly retryable: boolean;
  readonly context: Record<string, unknown>;

  constructor(code: ErrorCode, status: number, message: string, opts: PalaverErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.retryable = opts.retryable ?? false;
    this.context = opts.context ?? {};
  }

  toJSON(): { code: ErrorCode; message: string; retryable: boolean; context: Record<string, unknown> } {
    return { code: this.code, message: this.message, retryable: this.retryable, context: this.context };
  }
}

// ---------------------------------------------------------------------------
// Session and configuration faults
// ---------------------------------------------------------------------------

export class SessionNotFoundError extends PalaverError {
  constructor(readonly sessionId: string) {
    super('SESSION_NOT_FOUND', 404, `session not found: ${sessionId}`, { context: { sessionId } });
  }
}

/** The session has an exchange or config update running or queued */
export class SessionBusyError extends PalaverError {
  constructor(readonly sessionId: string) {
    super('SESSION_BUSY', 409, `session is busy: ${sessionId}`, { retryable: true, context: { sessionId } });
  }
}

export class UnknownToolError extends PalaverError {
  constructor(readonly toolName: string) {
    super('UNKNOWN_TOOL', 400, `unknown tool: ${toolName}`, { context: { tool: toolName } });
  }
}

export class DuplicateToolNameError extends PalaverError {
  constructor(readonly toolName: string) {
    super('DUPLICATE_TOOL_NAME', 409, `a tool named '${toolName}' is already registered`, {
      context: { tool: toolName },
    });
  }
}

export class UnknownModelError extends PalaverError {
  constructor(readonly modelId: string, available: readonly string[]) {
    super('UNKNOWN_MODEL', 400, `unknown model id '${modelId}'. Available models: ${available.join(', ')}`, {
      context: { model: modelId, available: [...available] },
    });
  }
}

// ---------------------------------------------------------------------------
// Tool faults (absorbed by the loop as observations)
// ---------------------------------------------------------------------------

export interface ArgumentIssue {
  path: Array<string | number>;
  message: string;
}

export class InvalidToolArgumentsError extends PalaverError {
  constructor(readonly toolName: string, readonly issues: ArgumentIssue[]) {
    const detail = issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    super('INVALID_TOOL_ARGUMENTS', 400, `invalid arguments for tool '${toolName}': ${detail}`, {
      context: { tool: toolName, issues },
    });
  }
}

export class ToolExecutionError extends PalaverError {
  constructor(readonly toolName: string, cause: unknown) {
    super('TOOL_EXECUTION_FAILED', 502, `tool '${toolName}' failed: ${errorMessage(cause)}`, {
      cause,
      context: { tool: toolName },
    });
  }
}

// ---------------------------------------------------------------------------
// Loop and engine faults
// ---------------------------------------------------------------------------

export class IterationBudgetExceededError extends PalaverError {
  constructor(readonly iterations: number, readonly trace: ToolTraceEntry[]) {
    super(
      'ITERATION_BUDGET_EXCEEDED',
      422,
      `no final answer after ${iterations} reasoning iterations`,
      { context: { iterations, toolCalls: trace.length } },
    );
  }
}

export interface EngineFailureDetail {
  attempts: number;
  retryable: boolean;
  iteration?: number;
  trace?: ToolTraceEntry[];
}

export class ReasoningEngineUnavailableError extends PalaverError {
  readonly attempts: number;
  readonly iteration?: number;
  readonly trace: ToolTraceEntry[];

  constructor(detail: EngineFailureDetail, cause: unknown) {
    super(
      'REASONING_ENGINE_UNAVAILABLE',
      503,
      `reasoning engine unavailable after ${detail.attempts} attempt(s): ${errorMessage(cause)}`,
      {
        cause,
        retryable: detail.retryable,
        context: {
          attempts: detail.attempts,
          ...(detail.iteration !== undefined ? { iteration: detail.iteration } : {}),
          ...(detail.trace ? { toolCalls: detail.trace.length } : {}),
        },
      },
    );
    this.attempts = detail.attempts;
    this.iteration = detail.iteration;
    this.trace = detail.trace ?? [];
  }

  /** Same failure, annotated with where in the exchange it happened */
  atIteration(iteration: number, trace: ToolTraceEntry[]): ReasoningEngineUnavailableError {
    return new ReasoningEngineUnavailableError(
      { attempts: this.attempts, retryable: this.retryable, iteration, trace: [...trace] },
      this.cause,
    );
  }
}

export class ExchangeCancelledError extends PalaverError {
  constructor(reason?: unknown) {
    super('EXCHANGE_CANCELLED', 499, 'exchange cancelled', { cause: reason });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for the DOMException/Error raised when an AbortSignal fires */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
