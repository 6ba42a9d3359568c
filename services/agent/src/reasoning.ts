import {
  logger,
  withSpan,
  retry,
  raceAbort,
  withTimeout,
  isAbortError,
  errorMessage,
  CircuitOpenError,
  MalformedResponseError,
  ExchangeCancelledError,
  ReasoningEngineUnavailableError,
  responseText,
  type ChatContentBlock,
  type ChatMessage,
  type ModelRouter,
  type SystemBlock,
  type ToolDefinition,
  type ToolUseBlock,
  type Turn,
} from '@palaver/shared';
import type { Condenser } from './memory/index.js';
import { estimateTokens } from './token-count.js';

const log = logger.child({ module: 'reasoning' });

// ---------------------------------------------------------------------------
// Engine contract
// ---------------------------------------------------------------------------

export interface ReasoningRequest {
  /** Model role used when no explicit model is given (default: agent) */
  role?: 'agent' | 'summarizer';
  /** Router model id */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  system: SystemBlock[];
  messages: ChatMessage[];
  tools: ToolDefinition[];
}

export interface StepUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ReasoningOutcome =
  | { type: 'final'; text: string; usage: StepUsage }
  | { type: 'tool_calls'; calls: ToolCall[]; text?: string; usage: StepUsage };

export interface ReasoningEngine {
  reason(request: ReasoningRequest, opts: { signal: AbortSignal }): Promise<ReasoningOutcome>;
}

// ---------------------------------------------------------------------------
// Router-backed engine
// ---------------------------------------------------------------------------

function contentText(content: string | ChatContentBlock[]): string {
  if (typeof content === 'string') return content;
  return content
    .map((b) => (b.type === 'text' ? b.text : b.type === 'tool_result' ? b.content : JSON.stringify(b.input)))
    .join('\n');
}

function estimatePrompt(request: ReasoningRequest): number {
  const text = [
    ...request.system.map((b) => b.text),
    ...request.messages.map((m) => contentText(m.content)),
  ].join('\n');
  return estimateTokens(text);
}

/** The part of ModelRouter the engine needs */
export type ChatRouter = Pick<ModelRouter, 'chat'>;

export function createRouterEngine(router: ChatRouter): ReasoningEngine {
  return {
    async reason(request, { signal }) {
      const response = await router.chat({
        role: request.role ?? 'agent',
        modelOverride: request.model,
        system: request.system,
        messages: request.messages,
        tools: request.tools.length > 0 ? request.tools : undefined,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        signal,
      });

      const text = responseText(response.content);
      const usage: StepUsage = response.usage
        ? { promptTokens: response.usage.inputTokens, completionTokens: response.usage.outputTokens }
        : { promptTokens: estimatePrompt(request), completionTokens: estimateTokens(text) };

      if (response.stopReason !== 'tool_use') {
        return { type: 'final', text, usage };
      }

      const calls = response.content
        .filter((b): b is ToolUseBlock => b.type === 'tool_use')
        .map((b) => ({ id: b.id, name: b.name, arguments: b.input }));
      if (calls.length === 0) {
        throw new MalformedResponseError('stop reason tool_use without any tool_use block');
      }
      return { type: 'tool_calls', calls, text: text || undefined, usage };
    },
  };
}

// ---------------------------------------------------------------------------
// Timeout / retry envelope
// ---------------------------------------------------------------------------

const TRANSIENT_STATUS = new Set([408, 409, 429]);
const CONNECTION_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN', 'UND_ERR_SOCKET']);

/** Failures worth another attempt: timeouts, throttling, 5xx, dropped connections, garbage replies */
export function isTransientFailure(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (isAbortError(err)) return true;
  if (err instanceof CircuitOpenError || err instanceof MalformedResponseError) return true;
  if ('status' in err && typeof err.status === 'number') {
    return TRANSIENT_STATUS.has(err.status) || err.status >= 500;
  }
  if ('code' in err && typeof err.code === 'string' && CONNECTION_CODES.has(err.code)) return true;
  return /connection error|fetch failed|socket hang up/i.test(err.message);
}

export interface ReasoningClientOptions {
  /** Per attempt (default: 60000) */
  timeoutMs?: number;
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry; doubles per attempt (default: 500) */
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
}

/**
 * Shared, stateless client around a ReasoningEngine. Adds a per-attempt
 * timeout and bounded exponential retry for transient failures. Caller
 * cancellation is never retried and surfaces as ExchangeCancelledError.
 */
export class ReasoningClient {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs?: number;

  constructor(
    private readonly engine: ReasoningEngine,
    opts: ReasoningClientOptions = {},
  ) {
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 500;
    this.maxRetryDelayMs = opts.maxRetryDelayMs;
  }

  async reason(request: ReasoningRequest, opts: { signal?: AbortSignal } = {}): Promise<ReasoningOutcome> {
    const { signal } = opts;
    let attempts = 0;

    try {
      return await retry(
        (attempt) => {
          attempts = attempt;
          const { signal: attemptSignal } = withTimeout(this.timeoutMs, signal);
          return withSpan(
            'reasoning.call',
            { attempt, role: request.role ?? 'agent', model: request.model ?? '' },
            () => raceAbort(this.engine.reason(request, { signal: attemptSignal }), attemptSignal),
          );
        },
        {
          maxAttempts: this.maxAttempts,
          delayMs: this.retryDelayMs,
          maxDelayMs: this.maxRetryDelayMs,
          backoff: 'exponential',
          signal,
          shouldRetry: (err) => !signal?.aborted && isTransientFailure(err),
          onRetry: ({ err, attempt, delayMs }) =>
            log.warn({ attempt, delayMs, err: errorMessage(err) }, 'reasoning call failed, retrying'),
        },
      );
    } catch (err) {
      if (signal?.aborted) throw new ExchangeCancelledError(signal.reason);
      const retryable = isTransientFailure(err);
      log.error({ attempts, retryable, err: errorMessage(err) }, 'reasoning engine unavailable');
      throw new ReasoningEngineUnavailableError({ attempts, retryable }, err);
    }
  }
}

// ---------------------------------------------------------------------------
// Summary condenser
// ---------------------------------------------------------------------------

const CONDENSER_SYSTEM_PROMPT = `You maintain the running summary of a conversation between a user and an AI assistant.

You receive the current summary (possibly empty) and the next lines of the conversation. Produce an updated summary that:
- Keeps every fact, request, decision and open question the user or assistant stated
- Keeps names, dates, numbers and tool results exactly as given
- Drops greetings, filler and anything later lines make obsolete
- Stays in chronological order and in the language of the conversation
- Does NOT invent or infer anything not present in the input

Output only the updated summary, nothing else.`;

function transcript(turns: Turn[]): string {
  return turns
    .map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.content}`)
    .join('\n');
}

/** Condenser for summary memory, run on the summarizer model role without tools */
export function createCondenser(client: ReasoningClient): Condenser {
  return async (previousSummary, turns, signal) => {
    const content = [
      `Current summary:\n${previousSummary ?? '(none)'}`,
      `New lines of conversation:\n${transcript(turns)}`,
    ].join('\n\n');

    const outcome = await client.reason(
      {
        role: 'summarizer',
        temperature: 0,
        system: [{ type: 'text', text: CONDENSER_SYSTEM_PROMPT }],
        messages: [{ role: 'user', content }],
        tools: [],
      },
      { signal },
    );

    if (outcome.type !== 'final') {
      throw new Error('condenser answered with tool calls');
    }
    return outcome.text;
  };
}
