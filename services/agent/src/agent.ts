import {
  logger,
  addUsage,
  emptyUsage,
  errorMessage,
  ExchangeCancelledError,
  IterationBudgetExceededError,
  PalaverError,
  ReasoningEngineUnavailableError,
  UnknownToolError,
  type ChatContentBlock,
  type ChatMessage,
  type SessionConfig,
  type SessionConfigUpdate,
  type SystemBlock,
  type ToolResultBlock,
  type ToolTraceEntry,
  type Usage,
} from '@palaver/shared';
import type { ReasoningClient, ReasoningOutcome, ToolCall } from './reasoning.js';
import type { Session, SessionStore } from './session-store.js';
import type { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'agent' });

/** Patterns matching common API keys and tokens that should not leak to the model */
const SENSITIVE_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{20,}/g,   // Anthropic API keys
  /sk-[a-zA-Z0-9_-]{32,}/g,       // OpenAI API keys
  /\b[a-f0-9]{64}\b/g,              // 64-char hex tokens (e.g. AUTH_TOKEN)
];

/** Strip sensitive tokens/keys from tool output before sending to the model */
export function sanitizeToolOutput(text: string): string {
  let sanitized = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  return sanitized;
}

// ---------------------------------------------------------------------------
// Exchange state machine
// ---------------------------------------------------------------------------

export type ExchangeState = 'start' | 'context_loaded' | 'reasoning' | 'tool_dispatch' | 'done' | 'failed';

/**
 * start → context_loaded → reasoning → (tool_dispatch → reasoning)* → done
 * Any non-terminal state may fail. A degraded reply goes reasoning → done.
 */
const VALID_TRANSITIONS: Record<ExchangeState, Set<ExchangeState>> = {
  start: new Set(['context_loaded', 'failed']),
  context_loaded: new Set(['reasoning', 'failed']),
  reasoning: new Set(['tool_dispatch', 'done', 'failed']),
  tool_dispatch: new Set(['reasoning', 'failed']),
  done: new Set(),
  failed: new Set(),
};

export interface ExchangeRequest {
  message: string;
  sessionId?: string;
  /** Overrides for this exchange only, unless `persist` is set */
  temperature?: number;
  tools?: string[];
  model?: string;
  /** Write the overrides to the session config */
  persist?: boolean;
}

export interface ExchangeResult {
  sessionId: string;
  reply: string;
  usage: Usage;
  toolTrace: ToolTraceEntry[];
  /** Reasoning calls made */
  iterations: number;
  /** True when the iteration budget ran out and the reply is a fallback */
  degraded: boolean;
}

export type BudgetExceededPolicy = 'error' | 'degraded-reply';

export interface AgentDeps {
  store: SessionStore;
  tools: ToolRegistry;
  reasoning: ReasoningClient;
  systemPrompt: string;
  /** Reasoning calls allowed per exchange */
  maxIterations: number;
  /** Default: error */
  onBudgetExceeded?: BudgetExceededPolicy;
}

export interface Agent {
  exchange(request: ExchangeRequest, opts?: { signal?: AbortSignal }): Promise<ExchangeResult>;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new ExchangeCancelledError(signal.reason);
}

function overridesOf(request: ExchangeRequest): SessionConfigUpdate {
  const update: SessionConfigUpdate = {};
  if (request.temperature !== undefined) update.temperature = request.temperature;
  if (request.tools !== undefined) update.tools = [...new Set(request.tools)];
  if (request.model !== undefined) update.model = request.model;
  return update;
}

/** System blocks a reasoning call starts from */
export function systemBlocks(systemPrompt: string, summary?: string): SystemBlock[] {
  const system: SystemBlock[] = [{ type: 'text', text: systemPrompt }];
  if (summary) {
    system.push({ type: 'text', text: `Summary of the conversation so far:\n${summary}` });
  }
  return system;
}

function degradedReply(iterations: number, lastText: string): string {
  const notice = `I could not reach a final answer within ${iterations} reasoning steps.`;
  return lastText ? `${lastText}\n\n(${notice})` : notice;
}

function toolResultContent(entry: ToolTraceEntry): string {
  if (entry.status === 'ok') return sanitizeToolOutput(entry.output ?? '');
  return `Error [${entry.error?.code ?? 'TOOL_EXECUTION_FAILED'}]: ${entry.error?.message ?? 'unknown error'}`;
}

export function createAgent(deps: AgentDeps): Agent {
  const { store, tools, reasoning, systemPrompt, maxIterations } = deps;
  const onBudgetExceeded = deps.onBudgetExceeded ?? 'error';

  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }

  /** Run one tool call; every failure becomes an error entry for the model to read */
  async function dispatch(
    sessionId: string,
    call: ToolCall,
    enabled: ReadonlySet<string>,
    signal?: AbortSignal,
  ): Promise<ToolTraceEntry> {
    throwIfCancelled(signal);
    const start = Date.now();
    const base = { id: call.id, name: call.name, arguments: call.arguments };

    try {
      // A registered tool that is not enabled for this exchange was never offered
      if (!enabled.has(call.name)) throw new UnknownToolError(call.name);
      const output = await tools.invoke(call.name, call.arguments, { signal });
      return { ...base, status: 'ok', output, durationMs: Date.now() - start };
    } catch (err) {
      throwIfCancelled(signal);
      const error = err instanceof PalaverError
        ? { code: err.code, message: err.message }
        : { code: 'TOOL_EXECUTION_FAILED', message: errorMessage(err) };
      log.warn({ sessionId, tool: call.name, code: error.code }, 'tool call failed, passing error to the model');
      return { ...base, status: 'error', error, durationMs: Date.now() - start };
    }
  }

  async function run(session: Session, request: ExchangeRequest, signal?: AbortSignal): Promise<ExchangeResult> {
    let state: ExchangeState = 'start';
    const move = (to: ExchangeState): void => {
      if (!VALID_TRANSITIONS[state].has(to)) {
        throw new Error(`Invalid exchange transition: ${state} -> ${to}`);
      }
      log.debug({ sessionId: session.id, from: state, to }, 'exchange state');
      state = to;
    };

    const trace: ToolTraceEntry[] = [];
    const usage = emptyUsage();
    let iterations = 0;

    try {
      // -- start: effective configuration for this exchange. Persisted
      // overrides are validated now but only written once the exchange commits.
      const overrides = overridesOf(request);
      const persist = request.persist === true && Object.keys(overrides).length > 0;
      const config: SessionConfig = { ...session.config, ...overrides };
      store.assertModel(config.model);

      // -- context_loaded
      const descriptors = tools.resolve(config.tools);
      const definitions = tools.definitions(descriptors);
      const enabled = new Set(descriptors.map((d) => d.name));
      const context = session.memory.context();

      const system = systemBlocks(systemPrompt, context.summary);
      const messages: ChatMessage[] = [
        ...context.turns.map((t): ChatMessage => ({ role: t.role, content: t.content })),
        { role: 'user', content: request.message },
      ];
      move('context_loaded');

      let reply: string | undefined;
      let lastText = '';

      for (let i = 1; i <= maxIterations; i++) {
        move('reasoning');
        iterations = i;

        let outcome: ReasoningOutcome;
        try {
          outcome = await reasoning.reason(
            { model: config.model, temperature: config.temperature, system, messages, tools: definitions },
            { signal },
          );
        } catch (err) {
          if (err instanceof ReasoningEngineUnavailableError) throw err.atIteration(i, trace);
          throw err;
        }
        addUsage(usage, outcome.usage.promptTokens, outcome.usage.completionTokens);

        if (outcome.type === 'final') {
          reply = outcome.text;
          move('done');
          break;
        }

        if (outcome.text) lastText = outcome.text;
        // Results of the last round could never reach the model
        if (i === maxIterations) {
          log.warn(
            { sessionId: session.id, skipped: outcome.calls.map((c) => c.name) },
            'iteration budget spent, tool calls not dispatched',
          );
          break;
        }

        // -- tool_dispatch: sequential, in the order the model asked
        move('tool_dispatch');

        const assistant: ChatContentBlock[] = outcome.text ? [{ type: 'text', text: outcome.text }] : [];
        const results: ToolResultBlock[] = [];
        for (const call of outcome.calls) {
          assistant.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
          const entry = await dispatch(session.id, call, enabled, signal);
          trace.push(entry);
          results.push({
            type: 'tool_result',
            tool_use_id: call.id,
            content: toolResultContent(entry),
            ...(entry.status === 'error' ? { is_error: true } : {}),
          });
        }
        messages.push({ role: 'assistant', content: assistant });
        messages.push({ role: 'user', content: results });
      }

      let degraded = false;
      if (reply === undefined) {
        if (onBudgetExceeded === 'error') {
          throw new IterationBudgetExceededError(iterations, [...trace]);
        }
        log.warn({ sessionId: session.id, iterations }, 'iteration budget exhausted, returning degraded reply');
        reply = degradedReply(iterations, lastText);
        degraded = true;
        move('done');
      }

      // Last cancellation point; from here the exchange commits in full
      throwIfCancelled(signal);
      session.memory.append([
        { role: 'user', content: request.message },
        { role: 'assistant', content: reply, ...(trace.length > 0 ? { toolTrace: [...trace] } : {}) },
      ]);
      await session.memory.maintain();
      if (persist) await store.reconfigure(session, overrides);
      store.touchSession(session);

      log.info(
        { sessionId: session.id, iterations, toolCalls: trace.length, degraded, totalTokens: usage.totalTokens },
        'exchange complete',
      );
      return { sessionId: session.id, reply, usage, toolTrace: trace, iterations, degraded };
    } catch (err) {
      if (state !== 'done' && state !== 'failed') move('failed');
      log.warn({ sessionId: session.id, iterations, err: errorMessage(err) }, 'exchange failed');
      throw err;
    }
  }

  return {
    async exchange(request, opts = {}) {
      const { signal } = opts;
      throwIfCancelled(signal);
      const session = store.resolveOrCreate(request.sessionId);
      return session.lock.runExclusive(() => run(session, request, signal), signal);
    },
  };
}
