import type { SessionConfig } from '@palaver/shared';
import { ReasoningClient, type ReasoningEngine, type ReasoningOutcome, type ReasoningRequest } from '../reasoning.js';
import { SessionStore, type SessionStoreOptions } from '../session-store.js';
import { ToolRegistry } from '../tool-registry.js';
import { echoTool } from '../tools/index.js';

export type Step =
  | ReasoningOutcome
  | Error
  | ((request: ReasoningRequest, signal: AbortSignal) => Promise<ReasoningOutcome>);

/** Engine that plays back a fixed script, one step per call */
export function scriptedEngine(steps: Step[]) {
  const requests: ReasoningRequest[] = [];
  const engine: ReasoningEngine = {
    async reason(request, { signal }) {
      // The loop keeps appending to its message list; keep what was sent
      requests.push(structuredClone(request));
      const step = steps[requests.length - 1];
      if (step === undefined) throw new Error(`script exhausted at call ${requests.length}`);
      if (step instanceof Error) throw step;
      if (typeof step === 'function') return step(request, signal);
      return step;
    },
  };
  return { engine, requests };
}

export function final(text: string): ReasoningOutcome {
  return { type: 'final', text, usage: { promptTokens: 10, completionTokens: 5 } };
}

export function callTool(id: string, name: string, args: Record<string, unknown>, text?: string): ReasoningOutcome {
  return {
    type: 'tool_calls',
    calls: [{ id, name, arguments: args }],
    ...(text !== undefined ? { text } : {}),
    usage: { promptTokens: 10, completionTokens: 5 },
  };
}

/** Single attempt, no backoff */
export function quickClient(engine: ReasoningEngine): ReasoningClient {
  return new ReasoningClient(engine, { maxAttempts: 1, retryDelayMs: 0 });
}

export function echoRegistry(): ToolRegistry {
  const registry = new ToolRegistry({ defaultTimeoutMs: 1000 });
  registry.register(echoTool);
  return registry;
}

export const TEST_DEFAULTS: SessionConfig = {
  model: 'test-model',
  temperature: 0,
  tools: ['echo'],
  memoryKind: 'buffer',
};

export function makeStore(tools: ToolRegistry, overrides: Partial<SessionStoreOptions> = {}): SessionStore {
  return new SessionStore({
    ttlMs: 60_000,
    defaults: TEST_DEFAULTS,
    memory: { tailTurns: 2, condenser: async () => 'condensed' },
    tools,
    models: ['test-model', 'other-model'],
    ...overrides,
  });
}

export function deferred<T = void>() {
  let settle: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}
