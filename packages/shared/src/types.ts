/**
 * Domain types shared between the agent service and its collaborators.
 */

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export type MemoryKind = 'buffer' | 'summary';

export const MEMORY_KINDS: readonly MemoryKind[] = ['buffer', 'summary'];

export interface SessionConfig {
  /** Model id from the router config (not the provider's model string) */
  model: string;
  temperature: number;
  /** Enabled tool names, in the order they are offered to the model */
  tools: string[];
  memoryKind: MemoryKind;
}

export type SessionConfigUpdate = Partial<SessionConfig>;

// ---------------------------------------------------------------------------
// Conversation turns
// ---------------------------------------------------------------------------

export interface ToolTraceEntry {
  /** Call id assigned by the model */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  status: 'ok' | 'error';
  output?: string;
  error?: { code: string; message: string };
  durationMs: number;
}

export interface Turn {
  role: 'user' | 'assistant';
  content: string;
  toolTrace?: ToolTraceEntry[];
}

// ---------------------------------------------------------------------------
// Usage accounting
// ---------------------------------------------------------------------------

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export function emptyUsage(): Usage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export function addUsage(into: Usage, promptTokens: number, completionTokens: number): void {
  into.promptTokens += promptTokens;
  into.completionTokens += completionTokens;
  into.totalTokens += promptTokens + completionTokens;
}
