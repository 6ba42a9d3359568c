import type { MemoryKind, Turn } from '@palaver/shared';

/** What a reasoning call sees of the conversation so far */
export interface MemoryContext {
  /** Condensed account of turns no longer kept verbatim */
  summary?: string;
  turns: Turn[];
}

export interface HistoryEntry {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Folds turns into a new rolling summary. Receives the previous summary (if
 * any) and the turns leaving the raw tail, oldest first.
 */
export type Condenser = (
  previousSummary: string | undefined,
  turns: Turn[],
  signal?: AbortSignal,
) => Promise<string>;

export interface Memory {
  readonly kind: MemoryKind;
  /** Synchronous so that a user turn and its reply land together */
  append(turns: Turn[]): void;
  context(): MemoryContext;
  /** Read model; a summary shows up as a leading system entry */
  history(): HistoryEntry[];
  /** Raw turns currently retained */
  turns(): Turn[];
  /** Background upkeep. Resolves with the number of turns folded into the summary. */
  maintain(signal?: AbortSignal): Promise<number>;
  clear(): void;
}

export function copyTurn(turn: Turn): Turn {
  return turn.toolTrace ? { ...turn, toolTrace: [...turn.toolTrace] } : { ...turn };
}
