import type { Turn } from '@palaver/shared';
import { copyTurn, type HistoryEntry, type Memory, type MemoryContext } from './types.js';

export interface BufferMemoryOptions {
  /** Keep only the most recent N turns; unbounded when omitted */
  maxTurns?: number;
}

export class BufferMemory implements Memory {
  readonly kind = 'buffer' as const;
  private readonly maxTurns?: number;
  private items: Turn[] = [];

  constructor(opts: BufferMemoryOptions = {}) {
    const { maxTurns } = opts;
    // A user turn and its reply must always fit
    if (maxTurns !== undefined && (!Number.isInteger(maxTurns) || maxTurns < 2)) {
      throw new RangeError(`maxTurns must be an integer >= 2, got ${maxTurns}`);
    }
    this.maxTurns = maxTurns;
  }

  append(turns: Turn[]): void {
    this.items.push(...turns.map(copyTurn));
    if (this.maxTurns !== undefined && this.items.length > this.maxTurns) {
      this.items.splice(0, this.items.length - this.maxTurns);
    }
  }

  context(): MemoryContext {
    return { turns: this.turns() };
  }

  history(): HistoryEntry[] {
    return this.items.map((t) => ({ role: t.role, content: t.content }));
  }

  turns(): Turn[] {
    return this.items.map(copyTurn);
  }

  async maintain(): Promise<number> {
    return 0;
  }

  clear(): void {
    this.items = [];
  }
}
