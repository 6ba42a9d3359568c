import { logger, type Turn } from '@palaver/shared';
import { copyTurn, type Condenser, type HistoryEntry, type Memory, type MemoryContext } from './types.js';

const log = logger.child({ module: 'summary-memory' });

export interface SummaryMemoryOptions {
  condenser: Condenser;
  /** Raw turns kept verbatim after maintenance */
  tailTurns: number;
}

/**
 * Rolling summary plus a bounded raw tail.
 *
 * append() only grows the tail; maintain() folds everything beyond
 * `tailTurns` into the summary. Summary and tail are replaced together once
 * the condenser answers, so a failed or cancelled condensation leaves both
 * exactly as they were and the next pass tries again.
 */
export class SummaryMemory implements Memory {
  readonly kind = 'summary' as const;
  private readonly condenser: Condenser;
  private readonly tailTurns: number;
  private summary?: string;
  private tail: Turn[] = [];

  constructor(opts: SummaryMemoryOptions) {
    if (!Number.isInteger(opts.tailTurns) || opts.tailTurns < 2) {
      throw new RangeError(`tailTurns must be an integer >= 2, got ${opts.tailTurns}`);
    }
    this.condenser = opts.condenser;
    this.tailTurns = opts.tailTurns;
  }

  append(turns: Turn[]): void {
    this.tail.push(...turns.map(copyTurn));
  }

  context(): MemoryContext {
    return this.summary === undefined
      ? { turns: this.turns() }
      : { summary: this.summary, turns: this.turns() };
  }

  history(): HistoryEntry[] {
    const entries: HistoryEntry[] = this.tail.map((t) => ({ role: t.role, content: t.content }));
    if (this.summary !== undefined) {
      entries.unshift({ role: 'system', content: this.summary });
    }
    return entries;
  }

  turns(): Turn[] {
    return this.tail.map(copyTurn);
  }

  /** Turns waiting to be condensed */
  get pendingTurns(): number {
    return Math.max(0, this.tail.length - this.tailTurns);
  }

  async maintain(signal?: AbortSignal): Promise<number> {
    const overflow = this.pendingTurns;
    if (overflow === 0) return 0;

    const previous = this.summary;
    const folding = this.tail.slice(0, overflow);

    let next: string;
    try {
      next = (await this.condenser(previous, folding.map(copyTurn), signal)).trim();
    } catch (err) {
      log.warn({ err, pending: overflow }, 'condensation failed, keeping raw turns');
      return 0;
    }
    if (!next) {
      log.warn({ pending: overflow }, 'condenser produced empty output, keeping raw turns');
      return 0;
    }

    // Appends only ever add to the end, so the folded turns are still the head
    this.summary = next;
    this.tail.splice(0, overflow);
    log.debug({ condensed: overflow, retained: this.tail.length }, 'summary updated');
    return overflow;
  }

  clear(): void {
    this.summary = undefined;
    this.tail = [];
  }
}
