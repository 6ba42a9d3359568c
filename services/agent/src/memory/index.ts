import { logger, type MemoryKind } from '@palaver/shared';
import { BufferMemory } from './buffer-memory.js';
import { SummaryMemory } from './summary-memory.js';
import type { Condenser, Memory } from './types.js';

export { BufferMemory, type BufferMemoryOptions } from './buffer-memory.js';
export { SummaryMemory, type SummaryMemoryOptions } from './summary-memory.js';
export type { Condenser, HistoryEntry, Memory, MemoryContext } from './types.js';

const log = logger.child({ module: 'memory' });

export interface MemoryOptions {
  /** Cap for buffer memory */
  maxTurns?: number;
  /** Raw tail kept by summary memory */
  tailTurns: number;
  condenser: Condenser;
}

/** What a change of memory kind kept and lost */
export interface MemoryConversion {
  from: MemoryKind;
  to: MemoryKind;
  /** Raw turns carried into the new memory */
  retainedTurns: number;
  /** Turns folded into a summary during the switch */
  condensedTurns: number;
  /** Raw turns dropped because they exceed the new memory's cap */
  discardedTurns: number;
  /** A condensed summary existed and could not be carried over */
  discardedSummary: boolean;
}

export function createMemory(kind: MemoryKind, opts: MemoryOptions): Memory {
  switch (kind) {
    case 'buffer':
      return new BufferMemory({ maxTurns: opts.maxTurns });
    case 'summary':
      return new SummaryMemory({ condenser: opts.condenser, tailTurns: opts.tailTurns });
  }
}

/**
 * Build a memory of another kind from an existing one.
 *
 * buffer -> summary condenses everything beyond the tail right away.
 * summary -> buffer replays the raw tail only; the summary cannot be turned
 * back into turns and is dropped, which the returned report says.
 */
export async function convertMemory(
  memory: Memory,
  kind: MemoryKind,
  opts: MemoryOptions,
  signal?: AbortSignal,
): Promise<{ memory: Memory; conversion: MemoryConversion }> {
  const { summary, turns } = memory.context();
  const next = createMemory(kind, opts);
  next.append(turns);

  const condensedTurns = await next.maintain(signal);
  const retainedTurns = next.turns().length;

  const conversion: MemoryConversion = {
    from: memory.kind,
    to: kind,
    retainedTurns,
    condensedTurns,
    discardedTurns: turns.length - retainedTurns - condensedTurns,
    discardedSummary: summary !== undefined && next.context().summary === undefined,
  };

  if (conversion.discardedSummary || conversion.discardedTurns > 0) {
    log.info({ ...conversion }, 'memory conversion discarded history');
  }

  return { memory: next, conversion };
}
