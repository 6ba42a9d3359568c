import { describe, it, expect, vi } from 'vitest';
import type { Turn } from '@palaver/shared';
import { BufferMemory, SummaryMemory, convertMemory, createMemory, type MemoryOptions } from '../memory/index.js';

function turns(...contents: string[]): Turn[] {
  return contents.map((content, i): Turn => ({ role: i % 2 === 0 ? 'user' : 'assistant', content }));
}

describe('BufferMemory', () => {
  it('returns appended turns in order', () => {
    const memory = new BufferMemory();
    const appended = turns('u1', 'a1', 'u2', 'a2');
    memory.append(appended);

    expect(memory.turns()).toEqual(appended);
    expect(memory.context()).toEqual({ turns: appended });
    expect(memory.history()).toEqual([
      { role: 'user', content: 'u1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'a2' },
    ]);
  });

  it('keeps only the most recent maxTurns', () => {
    const memory = new BufferMemory({ maxTurns: 4 });
    memory.append(turns('u1', 'a1', 'u2', 'a2', 'u3', 'a3'));
    expect(memory.turns().map((t) => t.content)).toEqual(['u2', 'a2', 'u3', 'a3']);
  });

  it('rejects a cap below two turns', () => {
    expect(() => new BufferMemory({ maxTurns: 1 })).toThrow('maxTurns must be an integer >= 2, got 1');
  });

  it('hands out copies', () => {
    const memory = new BufferMemory();
    memory.append(turns('u1', 'a1'));
    const copy = memory.turns();
    copy[0].content = 'changed';
    expect(memory.turns()[0].content).toBe('u1');
  });

  it('clears', async () => {
    const memory = new BufferMemory();
    memory.append(turns('u1', 'a1'));
    await expect(memory.maintain()).resolves.toBe(0);
    memory.clear();
    expect(memory.turns()).toEqual([]);
  });
});

describe('SummaryMemory', () => {
  it('folds turns beyond the tail into the summary', async () => {
    const condenser = vi.fn().mockResolvedValueOnce('S1').mockResolvedValueOnce('S2');
    const memory = new SummaryMemory({ condenser, tailTurns: 2 });

    memory.append(turns('u1', 'a1', 'u2', 'a2'));
    expect(memory.pendingTurns).toBe(2);

    await expect(memory.maintain()).resolves.toBe(2);
    expect(condenser).toHaveBeenCalledWith(undefined, turns('u1', 'a1'), undefined);
    expect(memory.context()).toEqual({ summary: 'S1', turns: turns('u2', 'a2') });
    expect(memory.history()).toEqual([
      { role: 'system', content: 'S1' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'a2' },
    ]);

    memory.append(turns('u3', 'a3'));
    await expect(memory.maintain()).resolves.toBe(2);
    expect(condenser).toHaveBeenLastCalledWith('S1', turns('u2', 'a2'), undefined);
    expect(memory.context()).toEqual({ summary: 'S2', turns: turns('u3', 'a3') });
  });

  it('does nothing while the tail is within bounds', async () => {
    const condenser = vi.fn();
    const memory = new SummaryMemory({ condenser, tailTurns: 2 });
    memory.append(turns('u1', 'a1'));

    await expect(memory.maintain()).resolves.toBe(0);
    expect(condenser).not.toHaveBeenCalled();
  });

  it('keeps the raw turns when condensation fails and retries next time', async () => {
    const condenser = vi.fn().mockRejectedValueOnce(new Error('engine down')).mockResolvedValueOnce('S1');
    const memory = new SummaryMemory({ condenser, tailTurns: 2 });
    memory.append(turns('u1', 'a1', 'u2', 'a2'));

    await expect(memory.maintain()).resolves.toBe(0);
    expect(memory.context()).toEqual({ turns: turns('u1', 'a1', 'u2', 'a2') });

    await expect(memory.maintain()).resolves.toBe(2);
    expect(memory.context().summary).toBe('S1');
  });

  it('ignores an empty summary', async () => {
    const memory = new SummaryMemory({ condenser: async () => '   ', tailTurns: 2 });
    memory.append(turns('u1', 'a1', 'u2', 'a2'));

    await expect(memory.maintain()).resolves.toBe(0);
    expect(memory.context().summary).toBeUndefined();
    expect(memory.turns()).toHaveLength(4);
  });
});

describe('convertMemory', () => {
  const opts = (overrides: Partial<MemoryOptions> = {}): MemoryOptions => ({
    tailTurns: 2,
    condenser: async () => 'S',
    ...overrides,
  });

  it('creates memories of either kind', () => {
    expect(createMemory('buffer', opts()).kind).toBe('buffer');
    expect(createMemory('summary', opts()).kind).toBe('summary');
  });

  it('condenses the overflow when switching from buffer to summary', async () => {
    const buffer = new BufferMemory();
    buffer.append(turns('u1', 'a1', 'u2', 'a2', 'u3', 'a3'));

    const { memory, conversion } = await convertMemory(buffer, 'summary', opts());

    expect(memory.kind).toBe('summary');
    expect(memory.context()).toEqual({ summary: 'S', turns: turns('u3', 'a3') });
    expect(conversion).toEqual({
      from: 'buffer',
      to: 'summary',
      retainedTurns: 2,
      condensedTurns: 4,
      discardedTurns: 0,
      discardedSummary: false,
    });
  });

  it('reports the summary and the turns lost when switching from summary to a capped buffer', async () => {
    const summary = new SummaryMemory({ condenser: async () => 'S', tailTurns: 2 });
    summary.append(turns('u1', 'a1', 'u2', 'a2'));
    await summary.maintain();
    summary.append(turns('u3', 'a3'));

    const { memory, conversion } = await convertMemory(summary, 'buffer', opts({ maxTurns: 2 }));

    expect(memory.context()).toEqual({ turns: turns('u3', 'a3') });
    expect(conversion).toEqual({
      from: 'summary',
      to: 'buffer',
      retainedTurns: 2,
      condensedTurns: 0,
      discardedTurns: 2,
      discardedSummary: true,
    });
  });
});
