import { describe, it, expect } from 'vitest';
import { SessionBusyError, SessionNotFoundError, UnknownModelError, UnknownToolError, type ToolTraceEntry } from '@palaver/shared';
import { TEST_DEFAULTS, deferred, echoRegistry, makeStore } from './helpers.js';

function clock(start = 0) {
  let t = start;
  return {
    now: () => t,
    set: (value: number) => {
      t = value;
    },
  };
}

describe('SessionStore', () => {
  it('creates a session with the defaults under the given id', () => {
    const c = clock();
    const store = makeStore(echoRegistry(), { now: c.now });

    const session = store.resolveOrCreate('s1');

    expect(session.id).toBe('s1');
    expect(session.config).toEqual(TEST_DEFAULTS);
    expect(session.memory.kind).toBe('buffer');
    expect(store.resolveOrCreate('s1')).toBe(session);
    expect(store.size).toBe(1);
  });

  it('generates an id when none is given', () => {
    const store = makeStore(echoRegistry());
    const session = store.resolveOrCreate();
    expect(session.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('expires an idle session once the TTL has passed', () => {
    const c = clock();
    const store = makeStore(echoRegistry(), { ttlMs: 1000, now: c.now });
    const session = store.resolveOrCreate('s1');

    c.set(1000);
    expect(store.require('s1')).toBe(session);

    c.set(1001);
    expect(() => store.require('s1')).toThrow(SessionNotFoundError);

    const fresh = store.resolveOrCreate('s1');
    expect(fresh).not.toBe(session);
    expect(fresh.memory.turns()).toEqual([]);
  });

  it('keeps lastInteraction monotonic', () => {
    const c = clock(500);
    const store = makeStore(echoRegistry(), { now: c.now });
    const session = store.resolveOrCreate('s1');

    c.set(200);
    store.touch('s1');
    expect(session.lastInteraction).toBe(500);

    c.set(900);
    store.touch('s1');
    expect(session.lastInteraction).toBe(900);
  });

  it('never evicts a session whose lock is busy', async () => {
    const c = clock();
    const store = makeStore(echoRegistry(), { ttlMs: 1000, now: c.now });
    const session = store.resolveOrCreate('s1');
    const gate = deferred();

    const running = session.lock.runExclusive(() => gate.promise);
    c.set(5000);
    expect(store.evictExpired()).toEqual([]);
    expect(store.require('s1')).toBe(session);

    gate.resolve();
    await running;
    expect(store.evictExpired()).toEqual(['s1']);
    expect(store.size).toBe(0);
  });

  it('treats an empty update as a no-op', async () => {
    const store = makeStore(echoRegistry());
    const session = store.resolveOrCreate('s1');
    const memory = session.memory;

    const result = await store.applyConfigUpdate('s1', {});

    expect(result).toEqual({ config: TEST_DEFAULTS });
    expect(session.config).toEqual(TEST_DEFAULTS);
    expect(session.memory).toBe(memory);
  });

  it('merges a partial update and drops duplicate tools', async () => {
    const store = makeStore(echoRegistry());
    store.resolveOrCreate('s1');

    const { config } = await store.applyConfigUpdate('s1', { temperature: 0.7, tools: ['echo', 'echo'] });

    expect(config).toEqual({ ...TEST_DEFAULTS, temperature: 0.7, tools: ['echo'] });
  });

  it('rejects unknown tools and models without changing the session', async () => {
    const store = makeStore(echoRegistry());
    const session = store.resolveOrCreate('s1');

    await expect(store.applyConfigUpdate('s1', { tools: ['upper'] })).rejects.toThrow(UnknownToolError);
    await expect(store.applyConfigUpdate('s1', { model: 'gpt-9' })).rejects.toThrow(UnknownModelError);
    expect(session.config).toEqual(TEST_DEFAULTS);
    expect(session.lock.isBusy).toBe(false);
  });

  it('swaps the memory and reports the conversion when the kind changes', async () => {
    const store = makeStore(echoRegistry());
    const session = store.resolveOrCreate('s1');
    session.memory.append([
      { role: 'user', content: 'u1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'a2' },
    ]);

    const result = await store.applyConfigUpdate('s1', { memoryKind: 'summary' });

    expect(result.memoryConversion).toEqual({
      from: 'buffer',
      to: 'summary',
      retainedTurns: 2,
      condensedTurns: 2,
      discardedTurns: 0,
      discardedSummary: false,
    });
    expect(session.memory.kind).toBe('summary');
    expect(session.memory.context()).toEqual({
      summary: 'condensed',
      turns: [
        { role: 'user', content: 'u2' },
        { role: 'assistant', content: 'a2' },
      ],
    });
  });

  it('refuses to replace state without the lock', () => {
    const store = makeStore(echoRegistry());
    const session = store.resolveOrCreate('s1');
    expect(() => session.replaceState(TEST_DEFAULTS, session.memory)).toThrow(
      'session s1: state replaced without holding its lock',
    );
  });

  it('reports a snapshot with ISO timestamps', () => {
    const c = clock(0);
    const store = makeStore(echoRegistry(), { now: c.now });
    const session = store.resolveOrCreate('s1');
    session.memory.append([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!' },
    ]);
    c.set(1500);
    store.touch('s1');

    expect(store.getSnapshot('s1')).toEqual({
      sessionId: 's1',
      createdAt: '1970-01-01T00:00:00.000Z',
      lastInteraction: '1970-01-01T00:00:01.500Z',
      config: TEST_DEFAULTS,
      history: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello!' },
      ],
    });
  });

  it('deletes sessions', () => {
    const store = makeStore(echoRegistry());
    store.resolveOrCreate('s1');

    expect(store.delete('s1')).toBe(true);
    expect(store.delete('s1')).toBe(false);
    expect(() => store.getSnapshot('s1')).toThrow(new SessionNotFoundError('s1'));
  });

  it('refuses to delete a session while an exchange holds its lock', async () => {
    const store = makeStore(echoRegistry());
    const session = store.resolveOrCreate('s1');
    const gate = deferred();

    const running = session.lock.runExclusive(async () => {
      await gate.promise;
      session.memory.append([
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'one' },
      ]);
    });

    expect(() => store.delete('s1')).toThrow(new SessionBusyError('s1'));
    // The next request for the id still reaches the same session
    expect(store.resolveOrCreate('s1')).toBe(session);

    gate.resolve();
    await running;
    expect(store.getSnapshot('s1').history).toEqual([
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'one' },
    ]);
    expect(store.delete('s1')).toBe(true);
    expect(store.size).toBe(0);
  });

  it('exposes turns with their tool traces and the summary in the debug view', async () => {
    const store = makeStore(echoRegistry(), { defaults: { ...TEST_DEFAULTS, memoryKind: 'summary' } });
    const session = store.resolveOrCreate('s1');
    const toolTrace: ToolTraceEntry[] = [
      { id: 'c1', name: 'echo', arguments: { text: 'x' }, status: 'ok', output: 'x', durationMs: 3 },
    ];
    session.memory.append([
      { role: 'user', content: 'u1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'u2' },
      { role: 'assistant', content: 'a2', toolTrace },
    ]);
    await session.memory.maintain();

    expect(store.getDebugView('s1')).toEqual({
      sessionId: 's1',
      config: { ...TEST_DEFAULTS, memoryKind: 'summary' },
      summary: 'condensed',
      turns: [
        { role: 'user', content: 'u2' },
        { role: 'assistant', content: 'a2', toolTrace },
      ],
      busy: false,
      queued: 0,
    });
    expect(() => store.getDebugView('nope')).toThrow(new SessionNotFoundError('nope'));
  });

  it('validates the defaults up front', () => {
    expect(() => makeStore(echoRegistry(), { defaults: { ...TEST_DEFAULTS, tools: ['upper'] } })).toThrow(
      UnknownToolError,
    );
  });
});
