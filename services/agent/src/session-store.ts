import { randomUUID } from 'node:crypto';
import {
  logger,
  SessionBusyError,
  SessionNotFoundError,
  UnknownModelError,
  type SessionConfig,
  type SessionConfigUpdate,
  type Turn,
} from '@palaver/shared';
import { ExecutionLock } from './execution-lock.js';
import {
  convertMemory,
  createMemory,
  type HistoryEntry,
  type Memory,
  type MemoryConversion,
  type MemoryOptions,
} from './memory/index.js';
import type { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'session-store' });

export interface SessionSnapshot {
  sessionId: string;
  createdAt: string;
  lastInteraction: string;
  config: SessionConfig;
  history: HistoryEntry[];
}

/** Everything memory holds for a session, tool traces included */
export interface SessionDebugView {
  sessionId: string;
  config: SessionConfig;
  summary?: string;
  turns: Turn[];
  /** An exchange or config update holds the lock */
  busy: boolean;
  /** Operations waiting behind it */
  queued: number;
}

export interface ConfigUpdateResult {
  config: SessionConfig;
  /** Present when the memory kind changed */
  memoryConversion?: MemoryConversion;
}

function copyConfig(config: SessionConfig): SessionConfig {
  return { ...config, tools: [...config.tools] };
}

/**
 * One conversation. Config and memory are only replaced together, and only
 * by the store while the session's lock is held.
 */
export class Session {
  readonly lock = new ExecutionLock();
  private _config: SessionConfig;
  private _memory: Memory;
  private _lastInteraction: number;

  constructor(
    readonly id: string,
    readonly createdAt: number,
    config: SessionConfig,
    memory: Memory,
  ) {
    this._config = copyConfig(config);
    this._memory = memory;
    this._lastInteraction = createdAt;
  }

  get config(): SessionConfig {
    return copyConfig(this._config);
  }

  get memory(): Memory {
    return this._memory;
  }

  get lastInteraction(): number {
    return this._lastInteraction;
  }

  /** Never moves backwards */
  touch(at: number): void {
    this._lastInteraction = Math.max(this._lastInteraction, at);
  }

  replaceState(config: SessionConfig, memory: Memory): void {
    if (!this.lock.isHeld) {
      throw new Error(`session ${this.id}: state replaced without holding its lock`);
    }
    this._config = copyConfig(config);
    this._memory = memory;
  }
}

export interface SessionStoreOptions {
  /** Idle time after which a session may be evicted */
  ttlMs: number;
  /** Configuration new sessions start with */
  defaults: SessionConfig;
  memory: MemoryOptions;
  tools: ToolRegistry;
  /** Model ids a session may select */
  models: readonly string[];
  /** Clock, for tests */
  now?: () => number;
}

/**
 * In-process session table with TTL expiry.
 *
 * The id -> session map is only read and written in synchronous code, so two
 * requests for one id always see the same Session, and requests for different
 * ids never wait on each other. Work on a session's memory happens under that
 * session's own lock.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly defaults: SessionConfig;
  private readonly memoryOptions: MemoryOptions;
  private readonly tools: ToolRegistry;
  private readonly models: readonly string[];
  private readonly now: () => number;
  private sweeper?: ReturnType<typeof setInterval>;

  constructor(opts: SessionStoreOptions) {
    this.ttlMs = opts.ttlMs;
    this.defaults = copyConfig(opts.defaults);
    this.memoryOptions = opts.memory;
    this.tools = opts.tools;
    this.models = opts.models;
    this.now = opts.now ?? Date.now;
    this.validate(this.defaults);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Live session for the id, or a new one (under that id, or a fresh UUID) */
  resolveOrCreate(sessionId?: string): Session {
    if (sessionId !== undefined) {
      const live = this.getLive(sessionId);
      if (live) return live;
    }

    const id = sessionId ?? randomUUID();
    const session = new Session(id, this.now(), this.defaults, createMemory(this.defaults.memoryKind, this.memoryOptions));
    this.sessions.set(id, session);
    log.info({ sessionId: id, memoryKind: this.defaults.memoryKind }, 'session created');
    return session;
  }

  /** Live session or SessionNotFound */
  require(sessionId: string): Session {
    const session = this.getLive(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /**
   * Merge a partial config into the session's, under its lock. Changing the
   * memory kind swaps the memory instance and reports what was lost.
   */
  async applyConfigUpdate(
    sessionId: string,
    update: SessionConfigUpdate,
    opts: { signal?: AbortSignal } = {},
  ): Promise<ConfigUpdateResult> {
    const session = this.require(sessionId);
    const result = await session.lock.runExclusive(
      () => this.reconfigure(session, update, opts.signal),
      opts.signal,
    );
    this.touchSession(session);
    return result;
  }

  /** Same as applyConfigUpdate for a caller that already holds the session's lock */
  async reconfigure(session: Session, update: SessionConfigUpdate, signal?: AbortSignal): Promise<ConfigUpdateResult> {
    const current = session.config;
    const next: SessionConfig = {
      model: update.model ?? current.model,
      temperature: update.temperature ?? current.temperature,
      tools: update.tools ? [...new Set(update.tools)] : current.tools,
      memoryKind: update.memoryKind ?? current.memoryKind,
    };
    this.validate(next);

    if (next.memoryKind === current.memoryKind) {
      session.replaceState(next, session.memory);
      return { config: copyConfig(next) };
    }

    const { memory, conversion } = await convertMemory(session.memory, next.memoryKind, this.memoryOptions, signal);
    session.replaceState(next, memory);
    log.info({ sessionId: session.id, ...conversion }, 'session memory kind changed');
    return { config: copyConfig(next), memoryConversion: conversion };
  }

  touch(sessionId: string): void {
    this.touchSession(this.require(sessionId));
  }

  /** Touch a session already in hand */
  touchSession(session: Session): void {
    session.touch(this.now());
  }

  /** UnknownModel unless the id is one a session may select */
  assertModel(modelId: string): void {
    if (!this.models.includes(modelId)) {
      throw new UnknownModelError(modelId, this.models);
    }
  }

  getSnapshot(sessionId: string): SessionSnapshot {
    const session = this.require(sessionId);
    return {
      sessionId: session.id,
      createdAt: new Date(session.createdAt).toISOString(),
      lastInteraction: new Date(session.lastInteraction).toISOString(),
      config: session.config,
      history: session.memory.history(),
    };
  }

  getDebugView(sessionId: string): SessionDebugView {
    const session = this.require(sessionId);
    const { summary, turns } = session.memory.context();
    return {
      sessionId: session.id,
      config: session.config,
      ...(summary !== undefined ? { summary } : {}),
      turns,
      busy: session.lock.isHeld,
      queued: session.lock.queueLength,
    };
  }

  /**
   * Drop a session. Refused with SessionBusy while its lock is held or
   * awaited, so no exchange can commit into a session that is no longer
   * reachable by its id.
   */
  delete(sessionId: string): boolean {
    const session = this.getLive(sessionId);
    if (!session) return false;
    if (session.lock.isBusy) throw new SessionBusyError(sessionId);
    this.sessions.delete(sessionId);
    log.info({ sessionId }, 'session deleted');
    return true;
  }

  /** Remove idle sessions; a session whose lock is held or awaited is skipped */
  evictExpired(): string[] {
    const now = this.now();
    const evicted: string[] = [];
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        evicted.push(id);
      }
    }
    if (evicted.length > 0) {
      log.info({ evicted: evicted.length, remaining: this.sessions.size }, 'expired sessions evicted');
    }
    return evicted;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.evictExpired(), intervalMs);
    this.sweeper.unref();
  }

  close(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  private isExpired(session: Session, now: number): boolean {
    return !session.lock.isBusy && now - session.lastInteraction > this.ttlMs;
  }

  /** Lazy expiry: an expired entry is dropped on access */
  private getLive(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    if (this.isExpired(session, this.now())) {
      this.sessions.delete(sessionId);
      log.info({ sessionId }, 'session expired');
      return undefined;
    }
    return session;
  }

  private validate(config: SessionConfig): void {
    this.assertModel(config.model);
    // Throws UnknownTool for the first unregistered name
    this.tools.resolve(config.tools);
  }
}
