import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import {
  logger,
  activeTraceId,
  IterationBudgetExceededError,
  PalaverError,
  ReasoningEngineUnavailableError,
  SessionNotFoundError,
  type SessionConfig,
  type ToolTraceEntry,
  type Usage,
} from '@palaver/shared';
import { systemBlocks, type Agent, type ExchangeResult } from './agent.js';
import type { MemoryConversion } from './memory/index.js';
import type { SessionDebugView, SessionSnapshot, SessionStore } from './session-store.js';
import type { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'api' });

export interface ApiDeps {
  agent: Agent;
  store: SessionStore;
  tools: ToolRegistry;
  /** Base system prompt, shown by the debug view */
  systemPrompt: string;
  /** Bearer token required on every route but /ping; unset disables auth */
  authToken?: string;
  /** Allowed origins; unset allows all */
  corsOrigins?: string[];
}

function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.byteLength !== right.byteLength) return false;
  return timingSafeEqual(left, right);
}

function authMiddleware(configuredToken: string | undefined) {
  if (!configuredToken) {
    log.warn('AUTH_TOKEN not configured - running without authentication');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    // Health checks bypass auth
    if (req.path === '/ping' || !configuredToken) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'unauthorized' } });
      return;
    }
    const providedToken = authHeader.slice(7);

    if (!safeCompare(providedToken, configuredToken)) {
      res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'unauthorized' } });
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

const toolList = z.array(z.string().min(1));

const chatBody = z.object({
  message: z.string().min(1, 'message must not be empty'),
  session_id: z.string().min(1).optional(),
  temperature: z.number().min(0).max(1).optional(),
  tools: toolList.optional(),
  model: z.string().min(1).optional(),
  persist: z.boolean().optional(),
});

const configBody = z
  .object({
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(1).optional(),
    tools: toolList.optional(),
    memory_kind: z.enum(['buffer', 'summary']).optional(),
  })
  .strict();

// ---------------------------------------------------------------------------
// Wire shapes (snake_case)
// ---------------------------------------------------------------------------

function usageOut(usage: Usage) {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

function traceOut(entry: ToolTraceEntry) {
  return {
    id: entry.id,
    name: entry.name,
    arguments: entry.arguments,
    status: entry.status,
    ...(entry.output !== undefined ? { output: entry.output } : {}),
    ...(entry.error ? { error: entry.error } : {}),
    duration_ms: entry.durationMs,
  };
}

function configOut(config: SessionConfig) {
  return {
    model: config.model,
    temperature: config.temperature,
    tools: config.tools,
    memory_kind: config.memoryKind,
  };
}

function conversionOut(c: MemoryConversion) {
  return {
    from: c.from,
    to: c.to,
    retained_turns: c.retainedTurns,
    condensed_turns: c.condensedTurns,
    discarded_turns: c.discardedTurns,
    discarded_summary: c.discardedSummary,
  };
}

function exchangeOut(result: ExchangeResult) {
  return {
    session_id: result.sessionId,
    reply: result.reply,
    usage: usageOut(result.usage),
    tool_calls: result.toolTrace.map(traceOut),
    iterations: result.iterations,
    degraded: result.degraded,
  };
}

function snapshotOut(snapshot: SessionSnapshot) {
  return {
    session_id: snapshot.sessionId,
    created_at: snapshot.createdAt,
    last_interaction: snapshot.lastInteraction,
    config: configOut(snapshot.config),
    history: snapshot.history.map((h) => ({ role: h.role, content: h.content })),
  };
}

function debugOut(view: SessionDebugView, systemPrompt: string) {
  return {
    session_id: view.sessionId,
    config: configOut(view.config),
    system_prompt: systemBlocks(systemPrompt, view.summary).map((b) => b.text),
    summary: view.summary ?? null,
    turns: view.turns.map((t) => ({
      role: t.role,
      content: t.content,
      ...(t.toolTrace ? { tool_calls: t.toolTrace.map(traceOut) } : {}),
    })),
    busy: view.busy,
    queued: view.queued,
  };
}

/** Body of an error response; loop and engine faults carry the partial tool trace */
function errorOut(err: PalaverError) {
  const detail =
    err instanceof IterationBudgetExceededError || err instanceof ReasoningEngineUnavailableError
      ? { tool_calls: err.trace.map(traceOut) }
      : {};
  return {
    error: { code: err.code, message: err.message, retryable: err.retryable, context: err.context, ...detail },
  };
}

function sendInvalid(res: Response, error: z.ZodError): void {
  const message = error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
  res.status(400).json({ error: { code: 'INVALID_REQUEST', message } });
}

function sendError(res: Response, err: unknown, route: string): void {
  if (err instanceof PalaverError) {
    log.info({ route, code: err.code, err: err.message }, 'request failed');
    if (!res.headersSent) {
      res.status(err.status).json(errorOut(err));
    }
    return;
  }
  log.error({ err, route }, 'unhandled error');
  if (!res.headersSent) {
    res.status(500).json({ error: { code: 'INTERNAL', message: 'internal server error' } });
  }
}

export function createApi(deps: ApiDeps) {
  const { agent, store, tools } = deps;
  const app = express();
  app.use(express.json());

  // CORS — restrict origins in production, permissive in dev
  const allowedOrigins = deps.corsOrigins ?? null;

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (!allowedOrigins || (origin && allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin ?? '*');
    }
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  });

  // Trace ID header middleware
  app.use((_req, res, next) => {
    const traceId = activeTraceId();
    if (traceId) {
      res.setHeader('X-Trace-Id', traceId);
    }
    next();
  });

  // Auth middleware — after CORS (so preflight OPTIONS pass), before routes
  app.use(authMiddleware(deps.authToken));

  app.get('/ping', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'palaver',
      sessions: store.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/chat', async (req, res) => {
    const body = chatBody.safeParse(req.body);
    if (!body.success) {
      sendInvalid(res, body.error);
      return;
    }
    const { message, session_id: sessionId, temperature, tools: toolNames, model, persist } = body.data;

    // A client that goes away cancels its exchange
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('client disconnected'));
    });

    try {
      log.info({ message: message.slice(0, 200), sessionId }, 'chat request');
      const result = await agent.exchange(
        { message, sessionId, temperature, tools: toolNames, model, persist },
        { signal: controller.signal },
      );
      res.json(exchangeOut(result));
    } catch (err) {
      sendError(res, err, 'POST /chat');
    }
  });

  app.get('/sessions/:id', (req, res) => {
    try {
      res.json(snapshotOut(store.getSnapshot(req.params.id)));
    } catch (err) {
      sendError(res, err, 'GET /sessions/:id');
    }
  });

  app.get('/sessions/:id/debug', (req, res) => {
    try {
      res.json(debugOut(store.getDebugView(req.params.id), deps.systemPrompt));
    } catch (err) {
      sendError(res, err, 'GET /sessions/:id/debug');
    }
  });

  app.patch('/sessions/:id/config', async (req, res) => {
    const body = configBody.safeParse(req.body);
    if (!body.success) {
      sendInvalid(res, body.error);
      return;
    }
    const { memory_kind: memoryKind, ...rest } = body.data;

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('client disconnected'));
    });

    try {
      const result = await store.applyConfigUpdate(
        req.params.id,
        { ...rest, ...(memoryKind ? { memoryKind } : {}) },
        { signal: controller.signal },
      );
      res.json({
        config: configOut(result.config),
        ...(result.memoryConversion ? { memory_conversion: conversionOut(result.memoryConversion) } : {}),
      });
    } catch (err) {
      sendError(res, err, 'PATCH /sessions/:id/config');
    }
  });

  app.delete('/sessions/:id', (req, res) => {
    try {
      if (!store.delete(req.params.id)) throw new SessionNotFoundError(req.params.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'DELETE /sessions/:id');
    }
  });

  app.get('/tools', (_req, res) => {
    res.json({ tools: tools.definitions(tools.resolve(tools.names())) });
  });

  // Body parser failures and anything a route did not catch
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: 'INVALID_REQUEST', message: 'malformed JSON body' } });
      return;
    }
    sendError(res, err, 'middleware');
  });

  return app;
}
