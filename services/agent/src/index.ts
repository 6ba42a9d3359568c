import { logger, loadModelConfig, ModelRouter, activeTraceId, type ApiCallInfo } from '@palaver/shared';
import { createAgent } from './agent.js';
import { createApi } from './api.js';
import { loadConfig } from './config.js';
import { createCondenser, createRouterEngine, ReasoningClient } from './reasoning.js';
import { SessionStore } from './session-store.js';
import { ToolRegistry } from './tool-registry.js';
import { registerBuiltinTools } from './tools/index.js';

const log = logger.child({ module: 'agent-service' });

async function main() {
  log.info('starting agent service');
  const config = loadConfig();

  const modelRouter = await ModelRouter.create(await loadModelConfig());
  modelRouter.setOnApiCall((info: ApiCallInfo) => {
    log.info({ ...info, traceId: activeTraceId() }, 'model api call');
  });

  const tools = new ToolRegistry({ defaultTimeoutMs: config.toolTimeoutMs });
  registerBuiltinTools(tools, {
    retry: { maxAttempts: 2, delayMs: 100, backoff: 'fixed' },
  });

  const reasoning = new ReasoningClient(createRouterEngine(modelRouter), {
    timeoutMs: config.reasoningTimeoutMs,
    maxAttempts: config.reasoningMaxAttempts,
    retryDelayMs: config.reasoningRetryDelayMs,
  });

  const store = new SessionStore({
    ttlMs: config.sessionTtlMs,
    defaults: {
      model: modelRouter.modelForRole('agent'),
      temperature: config.defaultTemperature,
      tools: config.defaultTools,
      memoryKind: config.defaultMemoryKind,
    },
    memory: {
      maxTurns: config.memoryMaxTurns,
      tailTurns: config.summaryTailTurns,
      condenser: createCondenser(reasoning),
    },
    tools,
    models: modelRouter.modelIds(),
  });
  store.startSweeper(config.sweepIntervalMs);

  const agent = createAgent({
    store,
    tools,
    reasoning,
    systemPrompt: config.systemPrompt,
    maxIterations: config.maxIterations,
    onBudgetExceeded: config.onBudgetExceeded,
  });

  const app = createApi({
    agent,
    store,
    tools,
    systemPrompt: config.systemPrompt,
    authToken: config.authToken,
    corsOrigins: config.corsOrigins,
  });
  const server = app.listen(config.port, () => {
    log.info({ port: config.port, tools: tools.names(), models: modelRouter.modelIds() }, 'agent API listening');
  });

  // Graceful shutdown
  const shutdown = () => {
    log.info('shutting down');
    store.close();
    server.close((err) => {
      if (err) log.error({ err }, 'error closing server');
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  log.fatal({ err }, 'agent service failed to start');
  process.exit(1);
});
