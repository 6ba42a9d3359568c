export * from './types.js';
export * from './errors.js';
export { logger, type Logger } from './logger.js';
export * from './model-types.js';
export { ModelRouter, MalformedResponseError, type ApiCallInfo } from './model-router.js';
export { loadModelConfig, createDefaultConfig, validateConfig } from './model-config.js';
export { getTracer, activeTraceId, withSpan } from './tracing.js';
export { CircuitBreaker, CircuitOpenError, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
export { retry, backoffDelay, type BackoffKind, type RetryPolicy, type RetryOptions } from './retry.js';
export { raceAbort, withTimeout } from './abort.js';
