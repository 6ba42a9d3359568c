import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { MemoryKind } from '@palaver/shared';
import type { BudgetExceededPolicy } from './agent.js';

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant.

Answer concisely and in the language the user writes in. When a tool can answer part of the question
(the current time, a date calculation), call it instead of guessing, then use its result in your reply.
If a tool reports an error, explain what went wrong or try a different approach.`;

/** Unset and empty variables both mean "use the default" */
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: env(z.coerce.number().int().min(0).max(65535).default(3000)),
  AUTH_TOKEN: env(z.string().optional()),
  CORS_ORIGINS: env(z.string().optional()),
  SESSION_TTL_SECONDS: env(positiveInt.default(3600)),
  SESSION_SWEEP_INTERVAL_SECONDS: env(positiveInt.default(60)),
  DEFAULT_TEMPERATURE: env(z.coerce.number().min(0).max(1).default(0)),
  DEFAULT_MEMORY_KIND: env(z.enum(['buffer', 'summary']).default('buffer')),
  MEMORY_MAX_TURNS: env(z.coerce.number().int().min(2).optional()),
  SUMMARY_TAIL_TURNS: env(z.coerce.number().int().min(2).default(6)),
  DEFAULT_TOOLS: env(z.string().default('')),
  MAX_ITERATIONS: env(positiveInt.default(8)),
  ON_BUDGET_EXCEEDED: env(z.enum(['error', 'degraded-reply']).default('error')),
  REASONING_TIMEOUT_MS: env(positiveInt.default(60_000)),
  REASONING_MAX_ATTEMPTS: env(positiveInt.default(3)),
  REASONING_RETRY_DELAY_MS: env(z.coerce.number().int().min(0).default(500)),
  TOOL_TIMEOUT_MS: env(positiveInt.default(30_000)),
  SYSTEM_PROMPT_PATH: env(z.string().optional()),
});

export interface ServiceConfig {
  port: number;
  authToken?: string;
  /** Undefined allows every origin */
  corsOrigins?: string[];
  sessionTtlMs: number;
  sweepIntervalMs: number;
  defaultTemperature: number;
  defaultMemoryKind: MemoryKind;
  memoryMaxTurns?: number;
  summaryTailTurns: number;
  defaultTools: string[];
  maxIterations: number;
  onBudgetExceeded: BudgetExceededPolicy;
  reasoningTimeoutMs: number;
  reasoningMaxAttempts: number;
  reasoningRetryDelayMs: number;
  toolTimeoutMs: number;
  systemPrompt: string;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Read the service configuration from the environment. Throws on the first
 * invalid value so the process fails at startup rather than on first use.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  let systemPrompt = DEFAULT_SYSTEM_PROMPT;
  if (e.SYSTEM_PROMPT_PATH) {
    try {
      systemPrompt = readFileSync(e.SYSTEM_PROMPT_PATH, 'utf-8').trim();
    } catch (err) {
      throw new Error(`cannot read system prompt at '${e.SYSTEM_PROMPT_PATH}'`, { cause: err });
    }
  }

  return {
    port: e.PORT,
    authToken: e.AUTH_TOKEN,
    corsOrigins: e.CORS_ORIGINS === undefined ? undefined : splitList(e.CORS_ORIGINS),
    sessionTtlMs: e.SESSION_TTL_SECONDS * 1000,
    sweepIntervalMs: e.SESSION_SWEEP_INTERVAL_SECONDS * 1000,
    defaultTemperature: e.DEFAULT_TEMPERATURE,
    defaultMemoryKind: e.DEFAULT_MEMORY_KIND,
    memoryMaxTurns: e.MEMORY_MAX_TURNS,
    summaryTailTurns: e.SUMMARY_TAIL_TURNS,
    defaultTools: [...new Set(splitList(e.DEFAULT_TOOLS))],
    maxIterations: e.MAX_ITERATIONS,
    onBudgetExceeded: e.ON_BUDGET_EXCEEDED,
    reasoningTimeoutMs: e.REASONING_TIMEOUT_MS,
    reasoningMaxAttempts: e.REASONING_MAX_ATTEMPTS,
    reasoningRetryDelayMs: e.REASONING_RETRY_DELAY_MS,
    toolTimeoutMs: e.TOOL_TIMEOUT_MS,
    systemPrompt,
  };
}
