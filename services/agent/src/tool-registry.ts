import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  logger,
  withSpan,
  retry,
  raceAbort,
  withTimeout,
  errorMessage,
  DuplicateToolNameError,
  InvalidToolArgumentsError,
  ToolExecutionError,
  UnknownToolError,
  type RetryPolicy,
  type ToolDefinition,
} from '@palaver/shared';

const log = logger.child({ module: 'tool-registry' });

export interface ToolContext {
  /** Fires on caller cancellation or when the tool's timeout elapses */
  signal: AbortSignal;
}

/**
 * What every tool implements. Arguments arrive already validated against
 * `inputSchema`; the tool sees no agent or session state.
 */
export interface ToolCapability<TArgs> {
  name: string;
  description: string;
  inputSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  /** Overrides the registry default */
  timeoutMs?: number;
  invoke(args: TArgs, ctx: ToolContext): Promise<string>;
}

/** Identity helper so `invoke` gets its argument type from the schema */
export function defineTool<TArgs>(tool: ToolCapability<TArgs>): ToolCapability<TArgs> {
  return tool;
}

/** A registered tool with its argument type erased */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  readonly timeoutMs?: number;
  /** Validate raw arguments, then run the capability */
  readonly execute: (rawArgs: unknown, ctx: ToolContext) => Promise<string>;
}

export interface ToolRegistryOptions {
  /** Applied to tools that set no timeout of their own (default: 30000) */
  defaultTimeoutMs?: number;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

function toDescriptor<TArgs>(tool: ToolCapability<TArgs>): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    timeoutMs: tool.timeoutMs,
    execute: async (rawArgs, ctx) => {
      const parsed = tool.inputSchema.safeParse(rawArgs);
      if (!parsed.success) {
        throw new InvalidToolArgumentsError(
          tool.name,
          parsed.error.issues.map((i) => ({ path: i.path, message: i.message })),
        );
      }
      return tool.invoke(parsed.data, ctx);
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInputSchema(schema: z.ZodTypeAny): ToolDefinition['input_schema'] {
  const json: Record<string, unknown> = { ...zodToJsonSchema(schema, { $refStrategy: 'none' }) };
  const { properties, required } = json;
  return {
    type: 'object',
    properties: isRecord(properties) ? properties : {},
    ...(Array.isArray(required)
      ? { required: required.filter((r): r is string => typeof r === 'string') }
      : {}),
  };
}

/**
 * Name -> tool table. Built once at startup and passed to the session store
 * and the agent; registration happens before traffic, lookups afterwards.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly defaultTimeoutMs: number;

  constructor(opts: ToolRegistryOptions = {}) {
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? 30_000;
  }

  register<TArgs>(tool: ToolCapability<TArgs>): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolNameError(tool.name);
    }
    this.tools.set(tool.name, toDescriptor(tool));
    log.info({ tool: tool.name }, 'tool registered');
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  /** Descriptors for the given names, in request order, duplicates dropped */
  resolve(names: readonly string[]): ToolDescriptor[] {
    const seen = new Set<string>();
    const resolved: ToolDescriptor[] = [];
    for (const name of names) {
      if (seen.has(name)) continue;
      seen.add(name);
      const tool = this.tools.get(name);
      if (!tool) throw new UnknownToolError(name);
      resolved.push(tool);
    }
    return resolved;
  }

  /** Tool definitions in the shape the model router sends to providers */
  definitions(descriptors: readonly ToolDescriptor[]): ToolDefinition[] {
    return descriptors.map((d) => ({
      name: d.name,
      description: d.description,
      input_schema: toInputSchema(d.inputSchema),
    }));
  }

  /**
   * Run a tool by name. Every failure comes back as a typed error:
   * UnknownTool, InvalidToolArguments, or ToolExecutionError wrapping
   * whatever the tool threw (including its timeout or a cancellation).
   */
  async invoke(name: string, args: unknown, opts: InvokeOptions = {}): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) throw new UnknownToolError(name);

    const timeoutMs = tool.timeoutMs ?? this.defaultTimeoutMs;
    const { signal, timeout } = withTimeout(timeoutMs, opts.signal);

    return withSpan('tool.invoke', { 'tool.name': name }, async () => {
      const start = Date.now();
      try {
        const output = await raceAbort(tool.execute(args, { signal }), signal);
        log.debug({ tool: name, durationMs: Date.now() - start }, 'tool call succeeded');
        return output;
      } catch (err) {
        if (err instanceof InvalidToolArgumentsError) throw err;
        const cause = timeout.aborted && !opts.signal?.aborted
          ? new Error(`timed out after ${timeoutMs}ms`, { cause: err })
          : err;
        log.warn({ tool: name, err: errorMessage(cause), durationMs: Date.now() - start }, 'tool call failed');
        throw new ToolExecutionError(name, cause);
      }
    });
  }
}

/**
 * Wrap an idempotent tool so transient failures are retried. Invalid
 * arguments and cancellation are never retried.
 */
export function withRetry<TArgs>(tool: ToolCapability<TArgs>, policy: RetryPolicy): ToolCapability<TArgs> {
  return {
    ...tool,
    invoke: (args, ctx) =>
      retry(() => tool.invoke(args, ctx), {
        ...policy,
        signal: ctx.signal,
        shouldRetry: () => !ctx.signal.aborted,
        onRetry: ({ err, attempt, delayMs }) =>
          log.info({ tool: tool.name, attempt, delayMs, err: errorMessage(err) }, 'retrying tool call'),
      }),
  };
}
