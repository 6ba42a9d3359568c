/**
 * ModelRouter — routes chat requests to the appropriate LLM provider.
 *
 * Supports:
 *   - Anthropic (Anthropic SDK)
 *   - OpenAI, Ollama and OpenAI-compatible servers (openai SDK with custom baseURL)
 *
 * The router resolves role or model id -> model definition -> provider adapter,
 * handles fallback chains, and normalises responses into provider-agnostic types.
 */

import Anthropic from '@anthropic-ai/sdk';
import type OpenAI from 'openai';
import { logger } from './logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { isAbortError } from './errors.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  ModelProvider,
  ModelRoles,
  AnthropicProviderConfig,
  OpenAIProviderConfig,
  OllamaProviderConfig,
  OpenAICompatibleProviderConfig,
  ChatParams,
  ChatResponse,
  ChatContentBlock,
  ChatMessage,
  ToolUseBlock,
} from './model-types.js';

const log = logger.child({ module: 'model-router' });

/** The provider answered, but not with anything the router can use */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

// ---------------------------------------------------------------------------
// Runtime type guards — provider payloads are validated, not cast
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate that an Anthropic chat response has the expected shape */
function isValidAnthropicResponse(resp: unknown): resp is {
  content: unknown[];
  stop_reason: string | null;
  model: string;
  usage: { input_tokens: number; output_tokens: number };
} {
  if (!isRecord(resp)) return false;
  return (
    Array.isArray(resp.content) &&
    typeof resp.model === 'string' &&
    isRecord(resp.usage) &&
    typeof resp.usage.input_tokens === 'number' &&
    typeof resp.usage.output_tokens === 'number'
  );
}

/** Convert one raw content block; unknown block types (e.g. thinking) are skipped */
function toContentBlock(block: unknown): ChatContentBlock | undefined {
  if (!isRecord(block)) return undefined;
  if (block.type === 'text' && typeof block.text === 'string') {
    return { type: 'text', text: block.text };
  }
  if (block.type === 'tool_use') {
    if (typeof block.id !== 'string' || typeof block.name !== 'string' || !isRecord(block.input)) {
      throw new MalformedResponseError('tool_use block without id, name or object input');
    }
    return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
  }
  return undefined;
}

function validateContentBlocks(content: unknown[]): ChatContentBlock[] {
  const validated: ChatContentBlock[] = [];
  for (const raw of content) {
    const block = toContentBlock(raw);
    if (block) {
      validated.push(block);
    } else {
      log.debug({ block: raw }, 'dropping unsupported content block from API response');
    }
  }
  return validated;
}

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

interface ProviderAdapter {
  chat(model: ModelDefinition, params: ChatParams): Promise<ChatResponse>;
}

// ---------------------------------------------------------------------------
// Anthropic adapter
// ---------------------------------------------------------------------------

type AnthropicBlocks = Exclude<Anthropic.Messages.MessageParam['content'], string>;

function toAnthropicMessages(messages: ChatMessage[]): Anthropic.Messages.MessageParam[] {
  return messages.map((msg) => {
    if (typeof msg.content === 'string') {
      return { role: msg.role, content: msg.content };
    }
    const blocks: AnthropicBlocks = msg.content.map((b) => {
      switch (b.type) {
        case 'text':
          return { type: 'text' as const, text: b.text };
        case 'tool_use':
          return { type: 'tool_use' as const, id: b.id, name: b.name, input: b.input };
        case 'tool_result':
          return { type: 'tool_result' as const, tool_use_id: b.tool_use_id, content: b.content, is_error: b.is_error };
      }
    });
    return { role: msg.role, content: blocks };
  });
}

function createAnthropicAdapter(providerCfg: AnthropicProviderConfig): ProviderAdapter {
  const apiKey = providerCfg.apiKey || process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('anthropic adapter: no credentials found');
  }
  const client = new Anthropic({ apiKey, baseURL: providerCfg.baseURL });
  log.info('anthropic adapter: initialized');

  return {
    async chat(model: ModelDefinition, params: ChatParams): Promise<ChatResponse> {
      const response: unknown = await client.messages.create(
        {
          model: model.modelName,
          max_tokens: params.maxTokens ?? model.maxTokens,
          system: params.system?.map((b) => ({ type: 'text' as const, text: b.text })),
          tools: params.tools?.map((t) => ({ name: t.name, description: t.description, input_schema: t.input_schema })),
          messages: toAnthropicMessages(params.messages),
          temperature: params.temperature,
        },
        { signal: params.signal },
      );

      if (!isValidAnthropicResponse(response)) {
        throw new MalformedResponseError('anthropic adapter: invalid response shape from API');
      }

      return {
        content: validateContentBlocks(response.content),
        stopReason: response.stop_reason ?? 'end_turn',
        model: response.model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    },
  };
}

// ---------------------------------------------------------------------------
// OpenAI / Ollama / OpenAI-compatible adapter (uses openai SDK)
// ---------------------------------------------------------------------------

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.Completions.ChatCompletionTool;

/** Convert Anthropic-style system/messages to OpenAI chat messages */
function convertToOpenAIMessages(params: ChatParams): OpenAIMessage[] {
  const out: OpenAIMessage[] = [];

  // System blocks -> single system message
  if (params.system && params.system.length > 0) {
    out.push({
      role: 'system',
      content: params.system.map((b) => b.text).join('\n\n'),
    });
  }

  for (const msg of params.messages) {
    if (typeof msg.content === 'string') {
      out.push(
        msg.role === 'assistant'
          ? { role: 'assistant', content: msg.content }
          : { role: 'user', content: msg.content },
      );
      continue;
    }

    const text = msg.content
      .filter((b): b is Extract<ChatContentBlock, { type: 'text' }> => b.type === 'text')
      .map((b) => b.text)
      .join('\n');

    if (msg.role === 'assistant') {
      const toolCalls = msg.content
        .filter((b): b is ToolUseBlock => b.type === 'tool_use')
        .map((b) => ({
          id: b.id,
          type: 'function' as const,
          function: { name: b.name, arguments: JSON.stringify(b.input) },
        }));
      out.push({
        role: 'assistant',
        content: text || null,
        ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
      });
      continue;
    }

    // Tool results become one `tool` message each, in call order
    for (const b of msg.content) {
      if (b.type === 'tool_result') {
        out.push({ role: 'tool', tool_call_id: b.tool_use_id, content: b.content });
      }
    }
    if (text) {
      out.push({ role: 'user', content: text });
    }
  }

  return out;
}

function toOpenAITools(params: ChatParams): OpenAITool[] | undefined {
  if (!params.tools || params.tools.length === 0) return undefined;
  return params.tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: { ...t.input_schema },
    },
  }));
}

function parseToolArguments(raw: string, toolName: string): Record<string, unknown> {
  if (raw.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedResponseError(`tool call '${toolName}' has non-JSON arguments`);
  }
  if (!isRecord(parsed)) {
    throw new MalformedResponseError(`tool call '${toolName}' arguments are not an object`);
  }
  return parsed;
}

function mapFinishReason(reason: string | null | undefined): string {
  switch (reason) {
    case 'stop':
    case null:
    case undefined:
      return 'end_turn';
    case 'tool_calls':
    case 'function_call':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return reason;
  }
}

async function createOpenAICompatibleAdapter(
  providerCfg: OpenAIProviderConfig | OllamaProviderConfig | OpenAICompatibleProviderConfig,
): Promise<ProviderAdapter> {
  // Dynamic import — only loaded if this provider is actually used
  const { default: OpenAIClient } = await import('openai');

  let client: OpenAI;
  switch (providerCfg.provider) {
    case 'openai': {
      const apiKey = providerCfg.apiKey || process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error('openai adapter: no credentials found');
      }
      client = new OpenAIClient({ apiKey, organization: providerCfg.organization, baseURL: providerCfg.baseURL });
      break;
    }
    case 'ollama':
      client = new OpenAIClient({ baseURL: providerCfg.baseURL ?? 'http://localhost:11434/v1', apiKey: 'not-needed' });
      break;
    case 'openai-compatible':
      client = new OpenAIClient({ baseURL: providerCfg.baseURL, apiKey: providerCfg.apiKey ?? 'not-needed' });
      break;
  }

  log.info({ provider: providerCfg.provider }, 'openai-compatible adapter: initialized');

  return {
    async chat(model: ModelDefinition, params: ChatParams): Promise<ChatResponse> {
      const response = await client.chat.completions.create(
        {
          model: model.modelName,
          max_tokens: params.maxTokens ?? model.maxTokens,
          messages: convertToOpenAIMessages(params),
          tools: toOpenAITools(params),
          temperature: params.temperature,
        },
        { signal: params.signal },
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new MalformedResponseError('openai-compatible adapter: no choices in response');
      }

      const content: ChatContentBlock[] = [];
      if (choice.message.content) {
        content.push({ type: 'text', text: choice.message.content });
      }
      for (const call of choice.message.tool_calls ?? []) {
        content.push({
          type: 'tool_use',
          id: call.id,
          name: call.function.name,
          input: parseToolArguments(call.function.arguments, call.function.name),
        });
      }

      return {
        content,
        stopReason: mapFinishReason(choice.finish_reason),
        model: response.model,
        usage: response.usage
          ? {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens ?? 0,
            }
          : undefined,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// ModelRouter class
// ---------------------------------------------------------------------------

export interface ApiCallInfo {
  provider: string;
  model: string;
  durationMs: number;
  inputTokens?: number;
  outputTokens?: number;
  error?: string;
}

export class ModelRouter {
  private adapters: Map<ModelProvider, ProviderAdapter> = new Map();
  private circuitBreakers: Map<ModelProvider, CircuitBreaker> = new Map();
  private config: ModelRouterConfig;
  private onApiCall?: (info: ApiCallInfo) => void;

  private constructor(config: ModelRouterConfig) {
    this.config = config;
  }

  /** The resolved config for external inspection */
  get routerConfig(): ModelRouterConfig {
    return this.config;
  }

  /**
   * Factory: create and initialise a ModelRouter.
   * Eagerly creates the Anthropic adapter; OpenAI-family adapters are lazy.
   */
  static async create(config: ModelRouterConfig): Promise<ModelRouter> {
    const router = new ModelRouter(config);

    const anthropicCfg = config.providers.anthropic;
    if (anthropicCfg && anthropicCfg.provider === 'anthropic') {
      router.adapters.set('anthropic', createAnthropicAdapter(anthropicCfg));
    }

    return router;
  }

  /** Set a callback for API call audit logging */
  setOnApiCall(cb: (info: ApiCallInfo) => void): void {
    this.onApiCall = cb;
  }

  /** Model ids a session may select */
  modelIds(): string[] {
    return this.config.models.map((m) => m.id);
  }

  /** Model id a role resolves to */
  modelForRole(role: keyof ModelRoles): string {
    return this.config.roles[role] ?? this.config.roles.agent;
  }

  private getOrCreateBreaker(provider: ModelProvider): CircuitBreaker {
    let cb = this.circuitBreakers.get(provider);
    if (!cb) {
      cb = new CircuitBreaker({
        name: `model-router-${provider}`,
        failureThreshold: 5,
        resetTimeoutMs: 30_000,
        isFailure: (err) => !isAbortError(err),
      });
      this.circuitBreakers.set(provider, cb);
    }
    return cb;
  }

  // -----------------------------------------------------------------------
  // Model resolution
  // -----------------------------------------------------------------------

  private resolveModel(params: ChatParams): ModelDefinition {
    const role = params.role ?? 'agent';
    const modelId = params.modelOverride ?? this.modelForRole(role);

    const model = this.config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new Error(
        `model-router: unknown model id '${modelId}' for role '${role}'`,
      );
    }

    return model;
  }

  private async getAdapter(provider: ModelProvider): Promise<ProviderAdapter> {
    const existing = this.adapters.get(provider);
    if (existing) return existing;

    const providerCfg = this.config.providers[provider];
    if (!providerCfg) {
      throw new Error(`model-router: no provider config for '${provider}'`);
    }

    if (providerCfg.provider === 'anthropic') {
      const adapter = createAnthropicAdapter(providerCfg);
      this.adapters.set(provider, adapter);
      return adapter;
    }

    const adapter = await createOpenAICompatibleAdapter(providerCfg);
    this.adapters.set(provider, adapter);
    return adapter;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /** Non-streaming chat call with fallback support */
  async chat(params: ChatParams): Promise<ChatResponse> {
    const model = this.resolveModel(params);
    const modelsToTry = [model];

    // Append fallback chain if configured
    if (this.config.fallbackChain) {
      for (const fbId of this.config.fallbackChain) {
        if (fbId === model.id) continue;
        const fbModel = this.config.models.find((m) => m.id === fbId);
        if (fbModel) modelsToTry.push(fbModel);
      }
    }

    let lastError: Error = new Error('All models in fallback chain failed');
    for (const m of modelsToTry) {
      const start = Date.now();
      try {
        const adapter = await this.getAdapter(m.provider);
        const cb = this.getOrCreateBreaker(m.provider);
        log.debug({ model: m.modelName, provider: m.provider, role: params.role ?? 'agent' }, 'routing chat request');
        const result = await cb.execute(() => adapter.chat(m, params));
        const durationMs = Date.now() - start;
        this.onApiCall?.({ provider: m.provider, model: m.modelName, durationMs, inputTokens: result.usage?.inputTokens, outputTokens: result.usage?.outputTokens });
        return result;
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        const durationMs = Date.now() - start;
        this.onApiCall?.({ provider: m.provider, model: m.modelName, durationMs, error: lastError.message });
        // A cancelled request is not a provider failure; do not fall back
        if (params.signal?.aborted || isAbortError(err)) throw lastError;
        log.warn(
          { err, model: m.modelName, provider: m.provider },
          'chat request failed, trying fallback',
        );
      }
    }

    throw lastError;
  }
}
