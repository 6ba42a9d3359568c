/**
 * Model Router types — provider-agnostic model configuration and routing.
 *
 * These types define the configuration schema for routing LLM requests
 * to different providers (Anthropic, OpenAI, Ollama, OpenAI-compatible).
 */

// ---------------------------------------------------------------------------
// Provider enum
// ---------------------------------------------------------------------------

export type ModelProvider = 'anthropic' | 'openai' | 'ollama' | 'openai-compatible';

export const MODEL_PROVIDERS: readonly ModelProvider[] = ['anthropic', 'openai', 'ollama', 'openai-compatible'];

// ---------------------------------------------------------------------------
// Provider credential configuration
// ---------------------------------------------------------------------------

export interface AnthropicProviderConfig {
  provider: 'anthropic';
  apiKey?: string;
  /** Override base URL (default: Anthropic API) */
  baseURL?: string;
}

export interface OpenAIProviderConfig {
  provider: 'openai';
  apiKey?: string;
  /** Override base URL (default: OpenAI API) */
  baseURL?: string;
  /** Organization id sent with every request */
  organization?: string;
}

export interface OllamaProviderConfig {
  provider: 'ollama';
  /** Base URL for the Ollama server (default: http://localhost:11434/v1) */
  baseURL?: string;
}

export interface OpenAICompatibleProviderConfig {
  provider: 'openai-compatible';
  apiKey?: string;
  baseURL: string;
}

export type ProviderConfig =
  | AnthropicProviderConfig
  | OpenAIProviderConfig
  | OllamaProviderConfig
  | OpenAICompatibleProviderConfig;

// ---------------------------------------------------------------------------
// Model definition
// ---------------------------------------------------------------------------

export interface ModelDefinition {
  /** Unique id used to reference this model in roles and session configs (e.g. "gpt-4o-mini") */
  id: string;
  /** Model string sent to the provider API */
  modelName: string;
  /** Key into ModelRouterConfig.providers */
  provider: ModelProvider;
  /** Max tokens for this model's responses */
  maxTokens: number;
}

// ---------------------------------------------------------------------------
// Role assignments
// ---------------------------------------------------------------------------

/** Named roles that map to model IDs */
export interface ModelRoles {
  /** Default model for new sessions */
  agent: string;
  /** Model used to condense summary memory; falls back to agent */
  summarizer?: string;
}

// ---------------------------------------------------------------------------
// Top-level router configuration
// ---------------------------------------------------------------------------

export interface ModelRouterConfig {
  /** All available provider configurations keyed by provider name */
  providers: Partial<Record<ModelProvider, ProviderConfig>>;
  /** All available model definitions */
  models: ModelDefinition[];
  /** Role-to-model-id mapping */
  roles: ModelRoles;
  /** Ordered list of model IDs to try if the primary model fails */
  fallbackChain?: string[];
}

// ---------------------------------------------------------------------------
// Provider-agnostic chat interfaces
// ---------------------------------------------------------------------------

/** A single content block in a message */
export type ChatContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

export type TextBlock = Extract<ChatContentBlock, { type: 'text' }>;
export type ToolUseBlock = Extract<ChatContentBlock, { type: 'tool_use' }>;
export type ToolResultBlock = Extract<ChatContentBlock, { type: 'tool_result' }>;

/** A message in the chat history */
export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string | ChatContentBlock[];
}

/** System block for the prompt */
export interface SystemBlock {
  type: 'text';
  text: string;
}

/** Tool definition (Anthropic layout; converted for OpenAI-style providers) */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

/** Parameters for a chat request routed through the ModelRouter */
export interface ChatParams {
  /** Which role to use for model selection (defaults to 'agent') */
  role?: keyof ModelRoles;
  /** Override the model ID for this specific request */
  modelOverride?: string;
  /** System prompt blocks */
  system?: SystemBlock[];
  /** Conversation messages */
  messages: ChatMessage[];
  /** Tool definitions */
  tools?: ToolDefinition[];
  /** Maximum tokens in the response */
  maxTokens?: number;
  /** Sampling temperature in [0, 1] */
  temperature?: number;
  /** Aborts the in-flight provider request */
  signal?: AbortSignal;
}

/** Response from a non-streaming chat call */
export interface ChatResponse {
  /** The content blocks returned by the model */
  content: ChatContentBlock[];
  /** Why the model stopped generating */
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens' | string;
  /** Model ID that was actually used */
  model: string;
  /** Token usage, if available */
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Join the text blocks of a response */
export function responseText(content: ChatContentBlock[]): string {
  return content
    .filter((b): b is TextBlock => b.type === 'text')
    .map((b) => b.text)
    .join('\n');
}
