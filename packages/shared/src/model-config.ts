/**
 * Model configuration loader.
 *
 * Builds a ModelRouterConfig from:
 *   1. A JSON file at MODEL_ROUTER_CONFIG_PATH (optional)
 *   2. Environment variable overrides: DEFAULT_MODEL, SUMMARIZER_MODEL,
 *      OPENAI_API_KEY, OPENAI_BASE_URL, ANTHROPIC_API_KEY
 *   3. Defaults built from whichever provider credentials are present
 */

import { readFile } from 'node:fs/promises';
import { logger } from './logger.js';
import { MODEL_PROVIDERS } from './model-types.js';
import type {
  ModelRouterConfig,
  ModelDefinition,
  ModelProvider,
  ProviderConfig,
  ModelRoles,
} from './model-types.js';

const log = logger.child({ module: 'model-config' });

// ---------------------------------------------------------------------------
// Default configuration
// ---------------------------------------------------------------------------

function defaultProviders(): ModelRouterConfig['providers'] {
  const providers: ModelRouterConfig['providers'] = {};

  const openaiKey = process.env.OPENAI_API_KEY;
  if (openaiKey) {
    providers.openai = {
      provider: 'openai',
      apiKey: openaiKey,
      baseURL: process.env.OPENAI_BASE_URL || undefined,
    };
  }

  const anthropicKey = process.env.ANTHROPIC_API_KEY;
  if (anthropicKey) {
    providers.anthropic = {
      provider: 'anthropic',
      apiKey: anthropicKey,
    };
  }

  return providers;
}

const OPENAI_MODELS: ModelDefinition[] = [
  { id: 'gpt-4o-mini', modelName: 'gpt-4o-mini', provider: 'openai', maxTokens: 1000 },
  { id: 'gpt-4o', modelName: 'gpt-4o', provider: 'openai', maxTokens: 1000 },
];

const ANTHROPIC_MODELS: ModelDefinition[] = [
  { id: 'sonnet-4', modelName: 'claude-sonnet-4-20250514', provider: 'anthropic', maxTokens: 4096 },
  { id: 'haiku-4.5', modelName: 'claude-haiku-4-5-20251001', provider: 'anthropic', maxTokens: 2048 },
];

function defaultModels(providers: ModelRouterConfig['providers']): ModelDefinition[] {
  const models: ModelDefinition[] = [];
  // With no credentials at all the OpenAI models are still listed so that
  // validation reports the missing provider rather than an empty model list
  if (providers.openai || !providers.anthropic) models.push(...OPENAI_MODELS.map((m) => ({ ...m })));
  if (providers.anthropic) models.push(...ANTHROPIC_MODELS.map((m) => ({ ...m })));
  return models;
}

function defaultRoles(providers: ModelRouterConfig['providers']): ModelRoles {
  if (!providers.openai && providers.anthropic) {
    return { agent: 'sonnet-4', summarizer: 'haiku-4.5' };
  }
  return { agent: 'gpt-4o-mini', summarizer: 'gpt-4o-mini' };
}

export function createDefaultConfig(): ModelRouterConfig {
  const providers = defaultProviders();
  return {
    providers,
    models: defaultModels(providers),
    roles: defaultRoles(providers),
  };
}

// ---------------------------------------------------------------------------
// Runtime config shape validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isModelProvider(value: unknown): value is ModelProvider {
  return MODEL_PROVIDERS.some((p) => p === value);
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function parseProvider(key: string, raw: unknown): ProviderConfig | undefined {
  if (!isRecord(raw) || raw.provider !== key) return undefined;
  switch (raw.provider) {
    case 'anthropic':
      return { provider: 'anthropic', apiKey: optionalString(raw, 'apiKey'), baseURL: optionalString(raw, 'baseURL') };
    case 'openai':
      return {
        provider: 'openai',
        apiKey: optionalString(raw, 'apiKey'),
        organization: optionalString(raw, 'organization'),
        baseURL: optionalString(raw, 'baseURL'),
      };
    case 'ollama':
      return { provider: 'ollama', baseURL: optionalString(raw, 'baseURL') };
    case 'openai-compatible': {
      const baseURL = optionalString(raw, 'baseURL');
      if (!baseURL) return undefined;
      return { provider: 'openai-compatible', apiKey: optionalString(raw, 'apiKey'), baseURL };
    }
    default:
      return undefined;
  }
}

function parseModel(raw: unknown): ModelDefinition | undefined {
  if (!isRecord(raw)) return undefined;
  const { id, modelName, provider, maxTokens } = raw;
  if (typeof id !== 'string' || !isModelProvider(provider)) return undefined;
  return {
    id,
    modelName: typeof modelName === 'string' ? modelName : id,
    provider,
    maxTokens: typeof maxTokens === 'number' && maxTokens > 0 ? maxTokens : 1000,
  };
}

/** Returns the parsed config, or a description of the first problem found */
function parseConfigShape(parsed: unknown): ModelRouterConfig | string {
  if (!isRecord(parsed)) return 'expected a JSON object';
  if (!isRecord(parsed.providers)) return '"providers" must be an object';
  if (!Array.isArray(parsed.models)) return '"models" must be an array';
  if (!isRecord(parsed.roles) || typeof parsed.roles.agent !== 'string') {
    return '"roles" must be an object with an "agent" model id';
  }

  const providers: ModelRouterConfig['providers'] = {};
  for (const [key, raw] of Object.entries(parsed.providers)) {
    if (!isModelProvider(key)) return `unknown provider '${key}'`;
    const provider = parseProvider(key, raw);
    if (!provider) return `provider '${key}' is malformed`;
    providers[key] = provider;
  }

  const models: ModelDefinition[] = [];
  for (const raw of parsed.models) {
    const model = parseModel(raw);
    if (!model) return 'each model needs an "id" and a known "provider"';
    models.push(model);
  }

  const summarizer = parsed.roles.summarizer;
  let fallbackChain: string[] | undefined;
  if (parsed.fallbackChain !== undefined) {
    const chain: unknown = parsed.fallbackChain;
    if (!Array.isArray(chain) || !chain.every((id): id is string => typeof id === 'string')) {
      return '"fallbackChain" must be an array of model ids';
    }
    fallbackChain = chain;
  }

  return {
    providers,
    models,
    roles: {
      agent: parsed.roles.agent,
      summarizer: typeof summarizer === 'string' ? summarizer : undefined,
    },
    fallbackChain,
  };
}

// ---------------------------------------------------------------------------
// File-based config loading
// ---------------------------------------------------------------------------

async function loadConfigFromFile(path: string): Promise<ModelRouterConfig> {
  const raw = await readFile(path, 'utf-8');
  const result = parseConfigShape(JSON.parse(raw));

  if (typeof result === 'string') {
    throw new Error(`model-config: invalid config file at '${path}': ${result}`);
  }

  return result;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

/** Point a role at an existing model id/name, or add an ad-hoc model for a raw name */
function overrideRole(
  config: ModelRouterConfig,
  role: keyof ModelRoles,
  requested: string,
  maxTokens: number,
): void {
  const existing = config.models.find(
    (m) => m.id === requested || m.modelName === requested,
  );
  if (existing) {
    config.roles[role] = existing.id;
    return;
  }
  const adHocId = `custom-${role}`;
  config.models.push({
    id: adHocId,
    modelName: requested,
    provider: guessProvider(requested, config),
    maxTokens,
  });
  config.roles[role] = adHocId;
}

function applyEnvOverrides(config: ModelRouterConfig): ModelRouterConfig {
  // Credentials supplied by env fill in providers the file leaves out
  const openaiKey = process.env.OPENAI_API_KEY;
  if (openaiKey && !config.providers.openai) {
    config.providers.openai = { provider: 'openai', apiKey: openaiKey };
  }
  const openaiBaseURL = process.env.OPENAI_BASE_URL;
  const openai = config.providers.openai;
  if (openaiBaseURL && openai?.provider === 'openai') {
    openai.baseURL = openaiBaseURL;
  }
  const anthropicKey = process.env.ANTHROPIC_API_KEY;
  if (anthropicKey && !config.providers.anthropic) {
    config.providers.anthropic = { provider: 'anthropic', apiKey: anthropicKey };
  }

  // DEFAULT_MODEL overrides the agent role — can be a model ID or raw model name
  const defaultModel = process.env.DEFAULT_MODEL;
  if (defaultModel) {
    overrideRole(config, 'agent', defaultModel, 1000);
    log.info({ defaultModel, agentRole: config.roles.agent }, 'DEFAULT_MODEL override applied');
  }

  const summarizerModel = process.env.SUMMARIZER_MODEL;
  if (summarizerModel) {
    overrideRole(config, 'summarizer', summarizerModel, 1000);
    log.info({ summarizerModel, summarizerRole: config.roles.summarizer }, 'SUMMARIZER_MODEL override applied');
  }

  return config;
}

/** Best-effort guess of provider based on model name, validated against config */
function guessProvider(modelName: string, config: ModelRouterConfig): ModelProvider {
  let guessed: ModelProvider;

  if (modelName.startsWith('claude')) {
    guessed = 'anthropic';
  } else if (/^(gpt-|o\d)/.test(modelName)) {
    guessed = 'openai';
  } else if (config.providers['openai-compatible']) {
    guessed = 'openai-compatible';
  } else if (config.providers.ollama) {
    guessed = 'ollama';
  } else {
    guessed = 'openai';
  }

  if (!config.providers[guessed]) {
    throw new Error(
      `Model '${modelName}' appears to be a ${guessed} model but no ${guessed} provider is configured`,
    );
  }

  return guessed;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function validateConfig(config: ModelRouterConfig): void {
  if (Object.keys(config.providers).length === 0) {
    throw new Error(
      'model-config: no providers configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY at minimum.',
    );
  }

  const ids = new Set<string>();
  for (const model of config.models) {
    if (ids.has(model.id)) {
      throw new Error(`model-config: duplicate model id '${model.id}'.`);
    }
    ids.add(model.id);
  }

  // Verify each role points to a known model
  for (const [role, modelId] of Object.entries(config.roles)) {
    if (!modelId) continue;
    const model = config.models.find((m) => m.id === modelId);
    if (!model) {
      throw new Error(
        `model-config: role '${role}' references unknown model id '${modelId}'. ` +
          `Available models: ${config.models.map((m) => m.id).join(', ')}`,
      );
    }
    // Verify the model's provider is configured
    if (!config.providers[model.provider]) {
      throw new Error(
        `model-config: model '${model.id}' uses provider '${model.provider}' but no config exists for that provider.`,
      );
    }
  }

  // Verify fallback chain references valid models
  if (config.fallbackChain) {
    for (const modelId of config.fallbackChain) {
      if (!ids.has(modelId)) {
        throw new Error(
          `model-config: fallback chain references unknown model id '${modelId}'.`,
        );
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Load and return a fully resolved ModelRouterConfig.
 *
 * Resolution order:
 *   1. If MODEL_ROUTER_CONFIG_PATH is set, load from that JSON file
 *   2. Otherwise use built-in defaults
 *   3. Apply env-var overrides
 *   4. Validate the final config
 */
export async function loadModelConfig(): Promise<ModelRouterConfig> {
  let config: ModelRouterConfig;

  const configPath = process.env.MODEL_ROUTER_CONFIG_PATH;
  if (configPath) {
    log.info({ configPath }, 'loading model router config from file');
    config = await loadConfigFromFile(configPath);
  } else {
    log.info('using default model router config');
    config = createDefaultConfig();
  }

  config = applyEnvOverrides(config);
  validateConfig(config);

  log.info(
    {
      providers: Object.keys(config.providers),
      models: config.models.map((m) => m.id),
      roles: config.roles,
    },
    'model router config loaded',
  );

  return config;
}
