/**
 * Bedrock model catalog.
 *
 * Maps logical model names (and their aliases) to Bedrock model identifiers
 * and default generation parameters.
 */

import { UnknownModelError } from '../models/errors';

export type ModelVendor = 'anthropic' | 'amazon';

export interface BedrockModelConfig {
  modelId: string;
  name: string;
  provider: ModelVendor;
  maxTokens: number;
  temperature: number;
  supportsSystemMessages: boolean;
  supportsStreaming: boolean;
  costPer1kInputTokens: number;
  costPer1kOutputTokens: number;
}

export const BEDROCK_MODELS: Readonly<Record<string, BedrockModelConfig>> = {
  'claude-3-7-sonnet': {
    modelId: 'anthropic.claude-3-7-sonnet-20250219-v1:0',
    name: 'Claude 3.7 Sonnet',
    provider: 'anthropic',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.003,
    costPer1kOutputTokens: 0.015,
  },
  'claude-3-5-sonnet': {
    modelId: 'anthropic.claude-3-5-sonnet-20240620-v1:0',
    name: 'Claude 3.5 Sonnet',
    provider: 'anthropic',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.003,
    costPer1kOutputTokens: 0.015,
  },
  'claude-3-sonnet': {
    modelId: 'anthropic.claude-3-sonnet-20240229-v1:0',
    name: 'Claude 3 Sonnet',
    provider: 'anthropic',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.003,
    costPer1kOutputTokens: 0.015,
  },
  'claude-3-haiku': {
    modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
    name: 'Claude 3 Haiku',
    provider: 'anthropic',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.00025,
    costPer1kOutputTokens: 0.00125,
  },
  'nova-pro': {
    modelId: 'amazon.nova-pro-v1:0',
    name: 'Amazon Nova Pro',
    provider: 'amazon',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.0008,
    costPer1kOutputTokens: 0.0032,
  },
  'nova-lite': {
    modelId: 'amazon.nova-lite-v1:0',
    name: 'Amazon Nova Lite',
    provider: 'amazon',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.0002,
    costPer1kOutputTokens: 0.0008,
  },
  'nova-micro': {
    modelId: 'amazon.nova-micro-v1:0',
    name: 'Amazon Nova Micro',
    provider: 'amazon',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: true,
    supportsStreaming: false,
    costPer1kInputTokens: 0.000035,
    costPer1kOutputTokens: 0.00014,
  },
  'titan-text-express': {
    modelId: 'amazon.titan-text-express-v1',
    name: 'Amazon Titan Text Express',
    provider: 'amazon',
    maxTokens: 4096,
    temperature: 0.7,
    supportsSystemMessages: false,
    supportsStreaming: false,
    costPer1kInputTokens: 0.0008,
    costPer1kOutputTokens: 0.0016,
  },
};

export const MODEL_ALIASES: Readonly<Record<string, string>> = {
  'claude': 'claude-3-7-sonnet',
  'claude-3.7': 'claude-3-7-sonnet',
  'claude-sonnet': 'claude-3-5-sonnet',
  'claude-3.5': 'claude-3-5-sonnet',
  'claude-3': 'claude-3-sonnet',
  'claude-fast': 'claude-3-haiku',
  'nova': 'nova-pro',
  'titan': 'titan-text-express',
};

export const DEFAULT_MODEL = 'nova-pro';

/** Bedrock model identifiers start with the vendor namespace. */
const KNOWN_MODEL_ID_PREFIXES = ['anthropic.', 'amazon.', 'ai21.', 'cohere.', 'meta.'];

/** Last-resort short names for models that are not in the catalog. */
const FALLBACK_MODEL_IDS: Readonly<Record<string, string>> = {
  'claude-3-opus': 'anthropic.claude-3-opus-20240229-v1:0',
  'claude-3-5-haiku': 'anthropic.claude-3-5-haiku-20241022-v1:0',
  'nova-premier': 'amazon.nova-premier-v1:0',
};

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function getModelConfig(modelName: string): BedrockModelConfig {
  const resolvedName = lookup(MODEL_ALIASES, modelName) ?? modelName;
  const config = lookup(BEDROCK_MODELS, resolvedName);

  if (!config) {
    throw new UnknownModelError(modelName, [...Object.keys(BEDROCK_MODELS), ...Object.keys(MODEL_ALIASES)]);
  }
  return config;
}

export function findModelConfig(modelName: string): BedrockModelConfig | undefined {
  try {
    return getModelConfig(modelName);
  } catch (err) {
    if (err instanceof UnknownModelError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Resolve a logical name, alias or raw identifier to a Bedrock model id.
 * Unknown names that already look like Bedrock ids pass through; otherwise
 * the fallback table is consulted before using the name verbatim.
 */
export function resolveModelId(modelName: string): string {
  const config = findModelConfig(modelName);
  if (config) {
    return config.modelId;
  }

  if (KNOWN_MODEL_ID_PREFIXES.some((prefix) => modelName.startsWith(prefix))) {
    return modelName;
  }

  return lookup(FALLBACK_MODEL_IDS, modelName) ?? modelName;
}

export function listModels(): Record<string, BedrockModelConfig> {
  return { ...BEDROCK_MODELS };
}

export function modelsByProvider(provider: ModelVendor): Record<string, BedrockModelConfig> {
  return Object.fromEntries(
    Object.entries(BEDROCK_MODELS).filter(([, config]) => config.provider === provider),
  );
}

/** Estimated cost in USD of one call. */
export function estimateCost(modelName: string, inputTokens: number, outputTokens: number): number {
  const config = getModelConfig(modelName);
  const inputCost = (inputTokens / 1000) * config.costPer1kInputTokens;
  const outputCost = (outputTokens / 1000) * config.costPer1kOutputTokens;
  return inputCost + outputCost;
}
