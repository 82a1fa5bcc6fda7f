/**
 * Runtime configuration read from the environment.
 */

import { DEFAULT_MODEL, findModelConfig } from './models';

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export interface EngineConfig {
  modelName: string;
  region: string;
  maxTokens: number;
  temperature: number;
  /** Explicit keys; when absent the SDK default credential chain is used. */
  credentials?: AwsCredentials;
  systemPrompt: string;
}

export interface TableConfig {
  connectionsTable: string;
  sessionsTable: string;
}

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a research and content assistant.',
  'Answer with the information you already have whenever it is enough.',
  'Search the web at most once per task, then write the final answer immediately.',
  'When asked for web content, produce complete HTML and CSS files.',
].join(' ');

const FALLBACK_MAX_TOKENS = 4096;
const FALLBACK_TEMPERATURE = 0.7;

type Env = Record<string, string | undefined>;

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const modelName = nonEmpty(env.LLM_MODEL) ?? DEFAULT_MODEL;
  const catalogEntry = findModelConfig(modelName);

  const accessKeyId = nonEmpty(env.AWS_ACCESS_KEY_ID);
  const secretAccessKey = nonEmpty(env.AWS_SECRET_ACCESS_KEY);

  return {
    modelName,
    region: nonEmpty(env.AWS_REGION) ?? nonEmpty(env.AWS_DEFAULT_REGION) ?? 'us-east-1',
    maxTokens: parsePositiveInteger(env.LLM_MAX_TOKENS, catalogEntry?.maxTokens ?? FALLBACK_MAX_TOKENS),
    temperature: parseTemperature(env.LLM_TEMPERATURE, catalogEntry?.temperature ?? FALLBACK_TEMPERATURE),
    credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
    systemPrompt: nonEmpty(env.AGENT_SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
  };
}

export function loadTableConfig(env: Env = process.env): TableConfig {
  return {
    connectionsTable: nonEmpty(env.CONNECTIONS_TABLE) ?? 'AgentEngine-Connections',
    sessionsTable: nonEmpty(env.SESSIONS_TABLE) ?? 'AgentEngine-Sessions',
  };
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseTemperature(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseFloat(raw);
  if (Number.isNaN(value) || value < 0 || value > 1) {
    return fallback;
  }
  return value;
}
