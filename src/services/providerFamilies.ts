/**
 * Request formatting and response extraction per Bedrock provider family.
 *
 * Each family is a formatter/extractor pair:
 * - structured-content (Amazon Nova): content is an array of `{ text }`
 *   parts and system text is folded into one leading user turn.
 * - flat-text (Anthropic Claude): content is a plain string and system text
 *   goes into the top-level `system` slot.
 */

import { ConversationTurn } from '../models/conversation';
import { FormatError, MalformedResponseError } from '../models/errors';
import { logger } from '../utils/logger';

export type ProviderFamilyKind = 'structured-content' | 'flat-text';

export interface FormatParams {
  maxTokens: number;
  temperature: number;
}

// ─── Wire shapes ────────────────────────────────────────────────────────────

export interface StructuredContentMessage {
  role: 'user' | 'assistant';
  content: Array<{ text: string }>;
}

export interface StructuredContentBody {
  messages: StructuredContentMessage[];
  inferenceConfig: { maxTokens: number; temperature: number };
}

export interface FlatTextMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface FlatTextBody {
  anthropic_version: string;
  max_tokens: number;
  temperature: number;
  system?: string;
  messages: FlatTextMessage[];
}

export type ProviderEnvelope =
  | { family: 'structured-content'; body: StructuredContentBody }
  | { family: 'flat-text'; body: FlatTextBody };

export interface ProviderFamily {
  readonly kind: ProviderFamilyKind;
  format(messages: readonly ConversationTurn[], params: FormatParams): ProviderEnvelope;
  /** Throws MalformedResponseError when the expected text is absent. */
  extract(raw: unknown): string;
}

export const ANTHROPIC_BEDROCK_VERSION = 'bedrock-2023-05-31';

// ─── Helpers ────────────────────────────────────────────────────────────────

function splitSystem(messages: readonly ConversationTurn[]): {
  systemText: string | null;
  turns: Array<{ role: 'user' | 'assistant'; content: string }>;
} {
  const systemParts: string[] = [];
  const turns: Array<{ role: 'user' | 'assistant'; content: string }> = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  return {
    systemText: systemParts.length > 0 ? systemParts.join('\n') : null,
    turns,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstText(content: unknown): string | undefined {
  if (!Array.isArray(content) || content.length === 0) {
    return undefined;
  }
  const first: unknown = content[0];
  return isRecord(first) && typeof first.text === 'string' ? first.text : undefined;
}

// ─── Families ───────────────────────────────────────────────────────────────

export const structuredContentFamily: ProviderFamily = {
  kind: 'structured-content',

  format(messages, params) {
    const { systemText, turns } = splitSystem(messages);
    const formatted: StructuredContentMessage[] = turns.map((turn) => ({
      role: turn.role,
      content: [{ text: turn.content }],
    }));

    if (systemText !== null) {
      formatted.unshift({ role: 'user', content: [{ text: systemText }] });
    }

    return {
      family: 'structured-content',
      body: {
        messages: formatted,
        inferenceConfig: {
          maxTokens: params.maxTokens,
          temperature: params.temperature,
        },
      },
    };
  },

  extract(raw) {
    const output = isRecord(raw) ? raw.output : undefined;
    const message = isRecord(output) ? output.message : undefined;
    const text = isRecord(message) ? firstText(message.content) : undefined;

    if (text === undefined) {
      throw new MalformedResponseError('Response has no output.message.content[0].text');
    }
    return text;
  },
};

export const flatTextFamily: ProviderFamily = {
  kind: 'flat-text',

  format(messages, params) {
    const { systemText, turns } = splitSystem(messages);
    const body: FlatTextBody = {
      anthropic_version: ANTHROPIC_BEDROCK_VERSION,
      max_tokens: params.maxTokens,
      temperature: params.temperature,
      messages: turns,
    };

    if (systemText !== null) {
      body.system = systemText;
    }

    return { family: 'flat-text', body };
  },

  extract(raw) {
    const text = isRecord(raw) ? firstText(raw.content) : undefined;

    if (text === undefined) {
      throw new MalformedResponseError('Response has no content[0].text');
    }
    return text;
  },
};

export const PROVIDER_FAMILIES: Readonly<Record<ProviderFamilyKind, ProviderFamily>> = {
  'structured-content': structuredContentFamily,
  'flat-text': flatTextFamily,
};

export function resolveProviderFamily(modelId: string): ProviderFamily {
  const lower = modelId.toLowerCase();
  if (lower.includes('nova')) {
    return structuredContentFamily;
  }
  if (lower.includes('claude')) {
    return flatTextFamily;
  }
  throw new FormatError(`Unsupported model: ${modelId}`);
}

// ─── Entry points ───────────────────────────────────────────────────────────

export function formatRequest(
  messages: readonly ConversationTurn[],
  params: FormatParams,
  family: ProviderFamily,
): ProviderEnvelope {
  if (messages.length === 0) {
    throw new FormatError('Cannot format an empty message list');
  }
  if (!Number.isInteger(params.maxTokens) || params.maxTokens <= 0) {
    throw new FormatError(`maxTokens must be a positive integer, got ${params.maxTokens}`);
  }
  if (!Number.isFinite(params.temperature) || params.temperature < 0 || params.temperature > 1) {
    throw new FormatError(`temperature must be within [0, 1], got ${params.temperature}`);
  }

  return family.format(messages, params);
}

/**
 * Pull the answer text out of a raw provider response. An unrecognized
 * envelope is returned stringified instead of failing the generation.
 */
export function extractText(raw: unknown, family: ProviderFamily): string {
  try {
    return family.extract(raw);
  } catch (err) {
    if (!(err instanceof MalformedResponseError)) {
      throw err;
    }
    logger.warn('Unrecognized response envelope, returning raw payload', {}, {
      family: family.kind,
      error: err.message,
    });
    return typeof raw === 'string' ? raw : JSON.stringify(raw) ?? String(raw);
  }
}
