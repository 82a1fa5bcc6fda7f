/**
 * Provider-agnostic conversation and generation models.
 */

// ─── Conversation ───────────────────────────────────────────────────────────

export type TurnRole = 'system' | 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
}

// ─── Generation request / result ────────────────────────────────────────────

export interface GenerationRequest {
  messages: readonly ConversationTurn[];
  maxTokens: number;
  /** Sampling temperature in [0, 1]. */
  temperature: number;
  systemPrompt?: string;
  toolCatalog: readonly ToolDescriptor[];
}

export interface ToolCall {
  callId: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export interface InterpretedResult {
  textSegments: string[];
  toolCalls: ToolCall[];
  usageEstimate: number;
  /** Extracted model text before tool calls were removed. */
  rawText: string;
}

/** Synthesized answer returned in place of a model call when the loop guard fires. */
export interface TerminalResponse {
  text: string;
  usageEstimate: number;
  searchCount: number;
  planningCount: number;
}

export type GenerationOutcome =
  | { kind: 'interpreted'; result: InterpretedResult }
  | { kind: 'terminated'; response: TerminalResponse };

// ─── Helpers ────────────────────────────────────────────────────────────────

export function estimateUsage(text: string): number {
  const words = text.trim().split(/\s+/);
  return words[0] === '' ? 0 : words.length;
}

export function outcomeText(outcome: GenerationOutcome): string {
  return outcome.kind === 'terminated'
    ? outcome.response.text
    : outcome.result.textSegments.join('\n');
}
